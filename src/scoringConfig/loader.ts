/**
 * Scoring config loading and compilation
 *
 * Loads the scoring config JSON, validates it, and compiles it into the
 * runtime form every scorer receives explicitly: keyword lists split once,
 * title patterns compiled once, score cells resolved into base scores or
 * modifiers.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  ComponentRuntime,
  ComponentScore,
  PeopleComponentRaw,
  PeoplePillarName,
  PeoplePillarRuntime,
  CompanyPillarName,
  ScoringConfig,
  ScoringConfigRaw,
} from "@/types/config";
import {
  parseWeightCell,
  validateScoringConfigRaw,
} from "@/utils/configValidation";
import {
  COMPANY_PILLARS,
  SCORING_CONFIG_PATH,
  SCORING_CONFIG_PATH_ENV,
} from "@/constants/config";
import * as logger from "@/logger";

/**
 * Error thrown when a validated config cannot be compiled.
 */
export class ScoringConfigCompilationError extends Error {
  constructor(message: string) {
    super(`Scoring config compilation failed: ${message}`);
    this.name = "ScoringConfigCompilationError";
  }
}

const MODIFIER_PATTERN = /^[+-]\d+$/;
const BASE_SCORE_PATTERN = /^\d+$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Builds a case-insensitive pattern matching any of the keywords where they
 * are not embedded inside a longer run of letters.
 */
export function buildKeywordPattern(keywords: readonly string[]): RegExp {
  const alternatives = keywords.map(escapeRegExp).join("|");
  return new RegExp(`(^|[^a-z])(${alternatives})($|[^a-z])`, "i");
}

/**
 * Splits a comma-separated keyword cell, dropping empty entries.
 */
export function splitKeywords(cell: string | undefined): string[] {
  if (!cell) return [];
  return cell
    .split(",")
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0);
}

/**
 * Resolves a component's Score cell.
 *
 * @returns The resolved score, or null when the component never contributes
 *   (absent, empty or zero score, unparseable modifier)
 * @throws {ScoringConfigCompilationError} If a base score is not an integer
 */
function resolveComponentScore(
  raw: PeopleComponentRaw["Score"],
  location: string,
): ComponentScore | null {
  if (raw === undefined || raw === "" || raw === 0) return null;

  if (typeof raw === "string") {
    const cell = raw.trim();
    if (cell.startsWith("+") || cell.startsWith("-")) {
      if (!MODIFIER_PATTERN.test(cell)) {
        logger.warn("Ignoring unparseable score modifier", {
          component: location,
          score: raw,
        });
        return null;
      }
      const delta = Number.parseInt(cell, 10);
      return delta === 0 ? null : { kind: "modifier", delta };
    }
    if (!BASE_SCORE_PATTERN.test(cell)) {
      throw new ScoringConfigCompilationError(
        `${location} has non-integer score "${raw}"`,
      );
    }
    const score = Number.parseInt(cell, 10);
    return score === 0 ? null : { kind: "base", score };
  }

  if (!Number.isFinite(raw)) {
    throw new ScoringConfigCompilationError(
      `${location} has non-finite score ${raw}`,
    );
  }
  const score = Math.trunc(raw);
  return score === 0 ? null : { kind: "base", score };
}

function compileComponents(
  pillarName: string,
  components: Record<string, PeopleComponentRaw>,
): ComponentRuntime[] {
  const compiled: ComponentRuntime[] = [];

  for (const [name, component] of Object.entries(components)) {
    const location = `${pillarName}/${name}`;
    const score = resolveComponentScore(component.Score, location);
    if (score === null) continue;

    const keywords = splitKeywords(component["Keywords to Match"]);
    if (keywords.length === 0) continue;

    compiled.push({
      name,
      keywords,
      pattern: buildKeywordPattern(keywords),
      keywordPatterns: keywords.map((keyword) => buildKeywordPattern([keyword])),
      score,
    });
  }

  return compiled;
}

function compilePeoplePillar(
  raw: ScoringConfigRaw,
  name: PeoplePillarName,
): PeoplePillarRuntime {
  const pillar = raw.peopleScore.pillars[name];
  if (pillar === undefined) {
    logger.warn("People pillar not found in scoring config", { pillar: name });
    return { name, weight: null, components: [] };
  }

  const prefix = `peopleScore.pillars["${name}"]`;
  const weight =
    pillar.weight !== undefined
      ? parseWeightCell(pillar.weight, `${prefix}.weight`)
      : parseWeightCell(pillar.description, `${prefix}.description`);

  return {
    name,
    weight,
    components: compileComponents(name, pillar.components ?? {}),
  };
}

/**
 * Reads a contact-score weight. Absent pillars were already reported and
 * weigh 0; a present pillar without a weight cannot be scored.
 */
function requirePeopleWeight(
  raw: ScoringConfigRaw,
  pillar: PeoplePillarRuntime,
): number {
  if (raw.peopleScore.pillars[pillar.name] === undefined) return 0;
  if (pillar.weight === null) {
    throw new ScoringConfigCompilationError(
      `People pillar "${pillar.name}" has no weight`,
    );
  }
  return pillar.weight;
}

function compileCompanyWeights(
  raw: ScoringConfigRaw,
): Record<CompanyPillarName, number> {
  const weights: Record<CompanyPillarName, number> = {
    Alignment: 0,
    Budget: 0,
    Demand: 0,
  };

  for (const name of COMPANY_PILLARS) {
    const pillar = raw.companyScore.pillars[name];
    if (pillar === undefined) {
      logger.warn("Company pillar not found in scoring config", {
        pillar: name,
      });
      continue;
    }
    const weight = parseWeightCell(
      pillar.weight,
      `companyScore.pillars["${name}"].weight`,
    );
    if (weight === null) {
      throw new ScoringConfigCompilationError(
        `Company pillar "${name}" has no weight`,
      );
    }
    weights[name] = weight;
  }

  return weights;
}

/**
 * Compiles a validated raw config into runtime form.
 *
 * @throws {ScoringConfigCompilationError} If a required weight is missing,
 *   a base score is malformed, or a pillar group's weights sum to zero
 */
export function compileScoringConfig(raw: ScoringConfigRaw): ScoringConfig {
  const seniority = compilePeoplePillar(raw, "Seniority");
  const domain = compilePeoplePillar(raw, "Domain");
  const warmth = compilePeoplePillar(raw, "Warmth");
  const oneOffs = compilePeoplePillar(raw, "One-Offs");

  const contactWeights = {
    seniority: requirePeopleWeight(raw, seniority),
    domain: requirePeopleWeight(raw, domain),
    warmth: requirePeopleWeight(raw, warmth),
  };
  if (
    contactWeights.seniority + contactWeights.domain + contactWeights.warmth ===
    0
  ) {
    throw new ScoringConfigCompilationError(
      "Seniority, Domain and Warmth weights sum to zero",
    );
  }

  const companyWeights = compileCompanyWeights(raw);
  if (
    companyWeights.Alignment + companyWeights.Budget + companyWeights.Demand ===
    0
  ) {
    throw new ScoringConfigCompilationError(
      "Alignment, Budget and Demand weights sum to zero",
    );
  }

  return {
    people: {
      Seniority: seniority,
      Domain: domain,
      Warmth: warmth,
      "One-Offs": oneOffs,
    },
    contactWeights,
    companyWeights,
  };
}

/**
 * Resolves the config path: explicit argument, then SCORING_CONFIG_PATH
 * from the environment, then the bundled default. Relative paths resolve
 * against the working directory.
 */
export function resolveScoringConfigPath(configPath?: string): string {
  const configured =
    configPath ?? process.env[SCORING_CONFIG_PATH_ENV] ?? SCORING_CONFIG_PATH;
  return path.resolve(process.cwd(), configured);
}

/**
 * Parses, validates and compiles a config document already in memory.
 */
export function parseScoringConfig(raw: unknown): ScoringConfig {
  return compileScoringConfig(validateScoringConfigRaw(raw));
}

/**
 * Loads and compiles the scoring config.
 *
 * Fail-fast: any read, parse, validation or compilation error throws.
 *
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If the JSON is malformed
 * @throws {ScoringConfigValidationError} If validation fails
 * @throws {ScoringConfigCompilationError} If compilation fails
 *
 * @example
 * const config = loadScoringConfig();
 * logger.info("Scoring config loaded", {
 *   seniorityComponents: config.people.Seniority.components.length,
 * });
 */
export function loadScoringConfig(configPath?: string): ScoringConfig {
  const resolved = resolveScoringConfigPath(configPath);
  const jsonContent = fs.readFileSync(resolved, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  const config = parseScoringConfig(raw);

  logger.debug("Scoring config loaded", { path: resolved });
  return config;
}
