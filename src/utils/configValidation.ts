/**
 * Scoring config validation module
 *
 * Checks the deserialized config document shape before compilation:
 * - peopleScore.pillars and companyScore.pillars are objects
 * - pillar weights are numbers or numeric strings
 * - component keywords are strings, scores numbers or strings
 *
 * Validation is fail-fast: throws on first error.
 */

import type {
  CompanyPillarRaw,
  PeopleComponentRaw,
  PeoplePillarRaw,
  ScoringConfigRaw,
} from "@/types/config";

/**
 * Error thrown when the scoring config document is malformed.
 */
export class ScoringConfigValidationError extends Error {
  constructor(message: string) {
    super(`Scoring config validation failed: ${message}`);
    this.name = "ScoringConfigValidationError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateObject(
  value: unknown,
  fieldPath: string,
): asserts value is Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ScoringConfigValidationError(`${fieldPath} must be an object`);
  }
}

function validateOptionalNumberOrString(
  value: unknown,
  fieldPath: string,
): asserts value is number | string | undefined {
  if (value === undefined) return;
  if (typeof value !== "number" && typeof value !== "string") {
    throw new ScoringConfigValidationError(
      `${fieldPath} must be a number or string, got ${typeof value}`,
    );
  }
}

/**
 * Parses a pillar weight cell into a finite number.
 *
 * @returns The weight, or null when the cell is absent
 * @throws {ScoringConfigValidationError} If the cell is not numeric
 */
export function parseWeightCell(
  value: number | string | undefined,
  fieldPath: string,
): number | null {
  if (value === undefined) return null;
  const weight = typeof value === "number" ? value : Number(value.trim());
  if (
    (typeof value === "string" && value.trim() === "") ||
    !Number.isFinite(weight)
  ) {
    throw new ScoringConfigValidationError(
      `${fieldPath} must be numeric, got "${value}"`,
    );
  }
  return weight;
}

function validateComponent(
  component: unknown,
  fieldPath: string,
): PeopleComponentRaw {
  validateObject(component, fieldPath);

  const keywords = component["Keywords to Match"];
  if (keywords !== undefined && typeof keywords !== "string") {
    throw new ScoringConfigValidationError(
      `${fieldPath}["Keywords to Match"] must be a string, got ${typeof keywords}`,
    );
  }

  const score = component.Score;
  validateOptionalNumberOrString(score, `${fieldPath}.Score`);

  return { "Keywords to Match": keywords, Score: score };
}

function validatePeoplePillar(pillar: unknown, name: string): PeoplePillarRaw {
  const prefix = `peopleScore.pillars["${name}"]`;
  validateObject(pillar, prefix);

  const { weight, description, components: componentsRaw } = pillar;
  validateOptionalNumberOrString(weight, `${prefix}.weight`);
  validateOptionalNumberOrString(description, `${prefix}.description`);
  // Weight cells are checked here so a bad one fails at load time
  parseWeightCell(weight, `${prefix}.weight`);
  parseWeightCell(description, `${prefix}.description`);

  const result: PeoplePillarRaw = { weight, description };

  if (componentsRaw !== undefined) {
    validateObject(componentsRaw, `${prefix}.components`);
    const components: Record<string, PeopleComponentRaw> = {};
    for (const [componentName, component] of Object.entries(componentsRaw)) {
      components[componentName] = validateComponent(
        component,
        `${prefix}.components["${componentName}"]`,
      );
    }
    result.components = components;
  }

  return result;
}

function validateCompanyPillar(pillar: unknown, name: string): CompanyPillarRaw {
  const prefix = `companyScore.pillars["${name}"]`;
  validateObject(pillar, prefix);
  const weight = pillar.weight;
  validateOptionalNumberOrString(weight, `${prefix}.weight`);
  parseWeightCell(weight, `${prefix}.weight`);
  return { weight };
}

/**
 * Validates raw scoring config data from JSON.
 *
 * Unknown keys are ignored. Whether required pillars carry a weight is
 * decided at compile time, where absent pillars are reported.
 *
 * @param raw - Deserialized config document
 * @returns The validated config (typed as ScoringConfigRaw)
 * @throws {ScoringConfigValidationError} On the first malformed field
 *
 * @example
 * const config = validateScoringConfigRaw(JSON.parse(jsonString));
 */
export function validateScoringConfigRaw(raw: unknown): ScoringConfigRaw {
  validateObject(raw, "Scoring config");

  const peopleScore = raw.peopleScore;
  validateObject(peopleScore, "peopleScore");
  const peopleRaw = peopleScore.pillars;
  validateObject(peopleRaw, "peopleScore.pillars");

  const companyScore = raw.companyScore;
  validateObject(companyScore, "companyScore");
  const companyRaw = companyScore.pillars;
  validateObject(companyRaw, "companyScore.pillars");

  const peoplePillars: Record<string, PeoplePillarRaw> = {};
  for (const [name, pillar] of Object.entries(peopleRaw)) {
    peoplePillars[name] = validatePeoplePillar(pillar, name);
  }

  const companyPillars: Record<string, CompanyPillarRaw> = {};
  for (const [name, pillar] of Object.entries(companyRaw)) {
    companyPillars[name] = validateCompanyPillar(pillar, name);
  }

  return {
    peopleScore: { pillars: peoplePillars },
    companyScore: { pillars: companyPillars },
  };
}
