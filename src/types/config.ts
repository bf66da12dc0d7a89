/**
 * Scoring configuration type definitions
 *
 * Two forms exist:
 * - ScoringConfigRaw: JSON shape (deserialized from file or remote source)
 * - ScoringConfig: compiled form, built once per run and passed explicitly
 *   through every scoring call
 */

/**
 * Score cell of a people-pillar component as written in the config.
 *
 * A plain integer (or numeric string) is a base score; a string starting
 * with "+" or "-" is an additive modifier.
 */
export type ComponentScoreRaw = number | string;

/**
 * Component definition from config JSON.
 */
export type PeopleComponentRaw = {
  /** Comma-separated keyword list */
  "Keywords to Match"?: string;
  /** Base score or signed modifier */
  Score?: ComponentScoreRaw;
};

/**
 * People pillar definition from config JSON.
 *
 * The pillar weight historically lives in `description`; `weight` is
 * accepted as well and takes precedence.
 */
export type PeoplePillarRaw = {
  weight?: number | string;
  description?: number | string;
  components?: Record<string, PeopleComponentRaw>;
};

export type CompanyPillarRaw = {
  weight?: number | string;
};

/**
 * Raw config structure as deserialized from JSON.
 */
export type ScoringConfigRaw = {
  peopleScore: {
    pillars: Record<string, PeoplePillarRaw>;
  };
  companyScore: {
    pillars: Record<string, CompanyPillarRaw>;
  };
};

/**
 * People pillar names the contact scorer reads.
 */
export type PeoplePillarName = "Seniority" | "Domain" | "Warmth" | "One-Offs";

/**
 * Company pillar names the company scorer reads.
 */
export type CompanyPillarName = "Alignment" | "Budget" | "Demand";

/**
 * Component score resolved at compile time.
 */
export type ComponentScore =
  | { kind: "base"; score: number }
  | { kind: "modifier"; delta: number };

/**
 * Runtime component: keywords pre-split and the title pattern compiled once.
 */
export type ComponentRuntime = {
  /** Component name as written in the config */
  name: string;
  /** Trimmed, non-empty keywords in config order */
  keywords: string[];
  /** Case-insensitive pattern matching any keyword on letter boundaries */
  pattern: RegExp;
  /** Per-keyword patterns, aligned with `keywords` (longest-match rule) */
  keywordPatterns: RegExp[];
  score: ComponentScore;
};

export type PeoplePillarRuntime = {
  name: string;
  /** Pillar weight, null when the config does not carry one */
  weight: number | null;
  /** Components in config order */
  components: ComponentRuntime[];
};

/**
 * Compiled scoring config.
 *
 * People pillars absent from the document compile to an empty component
 * list, so scoring reads them without further checks.
 */
export type ScoringConfig = {
  people: Readonly<Record<PeoplePillarName, PeoplePillarRuntime>>;
  contactWeights: Readonly<{
    seniority: number;
    domain: number;
    warmth: number;
  }>;
  companyWeights: Readonly<Record<CompanyPillarName, number>>;
};
