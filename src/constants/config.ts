/**
 * Scoring config location
 */

/**
 * Default path of the scoring config JSON, relative to the project root.
 */
export const SCORING_CONFIG_PATH = "data/scoring-config.json";

/**
 * Environment variable overriding SCORING_CONFIG_PATH.
 */
export const SCORING_CONFIG_PATH_ENV = "SCORING_CONFIG_PATH";

/**
 * Company pillars whose weight the config must carry.
 */
export const COMPANY_PILLARS = ["Alignment", "Budget", "Demand"] as const;
