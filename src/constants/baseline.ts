/**
 * Baseline store constants
 */

/**
 * Label runs are recorded under when the provider was given none.
 */
export const DEFAULT_SCORING_RUN_LABEL = "default";

/**
 * Default path of the scoring runs file, relative to the project root.
 */
export const BASELINE_STORE_PATH = "data/scoring-runs.json";

/**
 * Environment variable overriding BASELINE_STORE_PATH.
 */
export const BASELINE_STORE_PATH_ENV = "BASELINE_STORE_PATH";
