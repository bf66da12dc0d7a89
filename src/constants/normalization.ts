/**
 * Score normalization constants
 */

export const NORMALIZED_MIN = 0;
export const NORMALIZED_MAX = 100;

/**
 * Value every record gets when a pillar (or subcomponent) column is
 * degenerate: all values equal.
 */
export const DEGENERATE_PILLAR_SCORE = 50;

/**
 * Decimal places kept by pillar and subcomponent normalization.
 */
export const PILLAR_DECIMAL_PLACES = 1;
