/**
 * Contact scoring constants
 */

/**
 * Warmth is reserved for a future engagement signal.
 */
export const DEFAULT_WARMTH_SCORE = 0;

export const MIN_TITLE_SCORE = 0;
export const MAX_TITLE_SCORE = 100;
