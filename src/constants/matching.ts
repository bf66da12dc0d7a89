/**
 * Fuzzy company matching thresholds
 */

/**
 * Minimum confidence for a contact's company to count as matched.
 */
export const MIN_MATCH_CONFIDENCE = 90;

/** Score for identical normalized keys */
export const EXACT_MATCH_SCORE = 100;

/**
 * Score for a near-certain containment match. Capped below an exact match
 * so exact matches always rank first.
 */
export const CONTAINMENT_MATCH_SCORE = 97;

/**
 * Keys whose length ratio (shorter / longer) is below this never match.
 */
export const MIN_LENGTH_RATIO = 0.8;

/**
 * Containment only counts when the length ratio is strictly above this.
 */
export const CONTAINMENT_MIN_LENGTH_RATIO = 0.9;

/**
 * Both keys must be at least this long for containment to count.
 */
export const CONTAINMENT_MIN_KEY_LENGTH = 5;

/**
 * Sequence similarity ratio required for a non-exact, non-containment match.
 */
export const MIN_SEQUENCE_RATIO = 0.98;

/**
 * Sequences at least this long get the popular-character junk heuristic.
 */
export const AUTOJUNK_MIN_LENGTH = 200;
