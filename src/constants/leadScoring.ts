/**
 * Lead score combination constants
 */

/**
 * Share of the company score kept when the contact has no job title.
 */
export const NO_TITLE_FACTOR = 0.3;

/**
 * Share of the contact score kept when no company matched.
 */
export const NO_MATCH_FACTOR = 0.3;

/**
 * Fixed score for a contact with neither a company match nor a title.
 */
export const FLOOR_LEAD_SCORE = 5.0;

export const MIN_LEAD_SCORE = 0;
export const MAX_LEAD_SCORE = 100;
