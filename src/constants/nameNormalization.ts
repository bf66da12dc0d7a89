/**
 * Company name normalization word lists
 *
 * Closed lists of tokens stripped from company names before comparison.
 * The lists live in data/company-name-words.json.
 */

import words from "../../data/company-name-words.json";

/**
 * Corporate-entity suffix tokens (llc, inc, gmbh, oy, ...), plus the
 * single letters left behind by dotted forms such as "S.p.A." or "B.V.".
 */
export const CORPORATE_SUFFIXES: ReadonlySet<string> = new Set(
  words.corporateSuffixes,
);

/**
 * Industry filler tokens (games, studio, casino, ...). Removed unless the
 * caller asks to preserve them.
 */
export const INDUSTRY_SUFFIXES: ReadonlySet<string> = new Set(
  words.industrySuffixes,
);

/**
 * Web-domain suffixes. A raw name token ending in one is dropped
 * ("booking.com").
 */
export const DOMAIN_SUFFIXES: readonly string[] = words.domainSuffixes;

/**
 * Standalone numeric tokens up to this length are dropped (founding years,
 * "777"-style noise).
 */
export const MAX_DROPPED_NUMERIC_TOKEN_LENGTH = 4;

/**
 * Characters kept by normalization; everything else becomes a space.
 */
export const NON_NAME_CHARACTER_PATTERN = /[^a-z0-9\s]/g;

export const PARENTHETICAL_PATTERN = /\([^)]*\)/g;
