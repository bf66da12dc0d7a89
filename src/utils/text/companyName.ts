/**
 * Company name normalization
 *
 * Canonicalizes a free-text company name into the comparison key used by
 * the fuzzy matcher. Deterministic and idempotent:
 * normalizeCompanyName(normalizeCompanyName(x)) === normalizeCompanyName(x)
 */

import {
  CORPORATE_SUFFIXES,
  DOMAIN_SUFFIXES,
  INDUSTRY_SUFFIXES,
  MAX_DROPPED_NUMERIC_TOKEN_LENGTH,
  NON_NAME_CHARACTER_PATTERN,
  PARENTHETICAL_PATTERN,
} from "@/constants/nameNormalization";
import { removeDiacritics } from "./removeDiacritics";

export type CompanyNameOptions = {
  /**
   * Keep industry filler words (games, studio, casino, ...). Useful when
   * the filler is the only thing telling two companies apart.
   */
  preserveIndustrySuffix?: boolean;
};

const NUMERIC_TOKEN_PATTERN = /^\d+$/;

/**
 * True for a raw token ending in a web-domain suffix ("booking.com").
 * Checked before punctuation is replaced, while the dot is still there.
 */
function isDomainToken(token: string): boolean {
  return DOMAIN_SUFFIXES.some((suffix) => token.endsWith(suffix));
}

/**
 * Normalize a company name into a comparison key.
 *
 * Steps (applied in order):
 * 1. Lowercase and strip diacritics
 * 2. Remove parenthetical asides ("Moon Active (Israel)")
 * 3. Drop tokens ending in a web-domain suffix (.com, .io, ...)
 * 4. Replace every character outside [a-z0-9 whitespace] with a space
 * 5. Drop corporate-entity suffix tokens (llc, inc, oy, ...)
 * 6. Drop industry filler tokens, unless preserveIndustrySuffix is set
 * 7. Drop standalone numeric tokens of up to 4 digits
 * 8. Join the remaining tokens with single spaces
 *
 * @param name - Raw company name (null/undefined/empty allowed)
 * @returns Normalized key, or "" when nothing usable remains
 *
 * @example
 * normalizeCompanyName("Supercell Oy") // "supercell"
 * normalizeCompanyName("Moon Active Games Ltd.") // "moon active"
 * normalizeCompanyName("Moon Active Games Ltd.", { preserveIndustrySuffix: true }) // "moon active games"
 */
export function normalizeCompanyName(
  name: string | null | undefined,
  options: CompanyNameOptions = {},
): string {
  if (typeof name !== "string" || name.length === 0) {
    return "";
  }

  let normalized = removeDiacritics(name.toLowerCase());
  normalized = normalized.replace(PARENTHETICAL_PATTERN, " ");
  normalized = normalized
    .split(/\s+/)
    .filter((token) => !isDomainToken(token))
    .join(" ")
    .replace(NON_NAME_CHARACTER_PATTERN, " ");

  const tokens = normalized
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .filter((token) => !CORPORATE_SUFFIXES.has(token))
    .filter(
      (token) =>
        options.preserveIndustrySuffix === true ||
        !INDUSTRY_SUFFIXES.has(token),
    )
    .filter(
      (token) =>
        !(
          NUMERIC_TOKEN_PATTERN.test(token) &&
          token.length <= MAX_DROPPED_NUMERIC_TOKEN_LENGTH
        ),
    );

  return tokens.join(" ");
}
