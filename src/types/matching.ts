/**
 * Fuzzy company matching type definitions
 */

/**
 * Candidate company for contact-to-company matching.
 */
export type MatchCandidate = {
  /** Display name reported back on a match */
  name: string;
  /** Pre-normalized comparison key */
  normalizedName: string;
  companyScore: number;
};

/**
 * Outcome of matching one contact against the candidate list.
 *
 * A non-match is a valid terminal state: empty name, confidence 0,
 * companyScore null (absent, not zero).
 */
export type MatchResult = {
  matchedName: string;
  confidence: number;
  companyScore: number | null;
};
