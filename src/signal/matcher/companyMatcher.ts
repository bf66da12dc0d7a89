/**
 * Contact-to-company fuzzy matching
 *
 * Compares normalized company keys (see normalizeCompanyName) in stages:
 * exact, length-ratio gate, containment, then sequence similarity.
 * Anything below the confidence gate is a non-match, never a partial one.
 */

import type { MatchCandidate, MatchResult } from "@/types/matching";
import {
  CONTAINMENT_MATCH_SCORE,
  CONTAINMENT_MIN_KEY_LENGTH,
  CONTAINMENT_MIN_LENGTH_RATIO,
  EXACT_MATCH_SCORE,
  MIN_LENGTH_RATIO,
  MIN_MATCH_CONFIDENCE,
  MIN_SEQUENCE_RATIO,
} from "@/constants/matching";
import { normalizeCompanyName } from "@/utils/text/companyName";
import { codePointLength, sequenceRatio } from "./sequenceRatio";

const NO_MATCH: MatchResult = {
  matchedName: "",
  confidence: 0,
  companyScore: null,
};

/**
 * Match score (0-100) between two already-normalized company keys.
 *
 * @returns 100 for identical keys, 97 for a near-equal containment,
 *   the similarity ratio × 100 when it reaches 0.98, otherwise 0
 */
export function matchScore(keyA: string, keyB: string): number {
  if (!keyA || !keyB) {
    return 0;
  }
  if (keyA === keyB) {
    return EXACT_MATCH_SCORE;
  }

  const lengthA = codePointLength(keyA);
  const lengthB = codePointLength(keyB);
  const shorter = Math.min(lengthA, lengthB);
  const lengthRatio = shorter / Math.max(lengthA, lengthB);
  if (lengthRatio < MIN_LENGTH_RATIO) {
    return 0;
  }

  const contains = keyA.includes(keyB) || keyB.includes(keyA);
  if (
    contains &&
    shorter >= CONTAINMENT_MIN_KEY_LENGTH &&
    lengthRatio > CONTAINMENT_MIN_LENGTH_RATIO
  ) {
    return CONTAINMENT_MATCH_SCORE;
  }

  const ratio = sequenceRatio(keyA, keyB);
  return ratio >= MIN_SEQUENCE_RATIO ? ratio * 100 : 0;
}

/**
 * Match score between two raw company names; both are normalized first.
 *
 * @example
 * matchCompanyNames("Supercell Oy", "SUPERCELL"); // 100
 */
export function matchCompanyNames(
  nameA: string | null | undefined,
  nameB: string | null | undefined,
): number {
  return matchScore(normalizeCompanyName(nameA), normalizeCompanyName(nameB));
}

/**
 * Best-scoring candidate for a normalized company key.
 *
 * Candidates are scanned in input order; a later candidate replaces the
 * current best only with a strictly higher score, so ties keep the first.
 * Candidates with an empty key are skipped.
 *
 * @param key - Contact's normalized company key
 * @param candidates - Scored companies with their normalized keys
 * @param minConfidence - Lowest score that counts as a match
 */
export function findBestMatch(
  key: string,
  candidates: readonly MatchCandidate[],
  minConfidence: number = MIN_MATCH_CONFIDENCE,
): MatchResult {
  if (!key.trim()) {
    return NO_MATCH;
  }

  let best: MatchResult = NO_MATCH;
  for (const candidate of candidates) {
    if (!candidate.normalizedName.trim()) continue;

    const score = matchScore(key, candidate.normalizedName);
    if (score >= minConfidence && score > best.confidence) {
      best = {
        matchedName: candidate.name,
        confidence: score,
        companyScore: candidate.companyScore,
      };
    }
  }

  return best;
}
