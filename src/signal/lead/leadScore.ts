/**
 * Lead score: contact score × company score, with penalties
 *
 * | company match | job title | lead score               |
 * |---------------|-----------|--------------------------|
 * | yes           | yes       | (contact / 100) × company |
 * | yes           | no        | company × 0.3            |
 * | no            | yes       | contact × 0.3            |
 * | no            | no        | 5                        |
 *
 * Result clamped to [0, 100].
 */

import {
  FLOOR_LEAD_SCORE,
  MAX_LEAD_SCORE,
  MIN_LEAD_SCORE,
  NO_MATCH_FACTOR,
  NO_TITLE_FACTOR,
} from "@/constants/leadScoring";
import { clamp } from "@/utils/math";

/**
 * Combine a raw contact score and a matched company score into a lead score.
 *
 * @param contactScore - Raw (pre-normalization) contact score
 * @param companyScore - Matched company's score; ignored without a match
 * @param hasCompanyMatch - Match confidence reached the gate
 * @param hasJobTitle - Title non-empty after trimming
 *
 * @example
 * combineLeadScore(80, 90, true, true); // 72
 * combineLeadScore(50, 80, true, false); // 24
 */
export function combineLeadScore(
  contactScore: number,
  companyScore: number,
  hasCompanyMatch: boolean,
  hasJobTitle: boolean,
): number {
  let leadScore: number;
  if (hasCompanyMatch && hasJobTitle) {
    leadScore = (contactScore / 100) * companyScore;
  } else if (hasCompanyMatch) {
    leadScore = companyScore * NO_TITLE_FACTOR;
  } else if (hasJobTitle) {
    leadScore = contactScore * NO_MATCH_FACTOR;
  } else {
    leadScore = FLOOR_LEAD_SCORE;
  }

  return clamp(leadScore, MIN_LEAD_SCORE, MAX_LEAD_SCORE);
}
