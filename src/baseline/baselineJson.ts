/**
 * Baseline JSON parsing
 *
 * Reads the stats document written by earlier runs:
 * { "contact_score_min": 12.5, "contact_score_max": 88, ... }
 * Each bound is optional; non-numeric bounds are ignored with a warning.
 */

import type { NormalizationBaseline } from "@/types";
import { isRecord } from "@/utils/configValidation";
import * as logger from "@/logger";

const BASELINE_FIELDS = {
  contact_score_min: "contactScoreMin",
  contact_score_max: "contactScoreMax",
  lead_score_min: "leadScoreMin",
  lead_score_max: "leadScoreMax",
} as const;

/**
 * Parse a deserialized baseline document.
 *
 * @returns The bounds found; an empty object when the document is not an
 *   object at all
 */
export function parseBaselineJson(raw: unknown): NormalizationBaseline {
  if (!isRecord(raw)) {
    logger.warn("Baseline document is not an object; ignoring it");
    return {};
  }

  const baseline: NormalizationBaseline = {};
  for (const [field, key] of Object.entries(BASELINE_FIELDS)) {
    const value = raw[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      logger.warn("Ignoring non-numeric baseline bound", { field, value });
      continue;
    }
    baseline[key] = value;
  }
  return baseline;
}

/**
 * Serialize bounds back into the stats document shape.
 */
export function toBaselineJson(
  baseline: NormalizationBaseline,
): Record<keyof typeof BASELINE_FIELDS, number | null> {
  return {
    contact_score_min: baseline.contactScoreMin ?? null,
    contact_score_max: baseline.contactScoreMax ?? null,
    lead_score_min: baseline.leadScoreMin ?? null,
    lead_score_max: baseline.leadScoreMax ?? null,
  };
}
