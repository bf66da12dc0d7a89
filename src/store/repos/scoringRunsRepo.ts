/**
 * Scoring runs repository
 *
 * Data access layer for the runs in the baseline store file.
 */

import type {
  NormalizationBaseline,
  ScoringRun,
  ScoringRunInput,
} from "@/types";
import { parseBaselineJson } from "@/baseline/baselineJson";
import { readStoreDocument, writeStoreDocument } from "../connection";

/**
 * Record a scoring run
 * Returns the run id
 */
export function recordScoringRun(input: ScoringRunInput): number {
  const document = readStoreDocument();
  const id = document.runs.reduce((max, run) => Math.max(max, run.id), 0) + 1;

  document.runs.push({
    id,
    label: input.label,
    company_count: input.company_count,
    contact_count: input.contact_count,
    contact_score_min: input.contact_score_min,
    contact_score_max: input.contact_score_max,
    lead_score_min: input.lead_score_min,
    lead_score_max: input.lead_score_max,
    created_at: new Date().toISOString(),
  });
  writeStoreDocument(document);

  return id;
}

/**
 * Get run by id
 */
export function getScoringRunById(id: number): ScoringRun | undefined {
  return readStoreDocument().runs.find((run) => run.id === id);
}

/**
 * Most recent run (highest id), optionally restricted to one label
 */
export function getLatestScoringRun(label?: string): ScoringRun | undefined {
  let latest: ScoringRun | undefined;
  for (const run of readStoreDocument().runs) {
    if (label !== undefined && run.label !== label) continue;
    if (!latest || run.id > latest.id) latest = run;
  }
  return latest;
}

/**
 * Convert a stored run into normalization bounds. Null bounds are left
 * out so the batch range fills them in.
 */
export function toNormalizationBaseline(run: ScoringRun): NormalizationBaseline {
  return parseBaselineJson(run);
}

/**
 * Baseline from the most recent run (optionally of one label), or null
 * when no run has been recorded
 */
export function getLatestBaseline(label?: string): NormalizationBaseline | null {
  const run = getLatestScoringRun(label);
  return run ? toNormalizationBaseline(run) : null;
}
