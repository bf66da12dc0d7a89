/**
 * Baseline store entity types
 *
 * Field names follow the stored JSON document (snake_case); the bounds use
 * the same keys as the baseline stats document.
 */

/**
 * One recorded scoring run
 *
 * Records the raw score ranges of one contact batch so later runs can
 * normalize against them.
 */
export type ScoringRun = {
  id: number;
  label: string;
  company_count: number;
  contact_count: number;
  contact_score_min: number | null;
  contact_score_max: number | null;
  lead_score_min: number | null;
  lead_score_max: number | null;
  created_at: string;
};

export type ScoringRunInput = Omit<ScoringRun, "id" | "created_at">;

/**
 * Whole store file: runs in recording order (ascending id)
 */
export type ScoringRunsDocument = {
  runs: ScoringRun[];
};
