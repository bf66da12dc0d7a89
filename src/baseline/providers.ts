/**
 * Baseline providers
 *
 * - StaticBaselineProvider: fixed bounds (from a stats document or config)
 * - FileBaselineProvider: bounds of the latest run in the baseline store
 */

import type {
  NormalizationBaseline,
  ScoringPipelineResult,
  ScoringRunInput,
} from "@/types";
import type { BaselineProvider } from "@/interfaces/scoring";
import { getLatestBaseline, recordScoringRun } from "@/store";
import { DEFAULT_SCORING_RUN_LABEL } from "@/constants/baseline";
import * as logger from "@/logger";

export class StaticBaselineProvider implements BaselineProvider {
  private readonly baseline: NormalizationBaseline | null;

  constructor(baseline: NormalizationBaseline | null) {
    this.baseline = baseline;
  }

  getBaseline(): NormalizationBaseline | null {
    return this.baseline;
  }
}

/**
 * Reads baselines from the baseline store file. The store must be open.
 */
export class FileBaselineProvider implements BaselineProvider {
  private readonly label: string | undefined;

  /**
   * @param label - Only consider runs recorded under this label
   */
  constructor(label?: string) {
    this.label = label;
  }

  getBaseline(): NormalizationBaseline | null {
    const baseline = getLatestBaseline(this.label);
    if (baseline === null) {
      logger.info("No recorded scoring run; normalizing against the batch", {
        label: this.label,
      });
    }
    return baseline;
  }

  /**
   * Record a finished run's raw ranges as the next baseline.
   *
   * @returns The new run id
   */
  recordRun(result: ScoringPipelineResult): number {
    const label = this.label ?? DEFAULT_SCORING_RUN_LABEL;
    return recordScoringRun(buildScoringRunInput(label, result));
  }
}

/**
 * Scoring run entry for a finished pipeline run. The raw (pre-normalization)
 * ranges are stored, since those are what later batches normalize against.
 */
export function buildScoringRunInput(
  label: string,
  result: ScoringPipelineResult,
): ScoringRunInput {
  return {
    label,
    company_count: result.companies.length,
    contact_count: result.stats.count,
    contact_score_min: result.stats.rawContact?.min ?? null,
    contact_score_max: result.stats.rawContact?.max ?? null,
    lead_score_min: result.stats.rawLead?.min ?? null,
    lead_score_max: result.stats.rawLead?.max ?? null,
  };
}
