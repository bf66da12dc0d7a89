/**
 * Scoring pipeline type definitions
 */

import type { CompanyRecord, ScoredCompany } from "./company";
import type { ContactRecord, ScoredContact } from "./contact";
import type { ScoringConfig } from "./config";
import type { ContactBatchStats, NormalizationBaseline } from "./normalization";

export type ScoringPipelineInput = {
  companies: CompanyRecord[];
  contacts: ContactRecord[];
  config: ScoringConfig;
  baseline?: NormalizationBaseline | null;
  /** Reference time for company decay (defaults to now) */
  now?: Date;
};

export type ScoringPipelineResult = {
  /** Scored companies, sorted by descending company score */
  companies: ScoredCompany[];
  /** Scored contacts, sorted by descending lead score */
  contacts: ScoredContact[];
  stats: ContactBatchStats;
};
