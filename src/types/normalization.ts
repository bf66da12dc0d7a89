/**
 * Score normalization type definitions
 */

/**
 * Prior-run bounds that keep the contact/lead scale stable across
 * iterations. Each bound is optional on its own.
 */
export type NormalizationBaseline = {
  contactScoreMin?: number;
  contactScoreMax?: number;
  leadScoreMin?: number;
  leadScoreMax?: number;
};

/**
 * Min/max summary of one score column.
 */
export type ScoreRange = {
  min: number;
  max: number;
};

/**
 * Score ranges of a contact batch, before and after normalization.
 */
export type ContactBatchStats = {
  count: number;
  rawContact: ScoreRange | null;
  rawLead: ScoreRange | null;
  contact: ScoreRange | null;
  lead: ScoreRange | null;
};
