/**
 * Contact record and scoring output types
 */

import type { NormalizationBaseline } from "./normalization";

/**
 * Contact input record. Empty strings stand for missing text.
 */
export type ContactRecord = {
  firstName: string;
  lastName: string;
  jobTitle: string;
  companyName: string;
  /** Pre-computed company comparison key; derived from companyName when empty */
  normalizedCompany: string;
  source: string;
  dateCreated: string;
  dateUpdated: string;
  extraData: string;
};

/**
 * Title-derived pillar scores for one contact.
 */
export type TitleScores = {
  seniority: number;
  domain: number;
  warmth: number;
  /** True when a one-off override replaced seniority/domain */
  oneOff: boolean;
};

export type ScoredContact = {
  firstName: string;
  lastName: string;
  fullName: string;
  jobTitle: string;
  companyName: string;
  seniorityScore: number;
  domainScore: number;
  /** Reserved engagement signal, always 0 */
  warmthScore: number;
  /** Weighted pillar average before batch normalization */
  rawContactScore: number;
  /** Normalized contact score */
  contactScore: number;
  /** Matched company name, empty when no match */
  matchedCompany: string;
  /** Match confidence, null when no match */
  matchConfidence: number | null;
  /** Company score of the matched company, null when no match */
  companyScore: number | null;
  rawLeadScore: number;
  leadScore: number;
  source: string;
  dateCreated: string;
  dateUpdated: string;
  extraData: string;
};

export type ContactScoringOptions = {
  /** Prior-run bounds; batch min/max are used for any bound left out */
  baseline?: NormalizationBaseline | null;
};
