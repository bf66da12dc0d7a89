/**
 * Company record and scoring output types
 */

/**
 * Company input record.
 *
 * Numeric fields are null when missing or unparseable; dates are null when
 * missing or unparseable.
 */
export type CompanyRecord = {
  name: string;

  // Budget signals
  /** Revenue over the last 30 days (primary revenue signal) */
  revenue30d: number | null;
  /** Annual revenue (used when the 30-day figure is missing) */
  annualRevenue: number | null;
  totalFundingAmount: number | null;
  latestFundingAmount: number | null;
  latestFundingDate: Date | null;
  employeeCount: number | null;

  // Volatility signals (percent change)
  employeeChangePct: number | null;
  revenueChangePct: number | null;

  // Sales funnel
  closeStatus: string | null;
  closeStatusChangedAt: Date | null;

  // Alignment flags
  makesGames: boolean;
  freeToPlay: boolean;
  mobile: boolean;
  foundedYear: number | null;
  /** Company type, e.g. "co-developer" */
  type: string | null;

  // Pass-through metadata
  websiteUrl: string | null;
  linkedinUrl: string | null;
  country: string | null;
  flag: string | null;
  notes: string | null;
  discoverSource: string | null;
  createdDate: string | null;
  /** Pre-computed comparison key, when the source already carries one */
  normalizedName: string | null;
};

/**
 * Normalized (0-100) subcomponent scores, kept for reporting.
 */
export type CompanySubcomponentScores = {
  dev: number;
  f2p: number;
  mobile: number;
  fresh: number;
  revenue: number;
  funding: number;
  headcount: number;
  status: number;
  volatility: number;
  revenueDelta: number;
  runwayDelta: number;
  headcountDelta: number;
  hiring: number;
};

export type ScoredCompany = {
  name: string;
  /** Final score, min-max normalized across the batch (0-100) */
  companyScore: number;
  alignment: number;
  budget: number;
  demand: number;
  subcomponents: CompanySubcomponentScores;
  /** Website URL, else LinkedIn URL, else empty */
  url: string;
  /** Comparison key used by the fuzzy matcher */
  normalizedName: string;
  country: string;
  flag: string;
  notes: string;
  discoverSource: string;
  createdDate: string;
  /** Scoring date (YYYY-MM-DD) */
  updatedDate: string;
};

/**
 * Raw (pre-normalization) per-company contributions of one batch.
 *
 * Phase-1 output of the company scorer; every array is aligned with the
 * input record order.
 */
export type CompanyRawComponents = {
  dev: number[];
  f2p: number[];
  mobile: number[];
  fresh: number[];
  revenue: number[];
  funding: number[];
  headcount: number[];
  status: number[];
  volatility: number[];
  revenueChange: number[];
  runway: number[];
  headcountChange: number[];
  hiring: number[];
};

export type CompanyScoringOptions = {
  /** Reference time for decay and freshness (defaults to now) */
  now?: Date;
};
