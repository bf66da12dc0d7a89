/**
 * Company scoring constants
 *
 * Point values, decay parameters and the sales-funnel status table used by
 * the company scorer. Pillar weights come from the scoring config.
 */

/**
 * Binary alignment flags: points awarded when the flag is set.
 */
export const ALIGNMENT_POINTS = {
  makesGames: 10,
  freeToPlay: 8,
  mobile: 7,
  fresh: 5,
} as const;

/**
 * Company type that never earns the makes-games points.
 */
export const CO_DEVELOPER_TYPE = "co-developer";

/**
 * Companies founded at most this many years before the current year are
 * "fresh".
 */
export const FRESH_MAX_AGE_YEARS = 3;

/**
 * Budget subcomponents: percentile (0-100) scaled to these maxima.
 */
export const BUDGET_POINTS = {
  revenue: 10,
  funding: 8,
  headcount: 5,
} as const;

/**
 * Volatility composite weights (weighted average of percentiles).
 */
export const VOLATILITY_WEIGHTS = {
  revenueChange: 5,
  runway: 4,
  headcountChange: 3,
} as const;

/**
 * Points the volatility composite scales to.
 */
export const VOLATILITY_POINTS = 7;

/**
 * Half-life applied to the latest funding amount when computing runway.
 */
export const FUNDING_HALF_LIFE_DAYS = 365;

/**
 * Reserved hiring signal; no source feeds it yet.
 */
export const HIRING_SIGNAL_POINTS = 0;

export type StatusDecayRule = {
  /** Lower-case substring looked for in the funnel status */
  match: string;
  points: number;
  halfLifeDays: number;
};

/**
 * Sales-funnel status table. Evaluated in order; the first rule whose
 * `match` is a substring of the lower-cased status wins.
 */
export const STATUS_DECAY_TABLE: readonly StatusDecayRule[] = [
  { match: "6 - previous customer", points: 10, halfLifeDays: 730 },
  { match: "7 - previous customer", points: 10, halfLifeDays: 730 },
  { match: "8 - stand down", points: 10, halfLifeDays: 730 },
  { match: "5 - customer", points: 8, halfLifeDays: 365 },
  { match: "4 - contract out", points: 8, halfLifeDays: 365 },
  { match: "met with matt", points: 6, halfLifeDays: 180 },
  { match: "lt (quarterly) followup", points: 6, halfLifeDays: 180 },
  { match: "qualified", points: 5, halfLifeDays: 90 },
  { match: "disco incoming", points: 2, halfLifeDays: 30 },
];

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
