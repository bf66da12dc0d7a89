/**
 * Volatility subcomponents of the Demand pillar
 *
 * Three batch-relative percentiles per company:
 * - revenue change, inverted (a falling revenue ranks high)
 * - runway: latest funding amount decayed by its age, ranked only among
 *   companies that have both an amount and a valid date
 * - headcount change, inverted
 */

import type { CompanyRecord } from "@/types/company";
import {
  FUNDING_HALF_LIFE_DAYS,
  VOLATILITY_POINTS,
  VOLATILITY_WEIGHTS,
} from "@/constants/companyScoring";
import {
  daysElapsed,
  halfLifeDecay,
  percentileColumn,
} from "@/utils/math";

export type VolatilityComponents = {
  revenueChange: number[];
  runway: number[];
  headcountChange: number[];
};

/**
 * Funding amount halved for every year since it was raised, or null when
 * the amount or the date is missing.
 */
export function decayedFundingAmount(
  company: Pick<CompanyRecord, "latestFundingAmount" | "latestFundingDate">,
  now: Date,
): number | null {
  const { latestFundingAmount, latestFundingDate } = company;
  if (
    latestFundingAmount === null ||
    latestFundingDate === null ||
    Number.isNaN(latestFundingDate.getTime())
  ) {
    return null;
  }
  const ageDays = daysElapsed(latestFundingDate, now);
  return latestFundingAmount * halfLifeDecay(ageDays, FUNDING_HALF_LIFE_DAYS);
}

/**
 * Percentile columns (0-100) for the three volatility signals, aligned with
 * the input order.
 */
export function computeVolatilityComponents(
  companies: readonly CompanyRecord[],
  now: Date,
): VolatilityComponents {
  return {
    revenueChange: percentileColumn(
      companies.map((company) => company.revenueChangePct),
      true,
    ),
    runway: percentileColumn(
      companies.map((company) => decayedFundingAmount(company, now)),
    ),
    headcountChange: percentileColumn(
      companies.map((company) => company.employeeChangePct),
      true,
    ),
  };
}

/**
 * Weighted average of the three percentiles, scaled to VOLATILITY_POINTS.
 */
export function combineVolatility(
  revenueChange: number,
  runway: number,
  headcountChange: number,
): number {
  const totalWeight =
    VOLATILITY_WEIGHTS.revenueChange +
    VOLATILITY_WEIGHTS.runway +
    VOLATILITY_WEIGHTS.headcountChange;
  const weighted =
    (revenueChange * VOLATILITY_WEIGHTS.revenueChange +
      runway * VOLATILITY_WEIGHTS.runway +
      headcountChange * VOLATILITY_WEIGHTS.headcountChange) /
    totalWeight;
  return (weighted / 100) * VOLATILITY_POINTS;
}
