/**
 * Company scorer
 *
 * Scores a batch of companies on three pillars and combines them into a
 * 0-100 Company Score. Two phases:
 * 1. Batch context: percentile columns, decay reference time
 * 2. Per-record raw contributions, then column-wise normalization
 *
 * Pillars:
 * - Alignment: makes games (not co-developers), free-to-play, mobile, fresh
 * - Budget: revenue, total funding, headcount percentiles
 * - Demand: decayed funnel status + volatility + hiring
 *
 * Every score is relative to the batch: the same company scored in a
 * different batch may land elsewhere.
 */

import type {
  CompanyRawComponents,
  CompanyRecord,
  CompanyScoringOptions,
  ScoredCompany,
} from "@/types/company";
import type { ScoringConfig } from "@/types/config";
import {
  ALIGNMENT_POINTS,
  BUDGET_POINTS,
  CO_DEVELOPER_TYPE,
  FRESH_MAX_AGE_YEARS,
  HIRING_SIGNAL_POINTS,
} from "@/constants";
import { minMax, normalizeCompanyName, percentileColumn } from "@/utils";
import {
  normalizePillar,
  normalizeSubcomponent,
} from "@/signal/normalization";
import { computeStatusScore } from "./statusDecay";
import { combineVolatility, computeVolatilityComponents } from "./volatility";
import * as logger from "@/logger";

/**
 * Makes-games points; co-developers never earn them.
 */
export function scoreDev(company: Pick<CompanyRecord, "makesGames" | "type">): number {
  if ((company.type ?? "").trim().toLowerCase() === CO_DEVELOPER_TYPE) {
    return 0;
  }
  return company.makesGames ? ALIGNMENT_POINTS.makesGames : 0;
}

/**
 * Freshness points for companies founded within FRESH_MAX_AGE_YEARS of the
 * current year.
 */
export function scoreFresh(foundedYear: number | null, currentYear: number): number {
  if (foundedYear === null) {
    return 0;
  }
  return currentYear - foundedYear <= FRESH_MAX_AGE_YEARS
    ? ALIGNMENT_POINTS.fresh
    : 0;
}

/**
 * Best available URL: website, then LinkedIn, then empty.
 */
export function resolveCompanyUrl(
  company: Pick<CompanyRecord, "websiteUrl" | "linkedinUrl">,
): string {
  const website = company.websiteUrl?.trim();
  if (website) return website;
  const linkedin = company.linkedinUrl?.trim();
  if (linkedin) return linkedin;
  return "";
}

/**
 * Phase 1 + raw contributions: every subcomponent's raw value per company,
 * aligned with the input order.
 */
export function computeCompanyRawComponents(
  companies: readonly CompanyRecord[],
  now: Date,
): CompanyRawComponents {
  const currentYear = now.getUTCFullYear();

  const toBudgetPoints = (points: number) => (percentile: number) =>
    (percentile / 100) * points;

  const volatility = computeVolatilityComponents(companies, now);

  return {
    dev: companies.map(scoreDev),
    f2p: companies.map((company) =>
      company.freeToPlay ? ALIGNMENT_POINTS.freeToPlay : 0,
    ),
    mobile: companies.map((company) =>
      company.mobile ? ALIGNMENT_POINTS.mobile : 0,
    ),
    fresh: companies.map((company) =>
      scoreFresh(company.foundedYear, currentYear),
    ),
    revenue: percentileColumn(
      companies.map((company) => company.revenue30d ?? company.annualRevenue),
    ).map(toBudgetPoints(BUDGET_POINTS.revenue)),
    funding: percentileColumn(
      companies.map((company) => company.totalFundingAmount),
    ).map(toBudgetPoints(BUDGET_POINTS.funding)),
    headcount: percentileColumn(
      companies.map((company) => company.employeeCount),
    ).map(toBudgetPoints(BUDGET_POINTS.headcount)),
    status: companies.map((company) =>
      computeStatusScore(company.closeStatus, company.closeStatusChangedAt, now),
    ),
    volatility: companies.map((_, index) =>
      combineVolatility(
        volatility.revenueChange[index],
        volatility.runway[index],
        volatility.headcountChange[index],
      ),
    ),
    revenueChange: volatility.revenueChange,
    runway: volatility.runway,
    headcountChange: volatility.headcountChange,
    hiring: companies.map(() => HIRING_SIGNAL_POINTS),
  };
}

function sumColumns(...columns: number[][]): number[] {
  const [first, ...rest] = columns;
  return first.map((value, index) =>
    rest.reduce((total, column) => total + column[index], value),
  );
}

/**
 * Score a batch of companies.
 *
 * Output order matches input order; sorting is left to the caller.
 *
 * @param companies - Company records of one batch
 * @param config - Compiled scoring config (company pillar weights)
 * @param options - `now` pins the reference time for decay and freshness
 * @returns One scored company per input record
 */
export function scoreCompanies(
  companies: readonly CompanyRecord[],
  config: ScoringConfig,
  options: CompanyScoringOptions = {},
): ScoredCompany[] {
  if (companies.length === 0) {
    return [];
  }

  const now = options.now ?? new Date();
  logger.info("Scoring companies", { count: companies.length });

  const raw = computeCompanyRawComponents(companies, now);

  const alignment = normalizePillar(
    sumColumns(raw.dev, raw.f2p, raw.mobile, raw.fresh),
  );
  const budget = normalizePillar(
    sumColumns(raw.revenue, raw.funding, raw.headcount),
  );
  const demand = normalizePillar(
    sumColumns(raw.status, raw.volatility, raw.hiring),
  );

  const weights = config.companyWeights;
  const totalWeight = weights.Alignment + weights.Budget + weights.Demand;
  const companyScores = normalizePillar(
    companies.map(
      (_, index) =>
        (alignment[index] * weights.Alignment +
          budget[index] * weights.Budget +
          demand[index] * weights.Demand) /
        totalWeight,
    ),
  );

  const subcomponents = {
    dev: normalizeSubcomponent(raw.dev),
    f2p: normalizeSubcomponent(raw.f2p),
    mobile: normalizeSubcomponent(raw.mobile),
    fresh: normalizeSubcomponent(raw.fresh),
    revenue: normalizeSubcomponent(raw.revenue),
    funding: normalizeSubcomponent(raw.funding),
    headcount: normalizeSubcomponent(raw.headcount),
    status: normalizeSubcomponent(raw.status),
    volatility: normalizeSubcomponent(raw.volatility),
    revenueDelta: normalizeSubcomponent(raw.revenueChange),
    runwayDelta: normalizeSubcomponent(raw.runway),
    headcountDelta: normalizeSubcomponent(raw.headcountChange),
    hiring: normalizeSubcomponent(raw.hiring),
  };

  const updatedDate = now.toISOString().slice(0, 10);

  const scored = companies.map(
    (company, index): ScoredCompany => ({
      name: company.name,
      companyScore: companyScores[index],
      alignment: alignment[index],
      budget: budget[index],
      demand: demand[index],
      subcomponents: {
        dev: subcomponents.dev[index],
        f2p: subcomponents.f2p[index],
        mobile: subcomponents.mobile[index],
        fresh: subcomponents.fresh[index],
        revenue: subcomponents.revenue[index],
        funding: subcomponents.funding[index],
        headcount: subcomponents.headcount[index],
        status: subcomponents.status[index],
        volatility: subcomponents.volatility[index],
        revenueDelta: subcomponents.revenueDelta[index],
        runwayDelta: subcomponents.runwayDelta[index],
        headcountDelta: subcomponents.headcountDelta[index],
        hiring: subcomponents.hiring[index],
      },
      url: resolveCompanyUrl(company),
      normalizedName:
        company.normalizedName?.trim() || normalizeCompanyName(company.name),
      country: company.country ?? "",
      flag: company.flag ?? "",
      notes: company.notes ?? "",
      discoverSource: company.discoverSource ?? "",
      createdDate: company.createdDate ?? "",
      updatedDate,
    }),
  );

  logger.debug("Company scoring complete", {
    count: scored.length,
    range: minMax(companyScores),
  });

  return scored;
}
