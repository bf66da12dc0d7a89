/**
 * ScoredCompany → output row mapper (pure function)
 *
 * Cell order follows SCORED_COMPANY_COLUMNS. Scores are written as computed
 * (pillars and subcomponents already carry one decimal).
 */

import type { OutputTable, ScoredCompany, TableCell } from "@/types";
import { SCORED_COMPANY_COLUMNS } from "@/constants/tables";

export function mapScoredCompanyToRow(company: ScoredCompany): TableCell[] {
  const sub = company.subcomponents;
  return [
    company.name,
    company.companyScore,
    company.alignment,
    company.budget,
    company.demand,
    sub.dev,
    sub.f2p,
    sub.mobile,
    sub.fresh,
    sub.revenue,
    sub.funding,
    sub.headcount,
    sub.status,
    sub.volatility,
    sub.revenueDelta,
    sub.runwayDelta,
    sub.headcountDelta,
    sub.hiring,
    company.url,
    company.country,
    company.flag,
    company.notes,
    company.discoverSource,
    company.createdDate,
    company.updatedDate,
    company.normalizedName,
  ];
}

/**
 * Scored company table, sorted by descending Company Score (stable).
 */
export function buildScoredCompanyTable(
  companies: readonly ScoredCompany[],
): OutputTable {
  const sorted = [...companies].sort((a, b) => b.companyScore - a.companyScore);
  return {
    header: SCORED_COMPANY_COLUMNS.map((column) => column.header),
    rows: sorted.map(mapScoredCompanyToRow),
  };
}
