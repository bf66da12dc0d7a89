/**
 * Company table row → CompanyRecord mapper
 *
 * Pure functions. Cells are looked up by header; a missing optional column
 * reads as empty for every row, and unparseable values become null.
 */

import type { CompanyRecord, TableRow } from "@/types";
import { COMPANY_INPUT_COLUMNS } from "@/constants/tables";
import {
  parseDateCell,
  parseFlagCell,
  parseNumericCell,
  parseOptionalTextCell,
  parseTextCell,
} from "@/utils/cellParsing";
import * as logger from "@/logger";
import { RecordMappingError } from "./recordMappingError";

const COLUMNS = COMPANY_INPUT_COLUMNS;

/**
 * Map one company table row to a CompanyRecord.
 */
export function mapCompanyRow(row: TableRow): CompanyRecord {
  return {
    name: parseTextCell(row[COLUMNS.name]),
    revenue30d: parseNumericCell(row[COLUMNS.revenue30d]),
    annualRevenue: parseNumericCell(row[COLUMNS.annualRevenue]),
    totalFundingAmount: parseNumericCell(row[COLUMNS.totalFundingAmount]),
    latestFundingAmount: parseNumericCell(row[COLUMNS.latestFundingAmount]),
    latestFundingDate: parseDateCell(row[COLUMNS.latestFundingDate]),
    employeeCount: parseNumericCell(row[COLUMNS.employeeCount]),
    employeeChangePct: parseNumericCell(row[COLUMNS.employeeChangePct]),
    revenueChangePct: parseNumericCell(row[COLUMNS.revenueChangePct]),
    closeStatus: parseOptionalTextCell(row[COLUMNS.closeStatus]),
    closeStatusChangedAt: parseDateCell(row[COLUMNS.closeStatusChangedAt]),
    makesGames: parseFlagCell(row[COLUMNS.makesGames]),
    freeToPlay: parseFlagCell(row[COLUMNS.freeToPlay]),
    mobile: parseFlagCell(row[COLUMNS.mobile]),
    foundedYear: parseNumericCell(row[COLUMNS.foundedYear]),
    type: parseOptionalTextCell(row[COLUMNS.type]),
    websiteUrl: parseOptionalTextCell(row[COLUMNS.websiteUrl]),
    linkedinUrl: parseOptionalTextCell(row[COLUMNS.linkedinUrl]),
    country: parseOptionalTextCell(row[COLUMNS.country]),
    flag: parseOptionalTextCell(row[COLUMNS.flag]),
    notes: parseOptionalTextCell(row[COLUMNS.notes]),
    discoverSource: parseOptionalTextCell(row[COLUMNS.discoverSource]),
    createdDate: parseOptionalTextCell(row[COLUMNS.createdDate]),
    normalizedName: parseOptionalTextCell(row[COLUMNS.normalizedName]),
  };
}

/**
 * Map a whole company table.
 *
 * @param headers - Header row of the table
 * @param rows - Data rows keyed by header
 * @throws {RecordMappingError} If the table has no Company Name column
 */
export function mapCompanyRows(
  headers: readonly string[],
  rows: readonly TableRow[],
): CompanyRecord[] {
  if (!headers.includes(COLUMNS.name)) {
    throw new RecordMappingError(
      `company table is missing the "${COLUMNS.name}" column`,
    );
  }

  const missing = Object.values(COLUMNS).filter(
    (header) => !headers.includes(header),
  );
  if (missing.length > 0) {
    logger.warn("Company table is missing optional columns", { missing });
  }

  return rows.map(mapCompanyRow);
}
