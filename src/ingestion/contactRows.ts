/**
 * Contact table row → ContactRecord mapper
 */

import type { ContactRecord, TableRow } from "@/types";
import {
  CONTACT_INPUT_COLUMNS,
  LEGACY_CONTACT_COMPANY_COLUMN,
} from "@/constants/tables";
import { parseTextCell } from "@/utils/cellParsing";
import { RecordMappingError } from "./recordMappingError";

const COLUMNS = CONTACT_INPUT_COLUMNS;

/**
 * Map one contact table row to a ContactRecord.
 *
 * The company falls back to the legacy "Company" column when "Company
 * Name" is blank.
 */
export function mapContactRow(row: TableRow): ContactRecord {
  const companyName =
    parseTextCell(row[COLUMNS.companyName]) ||
    parseTextCell(row[LEGACY_CONTACT_COMPANY_COLUMN]);

  return {
    firstName: parseTextCell(row[COLUMNS.firstName]),
    lastName: parseTextCell(row[COLUMNS.lastName]),
    jobTitle: parseTextCell(row[COLUMNS.jobTitle]),
    companyName,
    normalizedCompany: parseTextCell(row[COLUMNS.normalizedCompany]),
    source: parseTextCell(row[COLUMNS.source]),
    dateCreated: parseTextCell(row[COLUMNS.dateCreated]),
    dateUpdated: parseTextCell(row[COLUMNS.dateUpdated]),
    extraData: parseTextCell(row[COLUMNS.extraData]),
  };
}

/**
 * Map a whole contact table.
 *
 * @param headers - Header row of the table
 * @param rows - Data rows keyed by header
 * @throws {RecordMappingError} If First Name, Last Name or a company column
 *   (Company Name or the legacy Company) is missing
 */
export function mapContactRows(
  headers: readonly string[],
  rows: readonly TableRow[],
): ContactRecord[] {
  for (const required of [COLUMNS.firstName, COLUMNS.lastName]) {
    if (!headers.includes(required)) {
      throw new RecordMappingError(
        `contact table is missing the "${required}" column`,
      );
    }
  }
  if (
    !headers.includes(COLUMNS.companyName) &&
    !headers.includes(LEGACY_CONTACT_COMPANY_COLUMN)
  ) {
    throw new RecordMappingError(
      `contact table has neither "${COLUMNS.companyName}" nor "${LEGACY_CONTACT_COMPANY_COLUMN}"`,
    );
  }

  return rows.map(mapContactRow);
}
