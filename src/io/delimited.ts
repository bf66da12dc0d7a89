/**
 * Delimited text (CSV / TSV) reading and writing
 *
 * Thin wrappers over csv-parse and csv-stringify that speak the project's
 * table types. No file handling: callers pass text in and get text out.
 */

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { Delimiter, OutputTable, ParsedTable, TableRow } from "@/types";
import { RecordMappingError } from "@/ingestion/recordMappingError";

/**
 * Tab when the header line contains a tab, comma otherwise.
 */
export function detectDelimiter(text: string): Delimiter {
  const lineEnd = text.search(/\r?\n/);
  const headerLine = lineEnd === -1 ? text : text.slice(0, lineEnd);
  return headerLine.includes("\t") ? "\t" : ",";
}

function toStringCells(record: unknown, line: number): string[] {
  if (!Array.isArray(record)) {
    throw new RecordMappingError(`line ${line} is not a list of cells`);
  }
  return record.map((cell) => (typeof cell === "string" ? cell : String(cell)));
}

/**
 * Parse delimited text into a header row and header-keyed rows.
 *
 * Blank lines are skipped; short rows leave trailing columns absent, long
 * rows drop the extra cells.
 *
 * @param text - Full table text, header line first
 * @param delimiter - Cell separator; detected from the header line when omitted
 */
export function parseDelimited(text: string, delimiter?: Delimiter): ParsedTable {
  const records: unknown = parse(text, {
    delimiter: delimiter ?? detectDelimiter(text),
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  if (!Array.isArray(records) || records.length === 0) {
    return { headers: [], rows: [] };
  }

  const [headerRecord, ...dataRecords]: unknown[] = records;
  const headers = toStringCells(headerRecord, 1).map((header) => header.trim());

  const rows = dataRecords.map((record, index): TableRow => {
    const cells = toStringCells(record, index + 2);
    const row: TableRow = {};
    headers.forEach((header, column) => {
      row[header] = cells[column];
    });
    return row;
  });

  return { headers, rows };
}

/**
 * Serialize a table to delimited text with a trailing newline.
 */
export function stringifyDelimited(
  table: OutputTable,
  delimiter: Delimiter = ",",
): string {
  return stringify([table.header, ...table.rows], { delimiter });
}
