/**
 * Tabular row types
 *
 * Rows exchanged with spreadsheets and delimited files are keyed by column
 * header. Cells arrive as strings (or are absent when the column is).
 */

export type TableRow = Record<string, string | undefined>;

/**
 * Output cell value: numbers are written as-is, empty cells as "".
 */
export type TableCell = string | number;

export type TableColumn = {
  /** Stable identifier used in code */
  id: string;
  /** Column header as written to the table */
  header: string;
};

export type Delimiter = "," | "\t";

/**
 * Delimited table read into header-keyed rows.
 */
export type ParsedTable = {
  headers: string[];
  rows: TableRow[];
};

/**
 * Table ready to serialize: header cells and data rows in column order.
 */
export type OutputTable = {
  header: string[];
  rows: TableCell[][];
};
