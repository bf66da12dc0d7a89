/**
 * Table cell parsing utilities
 *
 * Pure functions that turn raw cell values into typed record fields.
 * Value-level problems never throw: an unusable cell becomes "missing"
 * (null) and the scorers treat it as contributing nothing.
 */

import {
  FLAG_SET_VALUE,
  NUMERIC_CELL_NOISE_PATTERN,
} from "@/constants/tables";

/**
 * Parse a numeric cell.
 *
 * Accepts numbers and numeric strings, ignoring currency symbols,
 * thousands separators and percent signs ("$1,200" → 1200, "-12%" → -12).
 *
 * @returns Parsed number, or null for empty/unparseable/non-finite input
 */
export function parseNumericCell(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }

  const cleaned = value.replace(NUMERIC_CELL_NOISE_PATTERN, "").trim();
  if (cleaned === "") {
    return null;
  }

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const DATE_TIME_WITHOUT_ZONE_PATTERN =
  /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

const DATE_TIME_WITH_ZONE_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

/** M/D/YYYY with an optional H:MM or H:MM:SS time */
const US_DATE_PATTERN =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * UTC date for a M/D/YYYY cell, or null when a field is out of range
 * ("2/30/2024").
 */
function parseUsDate(match: RegExpExecArray): Date | null {
  const [month, day, year, hours, minutes, seconds] = match
    .slice(1)
    .map((part) => (part === undefined ? 0 : Number(part)));

  const parsed = new Date(
    Date.UTC(year, month - 1, day, hours, minutes, seconds),
  );
  const inRange =
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day &&
    parsed.getUTCHours() === hours &&
    parsed.getUTCMinutes() === minutes &&
    parsed.getUTCSeconds() === seconds;
  return inRange ? parsed : null;
}

function validDate(text: string): Date | null {
  const parsed = new Date(text);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Parse a date cell.
 *
 * Accepted forms: ISO dates and date-times, and M/D/YYYY with an optional
 * time. Anything without a zone designator is read as UTC, so results do
 * not depend on the host time zone.
 *
 * @returns Date, or null for empty/unparseable input
 */
export function parseDateCell(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== "string") {
    return null;
  }

  const text = value.trim();
  if (ISO_DATE_PATTERN.test(text) || DATE_TIME_WITH_ZONE_PATTERN.test(text)) {
    return validDate(text);
  }
  if (DATE_TIME_WITHOUT_ZONE_PATTERN.test(text)) {
    return validDate(`${text.replace(" ", "T")}Z`);
  }

  const usDate = US_DATE_PATTERN.exec(text);
  return usDate ? parseUsDate(usDate) : null;
}

/**
 * Parse a binary flag cell. Only "X" (any case, surrounding whitespace
 * ignored) counts as set.
 */
export function parseFlagCell(value: unknown): boolean {
  return (
    typeof value === "string" && value.trim().toUpperCase() === FLAG_SET_VALUE
  );
}

/**
 * Parse a free-text cell: trimmed string, "" when absent.
 */
export function parseTextCell(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Parse an optional free-text cell: trimmed string, null when absent or
 * blank.
 */
export function parseOptionalTextCell(value: unknown): string | null {
  const text = parseTextCell(value);
  return text === "" ? null : text;
}
