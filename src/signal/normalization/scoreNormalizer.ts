/**
 * Min-max score normalization
 *
 * Two rules live here and stay separate:
 * - normalizeScores: contact and lead scores, bounds optionally taken from
 *   a baseline; a degenerate range leaves the scores untouched and results
 *   are not clamped
 * - normalizePillar / normalizeSubcomponent: company pillars and their
 *   reported subcomponents; a degenerate column maps to 50
 */

import {
  DEGENERATE_PILLAR_SCORE,
  NORMALIZED_MAX,
  NORMALIZED_MIN,
  PILLAR_DECIMAL_PLACES,
} from "@/constants/normalization";
import { minMax, roundTo } from "@/utils/math";

/**
 * Spread scores across 0-100 using the given bounds, or the batch's own
 * min/max for any bound not given.
 *
 * Values outside externally supplied bounds map outside 0-100; they are
 * not clamped.
 *
 * @example
 * normalizeScores([10, 20, 30, 40, 50]); // [0, 25, 50, 75, 100]
 * normalizeScores([42]); // [42]
 */
export function normalizeScores(
  values: readonly number[],
  min?: number,
  max?: number,
): number[] {
  const range = minMax(values);
  if (range === null) {
    return [];
  }

  const lower = min ?? range.min;
  const upper = max ?? range.max;
  if (upper === lower) {
    return [...values];
  }

  return values.map(
    (value) => ((value - lower) / (upper - lower)) * NORMALIZED_MAX,
  );
}

function spreadToScale(values: readonly number[], min: number, max: number): number[] {
  return values.map((value) =>
    roundTo(((value - min) / (max - min)) * NORMALIZED_MAX, PILLAR_DECIMAL_PLACES),
  );
}

/**
 * Normalize a company pillar column to 0-100 with one decimal.
 * A column whose values are all equal maps to 50 everywhere.
 */
export function normalizePillar(values: readonly number[]): number[] {
  const range = minMax(values);
  if (range === null) {
    return [];
  }
  if (range.max === range.min) {
    return values.map(() => DEGENERATE_PILLAR_SCORE);
  }
  return spreadToScale(values, range.min, range.max);
}

/**
 * Normalize a reported subcomponent column to 0-100 with one decimal.
 *
 * Same as normalizePillar, except that an all-zero column (the signal is
 * absent from the batch) stays at 0.
 */
export function normalizeSubcomponent(values: readonly number[]): number[] {
  if (values.every((value) => value === 0)) {
    return values.map(() => NORMALIZED_MIN);
  }
  return normalizePillar(values);
}
