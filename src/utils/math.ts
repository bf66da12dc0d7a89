/**
 * Numeric helpers shared by the scorers
 */

import { MS_PER_DAY } from "@/constants/companyScoring";

/**
 * Percentile rank of `score` within `values` (0-100).
 *
 * Uses the rank-average definition: values equal to `score` share the mean
 * of their ranks, so the smallest of four distinct values ranks 25 and the
 * largest 100.
 *
 * @param values - Population (missing values already excluded)
 * @param score - Value to rank
 * @returns Percentile in [0, 100], or 0 for an empty population
 */
export function percentileRank(values: readonly number[], score: number): number {
  const n = values.length;
  if (n === 0) {
    return 0;
  }

  let left = 0;
  let right = 0;
  for (const value of values) {
    if (value < score) left += 1;
    if (value <= score) right += 1;
  }

  const plusOne = right > left ? 1 : 0;
  return (left + right + plusOne) * (50 / n);
}

/**
 * Round to a fixed number of decimal places.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Whole days elapsed from `from` to `to` (floored, never negative).
 */
export function daysElapsed(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY));
}

/**
 * Exponential half-life decay factor: 1 at age 0, 0.5 at one half-life.
 */
export function halfLifeDecay(ageDays: number, halfLifeDays: number): number {
  return 0.5 ** (ageDays / halfLifeDays);
}

/**
 * Min and max of a non-empty list, or null when empty.
 */
export function minMax(
  values: readonly number[],
): { min: number; max: number } | null {
  if (values.length === 0) {
    return null;
  }
  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}

/**
 * Percentile rank of every entry of a column within its own non-missing
 * values. Missing entries score 0.
 *
 * @param invert - Rank from the top (100 − percentile), so lower values score higher
 */
export function percentileColumn(
  column: readonly (number | null)[],
  invert = false,
): number[] {
  const population = column.filter((value): value is number => value !== null);
  return column.map((value) => {
    if (value === null) {
      return 0;
    }
    const percentile = percentileRank(population, value);
    return invert ? 100 - percentile : percentile;
  });
}
