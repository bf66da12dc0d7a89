/**
 * Sales-funnel status score with time decay
 *
 * A status earns its table points at the moment it was set, halving every
 * half-life afterwards. Unknown statuses earn nothing; a status without a
 * usable change date keeps its full points.
 */

import type { StatusDecayRule } from "@/constants/companyScoring";
import { STATUS_DECAY_TABLE } from "@/constants/companyScoring";
import { daysElapsed, halfLifeDecay } from "@/utils/math";

/**
 * First status rule whose key appears in the lower-cased, trimmed status.
 */
export function findStatusRule(
  status: string | null | undefined,
): StatusDecayRule | null {
  if (!status) return null;
  const normalized = status.toLowerCase().trim();
  if (!normalized) return null;
  return STATUS_DECAY_TABLE.find((rule) => normalized.includes(rule.match)) ?? null;
}

/**
 * Status points, decayed by the time since the status last changed.
 *
 * @param status - Free-text funnel status ("5 - Customer", "Qualified", ...)
 * @param changedAt - When the status was set; null or invalid skips decay
 * @param now - Reference time
 *
 * @example
 * // "Qualified" (5 points, 90-day half-life) set 90 days ago
 * computeStatusScore("Qualified", ninetyDaysAgo, now); // 2.5
 */
export function computeStatusScore(
  status: string | null | undefined,
  changedAt: Date | null,
  now: Date,
): number {
  const rule = findStatusRule(status);
  if (rule === null) {
    return 0;
  }
  if (changedAt === null || Number.isNaN(changedAt.getTime())) {
    return rule.points;
  }

  const ageDays = daysElapsed(changedAt, now);
  return rule.points * halfLifeDecay(ageDays, rule.halfLifeDays);
}
