/**
 * Job-title scorer
 *
 * Derives the Seniority and Domain pillars from a job title using the
 * compiled keyword components of the scoring config.
 *
 * Rules:
 * - Seniority: best matching base score, plus every matching modifier
 *   ("Senior" +10, "Junior" -15, ...), clamped to [0, 100]
 * - Domain: the longest matching keyword decides, even when a shorter
 *   keyword carries a higher score ("Product Designer" is a designer)
 * - One-Offs: a matching one-off replaces both pillars; seniority
 *   modifiers still apply on top
 * - Warmth: reserved, always 0
 */

import type {
  ComponentRuntime,
  ContactRecord,
  ScoringConfig,
  TitleScores,
} from "@/types";
import {
  DEFAULT_WARMTH_SCORE,
  MAX_TITLE_SCORE,
  MIN_TITLE_SCORE,
} from "@/constants/contactScoring";
import { clamp } from "@/utils/math";
import * as logger from "@/logger";

type KeywordHit = {
  component: string;
  keyword: string;
  score: number;
};

/**
 * True when the title has anything but whitespace.
 */
export function hasJobTitle(title: string | null | undefined): title is string {
  return typeof title === "string" && title.trim().length > 0;
}

/**
 * Base scores of every base component whose keywords appear in the title.
 */
function matchBaseScores(
  title: string,
  components: readonly ComponentRuntime[],
): number[] {
  const lowered = title.toLowerCase();
  const scores: number[] = [];
  for (const component of components) {
    if (component.score.kind !== "base") continue;
    if (component.pattern.test(lowered)) {
      scores.push(component.score.score);
    }
  }
  return scores;
}

/**
 * Sum of every modifier component whose keywords appear in the title.
 */
function sumModifiers(
  title: string,
  components: readonly ComponentRuntime[],
): number {
  const lowered = title.toLowerCase();
  let total = 0;
  for (const component of components) {
    if (component.score.kind !== "modifier") continue;
    if (component.pattern.test(lowered)) {
      total += component.score.delta;
    }
  }
  return total;
}

/**
 * Apply seniority modifiers matched in the title to a base score.
 */
export function applySeniorityModifiers(
  title: string,
  baseScore: number,
  config: ScoringConfig,
): number {
  if (!hasJobTitle(title)) {
    return baseScore;
  }
  const delta = sumModifiers(title, config.people.Seniority.components);
  return clamp(baseScore + delta, MIN_TITLE_SCORE, MAX_TITLE_SCORE);
}

/**
 * Seniority pillar score (0-100) for a job title.
 *
 * @example
 * scoreSeniority("Senior Product Manager", config); // Manager 50 + Senior 10 = 60
 */
export function scoreSeniority(title: string, config: ScoringConfig): number {
  if (!hasJobTitle(title)) {
    return 0;
  }
  const matches = matchBaseScores(title, config.people.Seniority.components);
  const best = matches.length > 0 ? Math.max(...matches) : 0;
  return applySeniorityModifiers(title, best, config);
}

/**
 * Domain pillar score (0-100) for a job title.
 *
 * Every keyword of every base component is tried on its own; the longest
 * matching keyword decides. Equal lengths keep the first match in config
 * order.
 */
export function scoreDomain(title: string, config: ScoringConfig): number {
  if (!hasJobTitle(title)) {
    return 0;
  }

  const lowered = title.toLowerCase();
  const hits: KeywordHit[] = [];
  for (const component of config.people.Domain.components) {
    if (component.score.kind !== "base") continue;
    const score = component.score.score;
    component.keywords.forEach((keyword, index) => {
      if (component.keywordPatterns[index].test(lowered)) {
        hits.push({ component: component.name, keyword, score });
      }
    });
  }

  if (hits.length === 0) {
    return 0;
  }

  let longest = hits[0];
  let highest = hits[0];
  for (const hit of hits) {
    if (hit.keyword.length > longest.keyword.length) longest = hit;
    if (hit.score > highest.score) highest = hit;
  }

  if (highest.score > longest.score) {
    logger.warn("Longest domain keyword outranks a higher-scoring match", {
      title,
      used: { keyword: longest.keyword, score: longest.score },
      skipped: { keyword: highest.keyword, score: highest.score },
    });
  }

  return longest.score;
}

/**
 * One-off override for a job title: the best matching One-Offs score, or
 * null when none matches.
 */
export function checkOneOffs(title: string, config: ScoringConfig): number | null {
  if (!hasJobTitle(title)) {
    return null;
  }
  const matches = matchBaseScores(title, config.people["One-Offs"].components);
  return matches.length > 0 ? Math.max(...matches) : null;
}

/**
 * Warmth pillar score. No engagement source feeds it yet.
 */
export function scoreWarmth(_contact?: ContactRecord): number {
  return DEFAULT_WARMTH_SCORE;
}

/**
 * Seniority, Domain and Warmth for a job title, one-offs applied.
 */
export function scoreTitle(title: string, config: ScoringConfig): TitleScores {
  const oneOff = checkOneOffs(title, config);
  if (oneOff !== null) {
    return {
      seniority: applySeniorityModifiers(title, oneOff, config),
      domain: oneOff,
      warmth: DEFAULT_WARMTH_SCORE,
      oneOff: true,
    };
  }

  return {
    seniority: scoreSeniority(title, config),
    domain: scoreDomain(title, config),
    warmth: DEFAULT_WARMTH_SCORE,
    oneOff: false,
  };
}

/**
 * Weighted average of the three people pillars, using the config weights.
 */
export function computeContactScore(
  seniority: number,
  domain: number,
  warmth: number,
  config: ScoringConfig,
): number {
  const weights = config.contactWeights;
  const totalWeight = weights.seniority + weights.domain + weights.warmth;
  return (
    (seniority * weights.seniority +
      domain * weights.domain +
      warmth * weights.warmth) /
    totalWeight
  );
}
