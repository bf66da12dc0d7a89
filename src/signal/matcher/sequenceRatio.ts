/**
 * Sequence similarity ratio (Ratcliff/Obershelp)
 *
 * Recursively finds the longest common block, then matches what lies on
 * either side of it. The ratio is 2·M / T, where M is the number of matched
 * elements and T the combined length of both sequences.
 *
 * For second sequences of AUTOJUNK_MIN_LENGTH elements or more, elements
 * occurring in more than 1% of positions (plus one) are "popular": they
 * cannot seed a block, though a block may still extend over them.
 */

import { AUTOJUNK_MIN_LENGTH } from "@/constants/matching";

type Block = {
  /** Start in the first sequence */
  i: number;
  /** Start in the second sequence */
  j: number;
  size: number;
};

/**
 * Position index of every element of `b`, minus popular elements.
 */
function indexSecondSequence(b: readonly string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  b.forEach((element, index) => {
    const list = positions.get(element);
    if (list) {
      list.push(index);
    } else {
      positions.set(element, [index]);
    }
  });

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const popularThreshold = Math.floor(b.length / 100) + 1;
    for (const [element, list] of positions) {
      if (list.length > popularThreshold) {
        positions.delete(element);
      }
    }
  }

  return positions;
}

/**
 * Longest matching block of a[aLo:aHi] and b[bLo:bHi]. Ties go to the block
 * starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: readonly string[],
  b: readonly string[],
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): Block {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;

  // runLengths.get(j): length of the match ending at a[i - 1] and b[j]
  let runLengths = new Map<number, number>();
  for (let i = aLo; i < aHi; i++) {
    const nextRunLengths = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);
      if (size > bestSize) {
        bestI = i - size + 1;
        bestJ = j - size + 1;
        bestSize = size;
      }
    }
    runLengths = nextRunLengths;
  }

  // Popular elements were left out of the index; grow over them here
  while (bestI > aLo && bestJ > bLo && a[bestI - 1] === b[bestJ - 1]) {
    bestI -= 1;
    bestJ -= 1;
    bestSize += 1;
  }
  while (
    bestI + bestSize < aHi &&
    bestJ + bestSize < bHi &&
    a[bestI + bestSize] === b[bestJ + bestSize]
  ) {
    bestSize += 1;
  }

  return { i: bestI, j: bestJ, size: bestSize };
}

/**
 * Total number of elements in all matching blocks.
 */
export function countMatchingElements(
  a: readonly string[],
  b: readonly string[],
): number {
  const positions = indexSecondSequence(b);
  const pending: Array<[number, number, number, number]> = [
    [0, a.length, 0, b.length],
  ];

  let matched = 0;
  let range = pending.pop();
  while (range) {
    const [aLo, aHi, bLo, bHi] = range;
    const block = findLongestMatch(a, b, positions, aLo, aHi, bLo, bHi);
    if (block.size > 0) {
      matched += block.size;
      if (aLo < block.i && bLo < block.j) {
        pending.push([aLo, block.i, bLo, block.j]);
      }
      if (block.i + block.size < aHi && block.j + block.size < bHi) {
        pending.push([block.i + block.size, aHi, block.j + block.size, bHi]);
      }
    }
    range = pending.pop();
  }

  return matched;
}

/**
 * Length of a string in code points, the unit sequenceRatio compares.
 */
export function codePointLength(value: string): number {
  return [...value].length;
}

/**
 * Similarity of two strings in [0, 1], compared code point by code point.
 * Two empty strings are identical (1).
 *
 * @example
 * sequenceRatio("abcd", "bcde"); // 0.75
 */
export function sequenceRatio(a: string, b: string): number {
  const first = [...a];
  const second = [...b];
  const total = first.length + second.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingElements(first, second)) / total;
}
