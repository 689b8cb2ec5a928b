/**
 * String similarity measures used by the name matcher.
 *
 * Two edit-similarity strategies exist: a precise one backed by
 * fastest-levenshtein, and a ratio-only fallback. The strategy is picked once
 * at startup and injected into the NameMatcher.
 */

import type { Logger } from '../logger.js';
import type { EditSimilarity, EditSimilarityKind } from './types.js';

/**
 * Length of the longest common block of a[alo:ahi] and b[blo:bhi].
 * Ties resolve to the earliest block in `a`, then in `b`.
 */
function findLongestMatch(
  a: string[],
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): { i: number; j: number; size: number } {
  let best = { i: alo, j: blo, size: 0 };
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { i: i - k + 1, j: j - k + 1, size: k };
      }
    }
    j2len = next;
  }

  return best;
}

/**
 * Ratcliff/Obershelp ratio: 2 * matched / total length, over matching blocks
 * found by recursive longest-common-block search. Two empty strings score 1.
 */
export function sequenceRatio(left: string, right: string): number {
  const a = Array.from(left);
  const b = Array.from(right);
  const total = a.length + b.length;
  if (total === 0) return 1;

  const b2j = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const positions = b2j.get(ch);
    if (positions) {
      positions.push(j);
    } else {
      b2j.set(ch, [j]);
    }
  });

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const { i, j, size } = findLongestMatch(a, b2j, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) {
      queue.push([alo, i, blo, j]);
    }
    if (i + size < ahi && j + size < bhi) {
      queue.push([i + size, ahi, j + size, bhi]);
    }
  }

  return (2 * matched) / total;
}

const SURROGATE = /[\uD800-\uDFFF]/;
const PRIVATE_USE_START = 0xe000;

/**
 * Rewrite a pair of strings so that every code point is one UTF-16 unit.
 * Astral code points map to private-use characters, which normalized names
 * never contain.
 */
function toSingleUnits(a: string, b: string): [string, string] {
  if (!SURROGATE.test(a) && !SURROGATE.test(b)) {
    return [a, b];
  }

  const substitutes = new Map<string, string>();
  const rewrite = (text: string) =>
    Array.from(text, (ch) => {
      if (ch.length === 1) return ch;
      let substitute = substitutes.get(ch);
      if (!substitute) {
        substitute = String.fromCharCode(PRIVATE_USE_START + substitutes.size);
        substitutes.set(ch, substitute);
      }
      return substitute;
    }).join('');

  return [rewrite(a), rewrite(b)];
}

/**
 * 1 - distance / longer length, both counted in code points
 */
export function createLevenshteinSimilarity(distance: (a: string, b: string) => number): EditSimilarity {
  return {
    kind: 'levenshtein',
    similarity(a, b) {
      const [left, right] = toSingleUnits(a, b);
      return 1 - distance(left, right) / Math.max(left.length, right.length, 1);
    },
  };
}

export const sequenceRatioSimilarity: EditSimilarity = {
  kind: 'sequence-ratio',
  similarity: sequenceRatio,
};

/**
 * Pick the edit-similarity strategy at startup. Falls back to the ratio-only
 * strategy when fastest-levenshtein cannot be loaded.
 */
export async function detectEditSimilarity(
  preferred: EditSimilarityKind,
  logger?: Logger
): Promise<EditSimilarity> {
  if (preferred === 'sequence-ratio') {
    return sequenceRatioSimilarity;
  }

  try {
    const { distance } = await import('fastest-levenshtein');
    logger?.info('Levenshtein distance available - precise name matching enabled');
    return createLevenshteinSimilarity(distance);
  } catch (error) {
    logger?.warn('fastest-levenshtein could not be loaded, using sequence-ratio name matching', error);
    return sequenceRatioSimilarity;
  }
}
