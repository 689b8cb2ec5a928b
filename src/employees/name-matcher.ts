/**
 * Name Matcher
 *
 * Pure, stateless scoring of a free-text query against employee display
 * names. The base score blends an edit similarity with a sequence ratio;
 * optional name-variant strategies (reversed order, first/last token split)
 * add alternative scores and the best one wins.
 */

import { ConfigError } from '../errors.js';
import { sequenceRatio } from './similarity.js';
import type { EditSimilarity, MatchCandidate, NameMatcherOptions, NameVariant } from './types.js';

type Scorer = (a: string, b: string) => number;

/**
 * Extra scores for a (normalized query, normalized candidate) pair
 */
type VariantStrategy = (query: string, candidate: string, score: Scorer) => number[];

function splitFirstRest(name: string): { first: string; rest: string } {
  const [first = '', ...rest] = name.split(' ');
  return { first, rest: rest.join(' ') };
}

const VARIANT_STRATEGIES: Record<NameVariant, VariantStrategy> = {
  // "Last First" queries against "First Last" names
  reversed: (query, candidate, score) => {
    const { first, rest } = splitFirstRest(candidate);
    if (!rest) return [];
    return [score(query, `${rest} ${first}`)];
  },

  'token-split': (query, candidate, score) => {
    const q = splitFirstRest(query);
    if (!q.rest) return [];
    const c = splitFirstRest(candidate);
    return [(score(q.first, c.first) + score(q.rest, c.rest)) / 2];
  },
};

/** Tolerance when checking that the score weights sum to 1 */
export const WEIGHT_SUM_EPSILON = 1e-9;

const DEFAULT_OPTIONS: Omit<NameMatcherOptions, 'editSimilarity'> = {
  editWeight: 0.6,
  sequenceWeight: 0.4,
  threshold: 0.6,
  variants: ['reversed', 'token-split'],
};

export class NameMatcher {
  private options: NameMatcherOptions;

  constructor(editSimilarity: EditSimilarity, options: Partial<Omit<NameMatcherOptions, 'editSimilarity'>> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options, editSimilarity };

    // Scores stay in [0, 1] only when the blend is a convex combination
    const { editWeight, sequenceWeight } = this.options;
    if (editWeight < 0 || sequenceWeight < 0 || Math.abs(editWeight + sequenceWeight - 1) > WEIGHT_SUM_EPSILON) {
      throw new ConfigError(`Name match weights must be non-negative and sum to 1, got ${editWeight} + ${sequenceWeight}`);
    }
  }

  /**
   * Lower-case, drop punctuation, collapse whitespace
   */
  static normalize(name: string | null | undefined): string {
    return (name ?? '')
      .toLowerCase()
      .replace(/[^\p{L}\p{N}_\s]/gu, '')
      .replace(/\s+/g, ' ')
      .trim();
  }

  get editSimilarityKind(): EditSimilarity['kind'] {
    return this.options.editSimilarity.kind;
  }

  /**
   * Weighted blend of edit similarity and sequence ratio. Symmetric.
   */
  baseSimilarity(a: string, b: string): number {
    const left = NameMatcher.normalize(a);
    const right = NameMatcher.normalize(b);
    const [first, second] = left <= right ? [left, right] : [right, left];

    const edit = this.options.editSimilarity.similarity(first, second);
    const sequence = sequenceRatio(first, second);
    return this.options.editWeight * edit + this.options.sequenceWeight * sequence;
  }

  /**
   * Best score across the base blend and every enabled name variant
   */
  similarity(query: string, candidateName: string): number {
    const score: Scorer = (a, b) => this.baseSimilarity(a, b);
    const normalizedQuery = NameMatcher.normalize(query);
    const normalizedCandidate = NameMatcher.normalize(candidateName);

    const scores = [score(normalizedQuery, normalizedCandidate)];
    for (const variant of this.options.variants) {
      scores.push(...VARIANT_STRATEGIES[variant](normalizedQuery, normalizedCandidate, score));
    }
    return Math.max(...scores);
  }

  /**
   * Candidates scoring at least `threshold`, best first. Ties keep input order.
   */
  rankMatches<T extends { name: string }>(
    query: string,
    candidates: readonly T[],
    threshold: number = this.options.threshold
  ): MatchCandidate<T>[] {
    const matches: MatchCandidate<T>[] = [];

    for (const candidate of candidates) {
      const score = this.similarity(query, candidate.name.trim());
      if (score >= threshold) {
        matches.push({ employee: candidate, score, matchType: 'fuzzy' });
      }
    }

    return matches.sort((a, b) => b.score - a.score);
  }
}
