import type { CatalogRecord, ScoredResult } from './types';
import { InputError } from './errors';

export const DEFAULT_TOP_K = 10;

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InputError('INVALID_TOP_K', `top_k must be a positive integer, got ${topK}`, { topK });
  }
}

/**
 * Score descending, catalog order on ties, cut to `topK`. Returns a new array; fewer
 * than `topK` candidates are all returned.
 */
export function rank(results: readonly ScoredResult[], topK = DEFAULT_TOP_K): ScoredResult[] {
  assertTopK(topK);
  return [...results]
    .sort((a, b) => b.score - a.score || a.record.id - b.record.id)
    .slice(0, topK);
}

/** Rating descending with unknown ratings last, catalog order on ties. */
export function rankByRating(records: readonly CatalogRecord[], topK = DEFAULT_TOP_K): CatalogRecord[] {
  assertTopK(topK);
  return [...records]
    .sort((a, b) => {
      if (a.rating === undefined || b.rating === undefined) {
        if (a.rating !== b.rating) return a.rating === undefined ? 1 : -1;
      } else if (a.rating !== b.rating) {
        return b.rating - a.rating;
      }
      return a.id - b.id;
    })
    .slice(0, topK);
}
