import { DiceCoefficient } from 'natural';
import type { CatalogRecord, ScoredResult, SparseVector } from './types';
import type { RecommenderContext } from './context';
import { titleKey } from './context';
import { InputError } from './errors';
import { buildText } from './features';
import { normalize } from './normalize';
import { assertTopK, rank, rankByRating } from './ranker';
import { sharedColumns } from './similarity';

export type RoutedQuery =
  | { mode: 'title'; record: CatalogRecord }
  | { mode: 'year'; year: number }
  | { mode: 'text'; text: string };

export type Routed =
  | { mode: 'title'; matched: CatalogRecord; results: ScoredResult[] }
  | { mode: 'year'; year: number; results: CatalogRecord[] }
  | { mode: 'text'; text: string; results: ScoredResult[]; didYouMean: string[] };

const INTEGER = /^[+-]?\d+$/;

// bigram overlap a near-miss title needs to be suggested
export const TITLE_CUTOFF = 0.6;
const MAX_SUGGESTIONS = 3;

/**
 * Exact title (case-insensitive) first, then an integer year, otherwise the query is
 * free text. A genre name that is not also a title is free text too.
 */
export function classifyQuery(query: string, ctx: RecommenderContext): RoutedQuery {
  const q = (query || '').trim();
  if (!q) throw new InputError('EMPTY_QUERY', 'Query must be non-empty.');

  const id = ctx.titles.get(titleKey(q));
  const record = id === undefined ? undefined : ctx.catalog[id];
  if (record) return { mode: 'title', record };

  if (INTEGER.test(q)) return { mode: 'year', year: Number(q) };

  return { mode: 'text', text: q };
}

function explainShared(ctx: RecommenderContext, query: SparseVector, id: number): string[] {
  const doc = ctx.index.vectorOf(id);
  if (!doc) return [];
  return sharedColumns(query, doc, 3)
    .map(idx => ctx.model.vocabulary.termAt(idx))
    .filter((t): t is string => t !== undefined);
}

// every record scoring 0 means the query shares no weighted term with the catalog
function scoreAndRank(ctx: RecommenderContext, query: SparseVector, topK: number, exclude?: number): ScoredResult[] {
  const hits = ctx.index.score(query, { exclude });
  if (!hits.some(h => h.score > 0)) return [];

  const candidates: ScoredResult[] = [];
  for (const h of hits) {
    const record = ctx.catalog[h.id];
    if (record) candidates.push({ record, score: h.score });
  }
  return rank(candidates, topK).map(r => ({ ...r, sharedTerms: explainShared(ctx, query, r.record.id) }));
}

export function route(query: string, ctx: RecommenderContext, topK: number): Routed {
  assertTopK(topK);
  const routed = classifyQuery(query, ctx);

  switch (routed.mode) {
    case 'title': {
      const { record } = routed;
      const qv = ctx.model.vectorize(normalize(buildText(record), ctx.stopwords));
      return { mode: 'title', matched: record, results: scoreAndRank(ctx, qv, topK, record.id) };
    }
    case 'year': {
      const sameYear = ctx.catalog.filter(r => r.year === routed.year);
      return { mode: 'year', year: routed.year, results: sameYear.length ? rankByRating(sameYear, topK) : [] };
    }
    case 'text': {
      const qv = ctx.model.vectorize(normalize(routed.text, ctx.stopwords));
      return { mode: 'text', text: routed.text, results: scoreAndRank(ctx, qv, topK), didYouMean: suggestTitles(ctx, routed.text) };
    }
  }
}

/**
 * Catalog titles close to `query` by Dice coefficient over letter pairs, best first,
 * catalog order on ties. Each distinct title is listed once.
 */
export function suggestTitles(ctx: RecommenderContext, query: string, cutoff = TITLE_CUTOFF, n = MAX_SUGGESTIONS): string[] {
  const q = titleKey(query);
  if (!q) return [];
  const close: Array<{ title: string; id: number; s: number }> = [];
  for (const [key, id] of ctx.titles) {
    const s = DiceCoefficient(q, key);
    const record = ctx.catalog[id];
    if (record && s >= cutoff) close.push({ title: record.title, id, s });
  }
  close.sort((a, b) => b.s - a.s || a.id - b.id);
  return close.slice(0, n).map(c => c.title);
}

/** Records whose genre contains `genre` (case-insensitive), by rating like year mode. */
export function filterByGenre(ctx: RecommenderContext, genre: string, topK: number): CatalogRecord[] {
  assertTopK(topK);
  const g = (genre || '').trim().toLowerCase();
  if (!g) throw new InputError('EMPTY_QUERY', 'Genre must be non-empty.');
  return rankByRating(ctx.catalog.filter(r => r.genre.toLowerCase().includes(g)), topK);
}
