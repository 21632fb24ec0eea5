import type { CatalogRecord, Recommendation, RecommendationItem, ScoredResult } from './types';
import type { RecommenderContext } from './context';
import logger from './logging';
import { DEFAULT_TOP_K } from './ranker';
import { filterByGenre, route } from './router';
import type { Routed } from './router';

export const NO_SIMILAR_ITEMS = 'no similar items found';

function toItem(record: CatalogRecord, scored?: ScoredResult): RecommendationItem {
  const item: RecommendationItem = {
    id: record.id,
    title: record.title,
    year: record.year,
    genre: record.genre,
    rating: record.rating,
  };
  if (scored) {
    item.score = scored.score;
    item.sharedTerms = scored.sharedTerms;
  }
  return item;
}

function present(routed: Routed, query: string): Recommendation {
  switch (routed.mode) {
    case 'title': {
      const results = routed.results.map(r => toItem(r.record, r));
      return {
        mode: 'title',
        query,
        matchedTitle: routed.matched.title,
        results,
        ...(results.length ? {} : { warning: NO_SIMILAR_ITEMS }),
      };
    }
    case 'year': {
      const results = routed.results.map(r => toItem(r));
      return {
        mode: 'year',
        query,
        results,
        ...(results.length ? {} : { warning: `no items found for year ${routed.year}` }),
      };
    }
    case 'text': {
      const results = routed.results.map(r => toItem(r.record, r));
      return {
        mode: 'text',
        query,
        results,
        ...(results.length ? {} : { warning: NO_SIMILAR_ITEMS }),
        ...(routed.didYouMean.length ? { didYouMean: routed.didYouMean } : {}),
      };
    }
  }
}

/**
 * Answers one query against a built context: "more like this title", "released in this
 * year" or a free-text/genre description. Either returns the full ranked list or throws
 * an InputError; nothing is produced partially.
 */
export function recommend(ctx: RecommenderContext, query: string, topK = DEFAULT_TOP_K): Recommendation {
  const out = present(route(query, ctx, topK), query.trim());
  logger.debug({ mode: out.mode, query: out.query, results: out.results.length, warning: out.warning }, 'Query routed');
  return out;
}

/** Genre substring filter ranked by rating; the query router never picks this mode. */
export function recommendByGenre(ctx: RecommenderContext, genre: string, topK = DEFAULT_TOP_K): Recommendation {
  const results = filterByGenre(ctx, genre, topK).map(r => toItem(r));
  const query = genre.trim();
  logger.debug({ mode: 'genre', query, results: results.length }, 'Genre filter applied');
  return {
    mode: 'genre',
    query,
    results,
    ...(results.length ? {} : { warning: `no items found for genre ${query}` }),
  };
}
