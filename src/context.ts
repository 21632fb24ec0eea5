import type { CatalogRecord } from './types';
import { InputError } from './errors';
import { buildFeatures } from './features';
import logger from './logging';
import { SimilarityIndex } from './similarity';
import { loadStopwords } from './stopwords';
import type { TfIdf } from './vectorizer';

/**
 * Everything a query reads, built once from a catalog snapshot and never mutated.
 * Pass it to every `recommend` call; queries share no other state.
 */
export type RecommenderContext = Readonly<{
  catalog: readonly CatalogRecord[];
  stopwords: ReadonlySet<string>;
  model: TfIdf;
  index: SimilarityIndex;
  /** trimmed, lowercased title -> record id; the first record wins on duplicates */
  titles: ReadonlyMap<string, number>;
}>;

export type ContextOptions = {
  /** a ready set, or a source for loadStopwords (defaults to the built-in English list) */
  stopwords?: ReadonlySet<string> | string;
};

export function titleKey(title: string): string {
  return title.trim().toLowerCase();
}

export function createContext(records: readonly CatalogRecord[], opts: ContextOptions = {}): RecommenderContext {
  records.forEach((r, i) => {
    if (r.id !== i) {
      throw new InputError('INVALID_RECORD', `Record "${r.title}" has id ${r.id}, expected its catalog position ${i}`, { row: i });
    }
  });

  // own copy: the caller may keep mutating the set it passed in
  const stopwords: ReadonlySet<string> = new Set(
    typeof opts.stopwords === 'string' || opts.stopwords === undefined
      ? loadStopwords(opts.stopwords)
      : opts.stopwords,
  );

  const { model, vectors } = buildFeatures(records, stopwords);

  const titles = new Map<string, number>();
  for (const r of records) {
    const key = titleKey(r.title);
    if (!titles.has(key)) titles.set(key, r.id);
  }

  logger.info({ records: records.length, vocabulary: model.vocabulary.size }, 'Recommender context built');

  return Object.freeze({
    catalog: Object.freeze([...records]),
    stopwords,
    model,
    index: new SimilarityIndex(vectors),
    titles,
  });
}
