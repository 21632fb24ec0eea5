import type { CatalogRecord, SparseVector } from './types';
import { normalize } from './normalize';
import { TfIdf } from './vectorizer';

export type Features = {
  model: TfIdf;
  /** indexed by record id */
  vectors: SparseVector[];
};

type TextFields = Pick<CatalogRecord, 'synopsis' | 'genre' | 'cast'>;

export function buildText(rec: TextFields): string {
  return [rec.synopsis, rec.genre, rec.cast].map(v => v ?? '').join(' ');
}

export function buildFeatures(records: readonly CatalogRecord[], stopwords: ReadonlySet<string>): Features {
  const docs = records.map(r => normalize(buildText(r), stopwords));
  return TfIdf.fit(docs);
}
