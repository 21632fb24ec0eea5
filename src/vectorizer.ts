// TF-IDF over a closed vocabulary. The vocabulary is fixed once by TfIdf.fit();
// a term first seen at query time has no column and is dropped, never added.
import type { SparseVector } from './types';

export function termCounts(tokens: readonly string[]): Map<string, number> {
  const tf = new Map<string, number>();
  tokens.forEach(tok => tf.set(tok, (tf.get(tok) || 0) + 1));
  return tf;
}

/** Drops non-positive weights, orders entries by column and scales to unit length. */
export function l2Normalize(weights: Iterable<[number, number]>): SparseVector {
  const entries = [...weights].filter(([, w]) => w > 0).sort((a, b) => a[0] - b[0]);
  let sq = 0;
  for (const [, w] of entries) sq += w * w;
  const norm = Math.sqrt(sq);
  if (norm === 0) return new Map();
  return new Map(entries.map(([idx, w]) => [idx, w / norm]));
}

/**
 * Distinct terms of the catalog in first-seen order, each with a fixed column index and
 * the number of documents containing it.
 */
export class Vocabulary {
  private readonly index = new Map<string, number>();
  private readonly terms: readonly string[];
  private readonly df: readonly number[];

  private constructor(terms: string[], df: number[]) {
    this.terms = terms;
    this.df = df;
    terms.forEach((t, i) => this.index.set(t, i));
  }

  static fromDocuments(docs: readonly ReadonlyMap<string, number>[]): Vocabulary {
    const seen = new Map<string, number>();
    const terms: string[] = [];
    const df: number[] = [];
    for (const counts of docs) {
      for (const term of counts.keys()) {
        let idx = seen.get(term);
        if (idx === undefined) {
          idx = terms.length;
          seen.set(term, idx);
          terms.push(term);
          df.push(0);
        }
        df[idx] += 1;
      }
    }
    return new Vocabulary(terms, df);
  }

  get size(): number {
    return this.terms.length;
  }

  has(term: string): boolean {
    return this.index.has(term);
  }

  indexOf(term: string): number | undefined {
    return this.index.get(term);
  }

  termAt(index: number): string | undefined {
    return this.terms[index];
  }

  documentFrequency(index: number): number {
    return this.df[index] ?? 0;
  }
}

export class TfIdf {
  readonly vocabulary: Vocabulary;
  readonly documentCount: number;
  private readonly idfs: readonly number[];

  private constructor(vocabulary: Vocabulary, documentCount: number) {
    this.vocabulary = vocabulary;
    this.documentCount = documentCount;
    // smoothed: never divides by zero, and a term found in every document weighs 0
    this.idfs = Array.from({ length: vocabulary.size }, (_, i) =>
      Math.log((1 + documentCount) / (1 + vocabulary.documentFrequency(i))));
  }

  /** Builds the vocabulary from tokenized documents and returns one unit vector per document. */
  static fit(docs: readonly (readonly string[])[]): { model: TfIdf; vectors: SparseVector[] } {
    const counts = docs.map(termCounts);
    const model = new TfIdf(Vocabulary.fromDocuments(counts), docs.length);
    return { model, vectors: counts.map(c => model.weigh(c)) };
  }

  idf(index: number): number {
    return this.idfs[index] ?? 0;
  }

  vectorize(tokens: readonly string[]): SparseVector {
    return this.weigh(termCounts(tokens));
  }

  private weigh(counts: ReadonlyMap<string, number>): SparseVector {
    const weights: [number, number][] = [];
    for (const [term, f] of counts) {
      const idx = this.vocabulary.indexOf(term);
      if (idx === undefined) continue;
      weights.push([idx, f * this.idf(idx)]);
    }
    return l2Normalize(weights);
  }
}
