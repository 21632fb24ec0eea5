import type { SparseVector } from './types';

/**
 * Inner product over shared columns. Both vectors keep their entries in column order,
 * so the sum is accumulated in the same order whichever argument comes first.
 */
export function dot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let sum = 0;
  for (const [idx, w] of small) {
    const other = large.get(idx);
    if (other !== undefined) sum += w * other;
  }
  return sum;
}

/** Cosine of two unit (or zero) vectors, clamped to [0, 1] against rounding. */
export function cosine(a: SparseVector, b: SparseVector): number {
  return Math.min(1, Math.max(0, dot(a, b)));
}

// shared columns ordered by their contribution to the score
export function sharedColumns(a: SparseVector, b: SparseVector, n = 3): number[] {
  const common: Array<{ idx: number; s: number }> = [];
  for (const [idx, w] of a) {
    const other = b.get(idx);
    if (other === undefined) continue;
    common.push({ idx, s: w * other });
  }
  common.sort((x, y) => y.s - x.s || x.idx - y.idx);
  return common.slice(0, n).map(x => x.idx);
}

export type IndexHit = { id: number; score: number };

/** Holds one unit vector per catalog record and scores queries against all of them. */
export class SimilarityIndex {
  private readonly vectors: readonly SparseVector[];

  constructor(vectors: readonly SparseVector[]) {
    this.vectors = vectors;
  }

  vectorOf(id: number): SparseVector | undefined {
    return this.vectors[id];
  }

  /** One hit per record in catalog order, unsorted; `exclude` leaves out a single record id. */
  score(query: SparseVector, opts?: { exclude?: number }): IndexHit[] {
    const hits: IndexHit[] = [];
    this.vectors.forEach((v, id) => {
      if (id === opts?.exclude) return;
      hits.push({ id, score: cosine(query, v) });
    });
    return hits;
  }
}
