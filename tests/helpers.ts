import path from 'path';
import type { CatalogRecord } from '../src/types';

export const FIXTURES = path.join(__dirname, 'fixtures');

// small list so expected tokens stay easy to trace
export const TEST_STOPWORDS: ReadonlySet<string> = new Set(['a', 'an', 'the', 'to', 'of', 'and', 'in', 'with', 'his', 'her']);

type RecordInput = Partial<Omit<CatalogRecord, 'id' | 'title'>> & { title: string };

/** Builds records with ids in list order and empty text fields by default. */
export function makeCatalog(rows: RecordInput[]): CatalogRecord[] {
  return rows.map((r, id) => ({
    id,
    title: r.title,
    synopsis: r.synopsis ?? '',
    cast: r.cast ?? '',
    genre: r.genre ?? '',
    year: r.year,
    rating: r.rating,
  }));
}

export function norm(v: ReadonlyMap<number, number>): number {
  let sq = 0;
  for (const w of v.values()) sq += w * w;
  return Math.sqrt(sq);
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

export async function captureAsyncError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (e) {
    return e;
  }
  return undefined;
}
