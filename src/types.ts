export type CatalogRecord = {
  /** position in the catalog, assigned at load time */
  readonly id: number;
  readonly title: string;
  readonly synopsis: string;
  /** comma-delimited in the source file, used as free text */
  readonly cast: string;
  /** comma-delimited tags */
  readonly genre: string;
  readonly year?: number;
  readonly rating?: number;
};

/** column index -> weight, entries in ascending column order */
export type SparseVector = ReadonlyMap<number, number>;

export type ScoredResult = {
  record: CatalogRecord;
  score: number;
  sharedTerms?: string[];
};

export type QueryMode = 'title' | 'year' | 'text' | 'genre';

export type RecommendationItem = {
  id: number;
  title: string;
  year?: number;
  genre: string;
  rating?: number;
  /** absent in year mode, which is a filter and not a similarity ranking */
  score?: number;
  sharedTerms?: string[];
};

export type Recommendation = {
  mode: QueryMode;
  query: string;
  matchedTitle?: string;
  results: RecommendationItem[];
  warning?: string;
  /** close catalog titles for a free-text query that matched no title exactly */
  didYouMean?: string[];
};
