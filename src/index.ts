export type {
  CatalogRecord,
  QueryMode,
  Recommendation,
  RecommendationItem,
  ScoredResult,
  SparseVector,
} from './types';
export { InputError, isInputError } from './errors';
export type { InputErrorCode } from './errors';
export { loadConfig } from './config';
export type { AppConfig, ConfigOverrides } from './config';
export { loadCatalog, toCatalogRecords, REQUIRED_COLUMNS } from './catalog';
export { loadStopwords, parseStopwords } from './stopwords';
export { normalize } from './normalize';
export { buildFeatures, buildText } from './features';
export { TfIdf, Vocabulary } from './vectorizer';
export { SimilarityIndex, cosine } from './similarity';
export { rank, rankByRating, DEFAULT_TOP_K } from './ranker';
export { createContext } from './context';
export type { RecommenderContext, ContextOptions } from './context';
export { classifyQuery, filterByGenre, route, suggestTitles } from './router';
export { recommend, recommendByGenre, NO_SIMILAR_ITEMS } from './recommend';
export { renderReport } from './report';
