export { CourseVectorStore } from './vector-store.js';
export type { CourseVectorStoreOptions } from './vector-store.js';
export { createSearchResults, emptySearchResults, isEmptySearchResults } from './search-results.js';
export type {
  ChunkMetadata,
  Course,
  CourseChunk,
  CourseOutline,
  CourseStore,
  Lesson,
  SearchParams,
  SearchResultSet,
} from './types.js';
