import type { ChunkMetadata, SearchResultSet } from './types.js';

export function createSearchResults(
  documents: string[],
  metadata: ChunkMetadata[],
  distances: number[]
): SearchResultSet {
  if (documents.length !== metadata.length || documents.length !== distances.length) {
    throw new Error(
      `Search results must be parallel arrays (documents=${documents.length}, metadata=${metadata.length}, distances=${distances.length})`
    );
  }
  return { documents, metadata, distances };
}

export function emptySearchResults(error?: string): SearchResultSet {
  return error === undefined
    ? { documents: [], metadata: [], distances: [] }
    : { documents: [], metadata: [], distances: [], error };
}

export function isEmptySearchResults(results: SearchResultSet): boolean {
  return results.documents.length === 0;
}
