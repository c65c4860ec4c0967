import type { Document } from '@langchain/core/documents';

/**
 * Metadata copied, unmodified, from the parent SourceDocument onto every
 * fragment. Also the metadata stored beside each vector in the index.
 */
export type FragmentMetadata = {
  source: string;
  title: string;
  date: string;
  year: number | null;
  persons: string[];
};

/**
 * One chunk of a document body. `id` is `<source>#<chunkIndex>`.
 */
export type Fragment = Document<FragmentMetadata>;

export interface ChunkingConfig {
  maxChunkSize: number;
  overlapSize: number;
}

export interface ChunkStatistics {
  documentCount: number;
  fragmentCount: number;
  averageFragmentLength: number;
  maxFragmentLength: number;
  durationMs: number;
}

export interface ChunkOutput {
  fragments: Fragment[];
  statistics: ChunkStatistics;
}

export function fragmentId(source: string, chunkIndex: number): string {
  return `${source}#${chunkIndex}`;
}
