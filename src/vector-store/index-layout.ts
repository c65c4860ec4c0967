/**
 * On-disk layout of a persisted index directory:
 *
 *   <dir>/index.json      vectors, fragment texts and metadata
 *   <dir>/metadata.json   sidecar describing how the index was built
 */

import { join } from 'path';

export const INDEX_FILE = 'index.json';
export const METADATA_FILE = 'metadata.json';

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'google'] as const;
export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

export interface IndexMetadata {
  embeddingProvider: EmbeddingProvider;
  embeddingModelName: string;
  dimensions: number | null;
  fragmentCount: number;
  documentCount: number;
  createdAt: string;
  // false while a batched build is still adding fragments, or after it failed midway
  complete: boolean;
}

export function isEmbeddingProvider(value: unknown): value is EmbeddingProvider {
  return EMBEDDING_PROVIDERS.some((provider) => provider === value);
}

export function indexFilePath(directory: string): string {
  return join(directory, INDEX_FILE);
}

export function metadataFilePath(directory: string): string {
  return join(directory, METADATA_FILE);
}

function optionalCount(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
    ? value
    : null;
}

/**
 * Read a sidecar record. Only `embeddingModelName` is required; the other
 * fields fall back to what the loaded index itself reports.
 */
export function parseIndexMetadata(
  raw: unknown,
  fallback: Omit<IndexMetadata, 'embeddingModelName'>,
): IndexMetadata | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return null;
  }
  const record: Record<string, unknown> = { ...raw };
  if (
    typeof record.embeddingModelName !== 'string' ||
    record.embeddingModelName.trim() === ''
  ) {
    return null;
  }

  return {
    embeddingProvider: isEmbeddingProvider(record.embeddingProvider)
      ? record.embeddingProvider
      : fallback.embeddingProvider,
    embeddingModelName: record.embeddingModelName,
    dimensions: optionalCount(record.dimensions) ?? fallback.dimensions,
    fragmentCount: optionalCount(record.fragmentCount) ?? fallback.fragmentCount,
    documentCount: optionalCount(record.documentCount) ?? fallback.documentCount,
    createdAt:
      typeof record.createdAt === 'string' ? record.createdAt : fallback.createdAt,
    complete:
      typeof record.complete === 'boolean' ? record.complete : fallback.complete,
  };
}
