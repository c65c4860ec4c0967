import type { ParseError, SourceDocument } from '../parse';

export const SUPPORTED_EXTENSIONS = ['.xml', '.xmltei'] as const;

export const NO_FILES_MESSAGE =
  'No XML files found. Please upload XML files or use the default corpus.';

/**
 * Which files an ingestion pass reads.
 * - provided: only the listed paths (missing or non-XML entries dropped)
 * - corpus: every XML file in the configured corpus directories
 */
export type CorpusSelection =
  | { mode: 'provided'; files: readonly string[] }
  | { mode: 'corpus'; directories?: readonly string[] };

export interface IngestionProgress {
  stage: 'load' | 'embed';
  current: number;
  total: number;
  file?: string;
  message: string;
}

export type ProgressListener = (progress: IngestionProgress) => void;

export interface LoadOptions {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface FileFailure {
  file: string;
  code: string;
  message: string;
}

export interface LoadResult {
  documents: SourceDocument[];
  // identifier -> year, only for documents with a resolved year
  documentYears: Record<string, number>;
  failures: FileFailure[];
  candidateCount: number;
  // user-facing notice for valid empty states
  notice?: string;
}

export function toFileFailure(error: ParseError): FileFailure {
  return { file: error.filePath, code: error.code, message: error.message };
}
