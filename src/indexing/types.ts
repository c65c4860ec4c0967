/**
 * Indexing Types
 */

import type { RagErrorKind } from '../common/errors';
import type { IndexMetadata } from '../vector-store/index-layout';
import type { RetrievalSettings } from '../retrieval/types';
import type {
  CorpusSelection,
  FileFailure,
  IngestionProgress,
} from './stages/load/types';

export interface BuildRequest {
  selection: CorpusSelection;
  // defaults to VECTOR_STORE_DIR
  directory?: string;
}

export type BuildStatus =
  | 'completed'
  | 'empty'
  | 'partial'
  | 'cancelled'
  | 'failed';

export interface BuildReport {
  status: BuildStatus;
  mode: CorpusSelection['mode'];
  directory: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  stagesCompleted: string[];
  documentsLoaded: number;
  fragmentsCreated: number;
  fragmentsEmbedded: number;
  skippedFiles: FileFailure[];
  notice?: string;
  metadata?: IndexMetadata;
  error?: { code: string; kind: RagErrorKind; message: string };
}

export interface IndexSummary {
  directory: string;
  metadata: IndexMetadata;
  settings: RetrievalSettings;
  usedFallback: boolean;
  activatedAt: string;
}

export interface IndexingStatus {
  activeIndex: IndexSummary | null;
  precomputedDirectory: string;
  precomputedAvailable: boolean;
  building: boolean;
  buildStartedAt: string | null;
  progress: IngestionProgress | null;
  lastBuild: BuildReport | null;
}
