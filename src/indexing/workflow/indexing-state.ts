/**
 * Indexing Workflow State Definition
 * load → chunk → embed, sharing one state object between nodes
 */

import { Annotation } from '@langchain/langgraph';
import type { RagError } from '../../common/errors';
import type { ChunkStatistics, Fragment } from '../stages/chunk/types';
import type { BuiltIndex } from '../stages/embed/types';
import type {
  CorpusSelection,
  LoadResult,
  ProgressListener,
} from '../stages/load/types';

/**
 * Workflow Metrics
 */
export interface WorkflowMetrics {
  startTime?: Date;
  stagesCompleted?: string[];
  documentsLoaded?: number;
  fragmentsCreated?: number;
  fragmentsEmbedded?: number;
}

export const IndexingState = Annotation.Root({
  // Input
  selection: Annotation<CorpusSelection>,
  directory: Annotation<string>,
  signal: Annotation<AbortSignal | undefined>,
  onProgress: Annotation<ProgressListener | undefined>,

  // Load stage output
  loadResult: Annotation<LoadResult | null>,

  // Chunk stage output
  fragments: Annotation<Fragment[]>,
  chunkStatistics: Annotation<ChunkStatistics | null>,

  // Embed stage output
  builtIndex: Annotation<BuiltIndex | null>,

  // Workflow metadata
  currentStage: Annotation<string>,
  // valid empty state (no files, no fragments) that ended the run early
  notice: Annotation<string | null>,
  failure: Annotation<RagError | null>,
  errors: Annotation<string[]>,
  metrics: Annotation<WorkflowMetrics>,
});

export type IndexingStateType = typeof IndexingState.State;

export function createInitialState(input: {
  selection: CorpusSelection;
  directory: string;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}): IndexingStateType {
  return {
    selection: input.selection,
    directory: input.directory,
    signal: input.signal,
    onProgress: input.onProgress,

    loadResult: null,

    fragments: [],
    chunkStatistics: null,

    builtIndex: null,

    currentStage: 'init',
    notice: null,
    failure: null,
    errors: [],
    metrics: {
      startTime: new Date(),
      stagesCompleted: [],
    },
  };
}
