/**
 * Chunk Stage Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import type { IndexingStateType } from '../indexing-state';
import type { ChunkStage } from '../../stages/chunk';

const logger = new Logger('ChunkNode');

export const NO_FRAGMENTS_NOTICE = 'The loaded documents produced no text to index.';

export function chunkNode(
  state: IndexingStateType,
  chunkStage: ChunkStage,
): Partial<IndexingStateType> {
  const documents = state.loadResult?.documents ?? [];
  logger.log(`[Chunk Node] Chunking ${documents.length} documents`);

  const outcome = chunkStage.execute(documents);
  if (!outcome.success) {
    const failure = outcome.error;
    logger.error(`[Chunk Node] Failed: ${failure.message}`);

    return {
      currentStage: 'chunk_failed',
      failure,
      errors: [...state.errors, failure.message],
    };
  }

  const { fragments, statistics } = outcome.value;
  const stagesCompleted = [...(state.metrics.stagesCompleted ?? []), 'chunk'];

  return {
    fragments,
    chunkStatistics: statistics,
    currentStage: 'chunk',
    notice: fragments.length === 0 ? NO_FRAGMENTS_NOTICE : null,
    metrics: {
      ...state.metrics,
      stagesCompleted,
      fragmentsCreated: fragments.length,
    },
  };
}

export function createChunkNode(chunkStage: ChunkStage) {
  return async (
    state: IndexingStateType,
  ): Promise<Partial<IndexingStateType>> => {
    return chunkNode(state, chunkStage);
  };
}
