/**
 * Embed Stage Node for LangGraph Workflow
 * Builds and persists the index; a partial index is kept in the failure.
 */

import { Logger } from '@nestjs/common';
import type { IndexingStateType } from '../indexing-state';
import { PartialIndexError, type EmbedStage } from '../../stages/embed';

const logger = new Logger('EmbedNode');

export async function embedNode(
  state: IndexingStateType,
  embedStage: EmbedStage,
): Promise<Partial<IndexingStateType>> {
  logger.log(
    `[Embed Node] Embedding ${state.fragments.length} fragments into ${state.directory}`,
  );

  const outcome = await embedStage.execute(state.fragments, {
    directory: state.directory,
    signal: state.signal,
    onProgress: state.onProgress,
  });

  if (!outcome.success) {
    const { error } = outcome;
    logger.error(`[Embed Node] Failed: ${error.message}`);
    return {
      currentStage: 'embed_failed',
      failure: error,
      errors: [...state.errors, error.message],
      metrics: {
        ...state.metrics,
        fragmentsEmbedded: error instanceof PartialIndexError ? error.metadata.fragmentCount : 0,
      },
    };
  }

  const builtIndex = outcome.value;
  const stagesCompleted = [...(state.metrics.stagesCompleted ?? []), 'embed'];

  logger.log(
    `[Embed Node] ${builtIndex.metadata.fragmentCount} fragments embedded ` +
      `(${builtIndex.mode}, ${builtIndex.batchCount} batches)`,
  );

  return {
    builtIndex,
    currentStage: 'embed',
    metrics: {
      ...state.metrics,
      stagesCompleted,
      fragmentsEmbedded: builtIndex.metadata.fragmentCount,
    },
  };
}

export function createEmbedNode(embedStage: EmbedStage) {
  return async (
    state: IndexingStateType,
  ): Promise<Partial<IndexingStateType>> => {
    return embedNode(state, embedStage);
  };
}
