/**
 * Load Stage Node for LangGraph Workflow
 */

import { Logger } from '@nestjs/common';
import type { IndexingStateType } from '../indexing-state';
import type { LoadStage } from '../../stages/load';

const logger = new Logger('LoadNode');

export async function loadNode(
  state: IndexingStateType,
  loadStage: LoadStage,
): Promise<Partial<IndexingStateType>> {
  logger.log(`[Load Node] Executing for selection mode: ${state.selection.mode}`);

  const outcome = await loadStage.execute(state.selection, {
    signal: state.signal,
    onProgress: state.onProgress,
  });

  if (!outcome.success) {
    logger.error(`[Load Node] Failed: ${outcome.error.message}`);
    return {
      currentStage: 'load_failed',
      failure: outcome.error,
      errors: [...state.errors, outcome.error.message],
    };
  }

  const loadResult = outcome.value;
  const stagesCompleted = [...(state.metrics.stagesCompleted ?? []), 'load'];

  logger.log(
    `[Load Node] ${loadResult.documents.length} documents loaded, ` +
      `${loadResult.failures.length} files skipped`,
  );

  return {
    loadResult,
    currentStage: 'load',
    notice:
      loadResult.documents.length === 0
        ? (loadResult.notice ?? 'No document could be parsed from the selected files.')
        : null,
    metrics: {
      ...state.metrics,
      stagesCompleted,
      documentsLoaded: loadResult.documents.length,
    },
  };
}

export function createLoadNode(loadStage: LoadStage) {
  return async (
    state: IndexingStateType,
  ): Promise<Partial<IndexingStateType>> => {
    return loadNode(state, loadStage);
  };
}
