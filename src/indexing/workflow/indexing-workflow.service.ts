/**
 * Indexing Workflow Service
 *
 * LangGraph StateGraph for the ingestion pipeline: Load → Chunk → Embed.
 * The run ends early, without error, when loading yields no documents or
 * chunking yields no fragments.
 */

import { Injectable, Logger } from '@nestjs/common';
import { StateGraph, START, END } from '@langchain/langgraph';
import { OperationCancelledError, type RagError } from '../../common/errors';
import { isAborted } from '../../common/utils';
import {
  IndexingState,
  createInitialState,
  type IndexingStateType,
} from './indexing-state';
import { createLoadNode } from './nodes/load.node';
import { createChunkNode } from './nodes/chunk.node';
import { createEmbedNode } from './nodes/embed.node';
import { LoadStage } from '../stages/load';
import { ChunkStage } from '../stages/chunk';
import { EmbedStage } from '../stages/embed';
import type { CorpusSelection, ProgressListener } from '../stages/load/types';

export interface IndexingJob {
  selection: CorpusSelection;
  directory: string;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface WorkflowResult {
  success: boolean;
  finalState: IndexingStateType;
  failure: RagError | null;
  errors: string[];
  metrics: {
    duration: number;
    stagesCompleted: string[];
    documentsLoaded: number;
    fragmentsCreated: number;
    fragmentsEmbedded: number;
  };
}

function isIndexingStateType(value: unknown): value is IndexingStateType {
  return (
    typeof value === 'object' &&
    value !== null &&
    'currentStage' in value &&
    typeof value.currentStage === 'string' &&
    'errors' in value &&
    Array.isArray(value.errors) &&
    'metrics' in value &&
    typeof value.metrics === 'object' &&
    value.metrics !== null
  );
}

// Stop after a failure, or when the stage left nothing to process
function routeAfter(state: IndexingStateType): 'continue' | 'stop' {
  if (state.failure !== null || state.notice !== null) {
    return 'stop';
  }
  // Cancellation between stages; the next stage would check it anyway
  return isAborted(state.signal) ? 'stop' : 'continue';
}

@Injectable()
export class IndexingWorkflowService {
  private readonly logger = new Logger(IndexingWorkflowService.name);
  private workflow: ReturnType<typeof StateGraph.prototype.compile> | null =
    null;

  constructor(
    private readonly loadStage: LoadStage,
    private readonly chunkStage: ChunkStage,
    private readonly embedStage: EmbedStage,
  ) {
    this.initializeWorkflow();
  }

  private initializeWorkflow(): void {
    this.logger.log('Initializing LangGraph indexing workflow...');

    try {
      const graph = new StateGraph(IndexingState)
        .addNode('load', createLoadNode(this.loadStage))
        .addNode('chunk', createChunkNode(this.chunkStage))
        .addNode('embed', createEmbedNode(this.embedStage))
        .addEdge(START, 'load')
        .addConditionalEdges('load', routeAfter, {
          continue: 'chunk',
          stop: END,
        })
        .addConditionalEdges('chunk', routeAfter, {
          continue: 'embed',
          stop: END,
        })
        .addEdge('embed', END);

      this.workflow = graph.compile();

      this.logger.log('✓ LangGraph indexing workflow initialized successfully');
    } catch (error) {
      this.logger.error(
        'Failed to initialize LangGraph workflow',
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  async executeWorkflow(job: IndexingJob): Promise<WorkflowResult> {
    const startTime = Date.now();

    this.logger.log(
      `Starting indexing workflow (${job.selection.mode}) into ${job.directory}`,
    );

    if (!this.workflow) {
      throw new Error('Workflow not initialized');
    }

    const result: unknown = await this.workflow.invoke(createInitialState(job));
    if (!isIndexingStateType(result)) {
      throw new Error('Workflow returned invalid state type');
    }

    let finalState: IndexingStateType = result;
    // Aborted between stages: no stage reported it
    if (
      finalState.failure === null &&
      finalState.builtIndex === null &&
      finalState.notice === null &&
      isAborted(job.signal)
    ) {
      const failure = new OperationCancelledError('Index build');
      finalState = {
        ...finalState,
        currentStage: `${finalState.currentStage}_cancelled`,
        failure,
        errors: [...finalState.errors, failure.message],
      };
    }

    const duration = Date.now() - startTime;
    const stagesCompleted = finalState.metrics.stagesCompleted ?? [];
    const metrics = {
      duration,
      stagesCompleted,
      documentsLoaded: finalState.metrics.documentsLoaded ?? 0,
      fragmentsCreated: finalState.metrics.fragmentsCreated ?? 0,
      fragmentsEmbedded: finalState.metrics.fragmentsEmbedded ?? 0,
    };

    if (finalState.failure !== null) {
      this.logger.warn(
        `Workflow failed at ${finalState.currentStage}: ${finalState.errors.join(', ')}`,
      );
      return {
        success: false,
        finalState,
        failure: finalState.failure,
        errors: finalState.errors,
        metrics,
      };
    }

    if (finalState.notice !== null) {
      this.logger.warn(`Workflow ended early: ${finalState.notice}`);
    } else {
      this.logger.log(
        `✓ Workflow completed successfully ` +
          `(${duration}ms, stages: ${stagesCompleted.join(' → ')})`,
      );
    }

    return {
      success: true,
      finalState,
      failure: null,
      errors: [],
      metrics,
    };
  }
}
