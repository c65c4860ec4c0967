/**
 * Indexing Service
 *
 * Owns index lifecycle for the session: loading a persisted index, running
 * one build at a time through the workflow, and swapping the resulting
 * handle in when the build completes.
 */

import {
  Injectable,
  Logger,
  type OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  OperationCancelledError,
  RagError,
  RagErrorKind,
  fail,
  succeed,
  toError,
  type Outcome,
} from '../common/errors';
import { IndexLoader } from '../retrieval/services/index-loader.service';
import type { IndexHandle } from '../retrieval/types';
import { SessionService } from '../session';
import {
  IndexBuildError,
  IndexBuildInProgressError,
} from './errors/indexing-errors';
import { PartialIndexError } from './stages/embed';
import type { IngestionProgress } from './stages/load/types';
import type {
  BuildReport,
  BuildRequest,
  BuildStatus,
  IndexSummary,
  IndexingStatus,
} from './types';
import {
  IndexingWorkflowService,
  type WorkflowResult,
} from './workflow/indexing-workflow.service';

const DEFAULT_VECTOR_STORE_DIR = 'vector_store';

interface RunningBuild {
  controller: AbortController;
  startedAt: string;
  progress: IngestionProgress | null;
}

export function toIndexSummary(handle: IndexHandle): IndexSummary {
  return {
    directory: handle.directory,
    metadata: { ...handle.metadata },
    settings: { ...handle.settings },
    usedFallback: handle.usedFallback,
    activatedAt: handle.activatedAt,
  };
}

function buildStatusOf(failure: RagError | null, notice: string | null): BuildStatus {
  if (failure === null) {
    return notice === null ? 'completed' : 'empty';
  }
  if (failure instanceof PartialIndexError) {
    return 'partial';
  }
  return failure.kind === RagErrorKind.CANCELLED ? 'cancelled' : 'failed';
}

@Injectable()
export class IndexingService implements OnApplicationBootstrap {
  private readonly logger = new Logger(IndexingService.name);
  private running: RunningBuild | null = null;
  private lastReport: BuildReport | null = null;

  constructor(
    private readonly workflowService: IndexingWorkflowService,
    private readonly indexLoader: IndexLoader,
    private readonly sessionService: SessionService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Activate the precomputed index at startup when one is shipped.
   */
  async onApplicationBootstrap(): Promise<void> {
    const autoload = this.configService.get<string>('AUTOLOAD_PRECOMPUTED_INDEX', 'true');
    const directory = this.indexLoader.getPrecomputedDirectory();
    if (autoload === 'false' || !(await this.indexLoader.isAvailable(directory))) {
      this.logger.log('No precomputed index activated at startup');
      return;
    }

    const outcome = await this.loadIndex(directory);
    if (!outcome.success) {
      this.logger.warn(
        `Precomputed index at ${directory} could not be loaded: ${outcome.error.message}`,
      );
    }
  }

  getVectorStoreDirectory(): string {
    return this.configService.get<string>('VECTOR_STORE_DIR', DEFAULT_VECTOR_STORE_DIR);
  }

  /**
   * Load a persisted index (the precomputed one by default) and make it
   * the session's active index.
   */
  async loadIndex(directory?: string): Promise<Outcome<IndexSummary>> {
    const target = directory ?? this.indexLoader.getPrecomputedDirectory();
    const outcome = await this.indexLoader.load(target);
    if (!outcome.success) {
      return outcome;
    }

    this.activate(outcome.value);
    return succeed(toIndexSummary(outcome.value));
  }

  /**
   * Run load → chunk → embed and activate the new index on success. Only
   * one build runs at a time.
   */
  async build(request: BuildRequest): Promise<Outcome<BuildReport>> {
    if (this.running !== null) {
      return fail(new IndexBuildInProgressError(this.running.startedAt));
    }

    const directory = request.directory ?? this.getVectorStoreDirectory();
    const running: RunningBuild = {
      controller: new AbortController(),
      startedAt: new Date().toISOString(),
      progress: null,
    };
    this.running = running;

    this.logger.log(
      `=== Index build started === mode=${request.selection.mode}, target=${directory}`,
    );

    let result: WorkflowResult;
    try {
      result = await this.workflowService.executeWorkflow({
        selection: request.selection,
        directory,
        signal: running.controller.signal,
        onProgress: (progress) => {
          running.progress = progress;
        },
      });
    } catch (error) {
      const cause = toError(error);
      const failure = new IndexBuildError(cause.message, cause);
      this.logger.error(`❌ ${failure.message}`, cause.stack);
      return fail(failure);
    } finally {
      this.running = null;
    }

    const { finalState, failure, metrics } = result;
    const report: BuildReport = {
      status: buildStatusOf(failure, finalState.notice),
      mode: request.selection.mode,
      directory,
      startedAt: running.startedAt,
      finishedAt: new Date().toISOString(),
      durationMs: metrics.duration,
      stagesCompleted: metrics.stagesCompleted,
      documentsLoaded: metrics.documentsLoaded,
      fragmentsCreated: metrics.fragmentsCreated,
      fragmentsEmbedded: metrics.fragmentsEmbedded,
      skippedFiles: finalState.loadResult?.failures ?? [],
    };
    if (finalState.notice !== null) {
      report.notice = finalState.notice;
    }
    if (failure instanceof PartialIndexError) {
      report.metadata = { ...failure.metadata };
    }
    if (failure !== null) {
      report.error = {
        code: failure.code,
        kind: failure.kind,
        message: failure.message,
      };
    }

    if (failure === null && finalState.builtIndex !== null) {
      const { store, metadata } = finalState.builtIndex;
      report.metadata = { ...metadata };
      this.activate(this.indexLoader.createHandle(store, metadata, directory));
    }

    this.lastReport = report;
    this.logger.log(
      `=== Index build ${report.status} === ${report.fragmentsEmbedded}/${report.fragmentsCreated} ` +
        `fragments embedded from ${report.documentsLoaded} documents in ${report.durationMs}ms`,
    );

    return failure === null ? succeed(report) : fail(failure);
  }

  /**
   * Abort the running build. Files already parsed and batches already
   * persisted stay on disk.
   */
  cancelBuild(): { cancelled: boolean } {
    if (this.running === null) {
      return { cancelled: false };
    }
    this.logger.warn(`Cancelling index build started at ${this.running.startedAt}`);
    this.running.controller.abort(new OperationCancelledError('Index build'));
    return { cancelled: true };
  }

  async getStatus(): Promise<IndexingStatus> {
    const handle = this.sessionService.current().index;
    const precomputedDirectory = this.indexLoader.getPrecomputedDirectory();

    return {
      activeIndex: handle === null ? null : toIndexSummary(handle),
      precomputedDirectory,
      precomputedAvailable: await this.indexLoader.isAvailable(precomputedDirectory),
      building: this.running !== null,
      buildStartedAt: this.running?.startedAt ?? null,
      progress: this.running?.progress ?? null,
      lastBuild: this.lastReport,
    };
  }

  private activate(handle: IndexHandle): void {
    const previous = this.sessionService.current().activateIndex(handle);
    this.logger.log(
      `Active index: ${handle.directory} (${handle.metadata.fragmentCount} fragments)` +
        (previous === null ? '' : `, replacing ${previous.directory}`),
    );
  }
}
