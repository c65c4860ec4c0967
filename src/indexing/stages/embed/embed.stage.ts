/**
 * Embed Stage (Embedding Index Builder)
 *
 * Embeds every fragment with one embedding model and persists the resulting
 * store. A single bulk call is tried first; when it fails the fragments are
 * embedded in fixed-size batches, each batch retried with exponential
 * backoff and persisted as soon as it is merged in.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  OperationCancelledError,
  RagError,
  RagErrorKind,
  fail,
  succeed,
  toError,
  type Outcome,
} from '../../../common/errors';
import {
  getNumber,
  getPositiveInt,
  isAborted,
  sleep,
  withTimeout,
} from '../../../common/utils';
import { LocalVectorStore } from '../../../vector-store/local-vector.store';
import type { IndexMetadata } from '../../../vector-store/index-layout';
import {
  EmbeddingProviderFactory,
  type EmbeddingProviderConfig,
} from '../../../vector-store/embedding-provider.factory';
import type { Fragment } from '../chunk/types';
import { PersistStage } from '../persist';
import {
  EmbeddingServiceError,
  NoFragmentsError,
  PartialIndexError,
} from './errors/embed-errors';
import type { BuildOptions, BuiltIndex } from './types';

const DEFAULT_TIMEOUT_MS = 120000;
const DEFAULT_BATCH_SIZE = 50;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1500;

function toEmbeddingError(error: unknown): RagError {
  if (error instanceof RagError) {
    return error;
  }
  const cause = toError(error);
  return new EmbeddingServiceError(cause.message, true, cause);
}

function createBatches<T>(items: T[], batchSize: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

@Injectable()
export class EmbedStage {
  private readonly logger = new Logger(EmbedStage.name);

  private readonly timeoutMs: number;
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
    private readonly persistStage: PersistStage,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = getPositiveInt(
      this.configService,
      'EMBEDDING_TIMEOUT_MS',
      DEFAULT_TIMEOUT_MS,
    );
    this.batchSize = getPositiveInt(
      this.configService,
      'EMBEDDING_FALLBACK_BATCH_SIZE',
      DEFAULT_BATCH_SIZE,
    );
    this.maxRetries = getPositiveInt(
      this.configService,
      'EMBEDDING_MAX_RETRIES',
      DEFAULT_MAX_RETRIES,
    );
    this.retryDelayMs = Math.max(
      0,
      getNumber(this.configService, 'EMBEDDING_RETRY_DELAY_MS', DEFAULT_RETRY_DELAY_MS),
    );

    this.logger.log(
      `Initialized with timeout: ${this.timeoutMs}ms, fallback batch size: ${this.batchSize}, ` +
        `max retries: ${this.maxRetries}`,
    );
  }

  async execute(
    fragments: Fragment[],
    options: BuildOptions,
  ): Promise<Outcome<BuiltIndex>> {
    const startTime = Date.now();

    if (fragments.length === 0) {
      return fail(new NoFragmentsError());
    }

    // Step 1: One embedding model for the whole build
    const config = this.embeddingProviderFactory.getProviderConfig();
    let embeddings: Embeddings;
    try {
      embeddings = this.embeddingProviderFactory.createEmbeddingModel(
        config.provider,
        config.model,
      );
    } catch (error) {
      const failure = toEmbeddingError(error);
      this.logger.error(`[Embed Stage] ${failure.message}`);
      return fail(failure);
    }

    this.logger.log(
      `[Embed Stage] Embedding ${fragments.length} fragments with ${config.provider}/${config.model}`,
    );

    // Step 2: Bulk attempt
    const bulk = await this.embedAll(fragments, embeddings, options.signal);
    if (bulk.success) {
      const built = await this.persistBulk(bulk.value, fragments.length, config, options);
      if (!built.success) {
        return built;
      }
      return succeed({ ...built.value, durationMs: Date.now() - startTime });
    }
    if (
      bulk.error.kind !== RagErrorKind.SERVICE &&
      bulk.error.kind !== RagErrorKind.TIMEOUT
    ) {
      return fail(bulk.error);
    }

    // Step 3: Batched fallback, only after the embedding call itself failed
    this.logger.warn(`[Embed Stage] Bulk embedding failed: ${bulk.error.message}`);
    this.logger.log('Trying batch processing approach...');

    const batched = await this.embedInBatches(
      fragments,
      embeddings,
      config,
      options,
    );
    if (!batched.success) {
      return batched;
    }
    return succeed({ ...batched.value, durationMs: Date.now() - startTime });
  }

  private async embedAll(
    fragments: Fragment[],
    embeddings: Embeddings,
    signal?: AbortSignal,
  ): Promise<Outcome<LocalVectorStore>> {
    if (isAborted(signal)) {
      return fail(new OperationCancelledError('Index build'));
    }

    const store = new LocalVectorStore(embeddings);
    try {
      const vectors = await withTimeout(
        () => embeddings.embedDocuments(fragments.map((f) => f.pageContent)),
        this.timeoutMs,
        'Bulk embedding',
      );
      await store.addVectors(vectors, fragments);
    } catch (error) {
      return fail(toEmbeddingError(error));
    }
    return succeed(store);
  }

  private async persistBulk(
    store: LocalVectorStore,
    fragmentCount: number,
    config: EmbeddingProviderConfig,
    options: BuildOptions,
  ): Promise<Outcome<BuiltIndex>> {
    const persisted = await this.persist(store, config, true, options.directory);
    if (!persisted.success) {
      return persisted;
    }

    options.onProgress?.({
      stage: 'embed',
      current: 1,
      total: 1,
      message: `Embeddings créés pour ${fragmentCount} fragments.`,
    });

    const built: BuiltIndex = {
      store,
      metadata: persisted.value,
      directory: options.directory,
      mode: 'bulk',
      batchCount: 1,
      durationMs: 0,
    };
    return succeed(built);
  }

  /**
   * The first batch initializes the store, later batches are merged in.
   * Every merged batch is persisted, so an abandoned or failed build leaves
   * a valid index marked `complete: false` on disk.
   */
  private async embedInBatches(
    fragments: Fragment[],
    embeddings: Embeddings,
    config: EmbeddingProviderConfig,
    options: BuildOptions,
  ): Promise<Outcome<BuiltIndex>> {
    const { signal, onProgress, directory } = options;
    const batches = createBatches(fragments, this.batchSize);
    const store = new LocalVectorStore(embeddings);
    let metadata: IndexMetadata | null = null;

    this.logger.log(
      `Split into ${batches.length} batches (batch size: ${this.batchSize})`,
    );

    for (const [index, batch] of batches.entries()) {
      if (isAborted(signal)) {
        this.logger.warn(
          `[Embed Stage] Cancelled after ${index}/${batches.length} batches`,
        );
        return fail(new OperationCancelledError('Index build'));
      }

      const message = `Processing batch ${index + 1}/${batches.length}...`;
      this.logger.log(message);
      onProgress?.({
        stage: 'embed',
        current: index + 1,
        total: batches.length,
        message,
      });

      let failure: RagError | null = null;
      const vectors = await this.embedBatchWithRetry(
        batch,
        embeddings,
        index + 1,
        signal,
      );
      if (vectors.success) {
        try {
          await store.addVectors(vectors.value, batch);
        } catch (error) {
          failure = toEmbeddingError(error);
        }
      } else {
        failure = vectors.error;
      }

      if (failure) {
        if (metadata === null || failure.kind === RagErrorKind.CANCELLED) {
          return fail(failure);
        }
        this.logger.error(
          `[Embed Stage] Batch ${index + 1}/${batches.length} failed, ` +
            `keeping ${store.size}/${fragments.length} fragments`,
        );
        return fail(
          new PartialIndexError(store, metadata, fragments.length, failure),
        );
      }

      const isLast = index === batches.length - 1;
      const persisted = await this.persist(store, config, isLast, directory);
      if (!persisted.success) {
        if (metadata === null) {
          return persisted;
        }
        this.logger.error(
          `[Embed Stage] Persisting batch ${index + 1}/${batches.length} failed, ` +
            `keeping the ${metadata.fragmentCount} fragments already on disk`,
        );
        return fail(
          new PartialIndexError(store, metadata, fragments.length, persisted.error),
        );
      }
      metadata = persisted.value;
    }

    if (metadata === null) {
      return fail(new NoFragmentsError());
    }

    const built: BuiltIndex = {
      store,
      metadata,
      directory,
      mode: 'batched',
      batchCount: batches.length,
      durationMs: 0,
    };
    return succeed(built);
  }

  private async embedBatchWithRetry(
    batch: Fragment[],
    embeddings: Embeddings,
    batchNumber: number,
    signal?: AbortSignal,
  ): Promise<Outcome<number[][]>> {
    let lastError: RagError = new EmbeddingServiceError('no attempt made', true);

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const vectors = await withTimeout(
          () => embeddings.embedDocuments(batch.map((f) => f.pageContent)),
          this.timeoutMs,
          `Embedding batch ${batchNumber}`,
        );
        return succeed(vectors);
      } catch (error) {
        lastError = toEmbeddingError(error);
      }

      if (!lastError.retryable || attempt === this.maxRetries) {
        break;
      }

      const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
      this.logger.warn(
        `Batch ${batchNumber} failed (attempt ${attempt}/${this.maxRetries}), ` +
          `retrying in ${delay}ms: ${lastError.message}`,
      );
      await sleep(delay);

      if (isAborted(signal)) {
        return fail(new OperationCancelledError('Index build'));
      }
    }

    this.logger.error(
      `Batch ${batchNumber} failed after retries: ${lastError.message}`,
    );
    return fail(lastError);
  }

  private async persist(
    store: LocalVectorStore,
    config: EmbeddingProviderConfig,
    complete: boolean,
    directory: string,
  ): Promise<Outcome<IndexMetadata>> {
    const metadata: IndexMetadata = {
      embeddingProvider: config.provider,
      embeddingModelName: config.model,
      dimensions: store.dimensions,
      fragmentCount: store.size,
      documentCount: store.documentCount,
      createdAt: new Date().toISOString(),
      complete,
    };

    const result = await this.persistStage.execute(directory, store, metadata);
    if (!result.success) {
      return result;
    }
    return succeed(metadata);
  }
}
