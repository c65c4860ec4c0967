/**
 * Index Loader
 *
 * Restores a persisted index and wraps it in a retriever handle. Checks run
 * in order: directory, index file, sidecar metadata. Missing or unreadable
 * metadata is not fatal: the configured embedding model is used instead and
 * the handle is flagged `usedFallback`.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Embeddings } from '@langchain/core/embeddings';
import { readFile, stat } from 'fs/promises';
import {
  RagError,
  fail,
  succeed,
  toError,
  type Outcome,
} from '../../common/errors';
import { getNumber, getPositiveInt, withTimeout } from '../../common/utils';
import { EmbeddingProviderFactory } from '../../vector-store/embedding-provider.factory';
import {
  INDEX_FILE,
  METADATA_FILE,
  indexFilePath,
  metadataFilePath,
  parseIndexMetadata,
  type IndexMetadata,
} from '../../vector-store/index-layout';
import { LocalVectorStore } from '../../vector-store/local-vector.store';
import {
  DimensionMismatchError,
  IndexIntegrityError,
} from '../../vector-store/vector-store.errors';
import type { IndexHandle, RetrievalSettings } from '../types';

const DEFAULT_K = 3;
const DEFAULT_FETCH_K = 20;
const DEFAULT_LAMBDA = 0.5;
const DEFAULT_IO_TIMEOUT_MS = 30000;

type MetadataRead =
  | { status: 'ok'; raw: unknown }
  | { status: 'missing' }
  | { status: 'unreadable'; reason: string };

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function fileModifiedAt(path: string): Promise<string | null> {
  try {
    return (await stat(path)).mtime.toISOString();
  } catch {
    return null;
  }
}

@Injectable()
export class IndexLoader {
  private readonly logger = new Logger(IndexLoader.name);
  private readonly settings: RetrievalSettings;
  private readonly ioTimeoutMs: number;

  constructor(
    private readonly embeddingProviderFactory: EmbeddingProviderFactory,
    private readonly configService: ConfigService,
  ) {
    const k = getPositiveInt(this.configService, 'RETRIEVAL_K', DEFAULT_K);
    this.settings = {
      k,
      fetchK: Math.max(
        k,
        getPositiveInt(this.configService, 'RETRIEVAL_FETCH_K', DEFAULT_FETCH_K),
      ),
      lambda: Math.min(
        1,
        Math.max(
          0,
          getNumber(this.configService, 'RETRIEVAL_MMR_LAMBDA', DEFAULT_LAMBDA),
        ),
      ),
    };
    this.ioTimeoutMs = getPositiveInt(
      this.configService,
      'INDEX_IO_TIMEOUT_MS',
      DEFAULT_IO_TIMEOUT_MS,
    );
  }

  getSettings(): RetrievalSettings {
    return { ...this.settings };
  }

  /**
   * Location of the precomputed index shipped with the corpus.
   */
  getPrecomputedDirectory(): string {
    return this.configService.get<string>(
      'PRECOMPUTED_INDEX_DIR',
      'embeddings/vector_index',
    );
  }

  /**
   * Whether `directory` holds an index file, without loading it.
   */
  async isAvailable(directory: string): Promise<boolean> {
    return (
      (await isDirectory(directory)) &&
      (await fileModifiedAt(indexFilePath(directory))) !== null
    );
  }

  async load(directory: string): Promise<Outcome<IndexHandle>> {
    const startTime = Date.now();
    this.logger.log(`Loading index from ${directory}`);

    try {
      const handle = await withTimeout(
        () => this.restore(directory),
        this.ioTimeoutMs,
        `Loading index from ${directory}`,
      );
      this.logger.log(
        `✅ Index loaded in ${Date.now() - startTime}ms: ` +
          `${handle.metadata.fragmentCount} fragments from ${handle.metadata.documentCount} documents ` +
          `(${handle.metadata.embeddingProvider}/${handle.metadata.embeddingModelName})`,
      );
      return succeed(handle);
    } catch (error) {
      const cause = toError(error);
      const failure =
        cause instanceof RagError
          ? cause
          : new IndexIntegrityError(directory, cause.message, cause);
      this.logger.error(`❌ Failed to load index: ${failure.message}`);
      return fail(failure);
    }
  }

  /**
   * Wrap a store in a handle configured for diverse top-k retrieval.
   */
  createHandle(
    store: LocalVectorStore,
    metadata: IndexMetadata,
    directory: string,
    usedFallback = false,
  ): IndexHandle {
    const settings = this.getSettings();
    return {
      store,
      retriever: store.asRetriever({
        k: settings.k,
        searchType: 'mmr',
        searchKwargs: { fetchK: settings.fetchK, lambda: settings.lambda },
      }),
      metadata,
      directory,
      settings,
      usedFallback,
      activatedAt: new Date().toISOString(),
    };
  }

  private async restore(directory: string): Promise<IndexHandle> {
    // Step 1: Directory
    if (!(await isDirectory(directory))) {
      throw new IndexIntegrityError(
        directory,
        `Index directory not found: ${directory}`,
      );
    }

    // Step 2: Index file
    const indexPath = indexFilePath(directory);
    const indexModifiedAt = await fileModifiedAt(indexPath);
    if (indexModifiedAt === null) {
      throw new IndexIntegrityError(
        INDEX_FILE,
        `Index file not found at ${indexPath}`,
      );
    }

    // Step 3: Sidecar metadata (optional)
    const configured = this.embeddingProviderFactory.getProviderConfig();
    const metadataRead = await this.readMetadata(directory);
    let recorded: IndexMetadata | null = null;
    if (metadataRead.status === 'ok') {
      recorded = parseIndexMetadata(metadataRead.raw, {
        embeddingProvider: configured.provider,
        dimensions: null,
        fragmentCount: 0,
        documentCount: 0,
        createdAt: indexModifiedAt,
        complete: true,
      });
      if (recorded === null) {
        this.logger.warn(
          'Model information not found in metadata, using default model',
        );
      }
    } else if (metadataRead.status === 'missing') {
      this.logger.warn('Metadata file not found. Using default embedding model.');
    } else {
      this.logger.warn(`Error loading metadata: ${metadataRead.reason}`);
    }

    // Step 4: Embedding function of the recorded (or default) model
    const provider = recorded?.embeddingProvider ?? configured.provider;
    const model = recorded?.embeddingModelName ?? configured.model;
    const embeddings: Embeddings =
      this.embeddingProviderFactory.createEmbeddingModel(provider, model);

    // Step 5: Vectors and fragments
    const store = await this.readStore(indexPath, embeddings);
    const metadata = this.reconcile(
      recorded,
      store,
      provider,
      model,
      indexModifiedAt,
    );

    if (!metadata.complete) {
      this.logger.warn(
        `Index at ${directory} is marked incomplete (${metadata.fragmentCount} fragments)`,
      );
    }

    return this.createHandle(store, metadata, directory, recorded === null);
  }

  private async readMetadata(directory: string): Promise<MetadataRead> {
    let text: string;
    try {
      text = await readFile(metadataFilePath(directory), 'utf8');
    } catch (error) {
      const cause = toError(error);
      if ('code' in cause && cause.code === 'ENOENT') {
        return { status: 'missing' };
      }
      return { status: 'unreadable', reason: cause.message };
    }

    try {
      const raw: unknown = JSON.parse(text);
      return { status: 'ok', raw };
    } catch (error) {
      return {
        status: 'unreadable',
        reason: `${METADATA_FILE} is not valid JSON (${toError(error).message})`,
      };
    }
  }

  private async readStore(
    indexPath: string,
    embeddings: Embeddings,
  ): Promise<LocalVectorStore> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(indexPath, 'utf8'));
    } catch (error) {
      const cause = toError(error);
      throw new IndexIntegrityError(
        INDEX_FILE,
        `Index file at ${indexPath} is unreadable: ${cause.message}`,
        cause,
      );
    }
    return LocalVectorStore.fromSerialized(raw, embeddings);
  }

  /**
   * The store is the source of truth for counts; a sidecar that disagrees
   * with it describes some other index.
   */
  private reconcile(
    recorded: IndexMetadata | null,
    store: LocalVectorStore,
    provider: IndexMetadata['embeddingProvider'],
    model: string,
    createdAt: string,
  ): IndexMetadata {
    if (recorded === null) {
      return {
        embeddingProvider: provider,
        embeddingModelName: model,
        dimensions: store.dimensions,
        fragmentCount: store.size,
        documentCount: store.documentCount,
        createdAt,
        complete: true,
      };
    }

    if (
      recorded.dimensions !== null &&
      store.dimensions !== null &&
      recorded.dimensions !== store.dimensions
    ) {
      throw new DimensionMismatchError(
        recorded.dimensions,
        store.dimensions,
        METADATA_FILE,
      );
    }
    if (recorded.fragmentCount > 0 && recorded.fragmentCount !== store.size) {
      throw new IndexIntegrityError(
        METADATA_FILE,
        `${METADATA_FILE} records ${recorded.fragmentCount} fragments but ${INDEX_FILE} holds ${store.size}`,
      );
    }

    return {
      ...recorded,
      dimensions: store.dimensions,
      fragmentCount: store.size,
      documentCount:
        recorded.documentCount > 0 ? recorded.documentCount : store.documentCount,
    };
  }
}
