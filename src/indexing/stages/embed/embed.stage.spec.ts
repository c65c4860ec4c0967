import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Document } from '@langchain/core/documents';
import type { Embeddings } from '@langchain/core/embeddings';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { HashingEmbeddings } from '../../../../test/utils/hashing-embeddings';
import {
  MissingCredentialError,
  RagErrorKind,
  fail,
  type Outcome,
} from '../../../common/errors';
import { EmbeddingProviderFactory } from '../../../vector-store/embedding-provider.factory';
import { metadataFilePath, type IndexMetadata } from '../../../vector-store/index-layout';
import type { LocalVectorStore } from '../../../vector-store/local-vector.store';
import type { Fragment, FragmentMetadata } from '../chunk/types';
import type { IngestionProgress } from '../load/types';
import { IndexWriteError, PersistStage, type PersistResult } from '../persist';
import { EmbedStage } from './embed.stage';
import { PartialIndexError } from './errors/embed-errors';

// Rejects oversized payloads, listed texts, and the first `failuresLeft` calls.
class FlakyEmbeddings extends HashingEmbeddings {
  attempts = 0;

  constructor(
    private readonly maxBatch = Infinity,
    private readonly poisoned: string[] = [],
    private failuresLeft = 0,
  ) {
    super({ dimensions: 16 });
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.attempts++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('service unavailable');
    }
    if (texts.length > this.maxBatch) {
      throw new Error('payload too large');
    }
    if (texts.some((text) => this.poisoned.includes(text))) {
      throw new Error('internal error');
    }
    return super.embedDocuments(texts);
  }
}

// Fails the listed (1-based) write calls, delegates the others.
class FailingPersistStage extends PersistStage {
  calls = 0;

  constructor(
    configService: ConfigService,
    private readonly failingCalls: number[],
  ) {
    super(configService);
  }

  async execute(
    directory: string,
    store: LocalVectorStore,
    metadata: IndexMetadata,
  ): Promise<Outcome<PersistResult>> {
    this.calls++;
    if (this.failingCalls.includes(this.calls)) {
      return fail(new IndexWriteError(directory, 'disk full'));
    }
    return super.execute(directory, store, metadata);
  }
}

function fragments(count: number): Fragment[] {
  return Array.from({ length: count }, (_, i) => {
    const source = `doc-${i % 2}.xml`;
    return new Document<FragmentMetadata>({
      id: `${source}#${i}`,
      pageContent: `fragment numero ${i} sur le paludisme`,
      metadata: {
        source,
        title: 'Bulletin',
        date: '1923',
        year: 1923,
        persons: [],
      },
    });
  });
}

async function readMetadata(directory: string): Promise<unknown> {
  return JSON.parse(await readFile(metadataFilePath(directory), 'utf8'));
}

describe('EmbedStage', () => {
  let workDir: string;
  let directory: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'embed-stage-'));
    directory = join(workDir, 'index');
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  const config = new ConfigService({
    EMBEDDING_FALLBACK_BATCH_SIZE: '2',
    EMBEDDING_MAX_RETRIES: '3',
    EMBEDDING_RETRY_DELAY_MS: '0',
  });

  async function createStage(
    createEmbeddingModel: () => Embeddings,
    persistStage: PersistStage = new PersistStage(config),
  ): Promise<EmbedStage> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        EmbedStage,
        { provide: PersistStage, useValue: persistStage },
        {
          provide: EmbeddingProviderFactory,
          useValue: {
            getProviderConfig: () => ({
              provider: 'ollama',
              model: 'hashing-test',
            }),
            createEmbeddingModel,
          },
        },
        { provide: ConfigService, useValue: config },
      ],
    }).compile();

    return moduleRef.get(EmbedStage);
  }

  it('embeds everything in one call when the service accepts it', async () => {
    const embeddings = new FlakyEmbeddings();
    const stage = await createStage(() => embeddings);

    const outcome = await stage.execute(fragments(3), { directory });

    if (!outcome.success) throw outcome.error;
    expect(outcome.value.mode).toBe('bulk');
    expect(outcome.value.store.size).toBe(3);
    expect(embeddings.attempts).toBe(1);
    expect(await readMetadata(directory)).toMatchObject({
      embeddingProvider: 'ollama',
      embeddingModelName: 'hashing-test',
      dimensions: 16,
      fragmentCount: 3,
      documentCount: 2,
      complete: true,
    });
  });

  it('falls back to batches when the bulk call is rejected', async () => {
    const embeddings = new FlakyEmbeddings(2);
    const stage = await createStage(() => embeddings);
    const events: IngestionProgress[] = [];

    const outcome = await stage.execute(fragments(5), {
      directory,
      onProgress: (event) => events.push(event),
    });

    if (!outcome.success) throw outcome.error;
    expect(outcome.value.mode).toBe('batched');
    expect(outcome.value.batchCount).toBe(3);
    expect(outcome.value.store.size).toBe(5);
    expect(events.map((event) => event.message)).toEqual([
      'Processing batch 1/3...',
      'Processing batch 2/3...',
      'Processing batch 3/3...',
    ]);
    expect(await readMetadata(directory)).toMatchObject({
      fragmentCount: 5,
      complete: true,
    });
  });

  it('reports a failed write after the bulk call without embedding again', async () => {
    const embeddings = new FlakyEmbeddings();
    const persistStage = new FailingPersistStage(config, [1]);
    const stage = await createStage(() => embeddings, persistStage);

    const outcome = await stage.execute(fragments(3), { directory });

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(IndexWriteError);
    expect(outcome.error.code).toBe('INDEX_WRITE_FAILED');
    expect(embeddings.attempts).toBe(1);
    expect(persistStage.calls).toBe(1);
  });

  it('keeps the written batches when a later write fails', async () => {
    const embeddings = new FlakyEmbeddings(2);
    // the rejected bulk call writes nothing, so write 2 is batch 2
    const persistStage = new FailingPersistStage(config, [2]);
    const stage = await createStage(() => embeddings, persistStage);

    const outcome = await stage.execute(fragments(5), { directory });

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(PartialIndexError);
    if (!(outcome.error instanceof PartialIndexError)) return;
    expect(outcome.error.metadata.fragmentCount).toBe(2);
    expect(outcome.error.metadata.complete).toBe(false);
    expect(outcome.error.totalFragments).toBe(5);
    expect(outcome.error.originalError).toBeInstanceOf(IndexWriteError);
    expect(persistStage.calls).toBe(2);
    expect(await readMetadata(directory)).toMatchObject({
      fragmentCount: 2,
      complete: false,
    });
  });

  it('fails outright when the first batch cannot be written', async () => {
    const embeddings = new FlakyEmbeddings(2);
    const persistStage = new FailingPersistStage(config, [1]);
    const stage = await createStage(() => embeddings, persistStage);

    const outcome = await stage.execute(fragments(5), { directory });

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(IndexWriteError);
    expect(persistStage.calls).toBe(1);
  });

  it('retries a failing batch before giving up on it', async () => {
    const embeddings = new FlakyEmbeddings(Infinity, [], 2);
    const stage = await createStage(() => embeddings);

    const outcome = await stage.execute(fragments(2), { directory });

    if (!outcome.success) throw outcome.error;
    expect(outcome.value.mode).toBe('batched');
    // bulk, failed batch attempt, successful retry
    expect(embeddings.attempts).toBe(3);
  });

  it('reports a partial index when a later batch keeps failing', async () => {
    const embeddings = new FlakyEmbeddings(2, [
      'fragment numero 4 sur le paludisme',
    ]);
    const stage = await createStage(() => embeddings);

    const outcome = await stage.execute(fragments(5), { directory });

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error).toBeInstanceOf(PartialIndexError);
    if (!(outcome.error instanceof PartialIndexError)) return;
    expect(outcome.error.store.size).toBe(4);
    expect(outcome.error.totalFragments).toBe(5);
    expect(outcome.error.kind).toBe(RagErrorKind.SERVICE);
    expect(await readMetadata(directory)).toMatchObject({
      fragmentCount: 4,
      complete: false,
    });
  });

  it('fails outright when the first batch cannot be embedded', async () => {
    const embeddings = new FlakyEmbeddings(2, [
      'fragment numero 0 sur le paludisme',
    ]);
    const stage = await createStage(() => embeddings);

    const outcome = await stage.execute(fragments(3), { directory });

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error).not.toBeInstanceOf(PartialIndexError);
    expect(outcome.error.code).toBe('EMBEDDING_FAILED');
    // bulk plus three attempts on the first batch
    expect(embeddings.attempts).toBe(4);
  });

  it('stops between batches once cancelled and keeps what was written', async () => {
    const embeddings = new FlakyEmbeddings(2);
    const stage = await createStage(() => embeddings);
    const controller = new AbortController();

    const outcome = await stage.execute(fragments(5), {
      directory,
      signal: controller.signal,
      onProgress: (event) => {
        if (event.current === 2) controller.abort();
      },
    });

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error.kind).toBe(RagErrorKind.CANCELLED);
    expect(await readMetadata(directory)).toMatchObject({
      fragmentCount: 4,
      complete: false,
    });
  });

  it('blocks on a missing credential without calling the service', async () => {
    const stage = await createStage(() => {
      throw new MissingCredentialError('OPENAI_API_KEY', 'OpenAI embeddings');
    });

    const outcome = await stage.execute(fragments(2), { directory });

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error.kind).toBe(RagErrorKind.CONFIGURATION);
    expect(outcome.error.code).toBe('MISSING_CREDENTIAL');
  });

  it('refuses an empty fragment list', async () => {
    const stage = await createStage(() => new FlakyEmbeddings());

    const outcome = await stage.execute([], { directory });

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.error.code).toBe('NO_FRAGMENTS');
  });
});
