/**
 * In-process vector store over the fragments of one corpus snapshot.
 *
 * Cosine similarity over every stored vector, plus maximal marginal
 * relevance re-ranking for diverse top-k retrieval. Instances are built
 * once and then only read; a rebuilt index is a new instance.
 */

import { Document, type DocumentInterface } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import {
  VectorStore,
  type MaxMarginalRelevanceSearchOptions,
} from '@langchain/core/vectorstores';
import {
  cosineSimilarity,
  maximalMarginalRelevance,
} from '@langchain/core/utils/math';
import { v4 as uuidv4 } from 'uuid';
import type { Fragment, FragmentMetadata } from '../indexing/stages/chunk/types';
import { DimensionMismatchError, IndexIntegrityError } from './vector-store.errors';

export const SERIALIZATION_VERSION = 1;

export interface VectorEntry {
  id: string;
  content: string;
  metadata: FragmentMetadata;
  embedding: number[];
}

export interface SerializedVectorStore {
  version: number;
  dimensions: number | null;
  entries: VectorEntry[];
}

interface ScoredEntry {
  entry: VectorEntry;
  score: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isNumberArray(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.every((item) => typeof item === 'number' && Number.isFinite(item))
  );
}

export function isFragmentMetadata(value: unknown): value is FragmentMetadata {
  return (
    isRecord(value) &&
    typeof value.source === 'string' &&
    typeof value.title === 'string' &&
    typeof value.date === 'string' &&
    (value.year === null || typeof value.year === 'number') &&
    isStringArray(value.persons)
  );
}

export class LocalVectorStore extends VectorStore {
  declare FilterType: (doc: Fragment) => boolean;

  private readonly entries: VectorEntry[] = [];
  private vectorDimensions: number | null = null;

  _vectorstoreType(): string {
    return 'local';
  }

  constructor(embeddings: EmbeddingsInterface) {
    super(embeddings, {});
  }

  get size(): number {
    return this.entries.length;
  }

  get dimensions(): number | null {
    return this.vectorDimensions;
  }

  get documentCount(): number {
    return new Set(this.entries.map((entry) => entry.metadata.source)).size;
  }

  async addDocuments(documents: DocumentInterface[]): Promise<string[]> {
    const vectors = await this.embeddings.embedDocuments(
      documents.map((document) => document.pageContent),
    );
    return this.addVectors(vectors, documents);
  }

  /**
   * @throws IndexIntegrityError when vectors and documents do not pair up
   * @throws DimensionMismatchError when a vector's length differs from the
   *   store's
   */
  async addVectors(
    vectors: number[][],
    documents: DocumentInterface[],
  ): Promise<string[]> {
    if (vectors.length !== documents.length) {
      throw new IndexIntegrityError(
        'vectors',
        `Received ${vectors.length} vectors for ${documents.length} fragments`,
      );
    }

    const incoming: VectorEntry[] = documents.map((document, index) => {
      if (!isFragmentMetadata(document.metadata)) {
        throw new IndexIntegrityError(
          'metadata',
          `Fragment ${document.id ?? index} is missing source metadata`,
        );
      }
      const embedding = vectors[index];
      this.checkDimensions(embedding.length, 'Adding vectors');
      if (this.vectorDimensions === null) {
        this.vectorDimensions = embedding.length;
      }
      return {
        id: document.id ?? uuidv4(),
        content: document.pageContent,
        metadata: document.metadata,
        embedding: [...embedding],
      };
    });

    this.entries.push(...incoming);
    return incoming.map((entry) => entry.id);
  }

  async similaritySearchVectorWithScore(
    query: number[],
    k: number,
    filter?: this['FilterType'],
  ): Promise<[Fragment, number][]> {
    return this.rank(query, k, filter).map(({ entry, score }) => [
      toFragment(entry),
      score,
    ]);
  }

  async maxMarginalRelevanceSearch(
    query: string,
    options: MaxMarginalRelevanceSearchOptions<this['FilterType']>,
  ): Promise<Fragment[]> {
    const { k, fetchK = 20, lambda = 0.5, filter } = options;
    if (this.entries.length === 0 || k <= 0) {
      return [];
    }
    const queryEmbedding = await this.embeddings.embedQuery(query);

    const candidates = this.rank(queryEmbedding, fetchK, filter);
    if (candidates.length === 0 || k <= 0) {
      return [];
    }

    const selected = maximalMarginalRelevance(
      queryEmbedding,
      candidates.map(({ entry }) => entry.embedding),
      lambda,
      k,
    );
    return selected.map((index) => toFragment(candidates[index].entry));
  }

  serialize(): SerializedVectorStore {
    return {
      version: SERIALIZATION_VERSION,
      dimensions: this.vectorDimensions,
      entries: this.entries.map((entry) => ({
        ...entry,
        metadata: { ...entry.metadata, persons: [...entry.metadata.persons] },
        embedding: [...entry.embedding],
      })),
    };
  }

  /**
   * Rebuild a store from its serialized form, checking that every entry is
   * complete (no vector without metadata and vice versa) and that all
   * vectors share one dimension.
   */
  static fromSerialized(
    data: unknown,
    embeddings: EmbeddingsInterface,
  ): LocalVectorStore {
    if (!isRecord(data) || !Array.isArray(data.entries)) {
      throw new IndexIntegrityError('index', 'Index data has no entry list');
    }
    if (data.version !== SERIALIZATION_VERSION) {
      throw new IndexIntegrityError(
        'index',
        `Unsupported index version ${String(data.version)}`,
      );
    }

    const store = new LocalVectorStore(embeddings);
    const ids = new Set<string>();
    data.entries.forEach((raw: unknown, index: number) => {
      if (!isRecord(raw) || typeof raw.id !== 'string') {
        throw new IndexIntegrityError('entry', `Entry ${index} has no id`);
      }
      if (ids.has(raw.id)) {
        throw new IndexIntegrityError('entry', `Duplicate entry id ${raw.id}`);
      }
      if (!isNumberArray(raw.embedding) || raw.embedding.length === 0) {
        throw new IndexIntegrityError(
          'vector',
          `Entry ${raw.id} has no vector (orphan metadata)`,
        );
      }
      if (typeof raw.content !== 'string' || !isFragmentMetadata(raw.metadata)) {
        throw new IndexIntegrityError(
          'metadata',
          `Entry ${raw.id} has no metadata (orphan vector)`,
        );
      }
      ids.add(raw.id);
      store.checkDimensions(raw.embedding.length, `Entry ${raw.id}`);
      store.vectorDimensions ??= raw.embedding.length;
      store.entries.push({
        id: raw.id,
        content: raw.content,
        metadata: raw.metadata,
        embedding: raw.embedding,
      });
    });

    if (
      typeof data.dimensions === 'number' &&
      store.vectorDimensions !== null &&
      data.dimensions !== store.vectorDimensions
    ) {
      throw new DimensionMismatchError(
        data.dimensions,
        store.vectorDimensions,
        'Index header',
      );
    }
    return store;
  }

  /**
   * Top `k` entries by cosine similarity. Ties keep insertion order.
   */
  private rank(
    query: number[],
    k: number,
    filter?: this['FilterType'],
  ): ScoredEntry[] {
    const pool = filter
      ? this.entries.filter((entry) => filter(toFragment(entry)))
      : this.entries;
    if (pool.length === 0 || k <= 0) {
      return [];
    }
    this.checkDimensions(query.length, 'Query vector');

    const similarities = cosineSimilarity(
      [query],
      pool.map((entry) => entry.embedding),
    )[0];

    return pool
      .map((entry, index) => {
        const score = similarities[index];
        return { entry, score: Number.isFinite(score) ? score : 0 };
      })
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  private checkDimensions(length: number, context: string): void {
    if (this.vectorDimensions !== null && length !== this.vectorDimensions) {
      throw new DimensionMismatchError(this.vectorDimensions, length, context);
    }
  }
}

function toFragment(entry: VectorEntry): Fragment {
  return new Document<FragmentMetadata>({
    id: entry.id,
    pageContent: entry.content,
    metadata: { ...entry.metadata, persons: [...entry.metadata.persons] },
  });
}
