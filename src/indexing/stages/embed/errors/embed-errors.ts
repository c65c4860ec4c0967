/**
 * Embed Stage Error Classes
 */

import { RagError, RagErrorKind } from '../../../../common/errors';
import type { LocalVectorStore } from '../../../../vector-store/local-vector.store';
import type { IndexMetadata } from '../../../../vector-store/index-layout';

export class EmbeddingServiceError extends RagError {
  constructor(message: string, retryable: boolean, originalError?: Error) {
    super(
      RagErrorKind.SERVICE,
      'EMBEDDING_FAILED',
      `Embedding service failed: ${message}`,
      retryable,
      originalError,
    );
    this.name = 'EmbeddingServiceError';
  }
}

export class NoFragmentsError extends RagError {
  constructor() {
    super(RagErrorKind.INPUT, 'NO_FRAGMENTS', 'No fragments to index');
    this.name = 'NoFragmentsError';
  }
}

/**
 * A batched build lost a later batch. The fragments persisted so far are
 * kept on disk with `complete: false` (`metadata` describes them) so the
 * caller can decide whether to retry or accept them.
 */
export class PartialIndexError extends RagError {
  constructor(
    public readonly store: LocalVectorStore,
    public readonly metadata: IndexMetadata,
    public readonly totalFragments: number,
    cause: RagError,
  ) {
    super(
      RagErrorKind.SERVICE,
      'PARTIAL_INDEX',
      `Index built partially: ${metadata.fragmentCount}/${totalFragments} fragments embedded (${cause.message})`,
      cause.retryable,
      cause,
    );
    this.name = 'PartialIndexError';
  }
}
