/**
 * Retriever Service
 * Diverse top-k retrieval (maximal marginal relevance) over the active index
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Document, type DocumentInterface } from '@langchain/core/documents';
import {
  RagError,
  fail,
  succeed,
  toError,
  type Outcome,
} from '../../common/errors';
import { getPositiveInt, withTimeout } from '../../common/utils';
import type { Fragment } from '../../indexing/stages/chunk/types';
import { isFragmentMetadata } from '../../vector-store/local-vector.store';
import { IndexIntegrityError } from '../../vector-store/vector-store.errors';
import { RetrievalServiceError } from '../errors/retrieval-errors';
import type { IndexHandle, RankedFragment } from '../types';

const DEFAULT_TIMEOUT_MS = 120000;

function toFragment(document: DocumentInterface): Fragment {
  const { metadata } = document;
  if (!isFragmentMetadata(metadata)) {
    throw new IndexIntegrityError(
      'metadata',
      `Retrieved fragment ${document.id ?? '(no id)'} has no source metadata`,
    );
  }
  return new Document({
    id: document.id,
    pageContent: document.pageContent,
    metadata,
  });
}

@Injectable()
export class RetrieverService {
  private readonly logger = new Logger(RetrieverService.name);
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.timeoutMs = getPositiveInt(
      this.configService,
      'EMBEDDING_TIMEOUT_MS',
      DEFAULT_TIMEOUT_MS,
    );
  }

  /**
   * Ranks are 1..n in retrieval order, n ≤ k and n ≤ fragments in the index.
   * An empty list is a valid result.
   */
  async retrieve(
    handle: IndexHandle,
    query: string,
  ): Promise<Outcome<RankedFragment[]>> {
    const startTime = Date.now();

    try {
      const documents = await withTimeout(
        (signal) => handle.retriever.invoke(query, { signal }),
        this.timeoutMs,
        'Query embedding',
      );
      const fragments = documents.map(toFragment);

      this.logger.log(
        `Retrieved ${fragments.length} fragments ` +
          `(k=${handle.settings.k}, fetchK=${handle.settings.fetchK}) in ${Date.now() - startTime}ms`,
      );

      return succeed(
        fragments.map((fragment, index) => ({ rank: index + 1, fragment })),
      );
    } catch (error) {
      const cause = toError(error);
      const failure =
        cause instanceof RagError
          ? cause
          : new RetrievalServiceError(cause.message, cause);
      this.logger.error(`Retrieval failed: ${failure.message}`);
      return fail(failure);
    }
  }
}
