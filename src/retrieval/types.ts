/**
 * Retrieval Types
 */

import type { VectorStoreRetriever } from '@langchain/core/vectorstores';
import type { Fragment } from '../indexing/stages/chunk/types';
import type { IndexMetadata } from '../vector-store/index-layout';
import type { LocalVectorStore } from '../vector-store/local-vector.store';

export interface RetrievalSettings {
  k: number;
  fetchK: number;
  lambda: number;
}

/**
 * A ready-to-query index. Never mutated: loading or building another index
 * produces a new handle that replaces this one in the session.
 */
export interface IndexHandle {
  readonly store: LocalVectorStore;
  readonly retriever: VectorStoreRetriever<LocalVectorStore>;
  readonly metadata: IndexMetadata;
  readonly directory: string;
  readonly settings: RetrievalSettings;
  // true when metadata.json was missing or unreadable
  readonly usedFallback: boolean;
  readonly activatedAt: string;
}

export interface RankedFragment {
  // 1-based, in retrieval order
  rank: number;
  fragment: Fragment;
}

export interface AssembledPrompt {
  systemInstruction: string;
  userMessage: string;
  sourceReferences: string;
  context: string;
}
