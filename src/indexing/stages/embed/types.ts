import type { IndexMetadata } from '../../../vector-store/index-layout';
import type { LocalVectorStore } from '../../../vector-store/local-vector.store';
import type { ProgressListener } from '../load/types';

export interface BuildOptions {
  directory: string;
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

export interface BuiltIndex {
  store: LocalVectorStore;
  metadata: IndexMetadata;
  directory: string;
  // 'bulk' when a single embedding call succeeded
  mode: 'bulk' | 'batched';
  batchCount: number;
  durationMs: number;
}
