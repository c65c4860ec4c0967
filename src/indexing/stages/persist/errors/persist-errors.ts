/**
 * Persist Stage Error Classes
 */

import { RagError, RagErrorKind } from '../../../../common/errors';

export class IndexWriteError extends RagError {
  constructor(
    public readonly directory: string,
    message: string,
    originalError?: Error,
  ) {
    super(
      RagErrorKind.SERVICE,
      'INDEX_WRITE_FAILED',
      `Failed to persist index to ${directory}: ${message}`,
      true,
      originalError,
    );
    this.name = 'IndexWriteError';
  }
}
