import { RagError, RagErrorKind } from '../../common/errors';

export class IndexBuildInProgressError extends RagError {
  constructor(startedAt: string) {
    super(
      RagErrorKind.CONFLICT,
      'INDEX_BUILD_IN_PROGRESS',
      `An index build is already running (started ${startedAt})`,
    );
    this.name = 'IndexBuildInProgressError';
  }
}

export class IndexBuildError extends RagError {
  constructor(message: string, originalError?: Error) {
    super(
      RagErrorKind.SERVICE,
      'INDEX_BUILD_FAILED',
      `Index build failed: ${message}`,
      false,
      originalError,
    );
    this.name = 'IndexBuildError';
  }
}
