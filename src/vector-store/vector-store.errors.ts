import { RagError, RagErrorKind } from '../common/errors';

/**
 * Missing or inconsistent index artifact. `artifact` names what is wrong
 * (a directory, a file, an entry) so the message can be acted on.
 */
export class IndexIntegrityError extends RagError {
  constructor(
    public readonly artifact: string,
    message: string,
    originalError?: Error,
  ) {
    super(RagErrorKind.INTEGRITY, 'INDEX_INTEGRITY', message, false, originalError);
    this.name = 'IndexIntegrityError';
  }
}

export class DimensionMismatchError extends RagError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: string,
  ) {
    super(
      RagErrorKind.INTEGRITY,
      'DIMENSION_MISMATCH',
      `${context}: expected vectors of dimension ${expected}, got ${actual}. ` +
        'The embedding model differs from the one that built the index.',
    );
    this.name = 'DimensionMismatchError';
  }
}
