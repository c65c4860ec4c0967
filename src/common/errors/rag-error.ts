/**
 * Error taxonomy shared by every pipeline stage.
 *
 * Stages never throw across a module boundary: they return an `Outcome`
 * whose failure branch carries a `RagError`. The kind decides how the
 * caller reacts (skip, block, retry, report).
 */

export enum RagErrorKind {
  // Unreadable or malformed source file (skip and continue)
  INPUT = 'input',
  // Missing credential, malformed template (block, no retry)
  CONFIGURATION = 'configuration',
  // Embedding or generation endpoint failure
  SERVICE = 'service',
  // Bounded operation exceeded its deadline
  TIMEOUT = 'timeout',
  // Missing or inconsistent persisted index
  INTEGRITY = 'integrity',
  // Operation abandoned by the caller
  CANCELLED = 'cancelled',
  // Refused because a conflicting operation is running
  CONFLICT = 'conflict',
}

export class RagError extends Error {
  constructor(
    public readonly kind: RagErrorKind,
    public readonly code: string,
    message: string,
    public readonly retryable = false,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'RagError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class MissingCredentialError extends RagError {
  constructor(public readonly credential: string, consumer: string) {
    super(
      RagErrorKind.CONFIGURATION,
      'MISSING_CREDENTIAL',
      `${credential} is required for ${consumer}`,
    );
    this.name = 'MissingCredentialError';
  }
}

export class OperationTimeoutError extends RagError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(
      RagErrorKind.TIMEOUT,
      'TIMEOUT',
      `${operation} timed out after ${timeoutMs}ms`,
      true,
    );
    this.name = 'OperationTimeoutError';
  }
}

export class OperationCancelledError extends RagError {
  constructor(operation: string) {
    super(RagErrorKind.CANCELLED, 'CANCELLED', `${operation} was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

export type Outcome<T, E extends RagError = RagError> =
  | { success: true; value: T }
  | { success: false; error: E };

export function succeed<T>(value: T): Outcome<T, never> {
  return { success: true, value };
}

export function fail<E extends RagError>(error: E): Outcome<never, E> {
  return { success: false, error };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
