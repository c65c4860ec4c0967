/**
 * Retrieval & Generation Error Classes
 */

import { RagError, RagErrorKind } from '../../common/errors';

export class PromptTemplateError extends RagError {
  constructor(message: string, originalError?: Error) {
    super(
      RagErrorKind.CONFIGURATION,
      'PROMPT_TEMPLATE_INVALID',
      `Invalid query template: ${message}`,
      false,
      originalError,
    );
    this.name = 'PromptTemplateError';
  }
}

export class UnknownBackendError extends RagError {
  constructor(public readonly backend: string) {
    super(
      RagErrorKind.CONFIGURATION,
      'UNKNOWN_BACKEND',
      `Unknown generation backend: ${backend}`,
    );
    this.name = 'UnknownBackendError';
  }
}

export class NoActiveIndexError extends RagError {
  constructor() {
    super(
      RagErrorKind.CONFIGURATION,
      'NO_ACTIVE_INDEX',
      'No index is active: load or build an index first',
    );
    this.name = 'NoActiveIndexError';
  }
}

export type GenerationFailureReason =
  | 'auth'
  | 'rate_limit'
  | 'malformed_request'
  | 'unavailable'
  | 'empty_answer';

const RETRYABLE_REASONS: readonly GenerationFailureReason[] = [
  'rate_limit',
  'unavailable',
];

export class GenerationError extends RagError {
  constructor(
    public readonly reason: GenerationFailureReason,
    public readonly backend: string,
    message: string,
    originalError?: Error,
  ) {
    super(
      RagErrorKind.SERVICE,
      'GENERATION_FAILED',
      `Generation with ${backend} failed (${reason}): ${message}`,
      RETRYABLE_REASONS.includes(reason),
      originalError,
    );
    this.name = 'GenerationError';
  }
}

export class RetrievalServiceError extends RagError {
  constructor(message: string, originalError?: Error) {
    super(
      RagErrorKind.SERVICE,
      'RETRIEVAL_FAILED',
      `Retrieval failed: ${message}`,
      true,
      originalError,
    );
    this.name = 'RetrievalServiceError';
  }
}
