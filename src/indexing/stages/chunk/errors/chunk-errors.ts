/**
 * Chunk Stage Error Classes
 */

import { RagError, RagErrorKind } from '../../../../common/errors';

export class InvalidChunkingConfigError extends RagError {
  constructor(message: string) {
    super(RagErrorKind.CONFIGURATION, 'CHUNK_INVALID_CONFIG', message);
    this.name = 'InvalidChunkingConfigError';
  }
}
