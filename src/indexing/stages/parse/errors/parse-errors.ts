/**
 * Parse Stage Error Definitions
 * All parse failures are input errors: the file is skipped, the batch continues.
 */

import { RagError, RagErrorKind } from '../../../../common/errors';

export enum ParseErrorType {
  MALFORMED_XML = 'MALFORMED_XML',
  MISSING_ROOT = 'MISSING_ROOT',
  READ_FAILED = 'READ_FAILED',
}

export class ParseError extends RagError {
  constructor(
    public readonly type: ParseErrorType,
    public readonly filePath: string,
    message: string,
    originalError?: Error,
  ) {
    super(RagErrorKind.INPUT, type, message, false, originalError);
    this.name = 'ParseError';
  }
}

export class MalformedXmlError extends ParseError {
  constructor(
    filePath: string,
    detail: string,
    public readonly line?: number,
  ) {
    super(
      ParseErrorType.MALFORMED_XML,
      filePath,
      line !== undefined
        ? `Malformed XML in ${filePath} at line ${line}: ${detail}`
        : `Malformed XML in ${filePath}: ${detail}`,
    );
    this.name = 'MalformedXmlError';
  }
}

export class MissingRootError extends ParseError {
  constructor(filePath: string) {
    super(
      ParseErrorType.MISSING_ROOT,
      filePath,
      `No root element found in ${filePath}`,
    );
    this.name = 'MissingRootError';
  }
}

export class FileReadError extends ParseError {
  constructor(filePath: string, originalError: Error) {
    super(
      ParseErrorType.READ_FAILED,
      filePath,
      `Cannot read ${filePath}: ${originalError.message}`,
      originalError,
    );
    this.name = 'FileReadError';
  }
}
