import { HttpException, HttpStatus } from '@nestjs/common';
import { RagError, RagErrorKind } from './rag-error';

const STATUS_BY_KIND: Record<RagErrorKind, HttpStatus> = {
  [RagErrorKind.INPUT]: HttpStatus.BAD_REQUEST,
  [RagErrorKind.CONFIGURATION]: HttpStatus.UNPROCESSABLE_ENTITY,
  [RagErrorKind.SERVICE]: HttpStatus.BAD_GATEWAY,
  [RagErrorKind.TIMEOUT]: HttpStatus.GATEWAY_TIMEOUT,
  [RagErrorKind.INTEGRITY]: HttpStatus.CONFLICT,
  [RagErrorKind.CANCELLED]: HttpStatus.CONFLICT,
  [RagErrorKind.CONFLICT]: HttpStatus.CONFLICT,
};

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  kind: RagErrorKind;
  message: string;
}

/**
 * Convert a pipeline failure into the HTTP exception a controller throws.
 */
export function toHttpException(error: RagError): HttpException {
  const statusCode = STATUS_BY_KIND[error.kind];
  const body: ErrorResponseBody = {
    statusCode,
    error: error.code,
    kind: error.kind,
    message: error.message,
  };
  return new HttpException(body, statusCode, { cause: error });
}
