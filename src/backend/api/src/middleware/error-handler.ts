/**
 * Error Responses
 *
 * One JSON error shape for every failure, with the correlation id of the
 * request. Engine errors keep their code; anything else becomes a 500.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import type { NextFunction, Request, Response } from 'express';

import {
  ErrorCode,
  getLogger,
  isServiceMatchError,
  type FieldErrorDetail,
  type Logger,
} from '@service-match/shared';

import { getRequestContext, type ContextualRequest } from './request-context.js';

export interface ApiErrorResponse {
  error: string;
  message: string;
  correlationId?: string;
  details?: FieldErrorDetail[];
}

export function createErrorResponse(
  error: string,
  message: string,
  correlationId?: string,
  details?: FieldErrorDetail[]
): ApiErrorResponse {
  return {
    error,
    message,
    correlationId,
    details,
  };
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.INVALID_ARGUMENT]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.CONFIGURATION]: 500,
  [ErrorCode.CATALOG]: 500,
};

export function statusForErrorCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * body-parser marks malformed JSON with type 'entity.parse.failed'
 */
function isJsonParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export function notFoundHandler(req: ContextualRequest, res: Response): void {
  const { correlationId } = getRequestContext(req);
  res
    .status(404)
    .json(createErrorResponse('NotFound', 'The requested resource was not found', correlationId));
}

export function createErrorHandler(logger: Logger = getLogger()) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const { correlationId } = getRequestContext(req);

    if (isServiceMatchError(error)) {
      const status = statusForErrorCode(error.code);
      if (status >= 500) {
        logger.error('Request failed', error, { correlationId, path: req.path });
      }
      res
        .status(status)
        .json(
          createErrorResponse(
            error.code,
            error.message,
            correlationId,
            error.details.length > 0 ? error.details : undefined
          )
        );
      return;
    }

    if (isJsonParseError(error)) {
      res
        .status(400)
        .json(createErrorResponse(ErrorCode.VALIDATION, 'Request body is not valid JSON', correlationId));
      return;
    }

    logger.error(
      'Unhandled error',
      error instanceof Error ? error : new Error(String(error)),
      { correlationId, path: req.path }
    );
    res
      .status(500)
      .json(createErrorResponse('InternalError', 'An unexpected error occurred', correlationId));
  };
}
