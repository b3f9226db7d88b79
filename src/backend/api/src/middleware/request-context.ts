/**
 * Request Context Middleware
 *
 * Attaches a correlation id (taken from X-Correlation-ID when the caller
 * sends one) and a fresh request id to every API request, and echoes both
 * back as response headers.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

export interface RequestContext {
  correlationId: string;
  requestId: string;
  startTime: number;
}

export interface ContextualRequest extends Request {
  context?: RequestContext;
}

export const CORRELATION_HEADER = 'X-Correlation-ID';
export const REQUEST_ID_HEADER = 'X-Request-ID';

function createRequestContext(req: Request): RequestContext {
  const supplied = req.get(CORRELATION_HEADER)?.trim();
  return {
    correlationId: supplied ? supplied : uuidv4(),
    requestId: uuidv4(),
    startTime: Date.now(),
  };
}

export function addRequestContext(req: ContextualRequest, res: Response, next: NextFunction): void {
  const context = createRequestContext(req);
  req.context = context;
  res.setHeader(CORRELATION_HEADER, context.correlationId);
  res.setHeader(REQUEST_ID_HEADER, context.requestId);
  next();
}

/**
 * Context of a request, created on the spot if the middleware did not run
 */
export function getRequestContext(req: ContextualRequest): RequestContext {
  if (!req.context) {
    req.context = createRequestContext(req);
  }
  return req.context;
}
