/**
 * Global Error Handler Middleware
 *
 * Centralized error handling for all Express routes. Errors raised before
 * the webhook hands off to the conversation service (bad signature, unknown
 * route) surface here as JSON.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { createLogger } from '../utils/logger';
import { requestContext } from '../utils/requestContext';
import { AppError } from '../errors';
import { INTERNAL_ERROR } from '../constants/errorMessages';

const logger = createLogger('errorHandler');

// ─────────────────────────────────────────────────────────────────────────────
// Request ID Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Attach a request ID to each request and run the rest of the chain inside
 * the request context, so every log line carries it.
 * Uses an existing X-Request-ID header (or Twilio's I-Twilio-Idempotency-Token) when present.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get('x-request-id') ?? req.get('i-twilio-idempotency-token');
  const requestId = incoming && incoming.trim() ? incoming.trim() : randomUUID();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  requestContext.run({ requestId }, next);
}

export function getRequestId(req: Request): string {
  return req.requestId ?? 'unknown';
}

// ─────────────────────────────────────────────────────────────────────────────
// Async Handler Wrapper
// ─────────────────────────────────────────────────────────────────────────────

type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => Promise<void> | void;

/**
 * Wraps async route handlers to forward rejections to the error handler.
 *
 * @example
 * router.get('/health', asyncHandler(async (_req, res) => {
 *   res.json(await getHealthStatus(deps));
 * }));
 */
export function asyncHandler(fn: AsyncRequestHandler): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Response Format
// ─────────────────────────────────────────────────────────────────────────────

interface ErrorResponse {
  error: string;
  code?: string;
  requestId: string;
  details?: unknown;
}

function buildErrorResponse(
  err: Error,
  requestId: string,
  includeDetails: boolean,
): { statusCode: number; body: ErrorResponse } {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      body: {
        error: err.message,
        code: err.code,
        requestId,
        ...(includeDetails && err.details ? { details: err.details } : {}),
      },
    };
  }

  if (err.name === 'ZodError') {
    return {
      statusCode: 400,
      body: {
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        requestId,
        ...(includeDetails ? { details: err.message } : {}),
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: INTERNAL_ERROR,
      code: 'INTERNAL_ERROR',
      requestId,
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Handler Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Must be registered after all routes.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = getRequestId(req);
  const isProduction = process.env.NODE_ENV === 'production';

  const logPayload = {
    requestId,
    method: req.method,
    path: req.path,
    error: err.message,
    ...(err instanceof AppError ? { code: err.code, statusCode: err.statusCode } : {}),
    ...(!isProduction ? { stack: err.stack } : {}),
  };

  const statusCode = err instanceof AppError ? err.statusCode : 500;
  if (statusCode >= 500) {
    logger.error(logPayload, 'Request failed with server error');
  } else {
    logger.warn(logPayload, 'Request failed with client error');
  }

  const { statusCode: responseStatus, body } = buildErrorResponse(err, requestId, !isProduction);
  res.setHeader('X-Request-ID', requestId);
  res.status(responseStatus).json(body);
}

// ─────────────────────────────────────────────────────────────────────────────
// 404 Handler
// ─────────────────────────────────────────────────────────────────────────────

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Cannot ${req.method} ${req.path}`));
}
