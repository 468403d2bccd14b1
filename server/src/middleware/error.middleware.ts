/**
 * Centralized Error Middleware
 * Known failures travel as AppError; anything else becomes a generic 500
 * without leaking upstream messages in production.
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
  stack?: string;
}

function genericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400: return 'Invalid request';
    case 404: return 'Not found';
    case 502: return 'Upstream service error';
    case 503: return 'Service unavailable';
    default: return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

export function createValidationError(message: string, details?: unknown): AppError {
  return new AppError(message, 400, 'VALIDATION_ERROR', details, true);
}

export function createNotFoundError(message: string): AppError {
  return new AppError(message, 404, 'NOT_FOUND', undefined, true);
}

/** body-parser marks unparseable JSON with type 'entity.parse.failed'. */
function isJsonParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Must be registered last. `next` is required for Express to treat this as an error handler.
 */
export function errorMiddleware(err: Error, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const isProd = process.env.NODE_ENV === 'production';
  const appError = err instanceof AppError ? err
    : isJsonParseError(err) ? createValidationError('Malformed JSON body')
    : null;
  const statusCode = appError?.statusCode ?? 500;
  const code = appError?.code ?? 'INTERNAL_ERROR';
  const traceId = req.traceId || 'unknown';

  let message: string;
  if (appError) {
    message = appError.exposeMessage ? appError.message : genericMessage(statusCode);
  } else {
    message = isProd ? 'Internal server error' : err.message || 'Internal server error';
  }

  const log = req.log ?? logger;
  const logContext = {
    event: 'request_error',
    error: { name: err.name, message: err.message, stack: err.stack, code, statusCode },
    method: req.method,
    path: req.path
  };
  if (statusCode >= 500) {
    log.error(logContext, 'Request error');
  } else {
    log.warn(logContext, 'Request error');
  }

  const body: ErrorResponse = { error: message, code, traceId };
  if (appError?.exposeMessage && appError.details !== undefined) {
    body.details = appError.details;
  }
  if (!isProd && statusCode >= 500 && err.stack) {
    body.stack = err.stack;
  }

  res.status(statusCode).json(body);
}

/** 404 for anything no router claimed. */
export function notFoundMiddleware(req: Request, _res: Response, next: NextFunction): void {
  next(createNotFoundError(`No route for ${req.method} ${req.path}`));
}
