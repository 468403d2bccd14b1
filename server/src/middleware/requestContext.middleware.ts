/**
 * Request Context Middleware
 *
 * Every request gets a traceId:
 * - Reuses x-trace-id from the client when it is short and safe
 * - Generates a UUID otherwise
 * - Attaches req.traceId, req.ctx and req.log (child logger bound to the traceId)
 * - Echoes x-trace-id on the response
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, type Logger } from '../lib/logger/structured-logger.js';

export interface RequestContext {
  traceId: string;
}

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      ctx: RequestContext;
      log: Logger;
    }
  }
}

const TRACE_ID_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/;

export function resolveTraceId(header: unknown): string {
  return typeof header === 'string' && TRACE_ID_PATTERN.test(header) ? header : uuidv4();
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const traceId = resolveTraceId(req.headers['x-trace-id']);
  const ctx: RequestContext = { traceId };

  req.traceId = traceId;
  req.ctx = ctx;
  req.log = logger.child(ctx);

  res.setHeader('x-trace-id', traceId);

  next();
}
