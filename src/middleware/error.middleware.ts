import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';

import { BaseError } from '../core/errors/base-error.js';
import { ConflictError } from '../core/errors/conflict.error.js';
import { ValidationError } from '../core/errors/validation.error.js';
import { logger } from '../utils/logger.js';

interface ErrorPayload {
  message: string;
  code: string;
  traceId: string;
  issues?: string[];
  data?: unknown;
}

function statusOf(err: unknown): number {
  if (err instanceof BaseError) return err.status;
  // body-parser errors carry their own 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return err.status;
  }
  return 500;
}

export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const traceId = randomUUID();
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : 'Unexpected error';

  const payload: ErrorPayload = {
    message: status === 500 ? 'Internal server error' : message,
    code: err instanceof BaseError ? err.code : status === 500 ? 'INTERNAL' : 'BAD_REQUEST',
    traceId,
  };
  if (err instanceof ValidationError && err.issues.length) payload.issues = err.issues;
  if (err instanceof ConflictError && err.data !== undefined) {
    try {
      payload.data = JSON.parse(JSON.stringify(err.data));
    } catch {
      payload.data = String(err.data);
    }
  }

  if (status >= 500) {
    logger.error('[http] request failed', { traceId, method: req.method, path: req.path, err });
  } else {
    logger.debug('[http] request rejected', { traceId, status, message });
  }
  res.status(status).json(payload);
};
