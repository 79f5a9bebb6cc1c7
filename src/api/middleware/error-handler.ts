import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';

import {
  errorMessage,
  isContentStudioError,
  type ContentStudioErrorCode,
} from '../../ai/content/types';
import { createStructuredLogger } from '../../utils/logger';

const log = createStructuredLogger('[api]');

const STATUS_BY_CODE: Partial<Record<ContentStudioErrorCode, number>> = {
  INVALID_INPUT: 400,
  CONTENT_TOO_LONG: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  CANCELLED: 409,
  CONFIG_ERROR: 503,
  TIMEOUT: 504,
};

export function statusForCode(code: ContentStudioErrorCode): number {
  return STATUS_BY_CODE[code] ?? 500;
}

/**
 * Status set by body-parser on malformed or oversized bodies.
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : undefined;
  }
  return undefined;
}

/**
 * Wraps an async route so a rejection reaches the error handler.
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createErrorHandler(options: { readonly debug: boolean }): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const stack = options.debug && error instanceof Error ? { stack: error.stack } : {};

    if (error instanceof ZodError) {
      res.status(400).json({ detail: 'Invalid input data', issues: error.issues });
      return;
    }

    if (isContentStudioError(error)) {
      const status = statusForCode(error.code);
      if (status >= 500) {
        log.structured('error', {
          event: 'request_failed',
          correlationId: req.correlationId,
          path: req.path,
          code: error.code,
          error: error.message,
        });
      }
      res.status(status).json({ detail: error.message, code: error.code, ...stack });
      return;
    }

    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== undefined) {
      res.status(clientStatus).json({ detail: errorMessage(error), code: 'INVALID_INPUT', ...stack });
      return;
    }

    log.structured('error', {
      event: 'request_failed',
      correlationId: req.correlationId,
      path: req.path,
      error: errorMessage(error),
    });
    res.status(500).json({ detail: 'Internal server error', code: 'INTERNAL_ERROR', ...stack });
  };
}
