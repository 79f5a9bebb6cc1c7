/**
 * Request Correlation ID Middleware
 *
 * Takes the correlation ID from the X-Request-ID header when the client sends one,
 * otherwise generates it. The ID lands on `req.correlationId`, in every history
 * entry the request writes, and back in the X-Request-ID response header.
 */

import type { NextFunction, Request, Response } from 'express';

import { MAX_CORRELATION_ID_LENGTH } from '../../history/types';
import { generateCorrelationId } from '../../utils/logger';

export const CORRELATION_ID_HEADER = 'X-Request-ID';

// ASCII control characters and DEL
const CONTROL_CHARS_REGEX = /[\x00-\x1f\x7f]/g;

export function sanitizeCorrelationId(value: string): string | undefined {
  const sanitized = value.trim().replace(CONTROL_CHARS_REGEX, '').slice(0, MAX_CORRELATION_ID_LENGTH);
  return sanitized || undefined;
}

declare global {
  namespace Express {
    interface Request {
      correlationId: string;
    }
  }
}

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.get(CORRELATION_ID_HEADER);
  const correlationId = (header && sanitizeCorrelationId(header)) || generateCorrelationId();

  req.correlationId = correlationId;
  res.setHeader(CORRELATION_ID_HEADER, correlationId);
  next();
}
