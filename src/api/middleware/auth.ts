import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { Settings } from '../../config/settings';
import { getApiKeyFromHeader, isAuthenticated, isValidApiKey } from '../utils/auth';

const UNAUTHORIZED_BODY = { detail: 'Invalid API Key' } as const;

/**
 * Accepts X-API-Key or a Bearer access token.
 */
export function requireAuth(settings: Settings): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!isAuthenticated(req, settings)) {
      res.status(401).json(UNAUTHORIZED_BODY);
      return;
    }
    next();
  };
}

/**
 * Accepts X-API-Key only. Guards token issuance so a token cannot mint another.
 */
export function requireApiKey(settings: Settings): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const apiKey = getApiKeyFromHeader(req);
    if (apiKey === undefined || !isValidApiKey(apiKey, settings)) {
      res.status(401).json(UNAUTHORIZED_BODY);
      return;
    }
    next();
  };
}
