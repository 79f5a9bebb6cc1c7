import { timingSafeEqual } from 'node:crypto';

import type { Request } from 'express';
import jwt, { type JwtPayload } from 'jsonwebtoken';

import type { Settings } from '../../config/settings';
import { createPrefixedLogger } from '../../utils/logger';

const log = createPrefixedLogger('[auth]');

type AuthSettings = Pick<Settings, 'secretKey' | 'algorithm' | 'accessTokenExpireMinutes'>;

export interface AccessToken {
  readonly access_token: string;
  readonly token_type: 'bearer';
  readonly expires_in: number;
}

/**
 * Extract bearer token from Authorization header.
 */
export function getBearerToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }
  return undefined;
}

export function getApiKeyFromHeader(req: Request): string | undefined {
  const value = req.headers['x-api-key'];
  return typeof value === 'string' ? value : undefined;
}

export function isValidApiKey(candidate: string, settings: Pick<Settings, 'secretKey'>): boolean {
  const given = Buffer.from(candidate);
  const expected = Buffer.from(settings.secretKey);
  return given.length === expected.length && timingSafeEqual(given, expected);
}

export function issueAccessToken(subject: string, settings: AuthSettings): AccessToken {
  const expiresIn = settings.accessTokenExpireMinutes * 60;
  const token = jwt.sign({ sub: subject }, settings.secretKey, {
    algorithm: settings.algorithm,
    expiresIn,
  });
  return { access_token: token, token_type: 'bearer', expires_in: expiresIn };
}

/**
 * Verifies a token signed with SECRET_KEY under ALGORITHM.
 * Returns null for expired, malformed or foreign tokens.
 */
export function verifyAccessToken(token: string, settings: AuthSettings): JwtPayload | null {
  try {
    const payload = jwt.verify(token, settings.secretKey, { algorithms: [settings.algorithm] });
    return typeof payload === 'string' ? null : payload;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.debug(`Token verification failed: ${message}`);
    return null;
  }
}

/**
 * Checks the Authorization header first, then X-API-Key.
 */
export function isAuthenticated(req: Request, settings: AuthSettings): boolean {
  const bearerToken = getBearerToken(req);
  if (bearerToken && verifyAccessToken(bearerToken, settings)) {
    return true;
  }

  const apiKey = getApiKeyFromHeader(req);
  return apiKey !== undefined && isValidApiKey(apiKey, settings);
}
