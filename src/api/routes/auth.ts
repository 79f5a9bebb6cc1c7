import { Router } from 'express';
import { z } from 'zod';

import type { AppDeps } from '../context';
import { requireApiKey } from '../middleware/auth';
import { issueAccessToken } from '../utils/auth';

const TokenRequestSchema = z
  .object({
    subject: z.string().trim().min(1).max(128).optional(),
  })
  .default({});

export const DEFAULT_TOKEN_SUBJECT = 'api-client';

export function createAuthRouter(deps: AppDeps): Router {
  const router = Router();

  router.post('/token', requireApiKey(deps.settings), (req, res) => {
    const body = TokenRequestSchema.parse(req.body ?? {});
    res.json(issueAccessToken(body.subject ?? DEFAULT_TOKEN_SUBJECT, deps.settings));
  });

  return router;
}
