import { Router } from 'express';

import { getAIStatus } from '../../ai/service';
import { toSnakeCaseKeys } from '../../ai/content/tasks/base-task';
import type { AppDeps } from '../context';

export const APP_VERSION = '1.0.0';

export function createHealthRouter(deps: AppDeps): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  router.get('/status', (_req, res) => {
    const ai = getAIStatus(deps.settings);
    res.json({
      status: 'ok',
      version: APP_VERSION,
      ai: { configured: ai.configured, model: ai.model },
      workers: toSnakeCaseKeys(deps.jobs.stats()),
      review_enabled: deps.settings.contentReviewEnabled,
    });
  });

  return router;
}
