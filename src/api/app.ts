/**
 * HTTP application
 *
 * Public: /health, /status.
 * API key only: /auth/token.
 * API key or bearer token: everything else.
 */

import cors from 'cors';
import express, { type Express } from 'express';

import type { AppDeps } from './context';
import { requireAuth } from './middleware/auth';
import { correlationIdMiddleware } from './middleware/correlation-id';
import { createErrorHandler } from './middleware/error-handler';
import { createAuthRouter } from './routes/auth';
import { createContentRouter } from './routes/content';
import { createCreativeRouter } from './routes/creative';
import { createHealthRouter } from './routes/health';
import { createHistoryRouter } from './routes/history';
import { createJobsRouter } from './routes/jobs';
import { createResearchRouter } from './routes/research';
import { createReviewRouter } from './routes/review';
import { createSeoRouter } from './routes/seo';

export function createApp(deps: AppDeps): Express {
  const app = express();
  const auth = requireAuth(deps.settings);

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));
  app.use(correlationIdMiddleware);

  app.use(createHealthRouter(deps));
  app.use('/auth', createAuthRouter(deps));

  app.use('/content', auth, createContentRouter(deps));
  app.use('/review', auth, createReviewRouter(deps));
  app.use('/seo', auth, createSeoRouter(deps));
  app.use('/research', auth, createResearchRouter(deps));
  app.use('/creative', auth, createCreativeRouter(deps));
  app.use('/jobs', auth, createJobsRouter(deps));
  app.use('/history', auth, createHistoryRouter(deps));

  app.use((req, res) => {
    res.status(404).json({ detail: `Not found: ${req.method} ${req.path}`, code: 'NOT_FOUND' });
  });
  app.use(createErrorHandler({ debug: deps.settings.debug }));

  return app;
}
