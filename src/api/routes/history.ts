import { Router } from 'express';
import { z } from 'zod';

import { ContentStudioError } from '../../ai/content/types';
import { HistoryQuerySchema } from '../../ai/content/validation';
import type { HistoryEntry } from '../../history';
import type { AppDeps } from '../context';
import { asyncHandler } from '../middleware/error-handler';

const HistoryIdSchema = z.coerce.number().int().positive();

/**
 * Wire form of an entry. input and output are stored as the caller gave them.
 */
export function serializeHistoryEntry(entry: HistoryEntry): Record<string, unknown> {
  return {
    id: entry.id,
    correlation_id: entry.correlationId,
    kind: entry.kind,
    action: entry.action,
    agent: entry.agent,
    topic: entry.topic,
    status: entry.status,
    input: entry.input,
    output: entry.output,
    error: entry.error,
    duration_ms: entry.durationMs,
    created_at: entry.createdAt,
  };
}

export function createHistoryRouter(deps: AppDeps): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const query = HistoryQuerySchema.parse(req.query);
      const page = await deps.history.list({
        kind: query.kind,
        action: query.action,
        topic: query.topic,
        correlationId: query.correlation_id,
        limit: query.limit,
        offset: query.offset,
      });
      res.json({ data: page.data.map(serializeHistoryEntry), total: page.total });
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const parsed = HistoryIdSchema.safeParse(req.params.id);
      const entry = parsed.success ? await deps.history.get(parsed.data) : null;
      if (!entry) {
        throw new ContentStudioError('NOT_FOUND', `History entry ${req.params.id} not found`);
      }
      res.json(serializeHistoryEntry(entry));
    })
  );

  return router;
}
