import type { Request } from 'express';

import type { AgentDeps } from '../ai/content/agents/shared';
import type { TaskDeps } from '../ai/content/tasks/base-task';
import type { Clock } from '../ai/content/types';
import { assertWithinWordLimit } from '../ai/content/validation';
import type { CacheStore } from '../cache';
import type { Settings } from '../config/settings';
import type { HistoryStore } from '../history';
import type { ContentJobQueue } from '../jobs/job-queue';
import { createContextualLogger } from '../utils/logger';

export interface AppDeps {
  readonly settings: Settings;
  readonly generateText: AgentDeps['generateText'];
  readonly model: AgentDeps['model'];
  readonly history: HistoryStore;
  readonly jobs: ContentJobQueue;
  readonly cache?: CacheStore;
  readonly clock?: Clock;
}

/**
 * Task dependencies scoped to one request: its correlation ID tags the logs and
 * every history entry the request writes.
 */
export function taskDepsFor(req: Request, deps: AppDeps): TaskDeps {
  const logger = createContextualLogger('[api]', { correlationId: req.correlationId, path: req.path });
  return {
    agent: { generateText: deps.generateText, model: deps.model, logger },
    history: deps.history,
    cache: deps.cache,
    cacheTtlSeconds: deps.settings.cacheTtlSeconds,
    clock: deps.clock,
    correlationId: req.correlationId,
    logger,
  };
}

export function contentDefaults(deps: AppDeps): { readonly contentType: string } {
  return { contentType: deps.settings.defaultContentType };
}

/**
 * Rejects any field longer than MAX_CONTENT_LENGTH words.
 */
export function checkContentLength(deps: AppDeps, fields: Readonly<Record<string, string | undefined>>): void {
  for (const [field, value] of Object.entries(fields)) {
    if (value !== undefined) {
      assertWithinWordLimit(value, deps.settings.maxContentLength, field);
    }
  }
}
