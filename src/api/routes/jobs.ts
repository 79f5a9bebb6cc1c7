import { Router } from 'express';

import { validateGenerationRequest, type ContentGenerationRequest } from '../../ai/content/generate-content';
import { toSnakeCaseKeys } from '../../ai/content/tasks/base-task';
import { ContentStudioError } from '../../ai/content/types';
import { ContentRequestSchema, type ContentRequest } from '../../ai/content/validation';
import { isFinished, type ContentJob, type JobEvent } from '../../jobs/job-queue';
import type { AppDeps } from '../context';
import { openEventStream } from '../utils/sse';

export function toGenerationRequest(body: ContentRequest, defaultContentType: string): ContentGenerationRequest {
  return {
    topic: body.topic,
    contentType: body.content_type ?? defaultContentType,
    targetAudience: body.target_audience,
    wordCount: body.word_count,
    tone: body.tone,
    keywords: body.keywords,
    researchDepth: body.research_depth,
  };
}

export function serializeJob(job: ContentJob): Record<string, unknown> {
  return toSnakeCaseKeys(job);
}

/**
 * The event a subscriber would have received when the job finished.
 */
export function terminalEvent(job: ContentJob): JobEvent | null {
  switch (job.status) {
    case 'completed':
      return job.result ? { type: 'complete', jobId: job.id, result: job.result } : null;
    case 'failed':
      return job.error ? { type: 'error', jobId: job.id, ...job.error } : null;
    case 'cancelled':
      return { type: 'cancelled', jobId: job.id };
    default:
      return null;
  }
}

function notFound(id: string): ContentStudioError {
  return new ContentStudioError('NOT_FOUND', `Job ${id} not found`);
}

export function createJobsRouter(deps: AppDeps): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const body = ContentRequestSchema.parse(req.body);
    const request = toGenerationRequest(body, deps.settings.defaultContentType);
    validateGenerationRequest(request, deps.settings.maxContentLength);

    const job = deps.jobs.enqueue(request, req.correlationId);
    res.status(202).json({ job: serializeJob(job) });
  });

  router.get('/', (_req, res) => {
    res.json({
      data: deps.jobs.list().map(serializeJob),
      stats: toSnakeCaseKeys(deps.jobs.stats()),
    });
  });

  router.get('/:id', (req, res) => {
    const job = deps.jobs.get(req.params.id);
    if (!job) throw notFound(req.params.id);
    res.json(serializeJob(job));
  });

  router.delete('/:id', (req, res) => {
    const job = deps.jobs.get(req.params.id);
    if (!job) throw notFound(req.params.id);
    if (!deps.jobs.cancel(job.id)) {
      res.status(409).json({ detail: `Job is already ${job.status}`, code: 'CANCELLED' });
      return;
    }
    res.json({ cancelled: true });
  });

  router.get('/:id/events', (req, res) => {
    const job = deps.jobs.get(req.params.id);
    if (!job) throw notFound(req.params.id);

    const stream = openEventStream(res);

    if (isFinished(job.status)) {
      const event = terminalEvent(job);
      if (event) stream.send(toSnakeCaseKeys(event));
      stream.close();
      return;
    }

    if (job.progress) {
      stream.send(toSnakeCaseKeys({ type: 'progress', jobId: job.id, ...job.progress }));
    }

    const unsubscribe = deps.jobs.subscribe(job.id, (event) => {
      stream.send(toSnakeCaseKeys(event));
      if (event.type !== 'progress') stream.close();
    });
    stream.onClose(unsubscribe);
  });

  return router;
}
