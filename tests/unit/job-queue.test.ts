/**
 * Content Job Queue Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';

import type { ContentGenerationResult } from '../../src/ai/content/generate-content';
import { ContentStudioError, createMockClock } from '../../src/ai/content/types';
import { ContentJobQueue, isFinished, type JobEvent, type JobRunContext } from '../../src/jobs/job-queue';
import type { StructuredLogger } from '../../src/utils/logger';
import { createSilentLogger } from '../helpers/agent-deps';
import { createFakeGenerationResult } from '../helpers/content-result';

interface PendingRun {
  readonly topic: string;
  readonly context: JobRunContext;
  readonly resolve: (result: ContentGenerationResult) => void;
  readonly reject: (error: unknown) => void;
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const createSilentStructuredLogger = (): StructuredLogger => ({ ...createSilentLogger(), structured: vi.fn() });

/**
 * A queue whose runs stay pending until the test settles them.
 * Aborting a run rejects it, like the pipeline does.
 */
function createQueue(maxWorkers: number, maxFinishedJobs?: number) {
  const runs: PendingRun[] = [];
  const queue = new ContentJobQueue({
    maxWorkers,
    maxFinishedJobs,
    clock: createMockClock(Date.UTC(2024, 0, 1)),
    logger: createSilentStructuredLogger(),
    run: (request, context) =>
      new Promise<ContentGenerationResult>((resolve, reject) => {
        context.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        runs.push({ topic: request.topic, context, resolve, reject });
      }),
  });
  return { queue, runs };
}

describe('ContentJobQueue', () => {
  it('rejects a worker count below one', () => {
    expect(
      () => new ContentJobQueue({ maxWorkers: 0, run: () => Promise.reject(new Error('unused')) })
    ).toThrow(RangeError);
  });

  it('never runs more than maxWorkers jobs at once', async () => {
    const { queue, runs } = createQueue(2);

    const first = queue.enqueue({ topic: 'one' }, 'c1');
    queue.enqueue({ topic: 'two' }, 'c2');
    const third = queue.enqueue({ topic: 'three' }, 'c3');

    expect(runs.map((run) => run.topic)).toEqual(['one', 'two']);
    expect(queue.get(third.id)?.status).toBe('queued');
    expect(queue.stats()).toMatchObject({ queued: 1, running: 2, maxWorkers: 2 });

    runs[0].resolve(createFakeGenerationResult('one'));
    await flush();

    expect(queue.get(first.id)?.status).toBe('completed');
    expect(queue.get(third.id)?.status).toBe('running');
    expect(runs.map((run) => run.topic)).toEqual(['one', 'two', 'three']);
  });

  it('starts waiting jobs in FIFO order', async () => {
    const { queue, runs } = createQueue(1);

    queue.enqueue({ topic: 'a' }, 'c1');
    queue.enqueue({ topic: 'b' }, 'c2');
    queue.enqueue({ topic: 'c' }, 'c3');

    for (let i = 0; i < 3; i++) {
      runs[i].resolve(createFakeGenerationResult(runs[i].topic));
      await flush();
    }

    expect(runs.map((run) => run.topic)).toEqual(['a', 'b', 'c']);
    expect(queue.stats()).toMatchObject({ queued: 0, running: 0, completed: 3 });
  });

  it('passes the correlation ID to the run and stamps timestamps', () => {
    const { queue, runs } = createQueue(1);

    const job = queue.enqueue({ topic: 'a' }, 'corr-1');

    expect(runs[0].context.correlationId).toBe('corr-1');
    expect(job).toMatchObject({
      correlationId: 'corr-1',
      status: 'running',
      createdAt: '2024-01-01T00:00:00.000Z',
      startedAt: '2024-01-01T00:00:00.000Z',
      completedAt: null,
    });
  });

  it('forwards progress to subscribers and keeps the latest', () => {
    const { queue, runs } = createQueue(1);
    const job = queue.enqueue({ topic: 'a' }, 'c1');
    const events: JobEvent[] = [];
    queue.subscribe(job.id, (event) => events.push(event));

    runs[0].context.onProgress('research', 10, 'Starting research');

    expect(events).toEqual([
      { type: 'progress', jobId: job.id, phase: 'research', progress: 10, message: 'Starting research' },
    ]);
    expect(queue.get(job.id)?.progress).toEqual({ phase: 'research', progress: 10, message: 'Starting research' });
  });

  it('emits the result on completion', async () => {
    const { queue, runs } = createQueue(1);
    const job = queue.enqueue({ topic: 'a' }, 'c1');
    const listener = vi.fn();
    queue.subscribe(job.id, listener);
    const result = createFakeGenerationResult('a');

    runs[0].resolve(result);
    await flush();

    expect(listener).toHaveBeenCalledWith({ type: 'complete', jobId: job.id, result });
    expect(queue.get(job.id)).toMatchObject({ status: 'completed', result, completedAt: '2024-01-01T00:00:00.000Z' });
  });

  it('records the error code of a failed run', async () => {
    const { queue, runs } = createQueue(2);
    const studioFailure = queue.enqueue({ topic: 'a' }, 'c1');
    const plainFailure = queue.enqueue({ topic: 'b' }, 'c2');

    runs[0].reject(new ContentStudioError('WRITING_FAILED', 'draft failed'));
    runs[1].reject(new Error('socket hang up'));
    await flush();

    expect(queue.get(studioFailure.id)?.error).toEqual({ code: 'WRITING_FAILED', message: 'draft failed' });
    expect(queue.get(plainFailure.id)?.error).toEqual({ code: 'INTERNAL_ERROR', message: 'socket hang up' });
    expect(queue.stats().failed).toBe(2);
  });

  it('cancels a queued job without running it', () => {
    const { queue, runs } = createQueue(1);
    queue.enqueue({ topic: 'a' }, 'c1');
    const waiting = queue.enqueue({ topic: 'b' }, 'c2');
    const listener = vi.fn();
    queue.subscribe(waiting.id, listener);

    expect(queue.cancel(waiting.id)).toBe(true);

    expect(queue.get(waiting.id)?.status).toBe('cancelled');
    expect(listener).toHaveBeenCalledWith({ type: 'cancelled', jobId: waiting.id });
    expect(runs).toHaveLength(1);
  });

  it('aborts a running job', async () => {
    const { queue, runs } = createQueue(1);
    const job = queue.enqueue({ topic: 'a' }, 'c1');

    expect(queue.cancel(job.id)).toBe(true);
    expect(runs[0].context.signal.aborted).toBe(true);
    await flush();

    expect(queue.get(job.id)?.status).toBe('cancelled');
    expect(queue.stats().running).toBe(0);
  });

  it('refuses to cancel unknown or finished jobs', async () => {
    const { queue, runs } = createQueue(1);
    const job = queue.enqueue({ topic: 'a' }, 'c1');
    runs[0].resolve(createFakeGenerationResult('a'));
    await flush();

    expect(queue.cancel(job.id)).toBe(false);
    expect(queue.cancel('missing')).toBe(false);
  });

  it('cancelQueued cancels only waiting jobs', () => {
    const { queue } = createQueue(1);
    const running = queue.enqueue({ topic: 'a' }, 'c1');
    queue.enqueue({ topic: 'b' }, 'c2');
    queue.enqueue({ topic: 'c' }, 'c3');

    expect(queue.cancelQueued()).toBe(2);
    expect(queue.get(running.id)?.status).toBe('running');
    expect(queue.stats()).toMatchObject({ queued: 0, running: 1, cancelled: 2 });
  });

  it('drain resolves once every job has settled', async () => {
    const { queue, runs } = createQueue(1);
    queue.enqueue({ topic: 'a' }, 'c1');
    let drained = false;
    const draining = queue.drain().then(() => {
      drained = true;
    });

    await flush();
    expect(drained).toBe(false);

    runs[0].resolve(createFakeGenerationResult('a'));
    await draining;
    expect(drained).toBe(true);
  });

  it('lists jobs newest first and drops the oldest finished ones', async () => {
    const { queue, runs } = createQueue(2, 1);
    const older = queue.enqueue({ topic: 'a' }, 'c1');
    const newer = queue.enqueue({ topic: 'b' }, 'c2');

    expect(queue.list().map((job) => job.id)).toEqual([newer.id, older.id]);

    runs[0].resolve(createFakeGenerationResult('a'));
    runs[1].resolve(createFakeGenerationResult('b'));
    await flush();

    expect(queue.get(older.id)).toBeNull();
    expect(queue.get(newer.id)?.status).toBe('completed');
  });

  it('isFinished is true only for terminal statuses', () => {
    expect(isFinished('queued')).toBe(false);
    expect(isFinished('running')).toBe(false);
    expect(isFinished('completed')).toBe(true);
    expect(isFinished('failed')).toBe(true);
    expect(isFinished('cancelled')).toBe(true);
  });
});
