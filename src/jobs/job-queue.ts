/**
 * Content Job Queue
 *
 * Runs pipeline jobs in the background with at most `maxWorkers` at once.
 * Waiting jobs start in FIFO order. Subscribers receive progress and the outcome.
 */

import { randomUUID } from 'node:crypto';

import type {
  ContentGenerationRequest,
  ContentGenerationResult,
} from '../ai/content/generate-content';
import {
  errorMessage,
  isContentStudioError,
  isoTimestamp,
  systemClock,
  type Clock,
  type ContentGenerationPhase,
  type ContentProgressCallback,
} from '../ai/content/types';
import { createStructuredLogger, type StructuredLogger } from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface JobProgress {
  readonly phase: ContentGenerationPhase;
  readonly progress: number;
  readonly message?: string;
}

export interface JobError {
  readonly code: string;
  readonly message: string;
}

export interface ContentJob {
  readonly id: string;
  readonly correlationId: string;
  readonly status: JobStatus;
  readonly request: ContentGenerationRequest;
  readonly progress: JobProgress | null;
  readonly result: ContentGenerationResult | null;
  readonly error: JobError | null;
  readonly createdAt: string;
  readonly startedAt: string | null;
  readonly completedAt: string | null;
}

export type JobEvent =
  | ({ readonly type: 'progress'; readonly jobId: string } & JobProgress)
  | { readonly type: 'complete'; readonly jobId: string; readonly result: ContentGenerationResult }
  | ({ readonly type: 'error'; readonly jobId: string } & JobError)
  | { readonly type: 'cancelled'; readonly jobId: string };

export type JobListener = (event: JobEvent) => void;

export interface JobRunContext {
  readonly signal: AbortSignal;
  readonly onProgress: ContentProgressCallback;
  readonly correlationId: string;
}

export type JobRunner = (
  request: ContentGenerationRequest,
  context: JobRunContext
) => Promise<ContentGenerationResult>;

export interface ContentJobQueueOptions {
  readonly maxWorkers: number;
  readonly run: JobRunner;
  readonly clock?: Clock;
  readonly logger?: StructuredLogger;
  /** Finished jobs kept for lookup; oldest are dropped first (default: 500) */
  readonly maxFinishedJobs?: number;
}

export interface JobQueueStats {
  readonly queued: number;
  readonly running: number;
  readonly completed: number;
  readonly failed: number;
  readonly cancelled: number;
  readonly maxWorkers: number;
}

type MutableJob = { -readonly [K in keyof ContentJob]: ContentJob[K] };

const FINISHED_STATUSES: ReadonlySet<JobStatus> = new Set(['completed', 'failed', 'cancelled']);

export function isFinished(status: JobStatus): boolean {
  return FINISHED_STATUSES.has(status);
}

// ============================================================================
// Queue
// ============================================================================

export class ContentJobQueue {
  readonly maxWorkers: number;
  private readonly run: JobRunner;
  private readonly clock: Clock;
  private readonly log: StructuredLogger;
  private readonly maxFinishedJobs: number;

  private readonly jobs = new Map<string, MutableJob>();
  private readonly waiting: string[] = [];
  private readonly controllers = new Map<string, AbortController>();
  private readonly listeners = new Map<string, Set<JobListener>>();
  private drainWaiters: (() => void)[] = [];

  constructor(options: ContentJobQueueOptions) {
    if (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer (got ${options.maxWorkers})`);
    }
    this.maxWorkers = options.maxWorkers;
    this.run = options.run;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createStructuredLogger('[Jobs]');
    this.maxFinishedJobs = options.maxFinishedJobs ?? 500;
  }

  enqueue(request: ContentGenerationRequest, correlationId: string): ContentJob {
    const job: MutableJob = {
      id: randomUUID(),
      correlationId,
      status: 'queued',
      request,
      progress: null,
      result: null,
      error: null,
      createdAt: isoTimestamp(this.clock),
      startedAt: null,
      completedAt: null,
    };
    this.jobs.set(job.id, job);
    this.waiting.push(job.id);
    this.log.structured('info', { event: 'job_queued', jobId: job.id, correlationId, queued: this.waiting.length });
    this.pump();
    return this.snapshot(job);
  }

  get(id: string): ContentJob | null {
    const job = this.jobs.get(id);
    return job ? this.snapshot(job) : null;
  }

  /** Newest first */
  list(): ContentJob[] {
    return [...this.jobs.values()].reverse().map((job) => this.snapshot(job));
  }

  /**
   * Cancels a queued or running job. Returns false for unknown and finished jobs.
   * A running job is aborted and reaches 'cancelled' once its run settles.
   */
  cancel(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job || isFinished(job.status)) return false;

    if (job.status === 'queued') {
      this.waiting.splice(this.waiting.indexOf(id), 1);
      this.finishCancelled(job);
      this.notifyIfIdle();
      return true;
    }

    this.controllers.get(id)?.abort();
    return true;
  }

  /**
   * Cancels every job still waiting to start. Returns how many were cancelled.
   */
  cancelQueued(): number {
    const ids = [...this.waiting];
    for (const id of ids) {
      this.cancel(id);
    }
    return ids.length;
  }

  subscribe(id: string, listener: JobListener): () => void {
    let set = this.listeners.get(id);
    if (!set) {
      set = new Set();
      this.listeners.set(id, set);
    }
    set.add(listener);
    return () => {
      const current = this.listeners.get(id);
      current?.delete(listener);
      if (current && current.size === 0) this.listeners.delete(id);
    };
  }

  stats(): JobQueueStats {
    let completed = 0;
    let failed = 0;
    let cancelled = 0;
    for (const job of this.jobs.values()) {
      if (job.status === 'completed') completed++;
      else if (job.status === 'failed') failed++;
      else if (job.status === 'cancelled') cancelled++;
    }
    return {
      queued: this.waiting.length,
      running: this.controllers.size,
      completed,
      failed,
      cancelled,
      maxWorkers: this.maxWorkers,
    };
  }

  /**
   * Resolves once nothing is queued or running.
   */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private pump(): void {
    while (this.controllers.size < this.maxWorkers && this.waiting.length > 0) {
      const id = this.waiting.shift();
      const job = id ? this.jobs.get(id) : undefined;
      if (job) {
        this.start(job);
      }
    }
  }

  private start(job: MutableJob): void {
    const controller = new AbortController();
    this.controllers.set(job.id, controller);
    job.status = 'running';
    job.startedAt = isoTimestamp(this.clock);
    this.log.structured('info', { event: 'job_started', jobId: job.id, running: this.controllers.size });

    const onProgress: ContentProgressCallback = (phase, progress, message) => {
      const latest: JobProgress = { phase, progress, ...(message !== undefined ? { message } : {}) };
      job.progress = latest;
      this.emit(job.id, { type: 'progress', jobId: job.id, ...latest });
    };

    this.run(job.request, { signal: controller.signal, onProgress, correlationId: job.correlationId })
      .then(
        (result) => this.finishCompleted(job, result),
        (error: unknown) => {
          if (controller.signal.aborted) {
            this.finishCancelled(job);
          } else {
            this.finishFailed(job, error);
          }
        }
      )
      .finally(() => {
        this.controllers.delete(job.id);
        this.pump();
        this.notifyIfIdle();
      })
      .catch((error: unknown) => {
        this.log.error(`Job ${job.id} bookkeeping failed: ${errorMessage(error)}`);
      });
  }

  private finishCompleted(job: MutableJob, result: ContentGenerationResult): void {
    job.status = 'completed';
    job.result = result;
    job.completedAt = isoTimestamp(this.clock);
    this.log.structured('info', { event: 'job_completed', jobId: job.id });
    this.emit(job.id, { type: 'complete', jobId: job.id, result });
    this.settle(job.id);
  }

  private finishFailed(job: MutableJob, error: unknown): void {
    const jobError: JobError = {
      code: isContentStudioError(error) ? error.code : 'INTERNAL_ERROR',
      message: errorMessage(error),
    };
    job.status = 'failed';
    job.error = jobError;
    job.completedAt = isoTimestamp(this.clock);
    this.log.structured('warn', { event: 'job_failed', jobId: job.id, ...jobError });
    this.emit(job.id, { type: 'error', jobId: job.id, ...jobError });
    this.settle(job.id);
  }

  private finishCancelled(job: MutableJob): void {
    job.status = 'cancelled';
    job.completedAt = isoTimestamp(this.clock);
    this.log.structured('info', { event: 'job_cancelled', jobId: job.id });
    this.emit(job.id, { type: 'cancelled', jobId: job.id });
    this.settle(job.id);
  }

  /**
   * Drops listeners of a finished job and evicts the oldest finished jobs.
   */
  private settle(id: string): void {
    this.listeners.delete(id);
    const finished = [...this.jobs.values()].filter((job) => isFinished(job.status));
    for (const job of finished.slice(0, Math.max(0, finished.length - this.maxFinishedJobs))) {
      this.jobs.delete(job.id);
    }
  }

  private emit(id: string, event: JobEvent): void {
    for (const listener of this.listeners.get(id) ?? []) {
      try {
        listener(event);
      } catch (error) {
        this.log.warn(`Listener for job ${id} threw: ${errorMessage(error)}`);
      }
    }
  }

  private isIdle(): boolean {
    return this.waiting.length === 0 && this.controllers.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private snapshot(job: MutableJob): ContentJob {
    return { ...job };
  }
}
