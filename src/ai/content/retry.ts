/**
 * Retry Utilities
 *
 * Backoff for transient model-provider failures. Validation and pipeline errors
 * (ContentStudioError) are never retried; cancellation surfaces as CANCELLED.
 */

import { APICallError } from 'ai';

import { createPrefixedLogger } from '../../utils/logger';
import { RETRY_CONFIG } from './config';
import { ContentStudioError, errorMessage } from './types';

export interface RetryOptions {
  /** Retries after the first attempt (default: RETRY_CONFIG.MAX_RETRIES) */
  readonly maxRetries?: number;
  readonly initialDelayMs?: number;
  readonly maxDelayMs?: number;
  /** Names the operation in logs and in the cancellation message, e.g. "Content Writer task" */
  readonly context?: string;
  readonly shouldRetry?: (error: unknown) => boolean;
  /** Aborting stops further attempts and interrupts a pending backoff */
  readonly signal?: AbortSignal;
}

// ============================================================================
// Error Classification
// ============================================================================

const TRANSIENT_MESSAGES: readonly RegExp[] = [
  /rate.?limit|too.?many.?requests|\b429\b/i,
  /network|fetch.*fail|socket.?hang.?up|ECONNRESET|ECONNREFUSED|ETIMEDOUT/i,
  /\b5\d{2}\b|internal.?server.?error|service.?unavailable|bad.?gateway/i,
  /overloaded|capacity|temporarily/i,
];

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * True for failures worth another attempt: provider errors the AI SDK marks
 * retryable, rate limits, network faults and 5xx responses.
 */
export function isRetryableError(error: unknown): boolean {
  if (!error || error instanceof ContentStudioError) return false;

  // A per-attempt timeout means the budget was too small, not that the call was flaky
  if (error instanceof Error && error.name === 'TimeoutError') return false;

  if (APICallError.isInstance(error)) return error.isRetryable;

  const status = httpStatusOf(error);
  if (status !== undefined && (status === 429 || (status >= 500 && status < 600))) return true;

  const message = errorMessage(error);
  return TRANSIENT_MESSAGES.some((pattern) => pattern.test(message));
}

// ============================================================================
// Backoff
// ============================================================================

/**
 * Exponential delay for a 0-based attempt, capped at `maxDelayMs`, then jittered by ±25%.
 * `random` must return a value in [0, 1].
 */
export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const capped = Math.min(initialDelayMs * RETRY_CONFIG.BACKOFF_MULTIPLIER ** attempt, maxDelayMs);
  return Math.round(capped * (1 + 0.25 * (random() * 2 - 1)));
}

function cancelledError(context: string): ContentStudioError {
  return new ContentStudioError('CANCELLED', `${context} was cancelled`);
}

/**
 * Resolves after `ms`, or rejects with CANCELLED as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal, context = 'operation'): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError(context));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError(context));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// Retry Loop
// ============================================================================

/**
 * Runs `fn`, retrying transient failures with exponential backoff.
 *
 * @throws ContentStudioError CANCELLED once `signal` aborts
 * @throws The original error when it is not retryable or the attempts run out
 *
 * @example
 * const { text } = await withRetry(
 *   () => generateText({ model, prompt }),
 *   { context: 'Content Writer task', signal }
 * );
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = RETRY_CONFIG.MAX_RETRIES,
    initialDelayMs = RETRY_CONFIG.INITIAL_DELAY_MS,
    maxDelayMs = RETRY_CONFIG.MAX_DELAY_MS,
    context = 'operation',
    shouldRetry = isRetryableError,
    signal,
  } = options;
  const log = createPrefixedLogger('[Retry]');

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) throw cancelledError(context);

    try {
      return await fn();
    } catch (error) {
      if (signal?.aborted) throw cancelledError(context);
      if (!shouldRetry(error)) throw error;

      if (attempt >= maxRetries) {
        log.warn(`${context} failed after ${attempt + 1} attempts: ${errorMessage(error)}`);
        throw error;
      }

      const delay = backoffDelay(attempt, initialDelayMs, maxDelayMs);
      log.info(`${context} failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${delay}ms: ${errorMessage(error)}`);
      await sleep(delay, signal, context);
    }
  }
}
