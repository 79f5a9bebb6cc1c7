/**
 * Content Generation Types
 *
 * Shared types for the multi-agent content studio: errors, token accounting,
 * pipeline phases and the clock abstraction used for timing.
 */

// ============================================================================
// Phase Constants
// ============================================================================

/**
 * All phases of the content pipeline, in execution order.
 */
export const CONTENT_GENERATION_PHASES = [
  'research',
  'writing',
  'editing',
  'seo',
  'creative',
  'history',
] as const;

export type ContentGenerationPhase = (typeof CONTENT_GENERATION_PHASES)[number];

/**
 * Progress callback: phase, percentage within the phase (0-100), optional message.
 */
export type ContentProgressCallback = (
  phase: ContentGenerationPhase,
  progress: number,
  message?: string
) => void;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes for content studio failures.
 */
export type ContentStudioErrorCode =
  | 'CONFIG_ERROR'
  | 'INVALID_INPUT'
  | 'CONTENT_TOO_LONG'
  | 'RESEARCH_FAILED'
  | 'WRITING_FAILED'
  | 'EDITING_FAILED'
  | 'SEO_FAILED'
  | 'CREATIVE_FAILED'
  | 'HISTORY_FAILED'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED';

/**
 * A failure with a code the HTTP layer and job queue map to a response.
 * Pipeline phases wrap whatever they catch in their own code (RESEARCH_FAILED, ...);
 * TIMEOUT and CANCELLED pass through unchanged.
 */
export class ContentStudioError extends Error {
  readonly name = 'ContentStudioError';

  constructor(
    readonly code: ContentStudioErrorCode,
    message: string,
    readonly cause?: Error
  ) {
    super(message);
    Error.captureStackTrace?.(this, ContentStudioError);
  }
}

/**
 * Type guard to check if an error is a ContentStudioError.
 */
export function isContentStudioError(error: unknown): error is ContentStudioError {
  return error instanceof ContentStudioError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Token Usage
// ============================================================================

/** Prompt tokens in, completion tokens out */
export interface TokenUsage {
  readonly input: number;
  readonly output: number;
}

export function createEmptyTokenUsage(): TokenUsage {
  return { input: 0, output: 0 };
}

export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return { input: a.input + b.input, output: a.output + b.output };
}

/**
 * Reads the AI SDK's `usage` (inputTokens/outputTokens); missing counts are 0.
 */
export function toTokenUsage(
  usage: { readonly inputTokens?: number; readonly outputTokens?: number } | undefined
): TokenUsage {
  return { input: usage?.inputTokens ?? 0, output: usage?.outputTokens ?? 0 };
}

// ============================================================================
// Time
// ============================================================================

/** Source of epoch milliseconds; tests pass a fake one */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/**
 * A clock that starts at `start` and moves forward by `step` ms after every reading.
 *
 * @example
 * const clock = createMockClock(1000, 100);
 * clock.now(); // 1000
 * clock.now(); // 1100
 */
export function createMockClock(start: number, step = 0): Clock {
  let next = start;
  return {
    now: () => {
      const reading = next;
      next += step;
      return reading;
    },
  };
}

export function isoTimestamp(clock: Clock = systemClock): string {
  return new Date(clock.now()).toISOString();
}
