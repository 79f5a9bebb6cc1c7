/**
 * Content Generation Pipeline
 *
 * Runs the agents in order: research → writing → editing → SEO → creative → history.
 * Each phase is timed, reports progress, and fails with its own error code.
 */

import { generateText, type LanguageModel } from 'ai';

import type { CacheStore } from '../../cache';
import { getSettings, SettingsError } from '../../config/settings';
import { recordSafely, type HistoryStore } from '../../history';
import {
  createContextualLogger,
  generateCorrelationId,
  type ContextualLogger,
} from '../../utils/logger';
import { brainstormHeadlines } from './agents/creative';
import { improveContent, reviewContent, type ContentReview } from './agents/editor';
import type { ResearchFindings } from './agents/research';
import { generateMetaTags, optimizeContent } from './agents/seo';
import type { AgentDeps } from './agents/shared';
import { createContentDraft } from './agents/writer';
import { CREATIVE_CONFIG, PIPELINE_CONFIG, WRITER_CONFIG } from './config';
import { PhaseTimer, type PhaseDurations } from './phase-timer';
import { ProgressTracker } from './progress-tracker';
import { withRetry } from './retry';
import { createLanguageModel } from '../service';
import { buildResearchRequirements } from './tasks/content-creation';
import { getResearchFindings } from './tasks/research';
import { countWords, isNonEmptyText } from './text-utils';
import {
  addTokenUsage,
  ContentStudioError,
  createEmptyTokenUsage,
  errorMessage,
  isoTimestamp,
  systemClock,
  type Clock,
  type ContentGenerationPhase,
  type ContentProgressCallback,
  type ContentStudioErrorCode,
  type TokenUsage,
} from './types';
import { assertWordCountAllowed } from './validation';

// ============================================================================
// Types
// ============================================================================

export interface ContentGenerationRequest {
  readonly topic: string;
  readonly contentType?: string;
  readonly targetAudience?: string;
  readonly wordCount?: number;
  readonly tone?: string;
  readonly keywords?: readonly string[];
  readonly researchDepth?: string;
}

export interface ContentGeneratorDeps {
  readonly generateText: typeof generateText;
  readonly model: LanguageModel;
  readonly history?: HistoryStore;
  readonly cache?: CacheStore;
  readonly cacheTtlSeconds?: number;
}

export interface ContentGeneratorOptions {
  /** Cancels the run; the current phase fails with CANCELLED */
  readonly signal?: AbortSignal;
  /** Whole-run timeout in ms (default: 10 minutes, 0 disables) */
  readonly timeoutMs?: number;
  readonly onProgress?: ContentProgressCallback;
  readonly clock?: Clock;
  readonly correlationId?: string;
  /** Run the review/improve phase (default: true, CONTENT_REVIEW_ENABLED) */
  readonly reviewEnabled?: boolean;
  /** Maximum requested word count (default: 5000, MAX_CONTENT_LENGTH) */
  readonly maxContentLength?: number;
  readonly defaultContentType?: string;
}

export interface ContentSeoResult {
  readonly optimizedContent: string;
  readonly seoScore: number | null;
  readonly recommendations: string[];
  readonly metaTitle: string;
  readonly metaDescription: string;
}

export interface ContentGenerationMetadata {
  readonly correlationId: string;
  readonly generatedAt: string;
  readonly totalDurationMs: number;
  readonly phaseDurations: PhaseDurations;
  readonly tokenUsage: {
    readonly total: TokenUsage;
    readonly byPhase: Partial<Record<ContentGenerationPhase, TokenUsage>>;
  };
  readonly reviewEnabled: boolean;
  readonly wordCount: number;
  readonly historyEntryId: number | null;
}

export interface ContentGenerationResult {
  readonly topic: string;
  readonly contentType: string;
  readonly targetAudience: string;
  readonly research: ResearchFindings;
  readonly draft: string;
  readonly review?: ContentReview;
  readonly finalContent: string;
  readonly seo: ContentSeoResult;
  readonly headlines: string[];
  readonly metadata: ContentGenerationMetadata;
}

// ============================================================================
// Timeout and Cancellation Helpers
// ============================================================================

interface RunContext {
  /** Aborts on the caller's signal or when the run times out; every agent call listens to it */
  readonly signal: AbortSignal;
  readonly abort: (reason: ContentStudioError) => void;
  readonly startTime: number;
  readonly timeoutMs: number;
  readonly topic: string;
  readonly clock: Clock;
}

const isTimeout = (reason: unknown): reason is ContentStudioError =>
  reason instanceof ContentStudioError && reason.code === 'TIMEOUT';

/**
 * Throws CANCELLED or TIMEOUT if the run must not continue.
 */
function assertCanProceed(run: RunContext): void {
  if (run.signal.aborted) {
    if (isTimeout(run.signal.reason)) throw run.signal.reason;
    throw new ContentStudioError('CANCELLED', `Content generation for "${run.topic}" was cancelled`);
  }
  if (run.timeoutMs > 0 && run.clock.now() - run.startTime > run.timeoutMs) {
    const error = new ContentStudioError(
      'TIMEOUT',
      `Content generation for "${run.topic}" timed out after ${run.timeoutMs}ms`
    );
    run.abort(error);
    throw error;
  }
}

/**
 * Races `promise` against the run signal and the remaining run time.
 * When the time runs out the run signal is aborted, so the phase's pending
 * agent calls stop instead of running on unobserved.
 */
async function withTimeoutAndCancellation<T>(
  promise: Promise<T>,
  run: RunContext,
  phaseName: string
): Promise<T> {
  assertCanProceed(run);

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let abortHandler: (() => void) | undefined;

  const cleanup = () => {
    if (timeoutId) clearTimeout(timeoutId);
    if (abortHandler) {
      run.signal.removeEventListener('abort', abortHandler);
    }
  };

  const cancellationPromise = new Promise<never>((_, reject) => {
    abortHandler = () => {
      const { reason } = run.signal;
      reject(
        isTimeout(reason)
          ? reason
          : new ContentStudioError(
              'CANCELLED',
              `Content generation for "${run.topic}" was cancelled during ${phaseName} phase`
            )
      );
    };
    run.signal.addEventListener('abort', abortHandler, { once: true });

    if (run.timeoutMs > 0) {
      const remaining = Math.max(0, run.timeoutMs - (run.clock.now() - run.startTime));
      timeoutId = setTimeout(
        () =>
          run.abort(
            new ContentStudioError(
              'TIMEOUT',
              `Content generation for "${run.topic}" timed out during ${phaseName} phase after ${run.timeoutMs}ms`
            )
          ),
        remaining
      );
    }
  });

  try {
    return await Promise.race([promise, cancellationPromise]);
  } finally {
    cleanup();
  }
}

// ============================================================================
// Phase Execution Helper
// ============================================================================

interface PhaseResult<T> {
  readonly output: T;
  readonly durationMs: number;
}

/**
 * Runs a phase with timeout/cancellation and converts failures to `errorCode`.
 * TIMEOUT and CANCELLED pass through unchanged.
 *
 * `skipRetry` is for phases whose agent calls already retry individually.
 */
async function runPhase<T>(
  phaseName: string,
  errorCode: ContentStudioErrorCode,
  fn: () => Promise<T>,
  run: RunContext,
  skipRetry = false
): Promise<PhaseResult<T>> {
  const phaseStartTime = run.clock.now();

  try {
    assertCanProceed(run);
    const wrapped = skipRetry ? fn() : withRetry(fn, { context: `${phaseName} phase`, signal: run.signal });
    const output = await withTimeoutAndCancellation(wrapped, run, phaseName);
    return { output, durationMs: run.clock.now() - phaseStartTime };
  } catch (error) {
    if (error instanceof ContentStudioError && (error.code === 'TIMEOUT' || error.code === 'CANCELLED')) {
      throw error;
    }
    throw new ContentStudioError(
      errorCode,
      `Content generation failed during ${phaseName} phase for "${run.topic}": ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

// ============================================================================
// Default Dependencies
// ============================================================================

function createDefaultDeps(): ContentGeneratorDeps {
  try {
    const settings = getSettings();
    return { generateText, model: createLanguageModel(settings), cacheTtlSeconds: settings.cacheTtlSeconds };
  } catch (error) {
    if (error instanceof SettingsError) {
      throw new ContentStudioError('CONFIG_ERROR', error.message, error);
    }
    throw error;
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * @throws ContentStudioError with 'INVALID_INPUT' for a blank topic or bad word count
 * @throws ContentStudioError with 'CONTENT_TOO_LONG' above the word limit
 */
export function validateGenerationRequest(request: ContentGenerationRequest, maxContentLength: number): void {
  if (!isNonEmptyText(request.topic)) {
    throw new ContentStudioError('INVALID_INPUT', 'Topic cannot be empty');
  }
  if (request.wordCount !== undefined) {
    if (!Number.isInteger(request.wordCount) || request.wordCount <= 0) {
      throw new ContentStudioError('INVALID_INPUT', 'Word count must be a positive integer');
    }
    assertWordCountAllowed(request.wordCount, maxContentLength);
  }
}

// ============================================================================
// Core Generator Function
// ============================================================================

/**
 * Generates researched, edited and SEO-optimized content for a topic.
 *
 * @param request - Topic plus optional audience, tone, length and keywords
 * @param deps - Optional dependencies (merged over defaults built from Settings)
 * @param options - Cancellation, timeout, progress and policy options
 *
 * @throws ContentStudioError with code 'INVALID_INPUT' | 'CONTENT_TOO_LONG' before any LLM call
 * @throws ContentStudioError with the failing phase's code ('RESEARCH_FAILED', 'WRITING_FAILED', ...)
 * @throws ContentStudioError with code 'TIMEOUT' | 'CANCELLED'
 * @throws ContentStudioError with code 'CONFIG_ERROR' when no model can be built
 *
 * @example
 * const result = await generateContent(
 *   { topic: 'Remote work productivity', targetAudience: 'managers', wordCount: 800 },
 *   undefined,
 *   { onProgress: (phase, progress) => console.log(phase, progress) }
 * );
 */
export async function generateContent(
  request: ContentGenerationRequest,
  deps?: Partial<ContentGeneratorDeps>,
  options?: ContentGeneratorOptions
): Promise<ContentGenerationResult> {
  // Input errors come before CONFIG_ERROR from default deps
  const maxContentLength = options?.maxContentLength ?? PIPELINE_CONFIG.DEFAULT_MAX_CONTENT_LENGTH;
  validateGenerationRequest(request, maxContentLength);

  const mergedDeps: ContentGeneratorDeps =
    deps?.generateText && deps.model
      ? { ...deps, generateText: deps.generateText, model: deps.model }
      : { ...createDefaultDeps(), ...deps };

  const topic = request.topic.trim();
  const contentType = request.contentType ?? options?.defaultContentType ?? 'article';
  const targetAudience = request.targetAudience ?? 'general';
  const wordCount = request.wordCount ?? WRITER_CONFIG.DEFAULT_WORD_COUNT;
  const tone = request.tone ?? WRITER_CONFIG.DEFAULT_TONE;
  const researchDepth = request.researchDepth ?? 'comprehensive';
  const keywords = request.keywords && request.keywords.length > 0 ? [...request.keywords] : [topic];
  const reviewEnabled = options?.reviewEnabled ?? true;

  const correlationId = options?.correlationId ?? generateCorrelationId();
  const log = createContextualLogger('[ContentGen]', { correlationId, topic });
  const clock = options?.clock ?? systemClock;
  const progressTracker = new ProgressTracker(options?.onProgress);
  const phaseTimer = new PhaseTimer(clock);
  const runController = new AbortController();
  const callerSignal = options?.signal;
  const cancelRun = () =>
    runController.abort(new ContentStudioError('CANCELLED', `Content generation for "${topic}" was cancelled`));
  if (callerSignal?.aborted) cancelRun();
  else callerSignal?.addEventListener('abort', cancelRun, { once: true });
  const run: RunContext = {
    signal: runController.signal,
    abort: (reason) => runController.abort(reason),
    startTime: clock.now(),
    timeoutMs: options?.timeoutMs ?? PIPELINE_CONFIG.DEFAULT_TIMEOUT_MS,
    topic,
    clock,
  };

  const agentDeps = (phase: ContentGenerationPhase): AgentDeps => ({
    generateText: mergedDeps.generateText,
    model: mergedDeps.model,
    logger: log.child({ phase }),
    signal: run.signal,
  });
  const byPhase: Partial<Record<ContentGenerationPhase, TokenUsage>> = {};
  const addUsage = (phase: ContentGenerationPhase, usage: TokenUsage) => {
    byPhase[phase] = addTokenUsage(byPhase[phase] ?? createEmptyTokenUsage(), usage);
  };

  log.info(`=== Starting content generation for "${topic}" ===`);

  try {
    // ===== PHASE 1: RESEARCH =====
    progressTracker.startPhase('research');
    phaseTimer.start('research');
    const research = await runPhase(
      'Research',
      'RESEARCH_FAILED',
      () =>
        getResearchFindings(
          { topic, researchDepth, contentType, targetAudience },
          {
            agent: agentDeps('research'),
            cache: mergedDeps.cache,
            cacheTtlSeconds: mergedDeps.cacheTtlSeconds,
            clock,
            correlationId,
          }
        ),
      run,
      true
    );
    phaseTimer.end('research');
    addUsage('research', research.output.tokenUsage);
    const findings = research.output.findings;
    log.info(
      `Research complete in ${research.durationMs}ms: ${findings.keyFacts.length} facts, ` +
        `${findings.sources.length} sources${research.output.cached ? ' (cached)' : ''}`
    );
    progressTracker.completePhase('research', `Found ${findings.keyFacts.length} key facts`);

    // ===== PHASE 2: WRITING =====
    progressTracker.startPhase('writing');
    phaseTimer.start('writing');
    const writing = await runPhase(
      'Writing',
      'WRITING_FAILED',
      () =>
        createContentDraft(
          topic,
          {
            contentType,
            targetAudience,
            wordCount,
            tone,
            keywords,
            additionalRequirements: buildResearchRequirements(findings),
          },
          agentDeps('writing')
        ),
      run,
      true
    );
    phaseTimer.end('writing');
    addUsage('writing', writing.output.tokenUsage);
    const draft = writing.output.draft;
    log.info(`Draft complete in ${writing.durationMs}ms: ${countWords(draft)} words`);
    progressTracker.completePhase('writing', `Wrote ${countWords(draft)} words`);

    // ===== PHASE 3: EDITING =====
    let review: ContentReview | undefined;
    let improved = draft;
    if (reviewEnabled) {
      progressTracker.startPhase('editing');
      phaseTimer.start('editing');
      const editing = await runPhase(
        'Editing',
        'EDITING_FAILED',
        async () => {
          const reviewed = await reviewContent(draft, { contentType, targetAudience }, agentDeps('editing'));
          progressTracker.report('editing', 50, 'Review complete, improving draft');
          const improvement = await improveContent(
            draft,
            reviewed.suggestions.length > 0 ? { improvementAreas: reviewed.suggestions } : {},
            agentDeps('editing')
          );
          return { reviewed, improvement };
        },
        run,
        true
      );
      phaseTimer.end('editing');
      const { tokenUsage: reviewUsage, ...reviewResult } = editing.output.reviewed;
      addUsage('editing', reviewUsage);
      addUsage('editing', editing.output.improvement.tokenUsage);
      review = reviewResult;
      improved = editing.output.improvement.content || draft;
      log.info(`Editing complete in ${editing.durationMs}ms: score ${review.overallScore ?? 'n/a'}`);
      progressTracker.completePhase('editing', `Review score: ${review.overallScore ?? 'n/a'}`);
    } else {
      log.info('Editing skipped (review disabled)');
    }

    // ===== PHASE 4: SEO =====
    progressTracker.startPhase('seo');
    phaseTimer.start('seo');
    const seo = await runPhase(
      'SEO',
      'SEO_FAILED',
      async () => {
        const optimization = await optimizeContent(improved, keywords, { contentType, targetAudience }, agentDeps('seo'));
        const optimizedText = optimization.optimizedContent || improved;
        progressTracker.report('seo', 50, 'Content optimized, writing meta tags');
        const metaTags = await generateMetaTags(optimizedText, keywords, { contentType }, agentDeps('seo'));
        return { optimization, optimizedText, metaTags };
      },
      run,
      true
    );
    phaseTimer.end('seo');
    addUsage('seo', seo.output.optimization.tokenUsage);
    addUsage('seo', seo.output.metaTags.tokenUsage);
    const finalContent = seo.output.optimizedText;
    log.info(`SEO complete in ${seo.durationMs}ms: score ${seo.output.optimization.seoScore ?? 'n/a'}`);
    progressTracker.completePhase('seo', `SEO score: ${seo.output.optimization.seoScore ?? 'n/a'}`);

    // ===== PHASE 5: CREATIVE =====
    progressTracker.startPhase('creative');
    phaseTimer.start('creative');
    const creative = await runPhase(
      'Creative',
      'CREATIVE_FAILED',
      () =>
        brainstormHeadlines(
          topic,
          { contentType, headlineCount: CREATIVE_CONFIG.PIPELINE_HEADLINE_COUNT },
          agentDeps('creative')
        ),
      run,
      true
    );
    phaseTimer.end('creative');
    addUsage('creative', creative.output.tokenUsage);
    const headlines = creative.output.headlineList;
    progressTracker.completePhase('creative', `Brainstormed ${headlines.length} headlines`);

    const seoResult: ContentSeoResult = {
      optimizedContent: finalContent,
      seoScore: seo.output.optimization.seoScore,
      recommendations: seo.output.optimization.recommendations,
      metaTitle: seo.output.metaTags.metaTitle,
      metaDescription: seo.output.metaTags.metaDescription,
    };

    // ===== PHASE 6: HISTORY =====
    let historyEntryId: number | null = null;
    const history = mergedDeps.history;
    if (history) {
      progressTracker.startPhase('history');
      phaseTimer.start('history');
      const recorded = await runPhase(
        'History',
        'HISTORY_FAILED',
        () =>
          history.record({
            correlationId,
            kind: 'content',
            action: 'pipeline',
            agent: null,
            topic,
            status: 'completed',
            input: { ...request, topic },
            output: {
              content: finalContent,
              headlines,
              meta_title: seoResult.metaTitle,
              meta_description: seoResult.metaDescription,
              seo_score: seoResult.seoScore,
            },
            error: null,
            durationMs: clock.now() - run.startTime,
          }),
        run
      );
      phaseTimer.end('history');
      historyEntryId = recorded.output.id;
      progressTracker.completePhase('history', `Recorded history entry ${historyEntryId}`);
    }

    const totalDurationMs = clock.now() - run.startTime;
    let total = createEmptyTokenUsage();
    for (const usage of Object.values(byPhase)) {
      total = addTokenUsage(total, usage);
    }

    log.info(
      `=== Content generation complete in ${totalDurationMs}ms: ${countWords(finalContent)} words, ` +
        `${total.input + total.output} tokens ===`
    );

    return {
      topic,
      contentType,
      targetAudience,
      research: findings,
      draft,
      ...(review ? { review } : {}),
      finalContent,
      seo: seoResult,
      headlines,
      metadata: {
        correlationId,
        generatedAt: isoTimestamp(clock),
        totalDurationMs,
        phaseDurations: phaseTimer.getDurations(),
        tokenUsage: { total, byPhase },
        reviewEnabled,
        wordCount: countWords(finalContent),
        historyEntryId,
      },
    };
  } catch (error) {
    await recordFailure(mergedDeps.history, log, {
      correlationId,
      topic,
      request,
      error,
      durationMs: clock.now() - run.startTime,
    });
    throw error;
  } finally {
    callerSignal?.removeEventListener('abort', cancelRun);
  }
}

async function recordFailure(
  history: HistoryStore | undefined,
  log: ContextualLogger,
  failure: {
    readonly correlationId: string;
    readonly topic: string;
    readonly request: ContentGenerationRequest;
    readonly error: unknown;
    readonly durationMs: number;
  }
): Promise<void> {
  log.error(`Content generation failed: ${errorMessage(failure.error)}`);
  await recordSafely(
    history,
    {
      correlationId: failure.correlationId,
      kind: 'action',
      action: 'pipeline',
      agent: null,
      topic: failure.topic,
      status: 'failed',
      input: failure.request,
      output: null,
      error: errorMessage(failure.error),
      durationMs: failure.durationMs,
    },
    log
  );
}
