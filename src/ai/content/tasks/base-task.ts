/**
 * Base Task
 *
 * A task pairs an agent with a description of the work and the output expected.
 * Task operations record every call to the Back History, whether it succeeds or fails.
 */

import type { CacheStore } from '../../../cache';
import { recordSafely, type HistoryKind, type HistoryStore } from '../../../history';
import { createPrefixedLogger, generateCorrelationId, type Logger } from '../../../utils/logger';
import { executeAgentTask, type AgentDeps, type AgentProfile } from '../agents/shared';
import { errorMessage, isoTimestamp, systemClock, type Clock, type TokenUsage } from '../types';

// ============================================================================
// Types
// ============================================================================

export interface TaskDefinition {
  readonly name: string;
  readonly description: string;
  readonly expectedOutput: string;
  readonly agent: AgentProfile;
}

export interface TaskInfo {
  readonly name: string;
  readonly description: string;
  readonly expected_output: string;
  readonly agent: string;
}

export interface TaskRunResult {
  readonly task_name: string;
  readonly result: string;
  readonly status: 'completed';
  readonly agent_used: string;
}

/**
 * Everything a task operation needs besides its request.
 */
export interface TaskDeps {
  readonly agent: AgentDeps;
  readonly history?: HistoryStore;
  readonly cache?: CacheStore;
  /** Seconds research results stay cached; 0 disables caching */
  readonly cacheTtlSeconds?: number;
  readonly clock?: Clock;
  readonly correlationId?: string;
  readonly logger?: Logger;
}

// ============================================================================
// Definition Helpers
// ============================================================================

export function taskLoggerName(name: string): string {
  return `[task.${name.toLowerCase().replace(/\s+/g, '_')}]`;
}

export function getTaskInfo(def: TaskDefinition): TaskInfo {
  return {
    name: def.name,
    description: def.description,
    expected_output: def.expectedOutput,
    agent: def.agent.name,
  };
}

export function updateDescription(def: TaskDefinition, description: string): TaskDefinition {
  return { ...def, description };
}

export function updateExpectedOutput(def: TaskDefinition, expectedOutput: string): TaskDefinition {
  return { ...def, expectedOutput };
}

/**
 * Timestamp for task results, from the injected clock.
 */
export function taskTimestamp(deps: Pick<TaskDeps, 'clock'>): string {
  return isoTimestamp(deps.clock ?? systemClock);
}

// ============================================================================
// History Tracking
// ============================================================================

export interface TrackedAction {
  readonly task: TaskDefinition;
  /** History action name, e.g. 'research_topic' */
  readonly action: string;
  readonly topic: string | null;
  readonly input: unknown;
  readonly kind?: HistoryKind;
}

/**
 * Runs `fn` and writes one history entry for it: `completed` with the output, or
 * `failed` with the error message (the error is rethrown). History write failures
 * are logged and never fail the operation.
 */
export async function trackAction<T>(
  tracked: TrackedAction,
  deps: TaskDeps,
  fn: () => Promise<T>
): Promise<T> {
  const clock = deps.clock ?? systemClock;
  const log = deps.logger ?? createPrefixedLogger(taskLoggerName(tracked.task.name));
  const correlationId = deps.correlationId ?? generateCorrelationId();
  const startedAt = clock.now();
  const base = {
    correlationId,
    kind: tracked.kind ?? 'action',
    action: tracked.action,
    agent: tracked.task.agent.name,
    topic: tracked.topic,
    input: tracked.input,
  } as const;

  try {
    const output = await fn();
    await recordSafely(
      deps.history,
      { ...base, status: 'completed', output, error: null, durationMs: clock.now() - startedAt },
      log
    );
    return output;
  } catch (error) {
    log.error(`${tracked.action} failed: ${errorMessage(error)}`);
    await recordSafely(
      deps.history,
      {
        ...base,
        status: 'failed',
        output: null,
        error: errorMessage(error),
        durationMs: clock.now() - startedAt,
      },
      log
    );
    throw error;
  }
}

// ============================================================================
// Running a Definition
// ============================================================================

/**
 * Executes the definition's agent with `description` (or the definition's own).
 */
export async function runTask(
  def: TaskDefinition,
  description: string | undefined,
  deps: TaskDeps
): Promise<TaskRunResult & { readonly token_usage: TokenUsage }> {
  const log = deps.logger ?? createPrefixedLogger(taskLoggerName(def.name));
  const prompt = description ?? def.description;
  log.info(`Running task "${def.name}" with agent ${def.agent.name}`);

  return trackAction({ task: def, action: 'run_task', topic: null, input: { description: prompt } }, deps, async () => {
    const { text, tokenUsage } = await executeAgentTask(
      def.agent,
      `${prompt}\n\nExpected output: ${def.expectedOutput}`,
      undefined,
      deps.agent
    );
    return {
      task_name: def.name,
      result: text,
      status: 'completed' as const,
      agent_used: def.agent.name,
      token_usage: tokenUsage,
    };
  });
}

// ============================================================================
// Wire Format
// ============================================================================

function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copies an agent result with snake_case keys (the HTTP wire format), recursing into
 * nested objects. Arrays and primitives are kept as they are.
 */
export function toSnakeCaseKeys(value: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[toSnakeCase(key)] = isPlainObject(entry) ? toSnakeCaseKeys(entry) : entry;
  }
  return result;
}
