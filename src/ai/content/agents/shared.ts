/**
 * Shared Agent Runtime
 *
 * Every agent is a role-scoped profile plus a set of operations. Operations build a task
 * description and hand it to executeAgentTask, which owns logging, retries and timeouts.
 */

import type { LanguageModel } from 'ai';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { AGENT_CONFIG } from '../config';
import { withRetry } from '../retry';
import { isNonEmptyText } from '../text-utils';
import { ContentStudioError, errorMessage, toTokenUsage, type TokenUsage } from '../types';

// ============================================================================
// Types
// ============================================================================

/**
 * Identity of an agent, used as its system prompt.
 */
export interface AgentProfile {
  readonly name: string;
  readonly role: string;
  readonly goal: string;
}

export interface AgentDeps {
  readonly generateText: typeof import('ai').generateText;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  /** Optional AbortSignal for cancellation support */
  readonly signal?: AbortSignal;
  /** Optional temperature override (default: AGENT_CONFIG.TEMPERATURE) */
  readonly temperature?: number;
}

/**
 * Raw result of one agent task.
 */
export interface AgentTaskOutput {
  readonly text: string;
  readonly tokenUsage: TokenUsage;
}

/**
 * Every agent operation result carries the tokens it spent.
 */
export type WithTokenUsage<T> = T & { readonly tokenUsage: TokenUsage };

// ============================================================================
// Helpers
// ============================================================================

/**
 * Public description of an agent.
 */
export function getAgentInfo(profile: AgentProfile): { name: string; role: string; goal: string } {
  return { name: profile.name, role: profile.role, goal: profile.goal };
}

/**
 * Builds the system prompt from the agent's role and goal.
 */
export function buildAgentSystemPrompt(profile: AgentProfile): string {
  return `You are the ${profile.name}.

Role: ${profile.role}

Goal: ${profile.goal}

Respond in plain text. Put each distinct point on its own line and label lines clearly
(for example "Key fact: ...", "Source: ...", "Score: 8/10") so they can be read line by line.`;
}

/**
 * True for a string that is non-empty after trimming.
 */
export function validateTextInput(value: unknown): value is string {
  return isNonEmptyText(value);
}

/**
 * Throws INVALID_INPUT unless the value is non-empty text.
 */
export function requireText(value: unknown, message: string): string {
  if (!validateTextInput(value)) {
    throw new ContentStudioError('INVALID_INPUT', message);
  }
  return value.trim();
}

function loggerName(profile: AgentProfile): string {
  return `[agent.${profile.name.toLowerCase().replace(/\s+/g, '_')}]`;
}

// ============================================================================
// Task Execution
// ============================================================================

/**
 * Runs one task for an agent.
 *
 * When `context` is given it is appended to the prompt as `Context: <json>`.
 * Each attempt gets its own timeout window combined with the caller's signal.
 *
 * @returns Trimmed model output and token usage
 */
export async function executeAgentTask(
  profile: AgentProfile,
  description: string,
  context: Readonly<Record<string, unknown>> | undefined,
  deps: AgentDeps
): Promise<AgentTaskOutput> {
  const log = deps.logger ?? createPrefixedLogger(loggerName(profile));
  const temperature = deps.temperature ?? AGENT_CONFIG.TEMPERATURE;
  const prompt = context ? `${description}\n\nContext: ${JSON.stringify(context)}` : description;

  const summary = description.trim().split('\n')[0].slice(0, AGENT_CONFIG.LOG_DESCRIPTION_CHARS);
  log.info(`Executing task: ${summary}`);

  const createTimeoutSignal = (): AbortSignal => {
    const timeoutSignal = AbortSignal.timeout(AGENT_CONFIG.TIMEOUT_MS);
    return deps.signal ? AbortSignal.any([deps.signal, timeoutSignal]) : timeoutSignal;
  };

  try {
    const { text, usage } = await withRetry(
      () =>
        deps.generateText({
          model: deps.model,
          temperature,
          system: buildAgentSystemPrompt(profile),
          prompt,
          abortSignal: createTimeoutSignal(),
        }),
      { context: `${profile.name} task`, signal: deps.signal }
    );

    log.info('Task completed successfully');
    return { text: text.trim(), tokenUsage: toTokenUsage(usage) };
  } catch (error) {
    log.error(`Error executing task: ${errorMessage(error)}`);
    throw error;
  }
}
