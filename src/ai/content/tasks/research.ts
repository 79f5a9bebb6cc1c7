/**
 * Research Task
 *
 * Topic research (cached) and fact-checking through the Research agent.
 */

import { z } from 'zod';

import { createPrefixedLogger } from '../../../utils/logger';
import { factCheckContent, researchTopic, RESEARCH_AGENT, type ResearchFindings } from '../agents/research';
import { CACHE_CONFIG } from '../config';
import type { FactCheckRequest, ResearchRequest } from '../validation';
import { errorMessage, type TokenUsage } from '../types';
import {
  taskTimestamp,
  toSnakeCaseKeys,
  trackAction,
  type TaskDefinition,
  type TaskDeps,
} from './base-task';

export const RESEARCH_TASK: TaskDefinition = {
  name: 'Research',
  description: 'Research a topic thoroughly and verify the accuracy of existing content.',
  expectedOutput: 'Research findings with key facts, credible sources, insights and recommendations.',
  agent: RESEARCH_AGENT,
};

export interface ResearchTaskResult {
  readonly research_data: Record<string, unknown>;
  readonly research_timestamp: string;
  readonly status: 'researched';
  readonly cached: boolean;
}

export interface FactCheckTaskResult {
  readonly fact_check_data: Record<string, unknown>;
  readonly content: string;
  readonly fact_check_timestamp: string;
  readonly status: 'fact_checked';
}

// ============================================================================
// Cache
// ============================================================================

const CachedFindingsSchema = z.object({
  topic: z.string(),
  researchFindings: z.string(),
  keyFacts: z.array(z.string()),
  sources: z.array(z.string()),
  insights: z.array(z.string()),
  recommendations: z.array(z.string()),
});

export interface ResearchKeyParts {
  readonly topic: string;
  readonly researchDepth: string;
  readonly contentType: string;
  readonly targetAudience: string;
}

/**
 * `research:<depth>:<type>:<audience>:<topic>` with the topic lowercased and trimmed.
 */
export function researchCacheKey(parts: ResearchKeyParts): string {
  return [
    CACHE_CONFIG.RESEARCH_KEY_PREFIX,
    parts.researchDepth,
    parts.contentType,
    parts.targetAudience,
    parts.topic.trim().toLowerCase(),
  ].join(':');
}

async function readCachedFindings(key: string, deps: TaskDeps): Promise<ResearchFindings | null> {
  if (!deps.cache || !deps.cacheTtlSeconds) return null;
  const raw = await deps.cache.get(key);
  if (raw === null) return null;

  try {
    const parsed = CachedFindingsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    createPrefixedLogger('[task.research]').warn(`Ignoring unreadable cache entry "${key}": ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Research findings for a topic, served from the cache when present.
 * Token usage is zero on a cache hit.
 */
export async function getResearchFindings(
  parts: ResearchKeyParts,
  deps: TaskDeps
): Promise<{ findings: ResearchFindings; tokenUsage: TokenUsage; cached: boolean }> {
  const key = researchCacheKey(parts);
  const cachedFindings = await readCachedFindings(key, deps);
  if (cachedFindings) {
    return { findings: cachedFindings, tokenUsage: { input: 0, output: 0 }, cached: true };
  }

  const { tokenUsage, ...findings } = await researchTopic(parts.topic, parts, deps.agent);
  if (deps.cache && deps.cacheTtlSeconds) {
    await deps.cache.set(key, JSON.stringify(findings), deps.cacheTtlSeconds);
  }
  return { findings, tokenUsage, cached: false };
}

// ============================================================================
// Operations
// ============================================================================

export async function runResearchTask(
  request: ResearchRequest,
  defaults: { readonly contentType: string },
  deps: TaskDeps
): Promise<ResearchTaskResult> {
  const parts: ResearchKeyParts = {
    topic: request.topic,
    researchDepth: request.research_depth ?? 'comprehensive',
    contentType: request.content_type ?? defaults.contentType,
    targetAudience: request.target_audience ?? 'general',
  };

  return trackAction(
    { task: RESEARCH_TASK, action: 'research_topic', topic: request.topic, input: request },
    deps,
    async () => {
      const { findings, tokenUsage, cached } = await getResearchFindings(parts, deps);
      return {
        research_data: toSnakeCaseKeys({ ...findings, tokenUsage }),
        research_timestamp: taskTimestamp(deps),
        status: 'researched' as const,
        cached,
      };
    }
  );
}

export async function runFactCheckTask(request: FactCheckRequest, deps: TaskDeps): Promise<FactCheckTaskResult> {
  return trackAction(
    { task: RESEARCH_TASK, action: 'fact_check', topic: request.topic, input: request },
    deps,
    async () => {
      const result = await factCheckContent(request.content, request.topic, deps.agent);
      return {
        fact_check_data: toSnakeCaseKeys(result),
        content: request.content,
        fact_check_timestamp: taskTimestamp(deps),
        status: 'fact_checked' as const,
      };
    }
  );
}
