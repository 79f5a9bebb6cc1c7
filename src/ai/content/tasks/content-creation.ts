/**
 * Content Creation Task
 *
 * Researches a topic, then drafts content with the research folded in as requirements.
 */

import { recordSafely } from '../../../history';
import { createPrefixedLogger, generateCorrelationId } from '../../../utils/logger';
import { RESEARCH_AGENT, type ResearchFindings } from '../agents/research';
import { getAgentInfo, requireText } from '../agents/shared';
import { createContentDraft, WRITER_AGENT } from '../agents/writer';
import { RESEARCH_REQUIREMENTS_CONFIG } from '../config';
import { countWords } from '../text-utils';
import { addTokenUsage, systemClock, type TokenUsage } from '../types';
import type { ContentRequest } from '../validation';
import { getResearchFindings } from './research';
import {
  taskLoggerName,
  taskTimestamp,
  toSnakeCaseKeys,
  trackAction,
  type TaskDefinition,
  type TaskDeps,
} from './base-task';

export const CONTENT_CREATION_TASK: TaskDefinition = {
  name: 'Content Creation',
  description: 'Research a topic and write original content for the requested audience, tone and length.',
  expectedOutput: 'A complete draft that incorporates the research findings and target keywords.',
  agent: WRITER_AGENT,
};

export interface ContentCreationResult {
  readonly topic: string;
  readonly content_type: string;
  readonly target_audience: string;
  readonly word_count: number;
  readonly tone: string;
  readonly keywords: string[];
  readonly research_data: Record<string, unknown>;
  readonly content: {
    readonly draft_content: string;
    readonly research_incorporated: true;
    readonly word_count_actual: number;
    readonly keywords_used: string[];
  };
  readonly creation_timestamp: string;
  readonly status: 'completed';
  readonly token_usage: TokenUsage;
}

/**
 * Turns research into the writer's additional requirements: key facts (5),
 * credible sources (3) and key insights (3), one labelled line each.
 * Lines with nothing to list are left out.
 */
export function buildResearchRequirements(research: Pick<ResearchFindings, 'keyFacts' | 'sources' | 'insights'>): string {
  const lines: string[] = [];
  const keyFacts = research.keyFacts.slice(0, RESEARCH_REQUIREMENTS_CONFIG.MAX_KEY_FACTS);
  const sources = research.sources.slice(0, RESEARCH_REQUIREMENTS_CONFIG.MAX_SOURCES);
  const insights = research.insights.slice(0, RESEARCH_REQUIREMENTS_CONFIG.MAX_INSIGHTS);

  if (keyFacts.length > 0) lines.push(`Key Facts: ${keyFacts.join(', ')}`);
  if (sources.length > 0) lines.push(`Credible Sources: ${sources.join(', ')}`);
  if (insights.length > 0) lines.push(`Key Insights: ${insights.join(', ')}`);

  return lines.join('\n');
}

/**
 * @throws ContentStudioError with 'INVALID_INPUT' when the topic is blank
 */
export function validateContentRequest(request: Pick<ContentRequest, 'topic'>): void {
  requireText(request.topic, 'Topic cannot be empty');
}

export function getContentCreationInfo(): {
  task: string;
  agents: { name: string; role: string; goal: string }[];
  workflow: string[];
} {
  return {
    task: CONTENT_CREATION_TASK.name,
    agents: [getAgentInfo(RESEARCH_AGENT), getAgentInfo(WRITER_AGENT)],
    workflow: [
      'Research the topic',
      'Turn key facts, sources and insights into writing requirements',
      'Draft the content for the target audience and tone',
      'Count words and record the keywords used',
      'Record the result in the Back History',
    ],
  };
}

export async function createContent(
  request: ContentRequest,
  defaults: { readonly contentType: string },
  deps: TaskDeps
): Promise<ContentCreationResult> {
  validateContentRequest(request);
  const contentType = request.content_type ?? defaults.contentType;
  const keywords = request.keywords ?? [];
  const correlationId = deps.correlationId ?? generateCorrelationId();
  const trackedDeps: TaskDeps = { ...deps, correlationId };
  const clock = deps.clock ?? systemClock;
  const startedAt = clock.now();

  const result = await trackAction(
    { task: CONTENT_CREATION_TASK, action: 'create_content', topic: request.topic, input: request },
    trackedDeps,
    async (): Promise<ContentCreationResult> => {
      const research = await getResearchFindings(
        {
          topic: request.topic,
          researchDepth: request.research_depth,
          contentType,
          targetAudience: request.target_audience,
        },
        deps
      );

      const { draft, tokenUsage: draftUsage } = await createContentDraft(
        request.topic,
        {
          contentType,
          targetAudience: request.target_audience,
          wordCount: request.word_count,
          tone: request.tone,
          keywords: request.keywords,
          additionalRequirements: buildResearchRequirements(research.findings),
        },
        deps.agent
      );

      return {
        topic: request.topic,
        content_type: contentType,
        target_audience: request.target_audience,
        word_count: request.word_count,
        tone: request.tone,
        keywords,
        research_data: toSnakeCaseKeys({ ...research.findings, tokenUsage: research.tokenUsage }),
        content: {
          draft_content: draft,
          research_incorporated: true,
          word_count_actual: countWords(draft),
          keywords_used: keywords,
        },
        creation_timestamp: taskTimestamp(deps),
        status: 'completed',
        token_usage: addTokenUsage(research.tokenUsage, draftUsage),
      };
    }
  );

  await recordSafely(
    deps.history,
    {
      correlationId,
      kind: 'content',
      action: 'create_content',
      agent: WRITER_AGENT.name,
      topic: request.topic,
      status: 'completed',
      input: request,
      output: { content: result.content.draft_content, word_count: result.content.word_count_actual },
      error: null,
      durationMs: clock.now() - startedAt,
    },
    deps.logger ?? createPrefixedLogger(taskLoggerName(CONTENT_CREATION_TASK.name))
  );

  return result;
}
