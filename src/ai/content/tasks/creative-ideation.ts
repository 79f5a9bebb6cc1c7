/**
 * Creative Ideation Task
 */

import { brainstormHeadlines, CREATIVE_AGENT, generateContentIdeas } from '../agents/creative';
import type { HeadlinesRequest, IdeasRequest } from '../validation';
import { taskTimestamp, toSnakeCaseKeys, trackAction, type TaskDefinition, type TaskDeps } from './base-task';

export const CREATIVE_IDEATION_TASK: TaskDefinition = {
  name: 'Creative Ideation',
  description: 'Generate original content ideas and headlines for a topic.',
  expectedOutput: 'A list of ideas with angles and engagement potential, or a set of headlines.',
  agent: CREATIVE_AGENT,
};

export interface IdeasTaskResult {
  readonly ideas_data: Record<string, unknown>;
  readonly ideation_timestamp: string;
  readonly status: 'ideas_generated';
}

export interface HeadlinesTaskResult {
  readonly headlines_data: Record<string, unknown>;
  readonly headlines_timestamp: string;
  readonly status: 'headlines_generated';
}

export async function runIdeasTask(
  request: IdeasRequest,
  defaults: { readonly contentType: string },
  deps: TaskDeps
): Promise<IdeasTaskResult> {
  return trackAction(
    { task: CREATIVE_IDEATION_TASK, action: 'generate_ideas', topic: request.topic, input: request },
    deps,
    async () => {
      const ideas = await generateContentIdeas(
        request.topic,
        {
          contentType: request.content_type ?? defaults.contentType,
          targetAudience: request.target_audience,
          ideaCount: request.idea_count,
          creativityLevel: request.creativity_level,
        },
        deps.agent
      );
      return {
        ideas_data: toSnakeCaseKeys(ideas),
        ideation_timestamp: taskTimestamp(deps),
        status: 'ideas_generated' as const,
      };
    }
  );
}

export async function runHeadlinesTask(
  request: HeadlinesRequest,
  defaults: { readonly contentType: string },
  deps: TaskDeps
): Promise<HeadlinesTaskResult> {
  return trackAction(
    { task: CREATIVE_IDEATION_TASK, action: 'brainstorm_headlines', topic: request.topic, input: request },
    deps,
    async () => {
      const headlines = await brainstormHeadlines(
        request.topic,
        {
          contentType: request.content_type ?? defaults.contentType,
          headlineCount: request.headline_count,
          headlineStyle: request.headline_style,
        },
        deps.agent
      );
      return {
        headlines_data: toSnakeCaseKeys(headlines),
        headlines_timestamp: taskTimestamp(deps),
        status: 'headlines_generated' as const,
      };
    }
  );
}
