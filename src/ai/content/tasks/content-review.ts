/**
 * Content Review Task
 */

import { EDITOR_AGENT, improveContent, reviewContent } from '../agents/editor';
import type { TokenUsage } from '../types';
import type { ImproveRequest, ReviewRequest } from '../validation';
import { taskTimestamp, toSnakeCaseKeys, trackAction, type TaskDefinition, type TaskDeps } from './base-task';

export const CONTENT_REVIEW_TASK: TaskDefinition = {
  name: 'Content Review',
  description: 'Review content for quality, correctness and engagement, then improve it.',
  expectedOutput: 'An overall score with concrete suggestions, or an improved version of the content.',
  agent: EDITOR_AGENT,
};

export interface ReviewTaskResult {
  readonly review_data: Record<string, unknown>;
  readonly content_original: string;
  readonly review_timestamp: string;
  readonly status: 'reviewed';
}

export interface ImproveTaskResult {
  readonly original_content: string;
  readonly improved_content: string;
  readonly improvement_timestamp: string;
  readonly status: 'improved';
  readonly token_usage: TokenUsage;
}

export async function runReviewTask(
  request: ReviewRequest,
  defaults: { readonly contentType: string },
  deps: TaskDeps
): Promise<ReviewTaskResult> {
  return trackAction(
    { task: CONTENT_REVIEW_TASK, action: 'review_content', topic: null, input: request },
    deps,
    async () => {
      const review = await reviewContent(
        request.content,
        {
          contentType: request.content_type ?? defaults.contentType,
          targetAudience: request.target_audience,
          reviewFocus: request.review_focus,
        },
        deps.agent
      );
      return {
        review_data: toSnakeCaseKeys(review),
        content_original: request.content,
        review_timestamp: taskTimestamp(deps),
        status: 'reviewed' as const,
      };
    }
  );
}

export async function runImproveTask(request: ImproveRequest, deps: TaskDeps): Promise<ImproveTaskResult> {
  return trackAction(
    { task: CONTENT_REVIEW_TASK, action: 'improve_content', topic: null, input: request },
    deps,
    async () => {
      const { content, tokenUsage } = await improveContent(
        request.content,
        { improvementAreas: request.improvement_areas },
        deps.agent
      );
      return {
        original_content: request.content,
        improved_content: content,
        improvement_timestamp: taskTimestamp(deps),
        status: 'improved' as const,
        token_usage: tokenUsage,
      };
    }
  );
}
