/**
 * SEO Optimization Task
 */

import { generateMetaTags, optimizeContent, SEO_AGENT } from '../agents/seo';
import type { MetaTagsRequest, SeoOptimizeRequest } from '../validation';
import { taskTimestamp, toSnakeCaseKeys, trackAction, type TaskDefinition, type TaskDeps } from './base-task';

export const SEO_OPTIMIZATION_TASK: TaskDefinition = {
  name: 'SEO Optimization',
  description: 'Optimize content for the target keywords and write its meta tags.',
  expectedOutput: 'Optimized content with an SEO score, recommendations and meta title/description.',
  agent: SEO_AGENT,
};

export interface SeoTaskResult {
  readonly seo_data: Record<string, unknown>;
  readonly original_content: string;
  readonly optimization_timestamp: string;
  readonly status: 'optimized';
}

export interface MetaTagsTaskResult {
  readonly meta_tags: Record<string, unknown>;
  readonly content: string;
  readonly generation_timestamp: string;
  readonly status: 'meta_tags_generated';
}

export async function runSeoOptimizationTask(
  request: SeoOptimizeRequest,
  defaults: { readonly contentType: string },
  deps: TaskDeps
): Promise<SeoTaskResult> {
  return trackAction(
    { task: SEO_OPTIMIZATION_TASK, action: 'optimize_content', topic: null, input: request },
    deps,
    async () => {
      const result = await optimizeContent(
        request.content,
        request.target_keywords,
        {
          contentType: request.content_type ?? defaults.contentType,
          targetAudience: request.target_audience,
        },
        deps.agent
      );
      return {
        seo_data: toSnakeCaseKeys(result),
        original_content: request.content,
        optimization_timestamp: taskTimestamp(deps),
        status: 'optimized' as const,
      };
    }
  );
}

export async function runMetaTagsTask(
  request: MetaTagsRequest,
  defaults: { readonly contentType: string },
  deps: TaskDeps
): Promise<MetaTagsTaskResult> {
  return trackAction(
    { task: SEO_OPTIMIZATION_TASK, action: 'generate_meta_tags', topic: null, input: request },
    deps,
    async () => {
      const tags = await generateMetaTags(
        request.content,
        request.keywords,
        { contentType: request.content_type ?? defaults.contentType },
        deps.agent
      );
      return {
        meta_tags: toSnakeCaseKeys(tags),
        content: request.content,
        generation_timestamp: taskTimestamp(deps),
        status: 'meta_tags_generated' as const,
      };
    }
  );
}
