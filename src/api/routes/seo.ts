import { Router } from 'express';

import { analyzeContentSeo, suggestKeywords } from '../../ai/content/agents/seo';
import { taskTimestamp, toSnakeCaseKeys, trackAction } from '../../ai/content/tasks/base-task';
import {
  runMetaTagsTask,
  runSeoOptimizationTask,
  SEO_OPTIMIZATION_TASK,
} from '../../ai/content/tasks/seo-optimization';
import {
  KeywordSuggestionSchema,
  MetaTagsSchema,
  SeoAnalyzeSchema,
  SeoOptimizeSchema,
} from '../../ai/content/validation';
import { checkContentLength, contentDefaults, taskDepsFor, type AppDeps } from '../context';
import { asyncHandler } from '../middleware/error-handler';

export function createSeoRouter(deps: AppDeps): Router {
  const router = Router();

  router.post(
    '/optimize',
    asyncHandler(async (req, res) => {
      const body = SeoOptimizeSchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      res.json(await runSeoOptimizationTask(body, contentDefaults(deps), taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/meta-tags',
    asyncHandler(async (req, res) => {
      const body = MetaTagsSchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      res.json(await runMetaTagsTask(body, contentDefaults(deps), taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/keywords',
    asyncHandler(async (req, res) => {
      const body = KeywordSuggestionSchema.parse(req.body);
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: SEO_OPTIMIZATION_TASK, action: 'suggest_keywords', topic: body.topic, input: body },
        taskDeps,
        async () => {
          const suggestions = await suggestKeywords(
            body.topic,
            {
              contentType: body.content_type ?? deps.settings.defaultContentType,
              targetAudience: body.target_audience,
            },
            taskDeps.agent
          );
          return {
            keyword_data: toSnakeCaseKeys(suggestions),
            suggestion_timestamp: taskTimestamp(taskDeps),
            status: 'keywords_suggested' as const,
          };
        }
      );
      res.json(result);
    })
  );

  router.post(
    '/analyze',
    asyncHandler(async (req, res) => {
      const body = SeoAnalyzeSchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: SEO_OPTIMIZATION_TASK, action: 'analyze_seo', topic: null, input: body },
        taskDeps,
        async () => ({
          seo_analysis: toSnakeCaseKeys(await analyzeContentSeo(body.content, body.keywords, taskDeps.agent)),
          analysis_timestamp: taskTimestamp(taskDeps),
          status: 'analyzed' as const,
        })
      );
      res.json(result);
    })
  );

  return router;
}
