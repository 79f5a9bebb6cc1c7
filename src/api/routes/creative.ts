import { Router } from 'express';

import { createContentHooks, createContentSeries, generateViralConcepts } from '../../ai/content/agents/creative';
import { taskTimestamp, toSnakeCaseKeys, trackAction } from '../../ai/content/tasks/base-task';
import {
  CREATIVE_IDEATION_TASK,
  runHeadlinesTask,
  runIdeasTask,
} from '../../ai/content/tasks/creative-ideation';
import {
  HeadlinesRequestSchema,
  HooksSchema,
  IdeasRequestSchema,
  SeriesSchema,
  ViralSchema,
} from '../../ai/content/validation';
import { contentDefaults, taskDepsFor, type AppDeps } from '../context';
import { asyncHandler } from '../middleware/error-handler';

export function createCreativeRouter(deps: AppDeps): Router {
  const router = Router();

  router.post(
    '/ideas',
    asyncHandler(async (req, res) => {
      const body = IdeasRequestSchema.parse(req.body);
      res.json(await runIdeasTask(body, contentDefaults(deps), taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/headlines',
    asyncHandler(async (req, res) => {
      const body = HeadlinesRequestSchema.parse(req.body);
      res.json(await runHeadlinesTask(body, contentDefaults(deps), taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/hooks',
    asyncHandler(async (req, res) => {
      const body = HooksSchema.parse(req.body);
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: CREATIVE_IDEATION_TASK, action: 'create_hooks', topic: body.topic, input: body },
        taskDeps,
        async () => {
          const hooks = await createContentHooks(
            body.topic,
            { hookCount: body.hook_count, hookType: body.hook_type },
            taskDeps.agent
          );
          return {
            hooks_data: toSnakeCaseKeys(hooks),
            hooks_timestamp: taskTimestamp(taskDeps),
            status: 'hooks_created' as const,
          };
        }
      );
      res.json(result);
    })
  );

  router.post(
    '/viral',
    asyncHandler(async (req, res) => {
      const body = ViralSchema.parse(req.body);
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: CREATIVE_IDEATION_TASK, action: 'generate_viral_concepts', topic: body.topic, input: body },
        taskDeps,
        async () => {
          const concepts = await generateViralConcepts(
            body.topic,
            { platform: body.platform, conceptCount: body.concept_count },
            taskDeps.agent
          );
          return {
            viral_data: toSnakeCaseKeys(concepts),
            viral_timestamp: taskTimestamp(taskDeps),
            status: 'viral_concepts_generated' as const,
          };
        }
      );
      res.json(result);
    })
  );

  router.post(
    '/series',
    asyncHandler(async (req, res) => {
      const body = SeriesSchema.parse(req.body);
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: CREATIVE_IDEATION_TASK, action: 'create_series', topic: body.topic, input: body },
        taskDeps,
        async () => {
          const series = await createContentSeries(
            body.topic,
            {
              seriesLength: body.series_length,
              contentType: body.content_type ?? deps.settings.defaultContentType,
            },
            taskDeps.agent
          );
          return {
            series_data: toSnakeCaseKeys(series),
            series_timestamp: taskTimestamp(taskDeps),
            status: 'series_created' as const,
          };
        }
      );
      res.json(result);
    })
  );

  return router;
}
