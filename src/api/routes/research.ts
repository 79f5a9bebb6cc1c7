import { Router } from 'express';

import { analyzeTrends, findExpertQuotes, gatherStatistics } from '../../ai/content/agents/research';
import { taskTimestamp, toSnakeCaseKeys, trackAction } from '../../ai/content/tasks/base-task';
import { RESEARCH_TASK, runFactCheckTask, runResearchTask } from '../../ai/content/tasks/research';
import {
  FactCheckSchema,
  QuotesSchema,
  ResearchRequestSchema,
  StatisticsSchema,
  TrendsSchema,
} from '../../ai/content/validation';
import { checkContentLength, contentDefaults, taskDepsFor, type AppDeps } from '../context';
import { asyncHandler } from '../middleware/error-handler';

export function createResearchRouter(deps: AppDeps): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = ResearchRequestSchema.parse(req.body);
      res.json(await runResearchTask(body, contentDefaults(deps), taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/fact-check',
    asyncHandler(async (req, res) => {
      const body = FactCheckSchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      res.json(await runFactCheckTask(body, taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/statistics',
    asyncHandler(async (req, res) => {
      const body = StatisticsSchema.parse(req.body);
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: RESEARCH_TASK, action: 'gather_statistics', topic: body.topic, input: body },
        taskDeps,
        async () => {
          const statistics = await gatherStatistics(
            body.topic,
            { timePeriod: body.time_period, geographicScope: body.geographic_scope },
            taskDeps.agent
          );
          return {
            statistics_data: toSnakeCaseKeys(statistics),
            statistics_timestamp: taskTimestamp(taskDeps),
            status: 'statistics_gathered' as const,
          };
        }
      );
      res.json(result);
    })
  );

  router.post(
    '/quotes',
    asyncHandler(async (req, res) => {
      const body = QuotesSchema.parse(req.body);
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: RESEARCH_TASK, action: 'find_quotes', topic: body.topic, input: body },
        taskDeps,
        async () => ({
          quotes_data: toSnakeCaseKeys(
            await findExpertQuotes(body.topic, { quoteType: body.quote_type }, taskDeps.agent)
          ),
          quotes_timestamp: taskTimestamp(taskDeps),
          status: 'quotes_found' as const,
        })
      );
      res.json(result);
    })
  );

  router.post(
    '/trends',
    asyncHandler(async (req, res) => {
      const body = TrendsSchema.parse(req.body);
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: RESEARCH_TASK, action: 'analyze_trends', topic: body.topic, input: body },
        taskDeps,
        async () => {
          const trends = await analyzeTrends(
            body.topic,
            { timePeriod: body.time_period, trendType: body.trend_type },
            taskDeps.agent
          );
          return {
            trends_data: toSnakeCaseKeys(trends),
            trends_timestamp: taskTimestamp(taskDeps),
            status: 'trends_analyzed' as const,
          };
        }
      );
      res.json(result);
    })
  );

  return router;
}
