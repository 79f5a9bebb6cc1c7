import { Router } from 'express';

import { expandSection, rewriteContent } from '../../ai/content/agents/writer';
import { taskTimestamp, trackAction } from '../../ai/content/tasks/base-task';
import { CONTENT_CREATION_TASK, createContent } from '../../ai/content/tasks/content-creation';
import {
  assertWordCountAllowed,
  ContentRequestSchema,
  ExpandSectionSchema,
  RewriteSchema,
} from '../../ai/content/validation';
import { checkContentLength, contentDefaults, taskDepsFor, type AppDeps } from '../context';
import { asyncHandler } from '../middleware/error-handler';

export function createContentRouter(deps: AppDeps): Router {
  const router = Router();

  router.post(
    '/create',
    asyncHandler(async (req, res) => {
      const body = ContentRequestSchema.parse(req.body);
      assertWordCountAllowed(body.word_count, deps.settings.maxContentLength);
      res.json(await createContent(body, contentDefaults(deps), taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/expand',
    asyncHandler(async (req, res) => {
      const body = ExpandSectionSchema.parse(req.body);
      checkContentLength(deps, { section_content: body.section_content });
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: CONTENT_CREATION_TASK, action: 'expand_section', topic: body.section_title, input: body },
        taskDeps,
        async () => {
          const expanded = await expandSection(
            body.section_content,
            body.section_title,
            { targetLength: body.target_length },
            taskDeps.agent
          );
          return {
            section_title: body.section_title,
            expanded_content: expanded.content,
            expansion_timestamp: taskTimestamp(taskDeps),
            status: 'expanded' as const,
            token_usage: expanded.tokenUsage,
          };
        }
      );
      res.json(result);
    })
  );

  router.post(
    '/rewrite',
    asyncHandler(async (req, res) => {
      const body = RewriteSchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: CONTENT_CREATION_TASK, action: 'rewrite_content', topic: null, input: body },
        taskDeps,
        async () => {
          const rewritten = await rewriteContent(
            body.content,
            { newTone: body.new_tone, newAudience: body.new_audience, newLength: body.new_length },
            taskDeps.agent
          );
          return {
            original_content: body.content,
            rewritten_content: rewritten.content,
            rewrite_timestamp: taskTimestamp(taskDeps),
            status: 'rewritten' as const,
            token_usage: rewritten.tokenUsage,
          };
        }
      );
      res.json(result);
    })
  );

  return router;
}
