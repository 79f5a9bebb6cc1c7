import { Router } from 'express';

import { checkGrammarAndStyle, editContent } from '../../ai/content/agents/editor';
import { taskTimestamp, toSnakeCaseKeys, trackAction } from '../../ai/content/tasks/base-task';
import { CONTENT_REVIEW_TASK, runImproveTask, runReviewTask } from '../../ai/content/tasks/content-review';
import {
  ContentOnlySchema,
  EditRequestSchema,
  ImproveRequestSchema,
  ReviewRequestSchema,
} from '../../ai/content/validation';
import { checkContentLength, contentDefaults, taskDepsFor, type AppDeps } from '../context';
import { asyncHandler } from '../middleware/error-handler';

export function createReviewRouter(deps: AppDeps): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = ReviewRequestSchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      res.json(await runReviewTask(body, contentDefaults(deps), taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/improve',
    asyncHandler(async (req, res) => {
      const body = ImproveRequestSchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      res.json(await runImproveTask(body, taskDepsFor(req, deps)));
    })
  );

  router.post(
    '/edit',
    asyncHandler(async (req, res) => {
      const body = EditRequestSchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: CONTENT_REVIEW_TASK, action: 'edit_content', topic: null, input: body },
        taskDeps,
        async () => {
          const edited = await editContent(
            body.content,
            body.edit_instructions,
            { preserveStyle: body.preserve_style },
            taskDeps.agent
          );
          return {
            original_content: body.content,
            edited_content: edited.content,
            edit_timestamp: taskTimestamp(taskDeps),
            status: 'edited' as const,
            token_usage: edited.tokenUsage,
          };
        }
      );
      res.json(result);
    })
  );

  router.post(
    '/grammar',
    asyncHandler(async (req, res) => {
      const body = ContentOnlySchema.parse(req.body);
      checkContentLength(deps, { content: body.content });
      const taskDeps = taskDepsFor(req, deps);

      const result = await trackAction(
        { task: CONTENT_REVIEW_TASK, action: 'check_grammar', topic: null, input: body },
        taskDeps,
        async () => ({
          grammar_data: toSnakeCaseKeys(await checkGrammarAndStyle(body.content, taskDeps.agent)),
          check_timestamp: taskTimestamp(taskDeps),
          status: 'grammar_checked' as const,
        })
      );
      res.json(result);
    })
  );

  return router;
}
