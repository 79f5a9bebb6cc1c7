/**
 * Content Studio Tasks
 */

export * from './base-task';
export * from './content-creation';
export * from './content-review';
export * from './seo-optimization';
export * from './research';
export * from './creative-ideation';

import { CONTENT_CREATION_TASK } from './content-creation';
import { CONTENT_REVIEW_TASK } from './content-review';
import { CREATIVE_IDEATION_TASK } from './creative-ideation';
import { RESEARCH_TASK } from './research';
import { SEO_OPTIMIZATION_TASK } from './seo-optimization';
import type { TaskDefinition } from './base-task';

export const ALL_TASKS: readonly TaskDefinition[] = [
  RESEARCH_TASK,
  CONTENT_CREATION_TASK,
  CONTENT_REVIEW_TASK,
  SEO_OPTIMIZATION_TASK,
  CREATIVE_IDEATION_TASK,
];
