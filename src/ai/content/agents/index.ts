/**
 * Content Studio Agents
 */

export * from './shared';
export * from './research';
export * from './writer';
export * from './editor';
export * from './seo';
export * from './creative';

import { CREATIVE_AGENT } from './creative';
import { EDITOR_AGENT } from './editor';
import { RESEARCH_AGENT } from './research';
import { SEO_AGENT } from './seo';
import type { AgentProfile } from './shared';
import { WRITER_AGENT } from './writer';

/**
 * All agent profiles, in pipeline order.
 */
export const ALL_AGENTS: readonly AgentProfile[] = [
  RESEARCH_AGENT,
  WRITER_AGENT,
  EDITOR_AGENT,
  SEO_AGENT,
  CREATIVE_AGENT,
];
