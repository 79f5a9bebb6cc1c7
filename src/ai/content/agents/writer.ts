/**
 * Writer Agent
 *
 * Produces first drafts, expands individual sections and rewrites content
 * for a new tone, audience or length.
 */

import { WRITER_CONFIG } from '../config';
import { getDraftPrompt, getExpandSectionPrompt, getRewritePrompt } from '../prompts/writer-prompts';
import {
  executeAgentTask,
  requireText,
  type AgentDeps,
  type AgentProfile,
  type WithTokenUsage,
} from './shared';

export const WRITER_AGENT: AgentProfile = {
  name: 'Content Writer',
  role:
    'Expert content writer with years of experience in creating engaging, informative, and well-structured ' +
    'articles, blog posts, and marketing copy. Specializes in adapting writing style to match target audience and brand voice.',
  goal:
    'Create high-quality, engaging content that meets the specified requirements, target audience needs, ' +
    'and maintains consistent tone and style throughout.',
};

export interface DraftOptions {
  readonly contentType?: string;
  readonly targetAudience?: string;
  readonly wordCount?: number;
  readonly tone?: string;
  readonly keywords?: readonly string[];
  readonly additionalRequirements?: string;
}

export interface RewriteOptions {
  readonly newTone?: string;
  readonly newAudience?: string;
  readonly newLength?: number;
}

export async function createContentDraft(
  topic: string,
  options: DraftOptions,
  deps: AgentDeps
): Promise<WithTokenUsage<{ draft: string }>> {
  const cleanTopic = requireText(topic, 'Topic cannot be empty');
  const description = getDraftPrompt({
    topic: cleanTopic,
    contentType: options.contentType ?? 'article',
    targetAudience: options.targetAudience ?? 'general',
    wordCount: options.wordCount ?? WRITER_CONFIG.DEFAULT_WORD_COUNT,
    tone: options.tone ?? WRITER_CONFIG.DEFAULT_TONE,
    keywords: options.keywords,
    additionalRequirements: options.additionalRequirements,
  });

  const { text, tokenUsage } = await executeAgentTask(WRITER_AGENT, description, undefined, deps);
  return { draft: text, tokenUsage };
}

export async function expandSection(
  sectionContent: string,
  sectionTitle: string,
  options: { readonly targetLength?: number },
  deps: AgentDeps
): Promise<WithTokenUsage<{ content: string }>> {
  const cleanContent = requireText(sectionContent, 'Content cannot be empty');
  const cleanTitle = requireText(sectionTitle, 'Section title cannot be empty');
  const { text, tokenUsage } = await executeAgentTask(
    WRITER_AGENT,
    getExpandSectionPrompt(cleanTitle, cleanContent, options.targetLength ?? WRITER_CONFIG.DEFAULT_SECTION_LENGTH),
    undefined,
    deps
  );
  return { content: text, tokenUsage };
}

export async function rewriteContent(
  originalContent: string,
  options: RewriteOptions,
  deps: AgentDeps
): Promise<WithTokenUsage<{ content: string }>> {
  const cleanContent = requireText(originalContent, 'Content cannot be empty');
  const { text, tokenUsage } = await executeAgentTask(
    WRITER_AGENT,
    getRewritePrompt({ originalContent: cleanContent, ...options }),
    undefined,
    deps
  );
  return { content: text, tokenUsage };
}
