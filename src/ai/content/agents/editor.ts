/**
 * Editor Agent
 *
 * Reviews drafts (scored feedback), applies edit instructions, polishes content
 * and checks grammar and style.
 */

import { EXTRACTION_KEYWORDS } from '../config';
import {
  DEFAULT_IMPROVEMENT_AREAS,
  DEFAULT_REVIEW_FOCUS,
  getEditPrompt,
  getGrammarPrompt,
  getImprovePrompt,
  getReviewPrompt,
} from '../prompts/editor-prompts';
import { extractLinesWithKeywords, extractScore } from '../text-utils';
import {
  executeAgentTask,
  requireText,
  type AgentDeps,
  type AgentProfile,
  type WithTokenUsage,
} from './shared';

export const EDITOR_AGENT: AgentProfile = {
  name: 'Content Editor',
  role:
    'Senior content editor with a sharp eye for grammar, style, structure, and readability. ' +
    'Experienced in giving constructive feedback and refining content for publication.',
  goal:
    'Review and refine content so it is clear, correct, engaging, and consistent with the intended tone and audience.',
};

export interface ContentReview {
  readonly reviewText: string;
  readonly overallScore: number | null;
  readonly suggestions: string[];
  readonly positiveAspects: string[];
}

export interface GrammarCheck {
  readonly grammarAnalysis: string;
  readonly errorsFound: string[];
  readonly suggestions: string[];
}

export interface ReviewOptions {
  readonly contentType?: string;
  readonly targetAudience?: string;
  readonly reviewFocus?: readonly string[];
}

const CONTENT_REQUIRED = 'Content cannot be empty';

export async function reviewContent(
  content: string,
  options: ReviewOptions,
  deps: AgentDeps
): Promise<WithTokenUsage<ContentReview>> {
  const cleanContent = requireText(content, CONTENT_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    EDITOR_AGENT,
    getReviewPrompt({
      content: cleanContent,
      contentType: options.contentType ?? 'article',
      targetAudience: options.targetAudience ?? 'general',
      reviewFocus: options.reviewFocus ?? DEFAULT_REVIEW_FOCUS,
    }),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.review;

  return {
    reviewText: text,
    overallScore: extractScore(text, 'score'),
    suggestions: extractLinesWithKeywords(text, k.suggestions),
    positiveAspects: extractLinesWithKeywords(text, k.positiveAspects),
    tokenUsage,
  };
}

export async function editContent(
  content: string,
  editInstructions: string,
  options: { readonly preserveStyle?: boolean },
  deps: AgentDeps
): Promise<WithTokenUsage<{ content: string }>> {
  const cleanContent = requireText(content, CONTENT_REQUIRED);
  const instructions = requireText(editInstructions, 'Edit instructions cannot be empty');
  const { text, tokenUsage } = await executeAgentTask(
    EDITOR_AGENT,
    getEditPrompt(cleanContent, instructions, options.preserveStyle ?? true),
    undefined,
    deps
  );
  return { content: text, tokenUsage };
}

export async function improveContent(
  content: string,
  options: { readonly improvementAreas?: readonly string[] },
  deps: AgentDeps
): Promise<WithTokenUsage<{ content: string }>> {
  const cleanContent = requireText(content, CONTENT_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    EDITOR_AGENT,
    getImprovePrompt(cleanContent, options.improvementAreas ?? DEFAULT_IMPROVEMENT_AREAS),
    undefined,
    deps
  );
  return { content: text, tokenUsage };
}

export async function checkGrammarAndStyle(
  content: string,
  deps: AgentDeps
): Promise<WithTokenUsage<GrammarCheck>> {
  const cleanContent = requireText(content, CONTENT_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(EDITOR_AGENT, getGrammarPrompt(cleanContent), undefined, deps);
  const k = EXTRACTION_KEYWORDS.grammar;

  return {
    grammarAnalysis: text,
    errorsFound: extractLinesWithKeywords(text, k.errorsFound),
    suggestions: extractLinesWithKeywords(text, k.suggestions),
    tokenUsage,
  };
}
