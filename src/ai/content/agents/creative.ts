/**
 * Creative Agent
 *
 * Ideation: content ideas, headlines, opening hooks, viral concepts and multi-part series.
 */

import { CREATIVE_CONFIG, EXTRACTION_KEYWORDS } from '../config';
import {
  getHeadlinesPrompt,
  getHooksPrompt,
  getIdeasPrompt,
  getSeriesPrompt,
  getViralConceptsPrompt,
} from '../prompts/creative-prompts';
import { extractLinesWithKeywords, firstLineContaining } from '../text-utils';
import {
  executeAgentTask,
  requireText,
  type AgentDeps,
  type AgentProfile,
  type WithTokenUsage,
} from './shared';

export const CREATIVE_AGENT: AgentProfile = {
  name: 'Creative Specialist',
  role:
    'Creative strategist who generates original content ideas, compelling headlines, and hooks ' +
    'that capture attention and drive engagement.',
  goal:
    'Produce fresh, engaging creative concepts tailored to the topic, platform, and audience.',
};

// ============================================================================
// Types
// ============================================================================

export interface ContentIdeas {
  readonly topic: string;
  readonly ideasText: string;
  readonly ideaList: string[];
  readonly creativeAngles: string[];
  readonly engagementPotential: string[];
}

export interface Headlines {
  readonly headlinesText: string;
  readonly headlineList: string[];
  readonly headlineStyles: string[];
  readonly clickThroughPotential: string[];
}

export interface ContentHooks {
  readonly hooksText: string;
  readonly hookList: string[];
  readonly hookTypes: string[];
  readonly emotionalImpact: string[];
}

export interface ViralConcepts {
  readonly viralConceptsText: string;
  readonly conceptList: string[];
  readonly viralScores: string[];
  readonly emotionalTriggers: string[];
}

export interface ContentSeries {
  readonly seriesText: string;
  readonly seriesConcept: string;
  readonly seriesParts: string[];
  readonly seriesFlow: string[];
}

export interface IdeasOptions {
  readonly contentType?: string;
  readonly targetAudience?: string;
  readonly ideaCount?: number;
  readonly creativityLevel?: string;
}

export interface HeadlineOptions {
  readonly contentType?: string;
  readonly headlineCount?: number;
  readonly headlineStyle?: string;
}

const TOPIC_REQUIRED = 'Topic cannot be empty';

// ============================================================================
// Operations
// ============================================================================

export async function generateContentIdeas(
  topic: string,
  options: IdeasOptions,
  deps: AgentDeps
): Promise<WithTokenUsage<ContentIdeas>> {
  const cleanTopic = requireText(topic, TOPIC_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    CREATIVE_AGENT,
    getIdeasPrompt({
      topic: cleanTopic,
      contentType: options.contentType ?? 'article',
      targetAudience: options.targetAudience ?? 'general',
      ideaCount: options.ideaCount ?? CREATIVE_CONFIG.DEFAULT_IDEA_COUNT,
      creativityLevel: options.creativityLevel ?? 'high',
    }),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.ideas;

  return {
    topic: cleanTopic,
    ideasText: text,
    ideaList: extractLinesWithKeywords(text, k.ideaList),
    creativeAngles: extractLinesWithKeywords(text, k.creativeAngles),
    engagementPotential: extractLinesWithKeywords(text, k.engagementPotential),
    tokenUsage,
  };
}

export async function brainstormHeadlines(
  topic: string,
  options: HeadlineOptions,
  deps: AgentDeps
): Promise<WithTokenUsage<Headlines>> {
  const cleanTopic = requireText(topic, TOPIC_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    CREATIVE_AGENT,
    getHeadlinesPrompt({
      topic: cleanTopic,
      contentType: options.contentType ?? 'article',
      headlineCount: options.headlineCount ?? CREATIVE_CONFIG.DEFAULT_HEADLINE_COUNT,
      headlineStyle: options.headlineStyle ?? 'clickbait',
    }),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.headlines;

  return {
    headlinesText: text,
    headlineList: extractLinesWithKeywords(text, k.headlineList),
    headlineStyles: extractLinesWithKeywords(text, k.headlineStyles),
    clickThroughPotential: extractLinesWithKeywords(text, k.clickThroughPotential),
    tokenUsage,
  };
}

export async function createContentHooks(
  topic: string,
  options: { readonly hookCount?: number; readonly hookType?: string },
  deps: AgentDeps
): Promise<WithTokenUsage<ContentHooks>> {
  const cleanTopic = requireText(topic, TOPIC_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    CREATIVE_AGENT,
    getHooksPrompt(cleanTopic, options.hookCount ?? CREATIVE_CONFIG.DEFAULT_HOOK_COUNT, options.hookType ?? 'opening'),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.hooks;

  return {
    hooksText: text,
    hookList: extractLinesWithKeywords(text, k.hookList),
    hookTypes: extractLinesWithKeywords(text, k.hookTypes),
    emotionalImpact: extractLinesWithKeywords(text, k.emotionalImpact),
    tokenUsage,
  };
}

export async function generateViralConcepts(
  topic: string,
  options: { readonly platform?: string; readonly conceptCount?: number },
  deps: AgentDeps
): Promise<WithTokenUsage<ViralConcepts>> {
  const cleanTopic = requireText(topic, TOPIC_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    CREATIVE_AGENT,
    getViralConceptsPrompt(
      cleanTopic,
      options.platform ?? 'general',
      options.conceptCount ?? CREATIVE_CONFIG.DEFAULT_CONCEPT_COUNT
    ),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.viral;

  return {
    viralConceptsText: text,
    conceptList: extractLinesWithKeywords(text, k.conceptList),
    viralScores: extractLinesWithKeywords(text, k.viralScores),
    emotionalTriggers: extractLinesWithKeywords(text, k.emotionalTriggers),
    tokenUsage,
  };
}

export async function createContentSeries(
  topic: string,
  options: { readonly seriesLength?: number; readonly contentType?: string },
  deps: AgentDeps
): Promise<WithTokenUsage<ContentSeries>> {
  const cleanTopic = requireText(topic, TOPIC_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    CREATIVE_AGENT,
    getSeriesPrompt(
      cleanTopic,
      options.seriesLength ?? CREATIVE_CONFIG.DEFAULT_SERIES_LENGTH,
      options.contentType ?? 'article'
    ),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.series;

  return {
    seriesText: text,
    seriesConcept: firstLineContaining(text, k.seriesConcept),
    seriesParts: extractLinesWithKeywords(text, k.seriesParts),
    seriesFlow: extractLinesWithKeywords(text, k.seriesFlow),
    tokenUsage,
  };
}
