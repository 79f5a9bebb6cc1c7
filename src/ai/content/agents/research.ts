/**
 * Research Agent
 *
 * Gathers facts, sources, statistics, expert quotes and trend analysis for a topic,
 * and fact-checks finished content.
 */

import { EXTRACTION_KEYWORDS } from '../config';
import {
  getExpertQuotesPrompt,
  getFactCheckPrompt,
  getResearchTopicPrompt,
  getStatisticsPrompt,
  getTrendsPrompt,
} from '../prompts/research-prompts';
import { extractLinesWithKeywords, extractScore } from '../text-utils';
import {
  executeAgentTask,
  requireText,
  type AgentDeps,
  type AgentProfile,
  type WithTokenUsage,
} from './shared';

export const RESEARCH_AGENT: AgentProfile = {
  name: 'Research Specialist',
  role:
    'Expert researcher with deep knowledge in information gathering, fact-checking, and data analysis. ' +
    'Skilled at finding credible sources, extracting key insights, and providing comprehensive ' +
    'research that supports content creation.',
  goal:
    'Conduct thorough research on given topics, gather accurate and up-to-date information, ' +
    'verify facts, and provide well-organized research findings that enhance content quality and credibility.',
};

// ============================================================================
// Types
// ============================================================================

export interface ResearchFindings {
  readonly topic: string;
  readonly researchFindings: string;
  readonly keyFacts: string[];
  readonly sources: string[];
  readonly insights: string[];
  readonly recommendations: string[];
}

export interface FactCheckResult {
  readonly factCheckResults: string;
  readonly verifiedFacts: string[];
  readonly correctionsNeeded: string[];
  readonly accuracyScore: number | null;
  readonly sourcesVerified: string[];
}

export interface StatisticsResult {
  readonly statisticsData: string;
  readonly keyNumbers: string[];
  readonly trends: string[];
  readonly dataSources: string[];
  readonly visualizationSuggestions: string[];
}

export interface ExpertQuotesResult {
  readonly expertQuotes: string;
  readonly quotesList: string[];
  readonly expertCredentials: string[];
  readonly quoteSources: string[];
}

export interface TrendAnalysisResult {
  readonly trendAnalysis: string;
  readonly currentTrends: string[];
  readonly emergingTrends: string[];
  readonly futurePredictions: string[];
  readonly trendImplications: string[];
}

export interface ResearchTopicOptions {
  readonly researchDepth?: string;
  readonly contentType?: string;
  readonly targetAudience?: string;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Researches a topic and splits the findings into facts, sources, insights and recommendations.
 */
export async function researchTopic(
  topic: string,
  options: ResearchTopicOptions,
  deps: AgentDeps
): Promise<WithTokenUsage<ResearchFindings>> {
  const cleanTopic = requireText(topic, 'Topic cannot be empty');
  const description = getResearchTopicPrompt({
    topic: cleanTopic,
    researchDepth: options.researchDepth ?? 'comprehensive',
    contentType: options.contentType ?? 'article',
    targetAudience: options.targetAudience ?? 'general',
  });

  const { text, tokenUsage } = await executeAgentTask(RESEARCH_AGENT, description, undefined, deps);
  const k = EXTRACTION_KEYWORDS.research;

  return {
    topic: cleanTopic,
    researchFindings: text,
    keyFacts: extractLinesWithKeywords(text, k.keyFacts),
    sources: extractLinesWithKeywords(text, k.sources),
    insights: extractLinesWithKeywords(text, k.insights),
    recommendations: extractLinesWithKeywords(text, k.recommendations),
    tokenUsage,
  };
}

export async function factCheckContent(
  content: string,
  topic: string,
  deps: AgentDeps
): Promise<WithTokenUsage<FactCheckResult>> {
  const cleanContent = requireText(content, 'Content cannot be empty');
  const cleanTopic = requireText(topic, 'Topic cannot be empty');

  const { text, tokenUsage } = await executeAgentTask(
    RESEARCH_AGENT,
    getFactCheckPrompt(cleanContent, cleanTopic),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.factCheck;

  return {
    factCheckResults: text,
    verifiedFacts: extractLinesWithKeywords(text, k.verifiedFacts),
    correctionsNeeded: extractLinesWithKeywords(text, k.correctionsNeeded),
    accuracyScore: extractScore(text, 'accuracy'),
    sourcesVerified: extractLinesWithKeywords(text, k.sourcesVerified),
    tokenUsage,
  };
}

export async function gatherStatistics(
  topic: string,
  options: { readonly timePeriod?: string; readonly geographicScope?: string },
  deps: AgentDeps
): Promise<WithTokenUsage<StatisticsResult>> {
  const cleanTopic = requireText(topic, 'Topic cannot be empty');
  const { text, tokenUsage } = await executeAgentTask(
    RESEARCH_AGENT,
    getStatisticsPrompt({ topic: cleanTopic, ...options }),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.statistics;

  return {
    statisticsData: text,
    keyNumbers: extractLinesWithKeywords(text, k.keyNumbers),
    trends: extractLinesWithKeywords(text, k.trends),
    dataSources: extractLinesWithKeywords(text, k.dataSources),
    visualizationSuggestions: extractLinesWithKeywords(text, k.visualizationSuggestions),
    tokenUsage,
  };
}

export async function findExpertQuotes(
  topic: string,
  options: { readonly quoteType?: string },
  deps: AgentDeps
): Promise<WithTokenUsage<ExpertQuotesResult>> {
  const cleanTopic = requireText(topic, 'Topic cannot be empty');
  const { text, tokenUsage } = await executeAgentTask(
    RESEARCH_AGENT,
    getExpertQuotesPrompt(cleanTopic, options.quoteType ?? 'general'),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.quotes;

  return {
    expertQuotes: text,
    quotesList: extractLinesWithKeywords(text, k.quotesList),
    expertCredentials: extractLinesWithKeywords(text, k.expertCredentials),
    quoteSources: extractLinesWithKeywords(text, k.quoteSources),
    tokenUsage,
  };
}

export async function analyzeTrends(
  topic: string,
  options: { readonly timePeriod?: string; readonly trendType?: string },
  deps: AgentDeps
): Promise<WithTokenUsage<TrendAnalysisResult>> {
  const cleanTopic = requireText(topic, 'Topic cannot be empty');
  const { text, tokenUsage } = await executeAgentTask(
    RESEARCH_AGENT,
    getTrendsPrompt({
      topic: cleanTopic,
      timePeriod: options.timePeriod ?? 'recent',
      trendType: options.trendType ?? 'general',
    }),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.trends;

  return {
    trendAnalysis: text,
    currentTrends: extractLinesWithKeywords(text, k.currentTrends),
    emergingTrends: extractLinesWithKeywords(text, k.emergingTrends),
    futurePredictions: extractLinesWithKeywords(text, k.futurePredictions),
    trendImplications: extractLinesWithKeywords(text, k.trendImplications),
    tokenUsage,
  };
}
