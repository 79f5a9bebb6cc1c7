/**
 * SEO Agent
 *
 * Optimizes content for search, writes meta tags, suggests keywords and scores
 * existing content.
 */

import { EXTRACTION_KEYWORDS } from '../config';
import {
  getKeywordSuggestionsPrompt,
  getMetaTagsPrompt,
  getOptimizePrompt,
  getSeoAnalysisPrompt,
} from '../prompts/seo-prompts';
import {
  extractCommaList,
  extractLabelValue,
  extractLinesWithKeywords,
  extractScore,
  extractSectionAfterMarker,
} from '../text-utils';
import {
  executeAgentTask,
  requireText,
  type AgentDeps,
  type AgentProfile,
  type WithTokenUsage,
} from './shared';

export const SEO_AGENT: AgentProfile = {
  name: 'SEO Specialist',
  role:
    'Search engine optimization expert who understands keyword research, on-page optimization, ' +
    'and how search engines rank content.',
  goal:
    'Improve content visibility in search results while keeping it natural and valuable for readers.',
};

// ============================================================================
// Types
// ============================================================================

export interface SeoOptimization {
  readonly optimizedContent: string;
  readonly seoAnalysis: string;
  readonly targetKeywords: string[];
  readonly seoScore: number | null;
  readonly recommendations: string[];
}

export interface MetaTags {
  readonly metaTitle: string;
  readonly metaDescription: string;
}

export interface KeywordSuggestions {
  readonly keywordSuggestions: string;
  readonly primaryKeywords: string[];
  readonly longTailKeywords: string[];
  readonly keywordAnalysis: { readonly analysisText: string; readonly keywordCount: number };
}

export interface SeoAnalysis {
  readonly seoAnalysis: string;
  readonly seoScore: number | null;
  readonly improvements: string[];
  readonly strengths: string[];
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Reads "Title: ..." / "Description: ..." lines. Later lines win.
 */
export function parseMetaTags(text: string): MetaTags {
  let metaTitle = '';
  let metaDescription = '';
  for (const line of text.split('\n')) {
    const lower = line.toLowerCase();
    if (lower.includes('title')) {
      metaTitle = extractLabelValue(line);
    } else if (lower.includes('description')) {
      metaDescription = extractLabelValue(line);
    }
  }
  return { metaTitle, metaDescription };
}

export function parseKeywordSuggestions(text: string): Omit<KeywordSuggestions, 'keywordSuggestions'> {
  const primaryKeywords = extractCommaList(text, (line) => line.includes('primary') && line.includes('keyword'));
  const longTailKeywords = extractCommaList(text, (line) =>
    EXTRACTION_KEYWORDS.seo.longTail.some((marker) => line.includes(marker))
  );
  return {
    primaryKeywords,
    longTailKeywords,
    keywordAnalysis: {
      analysisText: text,
      keywordCount: primaryKeywords.length + longTailKeywords.length,
    },
  };
}

// ============================================================================
// Operations
// ============================================================================

const CONTENT_REQUIRED = 'Content cannot be empty';

export async function optimizeContent(
  content: string,
  targetKeywords: readonly string[],
  options: { readonly contentType?: string; readonly targetAudience?: string },
  deps: AgentDeps
): Promise<WithTokenUsage<SeoOptimization>> {
  const cleanContent = requireText(content, CONTENT_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    SEO_AGENT,
    getOptimizePrompt({
      content: cleanContent,
      targetKeywords,
      contentType: options.contentType ?? 'article',
      targetAudience: options.targetAudience ?? 'general',
    }),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.seo;

  return {
    optimizedContent: extractSectionAfterMarker(text, k.optimizedMarkers),
    seoAnalysis: text,
    targetKeywords: [...targetKeywords],
    seoScore: extractScore(text, 'seo score'),
    recommendations: extractLinesWithKeywords(text, k.recommendations),
    tokenUsage,
  };
}

export async function generateMetaTags(
  content: string,
  keywords: readonly string[],
  options: { readonly contentType?: string },
  deps: AgentDeps
): Promise<WithTokenUsage<MetaTags>> {
  const cleanContent = requireText(content, CONTENT_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    SEO_AGENT,
    getMetaTagsPrompt(cleanContent, keywords, options.contentType ?? 'article'),
    undefined,
    deps
  );
  return { ...parseMetaTags(text), tokenUsage };
}

export async function suggestKeywords(
  topic: string,
  options: { readonly contentType?: string; readonly targetAudience?: string },
  deps: AgentDeps
): Promise<WithTokenUsage<KeywordSuggestions>> {
  const cleanTopic = requireText(topic, 'Topic cannot be empty');
  const { text, tokenUsage } = await executeAgentTask(
    SEO_AGENT,
    getKeywordSuggestionsPrompt(cleanTopic, options.contentType ?? 'article', options.targetAudience ?? 'general'),
    undefined,
    deps
  );
  return { keywordSuggestions: text, ...parseKeywordSuggestions(text), tokenUsage };
}

export async function analyzeContentSeo(
  content: string,
  keywords: readonly string[] | undefined,
  deps: AgentDeps
): Promise<WithTokenUsage<SeoAnalysis>> {
  const cleanContent = requireText(content, CONTENT_REQUIRED);
  const { text, tokenUsage } = await executeAgentTask(
    SEO_AGENT,
    getSeoAnalysisPrompt(cleanContent, keywords),
    undefined,
    deps
  );
  const k = EXTRACTION_KEYWORDS.seo;

  return {
    seoAnalysis: text,
    seoScore: extractScore(text, 'seo score'),
    improvements: extractLinesWithKeywords(text, k.improvements),
    strengths: extractLinesWithKeywords(text, k.strengths),
    tokenUsage,
  };
}
