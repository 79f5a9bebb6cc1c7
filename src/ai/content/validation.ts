/**
 * Request Validation
 *
 * Zod schemas for the snake_case request bodies accepted over HTTP, plus the
 * word-limit check applied to every content field.
 */

import { z } from 'zod';

import { countWords } from './text-utils';
import { ContentStudioError } from './types';

// ============================================================================
// Building Blocks
// ============================================================================

const text = z.string().trim().min(1);
const optionalText = z.string().trim().min(1).optional();
const count = (max: number) => z.number().int().positive().max(max).optional();
const stringList = z.array(z.string().trim().min(1));

// ============================================================================
// Content
// ============================================================================

export const ContentRequestSchema = z.object({
  topic: text,
  content_type: optionalText,
  target_audience: z.string().trim().min(1).default('general'),
  word_count: z.number().int().positive().default(1000),
  tone: z.string().trim().min(1).default('professional'),
  keywords: stringList.optional(),
  research_depth: z.string().trim().min(1).default('comprehensive'),
});

export type ContentRequest = z.infer<typeof ContentRequestSchema>;

export const ExpandSectionSchema = z.object({
  section_content: text,
  section_title: text,
  target_length: count(5000),
});

export const RewriteSchema = z.object({
  content: text,
  new_tone: optionalText,
  new_audience: optionalText,
  new_length: count(50000),
});

// ============================================================================
// Review
// ============================================================================

export const ReviewRequestSchema = z.object({
  content: text,
  content_type: optionalText,
  target_audience: optionalText,
  review_focus: stringList.optional(),
});

export type ReviewRequest = z.infer<typeof ReviewRequestSchema>;

export const ImproveRequestSchema = z.object({
  content: text,
  improvement_areas: stringList.optional(),
});

export type ImproveRequest = z.infer<typeof ImproveRequestSchema>;

export const EditRequestSchema = z.object({
  content: text,
  edit_instructions: text,
  preserve_style: z.boolean().optional(),
});

export const ContentOnlySchema = z.object({
  content: text,
});

// ============================================================================
// SEO
// ============================================================================

export const SeoOptimizeSchema = z.object({
  content: text,
  target_keywords: stringList.min(1),
  content_type: optionalText,
  target_audience: optionalText,
});

export type SeoOptimizeRequest = z.infer<typeof SeoOptimizeSchema>;

export const MetaTagsSchema = z.object({
  content: text,
  keywords: stringList,
  content_type: optionalText,
});

export type MetaTagsRequest = z.infer<typeof MetaTagsSchema>;

export const KeywordSuggestionSchema = z.object({
  topic: text,
  content_type: optionalText,
  target_audience: optionalText,
});

export const SeoAnalyzeSchema = z.object({
  content: text,
  keywords: stringList.optional(),
});

// ============================================================================
// Research
// ============================================================================

export const ResearchRequestSchema = z.object({
  topic: text,
  research_depth: optionalText,
  content_type: optionalText,
  target_audience: optionalText,
});

export type ResearchRequest = z.infer<typeof ResearchRequestSchema>;

export const FactCheckSchema = z.object({
  content: text,
  topic: text,
});

export type FactCheckRequest = z.infer<typeof FactCheckSchema>;

export const StatisticsSchema = z.object({
  topic: text,
  time_period: optionalText,
  geographic_scope: optionalText,
});

export const QuotesSchema = z.object({
  topic: text,
  quote_type: optionalText,
});

export const TrendsSchema = z.object({
  topic: text,
  time_period: optionalText,
  trend_type: optionalText,
});

// ============================================================================
// Creative
// ============================================================================

export const IdeasRequestSchema = z.object({
  topic: text,
  content_type: optionalText,
  target_audience: optionalText,
  idea_count: count(50),
  creativity_level: optionalText,
});

export type IdeasRequest = z.infer<typeof IdeasRequestSchema>;

export const HeadlinesRequestSchema = z.object({
  topic: text,
  content_type: optionalText,
  headline_count: count(50),
  headline_style: optionalText,
});

export type HeadlinesRequest = z.infer<typeof HeadlinesRequestSchema>;

export const HooksSchema = z.object({
  topic: text,
  hook_count: count(50),
  hook_type: optionalText,
});

export const ViralSchema = z.object({
  topic: text,
  platform: optionalText,
  concept_count: count(50),
});

export const SeriesSchema = z.object({
  topic: text,
  series_length: count(20),
  content_type: optionalText,
});

// ============================================================================
// History
// ============================================================================

export const HistoryQuerySchema = z.object({
  kind: z.enum(['action', 'content']).optional(),
  action: optionalText,
  topic: optionalText,
  correlation_id: optionalText,
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

// ============================================================================
// Limits
// ============================================================================

/**
 * Throws CONTENT_TOO_LONG when `value` has more than `maxWords` words.
 */
export function assertWithinWordLimit(value: string, maxWords: number, field: string): void {
  const words = countWords(value);
  if (words > maxWords) {
    throw new ContentStudioError(
      'CONTENT_TOO_LONG',
      `${field} is ${words} words; the maximum is ${maxWords}`
    );
  }
}

/**
 * Throws CONTENT_TOO_LONG when a requested word count exceeds the limit.
 */
export function assertWordCountAllowed(wordCount: number, maxWords: number): void {
  if (wordCount > maxWords) {
    throw new ContentStudioError(
      'CONTENT_TOO_LONG',
      `Requested word count ${wordCount} exceeds the maximum of ${maxWords}`
    );
  }
}
