/**
 * SEO Agent Prompts
 */

export interface OptimizePromptContext {
  readonly content: string;
  readonly targetKeywords: readonly string[];
  readonly contentType: string;
  readonly targetAudience: string;
}

export function getOptimizePrompt(ctx: OptimizePromptContext): string {
  return `Optimize the following ${ctx.contentType} content for SEO with target keywords: ${ctx.targetKeywords.join(', ')}

Target Audience: ${ctx.targetAudience}

Original Content:
${ctx.content}

Provide, in this order:
1. SEO analysis: keyword density, header structure and internal linking suggestions
2. "SEO Score: <0-100>"
3. Recommendations, one per line
4. A line reading "Optimized Content:" followed by the full optimized version of the content`;
}

export function getMetaTagsPrompt(content: string, keywords: readonly string[], contentType: string): string {
  return `Write SEO meta tags for this ${contentType}.

Target keywords: ${keywords.join(', ')}

Content:
${content}

Answer with exactly two lines:
Meta Title: <at most 60 characters>
Meta Description: <at most 160 characters>`;
}

export function getKeywordSuggestionsPrompt(topic: string, contentType: string, targetAudience: string): string {
  return `Suggest SEO keywords for a ${contentType} about "${topic}" aimed at a ${targetAudience} audience.

Format:
Primary keywords: <comma-separated list>
Long-tail keywords: <comma-separated list>
Then a short analysis of search intent and competition.`;
}

export function getSeoAnalysisPrompt(content: string, keywords?: readonly string[]): string {
  const keywordLine = keywords && keywords.length > 0 ? `\nTarget keywords: ${keywords.join(', ')}\n` : '';
  return `Analyze the SEO quality of the following content.
${keywordLine}
Content:
${content}

Give an "SEO Score: <0-100>", then list what the content does well and what to improve, one point per line.`;
}
