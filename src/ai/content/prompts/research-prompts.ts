/**
 * Research Agent Prompts
 *
 * Task descriptions for topic research, fact checking, statistics, expert quotes
 * and trend analysis. Each prompt asks for labelled lines so the results can be
 * parsed with keyword extraction.
 */

export interface ResearchTopicPromptContext {
  readonly topic: string;
  readonly researchDepth: string;
  readonly contentType: string;
  readonly targetAudience: string;
}

export function getResearchTopicPrompt(ctx: ResearchTopicPromptContext): string {
  return `Conduct ${ctx.researchDepth} research on the topic: "${ctx.topic}"

Research parameters:
- Content type: ${ctx.contentType}
- Target audience: ${ctx.targetAudience}
- Research depth: ${ctx.researchDepth}

Provide:
1. Key facts and statistics (one per line, prefixed "Key fact:")
2. Credible sources and references (prefixed "Source:")
3. Insights and findings that would interest the audience (prefixed "Insight:")
4. Recommendations for angles the content should take (prefixed "Recommendation:")

Prefer recent, verifiable information and note where figures come from.`;
}

export function getFactCheckPrompt(content: string, topic: string): string {
  return `Fact-check the following content about "${topic}".

Content:
${content}

For each claim, state whether it is verified, inaccurate, or needs correction.
- Prefix confirmed claims with "Verified:"
- Prefix problems with "Correction needed:" and give the accurate information
- Note whether supporting sources are credible or reliable
- End with an overall "Accuracy: <0-100>" score`;
}

export interface StatisticsPromptContext {
  readonly topic: string;
  readonly timePeriod?: string;
  readonly geographicScope?: string;
}

export function getStatisticsPrompt(ctx: StatisticsPromptContext): string {
  let prompt = `Gather relevant statistics and numerical data about "${ctx.topic}".`;
  if (ctx.timePeriod) {
    prompt += `\n- Time period: ${ctx.timePeriod}`;
  }
  if (ctx.geographicScope) {
    prompt += `\n- Geographic scope: ${ctx.geographicScope}`;
  }
  prompt += `

Include:
1. Key numbers (percentages, totals in thousands, millions or billions)
2. Trends showing growth, increase or decrease over time
3. The source of each figure ("According to ..." or "Data from ...")
4. Suggestions for charts, graphs or diagrams that would visualize the data`;
  return prompt;
}

export function getExpertQuotesPrompt(topic: string, quoteType: string): string {
  return `Find ${quoteType} expert quotes about "${topic}".

For each quote provide:
1. The quote itself in double quotes
2. The expert's name and credentials (e.g. PhD, professor, industry specialist)
3. Where the quote comes from (interview, study, report or other source)

Only include quotes that add authority to content about this topic.`;
}

export interface TrendsPromptContext {
  readonly topic: string;
  readonly timePeriod: string;
  readonly trendType: string;
}

export function getTrendsPrompt(ctx: TrendsPromptContext): string {
  return `Analyze ${ctx.trendType} trends related to "${ctx.topic}" over the ${ctx.timePeriod} period.

Cover:
1. Current trends shaping the topic today
2. Emerging and developing trends that are growing
3. Future predictions and forecasts (what will happen next)
4. Implications and impact for the audience and for content strategy`;
}
