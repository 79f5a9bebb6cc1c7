/**
 * Creative Agent Prompts
 */

export interface IdeasPromptContext {
  readonly topic: string;
  readonly contentType: string;
  readonly targetAudience: string;
  readonly ideaCount: number;
  readonly creativityLevel: string;
}

export function getIdeasPrompt(ctx: IdeasPromptContext): string {
  return `Generate ${ctx.ideaCount} ${ctx.creativityLevel}-creativity ${ctx.contentType} ideas about "${ctx.topic}" for a ${ctx.targetAudience} audience.

For each idea give the concept, the angle or perspective it takes, and why it has engagement potential
(shareable, interactive, or likely to go viral).`;
}

export interface HeadlinesPromptContext {
  readonly topic: string;
  readonly contentType: string;
  readonly headlineCount: number;
  readonly headlineStyle: string;
}

export function getHeadlinesPrompt(ctx: HeadlinesPromptContext): string {
  return `Brainstorm ${ctx.headlineCount} ${ctx.headlineStyle}-style headlines for a ${ctx.contentType} about "${ctx.topic}".

Put one headline per line, prefixed "Headline:". Mix formats such as "How to", "Why" and "What" headlines.
After the list, note the style type of the strongest headlines and their click-through potential.`;
}

export function getHooksPrompt(topic: string, hookCount: number, hookType: string): string {
  return `Write ${hookCount} ${hookType} hooks for content about "${topic}".

Use a variety of hook types: story, statistic, question and anecdote.
Prefix each with "Hook:" and describe the emotional response it aims for.`;
}

export function getViralConceptsPrompt(topic: string, platform: string, conceptCount: number): string {
  return `Develop ${conceptCount} viral content concepts about "${topic}" for ${platform} platforms.

For each concept (campaign, challenge or idea) give:
- A viral potential score from 1-10
- The emotional trigger it relies on (joy, surprise, anger, fear or another emotion)`;
}

export function getSeriesPrompt(topic: string, seriesLength: number, contentType: string): string {
  return `Plan a ${seriesLength}-part ${contentType} series about "${topic}".

Start with one line stating the series concept or theme.
Then describe each part (Part 1, Part 2, ...) and explain the flow and progression from one part to the next.`;
}
