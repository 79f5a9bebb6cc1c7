/**
 * Editor Agent Prompts
 */

export const DEFAULT_REVIEW_FOCUS = ['grammar', 'style', 'clarity', 'structure', 'engagement'] as const;
export const DEFAULT_IMPROVEMENT_AREAS = ['clarity', 'engagement', 'flow', 'impact'] as const;

export interface ReviewPromptContext {
  readonly content: string;
  readonly contentType: string;
  readonly targetAudience: string;
  readonly reviewFocus: readonly string[];
}

export function getReviewPrompt(ctx: ReviewPromptContext): string {
  return `Review the following ${ctx.contentType} written for a ${ctx.targetAudience} audience.

Focus areas: ${ctx.reviewFocus.join(', ')}

Content:
${ctx.content}

Provide:
1. An overall quality score as "Score: <1-10>"
2. What works well (good, strong or effective elements), one per line
3. Specific suggestions to improve, one per line
4. Any structural problems`;
}

export function getEditPrompt(content: string, editInstructions: string, preserveStyle: boolean): string {
  const styleLine = preserveStyle
    ? "Preserve the author's voice and writing style."
    : 'You may change the writing style where it helps.';
  return `Edit the following content according to these instructions:

Instructions: ${editInstructions}

${styleLine}

Content:
${content}

Return only the edited content.`;
}

export function getImprovePrompt(content: string, improvementAreas: readonly string[]): string {
  return `Improve the following content, concentrating on: ${improvementAreas.join(', ')}.

Content:
${content}

Keep the meaning and key points. Return only the improved content.`;
}

export function getGrammarPrompt(content: string): string {
  return `Check the following content for grammar, spelling, punctuation and style issues.

Content:
${content}

List each error found with its fix on its own line, then list style suggestions.`;
}
