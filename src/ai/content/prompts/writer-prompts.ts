/**
 * Writer Agent Prompts
 */

export interface DraftPromptContext {
  readonly topic: string;
  readonly contentType: string;
  readonly targetAudience: string;
  readonly wordCount: number;
  readonly tone: string;
  readonly keywords?: readonly string[];
  readonly additionalRequirements?: string;
}

export function getDraftPrompt(ctx: DraftPromptContext): string {
  let prompt = `Create a ${ctx.contentType} about "${ctx.topic}" with the following specifications:

- Target Audience: ${ctx.targetAudience}
- Word Count: Approximately ${ctx.wordCount} words
- Tone: ${ctx.tone}
- Content Type: ${ctx.contentType}`;

  if (ctx.keywords && ctx.keywords.length > 0) {
    prompt += `\n- Keywords to include naturally: ${ctx.keywords.join(', ')}`;
  }
  if (ctx.additionalRequirements) {
    prompt += `\n- Additional Requirements: ${ctx.additionalRequirements}`;
  }

  prompt += `

The content must be:
1. Well-structured with clear headings and subheadings
2. Engaging and informative
3. Written for the target audience
4. Free of grammatical errors
5. Original`;
  return prompt;
}

export function getExpandSectionPrompt(sectionTitle: string, sectionContent: string, targetLength: number): string {
  return `Expand the following section to approximately ${targetLength} words while keeping it relevant:

Section Title: ${sectionTitle}
Current Content: ${sectionContent}

Add detail and examples, keep the original tone and style, and make the transitions read smoothly.`;
}

export interface RewritePromptContext {
  readonly originalContent: string;
  readonly newTone?: string;
  readonly newAudience?: string;
  readonly newLength?: number;
}

export function getRewritePrompt(ctx: RewritePromptContext): string {
  let prompt = `Rewrite the following content with the specified changes:

Original Content:
${ctx.originalContent}
`;
  if (ctx.newTone) prompt += `\n- New Tone: ${ctx.newTone}`;
  if (ctx.newAudience) prompt += `\n- New Target Audience: ${ctx.newAudience}`;
  if (ctx.newLength) prompt += `\n- New Target Length: ${ctx.newLength} words`;

  prompt += `

Keep the core message and key points, adapt to the new specifications, and make it read naturally.`;
  return prompt;
}
