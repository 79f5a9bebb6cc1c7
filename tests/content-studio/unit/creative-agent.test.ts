import { describe, expect, it } from 'vitest';

import {
  brainstormHeadlines,
  createContentHooks,
  createContentSeries,
  generateContentIdeas,
  generateViralConcepts,
} from '../../../src/ai/content/agents/creative';
import { createTestAgentDeps, mockGenerateText, promptOf } from '../../helpers/agent-deps';

describe('Creative Agent', () => {
  it('generateContentIdeas groups ideas, angles and engagement notes', async () => {
    const generateText = mockGenerateText(
      ['Idea: Rooftop hive tour', 'Angle: a renter perspective', 'Highly shareable on social'].join('\n')
    );

    const result = await generateContentIdeas('bees', {}, createTestAgentDeps(generateText));

    expect(result.topic).toBe('bees');
    expect(result.ideaList).toEqual(['Idea: Rooftop hive tour', 'Angle: a renter perspective']);
    expect(result.creativeAngles).toEqual(['Angle: a renter perspective']);
    expect(result.engagementPotential).toEqual(['Highly shareable on social']);
    expect(promptOf(generateText).startsWith('Generate 10 high-creativity article ideas about "bees" for a general audience.')).toBe(
      true
    );
  });

  it('brainstormHeadlines separates headlines from style notes', async () => {
    const generateText = mockGenerateText(['Headline: How to Keep Bees', 'Style: listicle', 'High click appeal'].join('\n'));

    const result = await brainstormHeadlines('bees', {}, createTestAgentDeps(generateText));

    expect(result.headlineList).toEqual(['Headline: How to Keep Bees']);
    expect(result.headlineStyles).toEqual(['Style: listicle']);
    expect(result.clickThroughPotential).toEqual(['High click appeal']);
    expect(promptOf(generateText).startsWith('Brainstorm 15 clickbait-style headlines for a article about "bees".')).toBe(true);
  });

  it('brainstormHeadlines honours the requested count and style', async () => {
    const generateText = mockGenerateText('Headline: One');

    await brainstormHeadlines('bees', { headlineCount: 3, headlineStyle: 'question' }, createTestAgentDeps(generateText));

    expect(promptOf(generateText).startsWith('Brainstorm 3 question-style headlines')).toBe(true);
  });

  it('createContentHooks sorts hooks by type and emotion', async () => {
    const generateText = mockGenerateText(
      ['Hook: Picture a hive on your balcony', 'Type: question', 'Emotional pull: wonder'].join('\n')
    );

    const result = await createContentHooks('bees', {}, createTestAgentDeps(generateText));

    expect(result.hookList).toEqual(['Hook: Picture a hive on your balcony']);
    expect(result.hookTypes).toEqual(['Type: question']);
    expect(result.emotionalImpact).toEqual(['Emotional pull: wonder']);
    expect(promptOf(generateText).startsWith('Write 10 opening hooks for content about "bees".')).toBe(true);
  });

  it('generateViralConcepts extracts concepts, scores and triggers', async () => {
    const generateText = mockGenerateText(['Concept: Bee selfie challenge', 'Viral score: 8', 'Trigger: surprise'].join('\n'));

    const result = await generateViralConcepts('bees', { platform: 'tiktok' }, createTestAgentDeps(generateText));

    expect(result.conceptList).toEqual(['Concept: Bee selfie challenge']);
    expect(result.viralScores).toEqual(['Viral score: 8']);
    expect(result.emotionalTriggers).toEqual(['Trigger: surprise']);
    expect(promptOf(generateText).startsWith('Develop 8 viral content concepts about "bees" for tiktok platforms.')).toBe(true);
  });

  it('createContentSeries reads the concept line, parts and flow', async () => {
    const generateText = mockGenerateText(
      ['Theme: A year with city bees', 'Part 1: Choosing a hive', 'Part 2: First harvest', 'Progression: spring to autumn'].join(
        '\n'
      )
    );

    const result = await createContentSeries('bees', {}, createTestAgentDeps(generateText));

    expect(result.seriesConcept).toBe('Theme: A year with city bees');
    expect(result.seriesParts).toEqual(['Part 1: Choosing a hive', 'Part 2: First harvest']);
    expect(result.seriesFlow).toEqual(['Progression: spring to autumn']);
    expect(promptOf(generateText).startsWith('Plan a 5-part article series about "bees".')).toBe(true);
  });

  it('rejects an empty topic', async () => {
    await expect(createContentSeries('', {}, createTestAgentDeps())).rejects.toMatchObject({
      code: 'INVALID_INPUT',
      message: 'Topic cannot be empty',
    });
  });
});
