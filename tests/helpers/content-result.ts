import type { ContentGenerationResult } from '../../src/ai/content/generate-content';

/**
 * A finished pipeline result for tests that only pass results around.
 */
export function createFakeGenerationResult(topic: string): ContentGenerationResult {
  return {
    topic,
    contentType: 'article',
    targetAudience: 'general',
    research: {
      topic,
      researchFindings: 'Key fact: placeholder',
      keyFacts: ['Key fact: placeholder'],
      sources: [],
      insights: [],
      recommendations: [],
    },
    draft: `Draft about ${topic}`,
    finalContent: `Final content about ${topic}`,
    seo: {
      optimizedContent: `Final content about ${topic}`,
      seoScore: 80,
      recommendations: [],
      metaTitle: topic,
      metaDescription: `All about ${topic}`,
    },
    headlines: [],
    metadata: {
      correlationId: 'corr-test',
      generatedAt: '2024-01-01T00:00:00.000Z',
      totalDurationMs: 0,
      phaseDurations: { research: 0, writing: 0, editing: 0, seo: 0, creative: 0, history: 0 },
      tokenUsage: { total: { input: 0, output: 0 }, byPhase: {} },
      reviewEnabled: false,
      wordCount: 4,
      historyEntryId: null,
    },
  };
}
