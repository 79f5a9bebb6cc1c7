import { describe, expect, it } from 'vitest';

import {
  AGENT_CONFIG,
  CREATIVE_CONFIG,
  EXTRACTION_KEYWORDS,
  PIPELINE_CONFIG,
  RESEARCH_REQUIREMENTS_CONFIG,
  WRITER_CONFIG,
} from '../../../src/ai/content/config';

describe('content generation config', () => {
  it('keeps the agent temperature in the valid range', () => {
    expect(AGENT_CONFIG.TEMPERATURE).toBeGreaterThanOrEqual(0);
    expect(AGENT_CONFIG.TEMPERATURE).toBeLessThanOrEqual(2);
  });

  it('caps research fed to the writer at 5 facts, 3 sources and 3 insights', () => {
    expect(RESEARCH_REQUIREMENTS_CONFIG).toEqual({ MAX_KEY_FACTS: 5, MAX_SOURCES: 3, MAX_INSIGHTS: 3 });
  });

  it('uses the documented writer and creative defaults', () => {
    expect(WRITER_CONFIG.DEFAULT_WORD_COUNT).toBe(1000);
    expect(WRITER_CONFIG.DEFAULT_TONE).toBe('professional');
    expect(CREATIVE_CONFIG.DEFAULT_IDEA_COUNT).toBe(10);
    expect(CREATIVE_CONFIG.DEFAULT_HEADLINE_COUNT).toBe(15);
    expect(CREATIVE_CONFIG.DEFAULT_SERIES_LENGTH).toBe(5);
  });

  it('defaults the pipeline timeout to 10 minutes', () => {
    expect(PIPELINE_CONFIG.DEFAULT_TIMEOUT_MS).toBe(600000);
  });

  it('stores extraction keywords in lowercase', () => {
    for (const group of Object.values(EXTRACTION_KEYWORDS)) {
      for (const keywords of Object.values(group)) {
        for (const keyword of keywords) {
          expect(keyword).toBe(keyword.toLowerCase());
        }
      }
    }
  });
});
