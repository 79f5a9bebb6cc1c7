/**
 * AI Service Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createLanguageModel, getAIStatus, isAIConfigured } from '../../src/ai/service';
import { createTestSettings } from '../helpers/settings';

describe('AI Service', () => {
  describe('isAIConfigured', () => {
    it('should return true when an API key is set', () => {
      expect(isAIConfigured({ openaiApiKey: 'test-key' })).toBe(true);
    });

    it('should return false when the API key is blank', () => {
      expect(isAIConfigured({ openaiApiKey: '  ' })).toBe(false);
    });
  });

  describe('getAIStatus', () => {
    it('should report the configured model', () => {
      expect(getAIStatus(createTestSettings({ openaiModel: 'gpt-4o-mini' }))).toEqual({
        configured: true,
        model: 'gpt-4o-mini',
        baseUrl: null,
      });
    });

    it('should include a custom base URL', () => {
      const status = getAIStatus(createTestSettings({ openaiBaseUrl: 'http://localhost:4000/v1' }));

      expect(status.baseUrl).toBe('http://localhost:4000/v1');
    });
  });

  describe('createLanguageModel', () => {
    it('should build a chat model for the configured model id', () => {
      const model = createLanguageModel(createTestSettings({ openaiModel: 'gpt-4o-mini' }));

      expect(typeof model).toBe('object');
      if (typeof model === 'object') {
        expect(model.modelId).toBe('gpt-4o-mini');
        expect(model.provider).toBe('openai.chat');
      }
    });
  });
});
