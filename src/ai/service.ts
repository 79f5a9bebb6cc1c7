/**
 * AI Service
 *
 * Builds the language model every agent talks to.
 * Model selection and credentials come from Settings (OPENAI_MODEL, OPENAI_API_KEY).
 */

import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

import type { Settings } from '../config/settings';

type ModelSettings = Pick<Settings, 'openaiApiKey' | 'openaiModel' | 'openaiBaseUrl'>;

/**
 * Check if an OpenAI API key is configured
 */
export function isAIConfigured(settings: Pick<Settings, 'openaiApiKey'>): boolean {
  return settings.openaiApiKey.trim().length > 0;
}

/**
 * Creates the chat model for the configured provider.
 * Uses the chat completions endpoint so OpenAI-compatible gateways work via OPENAI_BASE_URL.
 */
export function createLanguageModel(settings: ModelSettings): LanguageModel {
  const openai = createOpenAI({
    apiKey: settings.openaiApiKey,
    ...(settings.openaiBaseUrl ? { baseURL: settings.openaiBaseUrl } : {}),
  });
  return openai.chat(settings.openaiModel);
}

/**
 * Get information about the current AI configuration
 */
export function getAIStatus(settings: ModelSettings): {
  configured: boolean;
  model: string;
  baseUrl: string | null;
} {
  return {
    configured: isAIConfigured(settings),
    model: settings.openaiModel,
    baseUrl: settings.openaiBaseUrl ?? null,
  };
}
