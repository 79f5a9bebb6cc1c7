import { loadSettings, type Settings } from '../../src/config/settings';

export const TEST_ENV = {
  OPENAI_API_KEY: 'test-openai-key',
  DATABASE_URL: 'sqlite::memory:',
  SECRET_KEY: 'test-secret',
} as const;

export function createTestSettings(overrides: Partial<Settings> = {}): Settings {
  return { ...loadSettings(TEST_ENV), ...overrides };
}
