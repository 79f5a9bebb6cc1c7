/**
 * Test App Factory
 *
 * Builds the real application around a mocked generateText, an in-memory history
 * and a job queue whose runner the test controls.
 */

import type { Express } from 'express';
import { vi, type Mock } from 'vitest';

import { createMockClock } from '../../src/ai/content/types';
import { createApp } from '../../src/api/app';
import type { AppDeps } from '../../src/api/context';
import type { Settings } from '../../src/config/settings';
import { ContentJobQueue, type JobRunner } from '../../src/jobs/job-queue';
import { createSilentLogger } from './agent-deps';
import { createFakeGenerationResult } from './content-result';
import { InMemoryHistoryStore } from './history';
import { createTestSettings } from './settings';

export const TEST_API_KEY = 'test-secret';
export const TEST_TIMESTAMP = '2024-01-01T00:00:00.000Z';

export interface TestAppOptions {
  readonly settings?: Partial<Settings>;
  readonly generateText?: Mock;
  /** Job runner; by default every job completes with a fake result */
  readonly run?: JobRunner;
}

export interface TestApp {
  readonly app: Express;
  readonly deps: AppDeps;
  readonly generateText: Mock;
  readonly history: InMemoryHistoryStore;
  readonly jobs: ContentJobQueue;
}

export function createTestApp(options: TestAppOptions = {}): TestApp {
  const clock = createMockClock(Date.parse(TEST_TIMESTAMP));
  const settings = createTestSettings({ maxWorkers: 2, ...options.settings });
  const generateText = options.generateText ?? vi.fn();
  const history = new InMemoryHistoryStore(clock);
  const jobs = new ContentJobQueue({
    maxWorkers: settings.maxWorkers,
    clock,
    logger: { ...createSilentLogger(), structured: vi.fn() },
    run: options.run ?? ((request) => Promise.resolve(createFakeGenerationResult(request.topic))),
  });

  const deps: AppDeps = { settings, generateText, model: 'test-model', history, jobs, clock };
  return { app: createApp(deps), deps, generateText, history, jobs };
}
