/**
 * Test Setup
 *
 * Runs before every test file: sets the required environment and starts MSW.
 */

import { afterAll, afterEach, beforeAll } from 'vitest';

import { server } from './mocks/server';

process.env.OPENAI_API_KEY = 'test-openai-key';
process.env.DATABASE_URL = 'sqlite::memory:';
process.env.SECRET_KEY = 'test-secret';
process.env.LOG_LEVEL = 'ERROR';

beforeAll(() => {
  server.listen({
    // supertest talks to the app over loopback; anything else must have a handler
    onUnhandledRequest(request, print) {
      const { hostname } = new URL(request.url);
      if (hostname === '127.0.0.1' || hostname === 'localhost' || hostname === '[::1]') return;
      print.error();
    },
  });
});

afterEach(() => {
  server.resetHandlers();
});

afterAll(() => {
  server.close();
});
