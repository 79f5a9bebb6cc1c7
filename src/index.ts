import type { Server } from 'node:http';

import { generateText } from 'ai';

import { createApp } from './api/app';
import { createLanguageModel } from './ai/service';
import { generateContent } from './ai/content/generate-content';
import { errorMessage } from './ai/content/types';
import { RedisCacheStore } from './cache';
import { loadSettings, validateEnvironment, type Settings } from './config/settings';
import { createDatabase, ensureHistorySchema, KnexHistoryStore } from './history';
import { ContentJobQueue } from './jobs/job-queue';
import { createPrefixedLogger, createStructuredLogger } from './utils/logger';

const log = createPrefixedLogger('[server]');

/**
 * A pipeline run can take several minutes; the default socket timeout would
 * close synchronous /content/create requests before the response is ready.
 */
const EXTENDED_REQUEST_TIMEOUT_MS = 15 * 60 * 1000;

function extendServerTimeouts(server: Server): void {
  server.timeout = 0;
  server.requestTimeout = EXTENDED_REQUEST_TIMEOUT_MS;
  server.headersTimeout = EXTENDED_REQUEST_TIMEOUT_MS + 1000; // Must be > requestTimeout
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

export async function main(settings: Settings): Promise<void> {
  const model = createLanguageModel(settings);

  const db = createDatabase(settings.databaseUrl);
  await ensureHistorySchema(db);
  const history = new KnexHistoryStore(db);

  const cache = RedisCacheStore.fromUrl(settings.redisUrl, createPrefixedLogger('[cache]'));

  const jobs = new ContentJobQueue({
    maxWorkers: settings.maxWorkers,
    logger: createStructuredLogger('[Jobs]'),
    run: (request, context) =>
      generateContent(
        request,
        { generateText, model, history, cache, cacheTtlSeconds: settings.cacheTtlSeconds },
        {
          signal: context.signal,
          onProgress: context.onProgress,
          correlationId: context.correlationId,
          reviewEnabled: settings.contentReviewEnabled,
          maxContentLength: settings.maxContentLength,
          defaultContentType: settings.defaultContentType,
        }
      ),
  });

  const app = createApp({ settings, generateText, model, history, cache, jobs });
  const server = app.listen(settings.port, settings.host, () => {
    log.info(`Listening on http://${settings.host}:${settings.port} (model: ${settings.openaiModel})`);
  });
  extendServerTimeouts(server);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down`);

    const closing = closeServer(server);
    const cancelled = jobs.cancelQueued();
    if (cancelled > 0) log.info(`Cancelled ${cancelled} queued job(s)`);
    await jobs.drain();
    await closing;
    await cache.close();
    await history.close();
    log.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      });
    });
  }
}

const environment = validateEnvironment();
if (!environment.valid) {
  log.error(`Missing required environment variables: ${environment.missing.join(', ')}`);
  process.exit(1);
}

main(loadSettings()).catch((error: unknown) => {
  log.error(`Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
