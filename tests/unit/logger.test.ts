/**
 * Logger Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  createContextualLogger,
  createPrefixedLogger,
  createStructuredLogger,
  generateCorrelationId,
  isLevelEnabled,
  parseLogLevel,
} from '../../src/utils/logger';

describe('Logger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  const originalFormat = process.env.LOG_FORMAT;

  beforeEach(() => {
    process.env.LOG_LEVEL = 'DEBUG';
    delete process.env.LOG_FORMAT;
  });

  afterEach(() => {
    if (originalLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = originalLevel;
    if (originalFormat === undefined) delete process.env.LOG_FORMAT;
    else process.env.LOG_FORMAT = originalFormat;
    vi.restoreAllMocks();
  });

  describe('parseLogLevel', () => {
    it('maps environment values to levels', () => {
      expect(parseLogLevel('DEBUG')).toBe('debug');
      expect(parseLogLevel('warning')).toBe('warn');
      expect(parseLogLevel('CRITICAL')).toBe('error');
      expect(parseLogLevel(undefined)).toBe('info');
    });
  });

  describe('isLevelEnabled', () => {
    it('drops messages below the threshold', () => {
      process.env.LOG_LEVEL = 'WARNING';

      expect(isLevelEnabled('info')).toBe(false);
      expect(isLevelEnabled('warn')).toBe(true);
      expect(isLevelEnabled('error')).toBe(true);
    });
  });

  describe('createPrefixedLogger', () => {
    it('prefixes every message', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      createPrefixedLogger('[Research]').info('Starting research');

      expect(spy).toHaveBeenCalledWith('[Research] Starting research');
    });

    it('writes warnings to console.warn', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      createPrefixedLogger('[Cache]').warn('miss');

      expect(spy).toHaveBeenCalledWith('[Cache] miss');
    });
  });

  describe('createStructuredLogger', () => {
    it('formats entries as readable text by default', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      createStructuredLogger('[Jobs]').structured('info', { event: 'job_started', message: 'go', jobId: 'a1' });

      expect(spy).toHaveBeenCalledWith('[Jobs] [job_started]: go {"jobId":"a1"}');
    });

    it('writes JSON when LOG_FORMAT=json', () => {
      process.env.LOG_FORMAT = 'json';
      const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      createStructuredLogger('[Jobs]').structured('error', { event: 'job_failed', jobId: 'a1' });

      const line: unknown = spy.mock.calls[0]?.[0];
      expect(typeof line).toBe('string');
      expect(JSON.parse(String(line))).toMatchObject({
        level: 'error',
        module: 'Jobs',
        event: 'job_failed',
        jobId: 'a1',
      });
    });
  });

  describe('createContextualLogger', () => {
    it('tags lines with the correlation ID and keeps it in children', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const log = createContextualLogger('[Pipeline]', { correlationId: 'abc-123', topic: 'bees' });

      const child = log.child({ phase: 'research' });
      child.info('Starting');

      expect(spy).toHaveBeenCalledWith('[Pipeline] [abc-123] Starting');
      expect(child.context).toEqual({ correlationId: 'abc-123', topic: 'bees', phase: 'research' });
    });
  });

  describe('LOG_FORMAT=json', () => {
    it('writes plain messages as JSON with the logger context', () => {
      process.env.LOG_FORMAT = 'json';
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      createContextualLogger('[api]', { correlationId: 'abc-123' }).warn('slow response');

      expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toMatchObject({
        level: 'warn',
        module: 'api',
        correlationId: 'abc-123',
        message: 'slow response',
      });
    });
  });

  it('skips messages below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'ERROR';
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createPrefixedLogger('[Research]').info('Starting research');

    expect(spy).not.toHaveBeenCalled();
  });

  describe('generateCorrelationId', () => {
    it('returns a base36 timestamp and a random part', () => {
      const id = generateCorrelationId();

      expect(id).toMatch(/^[0-9a-z]+-[0-9a-z]+$/);
      expect(generateCorrelationId()).not.toBe(id);
    });
  });
});
