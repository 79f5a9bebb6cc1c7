/**
 * Logging
 *
 * Console logging for agents, tasks, the job queue and the HTTP layer.
 * LOG_LEVEL sets the threshold (DEBUG, INFO, WARNING, ERROR, CRITICAL).
 * LOG_FORMAT=json turns every line into one JSON object for log aggregators;
 * otherwise lines read `[Module] message`.
 */

import { randomBytes } from 'node:crypto';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * An event plus arbitrary fields, e.g. `{ event: 'job_started', jobId, queued }`.
 */
export interface StructuredLogEntry {
  readonly event: string;
  readonly message?: string;
  readonly [key: string]: unknown;
}

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

export interface StructuredLogger extends Logger {
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

/**
 * Fields attached to every line of a contextual logger.
 * correlationId ties together the lines written for one request or job.
 */
export interface LoggingContext {
  readonly correlationId: string;
  readonly [key: string]: unknown;
}

export interface ContextualLogger extends StructuredLogger {
  readonly context: LoggingContext;
  /** Same correlation ID, extra fields */
  child: (extra: Record<string, unknown>) => ContextualLogger;
}

// ============================================================================
// Level and Format
// ============================================================================

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Maps a LOG_LEVEL value to a level. Unknown values mean info.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? '').trim().toUpperCase()) {
    case 'DEBUG':
      return 'debug';
    case 'WARN':
    case 'WARNING':
      return 'warn';
    case 'ERROR':
    case 'CRITICAL':
      return 'error';
    default:
      return 'info';
  }
}

export function isLevelEnabled(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[parseLogLevel(process.env.LOG_LEVEL)];
}

const jsonFormat = (): boolean => process.env.LOG_FORMAT === 'json';

// ============================================================================
// Output
// ============================================================================

function write(level: LogLevel, render: () => string): void {
  if (!isLevelEnabled(level)) return;
  const line = render();
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

function jsonLine(prefix: string, level: LogLevel, fields: Readonly<Record<string, unknown>>): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...fields,
  });
}

function structuredText(tag: string, entry: StructuredLogEntry): string {
  const { event, message, ...fields } = entry;
  const detail = message ? `: ${message}` : '';
  const data = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
  return `${tag} [${event}]${detail}${data}`;
}

/**
 * Shared by every factory below. `tag` is what text lines start with;
 * `context` is merged into JSON lines.
 */
function buildLogger(prefix: string, tag: string, context: Readonly<Record<string, unknown>>): StructuredLogger {
  const message = (level: LogLevel) => (text: string) =>
    write(level, () => (jsonFormat() ? jsonLine(prefix, level, { ...context, message: text }) : `${tag} ${text}`));

  return {
    debug: message('debug'),
    info: message('info'),
    warn: message('warn'),
    error: message('error'),
    structured: (level, entry) =>
      write(level, () => (jsonFormat() ? jsonLine(prefix, level, { ...context, ...entry }) : structuredText(tag, entry))),
  };
}

// ============================================================================
// Factories
// ============================================================================

/**
 * @example
 * const log = createPrefixedLogger('[Research]');
 * log.info('Starting research'); // "[Research] Starting research"
 */
export function createPrefixedLogger(prefix: string): Logger {
  const { debug, info, warn, error } = buildLogger(prefix, prefix, {});
  return { debug, info, warn, error };
}

/**
 * @example
 * const log = createStructuredLogger('[Jobs]');
 * log.structured('info', { event: 'job_started', jobId: 'abc', queued: 2 });
 * // "[Jobs] [job_started] {"jobId":"abc","queued":2}"
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  return buildLogger(prefix, prefix, {});
}

/**
 * Base36 timestamp, a dash, then random base36, e.g. "lq3k2a1b-9fz1x0".
 */
export function generateCorrelationId(): string {
  const random = BigInt(`0x${randomBytes(6).toString('hex')}`).toString(36);
  return `${Date.now().toString(36)}-${random}`;
}

/**
 * Tags text lines with the correlation ID and merges the whole context into JSON lines.
 *
 * @example
 * const log = createContextualLogger('[Pipeline]', { correlationId, topic });
 * log.info('Starting'); // "[Pipeline] [lq3k2-9fz1] Starting"
 */
export function createContextualLogger(prefix: string, context: LoggingContext): ContextualLogger {
  return {
    ...buildLogger(prefix, `${prefix} [${context.correlationId}]`, context),
    context,
    child: (extra) => createContextualLogger(prefix, { ...context, ...extra, correlationId: context.correlationId }),
  };
}
