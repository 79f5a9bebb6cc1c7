/**
 * Knex History Store
 *
 * HistoryStore over a knex connection (pg in production, better-sqlite3 locally and in tests).
 */

import type { Knex } from 'knex';

import { isoTimestamp, systemClock, type Clock } from '../ai/content/types';
import { HISTORY_TABLE } from './database';
import type {
  HistoryEntry,
  HistoryKind,
  HistoryPage,
  HistoryQuery,
  HistoryStatus,
  HistoryStore,
  NewHistoryEntry,
} from './types';

// ============================================================================
// Row Mapping
// ============================================================================

/**
 * Raw row of the history_entries table.
 */
interface HistoryRow {
  id: number;
  correlation_id: string;
  kind: HistoryKind;
  action: string;
  agent: string | null;
  topic: string | null;
  status: HistoryStatus;
  input: string;
  output: string | null;
  error: string | null;
  duration_ms: number;
  created_at: string;
}

function parseJson(value: string | null): unknown {
  if (value === null) return null;
  try {
    return JSON.parse(value);
  } catch {
    // Rows written by hand may hold plain text
    return value;
  }
}

function serializeJson(value: unknown): string {
  return JSON.stringify(value ?? null);
}

function toEntry(row: HistoryRow): HistoryEntry {
  return {
    id: Number(row.id),
    correlationId: row.correlation_id,
    kind: row.kind,
    action: row.action,
    agent: row.agent,
    topic: row.topic,
    status: row.status,
    input: parseJson(row.input),
    output: parseJson(row.output),
    error: row.error,
    durationMs: Number(row.duration_ms),
    createdAt: row.created_at,
  };
}

export const DEFAULT_HISTORY_LIMIT = 50;

// ============================================================================
// Store
// ============================================================================

export class KnexHistoryStore implements HistoryStore {
  constructor(
    private readonly db: Knex,
    private readonly clock: Clock = systemClock
  ) {}

  async record(entry: NewHistoryEntry): Promise<HistoryEntry> {
    const row: Omit<HistoryRow, 'id'> = {
      correlation_id: entry.correlationId,
      kind: entry.kind,
      action: entry.action,
      agent: entry.agent,
      topic: entry.topic,
      status: entry.status,
      input: serializeJson(entry.input),
      output: entry.output === null || entry.output === undefined ? null : serializeJson(entry.output),
      error: entry.error,
      duration_ms: Math.max(0, Math.round(entry.durationMs)),
      created_at: isoTimestamp(this.clock),
    };

    const [inserted] = await this.db<HistoryRow>(HISTORY_TABLE).insert(row).returning('id');
    const id = Number(inserted?.id);
    return toEntry({ ...row, id });
  }

  async get(id: number): Promise<HistoryEntry | null> {
    const row = await this.db<HistoryRow>(HISTORY_TABLE).where('id', id).first();
    return row ? toEntry(row) : null;
  }

  async list(query: HistoryQuery = {}): Promise<HistoryPage> {
    const limit = query.limit ?? DEFAULT_HISTORY_LIMIT;
    const offset = query.offset ?? 0;

    const filtered = this.db<HistoryRow>(HISTORY_TABLE).modify((builder) => {
      if (query.kind) builder.where('kind', query.kind);
      if (query.action) builder.where('action', query.action);
      if (query.topic) builder.where('topic', query.topic);
      if (query.correlationId) builder.where('correlation_id', query.correlationId);
    });

    const [rows, countRow] = await Promise.all([
      filtered.clone().select('*').orderBy('id', 'desc').limit(limit).offset(offset),
      filtered.clone().count({ count: '*' }).first(),
    ]);

    return {
      data: rows.map(toEntry),
      total: Number(countRow?.count ?? 0),
    };
  }

  async prune(olderThan: Date): Promise<number> {
    return this.db<HistoryRow>(HISTORY_TABLE).where('created_at', '<', olderThan.toISOString()).delete();
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
