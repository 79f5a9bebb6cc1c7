/**
 * Back History Types
 *
 * The Back History is the persistent log of agent/task actions and produced content.
 */

export type HistoryKind = 'action' | 'content';

/** Longest correlation ID a history entry stores; request IDs are cut to this */
export const MAX_CORRELATION_ID_LENGTH = 128;
export type HistoryStatus = 'completed' | 'failed';

/**
 * Entry as written by callers. id and createdAt are assigned by the store.
 */
export interface NewHistoryEntry {
  readonly correlationId: string;
  readonly kind: HistoryKind;
  /** e.g. 'research_topic', 'create_content', 'pipeline' */
  readonly action: string;
  readonly agent: string | null;
  readonly topic: string | null;
  readonly status: HistoryStatus;
  readonly input: unknown;
  readonly output: unknown;
  readonly error: string | null;
  readonly durationMs: number;
}

export interface HistoryEntry extends NewHistoryEntry {
  readonly id: number;
  /** ISO-8601 */
  readonly createdAt: string;
}

export interface HistoryQuery {
  readonly kind?: HistoryKind;
  readonly action?: string;
  readonly topic?: string;
  readonly correlationId?: string;
  readonly limit?: number;
  readonly offset?: number;
}

export interface HistoryPage {
  readonly data: HistoryEntry[];
  readonly total: number;
}

/**
 * Storage for the Back History.
 */
export interface HistoryStore {
  record(entry: NewHistoryEntry): Promise<HistoryEntry>;
  get(id: number): Promise<HistoryEntry | null>;
  /** Newest first */
  list(query?: HistoryQuery): Promise<HistoryPage>;
  /** Deletes entries created before `olderThan`; returns how many were removed */
  prune(olderThan: Date): Promise<number>;
  close(): Promise<void>;
}
