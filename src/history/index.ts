/**
 * Back History
 */

import type { Logger } from '../utils/logger';
import { errorMessage } from '../ai/content/types';
import type { HistoryEntry, HistoryStore, NewHistoryEntry } from './types';

export * from './types';
export { createDatabase, ensureHistorySchema, getDatabaseConfig, HISTORY_TABLE } from './database';
export { KnexHistoryStore, DEFAULT_HISTORY_LIMIT } from './knex-history-store';

/**
 * Records an entry without letting a storage failure reach the caller.
 * Returns null when there is no store or the write failed.
 */
export async function recordSafely(
  store: HistoryStore | undefined,
  entry: NewHistoryEntry,
  log: Logger
): Promise<HistoryEntry | null> {
  if (!store) return null;
  try {
    return await store.record(entry);
  } catch (error) {
    log.warn(`Failed to record history entry "${entry.action}": ${errorMessage(error)}`);
    return null;
  }
}
