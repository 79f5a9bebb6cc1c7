/**
 * Database Connection
 *
 * Builds a knex instance from DATABASE_URL and creates the history schema.
 * postgres:// and postgresql:// use pg; sqlite: and file: use better-sqlite3.
 */

import { knex, type Knex } from 'knex';

import { ContentStudioError } from '../ai/content/types';
import { MAX_CORRELATION_ID_LENGTH } from './types';

export const HISTORY_TABLE = 'history_entries';

const SQLITE_PREFIX = /^(sqlite|file):(\/\/)?/;

/**
 * Resolves the sqlite filename for a `sqlite:` / `file:` URL.
 * `sqlite::memory:` and an empty path both mean an in-memory database.
 */
export function sqliteFilename(url: string): string {
  const path = url.replace(SQLITE_PREFIX, '');
  return path === '' || path === ':memory:' ? ':memory:' : path;
}

/**
 * Knex configuration for a DATABASE_URL.
 *
 * @throws ContentStudioError with 'CONFIG_ERROR' for unsupported schemes
 */
export function getDatabaseConfig(url: string): Knex.Config {
  if (/^postgres(ql)?:\/\//.test(url)) {
    return { client: 'pg', connection: url, pool: { min: 0, max: 10 } };
  }

  if (SQLITE_PREFIX.test(url)) {
    return {
      client: 'better-sqlite3',
      connection: { filename: sqliteFilename(url) },
      useNullAsDefault: true,
      // A second connection to :memory: would open a different, empty database
      pool: { min: 1, max: 1 },
    };
  }

  const scheme = url.split(':')[0] || '(none)';
  throw new ContentStudioError('CONFIG_ERROR', `Unsupported DATABASE_URL scheme: ${scheme}`);
}

export function createDatabase(url: string): Knex {
  return knex(getDatabaseConfig(url));
}

/**
 * Creates the history table if it is absent.
 * JSON columns are stored as text; timestamps as ISO strings so ordering
 * and pruning behave the same on every client.
 */
export async function ensureHistorySchema(db: Knex): Promise<void> {
  if (await db.schema.hasTable(HISTORY_TABLE)) {
    return;
  }

  await db.schema.createTable(HISTORY_TABLE, (table) => {
    table.increments('id').primary();
    table.string('correlation_id', MAX_CORRELATION_ID_LENGTH).notNullable().index();
    table.string('kind', 16).notNullable().index();
    table.string('action', 64).notNullable().index();
    table.string('agent', 64).nullable();
    table.text('topic').nullable();
    table.string('status', 16).notNullable();
    table.text('input').notNullable();
    table.text('output').nullable();
    table.text('error').nullable();
    table.integer('duration_ms').notNullable().defaultTo(0);
    table.string('created_at', 32).notNullable().index();
  });
}
