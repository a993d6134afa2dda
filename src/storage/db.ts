/**
 * SQLite connection setup.
 *
 * Stores receive a `Database` handle through their constructor; nothing here
 * keeps a process-wide connection.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath } from '../config/rag-config.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { loadSchemaStatements } from './schema-loader.js';

const log = createLogger('db');

export type Db = Database.Database;

/**
 * Apply schema.sql. Idempotent.
 */
export function applySchema(db: Db): void {
  const statements = loadSchemaStatements();
  db.transaction(() => {
    for (const statement of statements) {
      db.exec(statement);
    }
  })();
}

/**
 * Open (creating if needed) a database and apply the schema.
 * `:memory:` opens a private in-memory database.
 */
export function openDatabase(path: string): Db {
  const resolved = path === ':memory:' ? path : resolvePath(path);

  let db: Db;
  try {
    if (resolved !== ':memory:') {
      mkdirSync(dirname(resolved), { recursive: true });
    }
    db = new Database(resolved);
  } catch (error) {
    throw new StorageError(`Failed to open database at ${resolved}`, 'DB_OPEN_FAILED', error);
  }

  db.pragma('foreign_keys = ON');
  if (resolved !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  applySchema(db);

  log.debug('Database ready', { path: resolved, version: getSchemaVersion(db) });
  return db;
}

/**
 * Get current schema version.
 */
export function getSchemaVersion(db: Db): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_version')
    .get();
  return row?.version ?? 0;
}

/**
 * Row counts, for diagnostics.
 */
export function getDbStats(db: Db): { documents: number; chunks: number; sessions: number; turns: number } {
  const count = (table: 'documents' | 'chunks' | 'sessions' | 'turns'): number =>
    db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;

  return {
    documents: count('documents'),
    chunks: count('chunks'),
    sessions: count('sessions'),
    turns: count('turns'),
  };
}
