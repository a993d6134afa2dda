/**
 * Tests for database setup and schema loading.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { applySchema, getDbStats, getSchemaVersion, openDatabase, type Db } from '../../src/storage/db.js';
import { loadSchemaStatements, splitStatements } from '../../src/storage/schema-loader.js';
import { StorageError } from '../../src/utils/errors.js';

describe('splitStatements', () => {
  it('splits on semicolons and skips leading comments', () => {
    const sql = '-- header\nCREATE TABLE a (x INTEGER);\n\nCREATE TABLE b (y TEXT);\n';

    expect(splitStatements(sql)).toEqual(['CREATE TABLE a (x INTEGER)', 'CREATE TABLE b (y TEXT)']);
  });

  it('keeps trigger bodies whole', () => {
    const sql = [
      'CREATE TRIGGER t AFTER INSERT ON a BEGIN',
      '  INSERT INTO b VALUES (new.x);',
      'END;',
      'CREATE INDEX i ON a(x);',
    ].join('\n');

    expect(splitStatements(sql)).toEqual([
      'CREATE TRIGGER t AFTER INSERT ON a BEGIN\n  INSERT INTO b VALUES (new.x);\nEND',
      'CREATE INDEX i ON a(x)',
    ]);
  });

  it('reads the bundled schema', () => {
    const statements = loadSchemaStatements();

    expect(statements.some((s) => s.startsWith('CREATE TABLE IF NOT EXISTS chunks'))).toBe(true);
    expect(statements.some((s) => s.startsWith('CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts'))).toBe(true);
  });
});

describe('openDatabase', () => {
  const opened: Db[] = [];
  const dirs: string[] = [];

  afterEach(() => {
    for (const db of opened.splice(0)) db.close();
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  function tempDir(): string {
    const dir = mkdtempSync(join(tmpdir(), 'ragline-db-'));
    dirs.push(dir);
    return dir;
  }

  it('opens an in-memory database with the schema applied', () => {
    const db = openDatabase(':memory:');
    opened.push(db);

    expect(getSchemaVersion(db)).toBe(1);
    expect(getDbStats(db)).toEqual({ documents: 0, chunks: 0, sessions: 0, turns: 0 });
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
  });

  it('applies the schema idempotently', () => {
    const db = openDatabase(':memory:');
    opened.push(db);

    applySchema(db);

    expect(getSchemaVersion(db)).toBe(1);
  });

  it('creates missing parent directories for file databases', () => {
    const path = join(tempDir(), 'nested', 'dir', 'store.db');
    const db = openDatabase(path);
    opened.push(db);

    expect(existsSync(path)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
  });

  it('wraps open failures in StorageError', () => {
    const blocker = join(tempDir(), 'blocker');
    writeFileSync(blocker, 'not a directory');

    let caught: unknown;
    try {
      opened.push(openDatabase(join(blocker, 'store.db')));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(StorageError);
    expect(caught).toMatchObject({ code: 'DB_OPEN_FAILED' });
  });

  it('cascades document deletes to chunks', () => {
    const db = openDatabase(':memory:');
    opened.push(db);

    db.prepare("INSERT INTO documents (id, type) VALUES ('d1', 'txt')").run();
    db.prepare(
      "INSERT INTO chunks (id, document_id, chunk_index, content, token_count, char_count) VALUES ('d1:0', 'd1', 0, 'hello', 1, 5)",
    ).run();
    db.prepare("DELETE FROM documents WHERE id = 'd1'").run();

    expect(getDbStats(db).chunks).toBe(0);
  });
});
