/**
 * SQLite-backed conversation history.
 */

import type { Db } from './db.js';
import { toConversationTurn, type TurnRow } from './types.js';
import type { ConversationTurn, NewTurn, SessionStore } from '../memory/types.js';
import { StorageError } from '../utils/errors.js';

export class SqliteSessionStore implements SessionStore {
  constructor(
    private readonly db: Db,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async list(sessionId: string): Promise<ConversationTurn[]> {
    try {
      return this.db
        .prepare<[string], TurnRow>('SELECT * FROM turns WHERE session_id = ? ORDER BY seq')
        .all(sessionId)
        .map(toConversationTurn);
    } catch (error) {
      throw new StorageError(`Failed to read session ${sessionId}`, 'DB_QUERY_FAILED', error);
    }
  }

  async append(sessionId: string, turn: NewTurn): Promise<ConversationTurn> {
    const createdAt = this.now().toISOString();
    const citations = turn.citations ? JSON.stringify(turn.citations) : null;

    const insert = this.db.transaction((): number => {
      this.db.prepare('INSERT OR IGNORE INTO sessions (id) VALUES (?)').run(sessionId);
      const result = this.db
        .prepare('INSERT INTO turns (session_id, role, content, citations, created_at) VALUES (?, ?, ?, ?, ?)')
        .run(sessionId, turn.role, turn.content, citations, createdAt);
      return Number(result.lastInsertRowid);
    });

    let seq: number;
    try {
      seq = insert();
    } catch (error) {
      throw new StorageError(`Failed to append to session ${sessionId}`, 'DB_WRITE_FAILED', error);
    }

    const stored: ConversationTurn = { seq, role: turn.role, content: turn.content, createdAt };
    if (turn.citations) stored.citations = turn.citations;
    return stored;
  }

  async clear(sessionId: string): Promise<void> {
    try {
      this.db.prepare('DELETE FROM sessions WHERE id = ?').run(sessionId);
    } catch (error) {
      throw new StorageError(`Failed to clear session ${sessionId}`, 'DB_WRITE_FAILED', error);
    }
  }

  /**
   * Ids of all sessions with stored turns.
   */
  listSessions(): string[] {
    return this.db
      .prepare<[], { id: string }>('SELECT id FROM sessions ORDER BY created_at, id')
      .all()
      .map((row) => row.id);
  }
}
