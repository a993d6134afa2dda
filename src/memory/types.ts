/**
 * Conversation memory types.
 */

export type Role = 'user' | 'assistant' | 'system';

/**
 * A passage an assistant turn referred to.
 */
export interface Citation {
  /** Marker number as it appears in the answer, e.g. 2 for `[2]`. */
  marker: number;
  chunkId: string;
  documentId: string;
  title: string | null;
  filename: string | null;
  /** Opening characters of the passage. */
  preview: string;
}

/**
 * A turn as handed to the store.
 */
export interface NewTurn {
  role: Role;
  content: string;
  citations?: Citation[];
}

/**
 * A stored turn.
 */
export interface ConversationTurn extends NewTurn {
  /** Insertion order, assigned by the store. */
  seq: number;
  /** ISO timestamp. */
  createdAt: string;
}

/**
 * Append-only turn history keyed by session id.
 * Sessions are created on first append.
 */
export interface SessionStore {
  /** All turns of a session, oldest first. Unknown sessions have none. */
  list(sessionId: string): Promise<ConversationTurn[]>;
  append(sessionId: string, turn: NewTurn): Promise<ConversationTurn>;
  clear(sessionId: string): Promise<void>;
}
