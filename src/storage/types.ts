/**
 * Row shapes of the SQLite schema and their decoding.
 *
 * @module storage/types
 */

import type { Metadata, MetadataValue } from '../ingest/types.js';
import type { CandidateChunk } from '../retrieval/types.js';
import type { Citation, ConversationTurn, Role } from '../memory/types.js';
import { StorageError } from '../utils/errors.js';

export interface ChunkRow {
  seq: number;
  id: string;
  document_id: string;
  chunk_index: number;
  content: string;
  token_count: number;
  char_count: number;
  oversized: number;
  metadata: string;
  embedding: Buffer | null;
}

export interface TurnRow {
  seq: number;
  session_id: string;
  role: string;
  content: string;
  citations: string | null;
  created_at: string;
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Decode a metadata JSON column. Non-scalar values are dropped.
 */
export function parseMetadata(json: string): Metadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new StorageError('Corrupt metadata column', 'DB_QUERY_FAILED', error);
  }
  const metadata: Metadata = {};
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return metadata;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (isMetadataValue(value)) {
      metadata[key] = value;
    }
  }
  return metadata;
}

export function toCandidateChunk(row: Pick<ChunkRow, 'seq' | 'id' | 'document_id' | 'content' | 'metadata'>): CandidateChunk {
  return {
    id: row.id,
    documentId: row.document_id,
    content: row.content,
    metadata: parseMetadata(row.metadata),
    seq: row.seq,
  };
}

function isRole(value: string): value is Role {
  return value === 'user' || value === 'assistant' || value === 'system';
}

function isCitation(value: unknown): value is Citation {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'marker' in value &&
    typeof value.marker === 'number' &&
    'chunkId' in value &&
    typeof value.chunkId === 'string' &&
    'documentId' in value &&
    typeof value.documentId === 'string' &&
    'title' in value &&
    (value.title === null || typeof value.title === 'string') &&
    'filename' in value &&
    (value.filename === null || typeof value.filename === 'string') &&
    'preview' in value &&
    typeof value.preview === 'string'
  );
}

export function toConversationTurn(row: TurnRow): ConversationTurn {
  if (!isRole(row.role)) {
    throw new StorageError(`Unknown role "${row.role}" in turn ${row.seq}`, 'DB_QUERY_FAILED');
  }

  const turn: ConversationTurn = {
    seq: row.seq,
    role: row.role,
    content: row.content,
    createdAt: row.created_at,
  };

  if (row.citations !== null) {
    const parsed: unknown = JSON.parse(row.citations);
    if (Array.isArray(parsed)) {
      turn.citations = parsed.filter(isCitation);
    }
  }

  return turn;
}
