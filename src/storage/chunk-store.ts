/**
 * Document and chunk persistence.
 */

import type { Db } from './db.js';
import { parseMetadata, type ChunkRow } from './types.js';
import type { VectorStore } from './vector-store.js';
import type { Chunk, ChunkMetadata, Document, EmbeddedChunk } from '../ingest/types.js';
import type { CandidateChunk } from '../retrieval/types.js';
import { deserializeEmbedding, serializeEmbedding } from '../utils/embedding-utils.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('chunk-store');

/**
 * Write side of chunk storage.
 */
export interface ChunkStore {
  /**
   * Store a document with its embedded chunks, replacing any chunks
   * previously stored for it. Returns the number of chunks written.
   */
  saveDocument(document: Document, chunks: EmbeddedChunk[]): Promise<number>;
}

function toChunkMetadata(row: ChunkRow): ChunkMetadata {
  const metadata = parseMetadata(row.metadata);
  const str = (key: string): string | null => {
    const value = metadata[key];
    return typeof value === 'string' ? value : null;
  };
  const num = (key: string, fallback: number): number => {
    const value = metadata[key];
    return typeof value === 'number' ? value : fallback;
  };
  return {
    ...metadata,
    filename: str('filename'),
    title: str('title'),
    author: str('author'),
    section: str('section'),
    chunkIndex: num('chunkIndex', row.chunk_index),
    totalChunks: num('totalChunks', 0),
  };
}

function toChunk(row: ChunkRow): Chunk {
  const chunk: Chunk = {
    id: row.id,
    documentId: row.document_id,
    index: row.chunk_index,
    text: row.content,
    tokenCount: row.token_count,
    charCount: row.char_count,
    oversized: row.oversized === 1,
    metadata: toChunkMetadata(row),
  };
  if (row.embedding) {
    chunk.embedding = deserializeEmbedding(row.embedding);
  }
  return chunk;
}

export class SqliteChunkStore implements ChunkStore {
  constructor(
    private readonly db: Db,
    private readonly vectorStore?: VectorStore,
  ) {}

  async saveDocument(document: Document, chunks: EmbeddedChunk[]): Promise<number> {
    const upsertDocument = this.db.prepare(`
      INSERT INTO documents (id, type, title, author, filename, metadata)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        type = excluded.type,
        title = excluded.title,
        author = excluded.author,
        filename = excluded.filename,
        metadata = excluded.metadata
    `);
    const deleteChunks = this.db.prepare('DELETE FROM chunks WHERE document_id = ?');
    const insertChunk = this.db.prepare(`
      INSERT INTO chunks (
        id, document_id, chunk_index, content, token_count, char_count,
        oversized, metadata, embedding
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const written: Array<{ chunk: CandidateChunk; vector: number[] }> = [];

    const save = this.db.transaction(() => {
      upsertDocument.run(
        document.id,
        document.type,
        document.title ?? null,
        document.author ?? null,
        document.filename ?? null,
        JSON.stringify(document.metadata),
      );
      deleteChunks.run(document.id);

      for (const chunk of chunks) {
        const result = insertChunk.run(
          chunk.id,
          document.id,
          chunk.index,
          chunk.text,
          chunk.tokenCount,
          chunk.charCount,
          chunk.oversized ? 1 : 0,
          JSON.stringify(chunk.metadata),
          serializeEmbedding(chunk.embedding),
        );
        written.push({
          chunk: {
            id: chunk.id,
            documentId: document.id,
            content: chunk.text,
            metadata: chunk.metadata,
            seq: Number(result.lastInsertRowid),
          },
          vector: chunk.embedding,
        });
      }
    });

    try {
      save();
    } catch (error) {
      throw new StorageError(`Failed to save document ${document.id}`, 'DB_WRITE_FAILED', error);
    }

    this.vectorStore?.removeDocument(document.id);
    this.vectorStore?.upsert(written);

    log.debug(`Saved ${written.length} chunks`, { documentId: document.id });
    return written.length;
  }

  getChunk(id: string): Chunk | null {
    const row = this.db.prepare<[string], ChunkRow>('SELECT * FROM chunks WHERE id = ?').get(id);
    return row ? toChunk(row) : null;
  }

  /**
   * Chunks of a document in index order.
   */
  getChunksByDocument(documentId: string): Chunk[] {
    return this.db
      .prepare<[string], ChunkRow>('SELECT * FROM chunks WHERE document_id = ? ORDER BY chunk_index')
      .all(documentId)
      .map(toChunk);
  }

  /**
   * Delete a document and its chunks.
   */
  deleteDocument(id: string): boolean {
    const result = this.db.prepare('DELETE FROM documents WHERE id = ?').run(id);
    this.vectorStore?.removeDocument(id);
    return result.changes > 0;
  }

  getChunkCount(): number {
    return this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM chunks').get()?.count ?? 0;
  }
}
