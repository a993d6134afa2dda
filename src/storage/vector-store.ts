/**
 * In-memory vector index over chunk embeddings stored in SQLite.
 *
 * Embeddings live as Float32 blobs on the `chunks` table and are loaded into
 * memory on first search for brute-force cosine ranking. The chunk store
 * keeps the index in step with writes.
 *
 * ## Performance Notes
 *
 * - Initial load: O(n) to deserialize all vectors from SQLite
 * - Search: O(n) brute-force (sufficient for <100k vectors)
 * - Memory: ~3KB per vector (768 dimensions × 4 bytes)
 *
 * @module storage/vector-store
 */

import type { Db } from './db.js';
import { matchesFilters, validateFilters } from './metadata-filter.js';
import { toCandidateChunk, type ChunkRow } from './types.js';
import type { CandidateChunk, CandidateHit, MetadataFilters, VectorIndex } from '../retrieval/types.js';
import { similarityScore } from '../utils/vector-similarity.js';
import { deserializeEmbedding } from '../utils/embedding-utils.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('vector-store');

interface IndexedVector {
  chunk: CandidateChunk;
  vector: number[];
}

export class VectorStore implements VectorIndex {
  private entries = new Map<string, IndexedVector>();
  private loaded = false;

  constructor(private readonly db: Db) {}

  /**
   * Load every stored embedding into memory. Runs once.
   */
  load(): void {
    if (this.loaded) return;

    let rows: ChunkRow[];
    try {
      rows = this.db
        .prepare<[], ChunkRow>('SELECT * FROM chunks WHERE embedding IS NOT NULL ORDER BY seq')
        .all();
    } catch (error) {
      throw new StorageError('Failed to load embeddings', 'DB_QUERY_FAILED', error);
    }

    for (const row of rows) {
      if (row.embedding) {
        this.entries.set(row.id, { chunk: toCandidateChunk(row), vector: deserializeEmbedding(row.embedding) });
      }
    }

    this.loaded = true;
    log.debug(`Loaded ${this.entries.size} vectors`);
  }

  /**
   * Add or replace entries. Ignored until the index has loaded, since the
   * load reads them from the table.
   */
  upsert(items: Array<{ chunk: CandidateChunk; vector: number[] }>): void {
    if (!this.loaded) return;
    for (const item of items) {
      this.entries.set(item.chunk.id, { chunk: item.chunk, vector: item.vector });
    }
  }

  /**
   * Drop every entry of a document.
   */
  removeDocument(documentId: string): void {
    for (const [id, entry] of this.entries) {
      if (entry.chunk.documentId === documentId) {
        this.entries.delete(id);
      }
    }
  }

  /**
   * Nearest neighbours by cosine similarity clamped to [0, 1].
   * Equal scores keep insertion order.
   *
   * @throws StorageError `DIMENSION_MISMATCH` when a stored vector has a different length
   */
  async searchByVector(vector: number[], limit: number, filters?: MetadataFilters): Promise<CandidateHit[]> {
    if (filters) validateFilters(filters);
    this.load();

    const hits: CandidateHit[] = [];
    for (const entry of this.entries.values()) {
      if (!matchesFilters(entry.chunk.metadata, filters)) continue;
      if (entry.vector.length !== vector.length) {
        throw new StorageError(
          `Stored vector for ${entry.chunk.id} has ${entry.vector.length} dimensions, query has ${vector.length}`,
          'DIMENSION_MISMATCH',
        );
      }
      hits.push({ chunk: entry.chunk, score: similarityScore(vector, entry.vector) });
    }

    hits.sort((a, b) => b.score - a.score || a.chunk.seq - b.chunk.seq);
    return hits.slice(0, limit);
  }

  count(): number {
    this.load();
    return this.entries.size;
  }
}
