/**
 * FTS5-backed keyword search for chunks.
 *
 * BM25-ranked full-text search using SQLite FTS5 with porter stemming.
 * English stopwords are dropped and the remaining terms must all match.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Db } from './db.js';
import { buildFilterClause } from './metadata-filter.js';
import { toCandidateChunk, type ChunkRow } from './types.js';
import type { CandidateHit, LexicalIndex, MetadataFilters } from '../retrieval/types.js';
import { StorageError, isValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('keyword-store');

const moduleDir = dirname(fileURLToPath(import.meta.url));

let stopwords: Set<string> | null = null;

function getStopwords(): Set<string> {
  if (!stopwords) {
    const words: unknown = JSON.parse(readFileSync(join(moduleDir, 'stopwords.json'), 'utf-8'));
    stopwords = new Set(Array.isArray(words) ? words.filter((w): w is string => typeof w === 'string') : []);
  }
  return stopwords;
}

type KeywordRow = Pick<ChunkRow, 'seq' | 'id' | 'document_id' | 'content' | 'metadata'> & { rank: number };

/**
 * Turn free text into an FTS5 MATCH expression.
 * Each surviving term is quoted, so FTS5 operators in the input are inert.
 * Returns '' when no searchable term is left.
 */
export function sanitizeQuery(query: string): string {
  if (!query || !query.trim()) return '';

  const sanitized = query
    // Remove boolean operators (AND, OR, NOT as full words)
    .replace(/\b(AND|OR|NOT|NEAR)\b/g, ' ')
    // Characters with meaning in FTS5 syntax, plus punctuation
    .replace(/[*"(){}^~\-:+.,;!?'`[\]\\/]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (!sanitized) return '';

  const stop = getStopwords();
  const terms = sanitized.split(' ').filter((t) => t && !stop.has(t.toLowerCase()));

  return terms.map((t) => `"${t}"`).join(' ');
}

export class KeywordStore implements LexicalIndex {
  constructor(private readonly db: Db) {}

  /**
   * Full-text search with BM25 ranking. Scores are `-bm25`, so higher is better.
   * Equal ranks keep insertion order.
   */
  async searchByText(query: string, limit: number, filters?: MetadataFilters): Promise<CandidateHit[]> {
    const match = sanitizeQuery(query);
    if (!match) {
      log.debug('No searchable terms in query');
      return [];
    }

    const filter = buildFilterClause(filters, 'c.metadata');
    const where = filter.sql ? `AND ${filter.sql}` : '';

    let rows: KeywordRow[];
    try {
      rows = this.db
        .prepare<Array<string | number>, KeywordRow>(
          `
          SELECT c.seq, c.id, c.document_id, c.content, c.metadata, bm25(chunks_fts) AS rank
          FROM chunks_fts
          JOIN chunks c ON c.seq = chunks_fts.rowid
          WHERE chunks_fts MATCH ? ${where}
          ORDER BY rank, c.seq
          LIMIT ?
        `,
        )
        .all(match, ...filter.params, limit);
    } catch (error) {
      if (isValidationError(error)) throw error;
      throw new StorageError('Keyword search failed', 'DB_QUERY_FAILED', error);
    }

    return rows.map((row) => ({
      chunk: toCandidateChunk(row),
      score: Math.max(0, -row.rank),
    }));
  }
}
