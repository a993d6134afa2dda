/**
 * Tests for directory discovery and batch ingestion.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
  batchIngest,
  discoverDocuments,
  ingestDirectory,
  type BatchProgress,
} from '../../src/ingest/batch-ingest.js';
import type { IngestDeps } from '../../src/ingest/ingest-document.js';
import { BatchEmbedder } from '../../src/models/embedder.js';
import { SqliteChunkStore } from '../../src/storage/chunk-store.js';
import type { Db } from '../../src/storage/db.js';
import { FakeEmbeddingProvider, fastEmbedderOptions, wordTokenizer } from '../fixtures.js';
import { createTestDb } from '../storage/test-utils.js';

describe('batch-ingest', () => {
  let dir: string;
  let db: Db;
  let store: SqliteChunkStore;
  let deps: IngestDeps;

  function write(relative: string, content: string): string {
    const path = join(dir, relative);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ragline-batch-'));
    db = createTestDb();
    store = new SqliteChunkStore(db);
    deps = {
      embedder: new BatchEmbedder(new FakeEmbeddingProvider(() => [0, 1, 0]), fastEmbedderOptions()),
      store,
      tokenizer: wordTokenizer,
      chunking: { chunkSize: 512, overlap: 0 },
      batchSize: 10,
    };
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('discoverDocuments', () => {
    it('finds supported files, sorted, skipping hidden dirs and node_modules', async () => {
      const a = write('a.md', '# A');
      const b = write('b.txt', 'B');
      const c = write('sub/c.md', 'C');
      write('.hidden/d.md', 'D');
      write('node_modules/pkg/e.md', 'E');
      write('f.tiff', 'F');

      expect(await discoverDocuments(dir)).toEqual([a, b, c]);
    });

    it('returns nothing for a missing directory', async () => {
      expect(await discoverDocuments(join(dir, 'nope'))).toEqual([]);
    });
  });

  describe('batchIngest', () => {
    it('records failures and keeps going', async () => {
      const a = write('a.md', '# A\nAlpha one. Alpha two.');
      const missing = join(dir, 'missing.md');
      const b = write('b.txt', 'Beta only.');
      const progress: BatchProgress[] = [];

      const result = await batchIngest([a, missing, b], deps, {
        progressCallback: (p) => progress.push(p),
      });

      expect(result).toMatchObject({
        totalFiles: 3,
        successCount: 2,
        errorCount: 1,
        totalChunks: 2,
        failedChunks: 0,
      });
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.path).toBe(missing);
      expect(result.errors[0]?.error).toMatch(/ENOENT/);

      expect(progress).toEqual([
        { done: 1, total: 3, current: missing, totalChunks: 1, successCount: 1 },
        { done: 2, total: 3, current: b, totalChunks: 1, successCount: 1 },
        { done: 3, total: 3, current: '', totalChunks: 2, successCount: 2 },
      ]);
    });

    it('handles an empty list', async () => {
      const result = await batchIngest([], deps);

      expect(result).toMatchObject({ totalFiles: 0, successCount: 0, errorCount: 0, totalChunks: 0 });
    });
  });

  describe('ingestDirectory', () => {
    it('ingests every discovered file', async () => {
      write('one.md', '# One\nFirst file.');
      write('nested/two.txt', 'Second file. With two sentences.');

      const result = await ingestDirectory(dir, deps);

      expect(result.successCount).toBe(2);
      expect(store.getChunkCount()).toBe(2);
    });
  });
});
