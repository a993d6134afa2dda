/**
 * Directory ingestion with progress tracking.
 *
 * Files are ingested one at a time in sorted path order; embedding inside a
 * document is already parallel. A file that fails to load or ingest is
 * recorded and skipped.
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { isSupportedFile, loadDocument } from './document-loader.js';
import { ingestDocument, type IngestDeps, type IngestResult } from './ingest-document.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('batch-ingest');

/**
 * Progress information passed to callback.
 */
export interface BatchProgress {
  /** Files completed so far */
  done: number;
  /** Total files to process */
  total: number;
  /** Current file path (empty after completion) */
  current: string;
  /** Running total of chunks stored */
  totalChunks: number;
  /** Running total of files successfully ingested */
  successCount: number;
}

export interface BatchIngestOptions {
  /** Progress callback (called after each file completes). */
  progressCallback?: (progress: BatchProgress) => void;
}

export interface BatchIngestResult {
  totalFiles: number;
  successCount: number;
  errorCount: number;
  /** Chunks stored across all files */
  totalChunks: number;
  /** Chunks dropped after embedding failures */
  failedChunks: number;
  durationMs: number;
  results: IngestResult[];
  errors: Array<{ path: string; error: string }>;
}

/**
 * Supported files under `dir`, sorted. Hidden directories and
 * node_modules are skipped.
 */
export async function discoverDocuments(dir: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(currentDir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(currentDir, { withFileTypes: true });
    } catch (err) {
      log.debug(`Skipping inaccessible directory: ${currentDir}`, { error: errorMessage(err) });
      return;
    }

    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);

      if (entry.isDirectory()) {
        if (entry.name.startsWith('.') || entry.name === 'node_modules') {
          continue;
        }
        await walk(fullPath);
      } else if (entry.isFile() && isSupportedFile(entry.name)) {
        files.push(fullPath);
      }
    }
  }

  await walk(dir);
  return files.sort();
}

/**
 * Ingest the given files.
 */
export async function batchIngest(
  paths: string[],
  deps: IngestDeps,
  options: BatchIngestOptions = {},
): Promise<BatchIngestResult> {
  const startTime = Date.now();
  const results: IngestResult[] = [];
  const errors: Array<{ path: string; error: string }> = [];
  let totalChunks = 0;
  let failedChunks = 0;

  for (let i = 0; i < paths.length; i++) {
    const path = paths[i];
    try {
      const document = await loadDocument(path);
      const result = await ingestDocument(document, deps);
      results.push(result);
      totalChunks += result.storedChunks;
      failedChunks += result.failedChunks;
    } catch (err) {
      const message = errorMessage(err);
      log.warn(`Skipping ${path}`, { error: message });
      errors.push({ path, error: message });
    }

    options.progressCallback?.({
      done: i + 1,
      total: paths.length,
      current: i + 1 < paths.length ? paths[i + 1] : '',
      totalChunks,
      successCount: results.length,
    });
  }

  const durationMs = Date.now() - startTime;
  log.info(`Ingested ${results.length}/${paths.length} files`, { totalChunks, errors: errors.length, durationMs });

  return {
    totalFiles: paths.length,
    successCount: results.length,
    errorCount: errors.length,
    totalChunks,
    failedChunks,
    durationMs,
    results,
    errors,
  };
}

/**
 * Discover and ingest every supported file under a directory.
 */
export async function ingestDirectory(
  dir: string,
  deps: IngestDeps,
  options: BatchIngestOptions = {},
): Promise<BatchIngestResult> {
  const paths = await discoverDocuments(dir);
  log.info(`Found ${paths.length} documents in ${dir}`);
  return batchIngest(paths, deps, options);
}
