/**
 * Single-document ingestion: chunk → embed → persist.
 *
 * Chunks whose embedding failed are left out; they are counted in
 * `failedChunks` and the rest of the document is still stored. When no chunk
 * embeds, nothing is written and chunks from an earlier ingest stay in place.
 */

import { chunkDocument } from './chunker.js';
import { withExtractedMetadata } from './metadata.js';
import type { Document, EmbeddedChunk } from './types.js';
import type { BatchEmbedder } from '../models/embedder.js';
import { filterEmbedded } from '../models/embedder.js';
import type { ChunkStore } from '../storage/chunk-store.js';
import type { ChunkingConfig } from '../config/rag-config.js';
import type { Tokenizer } from '../utils/token-counter.js';
import { TransientError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ingest-document');

export interface IngestDeps {
  embedder: BatchEmbedder;
  store: ChunkStore;
  tokenizer: Tokenizer;
  chunking: ChunkingConfig;
  /** Texts per embedding batch. */
  batchSize: number;
}

export interface IngestResult {
  documentId: string;
  totalChunks: number;
  storedChunks: number;
  failedChunks: number;
  durationMs: number;
}

/**
 * Ingest one document. Re-ingesting a document replaces its stored chunks.
 *
 * @throws TransientError `EMBEDDING_FAILED` when the document has chunks and none of them embedded
 */
export async function ingestDocument(source: Document, deps: IngestDeps): Promise<IngestResult> {
  const start = Date.now();
  const document = withExtractedMetadata(source);

  const chunks = chunkDocument(document, {
    chunkSize: deps.chunking.chunkSize,
    overlap: deps.chunking.overlap,
    tokenizer: deps.tokenizer,
  });

  let failedChunks = 0;
  const embedded: EmbeddedChunk[] = [];
  for (let i = 0; i < chunks.length; i += deps.batchSize) {
    const batch = chunks.slice(i, i + deps.batchSize);
    const result = await deps.embedder.embedBatch(batch.map((c) => c.text));
    failedChunks += result.failed;
    embedded.push(...filterEmbedded(batch, result));
  }

  if (chunks.length > 0 && embedded.length === 0) {
    log.error('Every chunk failed to embed; keeping stored chunks', {
      documentId: document.id,
      failedChunks,
    });
    throw new TransientError(
      `All ${chunks.length} chunks failed to embed for ${document.id}`,
      'EMBEDDING_FAILED',
    );
  }

  const storedChunks = await deps.store.saveDocument(document, embedded);

  const ingestResult: IngestResult = {
    documentId: document.id,
    totalChunks: chunks.length,
    storedChunks,
    failedChunks,
    durationMs: Date.now() - start,
  };

  if (failedChunks > 0) {
    log.warn(`Stored ${storedChunks}/${chunks.length} chunks`, { documentId: document.id, failedChunks });
  } else {
    log.info(`Ingested ${document.filename ?? document.id}`, { chunks: storedChunks });
  }

  return ingestResult;
}
