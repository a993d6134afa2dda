/**
 * Document-level metadata enrichment.
 */

import type { Document, Metadata } from './types.js';

/**
 * Content statistics and indexing time for a document.
 * Existing keys on the document are kept.
 */
export function extractDocumentMetadata(document: Document, now: Date = new Date()): Metadata {
  const text = document.text;
  const stats: Metadata = {
    indexedAt: now.toISOString(),
    fileType: document.type,
  };

  if (text) {
    stats.contentLength = text.length;
    stats.wordCount = text.split(/\s+/).filter(Boolean).length;
    stats.lineCount = text.split(/\r?\n/).length;
  }

  return { ...stats, ...document.metadata };
}

/**
 * Copy of a document with enriched metadata.
 */
export function withExtractedMetadata(document: Document, now?: Date): Document {
  return { ...document, metadata: extractDocumentMetadata(document, now) };
}
