/**
 * Sentence-boundary chunking with token-bounded overlap.
 *
 * Strategy:
 * 1. Split text into sentences on terminal punctuation followed by whitespace
 * 2. Pack sentences greedily while the chunk stays within `chunkSize` tokens
 * 3. On overflow, seed the next chunk with the trailing sentences of the
 *    previous one that fit within `overlap` tokens
 * 4. Sentences longer than `chunkSize` are split on whitespace, with no overlap
 */

import type { Chunk, ChunkMetadata, Document } from './types.js';
import type { Tokenizer } from '../utils/token-counter.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('chunker');

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

/** Lines searched for a markdown heading when labelling a chunk's section. */
const SECTION_SCAN_LINES = 5;

export interface ChunkerOptions {
  /** Maximum tokens per chunk. */
  chunkSize: number;
  /** Maximum tokens carried over from the previous chunk. */
  overlap: number;
  tokenizer: Tokenizer;
}

interface Piece {
  text: string;
  oversized: boolean;
}

/**
 * Split text into trimmed, non-empty sentences.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BOUNDARY)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * First markdown heading within the opening lines of a passage.
 */
export function detectSection(text: string): string | null {
  const lines = text.split('\n').slice(0, SECTION_SCAN_LINES);
  for (const raw of lines) {
    const line = raw.trim();
    if (line.startsWith('#')) {
      const heading = line.replace(/^#+/, '').trim();
      return heading || null;
    }
  }
  return null;
}

function validateOptions(options: ChunkerOptions): void {
  const { chunkSize, overlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`, 'INVALID_OPTIONS');
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError(`overlap must be a non-negative integer, got ${overlap}`, 'INVALID_OPTIONS');
  }
  if (overlap >= chunkSize) {
    throw new ValidationError(
      `overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`,
      'INVALID_OPTIONS',
    );
  }
}

/**
 * Splits text into size-bounded pieces. Measures joined text, since token
 * counts of separate parts do not add up exactly under BPE.
 */
class SentencePacker {
  private readonly pieces: Piece[] = [];

  constructor(private readonly options: ChunkerOptions) {}

  pack(sentences: string[]): Piece[] {
    let buffer: string[] = [];

    for (const sentence of sentences) {
      if (this.tokens([sentence]) > this.options.chunkSize) {
        this.flush(buffer);
        buffer = [];
        this.splitWords(sentence);
        continue;
      }

      const candidate = [...buffer, sentence];
      if (this.tokens(candidate) <= this.options.chunkSize) {
        buffer = candidate;
        continue;
      }

      this.flush(buffer);
      buffer = [...this.overlapSuffix(buffer, sentence), sentence];
    }

    this.flush(buffer);
    return this.pieces;
  }

  private tokens(parts: string[]): number {
    return this.options.tokenizer.count(parts.join(' '));
  }

  private flush(parts: string[], oversized = false): void {
    if (parts.length === 0) return;
    this.pieces.push({ text: parts.join(' '), oversized });
  }

  /**
   * Trailing sentences of `previous` within the overlap budget, minus the
   * oldest ones while they would push the next chunk past `chunkSize`.
   */
  private overlapSuffix(previous: string[], next: string): string[] {
    const { overlap, chunkSize } = this.options;
    if (overlap === 0) return [];

    let suffix: string[] = [];
    for (let i = previous.length - 1; i >= 0; i--) {
      const trial = previous.slice(i);
      if (this.tokens(trial) > overlap) break;
      suffix = trial;
    }

    while (suffix.length > 0 && this.tokens([...suffix, next]) > chunkSize) {
      suffix = suffix.slice(1);
    }
    return suffix;
  }

  private splitWords(sentence: string): void {
    const { chunkSize } = this.options;
    let buffer: string[] = [];

    for (const word of sentence.split(/\s+/).filter(Boolean)) {
      if (this.tokens([word]) > chunkSize) {
        this.flush(buffer);
        buffer = [];
        this.flush([word], true);
        continue;
      }

      const candidate = [...buffer, word];
      if (this.tokens(candidate) <= chunkSize) {
        buffer = candidate;
      } else {
        this.flush(buffer);
        buffer = [word];
      }
    }

    this.flush(buffer);
  }
}

/**
 * Chunk a document into overlapping passages.
 *
 * Deterministic: the same document and options always produce the same
 * chunks, with ids `<documentId>:<index>`.
 */
export function chunkDocument(document: Document, options: ChunkerOptions): Chunk[] {
  validateOptions(options);

  if (!document.text.trim()) {
    log.warn('Empty document, no chunks produced', { documentId: document.id });
    return [];
  }

  const pieces = new SentencePacker(options).pack(splitSentences(document.text));
  const totalChunks = pieces.length;

  const chunks = pieces.map((piece, index): Chunk => {
    const own: ChunkMetadata = {
      filename: document.filename ?? null,
      title: document.title ?? null,
      author: document.author ?? null,
      section: detectSection(piece.text),
      chunkIndex: index,
      totalChunks,
    };

    return {
      id: `${document.id}:${index}`,
      documentId: document.id,
      index,
      text: piece.text,
      tokenCount: options.tokenizer.count(piece.text),
      charCount: piece.text.length,
      oversized: piece.oversized,
      metadata: { ...document.metadata, ...own },
    };
  });

  const oversized = chunks.filter((c) => c.oversized).length;
  log.debug(`Chunked document into ${totalChunks} chunks`, {
    documentId: document.id,
    tokenizer: options.tokenizer.name,
    ...(oversized > 0 ? { oversized } : {}),
  });

  return chunks;
}
