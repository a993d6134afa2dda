/**
 * Shared fakes for tests that must not reach a model or the network.
 */

import type { EmbeddingProvider } from '../src/models/embedding-provider.js';
import type { BatchEmbedderOptions } from '../src/models/embedder.js';
import type { Chunk, Document } from '../src/ingest/types.js';
import type { Tokenizer } from '../src/utils/token-counter.js';

/**
 * Counts whitespace-separated words. Keeps expected sizes easy to trace.
 */
export const wordTokenizer: Tokenizer = {
  name: 'words',
  count: (text) => text.split(/\s+/).filter(Boolean).length,
};

/**
 * Embedding provider driven by a function. Records every input.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly vectorFor: (text: string) => number[] | Promise<number[]>,
    readonly modelId = 'fake-embed',
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.vectorFor(text);
  }
}

/**
 * Bag-of-words vector over a fixed vocabulary. Texts sharing words point the
 * same way, which is enough to drive similarity search in tests.
 */
export function bagOfWords(vocabulary: string[]): (text: string) => number[] {
  return (text) => {
    const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
    return vocabulary.map((term) => words.filter((w) => w === term).length);
  };
}

/** Embedder options with no real waiting. */
export function fastEmbedderOptions(overrides: Partial<BatchEmbedderOptions> = {}): BatchEmbedderOptions {
  return {
    dimensions: 3,
    maxRetries: 3,
    baseDelayMs: 1,
    maxDelayMs: 5,
    timeoutMs: 1000,
    concurrency: 2,
    progressEvery: 1,
    ...overrides,
  };
}

export function makeDocument(overrides: Partial<Document> = {}): Document {
  return {
    id: 'doc-1',
    text: 'Retrieval augmented generation grounds answers in documents.',
    type: 'txt',
    title: 'Guide',
    filename: 'guide.txt',
    metadata: {},
    ...overrides,
  };
}

export function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  const documentId = overrides.documentId ?? 'doc-1';
  const index = overrides.index ?? 0;
  const text = overrides.text ?? 'Sample chunk text.';
  return {
    id: `${documentId}:${index}`,
    documentId,
    index,
    text,
    tokenCount: wordTokenizer.count(text),
    charCount: text.length,
    oversized: false,
    metadata: {
      filename: 'guide.txt',
      title: 'Guide',
      author: null,
      section: null,
      chunkIndex: index,
      totalChunks: 1,
    },
    ...overrides,
  };
}
