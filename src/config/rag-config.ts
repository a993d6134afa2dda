/**
 * Runtime configuration for the ragline pipeline.
 *
 * Nothing here is read ambiently: each component receives the section it
 * needs through its constructor. `loadConfig()` builds a `RagConfig` from
 * files and environment; tests and embedders construct one directly.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export interface ChunkingConfig {
  /** Maximum tokens per chunk. */
  chunkSize: number;
  /** Maximum tokens carried from the end of one chunk into the next. */
  overlap: number;
}

export interface EmbeddingConfig {
  /** Base URL of an OpenAI-compatible embeddings endpoint (Ollama by default). */
  baseUrl: string;
  /** Model key in the model registry, or a raw provider model id. */
  model: string;
  /** Expected vector dimension. Vectors of any other size are rejected. */
  dimensions: number;
  /** Texts per ingestion batch. */
  batchSize: number;
  /** Concurrent provider calls within a batch. */
  concurrency: number;
  /** Retries after the first attempt for transient failures. */
  maxRetries: number;
  /** Delay before the first retry; doubles on each further retry. */
  baseDelayMs: number;
  /** Upper bound on a single backoff delay. */
  maxDelayMs: number;
  /** Per-call timeout. */
  timeoutMs: number;
  /** Report progress every N completed items. */
  progressEvery: number;
}

export interface RetrievalConfig {
  /** Candidates returned by hybrid search. */
  topK: number;
  /** Weight applied to vector similarity in fusion. */
  vectorWeight: number;
  /** Weight applied to lexical rank score in fusion. */
  lexicalWeight: number;
  /** Per-call timeout for each candidate query. */
  timeoutMs: number;
}

export interface RerankConfig {
  /** Passages kept after reranking. */
  topK: number;
  /** Passages handed to context assembly. */
  finalTopK: number;
  /** Model used by the LLM relevance scorer. */
  model: string;
  /** Per-call timeout for each relevance judgement. */
  timeoutMs: number;
  /** Concurrent relevance judgements. */
  concurrency: number;
}

export interface MemoryConfig {
  /** Most turns a window may hold. */
  maxMessages: number;
  /** Most tokens a window may hold. */
  maxTokens: number;
}

export interface ContextConfig {
  /** Token budget for retrieved passages in the assembled context. */
  maxTokens: number;
}

export interface GenerationConfig {
  /** Per-call timeout for the generation collaborator. */
  timeoutMs: number;
}

export interface StorageConfig {
  /** Path to the SQLite database file. `:memory:` is accepted. */
  dbPath: string;
}

/**
 * Complete pipeline configuration.
 */
export interface RagConfig {
  chunking: ChunkingConfig;
  embedding: EmbeddingConfig;
  retrieval: RetrievalConfig;
  rerank: RerankConfig;
  memory: MemoryConfig;
  context: ContextConfig;
  generation: GenerationConfig;
  storage: StorageConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RagConfig = {
  chunking: {
    chunkSize: 512,
    overlap: 50,
  },
  embedding: {
    baseUrl: 'http://localhost:11434/v1',
    model: 'nomic-embed-text',
    dimensions: 768,
    batchSize: 50,
    concurrency: 4,
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 10_000,
    timeoutMs: 30_000,
    progressEvery: 10,
  },
  retrieval: {
    topK: 20,
    vectorWeight: 0.6,
    lexicalWeight: 0.4,
    timeoutMs: 10_000,
  },
  rerank: {
    topK: 5,
    finalTopK: 3,
    model: 'claude-3-5-haiku-latest',
    timeoutMs: 20_000,
    concurrency: 4,
  },
  memory: {
    maxMessages: 10,
    maxTokens: 4096,
  },
  context: {
    maxTokens: 3000,
  },
  generation: {
    timeoutMs: 120_000,
  },
  storage: {
    dbPath: '~/.ragline/ragline.db',
  },
};

/**
 * Expand a leading `~` to the user's home directory.
 */
export function resolvePath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}
