/**
 * Composition root: wires storage, embedding, retrieval and memory from one
 * `RagConfig`.
 */

import type { RagConfig } from './config/rag-config.js';
import { DEFAULT_CONFIG } from './config/rag-config.js';
import { batchIngest, ingestDirectory, type BatchIngestOptions, type BatchIngestResult } from './ingest/batch-ingest.js';
import { loadDocument } from './ingest/document-loader.js';
import { ingestDocument, type IngestDeps, type IngestResult } from './ingest/ingest-document.js';
import { MemoryWindow } from './memory/memory-window.js';
import { BatchEmbedder, type EmbedProgress } from './models/embedder.js';
import { AiSdkEmbeddingProvider, type EmbeddingProvider } from './models/embedding-provider.js';
import { HybridRetriever } from './retrieval/hybrid-retriever.js';
import { RagPipeline } from './retrieval/rag-pipeline.js';
import { LexicalOverlapScorer, createAnthropicScorer } from './retrieval/relevance-scorer.js';
import { Reranker } from './retrieval/reranker.js';
import type { GenerationProvider, RelevanceScorer } from './retrieval/types.js';
import { SqliteChunkStore } from './storage/chunk-store.js';
import { openDatabase, type Db } from './storage/db.js';
import { KeywordStore } from './storage/keyword-store.js';
import { SqliteSessionStore } from './storage/session-store.js';
import { VectorStore } from './storage/vector-store.js';
import { createLogger } from './utils/logger.js';
import { getDefaultTokenizer, type Tokenizer } from './utils/token-counter.js';

const log = createLogger('ragline');

export interface RaglineOptions {
  generator: GenerationProvider;
  config?: RagConfig;
  /** Defaults to the OpenAI-compatible endpoint in `config.embedding`. */
  embeddingProvider?: EmbeddingProvider;
  /** Defaults to the Anthropic scorer when ANTHROPIC_API_KEY is set, else lexical overlap. */
  scorer?: RelevanceScorer;
  tokenizer?: Tokenizer;
  /** Use an open database instead of `config.storage.dbPath`. */
  db?: Db;
  onEmbedProgress?: (progress: EmbedProgress) => void;
}

export interface Ragline {
  readonly config: RagConfig;
  readonly db: Db;
  readonly pipeline: RagPipeline;
  readonly memory: MemoryWindow;
  readonly chunks: SqliteChunkStore;
  ingestFile(path: string): Promise<IngestResult>;
  ingestFiles(paths: string[], options?: BatchIngestOptions): Promise<BatchIngestResult>;
  ingestDirectory(dir: string, options?: BatchIngestOptions): Promise<BatchIngestResult>;
  close(): void;
}

function defaultScorer(config: RagConfig): RelevanceScorer {
  if (process.env.ANTHROPIC_API_KEY) {
    return createAnthropicScorer(config.rerank);
  }
  log.info('ANTHROPIC_API_KEY not set, reranking by lexical overlap');
  return new LexicalOverlapScorer();
}

export function createRagline(options: RaglineOptions): Ragline {
  const config = options.config ?? DEFAULT_CONFIG;
  const tokenizer = options.tokenizer ?? getDefaultTokenizer();
  const db = options.db ?? openDatabase(config.storage.dbPath);

  const vectorStore = new VectorStore(db);
  const chunks = new SqliteChunkStore(db, vectorStore);
  const keywordStore = new KeywordStore(db);

  const provider =
    options.embeddingProvider ??
    AiSdkEmbeddingProvider.forOpenAICompatible({ baseUrl: config.embedding.baseUrl, model: config.embedding.model });
  const embedder = BatchEmbedder.fromConfig(provider, config.embedding, options.onEmbedProgress);

  const memory = new MemoryWindow(new SqliteSessionStore(db), { ...config.memory, tokenizer });

  const pipeline = new RagPipeline({
    embedder,
    retriever: new HybridRetriever(vectorStore, keywordStore, config.retrieval),
    reranker: new Reranker(options.scorer ?? defaultScorer(config), config.rerank),
    memory,
    generator: options.generator,
    tokenizer,
    config,
  });

  const ingestDeps: IngestDeps = {
    embedder,
    store: chunks,
    tokenizer,
    chunking: config.chunking,
    batchSize: config.embedding.batchSize,
  };

  return {
    config,
    db,
    pipeline,
    memory,
    chunks,
    ingestFile: async (path) => ingestDocument(await loadDocument(path), ingestDeps),
    ingestFiles: (paths, batchOptions) => batchIngest(paths, ingestDeps, batchOptions),
    ingestDirectory: (dir, batchOptions) => ingestDirectory(dir, ingestDeps, batchOptions),
    close: () => {
      if (!options.db) db.close();
    },
  };
}
