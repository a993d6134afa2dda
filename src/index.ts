/**
 * ragline
 *
 * Hybrid retrieval-augmented generation core: sentence-aware chunking,
 * batched embedding, vector + lexical fusion, reranking and token-bounded
 * conversation memory.
 *
 * @packageDocumentation
 */

export { createRagline } from './ragline.js';
export type { Ragline, RaglineOptions } from './ragline.js';

// Configuration
export * from './config/rag-config.js';
export { loadConfig, loadEnvConfig, toRuntimeConfig, validateConfig } from './config/loader.js';
export type { ExternalConfig, LoadConfigOptions, RawConfig } from './config/loader.js';

// Ingestion
export * from './ingest/types.js';
export { chunkDocument, splitSentences, detectSection } from './ingest/chunker.js';
export type { ChunkerOptions } from './ingest/chunker.js';
export { loadDocument, isSupportedFile, documentIdForPath } from './ingest/document-loader.js';
export { extractDocumentMetadata, withExtractedMetadata } from './ingest/metadata.js';
export { ingestDocument } from './ingest/ingest-document.js';
export type { IngestDeps, IngestResult } from './ingest/ingest-document.js';
export { batchIngest, discoverDocuments, ingestDirectory } from './ingest/batch-ingest.js';
export type { BatchIngestOptions, BatchIngestResult, BatchProgress } from './ingest/batch-ingest.js';

// Models
export { BatchEmbedder, filterEmbedded } from './models/embedder.js';
export type { BatchEmbedderOptions, BatchEmbedResult, BatchEmbedFailure, EmbedProgress } from './models/embedder.js';
export { AiSdkEmbeddingProvider, classifyProviderError } from './models/embedding-provider.js';
export type { EmbeddingProvider, EmbedCallOptions, OpenAICompatibleOptions } from './models/embedding-provider.js';
export { MODEL_REGISTRY, getModel, findModel, getAllModelIds } from './models/model-registry.js';
export type { ModelConfig } from './models/model-registry.js';

// Storage
export { openDatabase, applySchema, getSchemaVersion, getDbStats } from './storage/db.js';
export type { Db } from './storage/db.js';
export { SqliteChunkStore } from './storage/chunk-store.js';
export type { ChunkStore } from './storage/chunk-store.js';
export { VectorStore } from './storage/vector-store.js';
export { KeywordStore, sanitizeQuery } from './storage/keyword-store.js';
export { SqliteSessionStore } from './storage/session-store.js';

// Retrieval
export * from './retrieval/types.js';
export { fuseCandidates, compareCandidates } from './retrieval/fusion.js';
export type { FusionWeights } from './retrieval/fusion.js';
export { HybridRetriever } from './retrieval/hybrid-retriever.js';
export type { HybridSearchRequest } from './retrieval/hybrid-retriever.js';
export { Reranker, NEUTRAL_SCORE } from './retrieval/reranker.js';
export {
  AnthropicCompletion,
  LexicalOverlapScorer,
  LlmRelevanceScorer,
  createAnthropicScorer,
  parseRelevanceScore,
} from './retrieval/relevance-scorer.js';
export type { TextCompletion } from './retrieval/relevance-scorer.js';
export { assembleContext } from './retrieval/context-assembler.js';
export type { AssembledContext, AssembleOptions } from './retrieval/context-assembler.js';
export { extractCitations } from './retrieval/citations.js';
export { RagPipeline } from './retrieval/rag-pipeline.js';
export type { AskResult, QueryEmbedder, QueryOptions, RagPipelineDeps, RetrieveResult } from './retrieval/rag-pipeline.js';

// Memory
export * from './memory/types.js';
export { MemoryWindow, selectWindow } from './memory/memory-window.js';
export type { MemoryWindowOptions } from './memory/memory-window.js';

// Utilities
export * from './utils/errors.js';
export { createLogger, logger, setLogLevel, getLogLevel, setJsonMode, setLogSink } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { ApproximateTokenizer, Cl100kTokenizer, getDefaultTokenizer, approximateTokens } from './utils/token-counter.js';
export type { Tokenizer } from './utils/token-counter.js';
