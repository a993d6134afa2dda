/**
 * Retrieval-side types and collaborator interfaces.
 */

import type { Metadata, MetadataValue } from '../ingest/types.js';
import type { ConversationTurn } from '../memory/types.js';

/** Equality predicates over chunk metadata. All must hold. */
export type MetadataFilters = Record<string, MetadataValue>;

/**
 * The stored view of a chunk seen by retrieval.
 */
export interface CandidateChunk {
  id: string;
  documentId: string;
  content: string;
  metadata: Metadata;
  /** Insertion order in the store. */
  seq: number;
}

/**
 * One row of a ranked candidate query.
 */
export interface CandidateHit {
  chunk: CandidateChunk;
  score: number;
}

/**
 * Nearest neighbours by vector similarity, best first.
 * Scores are similarities in [0, 1].
 */
export interface VectorIndex {
  searchByVector(vector: number[], limit: number, filters?: MetadataFilters): Promise<CandidateHit[]>;
}

/**
 * Chunks matching a text query, best first. Scores are >= 0, higher is better.
 */
export interface LexicalIndex {
  searchByText(query: string, limit: number, filters?: MetadataFilters): Promise<CandidateHit[]>;
}

/**
 * A chunk after fusion of the vector and lexical candidate sets.
 */
export interface RetrievalCandidate {
  chunk: CandidateChunk;
  /** 0 when absent from the vector set. */
  vectorScore: number;
  /** 0 when absent from the lexical set. */
  lexicalScore: number;
  combinedScore: number;
  inVectorSet: boolean;
  inLexicalSet: boolean;
}

/**
 * A candidate after reranking.
 */
export interface RankedPassage extends RetrievalCandidate {
  /** Relevance in [0, 1]. */
  rerankScore: number;
  /** The scorer failed and the neutral score was used. */
  rerankFailed: boolean;
}

export interface ScoreOptions {
  signal?: AbortSignal;
}

/**
 * Secondary relevance signal used by the reranker.
 */
export interface RelevanceScorer {
  readonly name: string;
  /** Relevance of `text` to `query`. Values outside [0, 1] are clamped by the caller. */
  score(query: string, text: string, options?: ScoreOptions): Promise<number>;
}

export interface GenerationRequest {
  query: string;
  /** Numbered passages and history, rendered for a prompt. */
  context: string;
  history: ConversationTurn[];
  signal?: AbortSignal;
}

/**
 * Produces the answer text. Implemented outside this package.
 */
export interface GenerationProvider {
  generate(request: GenerationRequest): Promise<string>;
}
