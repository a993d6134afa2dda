/**
 * Hybrid candidate search: vector similarity and lexical relevance, fused.
 *
 * Each side fetches up to 2 × topK candidates so fusion has headroom; the
 * fused list is cut to topK. Any failure of either search aborts the query
 * with a single RetrievalError.
 */

import { fuseCandidates } from './fusion.js';
import type {
  CandidateHit,
  LexicalIndex,
  MetadataFilters,
  RetrievalCandidate,
  VectorIndex,
} from './types.js';
import type { RetrievalConfig } from '../config/rag-config.js';
import { RetrievalError, ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

const log = createLogger('hybrid-retriever');

export interface HybridSearchRequest {
  queryVector: number[];
  queryText: string;
  topK?: number;
  vectorWeight?: number;
  lexicalWeight?: number;
  filters?: MetadataFilters;
}

export class HybridRetriever {
  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly lexicalIndex: LexicalIndex,
    private readonly config: RetrievalConfig,
  ) {}

  /**
   * Ranked candidates, highest combined score first, at most `topK`.
   *
   * @throws ValidationError for bad request parameters
   * @throws RetrievalError when either candidate search fails
   */
  async search(request: HybridSearchRequest): Promise<RetrievalCandidate[]> {
    const topK = request.topK ?? this.config.topK;
    const vectorWeight = request.vectorWeight ?? this.config.vectorWeight;
    const lexicalWeight = request.lexicalWeight ?? this.config.lexicalWeight;

    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`, 'INVALID_OPTIONS');
    }
    if (!(vectorWeight >= 0) || !(lexicalWeight >= 0)) {
      throw new ValidationError('Fusion weights must be >= 0', 'INVALID_OPTIONS');
    }
    if (request.queryVector.length === 0) {
      throw new ValidationError('Query vector is empty', 'EMPTY_QUERY');
    }

    const limit = topK * 2;
    const { timeoutMs } = this.config;
    const start = Date.now();

    let vectorHits: CandidateHit[];
    let lexicalHits: CandidateHit[];
    try {
      [vectorHits, lexicalHits] = await Promise.all([
        withTimeout(
          () => this.vectorIndex.searchByVector(request.queryVector, limit, request.filters),
          timeoutMs,
          'Vector search',
        ),
        withTimeout(
          () => this.lexicalIndex.searchByText(request.queryText, limit, request.filters),
          timeoutMs,
          'Lexical search',
        ),
      ]);
    } catch (error) {
      if (error instanceof ValidationError) throw error;
      throw new RetrievalError(
        `Candidate search failed: ${errorMessage(error)}`,
        'CANDIDATE_SEARCH_FAILED',
        error,
      );
    }

    const fused = fuseCandidates(vectorHits, lexicalHits, { vectorWeight, lexicalWeight }).slice(0, topK);

    log.debug('Hybrid search complete', {
      vector: vectorHits.length,
      lexical: lexicalHits.length,
      returned: fused.length,
      ms: Date.now() - start,
    });

    return fused;
  }
}
