/**
 * Second-stage reranking of fused candidates.
 *
 * Only the first 2 × topK candidates are scored. A scoring failure (error or
 * timeout) gives the candidate the neutral score 0.5 instead of failing the
 * query. Sorting is stable, so equal scores keep their fused order.
 */

import pLimit from 'p-limit';
import { clampScore } from './relevance-scorer.js';
import type { RankedPassage, RelevanceScorer, RetrievalCandidate } from './types.js';
import type { RerankConfig } from '../config/rag-config.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

const log = createLogger('reranker');

export const NEUTRAL_SCORE = 0.5;

export class Reranker {
  constructor(
    private readonly scorer: RelevanceScorer,
    private readonly config: Pick<RerankConfig, 'topK' | 'timeoutMs' | 'concurrency'>,
  ) {}

  /**
   * @param candidates - Fused candidates, best first
   * @returns At most `topK` passages, best rerank score first
   */
  async rerank(
    query: string,
    candidates: RetrievalCandidate[],
    topK: number = this.config.topK,
  ): Promise<RankedPassage[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`, 'INVALID_OPTIONS');
    }

    const pool = candidates.slice(0, topK * 2);
    const limit = pLimit(this.config.concurrency);
    let failures = 0;

    const scored = await Promise.all(
      pool.map((candidate) =>
        limit(async (): Promise<RankedPassage> => {
          try {
            const score = await withTimeout(
              (signal) => this.scorer.score(query, candidate.chunk.content, { signal }),
              this.config.timeoutMs,
              'Relevance scoring',
            );
            return { ...candidate, rerankScore: clampScore(score), rerankFailed: false };
          } catch (error) {
            failures++;
            log.warn('Relevance scoring failed, using neutral score', {
              chunkId: candidate.chunk.id,
              scorer: this.scorer.name,
              error: errorMessage(error),
            });
            return { ...candidate, rerankScore: NEUTRAL_SCORE, rerankFailed: true };
          }
        }),
      ),
    );

    // Array.prototype.sort is stable
    scored.sort((a, b) => b.rerankScore - a.rerankScore);

    log.debug(`Reranked ${pool.length} candidates`, { kept: Math.min(topK, scored.length), failures });
    return scored.slice(0, topK);
  }
}
