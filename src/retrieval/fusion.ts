/**
 * Weighted score fusion of vector and lexical candidate sets.
 *
 *   combined(chunk) = vectorScore × vectorWeight + lexicalScore × lexicalWeight
 *
 * Full outer join on chunk id: a chunk found by only one search gets 0 for
 * the other side.
 */

import type { CandidateHit, RetrievalCandidate } from './types.js';

export interface FusionWeights {
  vectorWeight: number;
  lexicalWeight: number;
}

/**
 * Ordering of fused candidates: combined score, then vector score, both
 * descending, then insertion order ascending.
 */
export function compareCandidates(a: RetrievalCandidate, b: RetrievalCandidate): number {
  return (
    b.combinedScore - a.combinedScore ||
    b.vectorScore - a.vectorScore ||
    a.chunk.seq - b.chunk.seq
  );
}

/**
 * Fuse two candidate sets into one list ordered by `compareCandidates`.
 * Not truncated.
 */
export function fuseCandidates(
  vectorHits: CandidateHit[],
  lexicalHits: CandidateHit[],
  weights: FusionWeights,
): RetrievalCandidate[] {
  const byId = new Map<string, RetrievalCandidate>();

  for (const hit of vectorHits) {
    byId.set(hit.chunk.id, {
      chunk: hit.chunk,
      vectorScore: hit.score,
      lexicalScore: 0,
      combinedScore: 0,
      inVectorSet: true,
      inLexicalSet: false,
    });
  }

  for (const hit of lexicalHits) {
    const existing = byId.get(hit.chunk.id);
    if (existing) {
      existing.lexicalScore = hit.score;
      existing.inLexicalSet = true;
    } else {
      byId.set(hit.chunk.id, {
        chunk: hit.chunk,
        vectorScore: 0,
        lexicalScore: hit.score,
        combinedScore: 0,
        inVectorSet: false,
        inLexicalSet: true,
      });
    }
  }

  const fused = [...byId.values()];
  for (const candidate of fused) {
    candidate.combinedScore =
      candidate.vectorScore * weights.vectorWeight + candidate.lexicalScore * weights.lexicalWeight;
  }

  return fused.sort(compareCandidates);
}
