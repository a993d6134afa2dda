import { describe, it, expect } from 'vitest';
import { compareCandidates, fuseCandidates } from '../../src/retrieval/fusion.js';
import { candidate, candidateChunk, hit } from './test-utils.js';

const WEIGHTS = { vectorWeight: 0.6, lexicalWeight: 0.4 };

describe('fuseCandidates', () => {
  it('weights scores and joins both sets on chunk id', () => {
    const a = candidateChunk('d:a', 1);
    const b = candidateChunk('d:b', 2);
    const c = candidateChunk('d:c', 3);

    const fused = fuseCandidates([hit(a, 0.9), hit(b, 0.8)], [hit(b, 0.5), hit(c, 0.7)], WEIGHTS);

    expect(fused.map((f) => f.chunk.id)).toEqual(['d:b', 'd:a', 'd:c']);
    expect(fused[0]?.combinedScore).toBeCloseTo(0.68, 10);
    expect(fused[1]?.combinedScore).toBeCloseTo(0.54, 10);
    expect(fused[2]?.combinedScore).toBeCloseTo(0.28, 10);
  });

  it('marks which searches found each chunk', () => {
    const a = candidateChunk('d:a', 1);
    const b = candidateChunk('d:b', 2);

    const fused = fuseCandidates([hit(a, 0.9)], [hit(b, 0.5)], WEIGHTS);

    expect(fused[0]).toMatchObject({ vectorScore: 0.9, lexicalScore: 0, inVectorSet: true, inLexicalSet: false });
    expect(fused[1]).toMatchObject({ vectorScore: 0, lexicalScore: 0.5, inVectorSet: false, inLexicalSet: true });
  });

  it('includes every chunk exactly once', () => {
    const chunks = [1, 2, 3, 4].map((n) => candidateChunk(`d:${n}`, n));

    const fused = fuseCandidates(
      chunks.slice(0, 3).map((c) => hit(c, 0.5)),
      chunks.slice(1).map((c) => hit(c, 0.5)),
      WEIGHTS,
    );

    expect(fused.map((f) => f.chunk.id).sort()).toEqual(['d:1', 'd:2', 'd:3', 'd:4']);
  });

  it('returns nothing for two empty sets', () => {
    expect(fuseCandidates([], [], WEIGHTS)).toEqual([]);
  });

  it('honours zero weights', () => {
    const a = candidateChunk('d:a', 1);
    const b = candidateChunk('d:b', 2);

    const fused = fuseCandidates([hit(a, 0.9)], [hit(b, 3)], { vectorWeight: 0, lexicalWeight: 1 });

    expect(fused.map((f) => [f.chunk.id, f.combinedScore])).toEqual([
      ['d:b', 3],
      ['d:a', 0],
    ]);
  });
});

describe('compareCandidates', () => {
  it('breaks combined-score ties by vector score, then insertion order', () => {
    const vectorHeavy = { ...candidate(candidateChunk('d:v', 3), 0.5, 0), combinedScore: 0.3 };
    const lexicalHeavy = { ...candidate(candidateChunk('d:l', 1), 0, 0.75), combinedScore: 0.3 };
    const early = { ...candidate(candidateChunk('d:e', 1), 0.5, 0), combinedScore: 0.3 };

    const sorted = [lexicalHeavy, vectorHeavy, early].sort(compareCandidates);

    expect(sorted.map((c) => c.chunk.id)).toEqual(['d:e', 'd:v', 'd:l']);
  });
});
