/**
 * Tests for batch embedding.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { BatchEmbedder, filterEmbedded } from '../../src/models/embedder.js';
import { DEFAULT_CONFIG } from '../../src/config/rag-config.js';
import { PermanentError, TransientError } from '../../src/utils/errors.js';
import { getLogLevel, setJsonMode, setLogLevel, setLogSink } from '../../src/utils/logger.js';
import { FakeEmbeddingProvider, fastEmbedderOptions, makeChunk } from '../fixtures.js';

const VECTOR = [0.5, 0.25, 0.125];

function failing(errors: unknown[], then: number[] = VECTOR): (text: string) => Promise<number[]> {
  let call = 0;
  return async () => {
    const error = errors[call++];
    if (error !== undefined) throw error;
    return then;
  };
}

describe('BatchEmbedder', () => {
  describe('embedOne', () => {
    it('returns the provider vector', async () => {
      const provider = new FakeEmbeddingProvider(() => VECTOR);
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions());

      expect(await embedder.embedOne('hello')).toEqual(VECTOR);
      expect(provider.calls).toEqual(['hello']);
    });

    it('prepends the document prefix', async () => {
      const provider = new FakeEmbeddingProvider(() => VECTOR);
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions({ documentPrefix: 'doc: ', queryPrefix: 'q: ' }));

      await embedder.embedOne('passage');
      await embedder.embedQuery('question');

      expect(provider.calls).toEqual(['doc: passage', 'q: question']);
    });

    it('rejects empty text without calling the provider', async () => {
      const provider = new FakeEmbeddingProvider(() => VECTOR);
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions());

      await expect(embedder.embedOne('  \n')).rejects.toMatchObject({ name: 'PermanentError', code: 'EMPTY_TEXT' });
      expect(provider.calls).toEqual([]);
    });

    it('retries transient failures', async () => {
      const provider = new FakeEmbeddingProvider(
        failing([new TransientError('busy', 'PROVIDER_UNAVAILABLE'), new TransientError('busy', 'PROVIDER_UNAVAILABLE')]),
      );
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions({ maxRetries: 3 }));

      expect(await embedder.embedOne('hello')).toEqual(VECTOR);
      expect(provider.calls).toHaveLength(3);
    });

    it('gives up after maxRetries retries', async () => {
      const provider = new FakeEmbeddingProvider(async () => {
        throw new TransientError('down', 'TRANSPORT_FAILED');
      });
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions({ maxRetries: 2 }));

      await expect(embedder.embedOne('hello')).rejects.toBeInstanceOf(TransientError);
      expect(provider.calls).toHaveLength(3);
    });

    it('takes a per-call retry count', async () => {
      const provider = new FakeEmbeddingProvider(async () => {
        throw new TransientError('down', 'TRANSPORT_FAILED');
      });
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions({ maxRetries: 3 }));

      await expect(embedder.embedOne('hello', 0)).rejects.toThrow('down');
      expect(provider.calls).toHaveLength(1);
    });

    it('does not retry permanent failures', async () => {
      const provider = new FakeEmbeddingProvider(failing([new PermanentError('bad input', 'PROVIDER_REJECTED')]));
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions());

      await expect(embedder.embedOne('hello')).rejects.toMatchObject({ code: 'PROVIDER_REJECTED' });
      expect(provider.calls).toHaveLength(1);
    });

    it('treats unknown errors as transient', async () => {
      const provider = new FakeEmbeddingProvider(failing([new Error('socket hang up')]));
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions());

      expect(await embedder.embedOne('hello')).toEqual(VECTOR);
      expect(provider.calls).toHaveLength(2);
    });

    it('rejects vectors of the wrong dimension', async () => {
      const provider = new FakeEmbeddingProvider(() => [1, 2]);
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions());

      await expect(embedder.embedOne('hello')).rejects.toMatchObject({
        code: 'DIMENSION_MISMATCH',
        message: 'Expected 3-dimensional vector, got 2',
      });
      expect(provider.calls).toHaveLength(1);
    });

    it('times out slow calls', async () => {
      const provider = new FakeEmbeddingProvider(() => new Promise<number[]>(() => undefined));
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions({ timeoutMs: 10, maxRetries: 0 }));

      await expect(embedder.embedOne('hello')).rejects.toMatchObject({
        name: 'TransientError',
        code: 'TIMEOUT',
        message: 'Embedding call timed out after 10ms',
      });
    });
  });

  describe('embedBatch', () => {
    it('isolates failures to their items', async () => {
      const provider = new FakeEmbeddingProvider((text) => {
        if (text === 'bad') throw new PermanentError('rejected', 'PROVIDER_REJECTED');
        return VECTOR;
      });
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions());

      const result = await embedder.embedBatch(['a', '', 'c', 'bad']);

      expect(result.vectors).toEqual([VECTOR, null, VECTOR, null]);
      expect(result.succeeded).toBe(2);
      expect(result.failed).toBe(2);
      expect(result.failures.map((f) => [f.index, f.error.code])).toEqual([
        [1, 'EMPTY_TEXT'],
        [3, 'PROVIDER_REJECTED'],
      ]);
    });

    it('returns an empty result for no input', async () => {
      const embedder = new BatchEmbedder(new FakeEmbeddingProvider(() => VECTOR), fastEmbedderOptions());

      expect(await embedder.embedBatch([])).toEqual({ vectors: [], succeeded: 0, failed: 0, failures: [] });
    });

    it('reports progress every N items and at the end', async () => {
      const onProgress = vi.fn();
      const embedder = new BatchEmbedder(
        new FakeEmbeddingProvider(() => VECTOR),
        fastEmbedderOptions({ progressEvery: 2, onProgress }),
      );

      await embedder.embedBatch(['a', 'b', 'c', 'd', 'e']);

      expect(onProgress.mock.calls.map(([p]) => p)).toEqual([
        { completed: 2, total: 5, succeeded: 2, failed: 0 },
        { completed: 4, total: 5, succeeded: 4, failed: 0 },
        { completed: 5, total: 5, succeeded: 5, failed: 0 },
      ]);
    });

    describe('with a throwing progress callback', () => {
      const level = getLogLevel();

      afterEach(() => {
        setLogSink(null);
        setLogLevel(level);
      });

      it('still resolves the batch and logs the callback error', async () => {
        const lines: string[] = [];
        setLogSink((line) => lines.push(line));
        setLogLevel('warn');
        setJsonMode(false);
        const embedder = new BatchEmbedder(
          new FakeEmbeddingProvider(() => VECTOR),
          fastEmbedderOptions({
            progressEvery: 5,
            onProgress: () => {
              throw new Error('observer broke');
            },
          }),
        );

        const result = await embedder.embedBatch(['a', 'b']);

        expect(result).toEqual({ vectors: [VECTOR, VECTOR], succeeded: 2, failed: 0, failures: [] });
        expect(lines).toHaveLength(1);
        expect(lines[0]?.slice(11)).toBe('WARN  [embedder] Progress callback failed (error=observer broke)');
      });
    });

    it('keeps at most `concurrency` calls in flight', async () => {
      let inFlight = 0;
      let peak = 0;
      const provider = new FakeEmbeddingProvider(async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return VECTOR;
      });
      const embedder = new BatchEmbedder(provider, fastEmbedderOptions({ concurrency: 2 }));

      const result = await embedder.embedBatch(['a', 'b', 'c', 'd', 'e', 'f']);

      expect(result.succeeded).toBe(6);
      expect(peak).toBe(2);
    });
  });

  describe('fromConfig', () => {
    it('takes task prefixes from the model registry', async () => {
      const provider = new FakeEmbeddingProvider(() => VECTOR, 'nomic-embed-text');
      const embedder = BatchEmbedder.fromConfig(provider, {
        ...DEFAULT_CONFIG.embedding,
        model: 'nomic-embed-text:latest',
        dimensions: 3,
      });

      await embedder.embedOne('passage');
      await embedder.embedQuery('question');

      expect(embedder.modelId).toBe('nomic-embed-text');
      expect(provider.calls).toEqual(['search_document: passage', 'search_query: question']);
    });

    it('uses no prefix for models without one', async () => {
      const provider = new FakeEmbeddingProvider(() => VECTOR);
      const embedder = BatchEmbedder.fromConfig(provider, {
        ...DEFAULT_CONFIG.embedding,
        model: 'all-minilm',
        dimensions: 3,
      });

      await embedder.embedQuery('question');

      expect(provider.calls).toEqual(['question']);
    });
  });
});

describe('filterEmbedded', () => {
  it('pairs chunks with the vectors produced for them', () => {
    const chunks = [makeChunk({ index: 0 }), makeChunk({ index: 1 }), makeChunk({ index: 2 })];

    const embedded = filterEmbedded(chunks, {
      vectors: [[1, 0, 0], null, [0, 0, 1]],
      succeeded: 2,
      failed: 1,
      failures: [],
    });

    expect(embedded.map((c) => [c.id, c.embedding])).toEqual([
      ['doc-1:0', [1, 0, 0]],
      ['doc-1:2', [0, 0, 1]],
    ]);
  });
});
