/**
 * Batched embedding with per-item failure isolation.
 *
 * Every provider call runs under a timeout. Transient failures are retried
 * with exponential backoff; permanent ones fail the item at once. A batch
 * never throws: failed items come back as `null` with their error.
 */

import pLimit from 'p-limit';
import type { EmbeddingProvider } from './embedding-provider.js';
import { classifyProviderError } from './embedding-provider.js';
import { findModel } from './model-registry.js';
import type { EmbeddingConfig } from '../config/rag-config.js';
import type { Chunk, EmbeddedChunk } from '../ingest/types.js';
import { PermanentError, RaglineError, errorMessage, isTransientError, wrapError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';

const log = createLogger('embedder');

export interface EmbedProgress {
  completed: number;
  total: number;
  succeeded: number;
  failed: number;
}

export interface BatchEmbedderOptions {
  /** Required vector length. */
  dimensions: number;
  /** Retries after the first attempt for transient failures. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-call timeout. */
  timeoutMs: number;
  /** Concurrent provider calls within a batch. */
  concurrency: number;
  /** Report progress every N completed items. */
  progressEvery: number;
  /** Prepended to passages before embedding. */
  documentPrefix?: string;
  /** Prepended to queries before embedding. */
  queryPrefix?: string;
  onProgress?: (progress: EmbedProgress) => void;
}

export interface BatchEmbedFailure {
  /** Position in the input array. */
  index: number;
  error: RaglineError;
}

/**
 * Outcome of a batch. `vectors[i]` is null exactly when item `i` failed.
 */
export interface BatchEmbedResult {
  vectors: Array<number[] | null>;
  succeeded: number;
  failed: number;
  failures: BatchEmbedFailure[];
}

export class BatchEmbedder {
  private readonly documentPrefix: string;
  private readonly queryPrefix: string;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: BatchEmbedderOptions,
  ) {
    this.documentPrefix = options.documentPrefix ?? '';
    this.queryPrefix = options.queryPrefix ?? '';
  }

  /**
   * Build from the embedding section of the runtime config, taking task
   * prefixes from the model registry when the model is known.
   */
  static fromConfig(
    provider: EmbeddingProvider,
    config: EmbeddingConfig,
    onProgress?: (progress: EmbedProgress) => void,
  ): BatchEmbedder {
    const model = findModel(config.model);
    return new BatchEmbedder(provider, {
      dimensions: config.dimensions,
      maxRetries: config.maxRetries,
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs,
      timeoutMs: config.timeoutMs,
      concurrency: config.concurrency,
      progressEvery: config.progressEvery,
      documentPrefix: model?.usesPrefix ? model.documentPrefix : '',
      queryPrefix: model?.usesPrefix ? model.queryPrefix : '',
      onProgress,
    });
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  /**
   * Embed one passage.
   *
   * @param retries - Retries after the first attempt. Defaults to `maxRetries`.
   * @throws PermanentError for empty text, rejected input or a wrong dimension
   * @throws TransientError once retries are exhausted
   */
  async embedOne(text: string, retries: number = this.options.maxRetries): Promise<number[]> {
    return this.embedWithPrefix(this.documentPrefix, text, retries);
  }

  /**
   * Embed a search query, with the model's query prefix.
   */
  async embedQuery(text: string): Promise<number[]> {
    return this.embedWithPrefix(this.queryPrefix, text, this.options.maxRetries);
  }

  /**
   * Embed many passages with bounded parallelism.
   * Results line up with `texts` by index.
   */
  async embedBatch(texts: string[]): Promise<BatchEmbedResult> {
    const total = texts.length;
    const vectors: Array<number[] | null> = new Array<number[] | null>(total).fill(null);
    const failures: BatchEmbedFailure[] = [];
    const limit = pLimit(this.options.concurrency);
    let completed = 0;

    const report = (): void => {
      completed++;
      if (completed % this.options.progressEvery !== 0 && completed !== total) return;
      const progress: EmbedProgress = {
        completed,
        total,
        succeeded: completed - failures.length,
        failed: failures.length,
      };
      log.debug(`Embedded ${completed}/${total}`, { failed: failures.length });
      try {
        this.options.onProgress?.(progress);
      } catch (error) {
        log.warn('Progress callback failed', { error: errorMessage(error) });
      }
    };

    await Promise.all(
      texts.map((text, index) =>
        limit(async () => {
          try {
            vectors[index] = await this.embedOne(text);
          } catch (error) {
            const wrapped = wrapError(error);
            failures.push({ index, error: wrapped });
            log.warn(`Embedding failed for item ${index}`, { code: wrapped.code, error: wrapped.message });
          } finally {
            report();
          }
        }),
      ),
    );

    failures.sort((a, b) => a.index - b.index);

    return {
      vectors,
      succeeded: total - failures.length,
      failed: failures.length,
      failures,
    };
  }

  private async embedWithPrefix(prefix: string, text: string, retries: number): Promise<number[]> {
    if (!text.trim()) {
      throw new PermanentError('Cannot embed empty text', 'EMPTY_TEXT');
    }

    const input = prefix + text;
    return withRetry(`embed(${this.provider.modelId})`, () => this.attempt(input), {
      maxRetries: retries,
      initialDelayMs: this.options.baseDelayMs,
      maxDelayMs: this.options.maxDelayMs,
      backoffFactor: 2,
      retryOn: isTransientError,
    });
  }

  private async attempt(input: string): Promise<number[]> {
    const vector = await withTimeout(
      async (signal) => {
        try {
          return await this.provider.embed(input, { signal });
        } catch (error) {
          throw classifyProviderError(error);
        }
      },
      this.options.timeoutMs,
      'Embedding call',
    );

    if (vector.length !== this.options.dimensions) {
      throw new PermanentError(
        `Expected ${this.options.dimensions}-dimensional vector, got ${vector.length}`,
        'DIMENSION_MISMATCH',
      );
    }
    return vector;
  }
}

/**
 * Pair chunks with the vectors that were produced for them.
 */
export function filterEmbedded(chunks: Chunk[], result: BatchEmbedResult): EmbeddedChunk[] {
  const embedded: EmbeddedChunk[] = [];
  chunks.forEach((chunk, index) => {
    const vector = result.vectors[index];
    if (vector) {
      embedded.push({ ...chunk, embedding: vector });
    }
  });
  return embedded;
}
