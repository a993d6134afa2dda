import { describe, it, expect } from 'vitest';
import { APICallError, type EmbeddingModel } from 'ai';
import { AiSdkEmbeddingProvider, classifyProviderError } from '../../src/models/embedding-provider.js';
import { PermanentError, StorageError, TransientError } from '../../src/utils/errors.js';

function apiError(statusCode: number | undefined, isRetryable: boolean, message = 'provider said no'): APICallError {
  return new APICallError({
    message,
    url: 'http://localhost:11434/v1/embeddings',
    requestBodyValues: {},
    statusCode,
    isRetryable,
  });
}

function fakeModel(doEmbed: EmbeddingModel<string>['doEmbed']): EmbeddingModel<string> {
  return {
    specificationVersion: 'v1',
    provider: 'test',
    modelId: 'test-embed',
    maxEmbeddingsPerCall: 1,
    supportsParallelCalls: true,
    doEmbed,
  };
}

describe('classifyProviderError', () => {
  it('maps retryable statuses to PROVIDER_UNAVAILABLE', () => {
    const error = classifyProviderError(apiError(429, true, 'Too many requests'));

    expect(error).toBeInstanceOf(TransientError);
    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.message).toBe('Embedding provider returned 429: Too many requests');
  });

  it('maps retryable errors without a status to TRANSPORT_FAILED', () => {
    const error = classifyProviderError(apiError(undefined, true, 'connect ECONNREFUSED'));

    expect(error).toBeInstanceOf(TransientError);
    expect(error.code).toBe('TRANSPORT_FAILED');
    expect(error.message).toBe('Embedding provider unreachable: connect ECONNREFUSED');
  });

  it('maps other API errors to PROVIDER_REJECTED', () => {
    const error = classifyProviderError(apiError(400, false, 'input too long'));

    expect(error).toBeInstanceOf(PermanentError);
    expect(error.code).toBe('PROVIDER_REJECTED');
    expect(error.message).toBe('Embedding provider rejected input (400): input too long');
  });

  it('maps aborts to TIMEOUT', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';

    const error = classifyProviderError(abort);

    expect(error).toBeInstanceOf(TransientError);
    expect(error.code).toBe('TIMEOUT');
  });

  it('treats anything else as a transport failure', () => {
    const error = classifyProviderError('boom');

    expect(error).toBeInstanceOf(TransientError);
    expect(error.code).toBe('TRANSPORT_FAILED');
    expect(error.message).toBe('Embedding call failed: boom');
  });

  it('passes ragline errors through', () => {
    const original = new StorageError('x', 'DB_QUERY_FAILED');
    expect(classifyProviderError(original)).toBe(original);
  });
});

describe('AiSdkEmbeddingProvider', () => {
  it('returns the embedding for a single value', async () => {
    const seen: string[][] = [];
    const provider = new AiSdkEmbeddingProvider(
      fakeModel(async ({ values }) => {
        seen.push(values);
        return { embeddings: [[0.1, 0.2]] };
      }),
      'test-embed',
    );

    expect(await provider.embed('hello')).toEqual([0.1, 0.2]);
    expect(seen).toEqual([['hello']]);
    expect(provider.modelId).toBe('test-embed');
  });

  it('classifies provider failures', async () => {
    const provider = new AiSdkEmbeddingProvider(
      fakeModel(async () => {
        throw apiError(503, true, 'overloaded');
      }),
      'test-embed',
    );

    await expect(provider.embed('hello')).rejects.toMatchObject({
      name: 'TransientError',
      code: 'PROVIDER_UNAVAILABLE',
    });
  });

  it('builds an OpenAI-compatible provider without calling it', () => {
    const provider = AiSdkEmbeddingProvider.forOpenAICompatible({
      baseUrl: 'http://localhost:11434/v1',
      model: 'nomic-embed-text',
      apiKey: 'test-secret',
    });

    expect(provider.modelId).toBe('nomic-embed-text');
  });
});
