/**
 * Embedding provider boundary.
 *
 * The batch embedder only knows `EmbeddingProvider`. The default
 * implementation calls an OpenAI-compatible embeddings endpoint (Ollama's
 * `/v1` by default) through the AI SDK, with SDK-level retries disabled so
 * retry policy stays in one place.
 */

import { APICallError, embed, type EmbeddingModel } from 'ai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { PermanentError, RaglineError, TransientError, errorMessage } from '../utils/errors.js';

export interface EmbedCallOptions {
  signal?: AbortSignal;
}

/**
 * Turns one text into one vector.
 */
export interface EmbeddingProvider {
  readonly modelId: string;
  embed(text: string, options?: EmbedCallOptions): Promise<number[]>;
}

export interface OpenAICompatibleOptions {
  baseUrl: string;
  model: string;
  /** Sent as a bearer token when set. Ollama ignores it. */
  apiKey?: string;
  /** Provider name used in SDK error messages. */
  name?: string;
}

/**
 * Map a provider failure onto the transient/permanent split.
 *
 * - Retryable API errors (408, 409, 429, 5xx, connection failures) → TransientError
 * - Other API errors → PermanentError
 * - Aborts → TransientError `TIMEOUT`
 * - Anything else → TransientError `TRANSPORT_FAILED`
 */
export function classifyProviderError(error: unknown): RaglineError {
  if (error instanceof RaglineError) {
    return error;
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (error.isRetryable) {
      return new TransientError(
        status === undefined
          ? `Embedding provider unreachable: ${error.message}`
          : `Embedding provider returned ${status}: ${error.message}`,
        status === undefined ? 'TRANSPORT_FAILED' : 'PROVIDER_UNAVAILABLE',
        error,
      );
    }
    return new PermanentError(
      `Embedding provider rejected input${status === undefined ? '' : ` (${status})`}: ${error.message}`,
      'PROVIDER_REJECTED',
      error,
    );
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TransientError(`Embedding call aborted: ${error.message}`, 'TIMEOUT', error);
  }

  return new TransientError(`Embedding call failed: ${errorMessage(error)}`, 'TRANSPORT_FAILED', error);
}

/**
 * Provider backed by an AI SDK embedding model.
 */
export class AiSdkEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly model: EmbeddingModel<string>,
    readonly modelId: string,
  ) {}

  static forOpenAICompatible(options: OpenAICompatibleOptions): AiSdkEmbeddingProvider {
    const provider = createOpenAICompatible({
      name: options.name ?? 'ollama',
      baseURL: options.baseUrl,
      apiKey: options.apiKey,
    });
    return new AiSdkEmbeddingProvider(provider.textEmbeddingModel(options.model), options.model);
  }

  async embed(text: string, options: EmbedCallOptions = {}): Promise<number[]> {
    try {
      const { embedding } = await embed({
        model: this.model,
        value: text,
        maxRetries: 0,
        abortSignal: options.signal,
      });
      return embedding;
    } catch (error) {
      throw classifyProviderError(error);
    }
  }
}
