/**
 * Relevance scorers for reranking.
 *
 * `LlmRelevanceScorer` asks a language model for a 0–1 rating; the Anthropic
 * Messages API backs it by default. `LexicalOverlapScorer` needs no model.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { RelevanceScorer, ScoreOptions } from './types.js';
import type { RerankConfig } from '../config/rag-config.js';
import { PermanentError } from '../utils/errors.js';

/** Characters of passage text shown to the model. */
const PASSAGE_PREVIEW_CHARS = 500;

const SCORE_MAX_TOKENS = 10;

/**
 * Single-prompt text completion.
 */
export interface TextCompletion {
  complete(prompt: string, options: { maxTokens: number; signal?: AbortSignal }): Promise<string>;
}

/**
 * Completion through the Anthropic Messages API, at temperature 0.
 */
export class AnthropicCompletion implements TextCompletion {
  constructor(
    private readonly client: Anthropic,
    private readonly model: string,
  ) {}

  async complete(prompt: string, options: { maxTokens: number; signal?: AbortSignal }): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens,
        temperature: 0,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal: options.signal },
    );

    const block = response.content[0];
    return block?.type === 'text' ? block.text : '';
  }
}

export function buildRelevancePrompt(query: string, text: string): string {
  return `Rate the relevance of the following text to the query on a scale of 0 to 1.
Only respond with a number between 0 and 1.

Query: ${query}

Text: ${text.slice(0, PASSAGE_PREVIEW_CHARS)}

Relevance score:`;
}

/**
 * First number in a model reply, clamped to [0, 1].
 *
 * @throws PermanentError when the reply holds no number
 */
export function parseRelevanceScore(reply: string): number {
  const match = /-?(?:\d+(?:\.\d+)?|\.\d+)/.exec(reply);
  if (!match) {
    throw new PermanentError(`No relevance score in reply "${reply.trim().slice(0, 40)}"`, 'UNPARSEABLE_SCORE');
  }
  return clampScore(Number(match[0]));
}

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.max(0, Math.min(1, score));
}

export class LlmRelevanceScorer implements RelevanceScorer {
  readonly name = 'llm';

  constructor(private readonly completion: TextCompletion) {}

  async score(query: string, text: string, options: ScoreOptions = {}): Promise<number> {
    const reply = await this.completion.complete(buildRelevancePrompt(query, text), {
      maxTokens: SCORE_MAX_TOKENS,
      signal: options.signal,
    });
    return parseRelevanceScore(reply);
  }
}

/**
 * Anthropic-backed scorer. The API key defaults to `ANTHROPIC_API_KEY`.
 */
export function createAnthropicScorer(config: Pick<RerankConfig, 'model'>, apiKey?: string): LlmRelevanceScorer {
  const client = new Anthropic(apiKey === undefined ? {} : { apiKey });
  return new LlmRelevanceScorer(new AnthropicCompletion(client, config.model));
}

function terms(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Fraction of distinct query terms that occur in the passage.
 */
export class LexicalOverlapScorer implements RelevanceScorer {
  readonly name = 'lexical-overlap';

  async score(query: string, text: string): Promise<number> {
    const queryTerms = new Set(terms(query));
    if (queryTerms.size === 0) return 0;

    const passageTerms = new Set(terms(text));
    let hits = 0;
    for (const term of queryTerms) {
      if (passageTerms.has(term)) hits++;
    }
    return hits / queryTerms.size;
  }
}
