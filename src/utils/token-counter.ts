/**
 * Token counting.
 *
 * Every sizing decision (chunk size, overlap, memory budget, context budget)
 * goes through a `Tokenizer`. The default encodes against the cl100k_base
 * vocabulary; the approximate counter is kept for callers that only need
 * a rough size and want to skip BPE work.
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';

const CHARS_PER_TOKEN = 3.5;

/**
 * Counts text in token units of a fixed vocabulary.
 */
export interface Tokenizer {
  /** Vocabulary name, for logs and diagnostics. */
  readonly name: string;
  /** Number of tokens in `text`. */
  count(text: string): number;
}

/**
 * Approximate token count for a string.
 * Biased slightly high to avoid over-stuffing chunks.
 */
export function approximateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Character-ratio tokenizer. No vocabulary, no encoding.
 */
export class ApproximateTokenizer implements Tokenizer {
  readonly name = 'approximate';

  count(text: string): number {
    return approximateTokens(text);
  }
}

let sharedEncoding: Tiktoken | null = null;

function getCl100k(): Tiktoken {
  if (!sharedEncoding) {
    sharedEncoding = getEncoding('cl100k_base');
  }
  return sharedEncoding;
}

/**
 * BPE tokenizer over the cl100k_base vocabulary.
 */
export class Cl100kTokenizer implements Tokenizer {
  readonly name = 'cl100k_base';

  encode(text: string): number[] {
    if (!text) return [];
    return getCl100k().encode(text);
  }

  decode(tokens: number[]): string {
    return getCl100k().decode(tokens);
  }

  count(text: string): number {
    return this.encode(text).length;
  }
}

let defaultTokenizer: Tokenizer | null = null;

/**
 * Shared cl100k_base tokenizer.
 */
export function getDefaultTokenizer(): Tokenizer {
  if (!defaultTokenizer) {
    defaultTokenizer = new Cl100kTokenizer();
  }
  return defaultTokenizer;
}
