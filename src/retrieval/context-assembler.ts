/**
 * Renders reranked passages and conversation history into one context string
 * for the generation step.
 *
 * Passages are numbered [1]…[n] in rank order and included while they fit the
 * token budget; the first one that does not fit ends the list, so the numbers
 * stay contiguous and match `extractCitations`.
 */

import type { RankedPassage } from './types.js';
import type { ConversationTurn } from '../memory/types.js';
import type { Tokenizer } from '../utils/token-counter.js';

export interface AssembleOptions {
  /** Token budget for the passage blocks. */
  maxTokens: number;
  tokenizer: Tokenizer;
}

export interface AssembledContext {
  text: string;
  /** Passages that made it in; entry i carries marker i + 1. */
  passages: RankedPassage[];
  /** Tokens used by the passage blocks. */
  tokenCount: number;
}

/**
 * Display label for a passage: title, then filename, then document id.
 */
export function passageLabel(passage: RankedPassage): string {
  const { metadata, documentId } = passage.chunk;
  if (typeof metadata.title === 'string' && metadata.title) return metadata.title;
  if (typeof metadata.filename === 'string' && metadata.filename) return metadata.filename;
  return documentId;
}

export function formatPassage(marker: number, passage: RankedPassage): string {
  const section = typeof passage.chunk.metadata.section === 'string' ? ` › ${passage.chunk.metadata.section}` : '';
  return `[${marker}] ${passageLabel(passage)}${section}\n${passage.chunk.content}`;
}

export function formatHistory(history: ConversationTurn[]): string {
  return history.map((turn) => `${turn.role}: ${turn.content}`).join('\n');
}

export function assembleContext(
  passages: RankedPassage[],
  history: ConversationTurn[],
  options: AssembleOptions,
): AssembledContext {
  const blocks: string[] = [];
  const included: RankedPassage[] = [];
  let tokenCount = 0;

  for (const passage of passages) {
    const block = formatPassage(included.length + 1, passage);
    const tokens = options.tokenizer.count(block);
    if (tokenCount + tokens > options.maxTokens) break;
    blocks.push(block);
    included.push(passage);
    tokenCount += tokens;
  }

  const sections = [`Sources:\n\n${blocks.length > 0 ? blocks.join('\n\n') : '(none)'}`];
  if (history.length > 0) {
    sections.push(`Conversation so far:\n${formatHistory(history)}`);
  }

  return { text: sections.join('\n\n'), passages: included, tokenCount };
}
