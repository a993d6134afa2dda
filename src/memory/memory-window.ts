/**
 * Token-bounded view of a session's recent turns.
 *
 * Storage is append-only; trimming happens when the window is read. Walking
 * back from the newest turn, turns are included until the next one would
 * exceed `maxTokens` or `maxMessages` turns are in. The window is returned
 * oldest first.
 *
 * Operations on one session run one at a time, in call order. Different
 * sessions never wait on each other.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import type { ConversationTurn, NewTurn, SessionStore } from './types.js';
import type { MemoryConfig } from '../config/rag-config.js';
import type { Tokenizer } from '../utils/token-counter.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('memory-window');

export interface MemoryWindowOptions extends MemoryConfig {
  tokenizer: Tokenizer;
}

/**
 * Newest-to-oldest walk over `turns`, returned oldest first.
 */
export function selectWindow(
  turns: ConversationTurn[],
  maxMessages: number,
  maxTokens: number,
  tokenizer: Tokenizer,
): ConversationTurn[] {
  const selected: ConversationTurn[] = [];
  let used = 0;

  for (let i = turns.length - 1; i >= 0 && selected.length < maxMessages; i--) {
    const turn = turns[i];
    const tokens = tokenizer.count(turn.content);
    if (used + tokens > maxTokens) break;
    used += tokens;
    selected.push(turn);
  }

  return selected.reverse();
}

export class MemoryWindow {
  private readonly queues = new Map<string, LimitFunction>();

  constructor(
    private readonly store: SessionStore,
    private readonly options: MemoryWindowOptions,
  ) {
    if (!Number.isInteger(options.maxMessages) || options.maxMessages < 1) {
      throw new ValidationError('maxMessages must be a positive integer', 'INVALID_OPTIONS');
    }
    if (!Number.isInteger(options.maxTokens) || options.maxTokens < 1) {
      throw new ValidationError('maxTokens must be a positive integer', 'INVALID_OPTIONS');
    }
  }

  async append(sessionId: string, turn: NewTurn): Promise<ConversationTurn> {
    return this.serialize(sessionId, () => this.store.append(sessionId, turn));
  }

  async window(sessionId: string): Promise<ConversationTurn[]> {
    return this.serialize(sessionId, () => this.read(sessionId));
  }

  /**
   * Append a turn and read the resulting window as one step.
   */
  async appendAndWindow(
    sessionId: string,
    turn: NewTurn,
  ): Promise<{ turn: ConversationTurn; window: ConversationTurn[] }> {
    return this.serialize(sessionId, async () => {
      const stored = await this.store.append(sessionId, turn);
      return { turn: stored, window: await this.read(sessionId) };
    });
  }

  async clear(sessionId: string): Promise<void> {
    return this.serialize(sessionId, () => this.store.clear(sessionId));
  }

  private async read(sessionId: string): Promise<ConversationTurn[]> {
    const turns = await this.store.list(sessionId);
    const window = selectWindow(turns, this.options.maxMessages, this.options.maxTokens, this.options.tokenizer);
    if (window.length < turns.length) {
      log.debug(`Window holds ${window.length} of ${turns.length} turns`, { sessionId });
    }
    return window;
  }

  private async serialize<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(sessionId);
    if (!queue) {
      queue = pLimit(1);
      this.queues.set(sessionId, queue);
    }

    try {
      return await queue(task);
    } finally {
      if (queue.activeCount === 0 && queue.pendingCount === 0) {
        this.queues.delete(sessionId);
      }
    }
  }
}
