/**
 * Query-time pipeline: embed query → hybrid search → rerank → assemble →
 * generate. Stages run one after another for a single query.
 */

import { assembleContext } from './context-assembler.js';
import { extractCitations } from './citations.js';
import type { HybridRetriever } from './hybrid-retriever.js';
import type { Reranker } from './reranker.js';
import type { GenerationProvider, MetadataFilters, RankedPassage, RetrievalCandidate } from './types.js';
import type { RagConfig } from '../config/rag-config.js';
import type { MemoryWindow } from '../memory/memory-window.js';
import type { Citation, ConversationTurn } from '../memory/types.js';
import type { Tokenizer } from '../utils/token-counter.js';
import { RetrievalError, ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

const log = createLogger('rag-pipeline');

/**
 * Anything that can embed a search query.
 */
export interface QueryEmbedder {
  embedQuery(text: string): Promise<number[]>;
}

export interface RagPipelineDeps {
  embedder: QueryEmbedder;
  retriever: HybridRetriever;
  reranker: Reranker;
  memory: MemoryWindow;
  generator: GenerationProvider;
  tokenizer: Tokenizer;
  config: Pick<RagConfig, 'rerank' | 'context' | 'generation'>;
}

export interface QueryOptions {
  filters?: MetadataFilters;
}

export interface RetrieveResult {
  /** Fused candidates before reranking. */
  candidates: RetrievalCandidate[];
  /** Final passages, best first. */
  passages: RankedPassage[];
}

export interface AskResult {
  answer: string;
  citations: Citation[];
  /** Passages that were placed in the context, in marker order. */
  passages: RankedPassage[];
  /** The stored assistant turn. */
  turn: ConversationTurn;
  durationMs: number;
}

export class RagPipeline {
  constructor(private readonly deps: RagPipelineDeps) {}

  /**
   * Retrieval half only: no memory, no generation.
   *
   * @throws ValidationError for an empty query
   * @throws RetrievalError when the query cannot be embedded or searched
   */
  async retrieve(query: string, options: QueryOptions = {}): Promise<RetrieveResult> {
    if (!query.trim()) {
      throw new ValidationError('Query is empty', 'EMPTY_QUERY');
    }

    let queryVector: number[];
    try {
      queryVector = await this.deps.embedder.embedQuery(query);
    } catch (error) {
      throw new RetrievalError(`Query embedding failed: ${errorMessage(error)}`, 'QUERY_EMBED_FAILED', error);
    }

    const candidates = await this.deps.retriever.search({
      queryVector,
      queryText: query,
      filters: options.filters,
    });

    const { topK, finalTopK } = this.deps.config.rerank;
    const ranked = await this.deps.reranker.rerank(query, candidates, topK);

    return { candidates, passages: ranked.slice(0, finalTopK) };
  }

  /**
   * Answer a query within a session and record both turns.
   * The user turn is stored and the history window read as one step.
   */
  async ask(sessionId: string, query: string, options: QueryOptions = {}): Promise<AskResult> {
    if (!query.trim()) {
      throw new ValidationError('Query is empty', 'EMPTY_QUERY');
    }
    const start = Date.now();
    const { memory, generator, tokenizer, config } = this.deps;

    const { turn: userTurn, window } = await memory.appendAndWindow(sessionId, { role: 'user', content: query });
    const history = window.filter((turn) => turn.seq !== userTurn.seq);

    const { passages } = await this.retrieve(query, options);
    const context = assembleContext(passages, history, { maxTokens: config.context.maxTokens, tokenizer });

    const answer = await withTimeout(
      (signal) => generator.generate({ query, context: context.text, history, signal }),
      config.generation.timeoutMs,
      'Generation',
    );

    const citations = extractCitations(answer, context.passages);
    const turn = await memory.append(sessionId, { role: 'assistant', content: answer, citations });

    const durationMs = Date.now() - start;
    log.info('Answered query', {
      sessionId,
      passages: context.passages.length,
      citations: citations.length,
      historyTurns: history.length,
      ms: durationMs,
    });

    return { answer, citations, passages: context.passages, turn, durationMs };
  }
}
