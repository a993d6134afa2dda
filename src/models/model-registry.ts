/**
 * Known embedding models served through an OpenAI-compatible endpoint.
 */

export interface ModelConfig {
  /** Provider model id, e.g. the Ollama tag. */
  id: string;
  /** Embedding dimensions. */
  dims: number;
  /** Context window in tokens. */
  contextTokens: number;
  /** Whether the model uses task prefixes (e.g. nomic). */
  usesPrefix: boolean;
  /** Prefix for document embedding (if usesPrefix). */
  documentPrefix: string;
  /** Prefix for query embedding (if usesPrefix). */
  queryPrefix: string;
  /** Notes about the model. */
  notes: string;
}

export const MODEL_REGISTRY: Record<string, ModelConfig> = {
  'nomic-embed-text': {
    id: 'nomic-embed-text',
    dims: 768,
    contextTokens: 8192,
    usesPrefix: true,
    documentPrefix: 'search_document: ',
    queryPrefix: 'search_query: ',
    notes: 'Default. Needs task prefixes.',
  },
  'mxbai-embed-large': {
    id: 'mxbai-embed-large',
    dims: 1024,
    contextTokens: 512,
    usesPrefix: true,
    documentPrefix: '',
    queryPrefix: 'Represent this sentence for searching relevant passages: ',
    notes: 'Query-side instruction only.',
  },
  'all-minilm': {
    id: 'all-minilm',
    dims: 384,
    contextTokens: 256,
    usesPrefix: false,
    documentPrefix: '',
    queryPrefix: '',
    notes: 'Smallest. Short context; keep chunkSize low.',
  },
  'bge-m3': {
    id: 'bge-m3',
    dims: 1024,
    contextTokens: 8192,
    usesPrefix: false,
    documentPrefix: '',
    queryPrefix: '',
    notes: 'Multilingual.',
  },
};

export function getModel(id: string): ModelConfig {
  const config = findModel(id);
  if (!config) {
    throw new Error(
      `Unknown model: ${id}. Available: ${Object.keys(MODEL_REGISTRY).join(', ')}`,
    );
  }
  return config;
}

/**
 * Registry entry for a model id, ignoring an Ollama `:tag` suffix.
 */
export function findModel(id: string): ModelConfig | undefined {
  return MODEL_REGISTRY[id] ?? MODEL_REGISTRY[id.split(':')[0] ?? id];
}

export function getAllModelIds(): string[] {
  return Object.keys(MODEL_REGISTRY);
}
