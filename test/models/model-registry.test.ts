import { describe, it, expect } from 'vitest';
import { findModel, getAllModelIds, getModel, MODEL_REGISTRY } from '../../src/models/model-registry.js';

describe('model-registry', () => {
  it('lists every registered model', () => {
    expect(getAllModelIds()).toEqual(['nomic-embed-text', 'mxbai-embed-large', 'all-minilm', 'bge-m3']);
  });

  it('keys entries by their own id', () => {
    for (const [key, model] of Object.entries(MODEL_REGISTRY)) {
      expect(model.id).toBe(key);
    }
  });

  it('describes the default model with task prefixes', () => {
    expect(getModel('nomic-embed-text')).toMatchObject({
      dims: 768,
      usesPrefix: true,
      documentPrefix: 'search_document: ',
      queryPrefix: 'search_query: ',
    });
  });

  it('ignores an Ollama tag suffix', () => {
    expect(findModel('all-minilm:l6-v2')?.dims).toBe(384);
  });

  it('returns undefined for unknown models', () => {
    expect(findModel('text-embedding-3-small')).toBeUndefined();
  });

  it('throws from getModel for unknown models', () => {
    expect(() => getModel('nope')).toThrow(
      'Unknown model: nope. Available: nomic-embed-text, mxbai-embed-large, all-minilm, bge-m3',
    );
  });
});
