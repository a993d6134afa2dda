/**
 * Maps `[n]` markers in an answer back to the passages they cite.
 */

import { passageLabel } from './context-assembler.js';
import type { RankedPassage } from './types.js';
import type { Citation } from '../memory/types.js';

const CITATION_MARKER = /\[(\d+)\]/g;
const PREVIEW_CHARS = 200;

/**
 * One citation per distinct marker that names a passage, in marker order.
 * Markers outside 1…passages.length are ignored.
 */
export function extractCitations(responseText: string, passages: RankedPassage[]): Citation[] {
  const markers = new Set<number>();
  for (const match of responseText.matchAll(CITATION_MARKER)) {
    const marker = Number(match[1]);
    if (marker >= 1 && marker <= passages.length) {
      markers.add(marker);
    }
  }

  return [...markers]
    .sort((a, b) => a - b)
    .map((marker) => {
      const passage = passages[marker - 1];
      const { metadata } = passage.chunk;
      return {
        marker,
        chunkId: passage.chunk.id,
        documentId: passage.chunk.documentId,
        title: typeof metadata.title === 'string' ? metadata.title : passageLabel(passage),
        filename: typeof metadata.filename === 'string' ? metadata.filename : null,
        preview: passage.chunk.content.slice(0, PREVIEW_CHARS),
      };
    });
}
