/**
 * Document and chunk types shared by ingestion, storage and retrieval.
 */

/** Scalar metadata value. Filters compare these by equality. */
export type MetadataValue = string | number | boolean | null;

export type Metadata = Record<string, MetadataValue>;

/**
 * A source document. Immutable once chunked.
 */
export interface Document {
  /** Stable identifier; chunk ids derive from it. */
  id: string;
  /** Raw text. */
  text: string;
  /** File type tag, e.g. `md` or `txt`. */
  type: string;
  title?: string;
  author?: string;
  filename?: string;
  /** Custom keys, copied onto every chunk. */
  metadata: Metadata;
}

/**
 * Metadata attached to every chunk.
 * Chunk-level keys take precedence over keys inherited from the document.
 */
export interface ChunkMetadata extends Metadata {
  filename: string | null;
  title: string | null;
  author: string | null;
  section: string | null;
  chunkIndex: number;
  totalChunks: number;
}

/**
 * A passage of one document.
 */
export interface Chunk {
  /** `<documentId>:<index>` */
  id: string;
  documentId: string;
  /** Position within the document, from 0. */
  index: number;
  text: string;
  tokenCount: number;
  charCount: number;
  /** A single word longer than the chunk size that could not be split. */
  oversized: boolean;
  metadata: ChunkMetadata;
  embedding?: number[];
}

/**
 * A chunk with its vector, ready for storage.
 */
export interface EmbeddedChunk extends Chunk {
  embedding: number[];
}
