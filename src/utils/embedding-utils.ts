/**
 * Embedding serialization utilities for SQLite BLOB storage.
 */

/**
 * Serialize an embedding to a Buffer for SQLite storage.
 *
 * Uses Float32Array for compact storage (4 bytes per dimension).
 * A 768-dimension embedding uses 3KB of storage.
 */
export function serializeEmbedding(embedding: number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer.
 *
 * Copies the bytes first: SQLite hands back Buffers whose byteOffset is not
 * guaranteed to be 4-byte aligned.
 */
export function deserializeEmbedding(buffer: Buffer): number[] {
  const copy = new Uint8Array(buffer.length);
  copy.set(buffer);
  const float32 = new Float32Array(copy.buffer, 0, buffer.length / Float32Array.BYTES_PER_ELEMENT);
  return Array.from(float32);
}
