/**
 * Cosine similarity for embedding comparison.
 *
 * cosine = dot(a, b) / (|a| * |b|), in [-1, 1]. Vector candidates are scored
 * with `similarityScore`, which clamps that to [0, 1].
 */

/**
 * Compute the dot product of two vectors.
 */
export function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Compute the L2 norm of a vector.
 */
export function norm(a: number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity between two vectors. Returns [-1, 1].
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  const d = dot(a, b);
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to handle floating point errors
  return Math.max(-1, Math.min(1, d / (na * nb)));
}

/**
 * Similarity score in [0, 1] used for vector candidates.
 * Anti-correlated vectors score 0 rather than going negative.
 */
export function similarityScore(a: number[], b: number[]): number {
  return Math.max(0, cosineSimilarity(a, b));
}
