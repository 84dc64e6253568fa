/**
 * Vector utilities shared by the index, the embedding scorer and segmentation.
 */

/**
 * Placeholder vector for texts that could not be embedded.
 * Its cosine similarity with anything is 0.
 */
export function zeroVector(dimensions: number): number[] {
  return new Array<number>(dimensions).fill(0);
}

/**
 * Cosine similarity between two vectors.
 *
 * Provider vectors are not guaranteed to be unit length, so both magnitudes
 * are computed. Returns 0 when either vector is all zeros or the lengths
 * differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
