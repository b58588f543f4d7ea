export function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity with precomputed norms. Returns 0 when either norm is 0.
 */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[],
  normA = vectorNorm(a),
  normB = vectorNorm(b)
): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  const denominator = normA * normB;
  if (denominator === 0) return 0;

  let dotProduct = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
  }

  return dotProduct / denominator;
}

export type VectorDefect = 'empty' | 'dimension_mismatch' | 'non_finite' | 'zero_norm';

/**
 * Returns the first reason `vector` cannot be used for similarity search, or `null` when it can.
 */
export function findVectorDefect(vector: readonly number[], dimensions: number): VectorDefect | null {
  if (vector.length === 0) {
    return 'empty';
  }

  if (vector.length !== dimensions) {
    return 'dimension_mismatch';
  }

  if (!vector.every((value) => Number.isFinite(value))) {
    return 'non_finite';
  }

  return vectorNorm(vector) === 0 ? 'zero_norm' : null;
}
