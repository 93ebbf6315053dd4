export function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function magnitude(vector: number[]): number {
  return Math.sqrt(dot(vector, vector));
}

/**
 * Cosine similarity in [-1, 1]. Zero-length vectors score 0 against anything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch (${a.length} vs ${b.length}).`);
  }

  const denominator = magnitude(a) * magnitude(b);
  if (denominator === 0) {
    return 0;
  }
  return dot(a, b) / denominator;
}

export function isFiniteVector(vector: number[]): boolean {
  return vector.every((value) => Number.isFinite(value));
}
