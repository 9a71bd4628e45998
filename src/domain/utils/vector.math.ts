/**
 * Raw cosine in [-1, 1]. Zero-magnitude vectors score 0.
 */
export function rawCosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (!normA || !normB) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Cosine similarity clamped to [0, 1].
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  return clampUnit(rawCosineSimilarity(a, b));
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Deterministic unit vector (every component 1/sqrt(d)) used where the backend
 * needs a query vector but the caller has none: listing, key lookup, health.
 */
export function placeholderVector(dimension: number): number[] {
  if (!Number.isInteger(dimension) || dimension < 1) {
    throw new Error(`Invalid vector dimension: ${dimension}`);
  }
  return new Array<number>(dimension).fill(1 / Math.sqrt(dimension));
}
