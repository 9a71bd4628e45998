import { IEmbeddingProvider } from "../../domain/interfaces/iembedding.provider";
import { placeholderVector } from "../../domain/utils/vector.math";

// FNV-1a hash constants (32-bit)
const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

export function fnv1aHash(str: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Deterministic offline embedder: word counts hashed into a fixed number of
 * buckets, L2-normalized. Texts sharing words score high; meaning is ignored.
 * Text without any word maps to the uniform unit vector.
 */
export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly modelId = "hashing-fnv1a";

  constructor(readonly dimension: number = 384) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new Error(`Invalid vector dimension: ${dimension}`);
    }
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embed(text));
  }

  private embed(text: string): number[] {
    const tokens = tokenize(text);
    if (tokens.length === 0) {
      return placeholderVector(this.dimension);
    }

    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokens) {
      vector[fnv1aHash(token) % this.dimension] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return vector.map((v) => v / norm);
  }
}
