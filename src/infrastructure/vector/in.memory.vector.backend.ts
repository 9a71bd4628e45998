import { MetadataFilter, VectorMetadata, VectorRecord } from "../../domain/entities/vector-record";
import { BackendFailure } from "../../domain/errors/service.errors";
import { rawCosineSimilarity } from "../../domain/utils/vector.math";
import {
  IVectorBackend,
  VectorBackendDescription,
  VectorQuery,
  VectorQueryHit,
} from "../../domain/interfaces/ivector.backend";

export interface InMemoryVectorBackendOptions {
  supportsDelete?: boolean;
  maxTopK?: number;
}

/**
 * Process-local vector backend for development and tests. Behaves like the
 * managed index where it matters: cosine distance, a per-query result cap,
 * and a dimension fixed by the first write.
 */
export class InMemoryVectorBackend implements IVectorBackend {
  readonly supportsDelete: boolean;
  private readonly maxTopK: number;
  private records = new Map<string, VectorRecord>();
  private dimension?: number;

  constructor(options: InMemoryVectorBackendOptions = {}) {
    this.supportsDelete = options.supportsDelete ?? true;
    this.maxTopK = options.maxTopK ?? 30;
  }

  get size(): number {
    return this.records.size;
  }

  async putVectors(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;

    const dimension = this.dimension ?? records[0].vector.length;
    for (const record of records) {
      if (record.vector.length === 0) {
        throw new BackendFailure("Validation", `Vector ${record.key} is empty`);
      }
      if (record.vector.length !== dimension) {
        throw new BackendFailure(
          "DimensionMismatch",
          `Invalid vector dimension for ${record.key}: expected ${dimension}, got ${record.vector.length}`
        );
      }
    }

    this.dimension = dimension;
    // upsert by key
    for (const record of records) {
      this.records.set(record.key, {
        key: record.key,
        vector: [...record.vector],
        metadata: { ...record.metadata },
      });
    }
  }

  async queryVectors(query: VectorQuery): Promise<VectorQueryHit[]> {
    if (!Number.isInteger(query.topK) || query.topK < 1 || query.topK > this.maxTopK) {
      throw new BackendFailure("Validation", `topK must be between 1 and ${this.maxTopK}, got ${query.topK}`);
    }
    if (this.dimension === undefined) {
      throw new BackendFailure("IndexEmpty", "Index has no vectors, so its dimension is not known yet");
    }
    if (query.vector.length !== this.dimension) {
      throw new BackendFailure(
        "DimensionMismatch",
        `Query vector dimension ${query.vector.length} does not match index dimension ${this.dimension}`
      );
    }

    return [...this.records.values()]
      .filter((record) => this.matchesFilter(record.metadata, query.filter))
      .map((record) => ({
        record,
        distance: 1 - rawCosineSimilarity(query.vector, record.vector),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, query.topK)
      .map(({ record, distance }) => ({
        key: record.key,
        distance: query.returnDistance ? distance : undefined,
        metadata: query.returnMetadata ? { ...record.metadata } : undefined,
      }));
  }

  async getVectors(keys: string[]): Promise<VectorQueryHit[]> {
    const hits: VectorQueryHit[] = [];
    for (const key of keys) {
      const record = this.records.get(key);
      if (record) {
        hits.push({ key, metadata: { ...record.metadata } });
      }
    }
    return hits;
  }

  async deleteVectors(keys: string[]): Promise<void> {
    if (!this.supportsDelete) {
      throw new BackendFailure("Validation", "Vector deletion is disabled for this index");
    }
    for (const key of keys) {
      this.records.delete(key);
    }
  }

  describe(): VectorBackendDescription {
    return { provider: "memory" };
  }

  // Exact match on every filter field, compared as strings
  private matchesFilter(metadata: VectorMetadata, filter?: MetadataFilter): boolean {
    if (!filter) return true;
    return Object.entries(filter).every(([key, value]) => metadata[key] === String(value));
  }
}
