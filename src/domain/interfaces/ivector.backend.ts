import { MetadataFilter, VectorMetadata, VectorRecord } from "../entities/vector-record";

export interface VectorQuery {
  vector: number[];
  topK: number;
  filter?: MetadataFilter;
  returnDistance: boolean;
  returnMetadata: boolean;
}

export interface VectorQueryHit {
  key: string;
  distance?: number;
  metadata?: VectorMetadata;
}

export interface VectorBackendDescription {
  provider: string;
  bucketName?: string;
  indexName?: string;
  region?: string;
}

/**
 * Managed similarity-search backend. Implementations raise BackendFailure.
 */
export interface IVectorBackend {
  /** False when the deployment offers no delete primitive. */
  readonly supportsDelete: boolean;

  putVectors(records: VectorRecord[]): Promise<void>;
  /** Hits ordered by ascending distance (descending similarity). */
  queryVectors(query: VectorQuery): Promise<VectorQueryHit[]>;
  /** Exact lookup by key with metadata; keys that do not exist are left out. */
  getVectors(keys: string[]): Promise<VectorQueryHit[]>;
  deleteVectors(keys: string[]): Promise<void>;
  describe(): VectorBackendDescription;
}
