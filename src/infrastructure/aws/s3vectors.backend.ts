import {
  DeleteVectorsCommand,
  GetVectorsCommand,
  PutVectorsCommand,
  QueryVectorsCommand,
  S3VectorsClient,
} from "@aws-sdk/client-s3vectors";
import { MetadataFilter, VectorMetadata, VectorRecord } from "../../domain/entities/vector-record";
import { BackendFailure } from "../../domain/errors/service.errors";
import {
  IVectorBackend,
  VectorBackendDescription,
  VectorQuery,
  VectorQueryHit,
} from "../../domain/interfaces/ivector.backend";
import { toBackendFailure } from "./aws.error.classifier";

export interface S3VectorsBackendConfig {
  region: string;
  vectorBucketName: string;
  indexName: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  deleteEnabled?: boolean; // Some deployments have no delete permission on the index
}

/**
 * Flattens a metadata document returned by S3 Vectors into string values.
 */
export function toVectorMetadata(document: unknown): VectorMetadata | undefined {
  if (typeof document !== "object" || document === null || Array.isArray(document)) {
    return undefined;
  }

  const metadata: VectorMetadata = {};
  for (const [name, raw] of Object.entries(document)) {
    const value: unknown = raw;
    if (value === null || value === undefined) continue;
    metadata[name] = typeof value === "object" ? JSON.stringify(value) : String(value);
  }
  return metadata;
}

/**
 * Stored metadata is all strings, so filter values are compared as strings too.
 */
export function toFilterDocument(filter: MetadataFilter): Record<string, string> {
  return Object.fromEntries(Object.entries(filter).map(([name, value]) => [name, String(value)]));
}

/**
 * Vector backend over an S3 Vectors bucket and index, both fixed at construction.
 */
export class S3VectorsBackend implements IVectorBackend {
  readonly supportsDelete: boolean;
  private client: S3VectorsClient;

  constructor(private config: S3VectorsBackendConfig) {
    console.log(
      `[S3VectorsBackend] Initializing for ${config.vectorBucketName}/${config.indexName} in ${config.region}`
    );
    this.client = new S3VectorsClient({
      region: config.region,
      credentials: config.credentials,
    });
    this.supportsDelete = config.deleteEnabled ?? true;
  }

  async putVectors(records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;

    try {
      await this.client.send(
        new PutVectorsCommand({
          vectorBucketName: this.config.vectorBucketName,
          indexName: this.config.indexName,
          vectors: records.map((record) => ({
            key: record.key,
            data: { float32: record.vector },
            metadata: record.metadata,
          })),
        })
      );
      console.log(`[S3VectorsBackend] Stored ${records.length} vectors`);
    } catch (error) {
      throw toBackendFailure(error, "Failed to store vectors");
    }
  }

  async queryVectors(query: VectorQuery): Promise<VectorQueryHit[]> {
    try {
      const response = await this.client.send(
        new QueryVectorsCommand({
          vectorBucketName: this.config.vectorBucketName,
          indexName: this.config.indexName,
          topK: query.topK,
          queryVector: { float32: query.vector },
          filter: query.filter ? toFilterDocument(query.filter) : undefined,
          returnDistance: query.returnDistance,
          returnMetadata: query.returnMetadata,
        })
      );

      const hits: VectorQueryHit[] = [];
      for (const vector of response.vectors ?? []) {
        if (!vector.key) continue;
        hits.push({
          key: vector.key,
          distance: vector.distance,
          metadata: toVectorMetadata(vector.metadata),
        });
      }
      return hits;
    } catch (error) {
      throw toBackendFailure(error, "Failed to query vectors");
    }
  }

  async getVectors(keys: string[]): Promise<VectorQueryHit[]> {
    if (keys.length === 0) return [];

    try {
      const response = await this.client.send(
        new GetVectorsCommand({
          vectorBucketName: this.config.vectorBucketName,
          indexName: this.config.indexName,
          keys,
          returnData: false,
          returnMetadata: true,
        })
      );

      const hits: VectorQueryHit[] = [];
      for (const vector of response.vectors ?? []) {
        if (!vector.key) continue;
        hits.push({ key: vector.key, metadata: toVectorMetadata(vector.metadata) });
      }
      return hits;
    } catch (error) {
      throw toBackendFailure(error, "Failed to get vectors");
    }
  }

  async deleteVectors(keys: string[]): Promise<void> {
    if (!this.supportsDelete) {
      throw new BackendFailure("Validation", "Vector deletion is disabled for this index");
    }
    if (keys.length === 0) return;

    try {
      await this.client.send(
        new DeleteVectorsCommand({
          vectorBucketName: this.config.vectorBucketName,
          indexName: this.config.indexName,
          keys,
        })
      );
      console.log(`[S3VectorsBackend] Deleted ${keys.length} vectors`);
    } catch (error) {
      throw toBackendFailure(error, "Failed to delete vectors");
    }
  }

  describe(): VectorBackendDescription {
    return {
      provider: "s3vectors",
      bucketName: this.config.vectorBucketName,
      indexName: this.config.indexName,
      region: this.config.region,
    };
  }
}
