import { ValidationFailureKind } from "../enums/validation.failure.kind";

/**
 * Metadata as the backend stores it: every value is a string.
 */
export type VectorMetadata = Record<string, string>;

/**
 * Metadata a caller may attach to an upload. Non-string scalars are
 * stringified before they reach the backend.
 */
export type CallerMetadata = Record<string, string | number | boolean>;

/** Exact-match predicate over stored metadata fields. */
export type MetadataFilter = Record<string, string | number | boolean>;

export interface VectorRecord {
  key: string;
  vector: number[];
  metadata: VectorMetadata;
}

export interface QuerySpec {
  vector?: number[];
  text?: string;
  topK?: number;
  threshold?: number;
  metadataFilter?: MetadataFilter;
}

export interface QueryMatch {
  key: string;
  similarity: number; // In [0, 1]
  metadata: VectorMetadata;
}

export interface QueryResult {
  matches: QueryMatch[];
  queryVector: number[];
  requestedTopK: number;
  effectiveTopK: number; // After clamping to the configured maximum
  threshold?: number;
  queryTimeMs: number;
}

export interface FileSummary {
  key: string;
  fileName: string;
  fileSize: number;
  contentType: string;
  uploadedAt?: string;
  storageKey?: string;
  metadata: VectorMetadata;
}

export interface UploadOptions {
  metadata?: CallerMetadata;
  contentType?: string;
  fileName?: string; // Overrides the name taken from the path (multipart uploads land in temp files)
  temporaryPath?: boolean; // The path is removed after the upload, so it is not recorded as source_file_path
}

export interface UploadedFile {
  key: string;
  fileName: string;
  fileSize: number;
  contentType: string;
  dimension: number;
  uploadedAt: string;
  storageKey?: string;
  uploadTimeMs: number;
}

export interface BatchUploadItem extends UploadOptions {
  path: string;
}

export interface BatchUploadFailure {
  path: string;
  error: string;
  kind?: ValidationFailureKind;
}

export interface BatchUploadResult {
  uploaded: { key: string; path: string; fileName: string }[];
  failed: BatchUploadFailure[];
  total: number;
  successCount: number;
}

export type DeleteOutcome = "deleted" | "not_supported" | "not_found";

export interface HealthReport {
  status: "healthy" | "unhealthy";
  embeddingService: boolean;
  vectorBackend: boolean;
  vectorDimension?: number;
  embeddingModel: string;
  backendProvider: string;
  vectorBucketName?: string;
  vectorIndexName?: string;
  region?: string;
  notes: string[];
  error?: string;
  checkedAt: string;
}
