import { ValidationRules } from "../../domain/entities/file-candidate";
import {
  BatchUploadResult,
  FileSummary,
  HealthReport,
  QueryResult,
  UploadedFile,
  VectorMetadata,
} from "../../domain/entities/vector-record";
import { ValidationFailureKind } from "../../domain/enums/validation.failure.kind";

export interface UploadFileResponse {
  file_id: string;
  file_name: string;
  file_size: number;
  content_type: string;
  vector_dimension: number;
  uploaded_at: string;
  storage_key?: string;
  upload_time_ms: number;
}

export interface BatchUploadResponse {
  uploaded_files: { file_id: string; file_path: string; file_name: string }[];
  failed_files: { file_path: string; error: string; kind?: ValidationFailureKind }[];
  total_files: number;
  success_count: number;
}

export interface QueryResponse {
  results: { file_id: string; similarity_score: number; metadata: VectorMetadata }[];
  total_results: number;
  requested_top_k: number;
  effective_top_k: number;
  similarity_threshold?: number;
  query_time_ms: number;
  query_vector?: number[];
}

export interface FileInfoResponse {
  file_id: string;
  file_name: string;
  file_size: number;
  content_type: string;
  uploaded_at?: string;
  storage_key?: string;
  metadata: VectorMetadata;
}

export interface HealthResponse {
  status: "healthy" | "unhealthy";
  embedding_service: boolean;
  vector_backend: boolean;
  vector_dimension?: number;
  embedding_model: string;
  backend_provider: string;
  vector_bucket_name?: string;
  vector_index_name?: string;
  region?: string;
  notes: string[];
  error?: string;
  timestamp: string;
}

export interface ValidationConfigResponse {
  max_file_size_mb: number;
  max_batch_size_mb: number;
  allow_empty_files: boolean;
  allowed_file_types: string[];
  blocked_extensions: string[];
}

export function toUploadFileResponse(file: UploadedFile): UploadFileResponse {
  return {
    file_id: file.key,
    file_name: file.fileName,
    file_size: file.fileSize,
    content_type: file.contentType,
    vector_dimension: file.dimension,
    uploaded_at: file.uploadedAt,
    storage_key: file.storageKey,
    upload_time_ms: file.uploadTimeMs,
  };
}

export function toBatchUploadResponse(result: BatchUploadResult): BatchUploadResponse {
  return {
    uploaded_files: result.uploaded.map((file) => ({
      file_id: file.key,
      file_path: file.path,
      file_name: file.fileName,
    })),
    failed_files: result.failed.map((failure) => ({
      file_path: failure.path,
      error: failure.error,
      kind: failure.kind,
    })),
    total_files: result.total,
    success_count: result.successCount,
  };
}

export function toQueryResponse(result: QueryResult, includeVector: boolean): QueryResponse {
  return {
    results: result.matches.map((match) => ({
      file_id: match.key,
      similarity_score: match.similarity,
      metadata: match.metadata,
    })),
    total_results: result.matches.length,
    requested_top_k: result.requestedTopK,
    effective_top_k: result.effectiveTopK,
    similarity_threshold: result.threshold,
    query_time_ms: result.queryTimeMs,
    query_vector: includeVector ? result.queryVector : undefined,
  };
}

export function toFileInfoResponse(file: FileSummary): FileInfoResponse {
  return {
    file_id: file.key,
    file_name: file.fileName,
    file_size: file.fileSize,
    content_type: file.contentType,
    uploaded_at: file.uploadedAt,
    storage_key: file.storageKey,
    metadata: file.metadata,
  };
}

export function toHealthResponse(report: HealthReport): HealthResponse {
  return {
    status: report.status,
    embedding_service: report.embeddingService,
    vector_backend: report.vectorBackend,
    vector_dimension: report.vectorDimension,
    embedding_model: report.embeddingModel,
    backend_provider: report.backendProvider,
    vector_bucket_name: report.vectorBucketName,
    vector_index_name: report.vectorIndexName,
    region: report.region,
    notes: report.notes,
    error: report.error,
    timestamp: report.checkedAt,
  };
}

export function toValidationConfigResponse(rules: ValidationRules): ValidationConfigResponse {
  return {
    max_file_size_mb: rules.maxFileSizeMB,
    max_batch_size_mb: rules.maxBatchSizeMB,
    allow_empty_files: rules.allowEmptyFiles,
    allowed_file_types: rules.allowedMimeTypes,
    blocked_extensions: rules.blockedExtensions,
  };
}
