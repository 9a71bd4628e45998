import { randomUUID } from "crypto";
import { ValidatedFile } from "../../domain/entities/file-candidate";
import {
  BatchUploadFailure,
  BatchUploadItem,
  BatchUploadResult,
  CallerMetadata,
  DeleteOutcome,
  FileSummary,
  HealthReport,
  QueryMatch,
  QueryResult,
  QuerySpec,
  UploadedFile,
  UploadOptions,
  VectorMetadata,
  VectorRecord,
} from "../../domain/entities/vector-record";
import { BackendFailure, QuerySpecError } from "../../domain/errors/service.errors";
import { IFileStorage } from "../../domain/interfaces/ifile.storage";
import { IVectorBackend, VectorQueryHit } from "../../domain/interfaces/ivector.backend";
import { DEFAULT_MIME_TYPE } from "../../domain/utils/mime.type";
import { clampUnit, placeholderVector } from "../../domain/utils/vector.math";
import { EmbeddingPipeline } from "../pipeline/embedding.pipeline";
import { FileValidationService } from "./file.validation.service";

export interface VectorStoreOptions {
  defaultTopK: number;
  maxTopK: number;
  defaultSimilarityThreshold: number;
  defaultListLimit: number;
}

interface PendingRecord {
  record: VectorRecord;
  path: string;
  fileName: string;
  storageKey?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/**
 * Upload, search, list, fetch and delete files by their embeddings.
 *
 * Listing and lookup by key run a placeholder query capped at maxTopK: they
 * are best-effort and miss records beyond the backend's single-query limit.
 */
export class VectorStoreService {
  constructor(
    private fileValidator: FileValidationService,
    private embeddingPipeline: EmbeddingPipeline,
    private vectorBackend: IVectorBackend,
    private options: VectorStoreOptions,
    private fileStorage?: IFileStorage
  ) {}

  async upload(filePath: string, options: UploadOptions = {}): Promise<UploadedFile> {
    const startTime = Date.now();
    const file = await this.fileValidator.validateOrThrow({
      path: filePath,
      declaredContentType: options.contentType,
    });

    const key = randomUUID();
    const fileName = options.fileName ?? file.fileName;
    console.log(`[VectorStoreService] Uploading ${fileName} (${file.fileSize} bytes) as ${key}`);

    const pending = await this.prepareRecord(key, file, fileName, options.metadata, options.temporaryPath);

    try {
      await this.vectorBackend.putVectors([pending.record]);
    } catch (error) {
      console.error(`[VectorStoreService] Failed to store vector ${key}:`, errorMessage(error));
      await this.removeStoredFile(pending.storageKey);
      throw error;
    }

    const uploadTimeMs = Date.now() - startTime;
    console.log(`[VectorStoreService] Uploaded ${fileName} as ${key} in ${uploadTimeMs}ms`);

    return {
      key,
      fileName,
      fileSize: file.fileSize,
      contentType: file.contentType,
      dimension: pending.record.vector.length,
      uploadedAt: pending.record.metadata.uploaded_at,
      storageKey: pending.storageKey,
      uploadTimeMs,
    };
  }

  /**
   * Validates the batch as a whole, embeds each valid file independently,
   * then writes every embedded record in one backend call. A failed write
   * fails every file that reached it.
   */
  async uploadBatch(items: BatchUploadItem[]): Promise<BatchUploadResult> {
    const verdict = await this.fileValidator.validateBatch(
      items.map((item) => ({ path: item.path, declaredContentType: item.contentType }))
    );

    const { batchFailure } = verdict;
    if (batchFailure) {
      return {
        uploaded: [],
        failed: items.map((item) => ({ path: item.path, error: batchFailure.reason, kind: batchFailure.kind })),
        total: items.length,
        successCount: 0,
      };
    }

    const failed: BatchUploadFailure[] = [];
    const pending: PendingRecord[] = [];

    for (let index = 0; index < items.length; index++) {
      const item = items[index];
      const itemVerdict = verdict.verdicts[index];
      if (!itemVerdict.valid) {
        failed.push({ path: item.path, error: itemVerdict.reason, kind: itemVerdict.kind });
        continue;
      }

      const file = itemVerdict.file;
      const fileName = item.fileName ?? file.fileName;
      try {
        pending.push(await this.prepareRecord(randomUUID(), file, fileName, item.metadata, item.temporaryPath));
      } catch (error) {
        console.error(`[VectorStoreService] Failed to embed ${item.path}:`, errorMessage(error));
        failed.push({ path: item.path, error: errorMessage(error) });
      }
    }

    if (pending.length > 0) {
      try {
        await this.vectorBackend.putVectors(pending.map((entry) => entry.record));
      } catch (error) {
        const message = errorMessage(error);
        console.error(`[VectorStoreService] Batch write of ${pending.length} vectors failed:`, message);
        for (const entry of pending) {
          await this.removeStoredFile(entry.storageKey);
          failed.push({ path: entry.path, error: message });
        }
        pending.length = 0;
      }
    }

    const uploaded = pending.map((entry) => ({
      key: entry.record.key,
      path: entry.path,
      fileName: entry.fileName,
    }));
    console.log(`[VectorStoreService] Batch upload: ${uploaded.length}/${items.length} succeeded`);

    return {
      uploaded,
      failed,
      total: items.length,
      successCount: uploaded.length,
    };
  }

  async query(request: QuerySpec): Promise<QueryResult> {
    const startTime = Date.now();

    if ((request.vector === undefined) === (request.text === undefined)) {
      throw new QuerySpecError("Provide exactly one of a query vector or a query text");
    }

    const requestedTopK = request.topK ?? this.options.defaultTopK;
    if (!isPositiveInteger(requestedTopK)) {
      throw new QuerySpecError(`top_k must be a positive integer, got ${requestedTopK}`);
    }
    const effectiveTopK = Math.min(requestedTopK, this.options.maxTopK);
    if (effectiveTopK < requestedTopK) {
      console.log(
        `[VectorStoreService] Requested top_k ${requestedTopK} exceeds the backend limit, using ${effectiveTopK}`
      );
    }

    const threshold = request.threshold ?? this.options.defaultSimilarityThreshold;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new QuerySpecError(`similarity_threshold must be between 0 and 1, got ${threshold}`);
    }

    let queryVector: number[];
    if (request.vector !== undefined) {
      if (request.vector.length === 0 || !request.vector.every((value) => Number.isFinite(value))) {
        throw new QuerySpecError("Query vector must be a non-empty list of finite numbers");
      }
      queryVector = request.vector;
    } else if (request.text !== undefined && request.text.trim()) {
      queryVector = await this.embeddingPipeline.embedText(request.text);
    } else {
      throw new QuerySpecError("Query text must not be empty");
    }

    const hits = await this.vectorBackend.queryVectors({
      vector: queryVector,
      topK: effectiveTopK,
      filter: request.metadataFilter,
      returnDistance: true,
      returnMetadata: true,
    });

    const matches: QueryMatch[] = hits
      .map((hit) => ({
        key: hit.key,
        similarity: hit.distance === undefined ? 0 : clampUnit(1 - hit.distance),
        metadata: hit.metadata ?? {},
      }))
      .filter((match) => match.similarity >= threshold);

    const queryTimeMs = Date.now() - startTime;
    console.log(
      `[VectorStoreService] Query returned ${matches.length} of ${hits.length} hits in ${queryTimeMs}ms`
    );

    return {
      matches,
      queryVector,
      requestedTopK,
      effectiveTopK,
      threshold,
      queryTimeMs,
    };
  }

  async list(limit?: number): Promise<FileSummary[]> {
    const requested = limit ?? this.options.defaultListLimit;
    if (!isPositiveInteger(requested)) {
      throw new QuerySpecError(`limit must be a positive integer, got ${requested}`);
    }

    const hits = await this.placeholderQuery(Math.min(requested, this.options.maxTopK));
    return hits.map((hit) => this.toSummary(hit));
  }

  async get(key: string): Promise<FileSummary | null> {
    const hits = await this.placeholderQuery(this.options.maxTopK);
    const hit = hits.find((candidate) => candidate.key === key);
    return hit ? this.toSummary(hit) : null;
  }

  /**
   * Looks the key up directly rather than through the capped placeholder
   * query, so records beyond maxTopK can still be deleted.
   */
  async delete(key: string): Promise<DeleteOutcome> {
    const [existing] = await this.vectorBackend.getVectors([key]);
    if (!existing) {
      return "not_found";
    }

    if (!this.vectorBackend.supportsDelete) {
      console.warn(`[VectorStoreService] Delete requested for ${key} but the vector backend does not support deletion`);
      return "not_supported";
    }

    await this.vectorBackend.deleteVectors([key]);
    await this.removeStoredFile(existing.metadata?.storage_key);
    console.log(`[VectorStoreService] Deleted ${key}`);
    return "deleted";
  }

  async health(): Promise<HealthReport> {
    const description = this.vectorBackend.describe();
    const notes: string[] = [];
    const errors: string[] = [];

    let embeddingService = false;
    try {
      const vector = await this.embeddingPipeline.embedText("health check");
      embeddingService = true;
      if (vector.length !== this.embeddingPipeline.dimension) {
        notes.push(
          `Embedding model returned ${vector.length} dimensions, configured for ${this.embeddingPipeline.dimension}`
        );
      }
    } catch (error) {
      errors.push(`Embedding service: ${errorMessage(error)}`);
    }

    let vectorBackend = false;
    try {
      await this.vectorBackend.queryVectors({
        vector: placeholderVector(this.embeddingPipeline.dimension),
        topK: 1,
        returnDistance: false,
        returnMetadata: false,
      });
      vectorBackend = true;
    } catch (error) {
      if (error instanceof BackendFailure && error.kind === "IndexEmpty") {
        vectorBackend = true;
        notes.push("Vector index is empty and has no dimension yet");
      } else {
        errors.push(`Vector backend: ${errorMessage(error)}`);
      }
    }

    const healthy = embeddingService && vectorBackend;
    if (!healthy) {
      console.error(`[VectorStoreService] Health check failed: ${errors.join("; ")}`);
    }

    return {
      status: healthy ? "healthy" : "unhealthy",
      embeddingService,
      vectorBackend,
      vectorDimension: this.embeddingPipeline.dimension,
      embeddingModel: this.embeddingPipeline.modelId,
      backendProvider: description.provider,
      vectorBucketName: description.bucketName,
      vectorIndexName: description.indexName,
      region: description.region,
      notes,
      error: errors.length > 0 ? errors.join("; ") : undefined,
      checkedAt: new Date().toISOString(),
    };
  }

  /**
   * Embeds a validated file, stores the raw file when storage is configured,
   * and assembles its record. Caller metadata overrides the derived fields.
   */
  private async prepareRecord(
    key: string,
    file: ValidatedFile,
    fileName: string,
    callerMetadata?: CallerMetadata,
    temporaryPath = false
  ): Promise<PendingRecord> {
    const vector = await this.embeddingPipeline.embedFile(file.path, file.contentType);

    const metadata: VectorMetadata = {
      file_name: fileName,
      file_size: String(file.fileSize),
      content_type: file.contentType,
      uploaded_at: new Date().toISOString(),
      embedding_model: this.embeddingPipeline.modelId,
    };
    if (!temporaryPath) {
      metadata.source_file_path = file.path;
    }
    for (const [name, value] of Object.entries(callerMetadata ?? {})) {
      metadata[name] = String(value);
    }

    let storageKey: string | undefined;
    if (this.fileStorage) {
      const stored = await this.fileStorage.storeFile(file.path, `files/${key}/${fileName}`, {
        contentType: file.contentType,
        metadata: { vector_key: key, file_name: fileName },
      });
      storageKey = stored.key;
      metadata.storage_key = storageKey;
    }

    return { record: { key, vector, metadata }, path: file.path, fileName, storageKey };
  }

  /**
   * An index with no records has no dimension yet; list and get read that as empty.
   */
  private async placeholderQuery(topK: number): Promise<VectorQueryHit[]> {
    try {
      return await this.vectorBackend.queryVectors({
        vector: placeholderVector(this.embeddingPipeline.dimension),
        topK,
        returnDistance: false,
        returnMetadata: true,
      });
    } catch (error) {
      if (error instanceof BackendFailure && error.kind === "IndexEmpty") {
        console.warn(`[VectorStoreService] Placeholder query rejected (${error.message}), treating index as empty`);
        return [];
      }
      throw error;
    }
  }

  private toSummary(hit: VectorQueryHit): FileSummary {
    const metadata = hit.metadata ?? {};
    const fileSize = Number.parseInt(metadata.file_size ?? "", 10);
    return {
      key: hit.key,
      fileName: metadata.file_name ?? "unknown",
      fileSize: Number.isFinite(fileSize) ? fileSize : 0,
      contentType: metadata.content_type ?? DEFAULT_MIME_TYPE,
      uploadedAt: metadata.uploaded_at,
      storageKey: metadata.storage_key,
      metadata,
    };
  }

  private async removeStoredFile(storageKey: string | undefined): Promise<void> {
    if (!storageKey || !this.fileStorage) {
      return;
    }
    try {
      await this.fileStorage.deleteFile(storageKey);
    } catch (error) {
      console.warn(`[VectorStoreService] Failed to remove stored file ${storageKey}:`, errorMessage(error));
    }
  }
}
