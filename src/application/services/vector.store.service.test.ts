import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { BackendFailure, QuerySpecError, ValidationFailure } from "../../domain/errors/service.errors";
import { IEmbeddingProvider } from "../../domain/interfaces/iembedding.provider";
import { IFileStorage } from "../../domain/interfaces/ifile.storage";
import { HashingEmbeddingProvider } from "../../infrastructure/embedding/hashing.embedding.provider";
import { InMemoryVectorBackend } from "../../infrastructure/vector/in.memory.vector.backend";
import { EmbeddingPipeline } from "../pipeline/embedding.pipeline";
import { FileValidationService, ValidationLimits } from "./file.validation.service";
import { VectorStoreOptions, VectorStoreService } from "./vector.store.service";

const MB = 1024 * 1024;

const limits: ValidationLimits = {
  maxFileSizeBytes: 50 * MB,
  maxBatchSizeBytes: 200 * MB,
  allowedMimeTypes: new Set(["text/*", "application/pdf", "image/*"]),
  blockedExtensions: new Set([".exe", ".bat"]),
  allowEmptyFiles: false,
};

const storeOptions: VectorStoreOptions = {
  defaultTopK: 10,
  maxTopK: 30,
  defaultSimilarityThreshold: 0,
  defaultListLimit: 10,
};

class MemoryFileStorage implements IFileStorage {
  objects = new Map<string, string>();

  async storeFile(filePath: string, key: string): Promise<{ bucket: string; key: string }> {
    this.objects.set(key, filePath);
    return { bucket: "test-bucket", key };
  }

  async deleteFile(key: string): Promise<void> {
    this.objects.delete(key);
  }
}

class FailingProvider implements IEmbeddingProvider {
  readonly modelId = "broken-model";
  readonly dimension = 384;

  async embedTexts(): Promise<number[][]> {
    throw new Error("service unreachable");
  }
}

// Fails any input containing the word "poison", embeds the rest
class SelectiveProvider implements IEmbeddingProvider {
  readonly modelId = "selective-model";
  readonly dimension = 384;
  private inner = new HashingEmbeddingProvider(384);

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.some((text) => text.includes("poison"))) {
      throw new Error("rejected input");
    }
    return this.inner.embedTexts(texts);
  }
}

function createPipeline(provider: IEmbeddingProvider = new HashingEmbeddingProvider(384)): EmbeddingPipeline {
  return new EmbeddingPipeline(
    provider,
    { encode: async () => Buffer.from("img") },
    { extractPages: async () => [] },
    { maxTextLength: 512, truncationStrategy: "end", image: { width: 224, height: 224, format: "jpeg" } }
  );
}

describe("VectorStoreService", () => {
  let dir: string;
  let backend: InMemoryVectorBackend;
  let service: VectorStoreService;

  async function createFile(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vector-store-"));
    backend = new InMemoryVectorBackend();
    service = new VectorStoreService(new FileValidationService(limits), createPipeline(), backend, storeOptions);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe("upload and query", () => {
    it("finds an uploaded file by a related text query", async () => {
      const text = "Python is a programming language used for data science";
      const python = await service.upload(await createFile("python.txt", text));
      await service.upload(await createFile("bananas.txt", "Bananas grow in tropical climates"));

      const result = await service.query({ text: "data science programming" });

      expect(python.fileName).toBe("python.txt");
      expect(python.fileSize).toBe(Buffer.byteLength(text));
      expect(python.contentType).toBe("text/plain");
      expect(python.dimension).toBe(384);
      expect(result.matches).toHaveLength(2);
      expect(result.matches[0].key).toBe(python.key);
      expect(result.matches[0].similarity).toBeGreaterThan(0.3);
      expect(result.matches[0].metadata.file_name).toBe("python.txt");
      expect(result.queryVector).toHaveLength(384);
    });

    it("writes derived metadata, overridden by caller metadata", async () => {
      const path = await createFile("notes.txt", "meeting notes");

      const uploaded = await service.upload(path, {
        metadata: { category: "docs", priority: 2, file_name: "renamed.txt" },
      });
      const stored = await service.get(uploaded.key);

      expect(stored?.fileName).toBe("renamed.txt");
      expect(stored?.fileSize).toBe(13);
      expect(stored?.metadata).toMatchObject({
        category: "docs",
        priority: "2",
        content_type: "text/plain",
        embedding_model: "hashing-fnv1a",
        source_file_path: path,
        uploaded_at: uploaded.uploadedAt,
      });
    });

    it("leaves out source_file_path for temporary upload files", async () => {
      const path = await createFile("upload-1234.txt", "meeting notes");

      const uploaded = await service.upload(path, { fileName: "notes.txt", temporaryPath: true });
      const stored = await service.get(uploaded.key);

      expect(stored?.fileName).toBe("notes.txt");
      expect(stored?.metadata.source_file_path).toBeUndefined();
    });

    it("rejects invalid files before contacting the backend", async () => {
      const putVectors = vi.spyOn(backend, "putVectors");
      const queryVectors = vi.spyOn(backend, "queryVectors");

      await expect(service.upload(join(dir, "missing.txt"))).rejects.toBeInstanceOf(ValidationFailure);
      await expect(service.upload(await createFile("tool.exe", "MZ"))).rejects.toMatchObject({
        kind: "BlockedExtension",
      });
      expect(putVectors).not.toHaveBeenCalled();
      expect(queryVectors).not.toHaveBeenCalled();
    });

    it("clamps top_k to the backend maximum", async () => {
      await service.upload(await createFile("a.txt", "alpha"));

      const result = await service.query({ text: "alpha", topK: 10000 });

      expect(result.requestedTopK).toBe(10000);
      expect(result.effectiveTopK).toBe(30);
    });

    it("returns a subset of results as the threshold rises", async () => {
      await service.upload(await createFile("a.txt", "red apples and green pears"));
      await service.upload(await createFile("b.txt", "green pears only"));
      await service.upload(await createFile("c.txt", "blue whales swim"));

      let previous: string[] | undefined;
      for (const threshold of [0, 0.2, 0.5, 0.9]) {
        const result = await service.query({ text: "green pears", threshold });
        const keys = result.matches.map((match) => match.key);

        for (const match of result.matches) {
          expect(match.similarity).toBeGreaterThanOrEqual(threshold);
        }
        if (previous) {
          expect(previous).toEqual(expect.arrayContaining(keys));
        }
        previous = keys;
      }
    });

    it("filters by metadata", async () => {
      await service.upload(await createFile("a.txt", "shared words"), { metadata: { team: "red" } });
      const blue = await service.upload(await createFile("b.txt", "shared words"), { metadata: { team: "blue" } });

      const result = await service.query({ text: "shared words", metadataFilter: { team: "blue" } });

      expect(result.matches.map((match) => match.key)).toEqual([blue.key]);
    });

    it("rejects malformed queries", async () => {
      await expect(service.query({})).rejects.toBeInstanceOf(QuerySpecError);
      await expect(service.query({ text: "a", vector: [1] })).rejects.toBeInstanceOf(QuerySpecError);
      await expect(service.query({ text: "a", topK: 0 })).rejects.toBeInstanceOf(QuerySpecError);
      await expect(service.query({ text: "a", topK: 2.5 })).rejects.toBeInstanceOf(QuerySpecError);
      await expect(service.query({ text: "a", threshold: 1.5 })).rejects.toBeInstanceOf(QuerySpecError);
      await expect(service.query({ text: "   " })).rejects.toBeInstanceOf(QuerySpecError);
      await expect(service.query({ vector: [] })).rejects.toBeInstanceOf(QuerySpecError);
    });

    it("surfaces a query vector of the wrong dimension as a backend failure", async () => {
      await service.upload(await createFile("a.txt", "alpha"));

      await expect(service.query({ vector: [1, 0, 0] })).rejects.toMatchObject({
        name: "BackendFailure",
        kind: "DimensionMismatch",
      });
    });
  });

  describe("list and get", () => {
    it("returns null for an unknown key", async () => {
      expect(await service.get("no-such-key")).toBeNull();

      await service.upload(await createFile("a.txt", "alpha"));
      expect(await service.get("no-such-key")).toBeNull();
    });

    it("lists stored files up to the limit", async () => {
      expect(await service.list()).toEqual([]);

      for (const name of ["a.txt", "b.txt", "c.txt"]) {
        await service.upload(await createFile(name, `content of ${name}`));
      }

      expect(await service.list()).toHaveLength(3);
      expect(await service.list(2)).toHaveLength(2);
      expect((await service.list()).map((file) => file.fileName).sort()).toEqual(["a.txt", "b.txt", "c.txt"]);
    });

    it("rejects a non-positive limit", async () => {
      await expect(service.list(0)).rejects.toBeInstanceOf(QuerySpecError);
    });

    it("raises a dimension mismatch from a populated index instead of reading it as empty", async () => {
      await backend.putVectors([{ key: "small", vector: [1, 0, 0], metadata: {} }]);

      await expect(service.list()).rejects.toMatchObject({ kind: "DimensionMismatch" });
      await expect(service.get("small")).rejects.toMatchObject({ kind: "DimensionMismatch" });
    });
  });

  describe("uploadBatch", () => {
    it("isolates per-file failures", async () => {
      const good = await createFile("good.txt", "good content");
      const missing = join(dir, "missing.txt");
      const blocked = await createFile("run.exe", "MZ");

      const result = await service.uploadBatch([{ path: good }, { path: missing }, { path: blocked }]);

      expect(result.total).toBe(3);
      expect(result.successCount).toBe(1);
      expect(result.uploaded).toEqual([{ key: expect.any(String), path: good, fileName: "good.txt" }]);
      expect(result.failed.map((failure) => [failure.path, failure.kind])).toEqual([
        [missing, "NotFound"],
        [blocked, "BlockedExtension"],
      ]);
      expect(backend.size).toBe(1);
    });

    it("fails only the file whose embedding fails", async () => {
      const store = new VectorStoreService(
        new FileValidationService(limits),
        createPipeline(new SelectiveProvider()),
        backend,
        storeOptions
      );
      const good = await createFile("good.txt", "healthy content");
      const bad = await createFile("bad.txt", "poison content");

      const result = await store.uploadBatch([{ path: good }, { path: bad }]);

      expect(result.successCount).toBe(1);
      expect(result.uploaded.map((entry) => entry.path)).toEqual([good]);
      expect(result.failed).toEqual([
        { path: bad, error: "Embedding model selective-model failed: rejected input" },
      ]);
      expect(backend.size).toBe(1);
    });

    it("fails every embedded file when the batch write fails", async () => {
      vi.spyOn(backend, "putVectors").mockRejectedValueOnce(new BackendFailure("Unavailable", "index offline"));
      const a = await createFile("a.txt", "alpha");
      const b = await createFile("b.txt", "beta");

      const result = await service.uploadBatch([{ path: a }, { path: b }]);

      expect(result.successCount).toBe(0);
      expect(result.uploaded).toEqual([]);
      expect(result.failed).toEqual([
        { path: a, error: "index offline" },
        { path: b, error: "index offline" },
      ]);
    });

    it("rejects the whole batch when it is too large", async () => {
      const small = new VectorStoreService(
        new FileValidationService({ ...limits, maxBatchSizeBytes: 10 }),
        createPipeline(),
        backend,
        storeOptions
      );
      const putVectors = vi.spyOn(backend, "putVectors");
      const a = await createFile("a.txt", "12345678");
      const b = await createFile("b.txt", "12345678");

      const result = await small.uploadBatch([{ path: a }, { path: b }]);

      expect(result.successCount).toBe(0);
      expect(result.failed.map((failure) => failure.kind)).toEqual(["BatchTooLarge", "BatchTooLarge"]);
      expect(putVectors).not.toHaveBeenCalled();
    });
  });

  describe("delete", () => {
    it("deletes a stored file", async () => {
      const uploaded = await service.upload(await createFile("a.txt", "alpha"));

      expect(await service.delete(uploaded.key)).toBe("deleted");
      expect(await service.get(uploaded.key)).toBeNull();
    });

    it("reports unknown keys as not found", async () => {
      expect(await service.delete("no-such-key")).toBe("not_found");
    });

    it("deletes records that the capped listing does not reach", async () => {
      const records = Array.from({ length: storeOptions.maxTopK + 1 }, (_, index) => {
        const vector = new Array<number>(384).fill(0);
        vector[index] = 1;
        return { key: `record-${index}`, vector, metadata: { file_name: `f${index}.txt` } };
      });
      await backend.putVectors(records);
      const listed = new Set((await service.list(storeOptions.maxTopK)).map((file) => file.key));
      const unlisted = records.map((record) => record.key).filter((key) => !listed.has(key));

      expect(unlisted).toHaveLength(1);
      expect(await service.get(unlisted[0])).toBeNull();
      expect(await service.delete(unlisted[0])).toBe("deleted");
      expect(backend.size).toBe(storeOptions.maxTopK);
      expect(await backend.getVectors([unlisted[0]])).toEqual([]);
    });

    it("reports not supported when the backend cannot delete", async () => {
      const readOnly = new InMemoryVectorBackend({ supportsDelete: false });
      const store = new VectorStoreService(new FileValidationService(limits), createPipeline(), readOnly, storeOptions);
      const uploaded = await store.upload(await createFile("a.txt", "alpha"));

      expect(await store.delete(uploaded.key)).toBe("not_supported");
      expect(await store.get(uploaded.key)).not.toBeNull();
    });
  });

  describe("raw file storage", () => {
    it("stores the raw file beside its vector and removes it on delete", async () => {
      const storage = new MemoryFileStorage();
      const store = new VectorStoreService(
        new FileValidationService(limits),
        createPipeline(),
        backend,
        storeOptions,
        storage
      );

      const uploaded = await store.upload(await createFile("a.txt", "alpha"));

      expect(uploaded.storageKey).toBe(`files/${uploaded.key}/a.txt`);
      expect((await store.get(uploaded.key))?.storageKey).toBe(uploaded.storageKey);
      expect([...storage.objects.keys()]).toEqual([uploaded.storageKey]);

      await store.delete(uploaded.key);
      expect(storage.objects.size).toBe(0);
    });

    it("removes the raw file when the vector write fails", async () => {
      const storage = new MemoryFileStorage();
      const store = new VectorStoreService(
        new FileValidationService(limits),
        createPipeline(),
        backend,
        storeOptions,
        storage
      );
      vi.spyOn(backend, "putVectors").mockRejectedValueOnce(new BackendFailure("AccessDenied", "denied"));

      await expect(store.upload(await createFile("a.txt", "alpha"))).rejects.toMatchObject({ kind: "AccessDenied" });
      expect(storage.objects.size).toBe(0);
    });
  });

  describe("health", () => {
    it("is healthy with an empty index", async () => {
      const report = await service.health();

      expect(report).toMatchObject({
        status: "healthy",
        embeddingService: true,
        vectorBackend: true,
        vectorDimension: 384,
        embeddingModel: "hashing-fnv1a",
        backendProvider: "memory",
        error: undefined,
      });
      expect(report.notes).toEqual(["Vector index is empty and has no dimension yet"]);
    });

    it("is healthy with a populated index", async () => {
      await service.upload(await createFile("a.txt", "alpha"));

      const report = await service.health();

      expect(report.status).toBe("healthy");
      expect(report.notes).toEqual([]);
    });

    it("is unhealthy when the embedding model fails", async () => {
      const broken = new VectorStoreService(
        new FileValidationService(limits),
        createPipeline(new FailingProvider()),
        backend,
        storeOptions
      );

      const report = await broken.health();

      expect(report.status).toBe("unhealthy");
      expect(report.embeddingService).toBe(false);
      expect(report.vectorBackend).toBe(true);
      expect(report.error).toBe("Embedding service: Embedding model broken-model failed: service unreachable");
    });

    it("is unhealthy when a populated index has another dimension", async () => {
      await backend.putVectors([{ key: "small", vector: [1, 0, 0], metadata: {} }]);

      const report = await service.health();

      expect(report.status).toBe("unhealthy");
      expect(report.embeddingService).toBe(true);
      expect(report.vectorBackend).toBe(false);
      expect(report.notes).toEqual([]);
      expect(report.error).toBe("Vector backend: Query vector dimension 384 does not match index dimension 3");
    });

    it("is unhealthy when the backend fails for other reasons", async () => {
      vi.spyOn(backend, "queryVectors").mockRejectedValueOnce(new BackendFailure("AccessDenied", "denied"));

      const report = await service.health();

      expect(report.status).toBe("unhealthy");
      expect(report.vectorBackend).toBe(false);
      expect(report.error).toBe("Vector backend: denied");
    });
  });
});
