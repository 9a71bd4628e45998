import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { access, mkdir, mkdtemp, rm, truncate, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { ValidationFailure } from "../../domain/errors/service.errors";
import { FileValidationService, ValidationLimits } from "./file.validation.service";

// Permission bits do not stop root, so unreadable paths are simulated through access
vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return { ...actual, access: vi.fn(actual.access) };
});

const MB = 1024 * 1024;

const defaultLimits: ValidationLimits = {
  maxFileSizeBytes: 50 * MB,
  maxBatchSizeBytes: 200 * MB,
  allowedMimeTypes: new Set(["text/*", "application/pdf", "image/*"]),
  blockedExtensions: new Set([".exe", ".bat"]),
  allowEmptyFiles: false,
};

describe("FileValidationService", () => {
  let dir: string;

  async function createFile(name: string, content: string | Buffer = "hello"): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "file-validation-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("validate", () => {
    const service = new FileValidationService(defaultLimits);

    it("accepts an allowed file and resolves its details", async () => {
      const path = await createFile("notes.txt");

      const verdict = await service.validate({ path });

      expect(verdict).toEqual({
        valid: true,
        file: {
          path,
          fileName: "notes.txt",
          fileSize: 5,
          extension: ".txt",
          contentType: "text/plain",
        },
      });
    });

    it("reports missing files as NotFound", async () => {
      const path = join(dir, "missing.txt");

      const verdict = await service.validate({ path });

      expect(verdict).toEqual({ valid: false, path, kind: "NotFound", reason: `File does not exist: ${path}` });
    });

    it("reports directories as InvalidPath", async () => {
      const path = join(dir, "folder");
      await mkdir(path);

      const verdict = await service.validate({ path });

      expect(verdict.valid).toBe(false);
      expect(verdict.valid ? undefined : verdict.kind).toBe("InvalidPath");
    });

    it("checks readability before the regular-file rule", async () => {
      const path = join(dir, "locked");
      await mkdir(path);
      vi.mocked(access).mockRejectedValueOnce(Object.assign(new Error("permission denied"), { code: "EACCES" }));

      const verdict = await service.validate({ path });

      expect(verdict).toEqual({ valid: false, path, kind: "NotFound", reason: `File is not readable: ${path}` });
    });

    it("rejects empty files unless allowed", async () => {
      const path = await createFile("empty.txt", "");

      const rejected = await service.validate({ path });
      const accepted = await new FileValidationService({ ...defaultLimits, allowEmptyFiles: true }).validate({ path });

      expect(rejected.valid ? undefined : rejected.kind).toBe("Empty");
      expect(accepted.valid).toBe(true);
    });

    it("rejects files above the size limit", async () => {
      const path = await createFile("big.txt", "x".repeat(11));
      const small = new FileValidationService({ ...defaultLimits, maxFileSizeBytes: 10 });

      const verdict = await small.validate({ path });

      expect(verdict.valid ? undefined : verdict.kind).toBe("SizeExceeded");
    });

    it("rejects blocked extensions regardless of case", async () => {
      const path = await createFile("SETUP.EXE");

      const verdict = await service.validate({ path });

      expect(verdict).toEqual({
        valid: false,
        path,
        kind: "BlockedExtension",
        reason: "File extension '.exe' is not allowed",
      });
    });

    it("rejects disallowed MIME types", async () => {
      const path = await createFile("data.json", "{}");

      const verdict = await service.validate({ path });

      expect(verdict).toEqual({
        valid: false,
        path,
        kind: "DisallowedType",
        reason: "File type 'application/json' is not allowed",
      });
    });

    it("uses the declared content type when given", async () => {
      const path = await createFile("data.json", "{}");

      const verdict = await service.validate({ path, declaredContentType: "Text/Plain" });

      expect(verdict.valid ? verdict.file.contentType : undefined).toBe("text/plain");
    });

    it("checks the size before the extension", async () => {
      const path = await createFile("empty.exe", "");

      const verdict = await service.validate({ path });

      expect(verdict.valid ? undefined : verdict.kind).toBe("Empty");
    });
  });

  describe("validateOrThrow", () => {
    it("throws a ValidationFailure carrying the kind and path", async () => {
      const service = new FileValidationService(defaultLimits);
      const path = join(dir, "missing.txt");

      const error = await service.validateOrThrow({ path }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationFailure);
      expect(error).toMatchObject({ name: "ValidationFailure", kind: "NotFound", path });
    });
  });

  describe("validateBatch", () => {
    it("rejects the whole batch when the total exceeds the batch limit", async () => {
      const service = new FileValidationService(defaultLimits);
      const paths: string[] = [];
      for (const name of ["a.txt", "b.txt", "c.txt"]) {
        const path = await createFile(name, "");
        await truncate(path, 80 * MB);
        paths.push(path);
      }

      const verdict = await service.validateBatch(paths.map((path) => ({ path })));

      expect(verdict.validFiles).toEqual([]);
      expect(verdict.totalFiles).toBe(3);
      expect(verdict.totalSizeBytes).toBe(240 * MB);
      expect(verdict.batchFailure?.kind).toBe("BatchTooLarge");
      expect(verdict.invalidFiles.map((file) => file.kind)).toEqual(["BatchTooLarge", "BatchTooLarge", "BatchTooLarge"]);
      expect(verdict.invalidFiles.map((file) => file.path)).toEqual(paths);
    });

    it("reports per-file verdicts in input order when the batch fits", async () => {
      const service = new FileValidationService(defaultLimits);
      const good = await createFile("good.txt");
      const missing = join(dir, "missing.txt");
      const blocked = await createFile("run.bat");

      const verdict = await service.validateBatch([{ path: good }, { path: missing }, { path: blocked }]);

      expect(verdict.batchFailure).toBeUndefined();
      expect(verdict.verdicts.map((entry) => entry.valid)).toEqual([true, false, false]);
      expect(verdict.validFiles.map((file) => file.path)).toEqual([good]);
      expect(verdict.invalidFiles.map((file) => file.kind)).toEqual(["NotFound", "BlockedExtension"]);
      expect(verdict.totalSizeBytes).toBe(10);
    });

    it("handles an empty batch", async () => {
      const verdict = await new FileValidationService(defaultLimits).validateBatch([]);

      expect(verdict).toEqual({ verdicts: [], validFiles: [], invalidFiles: [], totalFiles: 0, totalSizeBytes: 0 });
    });
  });

  it("describes the active rules", () => {
    expect(new FileValidationService(defaultLimits).describeRules()).toEqual({
      maxFileSizeMB: 50,
      maxBatchSizeMB: 200,
      allowEmptyFiles: false,
      allowedMimeTypes: ["application/pdf", "image/*", "text/*"],
      blockedExtensions: [".bat", ".exe"],
    });
  });
});
