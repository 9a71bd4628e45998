import { constants, Stats } from "fs";
import { access, stat } from "fs/promises";
import { basename } from "path";
import {
  BatchVerdict,
  FileCandidate,
  InvalidFile,
  ValidatedFile,
  ValidationRules,
  ValidationVerdict,
} from "../../domain/entities/file-candidate";
import { ValidationFailureKind } from "../../domain/enums/validation.failure.kind";
import { ValidationFailure } from "../../domain/errors/service.errors";
import { fileExtension, isMimeTypeAllowed, resolveMimeType } from "../../domain/utils/mime.type";

const MB = 1024 * 1024;

export interface ValidationLimits {
  maxFileSizeBytes: number;
  maxBatchSizeBytes: number;
  allowedMimeTypes: ReadonlySet<string>;
  blockedExtensions: ReadonlySet<string>;
  allowEmptyFiles: boolean;
}

function formatMB(bytes: number): string {
  return `${(bytes / MB).toFixed(1)}MB`;
}

function invalid(path: string, kind: ValidationFailureKind, reason: string): ValidationVerdict {
  return { valid: false, path, kind, reason };
}

/**
 * Gate in front of every upload. Rejects files before any embedding or backend work.
 */
export class FileValidationService {
  constructor(private limits: ValidationLimits) {}

  /**
   * Checks one file. Rules run in order and the first failure wins:
   * existence, readability, regular file, size, blocked extension, MIME type.
   */
  async validate(candidate: FileCandidate): Promise<ValidationVerdict> {
    const { path } = candidate;
    if (!path.trim()) {
      return invalid(path, "InvalidPath", "File path is empty");
    }

    let stats: Stats;
    try {
      stats = await stat(path);
    } catch {
      return invalid(path, "NotFound", `File does not exist: ${path}`);
    }

    try {
      await access(path, constants.R_OK);
    } catch {
      return invalid(path, "NotFound", `File is not readable: ${path}`);
    }

    if (!stats.isFile()) {
      return invalid(path, "InvalidPath", `Path is not a file: ${path}`);
    }
    const size = stats.size;

    if (size === 0 && !this.limits.allowEmptyFiles) {
      return invalid(path, "Empty", "File is empty");
    }
    if (size > this.limits.maxFileSizeBytes) {
      return invalid(
        path,
        "SizeExceeded",
        `File size (${formatMB(size)}) exceeds maximum allowed size (${formatMB(this.limits.maxFileSizeBytes)})`
      );
    }

    const extension = fileExtension(path);
    if (extension && this.limits.blockedExtensions.has(extension)) {
      return invalid(path, "BlockedExtension", `File extension '${extension}' is not allowed`);
    }

    const contentType = resolveMimeType(path, candidate.declaredContentType);
    if (!isMimeTypeAllowed(contentType, this.limits.allowedMimeTypes)) {
      return invalid(path, "DisallowedType", `File type '${contentType}' is not allowed`);
    }

    return {
      valid: true,
      file: {
        path,
        fileName: basename(path),
        fileSize: size,
        extension,
        contentType,
      },
    };
  }

  /**
   * Checks a batch. An aggregate size above the batch limit rejects every
   * file with BatchTooLarge, ahead of any per-file rule.
   */
  async validateBatch(candidates: FileCandidate[]): Promise<BatchVerdict> {
    let totalSizeBytes = 0;
    for (const candidate of candidates) {
      totalSizeBytes += await this.readableSize(candidate.path);
    }

    if (totalSizeBytes > this.limits.maxBatchSizeBytes) {
      const reason =
        `Total batch size (${formatMB(totalSizeBytes)}) exceeds maximum allowed ` +
        `batch size (${formatMB(this.limits.maxBatchSizeBytes)})`;
      console.warn(`[FileValidationService] ${reason}`);

      const invalidFiles: InvalidFile[] = candidates.map((candidate) => ({
        path: candidate.path,
        kind: "BatchTooLarge",
        reason,
      }));
      return {
        verdicts: invalidFiles.map((file) => invalid(file.path, file.kind, file.reason)),
        validFiles: [],
        invalidFiles,
        totalFiles: candidates.length,
        totalSizeBytes,
        batchFailure: { path: "", kind: "BatchTooLarge", reason },
      };
    }

    const verdicts: ValidationVerdict[] = [];
    const validFiles: ValidatedFile[] = [];
    const invalidFiles: InvalidFile[] = [];
    for (const candidate of candidates) {
      const verdict = await this.validate(candidate);
      verdicts.push(verdict);
      if (verdict.valid) {
        validFiles.push(verdict.file);
      } else {
        invalidFiles.push({ path: verdict.path, kind: verdict.kind, reason: verdict.reason });
      }
    }

    return {
      verdicts,
      validFiles,
      invalidFiles,
      totalFiles: candidates.length,
      totalSizeBytes,
    };
  }

  async validateOrThrow(candidate: FileCandidate): Promise<ValidatedFile> {
    const verdict = await this.validate(candidate);
    if (!verdict.valid) {
      throw new ValidationFailure(verdict.kind, verdict.reason, verdict.path);
    }
    return verdict.file;
  }

  describeRules(): ValidationRules {
    return {
      maxFileSizeMB: this.limits.maxFileSizeBytes / MB,
      maxBatchSizeMB: this.limits.maxBatchSizeBytes / MB,
      allowEmptyFiles: this.limits.allowEmptyFiles,
      allowedMimeTypes: [...this.limits.allowedMimeTypes].sort(),
      blockedExtensions: [...this.limits.blockedExtensions].sort(),
    };
  }

  // 0 for anything missing or not a regular file
  private async readableSize(path: string): Promise<number> {
    try {
      const stats = await stat(path);
      return stats.isFile() ? stats.size : 0;
    } catch {
      return 0;
    }
  }
}
