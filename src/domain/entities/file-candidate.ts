import { ValidationFailureKind } from "../enums/validation.failure.kind";

export interface FileCandidate {
  path: string;
  declaredContentType?: string; // Inferred from the extension when absent
}

export interface ValidatedFile {
  path: string;
  fileName: string;
  fileSize: number; // Bytes
  extension: string; // Lower-cased, with leading dot ("" when none)
  contentType: string; // Normalized (lower-cased) MIME type
}

export type ValidationVerdict =
  | { valid: true; file: ValidatedFile }
  | { valid: false; path: string; kind: ValidationFailureKind; reason: string };

export interface InvalidFile {
  path: string;
  kind: ValidationFailureKind;
  reason: string;
}

export interface BatchVerdict {
  verdicts: ValidationVerdict[]; // One per candidate, in input order
  validFiles: ValidatedFile[];
  invalidFiles: InvalidFile[];
  totalFiles: number;
  totalSizeBytes: number; // Sum over every candidate whose size could be read
  // Set when the aggregate size check rejected the whole batch
  batchFailure?: InvalidFile;
}

export interface ValidationRules {
  maxFileSizeMB: number;
  maxBatchSizeMB: number;
  allowEmptyFiles: boolean;
  allowedMimeTypes: string[];
  blockedExtensions: string[];
}
