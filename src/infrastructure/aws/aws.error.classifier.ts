import { BackendFailureKind } from "../../domain/enums/backend.failure.kind";
import { BackendFailure } from "../../domain/errors/service.errors";

const ACCESS_DENIED = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "UnrecognizedClientException",
  "InvalidSignatureException",
  "SignatureDoesNotMatch",
  "InvalidAccessKeyId",
  "ExpiredToken",
  "ExpiredTokenException",
  "CredentialsProviderError",
]);

const NOT_FOUND = new Set(["NotFound", "NotFoundException", "ResourceNotFoundException", "NoSuchBucket", "NoSuchKey"]);

const THROTTLED = new Set([
  "ThrottlingException",
  "TooManyRequestsException",
  "SlowDown",
  "ServiceQuotaExceededException",
]);

const UNAVAILABLE = new Set([
  "ServiceUnavailableException",
  "ServiceUnavailable",
  "InternalServerException",
  "InternalError",
  "RequestTimeout",
  "TimeoutError",
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
]);

// A fresh index has no dimension yet and rejects every query vector
const EMPTY_INDEX = /\b(index is empty|empty index|no vectors|no dimension)\b/i;

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

/**
 * Maps an AWS SDK error name (or a socket error code) to a failure kind.
 */
export function classifyAwsErrorKind(name: string, message: string): BackendFailureKind {
  if (name === "ValidationException" || name === "BadRequestException") {
    if (EMPTY_INDEX.test(message)) return "IndexEmpty";
    return /dimension/i.test(message) ? "DimensionMismatch" : "Validation";
  }
  if (ACCESS_DENIED.has(name)) return "AccessDenied";
  if (NOT_FOUND.has(name)) return "NotFound";
  if (THROTTLED.has(name)) return "Throttled";
  if (UNAVAILABLE.has(name)) return "Unavailable";
  return "Unknown";
}

/**
 * Wraps any error thrown by an AWS client call in a BackendFailure.
 */
export function toBackendFailure(error: unknown, context: string): BackendFailure {
  if (error instanceof BackendFailure) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new BackendFailure("Unknown", `${context}: ${String(error)}`, { cause: error });
  }

  let kind = classifyAwsErrorKind(error.name, error.message);
  const code = errorCode(error);
  if (kind === "Unknown" && code) {
    kind = classifyAwsErrorKind(code, error.message);
  }
  return new BackendFailure(kind, `${context}: ${error.message}`, { cause: error });
}
