import { BatchUploadItem, CallerMetadata, QuerySpec } from "../../domain/entities/vector-record";
import { QuerySpecError, ServiceError } from "../../domain/errors/service.errors";

/**
 * A request body or parameter that does not have the expected shape.
 */
export class InvalidRequestError extends ServiceError {}

type Scalar = string | number | boolean;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function parseScalarMap(value: unknown, field: string, fail: (message: string) => Error): Record<string, Scalar> {
  if (!isRecord(value)) {
    throw fail(`${field} must be an object`);
  }
  const result: Record<string, Scalar> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (!isScalar(entry)) {
      throw fail(`${field}.${name} must be a string, number or boolean`);
    }
    result[name] = entry;
  }
  return result;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new InvalidRequestError(`${field} must be a string`);
  }
  return value;
}

/**
 * Metadata arrives as an object in JSON bodies and as a JSON string in multipart forms.
 */
export function parseCallerMetadata(value: unknown): CallerMetadata | undefined {
  if (value === undefined || value === null || value === "") return undefined;

  let parsed: unknown = value;
  if (typeof value === "string") {
    try {
      parsed = JSON.parse(value);
    } catch {
      throw new InvalidRequestError("metadata must be valid JSON");
    }
  }
  return parseScalarMap(parsed, "metadata", (message) => new InvalidRequestError(message));
}

export function parseUploadRequest(body: unknown): BatchUploadItem {
  if (!isRecord(body)) {
    throw new InvalidRequestError("Request body must be a JSON object");
  }
  const filePath = optionalString(body.file_path, "file_path");
  if (!filePath) {
    throw new InvalidRequestError("file_path is required");
  }
  return {
    path: filePath,
    metadata: parseCallerMetadata(body.metadata),
    contentType: optionalString(body.content_type, "content_type"),
  };
}

export function parseBatchUploadRequest(body: unknown): BatchUploadItem[] {
  if (!isRecord(body) || !Array.isArray(body.files) || body.files.length === 0) {
    throw new InvalidRequestError("files must be a non-empty array");
  }
  return body.files.map((file: unknown) => parseUploadRequest(file));
}

export function parseQueryRequest(body: unknown): QuerySpec {
  if (!isRecord(body)) {
    throw new QuerySpecError("Request body must be a JSON object");
  }

  const querySpec: QuerySpec = {};

  if (body.query_vector !== undefined && body.query_vector !== null) {
    const vector: unknown = body.query_vector;
    if (!Array.isArray(vector) || !vector.every((value: unknown) => typeof value === "number")) {
      throw new QuerySpecError("query_vector must be an array of numbers");
    }
    querySpec.vector = vector.filter((value: unknown): value is number => typeof value === "number");
  }

  if (body.query_text !== undefined && body.query_text !== null) {
    if (typeof body.query_text !== "string") {
      throw new QuerySpecError("query_text must be a string");
    }
    querySpec.text = body.query_text;
  }

  if (body.top_k !== undefined && body.top_k !== null) {
    if (typeof body.top_k !== "number") {
      throw new QuerySpecError("top_k must be a number");
    }
    querySpec.topK = body.top_k;
  }

  if (body.similarity_threshold !== undefined && body.similarity_threshold !== null) {
    if (typeof body.similarity_threshold !== "number") {
      throw new QuerySpecError("similarity_threshold must be a number");
    }
    querySpec.threshold = body.similarity_threshold;
  }

  if (body.metadata_filter !== undefined && body.metadata_filter !== null) {
    querySpec.metadataFilter = parseScalarMap(
      body.metadata_filter,
      "metadata_filter",
      (message) => new QuerySpecError(message)
    );
  }

  return querySpec;
}

/**
 * Positive integer from a query-string value, or undefined when absent.
 */
export function parseLimit(value: unknown): number | undefined {
  if (value === undefined || value === "") return undefined;
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new QuerySpecError("limit must be a positive integer");
  }
  return Number.parseInt(value, 10);
}

export function parseFlag(value: unknown): boolean {
  return typeof value === "string" && ["true", "1", "yes"].includes(value.toLowerCase());
}
