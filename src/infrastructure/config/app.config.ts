/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values.
 * Built once at startup and handed to each component's constructor.
 */

import dotenv from "dotenv";
import {
  EmbeddingProviderType,
  EmbeddingProviders,
  ImageFormatType,
  ImageFormats,
  VectorBackendType,
  VectorBackends,
} from "../../domain/enums/providers";
import { TruncationStrategy, isTruncationStrategy } from "../../domain/enums/truncation.strategy";
import { parseExtensionList, parseMimeTypeList } from "../../domain/utils/mime.type";

const MB = 1024 * 1024;

export type Environment = Record<string, string | undefined>;

export interface AppConfig {
  // Server
  server: {
    host: string;
    port: number;
    uploadTempDir?: string; // Multipart uploads are staged here (OS temp dir when unset)
  };

  // AWS: S3 Vectors for embeddings, plain S3 for the raw files
  aws: {
    accessKeyId?: string;
    secretAccessKey?: string;
    sessionToken?: string;
    region: string;
    vectorBucketName?: string;
    vectorIndexName: string;
    vectorDeleteEnabled: boolean;
    fileBucketName?: string; // Raw files are only stored when this is set
    s3Endpoint?: string; // For S3-compatible services
    s3ForcePathStyle: boolean;
  };

  embedding: {
    provider: EmbeddingProviderType;
    openaiApiKey?: string;
    model: string;
    dimension: number;
    maxTextLength: number;
    truncationStrategy: TruncationStrategy;
    imageWidth: number;
    imageHeight: number;
    imageFormat: ImageFormatType;
  };

  vector: {
    backend: VectorBackendType;
    defaultTopK: number;
    maxTopK: number; // S3 Vectors caps topK at 30
    defaultSimilarityThreshold: number;
    defaultListLimit: number;
  };

  validation: {
    maxFileSizeBytes: number;
    maxBatchSizeBytes: number;
    allowedMimeTypes: Set<string>;
    blockedExtensions: Set<string>;
    allowEmptyFiles: boolean;
  };
}

function readString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(
  env: Environment,
  name: string,
  fallback: number,
  range: { min: number; max: number; integer?: boolean }
): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || (range.integer !== false && !Number.isInteger(value))) {
    throw new Error(`${name} must be ${range.integer === false ? "a number" : "an integer"}, got "${raw}"`);
  }
  if (value < range.min || value > range.max) {
    throw new Error(`${name} must be between ${range.min} and ${range.max}, got ${value}`);
  }
  return value;
}

function readBoolean(env: Environment, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }
  return ["true", "1", "yes", "on"].includes(raw.toLowerCase());
}

function readChoice<T extends string>(
  env: Environment,
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = readString(env, name)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(", ")}, got "${raw}"`);
  }
  return match;
}

export function loadConfig(env: Environment): AppConfig {
  const embeddingProvider = readChoice(env, "EMBEDDING_PROVIDER", EmbeddingProviders, "openai");
  const openaiApiKey = readString(env, "OPENAI_API_KEY");
  if (embeddingProvider === "openai" && !openaiApiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required when EMBEDDING_PROVIDER=openai");
  }

  const backend = readChoice(env, "VECTOR_BACKEND", VectorBackends, "s3vectors");
  const vectorBucketName = readString(env, "S3_VECTOR_BUCKET_NAME");
  if (backend === "s3vectors" && !vectorBucketName) {
    throw new Error("S3_VECTOR_BUCKET_NAME environment variable is required when VECTOR_BACKEND=s3vectors");
  }

  const truncationStrategy = readString(env, "TEXT_TRUNCATION_STRATEGY")?.toLowerCase() ?? "end";
  if (!isTruncationStrategy(truncationStrategy)) {
    throw new Error(`TEXT_TRUNCATION_STRATEGY must be one of start, end, middle, got "${truncationStrategy}"`);
  }

  const maxTopK = readNumber(env, "MAX_TOP_K", 30, { min: 1, max: 30 });

  return {
    server: {
      host: readString(env, "HOST") ?? "0.0.0.0",
      port: readNumber(env, "PORT", 8000, { min: 1, max: 65535 }),
      uploadTempDir: readString(env, "UPLOAD_TEMP_DIR"),
    },

    aws: {
      accessKeyId: readString(env, "AWS_ACCESS_KEY_ID"),
      secretAccessKey: readString(env, "AWS_SECRET_ACCESS_KEY"),
      sessionToken: readString(env, "AWS_SESSION_TOKEN"),
      // S3_BUCKET_REGION overrides the account region for the vector bucket
      region:
        readString(env, "S3_BUCKET_REGION") ??
        readString(env, "AWS_REGION") ??
        readString(env, "AWS_DEFAULT_REGION") ??
        "us-east-1",
      vectorBucketName,
      vectorIndexName: readString(env, "S3_VECTOR_INDEX_NAME") ?? "default-index",
      vectorDeleteEnabled: readBoolean(env, "S3_VECTORS_DELETE_ENABLED", true),
      fileBucketName: readString(env, "S3_FILE_BUCKET_NAME"),
      s3Endpoint: readString(env, "S3_ENDPOINT"),
      s3ForcePathStyle: readBoolean(env, "S3_FORCE_PATH_STYLE", false),
    },

    embedding: {
      provider: embeddingProvider,
      openaiApiKey,
      model: readString(env, "EMBEDDING_MODEL") ?? "text-embedding-3-small",
      dimension: readNumber(env, "VECTOR_DIMENSION", 384, { min: 1, max: 4096 }),
      maxTextLength: readNumber(env, "MAX_TEXT_LENGTH", 512, { min: 1, max: 8192 }),
      truncationStrategy,
      imageWidth: readNumber(env, "IMAGE_RESIZE_WIDTH", 224, { min: 32, max: 1024 }),
      imageHeight: readNumber(env, "IMAGE_RESIZE_HEIGHT", 224, { min: 32, max: 1024 }),
      imageFormat: readChoice(env, "IMAGE_FORMAT", ImageFormats, "jpeg"),
    },

    vector: {
      backend,
      defaultTopK: Math.min(readNumber(env, "DEFAULT_TOP_K", 10, { min: 1, max: 30 }), maxTopK),
      maxTopK,
      defaultSimilarityThreshold: readNumber(env, "DEFAULT_SIMILARITY_THRESHOLD", 0, {
        min: 0,
        max: 1,
        integer: false,
      }),
      defaultListLimit: Math.min(readNumber(env, "DEFAULT_LIST_LIMIT", 10, { min: 1, max: 30 }), maxTopK),
    },

    validation: {
      maxFileSizeBytes: readNumber(env, "MAX_FILE_SIZE_MB", 50, { min: 1, max: 1000 }) * MB,
      maxBatchSizeBytes: readNumber(env, "MAX_BATCH_SIZE_MB", 200, { min: 1, max: 5000 }) * MB,
      allowedMimeTypes: parseMimeTypeList(
        readString(env, "ALLOWED_FILE_TYPES") ?? "text/*,application/pdf,image/*"
      ),
      blockedExtensions: parseExtensionList(
        readString(env, "BLOCKED_FILE_EXTENSIONS") ?? ".exe,.bat,.cmd,.scr,.com,.pif,.dll,.sys"
      ),
      allowEmptyFiles: readBoolean(env, "ALLOW_EMPTY_FILES", false),
    },
  };
}

/**
 * Loads `.env` (when present) into the process environment, then builds the config.
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}

/**
 * Non-fatal configuration problems worth a warning at startup.
 */
export function configurationWarnings(config: AppConfig, env: Environment): string[] {
  const warnings: string[] = [];

  if (
    config.vector.backend === "s3vectors" &&
    !config.aws.accessKeyId &&
    !readString(env, "AWS_PROFILE") &&
    !readString(env, "AWS_CONTAINER_CREDENTIALS_RELATIVE_URI")
  ) {
    warnings.push("No AWS credentials found (keys, profile, or container role)");
  }

  if (![384, 512, 768, 1024, 1536].includes(config.embedding.dimension)) {
    warnings.push(`Unusual vector dimension: ${config.embedding.dimension}`);
  }

  if (config.validation.maxFileSizeBytes > config.validation.maxBatchSizeBytes) {
    warnings.push("Individual file size limit exceeds batch size limit");
  }

  if (config.embedding.provider === "hashing") {
    warnings.push("Using the hashing embedder: similarity reflects shared words, not meaning");
  }

  return warnings;
}

/**
 * One-line-per-section summary without secrets.
 */
export function describeConfig(config: AppConfig): string[] {
  const { server, aws, embedding, vector, validation } = config;
  return [
    `Server: ${server.host}:${server.port}`,
    `Vector backend: ${vector.backend}` +
      (vector.backend === "s3vectors" ? ` (${aws.vectorBucketName}/${aws.vectorIndexName} in ${aws.region})` : ""),
    `Embedding: ${embedding.provider} ${embedding.model} (dim=${embedding.dimension})`,
    `File limits: ${validation.maxFileSizeBytes / MB}MB individual, ${validation.maxBatchSizeBytes / MB}MB batch`,
    `Raw file storage: ${aws.fileBucketName ?? "disabled"}`,
  ];
}
