import express, { Express } from "express";
import cors from "cors";
import { EmbeddingPipeline } from "./application/pipeline/embedding.pipeline";
import { FileValidationService } from "./application/services/file.validation.service";
import { VectorStoreService } from "./application/services/vector.store.service";
import { IEmbeddingProvider } from "./domain/interfaces/iembedding.provider";
import { IFileStorage } from "./domain/interfaces/ifile.storage";
import { IVectorBackend } from "./domain/interfaces/ivector.backend";
import { S3FileStorage } from "./infrastructure/aws/s3.file.storage";
import { S3VectorsBackend } from "./infrastructure/aws/s3vectors.backend";
import { AppConfig } from "./infrastructure/config/app.config";
import { HashingEmbeddingProvider } from "./infrastructure/embedding/hashing.embedding.provider";
import { SharpImageEncoder } from "./infrastructure/media/sharp.image.encoder";
import { OpenAIEmbeddingProvider } from "./infrastructure/openai/openai.embedding.provider";
import { PdfParseTextExtractor } from "./infrastructure/pdf/pdf.text.extractor";
import { InMemoryVectorBackend } from "./infrastructure/vector/in.memory.vector.backend";
import { FileController } from "./presentation/controllers/file.controller";
import { errorMiddleware } from "./presentation/middleware/error.middleware";
import { createFileRoutes } from "./presentation/routes/file.routes";

export interface Services {
  fileValidationService: FileValidationService;
  embeddingPipeline: EmbeddingPipeline;
  vectorStoreService: VectorStoreService;
}

function awsCredentials(config: AppConfig) {
  const { accessKeyId, secretAccessKey, sessionToken } = config.aws;
  // Fall back to the SDK's default provider chain (profile, container role, ...)
  return accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey, sessionToken } : undefined;
}

function createEmbeddingProvider(config: AppConfig): IEmbeddingProvider {
  const { provider, openaiApiKey, model, dimension } = config.embedding;
  switch (provider) {
    case "openai":
      if (!openaiApiKey) {
        throw new Error("OPENAI_API_KEY environment variable is required when EMBEDDING_PROVIDER=openai");
      }
      return new OpenAIEmbeddingProvider(openaiApiKey, model, dimension);
    case "hashing":
      return new HashingEmbeddingProvider(dimension);
  }
}

function createVectorBackend(config: AppConfig): IVectorBackend {
  switch (config.vector.backend) {
    case "s3vectors":
      if (!config.aws.vectorBucketName) {
        throw new Error("S3_VECTOR_BUCKET_NAME environment variable is required when VECTOR_BACKEND=s3vectors");
      }
      return new S3VectorsBackend({
        region: config.aws.region,
        vectorBucketName: config.aws.vectorBucketName,
        indexName: config.aws.vectorIndexName,
        credentials: awsCredentials(config),
        deleteEnabled: config.aws.vectorDeleteEnabled,
      });
    case "memory":
      return new InMemoryVectorBackend({
        supportsDelete: config.aws.vectorDeleteEnabled,
        maxTopK: config.vector.maxTopK,
      });
  }
}

function createFileStorage(config: AppConfig): IFileStorage | undefined {
  if (!config.aws.fileBucketName) {
    return undefined;
  }
  return new S3FileStorage({
    bucket: config.aws.fileBucketName,
    region: config.aws.region,
    credentials: awsCredentials(config),
    endpoint: config.aws.s3Endpoint,
    forcePathStyle: config.aws.s3ForcePathStyle,
  });
}

/**
 * Builds every component once from the configuration.
 */
export function createServices(config: AppConfig): Services {
  const fileValidationService = new FileValidationService(config.validation);

  const embeddingPipeline = new EmbeddingPipeline(
    createEmbeddingProvider(config),
    new SharpImageEncoder(),
    new PdfParseTextExtractor(),
    {
      maxTextLength: config.embedding.maxTextLength,
      truncationStrategy: config.embedding.truncationStrategy,
      image: {
        width: config.embedding.imageWidth,
        height: config.embedding.imageHeight,
        format: config.embedding.imageFormat,
      },
    }
  );

  const vectorStoreService = new VectorStoreService(
    fileValidationService,
    embeddingPipeline,
    createVectorBackend(config),
    {
      defaultTopK: config.vector.defaultTopK,
      maxTopK: config.vector.maxTopK,
      defaultSimilarityThreshold: config.vector.defaultSimilarityThreshold,
      defaultListLimit: config.vector.defaultListLimit,
    },
    createFileStorage(config)
  );

  return { fileValidationService, embeddingPipeline, vectorStoreService };
}

export function createApp(services: Services, config: AppConfig): Express {
  const fileController = new FileController(services.vectorStoreService, services.fileValidationService);

  const app = express();

  // Enable CORS for all origins
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: true }));

  app.use(
    createFileRoutes(fileController, {
      uploadTempDir: config.server.uploadTempDir,
      maxUploadBytes: config.validation.maxFileSizeBytes,
    })
  );

  app.use(errorMiddleware);

  return app;
}
