import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  DeleteObjectCommand,
  PutObjectCommand,
  S3Client,
  UploadPartCommand,
} from "@aws-sdk/client-s3";
import { readFile } from "fs/promises";
import { IFileStorage } from "../../domain/interfaces/ifile.storage";
import { DEFAULT_MIME_TYPE } from "../../domain/utils/mime.type";
import { toBackendFailure } from "./aws.error.classifier";

/**
 * S3 metadata travels as HTTP headers: keep alphanumerics, spaces and
 * "-_.,", replace everything else, and cap at 2000 characters.
 */
export function sanitizeMetadataValue(value: string): string {
  if (!value) return "";

  const sanitized = value
    .replace(/[^a-zA-Z0-9\s\-_.,]/g, "_")
    .replace(/\s+/g, " ")
    .trim();

  return sanitized.length > 2000 ? sanitized.substring(0, 2000) : sanitized;
}

function sanitizeMetadata(metadata?: Record<string, string>): Record<string, string> | undefined {
  if (!metadata) return undefined;
  return Object.fromEntries(
    Object.entries(metadata).map(([name, value]) => [name, sanitizeMetadataValue(value)])
  );
}

// Multipart upload for files larger than 5MB, in 5MB parts
const MULTIPART_UPLOAD_THRESHOLD = 5 * 1024 * 1024;
const MULTIPART_PART_SIZE = 5 * 1024 * 1024;

export interface S3FileStorageConfig {
  bucket: string;
  region: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  endpoint?: string; // For S3-compatible services like MinIO
  forcePathStyle?: boolean;
}

/**
 * Keeps the raw uploaded files in a plain S3 bucket, next to their vectors.
 */
export class S3FileStorage implements IFileStorage {
  private s3Client: S3Client;

  constructor(private config: S3FileStorageConfig) {
    console.log(`[S3FileStorage] Initializing for bucket ${config.bucket} in ${config.region}`);

    this.s3Client = new S3Client({
      region: config.region,
      credentials: config.credentials,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle ?? false,
    });
  }

  async storeFile(
    filePath: string,
    key: string,
    options?: { contentType?: string; metadata?: Record<string, string> }
  ): Promise<{ bucket: string; key: string }> {
    const buffer = await readFile(filePath);
    const contentType = options?.contentType ?? DEFAULT_MIME_TYPE;
    const metadata = sanitizeMetadata(options?.metadata);

    if (buffer.length > MULTIPART_UPLOAD_THRESHOLD) {
      return this.multipartUpload(buffer, key, contentType, metadata);
    }

    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this.config.bucket,
          Key: key,
          Body: buffer,
          ContentType: contentType,
          Metadata: metadata,
        })
      );
    } catch (error) {
      throw toBackendFailure(error, `S3 upload of ${key} failed`);
    }

    console.log(`[S3FileStorage] Stored ${buffer.length} bytes at s3://${this.config.bucket}/${key}`);
    return { bucket: this.config.bucket, key };
  }

  async deleteFile(key: string): Promise<void> {
    try {
      await this.s3Client.send(new DeleteObjectCommand({ Bucket: this.config.bucket, Key: key }));
    } catch (error) {
      throw toBackendFailure(error, `S3 delete of ${key} failed`);
    }
  }

  private async multipartUpload(
    buffer: Buffer,
    key: string,
    contentType: string,
    metadata?: Record<string, string>
  ): Promise<{ bucket: string; key: string }> {
    const bucket = this.config.bucket;
    let uploadId: string | undefined;

    try {
      const createResponse = await this.s3Client.send(
        new CreateMultipartUploadCommand({
          Bucket: bucket,
          Key: key,
          ContentType: contentType,
          Metadata: metadata,
        })
      );
      uploadId = createResponse.UploadId;
      if (!uploadId) {
        throw new Error("Failed to create multipart upload");
      }

      const parts: Array<{ ETag: string; PartNumber: number }> = [];
      const totalParts = Math.ceil(buffer.length / MULTIPART_PART_SIZE);

      for (let partNumber = 1; partNumber <= totalParts; partNumber++) {
        const start = (partNumber - 1) * MULTIPART_PART_SIZE;
        const end = Math.min(start + MULTIPART_PART_SIZE, buffer.length);

        const partResponse = await this.s3Client.send(
          new UploadPartCommand({
            Bucket: bucket,
            Key: key,
            PartNumber: partNumber,
            UploadId: uploadId,
            Body: buffer.subarray(start, end),
          })
        );
        if (!partResponse.ETag) {
          throw new Error(`Failed to upload part ${partNumber}`);
        }
        parts.push({ ETag: partResponse.ETag, PartNumber: partNumber });
      }

      await this.s3Client.send(
        new CompleteMultipartUploadCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          MultipartUpload: { Parts: parts },
        })
      );

      console.log(`[S3FileStorage] Stored ${buffer.length} bytes at s3://${bucket}/${key} in ${totalParts} parts`);
      return { bucket, key };
    } catch (error) {
      if (uploadId) {
        try {
          await this.s3Client.send(
            new AbortMultipartUploadCommand({ Bucket: bucket, Key: key, UploadId: uploadId })
          );
        } catch (abortError) {
          console.error("[S3FileStorage] Failed to abort multipart upload:", abortError);
        }
      }
      throw toBackendFailure(error, `S3 multipart upload of ${key} failed`);
    }
  }
}
