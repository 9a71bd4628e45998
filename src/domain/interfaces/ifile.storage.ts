/**
 * Object storage for the raw uploaded files, kept next to their vectors.
 */
export interface IFileStorage {
  storeFile(
    filePath: string,
    key: string,
    options?: { contentType?: string; metadata?: Record<string, string> }
  ): Promise<{ bucket: string; key: string }>;
  deleteFile(key: string): Promise<void>;
}
