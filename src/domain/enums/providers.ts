export const EmbeddingProviders = [
  "openai",
  "hashing"
] as const;

export type EmbeddingProviderType = typeof EmbeddingProviders[number];

export const VectorBackends = [
  "s3vectors",
  "memory"
] as const;

export type VectorBackendType = typeof VectorBackends[number];

export const ImageFormats = [
  "jpeg",
  "png"
] as const;

export type ImageFormatType = typeof ImageFormats[number];
