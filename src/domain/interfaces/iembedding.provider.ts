/**
 * Black-box embedding model: text in, fixed-length vectors out.
 */
export interface IEmbeddingProvider {
  /** Identifier recorded in each record's metadata. */
  readonly modelId: string;
  /** Length of every vector this provider returns. */
  readonly dimension: number;

  embedTexts(texts: string[]): Promise<number[][]>;
}
