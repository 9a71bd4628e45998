import OpenAI from "openai";
import { IEmbeddingProvider } from "../../domain/interfaces/iembedding.provider";

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;

  constructor(
    apiKey: string,
    readonly modelId: string = "text-embedding-3-small",
    readonly dimension: number = 384
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create({
      model: this.modelId,
      input: texts,
      // Only the text-embedding-3 family can shorten its vectors
      dimensions: this.modelId.startsWith("text-embedding-3") ? this.dimension : undefined,
    });

    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}
