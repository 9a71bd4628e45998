import { readFile } from "fs/promises";
import { basename } from "path";
import { TextDecoder } from "util";
import { FileContent, resolveFileContent } from "../../domain/entities/file-content";
import { ImageFormatType } from "../../domain/enums/providers";
import { TruncationStrategy } from "../../domain/enums/truncation.strategy";
import { EmbeddingFailure } from "../../domain/errors/service.errors";
import { IEmbeddingProvider } from "../../domain/interfaces/iembedding.provider";
import { IImageEncoder } from "../../domain/interfaces/iimage.encoder";
import { IPdfTextExtractor } from "../../domain/interfaces/ipdf.text.extractor";
import { resolveMimeType } from "../../domain/utils/mime.type";
import { cosineSimilarity } from "../../domain/utils/vector.math";
import { preprocessText } from "./text.preprocessor";

export interface EmbeddingPipelineOptions {
  maxTextLength: number;
  truncationStrategy: TruncationStrategy;
  image: {
    width: number;
    height: number;
    format: ImageFormatType;
  };
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

function decodeUtf8(data: Buffer): string | undefined {
  try {
    return strictUtf8.decode(data);
  } catch {
    return undefined;
  }
}

/**
 * Turns text and files of any supported type into vectors of one fixed dimension.
 *
 * Every text goes through the same preprocessing (whitespace collapse, then
 * truncation) before it reaches the embedding model. Files are dispatched once
 * on their content type:
 * - text: UTF-8, falling back to latin-1
 * - image: re-encoded and embedded as a base64 text stand-in (a text model
 *   sees the image, which is a known limitation rather than a feature)
 * - pdf: per-page text with page markers, degrading to the generic path
 * - anything else: text if it decodes, otherwise a name/size description
 */
export class EmbeddingPipeline {
  constructor(
    private embeddingProvider: IEmbeddingProvider,
    private imageEncoder: IImageEncoder,
    private pdfTextExtractor: IPdfTextExtractor,
    private options: EmbeddingPipelineOptions
  ) {}

  get dimension(): number {
    return this.embeddingProvider.dimension;
  }

  get modelId(): string {
    return this.embeddingProvider.modelId;
  }

  preprocess(text: string): string {
    return preprocessText(text, {
      maxLength: this.options.maxTextLength,
      strategy: this.options.truncationStrategy,
    });
  }

  async embedText(text: string): Promise<number[]> {
    const [vector] = await this.embedPrepared([this.preprocess(text)]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    return this.embedPrepared(texts.map((text) => this.preprocess(text)));
  }

  async embedFile(filePath: string, contentType?: string): Promise<number[]> {
    const content = resolveFileContent(filePath, resolveMimeType(filePath, contentType));
    const text = await this.extractText(content);
    return this.embedText(text);
  }

  similarity(a: number[], b: number[]): number {
    return cosineSimilarity(a, b);
  }

  /**
   * Text the embedding model will see for a file, before preprocessing.
   */
  async extractText(content: FileContent): Promise<string> {
    switch (content.kind) {
      case "text":
        return this.readTextFile(content.path);
      case "image":
        return this.describeImage(content.path);
      case "pdf":
        return this.extractPdfText(content.path);
      case "generic":
        return this.readGenericFile(content.path);
      default: {
        const unreachable: never = content;
        throw new Error(`Unsupported content: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async embedPrepared(texts: string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await this.embeddingProvider.embedTexts(texts);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[EmbeddingPipeline] Embedding model ${this.modelId} failed:`, message);
      throw new EmbeddingFailure(`Embedding model ${this.modelId} failed: ${message}`, { cause: error });
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingFailure(
        `Embedding model ${this.modelId} returned ${vectors.length} vectors for ${texts.length} inputs`
      );
    }
    return vectors;
  }

  private async readTextFile(filePath: string): Promise<string> {
    const data = await readFile(filePath);
    const text = decodeUtf8(data);
    if (text !== undefined) {
      return text;
    }
    console.warn(`[EmbeddingPipeline] ${basename(filePath)} is not valid UTF-8, reading as latin-1`);
    return data.toString("latin1");
  }

  private async describeImage(filePath: string): Promise<string> {
    try {
      const encoded = await this.imageEncoder.encode(filePath, this.options.image);
      return `image: ${encoded.toString("base64")}`;
    } catch (error) {
      console.error(`[EmbeddingPipeline] Error embedding image file ${filePath}:`, error);
      throw error;
    }
  }

  private async extractPdfText(filePath: string): Promise<string> {
    let pages: string[];
    let size: number;
    try {
      const data = await readFile(filePath);
      size = data.length;
      pages = await this.pdfTextExtractor.extractPages(data);
    } catch (error) {
      console.warn(`[EmbeddingPipeline] PDF extraction failed for ${filePath}, using generic fallback:`, error);
      return this.readGenericFile(filePath);
    }

    let text = "";
    pages.forEach((pageText, index) => {
      if (pageText.trim()) {
        text += `\n--- Page ${index + 1} ---\n${pageText}`;
      }
    });

    if (!text.trim()) {
      console.warn(`[EmbeddingPipeline] No text content extracted from PDF ${filePath}, using file metadata`);
      return `PDF document: ${basename(filePath)}, size: ${size} bytes`;
    }

    console.log(`[EmbeddingPipeline] Extracted ${text.length} characters from PDF ${basename(filePath)}`);
    return text;
  }

  private async readGenericFile(filePath: string): Promise<string> {
    const data = await readFile(filePath);
    const text = decodeUtf8(data);
    if (text !== undefined) {
      return text;
    }
    return `file: ${basename(filePath)}, size: ${data.length} bytes`;
  }
}
