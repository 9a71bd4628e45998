export interface IPdfTextExtractor {
  /** Text of each page, in page order. */
  extractPages(data: Buffer): Promise<string[]>;
}
