import { IPdfTextExtractor } from "../../domain/interfaces/ipdf.text.extractor";

interface PageTextContent {
  items: Array<{ str: string }>;
}

/**
 * Page-by-page text extraction with pdf-parse. Pages are rendered in order,
 * so the collected texts line up with page numbers.
 */
export class PdfParseTextExtractor implements IPdfTextExtractor {
  async extractPages(data: Buffer): Promise<string[]> {
    const pdfParse = (await import("pdf-parse")).default;
    const pages: string[] = [];

    await pdfParse(data, {
      pagerender: (pageData) =>
        pageData.getTextContent().then((content: PageTextContent) => {
          const text = content.items.map((item) => item.str).join(" ");
          pages.push(text);
          return text;
        }),
    });

    return pages;
  }
}
