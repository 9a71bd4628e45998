import { TruncationStrategy } from "../../domain/enums/truncation.strategy";

export interface TextPreprocessingOptions {
  maxLength: number;
  strategy: TruncationStrategy;
}

/** Collapses every whitespace run to a single space and trims the ends. */
export function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Cuts text down to `maxLength` characters.
 * - end: keep the first maxLength characters
 * - start: keep the last maxLength characters
 * - middle: keep both ends (at least floor(maxLength/2) each) and drop the middle
 */
export function truncateText(text: string, maxLength: number, strategy: TruncationStrategy): string {
  if (text.length <= maxLength) {
    return text;
  }

  switch (strategy) {
    case "start":
      return text.slice(text.length - maxLength);
    case "middle": {
      // An odd length gives the extra character to the head
      const tail = Math.floor(maxLength / 2);
      const head = maxLength - tail;
      return text.slice(0, head) + text.slice(text.length - tail);
    }
    case "end":
      return text.slice(0, maxLength);
  }
}

export function preprocessText(text: string, options: TextPreprocessingOptions): string {
  return truncateText(normalizeWhitespace(text), options.maxLength, options.strategy);
}
