import type { MarkdownGenerationResult } from "../types.js";

/**
 * What a page looks like by the time extraction runs.
 */
export interface ExtractionInput {
  url: string;
  /** Rendered HTML as returned by the browser. */
  html: string;
  /** HTML after excluded tags and short text blocks were removed. */
  cleanedHtml: string;
  markdown: MarkdownGenerationResult;
}

/**
 * Turns a crawled page into structured data serialised as JSON text.
 */
export interface ExtractionStrategy {
  readonly name: string;
  extract(input: ExtractionInput): Promise<string>;
}
