import { MarkdownConverter } from "../utils/markdown-converter.js";
import type { MarkdownGenerationResult } from "../types.js";
import type { ContentFilter } from "./PruningContentFilter.js";

export interface MarkdownGenerator {
  generate(html: string, options?: { baseUrl?: string }): MarkdownGenerationResult;
}

export interface DefaultMarkdownGeneratorOptions {
  /** When set, fitHtml and fitMarkdown are produced from the blocks the filter keeps. */
  contentFilter?: ContentFilter;
  /** Cap on the length of each Markdown output. */
  maxContentLength?: number;
}

/**
 * Renders the cleaned page to raw Markdown and, with a content filter, to "fit" Markdown
 * holding only the main content.
 */
export class DefaultMarkdownGenerator implements MarkdownGenerator {
  private readonly converter = new MarkdownConverter();
  private readonly contentFilter: ContentFilter | undefined;
  private readonly maxContentLength: number | undefined;

  constructor(options: DefaultMarkdownGeneratorOptions = {}) {
    this.contentFilter = options.contentFilter;
    this.maxContentLength = options.maxContentLength;
  }

  generate(html: string, options: { baseUrl?: string } = {}): MarkdownGenerationResult {
    const conversion = { baseUrl: options.baseUrl, maxContentLength: this.maxContentLength };
    const rawMarkdown = this.converter.convert(html, conversion);

    if (!this.contentFilter) {
      return { rawMarkdown, fitMarkdown: "", fitHtml: "" };
    }

    const blocks = this.contentFilter.filterContent(html);
    const fitHtml = blocks.map((block) => `<div>${block}</div>`).join("\n");
    const fitMarkdown = fitHtml ? this.converter.convert(fitHtml, conversion) : "";
    return { rawMarkdown, fitMarkdown, fitHtml };
  }
}
