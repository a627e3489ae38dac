import { parse, HTMLElement as NHPHTMLElement } from "node-html-parser";
import { DEFAULT_EXCLUDED_TAGS, REGEX_TITLE_TAG } from "../constants.js";

export interface CleanHtmlOptions {
  /** Leaf text blocks with fewer words than this are dropped. 0 or 1 keeps everything with text. */
  wordCountThreshold?: number;
  /** Tag names removed on top of DEFAULT_EXCLUDED_TAGS. */
  excludedTags?: ReadonlyArray<string>;
}

// Blocks whose word count is checked against the threshold
const TEXT_BLOCK_TAGS = new Set(["P", "DIV", "SPAN", "LI", "TD", "BLOCKQUOTE", "SECTION"]);
// Never dropped for being short
const STRUCTURAL_KEEP_TAGS = new Set(["H1", "H2", "H3", "H4", "H5", "H6", "IMG", "PRE", "CODE", "TABLE"]);

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function extractTitle(html: string): string | null {
  const title = html.match(REGEX_TITLE_TAG)?.[1]?.trim();
  return title ? title : null;
}

function hasStructuralContent(element: NHPHTMLElement): boolean {
  return element.querySelector([...STRUCTURAL_KEEP_TAGS].map((t) => t.toLowerCase()).join(", ")) !== null;
}

function pruneShortBlocks(element: NHPHTMLElement, threshold: number): void {
  for (const child of [...element.childNodes]) {
    if (!(child instanceof NHPHTMLElement)) continue;
    pruneShortBlocks(child, threshold);

    if (!TEXT_BLOCK_TAGS.has(child.tagName) || hasStructuralContent(child)) continue;
    if (countWords(child.text) < threshold) {
      child.remove();
    }
  }
}

/**
 * Produces the cleaned HTML that Markdown generation works from: excluded tags and comments
 * are removed, then text blocks below the word-count threshold.
 */
export function cleanHtml(html: string, options: CleanHtmlOptions = {}): string {
  const { wordCountThreshold = 1, excludedTags = [] } = options;
  const root = parse(html, { comment: false });

  const tags = [...DEFAULT_EXCLUDED_TAGS, ...excludedTags.map((tag) => tag.toLowerCase())];
  for (const tag of new Set(tags)) {
    root.querySelectorAll(tag).forEach((el) => el.remove());
  }

  const body = root.querySelector("body") ?? root;
  if (wordCountThreshold > 0) {
    pruneShortBlocks(body, wordCountThreshold);
  }

  return root.toString();
}
