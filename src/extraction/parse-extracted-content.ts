import { ExtractionParseError } from "../errors.js";
import type { CrawlResult } from "../types.js";

export type ExtractedItem = Record<string, unknown>;

/**
 * On failure `data` still holds whatever objects could be recovered from the payload.
 */
export type ParsedExtraction =
  | { ok: true; data: ExtractedItem[] }
  | { ok: false; error: ExtractionParseError; data: ExtractedItem[] };

function isItem(value: unknown): value is ExtractedItem {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses the JSON payload left in `extractedContent` by an extraction strategy.
 *
 * A single object is wrapped in an array. Malformed text is reported through `error`
 * together with the raw payload rather than dropped; non-object array entries are reported
 * the same way while the object entries around them are still returned.
 */
export function parseExtractedContent(source: Pick<CrawlResult, "extractedContent"> | string | null): ParsedExtraction {
  const raw = typeof source === "string" || source === null ? source : source.extractedContent;
  if (raw === null || raw.trim() === "") {
    return { ok: true, data: [] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: new ExtractionParseError(
        `Extracted content is not valid JSON: ${message}`,
        raw,
        error instanceof Error ? error : undefined
      ),
      data: [],
    };
  }

  if (isItem(parsed)) {
    return { ok: true, data: [parsed] };
  }
  if (Array.isArray(parsed)) {
    const items: ExtractedItem[] = [];
    const badIndices: number[] = [];
    for (const [index, entry] of parsed.entries()) {
      if (isItem(entry)) {
        items.push(entry);
      } else {
        badIndices.push(index);
      }
    }
    if (badIndices.length === 0) {
      return { ok: true, data: items };
    }
    const where = badIndices.length === 1 ? "index" : "indices";
    return {
      ok: false,
      error: new ExtractionParseError(
        `Extracted content holds a non-object entry at ${where} ${badIndices.join(", ")}`,
        raw
      ),
      data: items,
    };
  }
  return {
    ok: false,
    error: new ExtractionParseError(`Extracted content is JSON but not an object or array (${typeof parsed})`, raw),
    data: [],
  };
}
