import { parse, HTMLElement as NHPHTMLElement, TextNode, type Node } from "node-html-parser";
import type { ExtractionInput, ExtractionStrategy } from "./ExtractionStrategy.js";
import {
  defineExtractionSchema,
  type ExtractedRecord,
  type ExtractionSchema,
  type FieldSpec,
  type FieldValue,
} from "./schema.js";

const NON_RENDERED_TAGS = new Set(["script", "style", "noscript", "template"]);

function collectText(node: Node, parts: string[]): void {
  for (const child of node.childNodes) {
    if (child instanceof TextNode) {
      parts.push(child.text);
    } else if (child instanceof NHPHTMLElement && !NON_RENDERED_TAGS.has(child.rawTagName.toLowerCase())) {
      collectText(child, parts);
    }
  }
}

/**
 * Trimmed text of an element with runs of whitespace collapsed to one space.
 * Script, style, noscript and template contents are not part of it.
 */
function visibleText(element: NHPHTMLElement): string {
  const parts: string[] = [];
  collectText(element, parts);
  return parts.join("").replace(/\s+/g, " ").trim();
}

function resolveTargets(base: NHPHTMLElement, selector: string): NHPHTMLElement[] {
  if (selector === "") {
    return [base];
  }
  return base.querySelectorAll(selector);
}

function attributeOf(element: NHPHTMLElement, attribute: string): string | null {
  return element.hasAttribute(attribute) ? (element.getAttribute(attribute) ?? null) : null;
}

function extractField(base: NHPHTMLElement, field: FieldSpec): FieldValue {
  const targets = resolveTargets(base, field.selector);

  switch (field.type) {
    case "exists":
      return targets.length > 0;
    case "text":
      if (field.multiple) {
        return targets.map(visibleText);
      }
      return targets.length > 0 ? visibleText(targets[0]) : null;
    case "attribute":
      if (field.multiple) {
        return targets.map((target) => attributeOf(target, field.attribute));
      }
      return targets.length > 0 ? attributeOf(targets[0], field.attribute) : null;
  }
}

/**
 * Applies a validated schema to a parsed document.
 *
 * One record per element matched by `baseSelector`, in document order. Fields that match
 * nothing come back as `null` (text, attribute), `false` (exists) or `[]` (multiple).
 * A multiple attribute list holds one entry per target, `null` where the attribute is absent.
 */
export function extractRecords(root: NHPHTMLElement, schema: ExtractionSchema): ExtractedRecord[] {
  return root.querySelectorAll(schema.baseSelector).map((base) => {
    const record: ExtractedRecord = {};
    for (const field of schema.fields) {
      record[field.name] = extractField(base, field);
    }
    return record;
  });
}

/**
 * Extraction strategy that runs a declarative CSS schema over the rendered HTML
 * and returns the records as a JSON array.
 */
export class JsonCssExtractionStrategy implements ExtractionStrategy {
  readonly name = "json-css";
  readonly schema: ExtractionSchema;

  /**
   * @throws {SchemaValidationError} when the schema is malformed; nothing is crawled in that case.
   */
  constructor(schema: unknown) {
    this.schema = defineExtractionSchema(schema);
  }

  /** Runs the schema against an HTML string. */
  run(html: string): ExtractedRecord[] {
    return extractRecords(parse(html, { comment: false }), this.schema);
  }

  async extract(input: ExtractionInput): Promise<string> {
    return JSON.stringify(this.run(input.html));
  }
}
