import { parse, HTMLElement as NHPHTMLElement } from "node-html-parser";
import { countWords } from "../utils/html-cleaner.js";

export type ThresholdType = "fixed" | "dynamic";

export interface PruningContentFilterOptions {
  /** Minimum score an element needs to survive. @default 0.48 */
  threshold?: number;
  /**
   * "fixed" compares every element with `threshold`; "dynamic" adjusts it per element by tag
   * importance, text ratio and link ratio.
   * @default "fixed"
   */
  thresholdType?: ThresholdType;
  /** Elements with fewer words always score -1. */
  minWordThreshold?: number;
}

/**
 * A content filter receives a full HTML document and returns the HTML blocks worth keeping.
 */
export interface ContentFilter {
  filterContent(html: string): string[];
}

// Removed before scoring
const EXCLUDED_TAGS: ReadonlyArray<string> = [
  "nav",
  "footer",
  "header",
  "aside",
  "script",
  "style",
  "form",
  "iframe",
  "noscript",
];

const TAG_WEIGHTS: Readonly<Record<string, number>> = {
  div: 0.5,
  p: 1.0,
  article: 1.5,
  section: 1.0,
  span: 0.3,
  li: 0.5,
  ul: 0.5,
  ol: 0.5,
  h1: 1.2,
  h2: 1.1,
  h3: 1.0,
  h4: 0.9,
  h5: 0.8,
  h6: 0.7,
};
const DEFAULT_TAG_WEIGHT = 0.5;

const TAG_IMPORTANCE: Readonly<Record<string, number>> = {
  article: 1.5,
  main: 1.4,
  section: 1.3,
  p: 1.2,
  h1: 1.4,
  h2: 1.3,
  h3: 1.2,
  div: 0.7,
  span: 0.6,
};
const DEFAULT_TAG_IMPORTANCE = 0.7;

const METRIC_WEIGHTS = {
  textDensity: 0.4,
  linkDensity: 0.2,
  tagWeight: 0.2,
  classIdWeight: 0.1,
  textLength: 0.1,
} as const;

const NEGATIVE_CLASS_ID_PATTERN = /nav|footer|header|sidebar|ads|comment|promo|advert|social|share/i;
const CLASS_ID_PENALTY = 0.5;

interface NodeMetrics {
  tagName: string;
  textLength: number;
  /** Length of the element's inner markup. */
  tagLength: number;
  linkTextLength: number;
}

function textOf(element: NHPHTMLElement): string {
  return element.text.replace(/\s+/g, " ").trim();
}

/**
 * Scores every element below <body> and drops those that look like boilerplate:
 * little text for their markup, mostly link text, low-value tags or class names such as
 * "sidebar" or "promo".
 */
export class PruningContentFilter implements ContentFilter {
  private readonly threshold: number;
  private readonly thresholdType: ThresholdType;
  private readonly minWordThreshold: number | undefined;

  constructor(options: PruningContentFilterOptions = {}) {
    this.threshold = options.threshold ?? 0.48;
    this.thresholdType = options.thresholdType ?? "fixed";
    this.minWordThreshold = options.minWordThreshold;
  }

  filterContent(html: string): string[] {
    if (!html.trim()) return [];

    const root = parse(html, { comment: false });
    for (const tag of EXCLUDED_TAGS) {
      root.querySelectorAll(tag).forEach((el) => el.remove());
    }

    const body = root.querySelector("body") ?? root;
    for (const child of this.elementChildren(body)) {
      this.pruneTree(child);
    }

    return this.elementChildren(body).map((el) => el.outerHTML);
  }

  /** Weighted score of one element; higher means more likely to be content. */
  scoreElement(element: NHPHTMLElement): number {
    return this.computeScore(element, this.collectMetrics(element));
  }

  private elementChildren(element: NHPHTMLElement): NHPHTMLElement[] {
    return element.childNodes.filter((node): node is NHPHTMLElement => node instanceof NHPHTMLElement);
  }

  private pruneTree(element: NHPHTMLElement): void {
    const metrics = this.collectMetrics(element);
    const score = this.computeScore(element, metrics);

    if (score < this.thresholdFor(metrics)) {
      element.remove();
      return;
    }
    for (const child of this.elementChildren(element)) {
      this.pruneTree(child);
    }
  }

  private collectMetrics(element: NHPHTMLElement): NodeMetrics {
    const linkTextLength = element
      .querySelectorAll("a")
      .reduce((total, link) => total + textOf(link).length, 0);

    return {
      tagName: element.tagName.toLowerCase(),
      textLength: textOf(element).length,
      tagLength: element.innerHTML.length,
      linkTextLength,
    };
  }

  private thresholdFor(metrics: NodeMetrics): number {
    if (this.thresholdType === "fixed") {
      return this.threshold;
    }

    const importance = TAG_IMPORTANCE[metrics.tagName] ?? DEFAULT_TAG_IMPORTANCE;
    const textRatio = metrics.tagLength > 0 ? metrics.textLength / metrics.tagLength : 0;
    const linkRatio = metrics.textLength > 0 ? metrics.linkTextLength / metrics.textLength : 1;

    let threshold = this.threshold;
    if (importance > 1) threshold *= 0.8;
    if (textRatio > 0.4) threshold *= 0.9;
    if (linkRatio > 0.6) threshold *= 1.2;
    return threshold;
  }

  private computeScore(element: NHPHTMLElement, metrics: NodeMetrics): number {
    if (this.minWordThreshold !== undefined && countWords(element.text) < this.minWordThreshold) {
      return -1;
    }

    const { textLength, tagLength, linkTextLength } = metrics;
    const textDensity = tagLength > 0 ? textLength / tagLength : 0;
    const linkDensity = 1 - (textLength > 0 ? Math.min(1, linkTextLength / textLength) : 0);
    const tagWeight = TAG_WEIGHTS[metrics.tagName] ?? DEFAULT_TAG_WEIGHT;
    const classIdWeight = this.classIdWeight(element);
    const textLengthScore = Math.log(textLength + 1);

    return (
      METRIC_WEIGHTS.textDensity * textDensity +
      METRIC_WEIGHTS.linkDensity * linkDensity +
      METRIC_WEIGHTS.tagWeight * tagWeight +
      METRIC_WEIGHTS.classIdWeight * classIdWeight +
      METRIC_WEIGHTS.textLength * textLengthScore
    );
  }

  private classIdWeight(element: NHPHTMLElement): number {
    let weight = 0;
    const className = element.getAttribute("class");
    if (className && NEGATIVE_CLASS_ID_PATTERN.test(className)) weight -= CLASS_ID_PENALTY;
    const id = element.getAttribute("id");
    if (id && NEGATIVE_CLASS_ID_PATTERN.test(id)) weight -= CLASS_ID_PENALTY;
    return weight;
  }
}
