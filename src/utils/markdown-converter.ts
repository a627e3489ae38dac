import TurndownService from "turndown";
import { gfm } from "turndown-plugin-gfm";
import { parse, HTMLElement as NHPHTMLElement } from "node-html-parser";

// --- Constants ---

const PREPROCESSING_REMOVE_SELECTORS: ReadonlyArray<string> = [
  "head",
  "script",
  "style",
  "noscript",
  "template",
  "iframe:not([title])",
];

const CODE_BLOCK_LANG_PREFIXES: ReadonlyArray<string> = ["language-", "lang-"];

const POSTPROCESSING_MAX_CONSECUTIVE_NEWLINES = 2;

const TURNDOWN_NODE_ELEMENT_TYPE = 1;

// --- Types ---

export interface ConversionOptions {
  /** Resolves relative link and image URLs against this base. */
  baseUrl?: string;
  /** Maximum length of the final Markdown content. Defaults to Infinity. */
  maxContentLength?: number;
}

type TurndownNode = Node;
type TurndownHTMLElement = HTMLElement;

function isElement(node: TurndownNode): node is TurndownHTMLElement {
  return node.nodeType === TURNDOWN_NODE_ELEMENT_TYPE;
}

function resolveUrl(href: string, baseUrl: string | undefined): string {
  if (!baseUrl || !href || href.startsWith("#") || /^(mailto|tel|javascript|data):/i.test(href)) {
    return href;
  }
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

/**
 * HTML to Markdown conversion on top of turndown with the GFM plugin.
 *
 * The converter renders whatever HTML it is given; choosing the main content is the job of a
 * content filter (see PruningContentFilter).
 */
export class MarkdownConverter {
  private readonly turndownService: TurndownService;
  private baseUrl: string | undefined;

  constructor() {
    this.turndownService = new TurndownService({
      headingStyle: "atx",
      codeBlockStyle: "fenced",
      bulletListMarker: "-",
      strongDelimiter: "**",
      emDelimiter: "*",
      hr: "---",
    });

    this.turndownService.use(gfm);
    this.addRules();
  }

  /**
   * Converts an HTML document or fragment to Markdown.
   */
  public convert(html: string, options: ConversionOptions = {}): string {
    this.baseUrl = options.baseUrl;
    try {
      const preprocessed = this.preprocessHTML(html);
      const markdown = this.turndownService.turndown(preprocessed);
      return this.postprocessMarkdown(markdown, options);
    } finally {
      this.baseUrl = undefined;
    }
  }

  // --- Turndown rules ---

  private addRules(): void {
    this.turndownService.remove(["button", "input", "select", "textarea", "form", "canvas", "audio", "video"]);

    this.turndownService.addRule("listItem", {
      filter: "li",
      replacement: (content: string, node: TurndownNode, options: TurndownService.Options) => {
        let prefix = `${options.bulletListMarker} `;
        const parent = node.parentNode;
        if (parent && isElement(parent) && parent.nodeName === "OL") {
          const start = Number(parent.getAttribute("start") ?? "1");
          const index = Array.prototype.indexOf.call(parent.children, node);
          prefix = `${(Number.isFinite(start) ? start : 1) + index}. `;
        }
        // Continuation lines of an item are indented under its marker
        return prefix + content.trim().replace(/\n/g, "\n  ") + "\n";
      },
    });

    this.turndownService.addRule("blockquote", {
      filter: "blockquote",
      replacement: (content: string) => {
        const trimmed = content.trim();
        return trimmed ? "\n\n> " + trimmed.replace(/\n/g, "\n> ") + "\n\n" : "";
      },
    });

    this.turndownService.addRule("link", {
      filter: (node: TurndownNode): boolean => node.nodeName === "A" && isElement(node) && !!node.getAttribute("href"),
      replacement: (content: string, node: TurndownNode) => {
        if (!isElement(node)) return content;
        const href = resolveUrl(node.getAttribute("href") ?? "", this.baseUrl);
        const title = node.getAttribute("title");
        const text = content.trim() || href;
        return title ? `[${text}](${href} "${title}")` : `[${text}](${href})`;
      },
    });

    this.turndownService.addRule("image", {
      filter: (node: TurndownNode): boolean => node.nodeName === "IMG" && isElement(node) && !!node.getAttribute("src"),
      replacement: (_content: string, node: TurndownNode) => {
        if (!isElement(node)) return "";
        const src = resolveUrl(node.getAttribute("src") ?? "", this.baseUrl);
        const alt = node.getAttribute("alt") ?? "";
        const title = node.getAttribute("title");
        return title ? `![${alt}](${src} "${title}")` : `![${alt}](${src})`;
      },
    });

    this.turndownService.addRule("code-block", {
      filter: (node: TurndownNode): boolean => {
        if (!isElement(node) || node.nodeName !== "PRE") return false;
        return node.querySelector("code") !== null || /highlight|syntax|code|listing|source/i.test(node.className);
      },
      replacement: (_content: string, node: TurndownNode) => {
        if (!isElement(node)) return "";
        const codeElement = node.querySelector("code");
        const language = this.detectLanguage(node, codeElement);
        const code = (codeElement ?? node).textContent ?? "";
        return `\n\n\`\`\`${language}\n${code.replace(/\n+$/, "")}\n\`\`\`\n\n`;
      },
    });
  }

  private detectLanguage(pre: TurndownHTMLElement, code: Element | null): string {
    const explicit =
      pre.getAttribute("lang") || pre.getAttribute("language") || code?.getAttribute("lang") || code?.getAttribute("language");
    if (explicit) return explicit;

    const classes = `${pre.className} ${code?.className ?? ""}`.split(/\s+/).filter(Boolean);
    for (const cls of classes) {
      const prefix = CODE_BLOCK_LANG_PREFIXES.find((p) => cls.startsWith(p));
      if (prefix) return cls.substring(prefix.length);
    }
    return "";
  }

  // --- HTML preprocessing ---

  private preprocessHTML(html: string): string {
    const root = parse(html.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, ""), {
      comment: false,
      blockTextElements: { script: true, style: true, noscript: true, pre: true },
    });

    for (const selector of PREPROCESSING_REMOVE_SELECTORS) {
      root.querySelectorAll(selector).forEach((el) => el.remove());
    }
    this.normalizeTablesForMarkdown(root);

    const body = root.querySelector("body");
    return (body ?? root).innerHTML;
  }

  /**
   * Promotes the first row of header-less tables to <th> so the GFM plugin renders them
   * instead of keeping the raw HTML.
   */
  private normalizeTablesForMarkdown(root: NHPHTMLElement): void {
    for (const table of root.querySelectorAll("table")) {
      if (table.getAttribute("role")?.toLowerCase() === "presentation") continue;
      if (table.querySelector("th")) continue;

      const firstRow = table.querySelector("tr");
      if (!firstRow) continue;
      const cells = firstRow.querySelectorAll("td");
      if (cells.length === 0) continue;
      firstRow.replaceWith(`<tr>${cells.map((cell) => `<th>${cell.innerHTML}</th>`).join("")}</tr>`);
    }
  }

  // --- Markdown postprocessing ---

  private postprocessMarkdown(markdown: string, options: ConversionOptions): string {
    let processed = markdown;

    processed = processed.replace(/!?\[\]\([^)]*\)/g, ""); // Empty links and images
    processed = processed.replace(/(!?\[[^\]]*\]\()(\/\/)/g, "$1https://"); // Protocol-relative URLs
    processed = processed.replace(/[ \t]+$/gm, "");

    const maxNewlines = "\n".repeat(POSTPROCESSING_MAX_CONSECUTIVE_NEWLINES + 1);
    processed = processed.replace(new RegExp(`${maxNewlines}+`, "g"), "\n".repeat(POSTPROCESSING_MAX_CONSECUTIVE_NEWLINES));

    if (options.maxContentLength && processed.length > options.maxContentLength) {
      const cut = processed.lastIndexOf(".", options.maxContentLength - 15);
      const sliceEnd = cut > options.maxContentLength / 2 ? cut + 1 : options.maxContentLength;
      processed = processed.slice(0, sliceEnd) + "... (truncated)";
    }

    return processed.trim();
  }
}
