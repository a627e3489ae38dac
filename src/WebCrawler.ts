import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { CrawlerStrategy } from "./CrawlerStrategy.js";
import { PlaywrightCrawlerStrategy } from "./PlaywrightCrawlerStrategy.js";
import { CrawlError, toCrawlError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { resolveRunConfig } from "./run-config.js";
import { CrawlCache } from "./utils/crawl-cache.js";
import { cleanHtml, extractTitle } from "./utils/html-cleaner.js";
import { DEFAULT_CACHE_TTL_MS } from "./constants.js";
import type {
  BrowserConfig,
  BrowserMetrics,
  CrawlerHook,
  CrawlerRunConfig,
  CrawlResult,
  HookName,
  MarkdownGenerationResult,
  PageSnapshot,
  ResolvedRunConfig,
} from "./types.js";

type UrlKind = "raw" | "file" | "web";

const RAW_PREFIX = /^raw:(\/\/)?/;

function classifyUrl(url: string): UrlKind | null {
  if (RAW_PREFIX.test(url)) return "raw";
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (parsed.protocol === "file:") return "file";
  if (parsed.protocol === "http:" || parsed.protocol === "https:") return "web";
  return null;
}

function failedResult(url: string, error: CrawlError): CrawlResult {
  return {
    url,
    html: "",
    cleanedHtml: "",
    title: null,
    statusCode: error.statusCode,
    success: false,
    isFromCache: false,
    markdown: null,
    extractedContent: null,
    error,
    errorMessage: error.message,
  };
}

export interface WebCrawlerOptions {
  /** Defaults to a PlaywrightCrawlerStrategy built from the browser config. */
  strategy?: CrawlerStrategy;
  /** Defaults to a console logger honouring `browserConfig.verbose`. */
  logger?: Logger;
}

/**
 * Crawls pages and turns them into cleaned HTML, Markdown and extracted records.
 *
 * Per-URL failures never throw: they come back as a CrawlResult with `success: false`.
 *
 * @example
 * const result = await WebCrawler.run({ headless: true }, (crawler) =>
 *   crawler.crawl("https://example.com", { cacheMode: CacheMode.ENABLED })
 * );
 * console.log(result.markdown?.rawMarkdown);
 */
export class WebCrawler {
  private readonly strategy: CrawlerStrategy;
  private readonly logger: Logger;
  private readonly cache: CrawlCache;
  private started = false;

  constructor(
    private readonly browserConfig: BrowserConfig = {},
    options: WebCrawlerOptions = {}
  ) {
    this.logger = options.logger ?? createConsoleLogger({ verbose: browserConfig.verbose, prefix: "[crawler]" });
    this.strategy = options.strategy ?? new PlaywrightCrawlerStrategy(browserConfig, { logger: this.logger });
    this.cache = new CrawlCache(browserConfig.cacheTTL ?? DEFAULT_CACHE_TTL_MS);
  }

  /**
   * Starts a crawler, hands it to `fn` and closes it afterwards, also when `fn` throws.
   */
  static async run<T>(
    browserConfig: BrowserConfig,
    fn: (crawler: WebCrawler) => Promise<T>,
    options: WebCrawlerOptions = {}
  ): Promise<T> {
    const crawler = new WebCrawler(browserConfig, options);
    await crawler.start();
    try {
      return await fn(crawler);
    } finally {
      await crawler.close();
    }
  }

  async start(): Promise<void> {
    if (this.started) return;
    await this.strategy.start?.();
    this.started = true;
    this.logger.info(`WebCrawler: started (${this.browserConfig.browserType ?? "chromium"})`);
  }

  async close(): Promise<void> {
    await this.strategy.close();
    this.cache.clear();
    this.started = false;
    this.logger.info("WebCrawler: closed");
  }

  setHook(name: HookName, hook: CrawlerHook): void {
    this.strategy.setHook(name, hook);
  }

  getMetrics(): BrowserMetrics[] {
    return this.strategy.getMetrics();
  }

  async crawl(url: string, runConfig: CrawlerRunConfig = {}): Promise<CrawlResult> {
    const config = resolveRunConfig(runConfig);
    const kind = classifyUrl(url);
    if (!kind) {
      const error = new CrawlError(`Invalid URL "${url}": expected http(s)://, file:// or raw:`, "ERR_INVALID_URL");
      this.logger.warn(`WebCrawler: ${error.message}`);
      return failedResult(url, error);
    }

    const cacheable = kind === "web";
    let snapshot = cacheable && CrawlCache.shouldRead(config.cacheMode) ? this.cache.get(url) : null;
    const isFromCache = snapshot !== null;
    if (isFromCache) {
      this.logger.debug(`WebCrawler: cache hit for ${url}`);
    }

    if (!snapshot) {
      try {
        snapshot = await this.fetchSnapshot(url, kind, config);
      } catch (error: unknown) {
        const crawlError = toCrawlError(error, "ERR_CRAWL_FAILED", "Crawl failed");
        this.logger.error(`WebCrawler: failed to crawl ${url}: ${crawlError.message}`);
        return failedResult(url, crawlError);
      }
      if (cacheable && CrawlCache.shouldWrite(config.cacheMode)) {
        this.cache.set(url, snapshot);
      }
    }

    return this.processSnapshot(snapshot, config, isFromCache);
  }

  /**
   * Crawls several URLs concurrently; the strategy's queue bounds how many pages are open at once.
   */
  async crawlMany(urls: string[], runConfig: CrawlerRunConfig = {}): Promise<CrawlResult[]> {
    return Promise.all(urls.map((url) => this.crawl(url, runConfig)));
  }

  private async fetchSnapshot(url: string, kind: UrlKind, config: ResolvedRunConfig): Promise<PageSnapshot> {
    switch (kind) {
      case "raw": {
        const html = url.replace(RAW_PREFIX, "");
        return { html, url, title: extractTitle(html), statusCode: 200, responseHeaders: {} };
      }
      case "file": {
        let html: string;
        try {
          html = await readFile(fileURLToPath(url), "utf8");
        } catch (error: unknown) {
          throw toCrawlError(error, "ERR_FILE_READ", `Could not read ${url}`);
        }
        return { html, url, title: extractTitle(html), statusCode: 200, responseHeaders: {} };
      }
      case "web":
        return this.strategy.crawl(url, config);
    }
  }

  private async processSnapshot(
    snapshot: PageSnapshot,
    config: ResolvedRunConfig,
    isFromCache: boolean
  ): Promise<CrawlResult> {
    const cleanedHtml = cleanHtml(snapshot.html, {
      wordCountThreshold: config.wordCountThreshold,
      excludedTags: config.excludedTags,
    });

    let error: CrawlError | undefined;
    let markdown: MarkdownGenerationResult | null = null;
    try {
      markdown = config.markdownGenerator.generate(cleanedHtml, {
        baseUrl: /^https?:/i.test(snapshot.url) ? snapshot.url : undefined,
      });
    } catch (markdownError: unknown) {
      error = toCrawlError(markdownError, "ERR_CRAWL_FAILED", "Markdown generation failed");
      this.logger.warn(`WebCrawler: ${error.message}`);
    }

    let extractedContent: string | null = null;
    const strategy = config.extractionStrategy;
    if (strategy) {
      try {
        extractedContent = await strategy.extract({
          url: snapshot.url,
          html: snapshot.html,
          cleanedHtml,
          markdown: markdown ?? { rawMarkdown: "", fitMarkdown: "", fitHtml: "" },
        });
      } catch (extractionError: unknown) {
        const message = extractionError instanceof Error ? extractionError.message : String(extractionError);
        // A Markdown failure already recorded stays in the message.
        const prefix = error ? `${error.message}; ` : "";
        error = new CrawlError(
          `${prefix}Extraction with ${strategy.name} failed: ${message}`,
          "ERR_EXTRACTION_FAILED",
          extractionError instanceof Error ? extractionError : undefined
        );
        this.logger.warn(`WebCrawler: ${error.message}`);
      }
    }

    return {
      url: snapshot.url,
      html: snapshot.html,
      cleanedHtml,
      title: snapshot.title,
      statusCode: snapshot.statusCode,
      success: true,
      isFromCache,
      markdown,
      extractedContent,
      error,
      errorMessage: error?.message,
    };
  }
}
