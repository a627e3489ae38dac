import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { WebCrawler } from "../src/WebCrawler.js";
import type { CrawlerStrategy } from "../src/CrawlerStrategy.js";
import { JsonCssExtractionStrategy } from "../src/extraction/JsonCssExtractionStrategy.js";
import { CrawlError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { CacheMode, type BrowserConfig, type MarkdownGenerationResult, type PageSnapshot } from "../src/types.js";

const PAGE_HTML =
  "<html><head><title>Fake</title></head><body><h1>Hello</h1><p>Some body text</p><script>track()</script></body></html>";
const CLEANED_HTML = "<html><head><title>Fake</title></head><body><h1>Hello</h1><p>Some body text</p></body></html>";

function createStrategy() {
  return {
    start: vi.fn(async () => {}),
    crawl: vi.fn(
      async (url: string): Promise<PageSnapshot> => ({
        html: PAGE_HTML,
        url,
        title: "Fake",
        statusCode: 200,
        responseHeaders: { "content-type": "text/html" },
      })
    ),
    setHook: vi.fn(),
    close: vi.fn(async () => {}),
    getMetrics: vi.fn(() => []),
  } satisfies CrawlerStrategy;
}

function createCrawler(browserConfig: BrowserConfig = {}) {
  const strategy = createStrategy();
  const crawler = new WebCrawler(browserConfig, { strategy, logger: silentLogger });
  return { crawler, strategy };
}

describe("WebCrawler", () => {
  it("turns a fetched page into cleaned HTML and Markdown", async () => {
    const { crawler, strategy } = createCrawler();

    const result = await crawler.crawl("https://example.com/page");

    expect(strategy.crawl).toHaveBeenCalledWith(
      "https://example.com/page",
      expect.objectContaining({ cacheMode: CacheMode.BYPASS, waitUntil: "domcontentloaded" })
    );
    expect(result).toMatchObject({
      url: "https://example.com/page",
      html: PAGE_HTML,
      cleanedHtml: CLEANED_HTML,
      title: "Fake",
      statusCode: 200,
      success: true,
      isFromCache: false,
      extractedContent: null,
      error: undefined,
      errorMessage: undefined,
    });
    expect(result.markdown).toEqual({ rawMarkdown: "# Hello\n\nSome body text", fitMarkdown: "", fitHtml: "" });
  });

  it("passes the page URL as the base for Markdown links, only for web pages", async () => {
    const { crawler } = createCrawler();
    const generate = vi.fn((): MarkdownGenerationResult => ({ rawMarkdown: "", fitMarkdown: "", fitHtml: "" }));

    await crawler.crawl("https://example.com/page", { markdownGenerator: { generate } });
    await crawler.crawl("raw:<p>inline</p>", { markdownGenerator: { generate } });

    expect(generate).toHaveBeenNthCalledWith(1, CLEANED_HTML, { baseUrl: "https://example.com/page" });
    expect(generate).toHaveBeenNthCalledWith(2, "<p>inline</p>", { baseUrl: undefined });
  });

  it("renders raw: HTML without the strategy", async () => {
    const { crawler, strategy } = createCrawler();
    const url = "raw:<html><head><title>Raw</title></head><body><p>Inline page</p></body></html>";

    const result = await crawler.crawl(url);

    expect(strategy.crawl).not.toHaveBeenCalled();
    expect(result).toMatchObject({ url, title: "Raw", statusCode: 200, success: true });
    expect(result.html).toBe("<html><head><title>Raw</title></head><body><p>Inline page</p></body></html>");
    expect(result.markdown?.rawMarkdown).toBe("Inline page");
  });

  it("accepts the raw:// spelling", async () => {
    const { crawler } = createCrawler();
    const result = await crawler.crawl("raw://<p>Inline</p>");
    expect(result.html).toBe("<p>Inline</p>");
    expect(result.title).toBeNull();
  });

  describe("file URLs", () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), "crawler-files-"));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("reads local files", async () => {
      const path = join(dir, "page.html");
      writeFileSync(path, "<html><head><title>Local</title></head><body><p>From disk</p></body></html>");
      const { crawler, strategy } = createCrawler();

      const result = await crawler.crawl(pathToFileURL(path).href);

      expect(strategy.crawl).not.toHaveBeenCalled();
      expect(result).toMatchObject({ title: "Local", statusCode: 200, success: true });
      expect(result.markdown?.rawMarkdown).toBe("From disk");
    });

    it("reports unreadable files as ERR_FILE_READ", async () => {
      const url = pathToFileURL(join(dir, "missing.html")).href;
      const { crawler } = createCrawler();

      const result = await crawler.crawl(url);

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe("ERR_FILE_READ");
      expect(result.errorMessage?.startsWith(`Could not read ${url}: `)).toBe(true);
    });
  });

  it.each(["ftp://example.com/file", "not a url"])("rejects %s as an invalid URL", async (url) => {
    const { crawler, strategy } = createCrawler();

    const result = await crawler.crawl(url);

    expect(strategy.crawl).not.toHaveBeenCalled();
    expect(result).toEqual({
      url,
      html: "",
      cleanedHtml: "",
      title: null,
      statusCode: undefined,
      success: false,
      isFromCache: false,
      markdown: null,
      extractedContent: null,
      error: expect.any(CrawlError),
      errorMessage: `Invalid URL "${url}": expected http(s)://, file:// or raw:`,
    });
    expect(result.error?.code).toBe("ERR_INVALID_URL");
  });

  it("returns strategy failures as unsuccessful results", async () => {
    const { crawler, strategy } = createCrawler();
    strategy.crawl.mockRejectedValueOnce(
      new CrawlError("HTTP error status received: 404", "ERR_HTTP_ERROR", undefined, 404)
    );

    const result = await crawler.crawl("https://example.com/missing");

    expect(result).toMatchObject({
      success: false,
      statusCode: 404,
      html: "",
      markdown: null,
      errorMessage: "HTTP error status received: 404",
    });
    expect(result.error?.code).toBe("ERR_HTTP_ERROR");
  });

  it("wraps unexpected strategy errors", async () => {
    const { crawler, strategy } = createCrawler();
    strategy.crawl.mockRejectedValueOnce(new Error("boom"));

    const result = await crawler.crawl("https://example.com/");

    expect(result.error?.code).toBe("ERR_CRAWL_FAILED");
    expect(result.errorMessage).toBe("Crawl failed: boom");
  });

  describe("cache", () => {
    it("serves a second ENABLED crawl from the cache", async () => {
      const { crawler, strategy } = createCrawler();

      const first = await crawler.crawl("https://example.com/", { cacheMode: CacheMode.ENABLED });
      const second = await crawler.crawl("https://example.com/", { cacheMode: CacheMode.ENABLED });

      expect(strategy.crawl).toHaveBeenCalledTimes(1);
      expect(first.isFromCache).toBe(false);
      expect(second.isFromCache).toBe(true);
      expect(second.html).toBe(PAGE_HTML);
    });

    it.each([CacheMode.BYPASS, CacheMode.DISABLED])("always fetches with %s", async (cacheMode) => {
      const { crawler, strategy } = createCrawler();

      await crawler.crawl("https://example.com/", { cacheMode: CacheMode.ENABLED });
      const result = await crawler.crawl("https://example.com/", { cacheMode });

      expect(strategy.crawl).toHaveBeenCalledTimes(2);
      expect(result.isFromCache).toBe(false);
    });

    it("stores with WRITE_ONLY and serves with READ_ONLY", async () => {
      const { crawler, strategy } = createCrawler();

      await crawler.crawl("https://example.com/", { cacheMode: CacheMode.WRITE_ONLY });
      await crawler.crawl("https://example.com/", { cacheMode: CacheMode.WRITE_ONLY });
      const cached = await crawler.crawl("https://example.com/", { cacheMode: CacheMode.READ_ONLY });

      expect(strategy.crawl).toHaveBeenCalledTimes(2);
      expect(cached.isFromCache).toBe(true);
    });

    it("does not store READ_ONLY misses", async () => {
      const { crawler, strategy } = createCrawler();

      await crawler.crawl("https://example.com/", { cacheMode: CacheMode.READ_ONLY });
      const second = await crawler.crawl("https://example.com/", { cacheMode: CacheMode.READ_ONLY });

      expect(strategy.crawl).toHaveBeenCalledTimes(2);
      expect(second.isFromCache).toBe(false);
    });

    it("never caches raw pages", async () => {
      const { crawler } = createCrawler();

      await crawler.crawl("raw:<p>x</p>", { cacheMode: CacheMode.ENABLED });
      const second = await crawler.crawl("raw:<p>x</p>", { cacheMode: CacheMode.ENABLED });

      expect(second.isFromCache).toBe(false);
    });

    it("stores nothing when the TTL is zero", async () => {
      const { crawler, strategy } = createCrawler({ cacheTTL: 0 });

      await crawler.crawl("https://example.com/", { cacheMode: CacheMode.ENABLED });
      await crawler.crawl("https://example.com/", { cacheMode: CacheMode.ENABLED });

      expect(strategy.crawl).toHaveBeenCalledTimes(2);
    });

    it("is emptied by close", async () => {
      const { crawler, strategy } = createCrawler();

      await crawler.crawl("https://example.com/", { cacheMode: CacheMode.ENABLED });
      await crawler.close();
      await crawler.crawl("https://example.com/", { cacheMode: CacheMode.ENABLED });

      expect(strategy.crawl).toHaveBeenCalledTimes(2);
    });
  });

  describe("extraction", () => {
    it("stores the strategy's JSON in extractedContent", async () => {
      const { crawler } = createCrawler();
      const extractionStrategy = new JsonCssExtractionStrategy({
        name: "Headings",
        baseSelector: "h1",
        fields: [{ name: "heading", selector: "", type: "text" }],
      });

      const result = await crawler.crawl("https://example.com/", { extractionStrategy });

      expect(result.extractedContent).toBe('[{"heading":"Hello"}]');
    });

    it("keeps the page when extraction fails", async () => {
      const { crawler } = createCrawler();
      const extractionStrategy = { name: "broken", extract: vi.fn().mockRejectedValue(new Error("bad payload")) };

      const result = await crawler.crawl("https://example.com/", { extractionStrategy });

      expect(result.success).toBe(true);
      expect(result.extractedContent).toBeNull();
      expect(result.markdown?.rawMarkdown).toBe("# Hello\n\nSome body text");
      expect(result.error?.code).toBe("ERR_EXTRACTION_FAILED");
      expect(result.errorMessage).toBe("Extraction with broken failed: bad payload");
    });

    it("hands the page to extraction even when Markdown generation fails", async () => {
      const { crawler } = createCrawler();
      const extract = vi.fn().mockResolvedValue("[]");
      const markdownGenerator = {
        generate: (): MarkdownGenerationResult => {
          throw new Error("converter crashed");
        },
      };

      const result = await crawler.crawl("https://example.com/", {
        markdownGenerator,
        extractionStrategy: { name: "spy", extract },
      });

      expect(result.success).toBe(true);
      expect(result.markdown).toBeNull();
      expect(result.error?.code).toBe("ERR_CRAWL_FAILED");
      expect(result.errorMessage).toBe("Markdown generation failed: converter crashed");
      expect(result.extractedContent).toBe("[]");
      expect(extract).toHaveBeenCalledWith({
        url: "https://example.com/",
        html: PAGE_HTML,
        cleanedHtml: CLEANED_HTML,
        markdown: { rawMarkdown: "", fitMarkdown: "", fitHtml: "" },
      });
    });

    it("reports both failures when Markdown generation and extraction fail", async () => {
      const { crawler } = createCrawler();
      const markdownGenerator = {
        generate: (): MarkdownGenerationResult => {
          throw new Error("converter crashed");
        },
      };
      const extract = vi.fn().mockRejectedValue(new Error("bad payload"));

      const result = await crawler.crawl("https://example.com/", {
        markdownGenerator,
        extractionStrategy: { name: "broken", extract },
      });

      expect(result.success).toBe(true);
      expect(result.markdown).toBeNull();
      expect(result.extractedContent).toBeNull();
      expect(result.error?.code).toBe("ERR_EXTRACTION_FAILED");
      expect(result.errorMessage).toBe(
        "Markdown generation failed: converter crashed; Extraction with broken failed: bad payload"
      );
    });
  });

  it("crawls several URLs and keeps their order", async () => {
    const { crawler } = createCrawler();

    const results = await crawler.crawlMany(["https://example.com/a", "raw:<p>b</p>", "ftp://example.com/c"]);

    expect(results.map((result) => [result.url, result.success])).toEqual([
      ["https://example.com/a", true],
      ["raw:<p>b</p>", true],
      ["ftp://example.com/c", false],
    ]);
  });

  it("delegates hooks and metrics to the strategy", () => {
    const { crawler, strategy } = createCrawler();
    const hook = vi.fn();

    crawler.setHook("afterGoto", hook);

    expect(strategy.setHook).toHaveBeenCalledWith("afterGoto", hook);
    expect(crawler.getMetrics()).toEqual([]);
  });

  describe("run", () => {
    it("starts the crawler, returns the callback's value and closes", async () => {
      const strategy = createStrategy();

      const title = await WebCrawler.run(
        {},
        async (crawler) => (await crawler.crawl("https://example.com/")).title,
        { strategy, logger: silentLogger }
      );

      expect(title).toBe("Fake");
      expect(strategy.start).toHaveBeenCalledTimes(1);
      expect(strategy.close).toHaveBeenCalledTimes(1);
    });

    it("closes when the callback throws", async () => {
      const strategy = createStrategy();

      await expect(
        WebCrawler.run(
          {},
          async () => {
            throw new Error("caller failed");
          },
          { strategy, logger: silentLogger }
        )
      ).rejects.toThrow("caller failed");
      expect(strategy.close).toHaveBeenCalledTimes(1);
    });
  });
});
