import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Page } from "playwright-core";
import { PlaywrightCrawlerStrategy } from "../src/PlaywrightCrawlerStrategy.js";
import { PlaywrightBrowserPool } from "../src/browser/PlaywrightBrowserPool.js";
import { resolveRunConfig } from "../src/run-config.js";
import { CrawlError } from "../src/errors.js";
import type { CrawlerRunConfig, HookContext } from "../src/types.js";

const pool = vi.hoisted(() => ({
  initialize: vi.fn(),
  acquirePage: vi.fn(),
  releasePage: vi.fn(),
  cleanup: vi.fn(),
  getMetrics: vi.fn(),
}));

// Every strategy gets the same mocked pool
vi.mock("../src/browser/PlaywrightBrowserPool.js", () => ({
  PlaywrightBrowserPool: vi.fn(function () {
    return pool;
  }),
}));

const URL_UNDER_TEST = "https://example.com/";
const PAGE_HTML = "<html><head><title>Example</title></head><body><p>Hello</p></body></html>";

const createMockResponse = (status = 200) => ({
  ok: vi.fn(() => status >= 200 && status < 300),
  status: vi.fn(() => status),
  headers: vi.fn(() => ({ "content-type": "text/html" })),
});

const createMockPage = (response: ReturnType<typeof createMockResponse> | null = createMockResponse()) => ({
  setExtraHTTPHeaders: vi.fn().mockResolvedValue(undefined),
  goto: vi.fn().mockResolvedValue(response),
  evaluate: vi.fn().mockResolvedValue(undefined),
  waitForSelector: vi.fn().mockResolvedValue(null),
  waitForFunction: vi.fn().mockResolvedValue(null),
  waitForTimeout: vi.fn().mockResolvedValue(undefined),
  content: vi.fn().mockResolvedValue(PAGE_HTML),
  title: vi.fn().mockResolvedValue("Example"),
  url: vi.fn(() => "https://example.com/landing"),
});

type MockPage = ReturnType<typeof createMockPage>;

function runConfig(overrides: CrawlerRunConfig = {}) {
  return resolveRunConfig({ delayBeforeReturnHtml: 0, retryDelay: 0, ...overrides });
}

async function crawlError(promise: Promise<unknown>): Promise<CrawlError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CrawlError) return error;
    throw error;
  }
  throw new Error("expected the crawl to fail");
}

describe("PlaywrightCrawlerStrategy", () => {
  let strategy: PlaywrightCrawlerStrategy;
  let page: MockPage;

  beforeEach(() => {
    vi.clearAllMocks();
    page = createMockPage();
    pool.initialize.mockReset().mockResolvedValue(undefined);
    pool.acquirePage.mockReset().mockImplementation(async () => ({ page: page as unknown as Page, context: {} }));
    pool.releasePage.mockReset().mockResolvedValue(undefined);
    pool.cleanup.mockReset().mockResolvedValue(undefined);
    pool.getMetrics.mockReset().mockReturnValue([]);
    strategy = new PlaywrightCrawlerStrategy();
  });

  afterEach(async () => {
    await strategy.close();
  });

  it("starts the pool lazily and returns the rendered page", async () => {
    const snapshot = await strategy.crawl(URL_UNDER_TEST, runConfig());

    expect(pool.initialize).toHaveBeenCalledTimes(1);
    expect(page.goto).toHaveBeenCalledWith(URL_UNDER_TEST, { waitUntil: "domcontentloaded", timeout: 60000 });
    expect(snapshot).toEqual({
      html: PAGE_HTML,
      url: "https://example.com/landing",
      title: "Example",
      statusCode: 200,
      responseHeaders: { "content-type": "text/html" },
    });
    expect(pool.releasePage).toHaveBeenCalledWith(page);
  });

  it("reuses the pool across crawls", async () => {
    await strategy.crawl(URL_UNDER_TEST, runConfig());
    await strategy.crawl("https://example.com/other", runConfig());

    expect(PlaywrightBrowserPool).toHaveBeenCalledTimes(1);
    expect(pool.initialize).toHaveBeenCalledTimes(1);
  });

  it("passes browser settings to the pool", async () => {
    strategy = new PlaywrightCrawlerStrategy({ browserType: "firefox", headless: false, maxBrowsers: 1 });
    await strategy.start();

    expect(PlaywrightBrowserPool).toHaveBeenCalledWith(
      expect.objectContaining({ browserType: "firefox", headless: false, maxBrowsers: 1 })
    );
  });

  it("reports an empty title as null", async () => {
    page.title.mockResolvedValue("");
    const snapshot = await strategy.crawl(URL_UNDER_TEST, runConfig());
    expect(snapshot.title).toBeNull();
  });

  it("runs hooks, scripts and the wait in order", async () => {
    const calls: string[] = [];
    const record = (name: string) => async () => {
      calls.push(name);
    };
    page.goto.mockImplementation(async () => {
      calls.push("goto");
      return createMockResponse();
    });
    page.evaluate.mockImplementation(async () => {
      calls.push("evaluate");
    });
    page.waitForSelector.mockImplementation(async () => {
      calls.push("waitFor");
      return null;
    });

    strategy.setHook("onPageCreated", record("onPageCreated"));
    strategy.setHook("beforeGoto", record("beforeGoto"));
    strategy.setHook("afterGoto", record("afterGoto"));
    strategy.setHook("onExecutionStarted", record("onExecutionStarted"));
    strategy.setHook("beforeRetrieveHtml", record("beforeRetrieveHtml"));

    await strategy.crawl(URL_UNDER_TEST, runConfig({ jsCode: "window.scrollTo(0, 500);", waitFor: ".results" }));

    expect(calls).toEqual([
      "onPageCreated",
      "beforeGoto",
      "goto",
      "afterGoto",
      "onExecutionStarted",
      "evaluate",
      "waitFor",
      "beforeRetrieveHtml",
    ]);
  });

  it("gives hooks the navigation response once there is one", async () => {
    const contexts: Array<[string, HookContext]> = [];
    strategy.setHook("beforeGoto", (context) => {
      contexts.push(["beforeGoto", context]);
    });
    strategy.setHook("afterGoto", (context) => {
      contexts.push(["afterGoto", context]);
    });

    await strategy.crawl(URL_UNDER_TEST, runConfig());

    const [[, before], [, after]] = contexts;
    expect(before.response).toBeNull();
    expect(before.url).toBe(URL_UNDER_TEST);
    expect(after.response).not.toBeNull();
    expect(after.response?.status()).toBe(200);
  });

  it("skips onExecutionStarted when there is no script", async () => {
    const onExecutionStarted = vi.fn();
    strategy.setHook("onExecutionStarted", onExecutionStarted);

    await strategy.crawl(URL_UNDER_TEST, runConfig());

    expect(onExecutionStarted).not.toHaveBeenCalled();
    expect(page.evaluate).not.toHaveBeenCalled();
  });

  it("prefers hooks from the run config over crawler hooks", async () => {
    const crawlerHook = vi.fn();
    const runHook = vi.fn();
    strategy.setHook("afterGoto", crawlerHook);

    await strategy.crawl(URL_UNDER_TEST, runConfig({ hooks: { afterGoto: runHook } }));

    expect(runHook).toHaveBeenCalledTimes(1);
    expect(crawlerHook).not.toHaveBeenCalled();
  });

  it("wraps each script in an async function and runs them in order", async () => {
    await strategy.crawl(URL_UNDER_TEST, runConfig({ jsCode: ["document.title = 'x';", "await next();"] }));

    expect(page.evaluate.mock.calls).toEqual([
      ["(async () => {\ndocument.title = 'x';\n})()"],
      ["(async () => {\nawait next();\n})()"],
    ]);
  });

  it("sends extra headers configured on the browser", async () => {
    strategy = new PlaywrightCrawlerStrategy({ headers: { "X-Test": "1" } });
    await strategy.crawl(URL_UNDER_TEST, runConfig());
    expect(page.setExtraHTTPHeaders).toHaveBeenCalledWith({ "X-Test": "1" });
  });

  it("does not touch headers when none are configured", async () => {
    await strategy.crawl(URL_UNDER_TEST, runConfig());
    expect(page.setExtraHTTPHeaders).not.toHaveBeenCalled();
  });

  it("waits for css: selectors as attached elements", async () => {
    await strategy.crawl(URL_UNDER_TEST, runConfig({ waitFor: "css:.results", pageTimeout: 5000 }));
    expect(page.waitForSelector).toHaveBeenCalledWith(".results", { state: "attached", timeout: 5000 });
  });

  it("waits for js: expressions with waitForFunction", async () => {
    await strategy.crawl(URL_UNDER_TEST, runConfig({ waitFor: "js:window.ready === true", pageTimeout: 5000 }));
    expect(page.waitForFunction).toHaveBeenCalledWith("window.ready === true", undefined, { timeout: 5000 });
  });

  it("pauses before reading the page when a delay is set", async () => {
    await strategy.crawl(URL_UNDER_TEST, runConfig({ delayBeforeReturnHtml: 250 }));
    expect(page.waitForTimeout).toHaveBeenCalledWith(250);
  });

  it("fails with ERR_WAIT_FOR_TIMEOUT when the condition never holds", async () => {
    page.waitForSelector.mockRejectedValue(new Error("Timeout 5000ms exceeded"));

    const error = await crawlError(
      strategy.crawl(URL_UNDER_TEST, runConfig({ waitFor: "css:.results", pageTimeout: 5000, maxRetries: 0 }))
    );

    expect(error.code).toBe("ERR_WAIT_FOR_TIMEOUT");
    expect(error.message).toBe(
      'Crawl of https://example.com/ failed after 1 attempt: Wait condition "css:.results" was not met: Timeout 5000ms exceeded'
    );
    expect(pool.releasePage).toHaveBeenCalledWith(page);
  });

  it("fails with ERR_HTTP_ERROR and the status code on error responses", async () => {
    page.goto.mockResolvedValue(createMockResponse(404));

    const error = await crawlError(strategy.crawl(URL_UNDER_TEST, runConfig({ maxRetries: 0 })));

    expect(error.code).toBe("ERR_HTTP_ERROR");
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe("Crawl of https://example.com/ failed after 1 attempt: HTTP error status received: 404");
  });

  it("fails with ERR_NO_RESPONSE when navigation yields no response", async () => {
    page.goto.mockResolvedValue(null);
    const error = await crawlError(strategy.crawl(URL_UNDER_TEST, runConfig({ maxRetries: 0 })));
    expect(error.code).toBe("ERR_NO_RESPONSE");
  });

  it("retries failed navigations", async () => {
    page.goto
      .mockRejectedValueOnce(new Error("net::ERR_CONNECTION_RESET"))
      .mockRejectedValueOnce(new Error("net::ERR_CONNECTION_RESET"))
      .mockResolvedValue(createMockResponse());

    const snapshot = await strategy.crawl(URL_UNDER_TEST, runConfig({ maxRetries: 2 }));

    expect(snapshot.statusCode).toBe(200);
    expect(page.goto).toHaveBeenCalledTimes(3);
    expect(pool.releasePage).toHaveBeenCalledTimes(3);
  });

  it("gives up after maxRetries and keeps the original error code", async () => {
    page.goto.mockRejectedValue(new Error("net::ERR_NAME_NOT_RESOLVED"));

    const error = await crawlError(strategy.crawl(URL_UNDER_TEST, runConfig({ maxRetries: 1 })));

    expect(page.goto).toHaveBeenCalledTimes(2);
    expect(error.code).toBe("ERR_NAVIGATION");
    expect(error.message).toBe(
      "Crawl of https://example.com/ failed after 2 attempts: Playwright navigation failed: net::ERR_NAME_NOT_RESOLVED"
    );
  });

  it("does not retry when a hook throws", async () => {
    strategy.setHook("afterGoto", () => {
      throw new Error("selector missing");
    });

    const error = await crawlError(strategy.crawl(URL_UNDER_TEST, runConfig({ maxRetries: 2 })));

    expect(page.goto).toHaveBeenCalledTimes(1);
    expect(error.code).toBe("ERR_HOOK_FAILED");
    expect(error.message).toBe('Crawl of https://example.com/ failed after 1 attempt: Hook "afterGoto" failed: selector missing');
  });

  it("does not retry when a script throws", async () => {
    page.evaluate.mockRejectedValue(new Error("ReferenceError: next is not defined"));

    const error = await crawlError(strategy.crawl(URL_UNDER_TEST, runConfig({ jsCode: "await next();", maxRetries: 2 })));

    expect(page.goto).toHaveBeenCalledTimes(1);
    expect(error.code).toBe("ERR_JS_EXECUTION");
    expect(error.message).toBe(
      "Crawl of https://example.com/ failed after 1 attempt: JavaScript snippet 1 failed: ReferenceError: next is not defined"
    );
  });

  it("cleans up and reports ERR_POOL_INIT_FAILED when the browser cannot start", async () => {
    pool.initialize.mockRejectedValue(new Error("Executable doesn't exist"));

    const error = await crawlError(strategy.crawl(URL_UNDER_TEST, runConfig({ maxRetries: 0 })));

    expect(error.code).toBe("ERR_POOL_INIT_FAILED");
    expect(error.message).toBe("Crawl of https://example.com/ failed after 1 attempt: Pool init failed: Executable doesn't exist");
    expect(pool.cleanup).toHaveBeenCalledTimes(1);
  });

  it("exposes pool metrics and releases the pool on close", async () => {
    const metrics = [
      {
        id: "browser-1",
        browserType: "chromium",
        pagesCreated: 1,
        activePages: 0,
        lastUsed: new Date(0),
        errors: 0,
        createdAt: new Date(0),
        isHealthy: true,
      },
    ];
    pool.getMetrics.mockReturnValue(metrics);

    expect(strategy.getMetrics()).toEqual([]);
    await strategy.start();
    expect(strategy.getMetrics()).toEqual(metrics);

    await strategy.close();
    expect(pool.cleanup).toHaveBeenCalledTimes(1);
    expect(strategy.getMetrics()).toEqual([]);
  });
});
