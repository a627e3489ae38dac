import PQueue from "p-queue";
import type { Page, Response as PlaywrightResponse } from "playwright-core";
import { PlaywrightBrowserPool } from "./browser/PlaywrightBrowserPool.js";
import type { CrawlerStrategy } from "./CrawlerStrategy.js";
import { CrawlError, toCrawlError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  BrowserConfig,
  BrowserMetrics,
  CrawlerHook,
  CrawlerHooks,
  HookContext,
  HookName,
  PageSnapshot,
  ResolvedRunConfig,
} from "./types.js";
import {
  EVALUATION_TIMEOUT_MS,
  HUMAN_SIMULATION_MIN_DELAY_MS,
  HUMAN_SIMULATION_RANDOM_MOUSE_DELAY_MS,
  HUMAN_SIMULATION_RANDOM_SCROLL_DELAY_MS,
  HUMAN_SIMULATION_SCROLL_DELAY_MS,
} from "./constants.js";

function delay(time: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, time));
}

// Failures that would repeat identically on another attempt
const NON_RETRYABLE_CODES: ReadonlySet<string> = new Set(["ERR_HOOK_FAILED", "ERR_JS_EXECUTION"]);

export interface PlaywrightCrawlerStrategyOptions {
  logger?: Logger;
  hooks?: CrawlerHooks;
}

/**
 * Crawls pages with a pooled, stealth-augmented Playwright browser.
 *
 * Pages are processed through a queue bounded by `concurrentPages`. Each page walks through
 * the hook sequence onPageCreated, beforeGoto, afterGoto, onExecutionStarted and
 * beforeRetrieveHtml; a throwing hook fails the page.
 */
export class PlaywrightCrawlerStrategy implements CrawlerStrategy {
  private browserPool: PlaywrightBrowserPool | null = null;
  private poolInitialization: Promise<PlaywrightBrowserPool> | null = null;
  private readonly queue: PQueue;
  private readonly hooks: CrawlerHooks;
  private readonly logger: Logger;

  constructor(
    private readonly browserConfig: BrowserConfig = {},
    options: PlaywrightCrawlerStrategyOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.hooks = { ...options.hooks };
    this.queue = new PQueue({ concurrency: browserConfig.concurrentPages ?? 3 });
  }

  setHook(name: HookName, hook: CrawlerHook): void {
    this.hooks[name] = hook;
  }

  /**
   * Starts the browser pool now instead of on the first crawl.
   */
  async start(): Promise<void> {
    await this.ensurePool();
  }

  private ensurePool(): Promise<PlaywrightBrowserPool> {
    if (this.browserPool) {
      return Promise.resolve(this.browserPool);
    }
    this.poolInitialization ??= this.initializeBrowserPool().finally(() => {
      this.poolInitialization = null;
    });
    return this.poolInitialization;
  }

  private async initializeBrowserPool(): Promise<PlaywrightBrowserPool> {
    const config = this.browserConfig;
    const pool = new PlaywrightBrowserPool({
      browserType: config.browserType,
      headless: config.headless,
      stealth: config.stealth,
      viewport: config.viewport,
      userAgent: config.userAgent,
      ignoreHttpsErrors: config.ignoreHttpsErrors,
      javaScriptEnabled: config.javaScriptEnabled,
      extraArgs: config.extraArgs,
      launchOptions: config.launchOptions,
      maxBrowsers: config.maxBrowsers,
      maxPagesPerContext: config.maxPagesPerContext,
      maxBrowserAge: config.maxBrowserAge,
      healthCheckInterval: config.healthCheckInterval,
      blockedDomains: config.blockedDomains,
      blockedResourceTypes: config.blockedResourceTypes,
      proxy: config.proxy,
      logger: this.logger,
    });

    try {
      await pool.initialize();
    } catch (error: unknown) {
      await pool.cleanup();
      throw toCrawlError(error, "ERR_POOL_INIT_FAILED", "Pool init failed");
    }
    this.browserPool = pool;
    this.logger.info(`PlaywrightCrawlerStrategy: browser pool ready (${config.browserType ?? "chromium"})`);
    return pool;
  }

  async crawl(url: string, config: ResolvedRunConfig): Promise<PageSnapshot> {
    return this.crawlWithRetries(url, config, 0);
  }

  private async crawlWithRetries(url: string, config: ResolvedRunConfig, retryAttempt: number): Promise<PageSnapshot> {
    try {
      const pool = await this.ensurePool();
      const snapshot = await this.queue.add(() => this.fetchWithPlaywright(url, pool, config));
      if (!snapshot) {
        throw new CrawlError("Playwright crawl queued but no result.", "ERR_QUEUE_NO_RESULT");
      }
      return snapshot;
    } catch (error: unknown) {
      const crawlError = toCrawlError(error, "ERR_CRAWL_FAILED", "Crawl failed");

      if (retryAttempt < config.maxRetries && !NON_RETRYABLE_CODES.has(crawlError.code)) {
        this.logger.warn(
          `PlaywrightCrawlerStrategy: attempt ${retryAttempt + 1} for ${url} failed (${crawlError.message}), retrying`
        );
        await delay(config.retryDelay);
        return this.crawlWithRetries(url, config, retryAttempt + 1);
      }

      const attempts = retryAttempt + 1;
      throw new CrawlError(
        `Crawl of ${url} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${crawlError.message}`,
        crawlError.code,
        crawlError.originalError ?? crawlError,
        crawlError.statusCode
      );
    }
  }

  private resolveHook(name: HookName, config: ResolvedRunConfig): CrawlerHook | undefined {
    return config.hooks[name] ?? this.hooks[name];
  }

  private async runHook(name: HookName, hookContext: HookContext, config: ResolvedRunConfig): Promise<void> {
    const hook = this.resolveHook(name, config);
    if (!hook) return;
    this.logger.debug(`PlaywrightCrawlerStrategy: running ${name} hook for ${hookContext.url}`);
    try {
      await hook(hookContext);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CrawlError(`Hook "${name}" failed: ${message}`, "ERR_HOOK_FAILED", error instanceof Error ? error : undefined);
    }
  }

  /**
   * Runs one page through navigation, scripts, waits and hooks, then reads the rendered HTML.
   */
  private async fetchWithPlaywright(
    url: string,
    pool: PlaywrightBrowserPool,
    config: ResolvedRunConfig
  ): Promise<PageSnapshot> {
    const { page, context } = await pool.acquirePage();
    try {
      const headers = this.browserConfig.headers;
      if (headers && Object.keys(headers).length > 0) {
        await page.setExtraHTTPHeaders(headers);
      }

      const beforeNavigation: HookContext = { page, context, url, response: null };
      await this.runHook("onPageCreated", beforeNavigation, config);
      await this.runHook("beforeGoto", beforeNavigation, config);

      let response: PlaywrightResponse | null;
      try {
        response = await page.goto(url, { waitUntil: config.waitUntil, timeout: config.pageTimeout });
      } catch (navigationError: unknown) {
        throw toCrawlError(navigationError, "ERR_NAVIGATION", "Playwright navigation failed");
      }

      if (!response) {
        throw new CrawlError("Playwright navigation did not return a response.", "ERR_NO_RESPONSE");
      }
      if (!response.ok()) {
        throw new CrawlError(
          `HTTP error status received: ${response.status()}`,
          "ERR_HTTP_ERROR",
          undefined,
          response.status()
        );
      }

      const afterNavigation: HookContext = { ...beforeNavigation, response };
      await this.runHook("afterGoto", afterNavigation, config);

      if (config.jsCode.length > 0) {
        await this.runHook("onExecutionStarted", afterNavigation, config);
        await this.executeScripts(page, config.jsCode);
      }

      if (config.waitFor) {
        await this.waitForCondition(page, config.waitFor, config.pageTimeout);
      }

      if (config.simulateUser) {
        await this.simulateHumanBehavior(page);
      }

      if (config.delayBeforeReturnHtml > 0) {
        await page.waitForTimeout(config.delayBeforeReturnHtml);
      }

      await this.runHook("beforeRetrieveHtml", afterNavigation, config);

      const html = await page.content();
      const title = await page.title();
      return {
        html,
        url: page.url(),
        title: title || null,
        statusCode: response.status(),
        responseHeaders: response.headers(),
      };
    } finally {
      await pool.releasePage(page);
    }
  }

  private async executeScripts(page: Page, scripts: string[]): Promise<void> {
    for (const [index, script] of scripts.entries()) {
      try {
        await page.evaluate(`(async () => {\n${script}\n})()`);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new CrawlError(
          `JavaScript snippet ${index + 1} failed: ${message}`,
          "ERR_JS_EXECUTION",
          error instanceof Error ? error : undefined
        );
      }
    }
  }

  /**
   * Waits for "css:<selector>", "js:<expression>" or a bare CSS selector.
   */
  private async waitForCondition(page: Page, condition: string, timeout: number): Promise<void> {
    try {
      if (condition.startsWith("js:")) {
        await page.waitForFunction(condition.slice(3).trim(), undefined, { timeout });
      } else {
        const selector = condition.startsWith("css:") ? condition.slice(4).trim() : condition.trim();
        await page.waitForSelector(selector, { state: "attached", timeout });
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CrawlError(
        `Wait condition "${condition}" was not met: ${message}`,
        "ERR_WAIT_FOR_TIMEOUT",
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Safely check if a page is still usable and connected.
   */
  private async isPageValid(page: Page): Promise<boolean> {
    if (page.isClosed()) return false;
    try {
      if (!page.context().browser()?.isConnected()) return false;
      await page.evaluate("1 + 1", { timeout: EVALUATION_TIMEOUT_MS });
      return true;
    } catch {
      return false;
    }
  }

  private async simulateHumanBehavior(page: Page): Promise<void> {
    if (!(await this.isPageValid(page))) return;

    try {
      const viewport = page.viewportSize();
      if (!viewport) return;

      await page.mouse.move(Math.random() * viewport.width, (Math.random() * viewport.height) / 3, { steps: 5 });
      await delay(HUMAN_SIMULATION_MIN_DELAY_MS + Math.random() * HUMAN_SIMULATION_RANDOM_MOUSE_DELAY_MS);
      await page.mouse.move(
        Math.random() * viewport.width,
        viewport.height / 2 + (Math.random() * viewport.height) / 2,
        { steps: 10 }
      );
      await delay(HUMAN_SIMULATION_SCROLL_DELAY_MS + Math.random() * HUMAN_SIMULATION_RANDOM_SCROLL_DELAY_MS);

      const scrollAmount = Math.floor(Math.random() * (viewport.height / 2)) + viewport.height / 4;
      await page.mouse.wheel(0, scrollAmount);
      await delay(HUMAN_SIMULATION_SCROLL_DELAY_MS + Math.random() * HUMAN_SIMULATION_RANDOM_SCROLL_DELAY_MS);
    } catch (error: unknown) {
      // Simulation is best effort; the page is read regardless
      this.logger.debug(`PlaywrightCrawlerStrategy: user simulation interrupted on ${page.url()}`, error);
    }
  }

  async close(): Promise<void> {
    await this.queue.onIdle();
    this.queue.clear();

    if (this.poolInitialization) {
      await this.poolInitialization.catch((error: unknown) => {
        this.logger.debug("PlaywrightCrawlerStrategy: pending pool start failed during close", error);
      });
    }
    if (this.browserPool) {
      const pool = this.browserPool;
      this.browserPool = null;
      await pool.cleanup();
    }
  }

  getMetrics(): BrowserMetrics[] {
    return this.browserPool ? this.browserPool.getMetrics() : [];
  }
}
