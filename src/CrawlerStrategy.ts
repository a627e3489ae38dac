import type { BrowserMetrics, CrawlerHook, HookName, PageSnapshot, ResolvedRunConfig } from "./types.js";

/**
 * Fetches one page and reports what the browser (or HTTP client) saw.
 * Strategies throw CrawlError on failure; WebCrawler turns that into a failed CrawlResult.
 */
export interface CrawlerStrategy {
  /** Acquire long-lived resources up front; strategies without any omit it. */
  start?(): Promise<void>;
  crawl(url: string, config: ResolvedRunConfig): Promise<PageSnapshot>;
  setHook(name: HookName, hook: CrawlerHook): void;
  close(): Promise<void>;
  getMetrics(): BrowserMetrics[];
}
