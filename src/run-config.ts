import { CacheMode, type CrawlerRunConfig, type ResolvedRunConfig } from "./types.js";
import { DefaultMarkdownGenerator } from "./markdown/DefaultMarkdownGenerator.js";
import {
  DEFAULT_DELAY_BEFORE_RETURN_HTML_MS,
  DEFAULT_PAGE_TIMEOUT_MS,
  DEFAULT_WORD_COUNT_THRESHOLD,
} from "./constants.js";

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * Fills every unset CrawlerRunConfig field with its default.
 */
export function resolveRunConfig(config: CrawlerRunConfig = {}): ResolvedRunConfig {
  const scripts = config.jsCode === undefined ? [] : Array.isArray(config.jsCode) ? config.jsCode : [config.jsCode];
  const waitFor = config.waitFor?.trim();

  return {
    cacheMode: config.cacheMode ?? CacheMode.BYPASS,
    jsCode: scripts.filter((script) => script.trim() !== ""),
    waitFor: waitFor ? waitFor : undefined,
    waitUntil: config.waitUntil ?? "domcontentloaded",
    pageTimeout: config.pageTimeout ?? DEFAULT_PAGE_TIMEOUT_MS,
    delayBeforeReturnHtml: config.delayBeforeReturnHtml ?? DEFAULT_DELAY_BEFORE_RETURN_HTML_MS,
    wordCountThreshold: config.wordCountThreshold ?? DEFAULT_WORD_COUNT_THRESHOLD,
    excludedTags: config.excludedTags ?? [],
    extractionStrategy: config.extractionStrategy,
    markdownGenerator: config.markdownGenerator ?? new DefaultMarkdownGenerator(),
    hooks: config.hooks ?? {},
    simulateUser: config.simulateUser ?? false,
    maxRetries: config.maxRetries ?? DEFAULT_MAX_RETRIES,
    retryDelay: config.retryDelay ?? DEFAULT_RETRY_DELAY_MS,
  };
}
