export * from "./types.js";
export * from "./errors.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger, ConsoleLoggerOptions } from "./logger.js";
export { loadEnvConfig } from "./config.js";
export type { EnvConfig, LoadEnvConfigOptions } from "./config.js";

export { WebCrawler } from "./WebCrawler.js";
export type { WebCrawlerOptions } from "./WebCrawler.js";
export { resolveRunConfig } from "./run-config.js";
export type { CrawlerStrategy } from "./CrawlerStrategy.js";
export { PlaywrightCrawlerStrategy } from "./PlaywrightCrawlerStrategy.js";
export type { PlaywrightCrawlerStrategyOptions } from "./PlaywrightCrawlerStrategy.js";
export { HttpCrawlerStrategy } from "./HttpCrawlerStrategy.js";
export type { HttpCrawlerStrategyOptions } from "./HttpCrawlerStrategy.js";
export { PlaywrightBrowserPool } from "./browser/PlaywrightBrowserPool.js";
export type { BrowserPoolConfig } from "./browser/PlaywrightBrowserPool.js";

export { defineExtractionSchema, ExtractionSchemaSchema, FieldSpecSchema } from "./extraction/schema.js";
export type {
  ExtractionSchema,
  ExtractionSchemaInput,
  ExtractedRecord,
  FieldSpec,
  FieldType,
  FieldValue,
  TextFieldSpec,
  AttributeFieldSpec,
  ExistsFieldSpec,
} from "./extraction/schema.js";
export type { ExtractionStrategy, ExtractionInput } from "./extraction/ExtractionStrategy.js";
export { JsonCssExtractionStrategy, extractRecords } from "./extraction/JsonCssExtractionStrategy.js";
export { LlmExtractionStrategy, resolveLanguageModel } from "./extraction/LlmExtractionStrategy.js";
export type {
  LlmConfig,
  LlmInputFormat,
  LlmExtractionStrategyOptions,
  LlmSchema,
  LlmUsage,
} from "./extraction/LlmExtractionStrategy.js";
export { parseExtractedContent } from "./extraction/parse-extracted-content.js";
export type { ExtractedItem, ParsedExtraction } from "./extraction/parse-extracted-content.js";

export { MarkdownConverter } from "./utils/markdown-converter.js";
export type { ConversionOptions } from "./utils/markdown-converter.js";
export { DefaultMarkdownGenerator } from "./markdown/DefaultMarkdownGenerator.js";
export type { MarkdownGenerator, DefaultMarkdownGeneratorOptions } from "./markdown/DefaultMarkdownGenerator.js";
export { PruningContentFilter } from "./markdown/PruningContentFilter.js";
export type { ContentFilter, PruningContentFilterOptions, ThresholdType } from "./markdown/PruningContentFilter.js";
export { cleanHtml, countWords } from "./utils/html-cleaner.js";
export { CrawlCache } from "./utils/crawl-cache.js";
