import { readFileSync } from "node:fs";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { CrawlError } from "./errors.js";
import { DEFAULT_CACHE_TTL_MS, DEFAULT_PAGE_TIMEOUT_MS } from "./constants.js";
import type { BrowserConfig } from "./types.js";
import type { LlmConfig } from "./extraction/LlmExtractionStrategy.js";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ["true", "false", "1", "0", "yes", "no"].includes(value), {
    message: "expected true/false, 1/0 or yes/no",
  })
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  HEADLESS: booleanFlag.optional(),
  BROWSER_TYPE: z.enum(["chromium", "firefox", "webkit"]).optional(),
  PAGE_TIMEOUT_MS: positiveInt.optional(),
  CACHE_TTL_MS: z.coerce.number().int().nonnegative().optional(),
  MAX_BROWSERS: positiveInt.optional(),
  CONCURRENT_PAGES: positiveInt.optional(),
  PROXY_SERVER: z.url().optional(),
  PROXY_USERNAME: z.string().optional(),
  PROXY_PASSWORD: z.string().optional(),
  VERBOSE: booleanFlag.optional(),
  LLM_PROVIDER: z.string().regex(/^[^/]+\/.+$/, 'expected "<vendor>/<model>"').optional(),
  LLM_API_TOKEN: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.url().optional(),
});

export interface EnvConfig {
  browser: BrowserConfig;
  pageTimeout: number;
  /** Present when LLM_PROVIDER is set. */
  llm?: LlmConfig;
}

export interface LoadEnvConfigOptions {
  /** Variables to read. @default process.env */
  env?: Record<string, string | undefined>;
  /** A .env file merged under `env`; variables already in `env` win. */
  envFile?: string;
}

function readEnvFile(path: string): Record<string, string> {
  try {
    return parseDotenv(readFileSync(path, "utf8"));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CrawlError(`Could not read env file ${path}: ${message}`, "ERR_CONFIG", error instanceof Error ? error : undefined);
  }
}

// Blank values count as unset
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Builds crawler settings from environment variables, optionally merged over a .env file.
 */
export function loadEnvConfig(options: LoadEnvConfigOptions = {}): EnvConfig {
  const fromFile = options.envFile ? readEnvFile(options.envFile) : {};
  const merged = withoutBlanks({ ...fromFile, ...(options.env ?? process.env) });

  const parsed = EnvSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new CrawlError(`Invalid configuration:\n  - ${issues.join("\n  - ")}`, "ERR_CONFIG");
  }
  const env = parsed.data;

  const browser: BrowserConfig = {
    headless: env.HEADLESS ?? true,
    browserType: env.BROWSER_TYPE ?? "chromium",
    cacheTTL: env.CACHE_TTL_MS ?? DEFAULT_CACHE_TTL_MS,
    verbose: env.VERBOSE ?? false,
  };
  if (env.MAX_BROWSERS !== undefined) browser.maxBrowsers = env.MAX_BROWSERS;
  if (env.CONCURRENT_PAGES !== undefined) browser.concurrentPages = env.CONCURRENT_PAGES;
  if (env.PROXY_SERVER) {
    browser.proxy = { server: env.PROXY_SERVER, username: env.PROXY_USERNAME, password: env.PROXY_PASSWORD };
  }

  const config: EnvConfig = {
    browser,
    pageTimeout: env.PAGE_TIMEOUT_MS ?? DEFAULT_PAGE_TIMEOUT_MS,
  };
  if (env.LLM_PROVIDER) {
    config.llm = {
      provider: env.LLM_PROVIDER,
      apiToken: env.LLM_API_TOKEN ?? env.OPENAI_API_KEY,
      baseUrl: env.LLM_BASE_URL,
    };
  }
  return config;
}
