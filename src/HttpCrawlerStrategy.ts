import axios, { type AxiosProxyConfig, type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { CrawlerStrategy } from "./CrawlerStrategy.js";
import { CrawlError, toCrawlError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { BrowserConfig, BrowserMetrics, HookName, PageSnapshot, ProxyConfig, ResolvedRunConfig } from "./types.js";
import { COMMON_HEADERS, MAX_REDIRECTS, REGEX_CHALLENGE_PAGE_KEYWORDS } from "./constants.js";
import { extractTitle } from "./utils/html-cleaner.js";

// Status codes bot walls answer with
const CHALLENGE_STATUS_CODES: ReadonlySet<number> = new Set([403, 429, 503]);

function toAxiosProxy(proxy: ProxyConfig): AxiosProxyConfig {
  const parsed = new URL(proxy.server);
  const defaultPort = parsed.protocol === "https:" ? 443 : 80;
  const username = proxy.username ?? decodeURIComponent(parsed.username);
  const password = proxy.password ?? decodeURIComponent(parsed.password);
  return {
    protocol: parsed.protocol.replace(/:$/, ""),
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : defaultPort,
    ...(username ? { auth: { username, password } } : {}),
  };
}

function flattenHeaders(headers: object): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      flat[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      flat[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      flat[key.toLowerCase()] = value.join(", ");
    }
  }
  return flat;
}

// Node's http client exposes the URL after redirects on request.res.responseUrl
function finalUrlOf(request: unknown, fallback: string): string {
  if (typeof request !== "object" || request === null || !("res" in request)) return fallback;
  const res = request.res;
  if (typeof res !== "object" || res === null || !("responseUrl" in res)) return fallback;
  return typeof res.responseUrl === "string" && res.responseUrl ? res.responseUrl : fallback;
}

export interface HttpCrawlerStrategyOptions {
  logger?: Logger;
  /** Request timeout in milliseconds; the run's pageTimeout is used when omitted. */
  timeout?: number;
}

/**
 * Fetches static pages with a plain HTTP GET. Nothing is rendered, so runs that need a browser
 * (scripts, wait conditions, hooks, user simulation) are refused.
 */
export class HttpCrawlerStrategy implements CrawlerStrategy {
  private readonly logger: Logger;

  constructor(
    private readonly browserConfig: BrowserConfig = {},
    private readonly options: HttpCrawlerStrategyOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  setHook(name: HookName): void {
    throw new CrawlError(`HttpCrawlerStrategy does not run a browser, so the ${name} hook cannot be used.`, "ERR_UNSUPPORTED_OPTION");
  }

  private assertSupported(config: ResolvedRunConfig): void {
    const unsupported: string[] = [];
    if (config.jsCode.length > 0) unsupported.push("jsCode");
    if (config.waitFor) unsupported.push("waitFor");
    if (Object.values(config.hooks).some((hook) => hook !== undefined)) unsupported.push("hooks");
    if (config.simulateUser) unsupported.push("simulateUser");

    if (unsupported.length > 0) {
      throw new CrawlError(
        `HttpCrawlerStrategy cannot honour ${unsupported.join(", ")}; use PlaywrightCrawlerStrategy instead.`,
        "ERR_UNSUPPORTED_OPTION"
      );
    }
  }

  private requestConfig(config: ResolvedRunConfig): AxiosRequestConfig {
    const headers: Record<string, string> = { ...COMMON_HEADERS, ...this.browserConfig.headers };
    if (this.browserConfig.userAgent) {
      headers["User-Agent"] = this.browserConfig.userAgent;
    }

    return {
      headers,
      maxRedirects: MAX_REDIRECTS,
      timeout: this.options.timeout ?? config.pageTimeout,
      responseType: "text",
      decompress: true,
      validateStatus: () => true,
      ...(this.browserConfig.proxy ? { proxy: toAxiosProxy(this.browserConfig.proxy) } : {}),
    };
  }

  async crawl(url: string, config: ResolvedRunConfig): Promise<PageSnapshot> {
    this.assertSupported(config);

    let response: AxiosResponse<string>;
    try {
      response = await axios.get<string>(url, this.requestConfig(config));
    } catch (error: unknown) {
      throw toCrawlError(error, "ERR_HTTP_FETCH_FAILED", "HTTP fetch failed");
    }

    const html = typeof response.data === "string" ? response.data : String(response.data ?? "");
    const title = extractTitle(html);

    if (
      (title !== null && REGEX_CHALLENGE_PAGE_KEYWORDS.test(title)) ||
      (CHALLENGE_STATUS_CODES.has(response.status) && REGEX_CHALLENGE_PAGE_KEYWORDS.test(html))
    ) {
      throw new CrawlError(
        `Received a bot challenge page from ${url}`,
        "ERR_CHALLENGE_PAGE",
        undefined,
        response.status
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw new CrawlError(`HTTP error status received: ${response.status}`, "ERR_HTTP_ERROR", undefined, response.status);
    }

    this.logger.debug(`HttpCrawlerStrategy: fetched ${url} (${response.status}, ${html.length} chars)`);
    return {
      html,
      url: finalUrlOf(response.request, url),
      title,
      statusCode: response.status,
      responseHeaders: flattenHeaders(response.headers),
    };
  }

  async close(): Promise<void> {
    // Holds no connections beyond axios' own agents.
  }

  getMetrics(): BrowserMetrics[] {
    return [];
  }
}
