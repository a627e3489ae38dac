import {
  chromium,
  firefox,
  webkit,
  type Browser,
  type BrowserContext,
  type BrowserType as PlaywrightLauncher,
  type LaunchOptions,
  type Page,
  type Route,
} from "playwright-core";
import { addExtra } from "playwright-extra";
import type { PuppeteerExtraPlugin } from "puppeteer-extra-plugin";
import UserAgent from "user-agents";
import { v4 as uuidv4 } from "uuid";
import PQueue from "p-queue";
import type { BrowserMetrics, BrowserType, ProxyConfig } from "../types.js";
import { CrawlError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

type Launcher = Pick<PlaywrightLauncher, "launch">;

const LAUNCHERS: Readonly<Record<BrowserType, Launcher>> = { chromium, firefox, webkit };

// Chromium-only switches; firefox and webkit reject them
const CHROMIUM_ARGS: ReadonlyArray<string> = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-accelerated-2d-canvas",
  "--no-first-run",
  "--no-zygote",
  "--disable-gpu",
  "--mute-audio",
  "--disable-background-networking",
];

let stealthLauncher: Promise<Launcher> | undefined;

/**
 * The stealth-augmented chromium launcher, created once per process.
 */
function loadStealthLauncher(): Promise<Launcher> {
  stealthLauncher ??= (async () => {
    const launcher = addExtra(chromium);
    const plugin: PuppeteerExtraPlugin = (await import("puppeteer-extra-plugin-stealth")).default();
    launcher.use(plugin);
    return launcher;
  })();
  return stealthLauncher;
}

async function resolveLauncher(browserType: BrowserType, stealth: boolean): Promise<Launcher> {
  if (browserType === "chromium" && stealth) {
    return loadStealthLauncher();
  }
  return LAUNCHERS[browserType];
}

export interface BrowserPoolConfig {
  browserType?: BrowserType;
  headless?: boolean;
  stealth?: boolean;
  viewport?: { width: number; height: number };
  userAgent?: string;
  ignoreHttpsErrors?: boolean;
  javaScriptEnabled?: boolean;
  extraArgs?: string[];
  launchOptions?: LaunchOptions;
  maxBrowsers?: number;
  maxPagesPerContext?: number;
  maxBrowserAge?: number;
  healthCheckInterval?: number;
  maxIdleTime?: number;
  blockedDomains?: string[];
  blockedResourceTypes?: string[];
  proxy?: ProxyConfig;
  logger?: Logger;
}

type InstanceSettings = Required<
  Pick<
    BrowserPoolConfig,
    "browserType" | "headless" | "stealth" | "ignoreHttpsErrors" | "javaScriptEnabled" | "extraArgs" | "launchOptions"
  >
> &
  Pick<BrowserPoolConfig, "viewport" | "userAgent" | "proxy"> & {
    blockedDomains: string[];
    blockedResourceTypes: string[];
    logger: Logger;
    onUnhealthy: (instanceId: string) => void;
  };

class ManagedBrowserInstance {
  public readonly pages: Set<Page> = new Set();
  public isHealthy = true;
  private readonly disconnectedHandler: () => void;

  private constructor(
    public readonly id: string,
    public readonly browser: Browser,
    public readonly context: BrowserContext,
    public readonly metrics: BrowserMetrics,
    private readonly settings: InstanceSettings
  ) {
    this.disconnectedHandler = () => {
      if (this.isHealthy) {
        this.markUnhealthy();
        this.settings.logger.warn(`ManagedBrowserInstance: ${this.id} disconnected unexpectedly.`);
        this.settings.onUnhealthy(this.id);
      }
    };
    this.browser.on("disconnected", this.disconnectedHandler);
  }

  static async launch(settings: InstanceSettings): Promise<ManagedBrowserInstance> {
    const launcher = await resolveLauncher(settings.browserType, settings.stealth);
    const args = settings.browserType === "chromium" ? [...CHROMIUM_ARGS, ...settings.extraArgs] : settings.extraArgs;

    const browser = await launcher.launch({
      headless: settings.headless,
      args,
      proxy: settings.proxy,
      ...settings.launchOptions,
    });

    let context: BrowserContext;
    try {
      context = await browser.newContext({
        userAgent: settings.userAgent ?? new UserAgent({ deviceCategory: "desktop" }).toString(),
        viewport: settings.viewport ?? {
          width: 1280 + Math.floor(Math.random() * 120),
          height: 720 + Math.floor(Math.random() * 80),
        },
        javaScriptEnabled: settings.javaScriptEnabled,
        ignoreHTTPSErrors: settings.ignoreHttpsErrors,
      });
    } catch (error: unknown) {
      await browser.close().catch((closeError: unknown) => {
        settings.logger.debug("ManagedBrowserInstance: error closing browser after failed context creation", closeError);
      });
      throw error;
    }

    const id = uuidv4();
    const now = new Date();
    const metrics: BrowserMetrics = {
      id,
      browserType: settings.browserType,
      pagesCreated: 0,
      activePages: 0,
      lastUsed: now,
      errors: 0,
      createdAt: now,
      isHealthy: true,
    };

    const instance = new ManagedBrowserInstance(id, browser, context, metrics, settings);
    await instance.installRequestBlocking();
    return instance;
  }

  private async installRequestBlocking(): Promise<void> {
    const { blockedDomains, blockedResourceTypes, logger } = this.settings;
    if (blockedDomains.length === 0 && blockedResourceTypes.length === 0) return;

    await this.context.route("**/*", async (route: Route) => {
      const request = route.request();
      const url = request.url();
      try {
        const hostname = new URL(url).hostname.toLowerCase();
        if (
          blockedDomains.some((domain) => hostname.includes(domain)) ||
          blockedResourceTypes.includes(request.resourceType())
        ) {
          await route.abort("aborted");
        } else {
          await route.continue();
        }
      } catch (routeError: unknown) {
        logger.debug(`ManagedBrowserInstance: route interceptor failed for ${url}, request continued.`, routeError);
        await route.continue();
      }
    });
  }

  private markUnhealthy(): void {
    this.isHealthy = false;
    this.metrics.isHealthy = false;
  }

  canCreateMorePages(maxPagesPerContext: number): boolean {
    return this.isHealthy && this.pages.size < maxPagesPerContext;
  }

  async acquirePage(): Promise<Page> {
    if (!this.isHealthy) {
      throw new Error(`Browser instance ${this.id} is not healthy.`);
    }
    try {
      const page = await this.context.newPage();
      this.pages.add(page);
      this.metrics.pagesCreated++;
      this.metrics.activePages = this.pages.size;
      this.metrics.lastUsed = new Date();

      page.on("close", () => {
        this.pages.delete(page);
        this.metrics.activePages = this.pages.size;
        this.metrics.lastUsed = new Date();
      });

      page.on("crash", () => {
        this.settings.logger.warn(`ManagedBrowserInstance: page crashed in ${this.id} at ${page.url()}`);
        this.metrics.errors++;
        this.pages.delete(page);
        this.metrics.activePages = this.pages.size;
        this.markUnhealthy();
        this.settings.onUnhealthy(this.id);
      });

      return page;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.metrics.errors++;
      this.markUnhealthy();
      this.settings.onUnhealthy(this.id);
      throw new Error(`Failed to create new page in instance ${this.id}: ${message}`);
    }
  }

  async releasePage(page: Page): Promise<void> {
    if (!this.pages.has(page) || page.isClosed()) return;
    try {
      await page.close();
    } catch (error: unknown) {
      this.settings.logger.warn(`ManagedBrowserInstance: error closing page in ${this.id}`, error);
      this.metrics.errors++;
    }
  }

  checkHealth(now: Date, maxBrowserAgeMs: number, maxIdleTimeMs: number): { shouldRemove: boolean; reason: string } {
    if (!this.isHealthy) {
      return { shouldRemove: true, reason: "already marked unhealthy" };
    }
    if (!this.browser.isConnected()) {
      this.markUnhealthy();
      return { shouldRemove: true, reason: "browser disconnected" };
    }
    if (maxBrowserAgeMs > 0 && now.getTime() - this.metrics.createdAt.getTime() > maxBrowserAgeMs) {
      return { shouldRemove: true, reason: "max age reached" };
    }
    if (this.pages.size === 0 && maxIdleTimeMs > 0 && now.getTime() - this.metrics.lastUsed.getTime() > maxIdleTimeMs) {
      return { shouldRemove: true, reason: "idle timeout" };
    }
    return { shouldRemove: false, reason: "" };
  }

  async close(reason: string): Promise<void> {
    this.markUnhealthy();
    this.settings.logger.debug(`ManagedBrowserInstance: closing ${this.id} (${reason})`);
    this.browser.off("disconnected", this.disconnectedHandler);
    try {
      await this.context.close();
    } catch (error: unknown) {
      this.settings.logger.warn(`ManagedBrowserInstance: error closing context of ${this.id}`, error);
    }
    try {
      await this.browser.close();
    } catch (error: unknown) {
      this.settings.logger.warn(`ManagedBrowserInstance: error closing browser ${this.id}`, error);
    }
  }
}

/**
 * Keeps a small set of browsers of one type alive and hands out pages from them.
 * Browsers are recycled when they disconnect, crash a page, grow too old or sit idle.
 */
export class PlaywrightBrowserPool {
  private readonly pool: Set<ManagedBrowserInstance> = new Set();
  private readonly maxBrowsers: number;
  private readonly maxPagesPerContext: number;
  private readonly maxBrowserAge: number;
  private readonly healthCheckInterval: number;
  private readonly maxIdleTime: number;
  private readonly settings: Omit<InstanceSettings, "onUnhealthy">;
  private readonly logger: Logger;
  private healthCheckTimer: NodeJS.Timeout | null = null;
  private isCleaningUp = false;

  static readonly DEFAULT_BLOCKED_DOMAINS: ReadonlyArray<string> = [
    "doubleclick.net",
    "google-analytics.com",
    "googletagmanager.com",
    "googlesyndication.com",
    "googleadservices.com",
    "adservice.google.com",
    "facebook.net",
    "connect.facebook.net",
    "ads-twitter.com",
    "analytics.tiktok.com",
    "amazon-adsystem.com",
    "adnxs.com",
    "criteo.com",
    "scorecardresearch.com",
    "quantserve.com",
    "taboola.com",
    "outbrain.com",
  ];
  static readonly DEFAULT_BLOCKED_RESOURCE_TYPES: ReadonlyArray<string> = ["font", "media", "websocket"];

  private readonly acquireQueue = new PQueue({ concurrency: 1 });

  constructor(config: BrowserPoolConfig = {}) {
    this.maxBrowsers = config.maxBrowsers ?? 2;
    this.maxPagesPerContext = config.maxPagesPerContext ?? 6;
    this.maxBrowserAge = config.maxBrowserAge ?? 20 * 60 * 1000;
    this.healthCheckInterval = config.healthCheckInterval ?? 60 * 1000;
    this.maxIdleTime = config.maxIdleTime ?? 5 * 60 * 1000;
    this.logger = config.logger ?? silentLogger;
    this.settings = {
      browserType: config.browserType ?? "chromium",
      headless: config.headless ?? true,
      stealth: config.stealth ?? true,
      viewport: config.viewport,
      userAgent: config.userAgent,
      ignoreHttpsErrors: config.ignoreHttpsErrors ?? true,
      javaScriptEnabled: config.javaScriptEnabled ?? true,
      extraArgs: config.extraArgs ?? [],
      launchOptions: config.launchOptions ?? {},
      proxy: config.proxy,
      blockedDomains: config.blockedDomains?.length
        ? config.blockedDomains
        : [...PlaywrightBrowserPool.DEFAULT_BLOCKED_DOMAINS],
      blockedResourceTypes: config.blockedResourceTypes?.length
        ? config.blockedResourceTypes
        : [...PlaywrightBrowserPool.DEFAULT_BLOCKED_RESOURCE_TYPES],
      logger: this.logger,
    };
  }

  public async initialize(): Promise<void> {
    if (this.isCleaningUp) return;
    await this.createBrowserInstance();
    await this.ensureMinimumInstances();
    this.scheduleHealthCheck();
  }

  private scheduleHealthCheck(): void {
    if (this.isCleaningUp) return;
    if (this.healthCheckTimer) {
      clearTimeout(this.healthCheckTimer);
    }
    if (this.healthCheckInterval > 0) {
      this.healthCheckTimer = setTimeout(() => {
        this.healthCheck().catch((error: unknown) => {
          this.logger.warn("PlaywrightBrowserPool: scheduled health check failed", error);
        });
      }, this.healthCheckInterval);
      this.healthCheckTimer.unref();
    }
  }

  private async ensureMinimumInstances(): Promise<void> {
    while (!this.isCleaningUp && this.pool.size < this.maxBrowsers) {
      try {
        await this.createBrowserInstance();
      } catch (error: unknown) {
        this.logger.warn("PlaywrightBrowserPool: could not launch an additional browser", error);
        break;
      }
    }
  }

  private async createBrowserInstance(): Promise<ManagedBrowserInstance> {
    const instance = await ManagedBrowserInstance.launch({
      ...this.settings,
      onUnhealthy: (instanceId) => this.handleUnhealthy(instanceId),
    });
    this.pool.add(instance);
    this.logger.debug(`PlaywrightBrowserPool: launched ${this.settings.browserType} instance ${instance.id}`);
    return instance;
  }

  private handleUnhealthy(instanceId: string): void {
    const instance = [...this.pool].find((candidate) => candidate.id === instanceId);
    if (!instance) return;
    this.pool.delete(instance);
    this.logger.warn(`PlaywrightBrowserPool: removed unhealthy instance ${instanceId}`);
    instance
      .close("unhealthy")
      .then(() => this.ensureMinimumInstances())
      .catch((error: unknown) => {
        this.logger.error(`PlaywrightBrowserPool: failed to replace instance ${instanceId}`, error);
      });
  }

  private pickInstance(): ManagedBrowserInstance | null {
    let best: ManagedBrowserInstance | null = null;
    for (const instance of this.pool) {
      if (instance.canCreateMorePages(this.maxPagesPerContext) && (!best || instance.pages.size < best.pages.size)) {
        best = instance;
      }
    }
    return best;
  }

  public async acquirePage(): Promise<{ page: Page; context: BrowserContext }> {
    const acquired = await this.acquireQueue.add(async () => {
      if (this.isCleaningUp) {
        throw new CrawlError("Pool is shutting down.", "ERR_POOL_UNAVAILABLE");
      }

      let instance = this.pickInstance();
      if (!instance && this.pool.size < this.maxBrowsers) {
        try {
          instance = await this.createBrowserInstance();
        } catch (error: unknown) {
          this.logger.error("PlaywrightBrowserPool: failed to launch browser during page acquisition", error);
          instance = this.pickInstance();
        }
      }
      if (!instance) {
        throw new CrawlError(
          "Failed to acquire Playwright page: no available or creatable healthy browser instance.",
          "ERR_POOL_UNAVAILABLE"
        );
      }

      const page = await instance.acquirePage();
      return { page, context: instance.context };
    });
    if (!acquired) {
      throw new CrawlError("Page acquisition queued but produced no page.", "ERR_QUEUE_NO_RESULT");
    }
    return acquired;
  }

  private async healthCheck(): Promise<void> {
    if (this.isCleaningUp) return;

    const now = new Date();
    const stale: Array<{ instance: ManagedBrowserInstance; reason: string }> = [];
    for (const instance of this.pool) {
      const { shouldRemove, reason } = instance.checkHealth(now, this.maxBrowserAge, this.maxIdleTime);
      if (shouldRemove) {
        stale.push({ instance, reason });
      }
    }

    for (const { instance, reason } of stale) {
      this.logger.info(`PlaywrightBrowserPool: recycling ${instance.id} (${reason})`);
      this.pool.delete(instance);
    }
    await Promise.allSettled(stale.map(({ instance, reason }) => instance.close(reason)));

    await this.ensureMinimumInstances();
    this.scheduleHealthCheck();
  }

  public async releasePage(page: Page): Promise<void> {
    if (page.isClosed()) return;

    const owner = [...this.pool].find((instance) => instance.pages.has(page));
    if (owner) {
      await owner.releasePage(page);
      return;
    }
    try {
      await page.close();
    } catch (error: unknown) {
      this.logger.warn("PlaywrightBrowserPool: error closing a page no instance owns", error);
    }
  }

  public async cleanup(): Promise<void> {
    if (this.isCleaningUp) return;
    this.isCleaningUp = true;

    if (this.healthCheckTimer) {
      clearTimeout(this.healthCheckTimer);
      this.healthCheckTimer = null;
    }
    this.acquireQueue.clear();
    await this.acquireQueue.onIdle();

    const instances = [...this.pool];
    this.pool.clear();
    await Promise.allSettled(instances.map((instance) => instance.close("pool cleanup")));
    this.isCleaningUp = false;
  }

  public getMetrics(): BrowserMetrics[] {
    return [...this.pool].map((instance) => ({ ...instance.metrics }));
  }
}
