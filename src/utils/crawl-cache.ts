import { CacheMode, type PageSnapshot } from "../types.js";

interface CacheEntry {
  snapshot: PageSnapshot;
  timestamp: number;
}

/**
 * In-memory page cache keyed by URL, owned by a single crawler.
 */
export class CrawlCache {
  private readonly entries: Map<string, CacheEntry> = new Map();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  static shouldRead(mode: CacheMode): boolean {
    return mode === CacheMode.ENABLED || mode === CacheMode.READ_ONLY;
  }

  static shouldWrite(mode: CacheMode): boolean {
    return mode === CacheMode.ENABLED || mode === CacheMode.WRITE_ONLY;
  }

  get(url: string): PageSnapshot | null {
    const cached = this.entries.get(url);
    if (!cached) return null;
    if (this.now() - cached.timestamp < this.ttlMs) {
      return cached.snapshot;
    }
    this.entries.delete(url);
    return null;
  }

  set(url: string, snapshot: PageSnapshot): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(url, { snapshot, timestamp: this.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
