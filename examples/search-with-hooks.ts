import { config } from "dotenv";
import { CacheMode, JsonCssExtractionStrategy, WebCrawler, loadEnvConfig, type HookContext } from "../src/index.js";
import { SEARCH_QUERY, printSearchResults, searchResultSchema } from "./search-results.js";

config();

const SEARCH_INPUT = "input[name='search']";

/**
 * Types the query into the search box after the start page loads and waits for the results.
 */
async function searchAfterGoto({ page, url }: HookContext): Promise<void> {
  console.log(`[HOOK] afterGoto - loaded ${url}`);
  try {
    const searchBox = await page.waitForSelector(SEARCH_INPUT, { timeout: 5000 });
    await searchBox.fill(SEARCH_QUERY);
    await searchBox.press("Enter");
    await page.waitForSelector(".mw-search-result", { timeout: 10000 });
    console.log("[HOOK] search completed and results loaded");
  } catch (error) {
    // The page is still extracted; it simply yields no results
    console.log(`[HOOK] search failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

async function main() {
  const { browser, pageTimeout } = loadEnvConfig();

  const result = await WebCrawler.run(browser, async (crawler) => {
    crawler.setHook("afterGoto", searchAfterGoto);
    return crawler.crawl("https://en.wikipedia.org/wiki/Special:Search", {
      cacheMode: CacheMode.BYPASS,
      extractionStrategy: new JsonCssExtractionStrategy(searchResultSchema),
      pageTimeout,
    });
  });

  printSearchResults(result);
}

main().catch(console.error);
