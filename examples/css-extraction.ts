import { config } from "dotenv";
import { JsonCssExtractionStrategy, WebCrawler, loadEnvConfig } from "../src/index.js";
import { SEARCH_QUERY, printSearchResults, searchResultSchema } from "./search-results.js";

config();

/**
 * Extracts search hits with CSS selectors from a results page whose query is part of the URL.
 */
async function main() {
  const { browser, pageTimeout } = loadEnvConfig();
  const url = `https://en.wikipedia.org/w/index.php?search=${encodeURIComponent(SEARCH_QUERY)}&fulltext=1&ns0=1`;

  const result = await WebCrawler.run({ ...browser, browserType: "chromium" }, (crawler) =>
    crawler.crawl(url, {
      extractionStrategy: new JsonCssExtractionStrategy(searchResultSchema),
      pageTimeout,
    })
  );

  printSearchResults(result);
}

main().catch(console.error);
