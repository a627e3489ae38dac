import { config } from "dotenv";
import { CacheMode, JsonCssExtractionStrategy, WebCrawler, loadEnvConfig } from "../src/index.js";
import { SEARCH_QUERY, printSearchResults, searchResultSchema } from "./search-results.js";

config();

/**
 * Runs the search with injected JavaScript instead of hooks, then waits for the result list.
 */
async function main() {
  const { browser, pageTimeout } = loadEnvConfig();
  const searchScript = `
    const input = document.querySelector("input[name='search']");
    input.value = ${JSON.stringify(SEARCH_QUERY)};
    input.form.submit();
  `;

  const result = await WebCrawler.run(browser, (crawler) =>
    crawler.crawl("https://en.wikipedia.org/wiki/Special:Search", {
      cacheMode: CacheMode.BYPASS,
      jsCode: searchScript,
      waitFor: "css:.mw-search-result",
      extractionStrategy: new JsonCssExtractionStrategy(searchResultSchema),
      pageTimeout,
    })
  );

  printSearchResults(result);
}

main().catch(console.error);
