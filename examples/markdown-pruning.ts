import { config } from "dotenv";
import { CacheMode, DefaultMarkdownGenerator, PruningContentFilter, WebCrawler, loadEnvConfig } from "../src/index.js";

config();

/**
 * Compares the Markdown of a whole page with the "fit" Markdown left after pruning boilerplate.
 */
async function main() {
  const { browser, pageTimeout } = loadEnvConfig();
  const markdownGenerator = new DefaultMarkdownGenerator({
    contentFilter: new PruningContentFilter({ threshold: 0.4, thresholdType: "fixed" }),
  });

  const result = await WebCrawler.run(browser, (crawler) =>
    crawler.crawl("https://news.ycombinator.com", { cacheMode: CacheMode.BYPASS, markdownGenerator, pageTimeout })
  );

  if (!result.success || !result.markdown) {
    console.error(`❌ ${result.errorMessage}`);
    return;
  }
  console.log("Raw Markdown length:", result.markdown.rawMarkdown.length);
  console.log("Fit Markdown length:", result.markdown.fitMarkdown.length);
}

main().catch(console.error);
