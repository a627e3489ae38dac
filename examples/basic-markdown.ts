import { config } from "dotenv";
import { CacheMode, WebCrawler, loadEnvConfig } from "../src/index.js";

config();

/**
 * Basic crawl: open a page in a headless browser and print it as Markdown.
 */
async function main() {
  const { browser, pageTimeout } = loadEnvConfig();

  const result = await WebCrawler.run(browser, (crawler) =>
    crawler.crawl("https://example.com", { cacheMode: CacheMode.BYPASS, pageTimeout })
  );

  if (!result.success) {
    console.error(`❌ ${result.errorMessage}`);
    return;
  }
  console.log(`📄 ${result.title ?? result.url}\n`);
  console.log(result.markdown?.rawMarkdown);
}

main().catch(console.error);
