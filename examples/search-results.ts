import { defineExtractionSchema, parseExtractedContent, type CrawlResult } from "../src/index.js";

/**
 * One record per search hit on a MediaWiki search results page.
 */
export const searchResultSchema = defineExtractionSchema({
  name: "Wiki Search Results",
  baseSelector: ".mw-search-result",
  fields: [
    { name: "title", selector: ".mw-search-result-heading a", type: "attribute", attribute: "title" },
    { name: "url", selector: ".mw-search-result-heading a", type: "attribute", attribute: "href" },
    { name: "snippet", selector: ".searchresult", type: "text" },
    { name: "size", selector: ".mw-search-result-data", type: "text" },
    { name: "hasImage", selector: ".searchResultImage img", type: "exists" },
    { name: "highlights", selector: ".searchmatch", type: "text", multiple: true },
  ],
});

export const SEARCH_QUERY = process.env.SEARCH_QUERY ?? "web crawler";

export function printSearchResults(result: CrawlResult): void {
  if (!result.success) {
    console.error(`❌ Crawl failed: ${result.errorMessage}`);
    return;
  }

  const parsed = parseExtractedContent(result);
  if (!parsed.ok) {
    console.error(`❌ ${parsed.error.message}`);
  }

  console.log(`✅ ${parsed.data.length} results from ${result.url}`);
  for (const hit of parsed.data) {
    console.log("\nResult:");
    console.log(`Title: ${String(hit.title)}`);
    console.log(`URL: ${String(hit.url)}`);
    console.log(`Size: ${String(hit.size)}`);
    console.log(`Image: ${hit.hasImage ? "Yes" : "No"}`);
    if (Array.isArray(hit.highlights) && hit.highlights.length > 0) {
      console.log(`Matches: ${hit.highlights.join(", ")}`);
    }
    console.log(`Snippet: ${String(hit.snippet)}`);
    console.log("-".repeat(80));
  }
}
