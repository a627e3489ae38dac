import { config } from "dotenv";
import { z } from "zod";
import { CacheMode, LlmExtractionStrategy, WebCrawler, loadEnvConfig, parseExtractedContent } from "../src/index.js";

config();

/**
 * LLM extraction: list every model on a pricing page with its input and output fees.
 * Defaults to a local Ollama model; set LLM_PROVIDER (and LLM_API_TOKEN / LLM_BASE_URL) for others.
 */
const modelFeeSchema = z.object({
  model_name: z.string().describe("Name of the model."),
  input_fee: z.string().describe("Fee for input tokens of the model."),
  output_fee: z.string().describe("Fee for output tokens of the model."),
});

async function main() {
  const { browser, llm } = loadEnvConfig();
  const llmConfig = llm ?? { provider: "ollama/llama3.2:1b" };
  console.log(`\n--- Extracting structured data with ${llmConfig.provider} ---`);

  const extractionStrategy = new LlmExtractionStrategy({
    llmConfig,
    schema: modelFeeSchema,
    instruction:
      "From the crawled content, extract all mentioned model names along with their fees for input and output tokens. " +
      "Ensure that no model or fee is missed.",
  });

  const result = await WebCrawler.run(browser, (crawler) =>
    crawler.crawl("https://openai.com/api/pricing/", {
      cacheMode: CacheMode.BYPASS,
      wordCountThreshold: 1,
      pageTimeout: 80000,
      extractionStrategy,
    })
  );

  console.log("\n=== Raw extracted content ===\n", result.extractedContent);
  if (result.error) {
    console.error(`❌ ${result.error.message}`);
  }

  const parsed = parseExtractedContent(result);
  if (!parsed.ok) {
    console.error(`\n!!! ${parsed.error.message} !!!`);
  }
  console.log("\n=== Parsed extracted data ===\n", parsed.data);
  console.log("Token usage:", extractionStrategy.usage);
}

main().catch(console.error);
