import { generateObject, NoObjectGeneratedError, type LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { z } from "zod";
import { CrawlError, LlmExtractionError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { OLLAMA_DEFAULT_BASE_URL, OPENAI_DEFAULT_BASE_URL } from "../constants.js";
import type { ExtractionInput, ExtractionStrategy } from "./ExtractionStrategy.js";

/**
 * Connection settings for a model, e.g. `{ provider: "openai/gpt-4o-mini", apiToken: "..." }`.
 */
export interface LlmConfig {
  /** "<vendor>/<model>". "openai" and "ollama" are known vendors; any other needs `baseUrl`. */
  provider: string;
  apiToken?: string;
  /** OpenAI-compatible endpoint, e.g. "https://openrouter.ai/api/v1". */
  baseUrl?: string;
  headers?: Record<string, string>;
}

export type LlmInputFormat = "markdown" | "fit_markdown" | "html";

export type LlmSchema = z.ZodObject<Record<string, z.ZodType>>;

export interface LlmExtractionStrategyOptions<TSchema extends LlmSchema> {
  llmConfig: LlmConfig;
  /** Shape of one extracted item. Every field needs a `.describe()`. */
  schema: TSchema;
  /** What to extract, in plain words. */
  instruction?: string;
  /** @default "markdown" */
  inputFormat?: LlmInputFormat;
  logger?: Logger;
}

export interface LlmUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface ResolvedProvider {
  vendor: string;
  modelId: string;
  model: LanguageModel;
}

type ModelSettings = {
  temperature?: number;
  providerOptions?: Record<string, Record<string, string>>;
};

function descriptionOf(schema: z.core.$ZodType): string | undefined {
  return z.globalRegistry.get(schema)?.description;
}

function fieldDescription(fieldSchema: z.ZodType): string | undefined {
  // .describe() may sit on the optional wrapper or on the wrapped type
  const own = descriptionOf(fieldSchema);
  if (own) return own;
  if (fieldSchema instanceof z.ZodOptional || fieldSchema instanceof z.ZodNullable) {
    return descriptionOf(fieldSchema.unwrap());
  }
  return undefined;
}

function normalizeBaseUrl(baseUrl: string | undefined): string | undefined {
  return baseUrl?.replace(/\/+$/, "");
}

/**
 * Resolves "<vendor>/<model>" to an `ai` SDK language model.
 */
export function resolveLanguageModel(config: LlmConfig): ResolvedProvider {
  const slash = config.provider.indexOf("/");
  if (slash <= 0 || slash === config.provider.length - 1) {
    throw new CrawlError(
      `LLM provider must look like "<vendor>/<model>", got "${config.provider}"`,
      "ERR_LLM_CONFIG"
    );
  }
  const vendor = config.provider.slice(0, slash).toLowerCase();
  const modelId = config.provider.slice(slash + 1);
  const baseURL = normalizeBaseUrl(config.baseUrl);

  if (vendor === "openai" && (!baseURL || baseURL === OPENAI_DEFAULT_BASE_URL)) {
    if (!config.apiToken) {
      throw new CrawlError("An API token is required for OpenAI models.", "ERR_LLM_CONFIG");
    }
    const openai = createOpenAI({ apiKey: config.apiToken, headers: config.headers });
    return { vendor, modelId, model: openai(modelId) };
  }

  const compatibleBaseUrl = baseURL ?? (vendor === "ollama" ? OLLAMA_DEFAULT_BASE_URL : undefined);
  if (!compatibleBaseUrl) {
    throw new CrawlError(`Provider "${vendor}" needs a baseUrl for its OpenAI-compatible endpoint.`, "ERR_LLM_CONFIG");
  }
  const compatible = createOpenAICompatible({
    name: vendor,
    baseURL: compatibleBaseUrl,
    apiKey: config.apiToken,
    headers: config.headers,
  });
  return { vendor, modelId, model: compatible(modelId) };
}

function modelSettings(modelId: string): ModelSettings {
  if (modelId.startsWith("gpt-5")) {
    return { providerOptions: { openai: { reasoningEffort: "low" } } };
  }
  if (modelId.startsWith("gpt-4.1")) {
    return { temperature: 0 };
  }
  return {};
}

/**
 * Extracts a list of items matching a zod schema by prompting a language model with the page.
 */
export class LlmExtractionStrategy<TSchema extends LlmSchema = LlmSchema> implements ExtractionStrategy {
  readonly name = "llm";
  private readonly provider: ResolvedProvider;
  private readonly schema: TSchema;
  private readonly instruction: string;
  private readonly inputFormat: LlmInputFormat;
  private readonly logger: Logger;
  private readonly fieldGuidance: string;
  private lastUsage: LlmUsage | null = null;
  private readonly totals: LlmUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

  constructor(options: LlmExtractionStrategyOptions<TSchema>) {
    this.schema = options.schema;
    this.instruction = options.instruction ?? "";
    this.inputFormat = options.inputFormat ?? "markdown";
    this.logger = options.logger ?? silentLogger;
    this.fieldGuidance = this.buildFieldGuidance();
    this.provider = resolveLanguageModel(options.llmConfig);
  }

  private buildFieldGuidance(): string {
    const missing: string[] = [];
    const lines: string[] = [];
    for (const [key, fieldSchema] of Object.entries(this.schema.shape)) {
      const description = fieldDescription(fieldSchema);
      if (description) {
        lines.push(`- ${key}: ${description}`);
      } else {
        missing.push(key);
      }
    }

    if (missing.length > 0) {
      throw new CrawlError(
        `All schema fields must have descriptions. Missing descriptions for: ${missing.join(", ")}\n\n` +
          `Example: ${missing[0]}: z.string().describe("Description of ${missing[0]}")`,
        "ERR_LLM_CONFIG"
      );
    }
    return lines.join("\n");
  }

  /** Token usage of the most recent model call. */
  get usage(): LlmUsage | null {
    return this.lastUsage;
  }

  /** Token usage summed over every call made by this strategy. */
  get totalUsage(): LlmUsage {
    return { ...this.totals };
  }

  private contentFor(input: ExtractionInput): string {
    switch (this.inputFormat) {
      case "html":
        return input.cleanedHtml;
      case "fit_markdown":
        if (input.markdown.fitMarkdown) return input.markdown.fitMarkdown;
        this.logger.warn("LlmExtractionStrategy: fit_markdown requested but empty, using raw markdown");
        return input.markdown.rawMarkdown;
      case "markdown":
        return input.markdown.rawMarkdown;
    }
  }

  buildPrompt(content: string): string {
    return `You are an expert at extracting structured data from web content.
Extract every item described below from the provided content, accurately and completely.
Return a JSON array; each element must match the schema.

Field requirements:
${this.fieldGuidance}

IMPORTANT: Pay careful attention to data types:
- Numbers should be returned as numeric values (not strings with currency symbols)
- Strings should be returned as plain text strings
- Return an empty array when the content holds no matching items
${this.instruction ? `\nInstruction: ${this.instruction}\n` : ""}
Content to analyze:
${content}`;
  }

  async extract(input: ExtractionInput): Promise<string> {
    const content = this.contentFor(input);
    if (!content.trim()) {
      this.logger.debug(`LlmExtractionStrategy: no ${this.inputFormat} content for ${input.url}`);
      return "[]";
    }

    this.logger.debug(
      `LlmExtractionStrategy: prompting ${this.provider.vendor}/${this.provider.modelId} with ${content.length} chars`
    );

    try {
      const result = await generateObject({
        model: this.provider.model,
        output: "array",
        schema: this.schema,
        prompt: this.buildPrompt(content),
        ...modelSettings(this.provider.modelId),
      });

      const usage: LlmUsage = {
        promptTokens: result.usage.inputTokens ?? 0,
        completionTokens: result.usage.outputTokens ?? 0,
        totalTokens: result.usage.totalTokens ?? 0,
      };
      this.lastUsage = usage;
      this.totals.promptTokens += usage.promptTokens;
      this.totals.completionTokens += usage.completionTokens;
      this.totals.totalTokens += usage.totalTokens;

      return JSON.stringify(result.object);
    } catch (error: unknown) {
      if (NoObjectGeneratedError.isInstance(error)) {
        const details: string[] = [];
        if (error.finishReason) details.push(`finish reason: ${error.finishReason}`);
        if (error.cause) {
          const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
          details.push(`cause: ${cause.length > 300 ? `${cause.substring(0, 300)}...` : cause}`);
        }
        const suffix = details.length > 0 ? ` (${details.join("; ")})` : "";
        throw new LlmExtractionError(`Failed to extract structured data: ${error.message}${suffix}`, error.text, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new LlmExtractionError(
        `Failed to extract structured data: ${message}`,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }
}
