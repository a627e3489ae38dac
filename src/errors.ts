import { inspect } from "node:util";

export type CrawlErrorCode =
  | "ERR_INVALID_URL"
  | "ERR_NAVIGATION"
  | "ERR_NO_RESPONSE"
  | "ERR_HTTP_ERROR"
  | "ERR_HOOK_FAILED"
  | "ERR_JS_EXECUTION"
  | "ERR_WAIT_FOR_TIMEOUT"
  | "ERR_POOL_INIT_FAILED"
  | "ERR_POOL_UNAVAILABLE"
  | "ERR_QUEUE_NO_RESULT"
  | "ERR_CHALLENGE_PAGE"
  | "ERR_HTTP_FETCH_FAILED"
  | "ERR_UNSUPPORTED_OPTION"
  | "ERR_FILE_READ"
  | "ERR_CRAWL_FAILED"
  | "ERR_EXTRACTION_FAILED"
  | "ERR_LLM_EXTRACTION"
  | "ERR_LLM_CONFIG"
  | "ERR_INVALID_SCHEMA"
  | "ERR_EXTRACTED_CONTENT_PARSE"
  | "ERR_CONFIG";

export interface CrawlErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  statusCode?: number;
  originalError?: CrawlErrorDetails;
}

/**
 * Base error for everything the crawler reports.
 */
export class CrawlError extends Error {
  /** A specific error code (e.g., ERR_NAVIGATION, ERR_HTTP_ERROR). */
  public readonly code: CrawlErrorCode;
  /** The original error object, if available. */
  public readonly originalError?: Error;
  /** HTTP status code, if relevant. */
  public readonly statusCode?: number;

  constructor(message: string, code: CrawlErrorCode, originalError?: Error, statusCode?: number) {
    super(message);
    this.name = "CrawlError";
    this.code = code;
    this.originalError = originalError;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Plain object with only the metadata worth logging or returning to callers.
   */
  toObject(): CrawlErrorDetails {
    const descriptor: CrawlErrorDetails = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    if (this.statusCode !== undefined) {
      descriptor.statusCode = this.statusCode;
    }

    const original = serializeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): CrawlErrorDetails {
    return this.toObject();
  }

  [inspect.custom](): CrawlErrorDetails {
    return this.toObject();
  }
}

/**
 * Raised before any extraction when a schema is malformed.
 */
export class SchemaValidationError extends CrawlError {
  constructor(
    public readonly schemaName: string,
    public readonly issues: string[]
  ) {
    super(`Invalid extraction schema "${schemaName}":\n  - ${issues.join("\n  - ")}`, "ERR_INVALID_SCHEMA");
    this.name = "SchemaValidationError";
  }
}

/**
 * The extracted payload of a crawl could not be parsed as JSON.
 */
export class ExtractionParseError extends CrawlError {
  constructor(
    message: string,
    public readonly rawContent: string,
    originalError?: Error
  ) {
    super(message, "ERR_EXTRACTED_CONTENT_PARSE", originalError);
    this.name = "ExtractionParseError";
  }
}

/**
 * The model call failed or its output did not match the schema.
 */
export class LlmExtractionError extends CrawlError {
  constructor(
    message: string,
    /** Text the model produced, when it produced any. */
    public readonly rawText: string | undefined,
    originalError?: Error
  ) {
    super(message, "ERR_LLM_EXTRACTION", originalError);
    this.name = "LlmExtractionError";
  }
}

/**
 * Wraps anything thrown into a CrawlError, keeping existing CrawlErrors as they are.
 */
export function toCrawlError(error: unknown, code: CrawlErrorCode, prefix: string): CrawlError {
  if (error instanceof CrawlError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CrawlError(`${prefix}: ${message}`, code, error instanceof Error ? error : undefined);
}

function readField(value: object, key: string): unknown {
  return Reflect.get(value, key);
}

function serializeUnknownError(error: unknown): CrawlErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof CrawlError) {
    return error.toObject();
  }

  if (typeof error === "object") {
    const name = readField(error, "name");
    const message = readField(error, "message");
    const descriptor: CrawlErrorDetails = {
      name: typeof name === "string" && name ? name : "Error",
      message: typeof message === "string" ? message : String(error),
    };

    const code = readField(error, "code");
    if (typeof code === "string" || typeof code === "number") {
      descriptor.code = code;
    }

    const status = readField(error, "statusCode") ?? readField(error, "status");
    if (typeof status === "number") {
      descriptor.statusCode = status;
    }

    const nested = serializeUnknownError(readField(error, "originalError"));
    if (nested) {
      descriptor.originalError = nested;
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: typeof error === "string" ? error : String(error),
  };
}
