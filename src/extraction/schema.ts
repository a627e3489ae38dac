import { z } from "zod";
import { parse } from "node-html-parser";
import { SchemaValidationError } from "../errors.js";

// Empty document used to compile selectors once at validation time
const SELECTOR_PROBE = parse("<div></div>");

function isCompilableSelector(selector: string): boolean {
  try {
    SELECTOR_PROBE.querySelectorAll(selector);
    return true;
  } catch {
    return false;
  }
}

const fieldName = z.string().trim().min(1, "field name must not be empty");
// An empty selector targets the base element itself
const fieldSelector = z.string().trim().default("");
const multiple = z.boolean().default(false);

const TextFieldSchema = z.object({
  name: fieldName,
  selector: fieldSelector,
  type: z.literal("text"),
  multiple,
});

const AttributeFieldSchema = z.object({
  name: fieldName,
  selector: fieldSelector,
  type: z.literal("attribute"),
  attribute: z.string().trim().min(1, "attribute fields need a non-empty attribute name"),
  multiple,
});

// `multiple` is accepted but has no effect on exists fields
const ExistsFieldSchema = z.object({
  name: fieldName,
  selector: fieldSelector,
  type: z.literal("exists"),
  multiple,
});

export const FieldSpecSchema = z.discriminatedUnion("type", [TextFieldSchema, AttributeFieldSchema, ExistsFieldSchema]);

export const ExtractionSchemaSchema = z
  .object({
    name: z.string().trim().min(1, "schema name must not be empty"),
    baseSelector: z.string().trim().min(1, "baseSelector must not be empty"),
    fields: z.array(FieldSpecSchema).min(1, "a schema needs at least one field"),
  })
  .superRefine((schema, ctx) => {
    if (!isCompilableSelector(schema.baseSelector)) {
      ctx.addIssue({
        code: "custom",
        path: ["baseSelector"],
        message: `invalid CSS selector "${schema.baseSelector}"`,
      });
    }

    const seen = new Set<string>();
    schema.fields.forEach((field, index) => {
      if (seen.has(field.name)) {
        ctx.addIssue({
          code: "custom",
          path: ["fields", index, "name"],
          message: `duplicate field name "${field.name}"`,
        });
      }
      seen.add(field.name);

      if (field.selector && !isCompilableSelector(field.selector)) {
        ctx.addIssue({
          code: "custom",
          path: ["fields", index, "selector"],
          message: `invalid CSS selector "${field.selector}"`,
        });
      }
    });
  });

export type FieldType = z.output<typeof FieldSpecSchema>["type"];
export type FieldSpec = z.output<typeof FieldSpecSchema>;
export type TextFieldSpec = z.output<typeof TextFieldSchema>;
export type AttributeFieldSpec = z.output<typeof AttributeFieldSchema>;
export type ExistsFieldSpec = z.output<typeof ExistsFieldSchema>;

/** A schema as written by hand: selector and multiple may be omitted. */
export type ExtractionSchemaInput = z.input<typeof ExtractionSchemaSchema>;

/** A validated, frozen schema. */
export type ExtractionSchema = Readonly<z.output<typeof ExtractionSchemaSchema>>;

export type FieldValue = string | boolean | string[] | (string | null)[] | null;
export type ExtractedRecord = Record<string, FieldValue>;

function formatIssuePath(path: ReadonlyArray<PropertyKey>): string {
  return path.length > 0 ? path.map(String).join(".") : "schema";
}

/**
 * Validates a schema object and freezes the result.
 *
 * Accepts `unknown` so schemas loaded from JSON go through the same checks as literals.
 * @throws {SchemaValidationError} listing every problem found.
 */
export function defineExtractionSchema(input: unknown): ExtractionSchema {
  const parsed = ExtractionSchemaSchema.safeParse(input);
  if (!parsed.success) {
    const name =
      typeof input === "object" && input !== null && "name" in input && typeof input.name === "string"
        ? input.name
        : "<unnamed>";
    const issues = parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`);
    throw new SchemaValidationError(name, issues);
  }

  const schema = parsed.data;
  schema.fields.forEach((field) => Object.freeze(field));
  Object.freeze(schema.fields);
  return Object.freeze(schema);
}
