/**
 * Structured output: the JSON Schema hint sent with a request and the
 * local check of the final text against the caller's zod schema.
 *
 * A mismatch is a value, never an exception: the model may ignore the
 * hint, and callers decide what to do with free text.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { createLogger } from "./logging.js";
import { ConfigurationError, getFirstMessage, getMessageText } from "./types/index.js";
import type { Response } from "./types/index.js";
import { isRecord } from "./utils/guards.js";

const logger = createLogger("structured-output");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StructuredOutputFailure = "empty" | "invalid_json" | "schema_mismatch";

export type StructuredOutput<T> =
  | { readonly kind: "match"; readonly value: T }
  | { readonly kind: "none"; readonly reason: StructuredOutputFailure };

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/** Validate already-extracted text. */
export function parseStructuredText<T>(text: string, schema: Schema<T>): StructuredOutput<T> {
  const trimmed = text.trim();
  if (trimmed.length === 0) return { kind: "none", reason: "empty" };

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch {
    logger.debug("Output text is not valid JSON");
    return { kind: "none", reason: "invalid_json" };
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    logger.debug(`Output does not match schema: ${result.error.message}`);
    return { kind: "none", reason: "schema_mismatch" };
  }
  return { kind: "match", value: result.data };
}

/**
 * Read the first message item's text and validate it against `schema`.
 * Only the first message is considered, even when the response has several.
 */
export function extractStructuredOutput<T>(
  response: Pick<Response, "output">,
  schema: Schema<T>,
): StructuredOutput<T> {
  const message = getFirstMessage(response);
  if (!message) return { kind: "none", reason: "empty" };
  return parseStructuredText(getMessageText(message), schema);
}

// ---------------------------------------------------------------------------
// Request hint
// ---------------------------------------------------------------------------

/** Convert a zod schema to the inline JSON Schema sent as `text.format.schema`. */
export function toJsonSchema(schema: ZodType): Record<string, unknown> {
  const converted: unknown = zodToJsonSchema(schema, {
    target: "openAi",
    $refStrategy: "none",
  });
  if (!isRecord(converted)) {
    throw new ConfigurationError("Schema could not be converted to JSON Schema");
  }
  const { $schema: _ignored, ...rest } = converted;
  return rest;
}
