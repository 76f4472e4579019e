/**
 * Request types for the responder client.
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { InputItem } from "./input.js";

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** A function the model may call. */
export interface FunctionTool {
  /** [a-zA-Z][a-zA-Z0-9_-]*, max 64 chars. */
  readonly name: string;
  readonly description?: string;
  /** JSON Schema for the arguments (root must be "object"). */
  readonly parameters: Record<string, unknown>;
  /** Ask the server to enforce the schema. Default: true. */
  readonly strict?: boolean;
}

/** Controls whether and how the model uses tools. */
export interface ToolChoice {
  readonly mode: "auto" | "none" | "required" | "named";
  /** Required when mode is "named". */
  readonly tool_name?: string;
}

// ---------------------------------------------------------------------------
// Reasoning / plugins / text format
// ---------------------------------------------------------------------------

export interface ReasoningConfig {
  readonly effort?: "minimal" | "low" | "medium" | "high";
  readonly summary?: "auto" | "concise" | "detailed";
}

/** Server-side plugin, e.g. `{ id: "web", max_results: 3 }`. */
export interface Plugin {
  readonly id: string;
  readonly [option: string]: unknown;
}

/**
 * Target shape for the final text. The schema is sent to the server as a
 * JSON Schema hint and used locally to validate the output.
 */
export interface TextFormat<T> {
  readonly name: string;
  readonly schema: ZodType<T, ZodTypeDef, unknown>;
  readonly description?: string;
}

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

/** The single input type for `Responder.respond()`. */
export interface Request<T = unknown> {
  /** Required; the provider's model ID, e.g. "openai/gpt-5-nano". */
  readonly model: string;
  /** Raw prompt text or the full ordered conversation. */
  readonly input: string | readonly InputItem[];
  readonly instructions?: string;
  readonly tools?: readonly FunctionTool[];
  readonly tool_choice?: ToolChoice;
  readonly parallel_tool_calls?: boolean;
  readonly reasoning?: ReasoningConfig;
  readonly plugins?: readonly Plugin[];
  /** Resolve to a ResponseStream instead of a complete Response. */
  readonly stream?: boolean;
  readonly max_output_tokens?: number;
  readonly temperature?: number;
  readonly top_p?: number;
  readonly metadata?: Readonly<Record<string, string>>;
  readonly text_format?: TextFormat<T>;
}
