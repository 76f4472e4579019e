/**
 * Translate a Request into a Responses API request body.
 *
 * Input items are passed through in order; the protocol is stateless, so
 * the caller's list is the whole conversation.
 */

import type {
  FunctionTool,
  InputItem,
  Plugin,
  Request,
  ToolChoice,
} from "../types/index.js";
import { ConfigurationError } from "../types/index.js";
import { toJsonSchema } from "../structured-output.js";

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

export interface WireToolDefinition {
  type: "function";
  name: string;
  description?: string;
  parameters: Record<string, unknown>;
  strict: boolean;
}

export type WireToolChoice = "auto" | "none" | "required" | { type: "function"; name: string };

export interface WireTextFormat {
  type: "json_schema";
  name: string;
  description?: string;
  schema: Record<string, unknown>;
  strict: true;
}

export interface WireRequestBody {
  model: string;
  input: string | InputItem[];
  instructions?: string;
  tools?: WireToolDefinition[];
  tool_choice?: WireToolChoice;
  parallel_tool_calls?: boolean;
  reasoning?: { effort?: string; summary?: string };
  plugins?: Plugin[];
  text?: { format: WireTextFormat };
  max_output_tokens?: number;
  temperature?: number;
  top_p?: number;
  metadata?: Record<string, string>;
  stream: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function translateTool(tool: FunctionTool): WireToolDefinition {
  return {
    type: "function",
    name: tool.name,
    ...(tool.description !== undefined ? { description: tool.description } : {}),
    parameters: tool.parameters,
    strict: tool.strict ?? true,
  };
}

function translateToolChoice(choice: ToolChoice): WireToolChoice {
  if (choice.mode !== "named") return choice.mode;
  if (!choice.tool_name) {
    throw new ConfigurationError('tool_choice mode "named" requires tool_name');
  }
  return { type: "function", name: choice.tool_name };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function translateRequest(request: Request<unknown>, stream: boolean): WireRequestBody {
  if (!request.model) {
    throw new ConfigurationError("Request.model is required");
  }

  const body: WireRequestBody = {
    model: request.model,
    input: typeof request.input === "string" ? request.input : [...request.input],
    stream,
  };

  if (request.instructions !== undefined) body.instructions = request.instructions;
  if (request.tools && request.tools.length > 0) body.tools = request.tools.map(translateTool);
  if (request.tool_choice) body.tool_choice = translateToolChoice(request.tool_choice);
  if (request.parallel_tool_calls !== undefined) {
    body.parallel_tool_calls = request.parallel_tool_calls;
  }
  if (request.reasoning) body.reasoning = { ...request.reasoning };
  if (request.plugins && request.plugins.length > 0) {
    body.plugins = request.plugins.map((plugin) => ({ ...plugin }));
  }
  if (request.max_output_tokens !== undefined) body.max_output_tokens = request.max_output_tokens;
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.top_p !== undefined) body.top_p = request.top_p;
  if (request.metadata) body.metadata = { ...request.metadata };

  if (request.text_format) {
    const format = request.text_format;
    body.text = {
      format: {
        type: "json_schema",
        name: format.name,
        ...(format.description !== undefined ? { description: format.description } : {}),
        schema: toJsonSchema(format.schema),
        strict: true,
      },
    };
  }

  return body;
}
