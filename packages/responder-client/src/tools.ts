import type { ZodType } from "zod";
import type { FunctionTool } from "./types/index.js";
import { ConfigurationError } from "./types/index.js";
import { toJsonSchema } from "./structured-output.js";

const TOOL_NAME = /^[a-zA-Z][a-zA-Z0-9_-]*$/;

export interface FunctionToolOptions {
  name: string;
  description?: string;
  /** zod object schema describing the arguments. */
  parameters: ZodType;
  strict?: boolean;
}

/** Build a FunctionTool whose parameters come from a zod schema. */
export function functionTool(options: FunctionToolOptions): FunctionTool {
  if (!TOOL_NAME.test(options.name) || options.name.length > 64) {
    throw new ConfigurationError(`Invalid tool name: "${options.name}"`);
  }
  const parameters = toJsonSchema(options.parameters);
  if (parameters["type"] !== "object") {
    throw new ConfigurationError(`Tool "${options.name}" parameters must be an object schema`);
  }
  return {
    name: options.name,
    ...(options.description !== undefined ? { description: options.description } : {}),
    parameters,
    strict: options.strict ?? true,
  };
}
