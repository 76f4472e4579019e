export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export transport, SSE and retry utilities
export * from "./utils/index.js";

// Logging
export {
  LogLevel,
  Logger,
  createLogger,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogColors,
  setLogTimestamps,
  parseLogLevel,
} from "./logging.js";

// Configuration
export { ResponderConfigSchema, loadConfig, DEFAULT_BASE_URL } from "./config.js";
export type { ResponderConfig, ResponderConfigInput } from "./config.js";

// Stream pipeline
export { normalizeFrame, lookupEventType, SKIP, WIRE_EVENT_TYPES } from "./stream/normalize.js";
export type { Skip } from "./stream/normalize.js";
export { ResponseAssembler, freezeResponse } from "./stream/assembler.js";
export { ToolCallAggregator } from "./stream/tool-calls.js";
export type { ToolCallStart } from "./stream/tool-calls.js";
export { ResponseStream, DEFAULT_CLOSE_GRACE_MS } from "./stream/response-stream.js";
export type { ResponseStreamOptions } from "./stream/response-stream.js";

// Wire translation
export { translateRequest } from "./wire/translate-request.js";
export type {
  WireRequestBody,
  WireToolDefinition,
  WireToolChoice,
  WireTextFormat,
} from "./wire/translate-request.js";
export { translateResponse } from "./wire/translate-response.js";

// Structured output and tools
export {
  extractStructuredOutput,
  parseStructuredText,
  toJsonSchema,
} from "./structured-output.js";
export type { StructuredOutput, StructuredOutputFailure } from "./structured-output.js";
export { functionTool } from "./tools.js";
export type { FunctionToolOptions } from "./tools.js";

// Responder
export { Responder } from "./responder.js";
export type {
  ResponderOptions,
  RespondOptions,
  ParsedResponse,
  StreamingRequest,
  BlockingRequest,
} from "./responder.js";
