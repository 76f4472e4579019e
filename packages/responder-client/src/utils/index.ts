/**
 * Barrel re-export for utility modules.
 */

// Transport
export { FetchTransport, mergeHeaders } from "./http.js";
export type {
  Transport,
  TransportRequest,
  TransportResponse,
  JsonTransportResponse,
  StreamTransportResponse,
  FetchTransportOptions,
} from "./http.js";

// SSE frame decoder
export { parseSSEStream } from "./sse.js";
export type { SSEFrame } from "./sse.js";

// Error mapping
export { mapHttpError } from "./error-mapping.js";

// Caller-side retry
export { withRetry, calculateDelay } from "./retry.js";
export type { RetryPolicy } from "./retry.js";

// Partial JSON
export { parsePartialJson } from "./partial-json.js";
