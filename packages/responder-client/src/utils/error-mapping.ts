/**
 * Maps non-2xx HTTP responses to the typed HttpError hierarchy.
 *
 * The raw body text is kept verbatim on the error. A JSON error body is
 * only consulted for a human-readable message and error code.
 */

import {
  HttpError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  type HttpErrorOptions,
} from "../types/index.js";
import { isRecord } from "./guards.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Message from `{ error: { message } }`, `{ message }` or `{ error: "..." }`. */
function extractMessage(parsed: unknown): string | undefined {
  if (!isRecord(parsed)) return undefined;

  const error = parsed["error"];
  if (isRecord(error) && typeof error["message"] === "string") {
    return error["message"];
  }
  if (typeof parsed["message"] === "string") {
    return parsed["message"];
  }
  if (typeof error === "string") {
    return error;
  }
  return undefined;
}

function extractErrorCode(parsed: unknown): string | undefined {
  if (!isRecord(parsed)) return undefined;

  const error = parsed["error"];
  if (isRecord(error)) {
    const code = error["code"] ?? error["type"];
    if (typeof code === "string") return code;
    if (typeof code === "number") return String(code);
  }
  if (typeof parsed["code"] === "string") return parsed["code"];
  return undefined;
}

/**
 * Parse the `Retry-After` header. Only the delay-seconds form is handled;
 * HTTP dates are uncommon for LLM APIs.
 */
function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;

  const seconds = Number.parseFloat(raw);
  return !Number.isNaN(seconds) && seconds >= 0 ? seconds : undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a typed `HttpError`.
 *
 * @param status - HTTP status code.
 * @param body - Raw response body text.
 * @param headers - Response headers (used for Retry-After).
 */
export function mapHttpError(
  status: number,
  body: string,
  headers?: Headers,
): HttpError {
  const parsed = tryParseJson(body);
  const message =
    extractMessage(parsed) ?? (body.trim().length > 0 ? body : `HTTP ${status}`);

  const opts: Omit<HttpErrorOptions, "retryable"> = {
    status,
    body,
    error_code: extractErrorCode(parsed),
    retry_after: parseRetryAfter(headers),
  };

  switch (status) {
    case 400:
    case 422:
      return new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 429:
      return new RateLimitError(message, opts);
  }

  if (status >= 500 && status <= 599) {
    return new ServerError(message, opts);
  }

  // 408/409 and anything unexpected: generic, retryable only for 408.
  return new HttpError(message, { ...opts, retryable: status === 408 });
}
