/**
 * Error hierarchy for the responder client.
 *
 * All library errors inherit from SDKError. Malformed stream events and
 * structured-output mismatches are not errors: the first are skipped and
 * logged, the second are reported as a `none` result.
 */

// ---------------------------------------------------------------------------
// SDKError: base for all library errors
// ---------------------------------------------------------------------------

/** Base error for all responder client errors. */
export class SDKError extends Error {
  /** Whether a caller-side retry may succeed. The client never retries. */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; retryable?: boolean },
  ) {
    super(message, { cause: options?.cause });
    this.name = "SDKError";
    this.retryable = options?.retryable ?? false;
  }
}

// ---------------------------------------------------------------------------
// HttpError: non-2xx responses
// ---------------------------------------------------------------------------

export interface HttpErrorOptions {
  /** HTTP status code. */
  status: number;
  /** Raw response body text, never interpreted as a response. */
  body: string;
  /** Provider-specific error code from a JSON error body. */
  error_code?: string;
  /** Seconds to wait before retrying (Retry-After header). */
  retry_after?: number;
  retryable?: boolean;
  cause?: unknown;
}

/** The server answered with a non-2xx status. */
export class HttpError extends SDKError {
  readonly status: number;
  readonly body: string;
  readonly error_code?: string;
  readonly retry_after?: number;

  constructor(message: string, options: HttpErrorOptions) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? false,
    });
    this.name = "HttpError";
    this.status = options.status;
    this.body = options.body;
    this.error_code = options.error_code;
    this.retry_after = options.retry_after;
  }
}

type StatusErrorOptions = Omit<HttpErrorOptions, "retryable">;

/** 401: Invalid API key. */
export class AuthenticationError extends HttpError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 403: Insufficient permissions or moderation block. */
export class AccessDeniedError extends HttpError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AccessDeniedError";
  }
}

/** 404: Unknown model or endpoint. */
export class NotFoundError extends HttpError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "NotFoundError";
  }
}

/** 400/422: Malformed request, invalid parameters. */
export class InvalidRequestError extends HttpError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** 429: Rate limit exceeded. */
export class RateLimitError extends HttpError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
  }
}

/** 500-599: Provider internal error. */
export class ServerError extends HttpError {
  constructor(message: string, options: StatusErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "ServerError";
  }
}

// ---------------------------------------------------------------------------
// Non-HTTP errors
// ---------------------------------------------------------------------------

/** Connection or headers phase timed out. Retryable. */
export class RequestTimeoutError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "RequestTimeoutError";
  }
}

/** Request cancelled through the caller's abort signal. */
export class AbortError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "AbortError";
  }
}

/** Network-level failure (DNS, refused connection, reset). Retryable. */
export class NetworkError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "NetworkError";
  }
}

/** The stream failed or ended before its terminal event. Retryable. */
export class StreamError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: true });
    this.name = "StreamError";
  }
}

/**
 * The consumer closed the stream before the terminal event. Reported only
 * when the discarded result is asked for afterwards.
 */
export class StreamAbortedError extends SDKError {
  constructor(message = "Stream was closed before the response completed") {
    super(message, { retryable: false });
    this.name = "StreamAbortedError";
  }
}

/** A 2xx body that is not a valid Responses payload. */
export class InvalidResponseError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "InvalidResponseError";
  }
}

/** Client misconfiguration (missing API key, bad option). */
export class ConfigurationError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "ConfigurationError";
  }
}
