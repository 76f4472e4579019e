/**
 * Transport: thin wrapper around the native `fetch` API.
 *
 * Sends one POST per call and returns either the decoded JSON body or the
 * raw byte stream. Non-2xx statuses become `HttpError`s carrying the raw
 * body text. Nothing here retries.
 */

import {
  AbortError,
  InvalidResponseError,
  NetworkError,
  RequestTimeoutError,
} from "../types/index.js";
import { mapHttpError } from "./error-mapping.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TransportRequest {
  /** Wire request body; serialized as JSON. */
  body: object;
  /** Return the raw event stream instead of a decoded JSON body. */
  stream: boolean;
  /** Aborts the request and, for streams, the open connection. */
  signal?: AbortSignal;
}

/** Resolved response from a non-streaming request. */
export interface JsonTransportResponse {
  kind: "json";
  status: number;
  headers: Headers;
  body: unknown;
}

/** Resolved response from a streaming request. */
export interface StreamTransportResponse {
  kind: "stream";
  status: number;
  headers: Headers;
  body: ReadableStream<Uint8Array>;
}

export type TransportResponse = JsonTransportResponse | StreamTransportResponse;

/** The seam between the client and the network. */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  apiKey: string;
  /** e.g. "https://openrouter.ai/api/v1". A trailing slash is ignored. */
  baseUrl: string;
  /** Endpoint path appended to baseUrl. Default: "/responses". */
  path?: string;
  /**
   * Milliseconds allowed for connecting and receiving headers (and, for
   * JSON calls, the body). Never applied to an open event stream.
   */
  timeout?: number;
  /** Extra headers, e.g. HTTP-Referer / X-Title for OpenRouter. */
  headers?: Record<string, string>;
  /** Injected fetch implementation. Default: global fetch. */
  fetch?: typeof fetch;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

interface LinkedSignal {
  signal: AbortSignal;
  timedOut(): boolean;
  clearTimer(): void;
}

/**
 * Combine the caller's signal with a connection timeout. The timer is
 * cleared by the caller once the initial phase is over; the caller's
 * signal stays linked for the lifetime of the response.
 */
function linkSignal(external: AbortSignal | undefined, timeout: number | undefined): LinkedSignal {
  const controller = new AbortController();
  let timedOut = false;

  if (external) {
    if (external.aborted) {
      controller.abort(external.reason);
    } else {
      external.addEventListener("abort", () => controller.abort(external.reason), {
        once: true,
      });
    }
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  if (timeout != null && timeout > 0) {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
  }

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    clearTimer: () => clearTimeout(timer),
  };
}

function toTransportError(err: unknown, link: LinkedSignal, external?: AbortSignal): Error {
  if (link.timedOut()) {
    return new RequestTimeoutError("Request timed out before the response arrived", {
      cause: err,
    });
  }
  if (external?.aborted) {
    return new AbortError("Request aborted", { cause: err });
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new NetworkError(`Network error: ${detail}`, { cause: err });
}

// ---------------------------------------------------------------------------
// FetchTransport
// ---------------------------------------------------------------------------

export class FetchTransport implements Transport {
  private readonly url: string;
  private readonly apiKey: string;
  private readonly timeout?: number;
  private readonly extraHeaders?: Record<string, string>;
  private readonly fetchFn: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.url = options.baseUrl.replace(/\/$/, "") + (options.path ?? "/responses");
    this.apiKey = options.apiKey;
    this.timeout = options.timeout;
    this.extraHeaders = options.headers;
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  private buildHeaders(stream: boolean): Record<string, string> {
    return mergeHeaders(
      { Accept: stream ? "text/event-stream" : "application/json" },
      this.extraHeaders,
      { Authorization: `Bearer ${this.apiKey}` },
    );
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const link = linkSignal(request.signal, this.timeout);

    try {
      let res: globalThis.Response;
      try {
        res = await this.fetchFn(this.url, {
          method: "POST",
          headers: this.buildHeaders(request.stream),
          body: JSON.stringify(request.body),
          signal: link.signal,
        });
      } catch (err) {
        throw toTransportError(err, link, request.signal);
      }

      if (res.status < 200 || res.status >= 300) {
        const text = await this.readText(res, link, request.signal);
        throw mapHttpError(res.status, text, res.headers);
      }

      if (request.stream) {
        if (!res.body) {
          throw new InvalidResponseError("Response body is empty; cannot stream");
        }
        return { kind: "stream", status: res.status, headers: res.headers, body: res.body };
      }

      const text = await this.readText(res, link, request.signal);
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch (err) {
        throw new InvalidResponseError("Response body is not valid JSON", { cause: err });
      }
      return { kind: "json", status: res.status, headers: res.headers, body };
    } finally {
      link.clearTimer();
    }
  }

  private async readText(
    res: globalThis.Response,
    link: LinkedSignal,
    external?: AbortSignal,
  ): Promise<string> {
    try {
      return await res.text();
    } catch (err) {
      throw toTransportError(err, link, external);
    }
  }
}
