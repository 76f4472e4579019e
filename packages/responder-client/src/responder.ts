/**
 * Responder: the entry point for Responses API calls.
 *
 * Each `respond()` call is independent: it owns a fresh AbortController,
 * and for streams a fresh assembler and aggregator. The Responder itself
 * holds only immutable configuration, so concurrent calls share nothing.
 */

import { loadConfig, type ResponderConfig, type ResponderConfigInput } from "./config.js";
import { parseLogLevel, setGlobalLogLevel, createLogger } from "./logging.js";
import {
  InvalidResponseError,
  getFunctionCalls,
  getOutputText,
  getReasoningText,
  type FunctionCallItem,
  type Request,
  type Response,
  type TextFormat,
} from "./types/index.js";
import { FetchTransport, type Transport, type TransportResponse } from "./utils/http.js";
import { ResponseStream } from "./stream/response-stream.js";
import { extractStructuredOutput, type StructuredOutput } from "./structured-output.js";
import { translateRequest } from "./wire/translate-request.js";
import { translateResponse } from "./wire/translate-response.js";

const logger = createLogger("responder");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResponderOptions extends Partial<ResponderConfigInput> {
  /** Replaces the fetch-based transport entirely (tests, proxies). */
  transport?: Transport;
  /** fetch implementation for the default transport. */
  fetch?: typeof fetch;
  /** Environment to read unset options from. Default: process.env. */
  env?: Readonly<Record<string, string | undefined>>;
}

export interface RespondOptions {
  /** Aborts the request, or the open stream once it has started. */
  signal?: AbortSignal;
}

/** A complete non-streaming response with its structured output, if requested. */
export interface ParsedResponse<T> extends Response {
  readonly output_parsed?: StructuredOutput<T>;
}

export type StreamingRequest<T> = Request<T> & { readonly stream: true };
export type BlockingRequest<T> = Request<T> & { readonly stream?: false };

// ---------------------------------------------------------------------------
// Responder
// ---------------------------------------------------------------------------

export class Responder {
  readonly config: ResponderConfig;
  private readonly transport: Transport;

  constructor(options: ResponderOptions = {}) {
    const { transport, fetch: fetchFn, env, ...configOptions } = options;
    this.config = loadConfig(configOptions, env ?? process.env);

    if (this.config.logLevel) {
      const level = parseLogLevel(this.config.logLevel);
      if (level !== undefined) setGlobalLogLevel(level);
    }

    this.transport =
      transport ??
      new FetchTransport({
        apiKey: this.config.apiKey,
        baseUrl: this.config.baseUrl,
        timeout: this.config.timeout,
        headers: this.config.headers,
        fetch: fetchFn,
      });
  }

  /** Create a Responder configured only from environment variables. */
  static fromEnv(env?: Readonly<Record<string, string | undefined>>): Responder {
    return new Responder({ env: env ?? process.env });
  }

  // -----------------------------------------------------------------------
  // respond()
  // -----------------------------------------------------------------------

  /**
   * Send one request. With `stream: true` resolves once the response headers
   * arrive, to a ResponseStream the caller iterates or closes; otherwise to
   * the complete response.
   *
   * Never retries; wrap in `withRetry` for that.
   */
  respond<T = unknown>(
    request: StreamingRequest<T>,
    options?: RespondOptions,
  ): Promise<ResponseStream<T>>;
  respond<T = unknown>(
    request: BlockingRequest<T>,
    options?: RespondOptions,
  ): Promise<ParsedResponse<T>>;
  respond<T = unknown>(
    request: Request<T>,
    options?: RespondOptions,
  ): Promise<ResponseStream<T> | ParsedResponse<T>>;
  async respond<T = unknown>(
    request: Request<T>,
    options: RespondOptions = {},
  ): Promise<ResponseStream<T> | ParsedResponse<T>> {
    const stream = request.stream === true;
    const body = translateRequest(request, stream);

    const controller = new AbortController();
    const external = options.signal;
    const forwardAbort = (): void => controller.abort();
    if (external?.aborted) controller.abort();
    else external?.addEventListener("abort", forwardAbort, { once: true });

    logger.debug(`POST ${request.model} (stream=${stream})`);

    let res: TransportResponse;
    try {
      res = await this.transport.send({ body, stream, signal: controller.signal });
    } catch (err: unknown) {
      external?.removeEventListener("abort", forwardAbort);
      throw err;
    }

    if (!stream) {
      external?.removeEventListener("abort", forwardAbort);
      if (res.kind !== "json") {
        throw new InvalidResponseError("Expected a JSON body for a non-streaming request");
      }
      return withParsedOutput(translateResponse(res.body), request.text_format);
    }

    if (res.kind !== "stream") {
      external?.removeEventListener("abort", forwardAbort);
      throw new InvalidResponseError("Expected an event stream for a streaming request");
    }
    controller.signal.addEventListener(
      "abort",
      () => external?.removeEventListener("abort", forwardAbort),
      { once: true },
    );
    return new ResponseStream<T>({
      body: res.body,
      controller,
      closeGraceMs: this.config.closeGraceMs,
      schema: request.text_format?.schema,
    });
  }

  // -----------------------------------------------------------------------
  // Accessors
  // -----------------------------------------------------------------------

  getOutputText(response: Pick<Response, "output">): string {
    return getOutputText(response);
  }

  getReasoningText(response: Pick<Response, "output">): string {
    return getReasoningText(response);
  }

  getFunctionCalls(response: Pick<Response, "output">): FunctionCallItem[] {
    return getFunctionCalls(response);
  }
}

function withParsedOutput<T>(
  response: Response,
  format: TextFormat<T> | undefined,
): ParsedResponse<T> {
  if (!format) return response;
  return Object.freeze({
    ...response,
    output_parsed: extractStructuredOutput(response, format.schema),
  });
}
