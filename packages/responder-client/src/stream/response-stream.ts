/**
 * ResponseStream: forward-only iteration over one streamed response.
 *
 * Each stream owns its byte stream, its AbortController and its assembler.
 * It ends in exactly one way: the terminal event arrives, the consumer
 * closes it (including `break` out of `for await`), or it fails. In every
 * case the byte stream is cancelled and the request aborted; `close()`
 * waits for that at most `closeGraceMs`.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { createLogger } from "../logging.js";
import {
  AbortError,
  ConfigurationError,
  SDKError,
  StreamAbortedError,
  StreamError,
  getOutputText,
  isTerminalEvent,
  type Response,
  type ResponseEvent,
} from "../types/index.js";
import { parseSSEStream, type SSEFrame } from "../utils/sse.js";
import { parsePartialJson } from "../utils/partial-json.js";
import { extractStructuredOutput, type StructuredOutput } from "../structured-output.js";
import { ResponseAssembler } from "./assembler.js";
import { SKIP, normalizeFrame } from "./normalize.js";

const logger = createLogger("stream");

export const DEFAULT_CLOSE_GRACE_MS = 250;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResponseStreamOptions<T> {
  body: ReadableStream<Uint8Array>;
  /** Aborted whenever the stream is released. */
  controller?: AbortController;
  closeGraceMs?: number;
  /** Schema for `structuredOutput()`. */
  schema?: ZodType<T, ZodTypeDef, unknown>;
}

type Outcome =
  | { kind: "completed"; response: Response }
  | { kind: "closed" }
  | { kind: "failed"; error: SDKError };

interface Waiter {
  resolve: (response: Response) => void;
  reject: (error: unknown) => void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// ResponseStream
// ---------------------------------------------------------------------------

export class ResponseStream<T = unknown>
  implements AsyncIterator<ResponseEvent, undefined>, AsyncIterable<ResponseEvent>
{
  private readonly body: ReadableStream<Uint8Array>;
  private readonly frames: AsyncGenerator<SSEFrame, void, undefined>;
  private readonly controller: AbortController;
  private readonly closeGraceMs: number;
  private readonly schema: ZodType<T, ZodTypeDef, unknown> | undefined;
  private readonly assembler = new ResponseAssembler();

  private consumer: "none" | "iterator" | "drain" = "none";
  private started = false;
  private outcome: Outcome | undefined;
  private waiters: Waiter[] = [];
  private tail: Promise<unknown> = Promise.resolve();
  private released: Promise<void> | undefined;

  constructor(options: ResponseStreamOptions<T>) {
    this.body = options.body;
    this.controller = options.controller ?? new AbortController();
    this.frames = parseSSEStream(options.body, this.controller.signal);
    this.closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
    this.schema = options.schema;
  }

  /** True once the stream has ended, for whatever reason. */
  get closed(): boolean {
    return this.outcome !== undefined;
  }

  // -------------------------------------------------------------------------
  // Iteration
  // -------------------------------------------------------------------------

  [Symbol.asyncIterator](): this {
    if (this.consumer !== "none") {
      throw new StreamError("ResponseStream supports a single consumer");
    }
    this.consumer = "iterator";
    return this;
  }

  /** Calls are serialized; a call made while another is pending waits for it. */
  next(): Promise<IteratorResult<ResponseEvent, undefined>> {
    if (this.consumer === "none") this.consumer = "iterator";
    const result = this.tail.then(() => this.step());
    this.tail = result.catch(() => undefined);
    return result;
  }

  /** Same as `close()`; called by `for await` on `break`. */
  async return(): Promise<IteratorResult<ResponseEvent, undefined>> {
    await this.close();
    return DONE;
  }

  /**
   * Stop reading and release the connection. Partial output is discarded:
   * `finalResponse()` rejects with StreamAbortedError afterwards. Has no
   * effect once the stream has ended.
   */
  async close(): Promise<void> {
    if (!this.outcome) {
      logger.debug("Stream closed by consumer");
      this.settle({ kind: "closed" });
    }
    await this.release();
  }

  // -------------------------------------------------------------------------
  // Results
  // -------------------------------------------------------------------------

  /**
   * The complete response. Drains the stream when nothing has iterated it.
   * Once `next()` has been called the iterating consumer owns the stream: the
   * promise resolves when that consumer reaches the terminal event, and stays
   * pending for as long as it stops calling `next()` without `close()`.
   */
  finalResponse(): Promise<Response> {
    if (this.consumer === "none") {
      this.consumer = "drain";
      return this.drain();
    }
    return this.result();
  }

  async outputText(): Promise<string> {
    return getOutputText(await this.finalResponse());
  }

  async structuredOutput(): Promise<StructuredOutput<T>> {
    const schema = this.schema;
    if (!schema) {
      throw new ConfigurationError("structuredOutput() requires a request with text_format");
    }
    return extractStructuredOutput(await this.finalResponse(), schema);
  }

  /** The response assembled so far. */
  snapshot(): Response {
    return this.assembler.snapshot();
  }

  /**
   * Best-effort parse of the first message's text so far. Not validated;
   * `undefined` until enough text has arrived.
   */
  partialOutput(): unknown {
    return parsePartialJson(this.assembler.firstMessageText());
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async step(): Promise<IteratorResult<ResponseEvent, undefined>> {
    while (!this.outcome) {
      this.started = true;
      let frame: IteratorResult<SSEFrame, void>;
      try {
        frame = await this.frames.next();
      } catch (err: unknown) {
        if (this.outcome) break;
        throw await this.fail(
          err instanceof SDKError
            ? err
            : new StreamError(`Stream read failed: ${describe(err)}`, { cause: err }),
        );
      }
      if (this.outcome) break;

      if (frame.done) {
        if (this.controller.signal.aborted) {
          throw await this.fail(new AbortError("Stream aborted"));
        }
        const serverError = this.assembler.lastError;
        const detail = serverError ? `: ${serverError.message}` : "";
        throw await this.fail(new StreamError(`Stream ended before a terminal event${detail}`));
      }

      const event = normalizeFrame(frame.value);
      if (event === SKIP) continue;

      this.assembler.apply(event);
      if (isTerminalEvent(event)) {
        this.settle({ kind: "completed", response: this.assembler.snapshot() });
        await this.release();
      }
      return { done: false, value: event };
    }
    return DONE;
  }

  private async drain(): Promise<Response> {
    for (;;) {
      const result = await this.next();
      if (result.done) break;
    }
    return this.result();
  }

  private result(): Promise<Response> {
    return new Promise<Response>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };
      if (this.outcome) this.notify(waiter, this.outcome);
      else this.waiters.push(waiter);
    });
  }

  private notify(waiter: Waiter, outcome: Outcome): void {
    switch (outcome.kind) {
      case "completed":
        waiter.resolve(outcome.response);
        break;
      case "closed":
        waiter.reject(new StreamAbortedError());
        break;
      case "failed":
        waiter.reject(outcome.error);
        break;
    }
  }

  private settle(outcome: Outcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) this.notify(waiter, outcome);
  }

  private async fail(error: SDKError): Promise<SDKError> {
    logger.warn(`Stream failed: ${error.message}`);
    this.settle({ kind: "failed", error });
    await this.release();
    return error;
  }

  private release(): Promise<void> {
    this.released ??= this.releaseNow();
    return this.released;
  }

  private async releaseNow(): Promise<void> {
    this.controller.abort();

    // An unstarted generator skips its cleanup, so the body is cancelled here.
    const cleanup: Promise<unknown> = this.started
      ? this.frames.return(undefined)
      : this.body.cancel();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.closeGraceMs);
    });

    try {
      const settled = await Promise.race([
        cleanup.then(
          () => "released" as const,
          (err: unknown) => {
            logger.debug(`Error while releasing stream: ${describe(err)}`);
            return "released" as const;
          },
        ),
        grace,
      ]);
      if (settled === "timeout") {
        logger.debug(`Stream release exceeded ${this.closeGraceMs}ms grace period`);
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
