/**
 * Server-Sent Events (SSE) frame decoder.
 *
 * Parses a `ReadableStream<Uint8Array>` into an async sequence of frames:
 *   - `event:` lines set the event type
 *   - `data:` lines form the payload (multiple `data:` lines are joined with "\n")
 *   - Lines starting with `:` are comments / keep-alives (ignored)
 *   - A blank line dispatches the accumulated frame
 *
 * Chunks may split a frame, a line, or a `\r\n` pair anywhere. A frame is
 * only yielded once its terminating blank line has arrived.
 */

import { createLogger } from "../logging.js";

const logger = createLogger("sse");

const LINE_BREAK = /\r\n|\r|\n/;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single decoded SSE frame. */
export interface SSEFrame {
  /** The event type (from `event:` line). `undefined` if not specified. */
  event?: string;
  /** The event data (from `data:` lines, joined with newlines). */
  data: string;
}

interface FrameAccumulator {
  eventType: string | undefined;
  dataLines: string[];
  /** Whether any field line was seen since the last dispatch. */
  touched: boolean;
}

// ---------------------------------------------------------------------------
// Internal: parse a single non-blank, non-comment line into the accumulator.
// ---------------------------------------------------------------------------

function processField(line: string, acc: FrameAccumulator): void {
  const colonIdx = line.indexOf(":");
  const field = colonIdx === -1 ? line : line.slice(0, colonIdx);
  let value = colonIdx === -1 ? "" : line.slice(colonIdx + 1);
  if (value.startsWith(" ")) {
    value = value.slice(1);
  }

  acc.touched = true;
  switch (field) {
    case "event":
      acc.eventType = value;
      break;
    case "data":
      acc.dataLines.push(value);
      break;
    // id, retry and unknown fields carry nothing the client uses.
  }
}

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

/**
 * Decode a byte stream into SSE frames.
 *
 * The sequence ends when the stream closes and rethrows any read error. If
 * the consumer stops early, the reader is cancelled so the underlying
 * connection is released. Aborting `signal` cancels the reader at once,
 * which also ends a read that is still pending.
 */
export async function* parseSSEStream(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal,
): AsyncGenerator<SSEFrame, void, undefined> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();

  const onAbort = (): void => {
    reader.cancel(signal?.reason).catch((err: unknown) => {
      logger.debug("Reader cancel on abort failed", err);
    });
  };
  if (signal?.aborted) onAbort();
  else signal?.addEventListener("abort", onAbort, { once: true });

  let buffer = "";
  let finished = false;
  const acc: FrameAccumulator = { eventType: undefined, dataLines: [], touched: false };

  function takeFrame(): SSEFrame | undefined {
    const frame =
      acc.dataLines.length > 0
        ? { event: acc.eventType, data: acc.dataLines.join("\n") }
        : undefined;
    if (!frame && acc.touched) {
      logger.debug(`Dropping frame without data (event: ${acc.eventType ?? "none"})`);
    }
    acc.eventType = undefined;
    acc.dataLines = [];
    acc.touched = false;
    return frame;
  }

  function* consume(lines: string[]): Generator<SSEFrame, void, undefined> {
    for (const line of lines) {
      if (line === "") {
        const frame = takeFrame();
        if (frame) yield frame;
        continue;
      }

      if (line.startsWith(":")) {
        continue;
      }

      processField(line, acc);
    }
  }

  try {
    for (;;) {
      const { value, done } = await reader.read();

      if (done) {
        finished = true;
        if (signal?.aborted) break;
        // A held "\r" still terminates its line; whatever follows the last
        // terminator is an unterminated frame.
        const lines = (buffer + decoder.decode()).split(LINE_BREAK);
        const rest = lines.pop() ?? "";
        yield* consume(lines);
        if (rest.trim().length > 0 || acc.touched) {
          logger.debug("Dropping unterminated frame at end of stream");
        }
        break;
      }

      let text = buffer + decoder.decode(value, { stream: true });

      // A trailing "\r" may be the first half of "\r\n"; wait for the next chunk.
      let held = "";
      if (text.endsWith("\r")) {
        held = "\r";
        text = text.slice(0, -1);
      }

      const lines = text.split(LINE_BREAK);
      buffer = (lines.pop() ?? "") + held;
      yield* consume(lines);
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    if (!finished) {
      await reader.cancel().catch((err: unknown) => {
        logger.debug("Reader cancel failed", err);
      });
    }
    reader.releaseLock();
  }
}
