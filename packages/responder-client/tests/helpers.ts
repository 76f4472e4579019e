import type {
  Transport,
  TransportRequest,
  TransportResponse,
} from "../src/utils/http.js";

// ---------------------------------------------------------------------------
// Byte streams
// ---------------------------------------------------------------------------

/** Create a ReadableStream from an array of string chunks (simulating network). */
export function chunkedStream(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

/** Collect all values from an async iterable. */
export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of iter) {
    values.push(value);
  }
  return values;
}

/**
 * A stream that serves `chunks` and then either closes or stays open.
 * `closed` flips when the consumer cancels it.
 */
export interface TrackedStream {
  stream: ReadableStream<Uint8Array>;
  readonly closed: boolean;
  readonly cancelReason: unknown;
}

export function trackedStream(chunks: string[], options: { keepOpen?: boolean } = {}): TrackedStream {
  const encoder = new TextEncoder();
  let closed = false;
  let cancelReason: unknown;
  let index = 0;

  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index++];
      if (chunk !== undefined) {
        controller.enqueue(encoder.encode(chunk));
      } else if (!options.keepOpen) {
        closed = true;
        controller.close();
      }
      // keepOpen: leave the pull pending; the stream never ends by itself.
    },
    cancel(reason) {
      closed = true;
      cancelReason = reason;
    },
  });

  return {
    stream,
    get closed() {
      return closed;
    },
    get cancelReason() {
      return cancelReason;
    },
  };
}

// ---------------------------------------------------------------------------
// SSE payloads
// ---------------------------------------------------------------------------

/** Encode one SSE frame with an `event:` line. */
export function sse(type: string, payload: Record<string, unknown>): string {
  return `event: ${type}\ndata: ${JSON.stringify({ type, ...payload })}\n\n`;
}

export function responseBody(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    id: "resp_1",
    model: "test-model",
    status: "in_progress",
    output: [],
    ...overrides,
  };
}

/** A complete text-only event stream, split into `parts` deltas. */
export function textStreamFrames(parts: string[], usage?: Record<string, unknown>): string[] {
  const text = parts.join("");
  const message = {
    type: "message",
    id: "msg_1",
    role: "assistant",
    status: "completed",
    content: [{ type: "output_text", text, annotations: [] }],
  };
  return [
    sse("response.created", { response: responseBody() }),
    sse("response.output_item.added", {
      output_index: 0,
      item: { type: "message", id: "msg_1", role: "assistant", status: "in_progress", content: [] },
    }),
    sse("response.content_part.added", {
      output_index: 0,
      content_index: 0,
      part: { type: "output_text", text: "", annotations: [] },
    }),
    ...parts.map((delta) =>
      sse("response.output_text.delta", { output_index: 0, content_index: 0, item_id: "msg_1", delta }),
    ),
    sse("response.output_text.done", { output_index: 0, content_index: 0, text }),
    sse("response.output_item.done", { output_index: 0, item: message }),
    sse("response.completed", {
      response: responseBody({
        status: "completed",
        output: [message],
        ...(usage ? { usage } : {}),
      }),
    }),
  ];
}

// ---------------------------------------------------------------------------
// Transport double
// ---------------------------------------------------------------------------

/** Records requests and answers each with the next queued response. */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly queue: Array<TransportResponse | Error>;

  constructor(...responses: Array<TransportResponse | Error>) {
    this.queue = responses;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next === undefined) throw new Error("FakeTransport: no response queued");
    if (next instanceof Error) throw next;
    return next;
  }
}

export function jsonResponse(body: unknown): TransportResponse {
  return { kind: "json", status: 200, headers: new Headers(), body };
}

export function streamResponse(body: ReadableStream<Uint8Array>): TransportResponse {
  return { kind: "stream", status: 200, headers: new Headers(), body };
}
