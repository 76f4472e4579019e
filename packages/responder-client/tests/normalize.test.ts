import { describe, it, expect } from "vitest";
import {
  SKIP,
  WIRE_EVENT_TYPES,
  lookupEventType,
  normalizeFrame,
} from "../src/stream/normalize.js";
import { EventType } from "../src/types/index.js";

function frame(type: string, payload: Record<string, unknown>) {
  return { event: type, data: JSON.stringify({ type, ...payload }) };
}

describe("wire type table", () => {
  it("maps every wire type to a distinct event tag", () => {
    const tags = Object.values(WIRE_EVENT_TYPES);
    expect(new Set(tags).size).toBe(tags.length);
    expect([...tags].sort()).toEqual(Object.values(EventType).sort());
  });

  it("does not resolve inherited property names", () => {
    expect(lookupEventType("toString")).toBeUndefined();
    expect(lookupEventType("__proto__")).toBeUndefined();
  });

  it("resolves dotted wire names", () => {
    expect(lookupEventType("response.output_text.delta")).toBe(EventType.TEXT_DELTA);
    expect(lookupEventType("error")).toBe(EventType.ERROR);
  });
});

describe("normalizeFrame", () => {
  it("normalizes a text delta", () => {
    const event = normalizeFrame(
      frame("response.output_text.delta", {
        output_index: 0,
        content_index: 0,
        item_id: "msg_1",
        delta: "Hi",
      }),
    );

    expect(event).toEqual({
      type: EventType.TEXT_DELTA,
      output_index: 0,
      content_index: 0,
      item_id: "msg_1",
      delta: "Hi",
    });
  });

  it("defaults a missing content_index to 0", () => {
    const event = normalizeFrame(frame("response.output_text.done", { output_index: 2, text: "done" }));

    expect(event).toEqual({
      type: EventType.TEXT_DONE,
      output_index: 2,
      content_index: 0,
      text: "done",
    });
  });

  it("falls back to the payload type when the frame has no event field", () => {
    const event = normalizeFrame({
      data: JSON.stringify({
        type: "response.reasoning_summary_text.delta",
        output_index: 0,
        summary_index: 1,
        delta: "thinking",
      }),
    });

    expect(event).toEqual({
      type: EventType.REASONING_DELTA,
      output_index: 0,
      summary_index: 1,
      delta: "thinking",
    });
  });

  it("normalizes a function call item announcement", () => {
    const event = normalizeFrame(
      frame("response.output_item.added", {
        output_index: 1,
        item: {
          type: "function_call",
          id: "fc_1",
          call_id: "call_1",
          name: "get_weather",
          arguments: "",
        },
      }),
    );

    expect(event).toEqual({
      type: EventType.OUTPUT_ITEM_ADDED,
      output_index: 1,
      item: {
        type: "function_call",
        id: "fc_1",
        call_id: "call_1",
        name: "get_weather",
        arguments: "",
        index: 1,
      },
    });
  });

  it("normalizes an annotation", () => {
    const event = normalizeFrame(
      frame("response.output_text.annotation.added", {
        output_index: 0,
        content_index: 0,
        annotation: {
          type: "url_citation",
          url: "https://example.com",
          title: "Example",
          start_index: 0,
          end_index: 5,
        },
      }),
    );

    expect(event).toEqual({
      type: EventType.ANNOTATION_ADDED,
      output_index: 0,
      content_index: 0,
      annotation: {
        type: "url_citation",
        url: "https://example.com",
        title: "Example",
        start_index: 0,
        end_index: 5,
      },
    });
  });

  it("normalizes a completed response with usage details flattened", () => {
    const event = normalizeFrame(
      frame("response.completed", {
        response: {
          id: "resp_1",
          model: "test-model",
          status: "completed",
          output: [
            {
              type: "message",
              id: "msg_1",
              role: "assistant",
              status: "completed",
              content: [{ type: "output_text", text: "Hi", annotations: [] }],
            },
          ],
          usage: {
            input_tokens: 5,
            output_tokens: 2,
            total_tokens: 7,
            output_tokens_details: { reasoning_tokens: 1 },
          },
        },
      }),
    );

    expect(event).toEqual({
      type: EventType.COMPLETED,
      response: {
        id: "resp_1",
        model: "test-model",
        status: "completed",
        output: [
          {
            type: "message",
            id: "msg_1",
            role: "assistant",
            status: "completed",
            content: [{ type: "output_text", text: "Hi", annotations: [] }],
          },
        ],
        output_positions: [0],
        usage: { input_tokens: 5, output_tokens: 2, total_tokens: 7, reasoning_tokens: 1 },
      },
    });
  });

  it("normalizes an error event with a numeric code", () => {
    const event = normalizeFrame(frame("error", { code: 429, message: "slow down" }));

    expect(event).toEqual({ type: EventType.ERROR, code: "429", message: "slow down" });
  });

  it("skips the [DONE] sentinel", () => {
    expect(normalizeFrame({ data: "[DONE]" })).toBe(SKIP);
  });

  it("skips data that is not JSON", () => {
    expect(normalizeFrame({ event: "response.output_text.delta", data: "{not json" })).toBe(SKIP);
  });

  it("skips unknown event types", () => {
    expect(normalizeFrame(frame("response.audio.delta", { delta: "AAAA" }))).toBe(SKIP);
  });

  it("skips a frame with no type anywhere", () => {
    expect(normalizeFrame({ data: JSON.stringify({ delta: "x" }) })).toBe(SKIP);
  });

  it("skips payloads with the wrong shape", () => {
    expect(
      normalizeFrame(frame("response.output_text.delta", { output_index: 0, delta: 42 })),
    ).toBe(SKIP);
    expect(normalizeFrame(frame("response.output_text.delta", { delta: "no index" }))).toBe(SKIP);
    expect(
      normalizeFrame(frame("response.output_text.delta", { output_index: -1, delta: "x" })),
    ).toBe(SKIP);
  });
});
