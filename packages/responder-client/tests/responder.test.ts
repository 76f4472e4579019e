import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { Responder } from "../src/responder.js";
import { ResponseStream } from "../src/stream/response-stream.js";
import { DEFAULT_BASE_URL } from "../src/config.js";
import {
  ConfigurationError,
  HttpError,
  InvalidResponseError,
  RateLimitError,
} from "../src/types/errors.js";
import {
  FakeTransport,
  chunkedStream,
  jsonResponse,
  streamResponse,
  textStreamFrames,
} from "./helpers.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function completedBody(text: string): Record<string, unknown> {
  return {
    id: "resp_1",
    model: "test-model",
    status: "completed",
    output: [
      {
        type: "message",
        id: "msg_1",
        role: "assistant",
        status: "completed",
        content: [{ type: "output_text", text, annotations: [] }],
      },
    ],
    usage: { input_tokens: 3, output_tokens: 2, total_tokens: 5 },
  };
}

function responder(transport: FakeTransport): Responder {
  return new Responder({ apiKey: "test-secret", transport, env: {} });
}

const Weather = z.object({ city: z.string(), temp: z.number() });

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe("Responder construction", () => {
  it("requires an API key", () => {
    expect(() => new Responder({ env: {} })).toThrow(ConfigurationError);
  });

  it("reads configuration from the environment", () => {
    const client = Responder.fromEnv({
      OPENROUTER_API_KEY: "test-secret",
      RESPONDER_CLOSE_GRACE_MS: "50",
    });

    expect(client.config.apiKey).toBe("test-secret");
    expect(client.config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(client.config.closeGraceMs).toBe(50);
  });

  it("posts through the default transport to the configured endpoint", async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new globalThis.Response(JSON.stringify(completedBody("ok"))));
    const client = new Responder({ apiKey: "test-secret", fetch: fetchFn, env: {} });

    await client.respond({ model: "test-model", input: "Hi" });

    expect(fetchFn.mock.calls[0]![0]).toBe(`${DEFAULT_BASE_URL}/responses`);
  });
});

// ---------------------------------------------------------------------------
// respond(): complete responses
// ---------------------------------------------------------------------------

describe("Responder.respond without streaming", () => {
  it("sends the translated request and returns a frozen response", async () => {
    const transport = new FakeTransport(jsonResponse(completedBody("Hello")));

    const response = await responder(transport).respond({ model: "test-model", input: "Hi" });

    expect(transport.requests[0]!.body).toEqual({ model: "test-model", input: "Hi", stream: false });
    expect(transport.requests[0]!.stream).toBe(false);
    expect(response.complete).toBe(true);
    expect(response.usage).toEqual({ input_tokens: 3, output_tokens: 2, total_tokens: 5 });
    expect(Object.isFrozen(response)).toBe(true);
    expect(responder(transport).getOutputText(response)).toBe("Hello");
    expect(response).not.toHaveProperty("output_parsed");
  });

  it("adds structured output when a text format is given", async () => {
    const transport = new FakeTransport(jsonResponse(completedBody('{"city":"Oslo","temp":3}')));

    const response = await responder(transport).respond({
      model: "test-model",
      input: "Weather?",
      text_format: { name: "weather", schema: Weather },
    });

    expect(response.output_parsed).toEqual({ kind: "match", value: { city: "Oslo", temp: 3 } });
  });

  it("reports a schema mismatch as none", async () => {
    const transport = new FakeTransport(jsonResponse(completedBody('{"city":"Oslo"}')));

    const response = await responder(transport).respond({
      model: "test-model",
      input: "Weather?",
      text_format: { name: "weather", schema: Weather },
    });

    expect(response.output_parsed).toEqual({ kind: "none", reason: "schema_mismatch" });
  });

  it("propagates transport errors untouched", async () => {
    const error = new RateLimitError("rate limited", { status: 429, body: "rate limited" });
    const transport = new FakeTransport(error);

    await expect(responder(transport).respond({ model: "m", input: "x" })).rejects.toBe(error);
  });

  it("rejects an event stream where a JSON body was expected", async () => {
    const transport = new FakeTransport(streamResponse(chunkedStream([])));

    await expect(responder(transport).respond({ model: "m", input: "x" })).rejects.toBeInstanceOf(
      InvalidResponseError,
    );
  });

  it("rejects a request without a model before sending", async () => {
    const transport = new FakeTransport();

    await expect(responder(transport).respond({ model: "", input: "x" })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(transport.requests).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// respond(): streams
// ---------------------------------------------------------------------------

describe("Responder.respond with streaming", () => {
  it("resolves to a ResponseStream over the response body", async () => {
    const transport = new FakeTransport(
      streamResponse(chunkedStream(textStreamFrames(["Hel", "lo"]))),
    );

    const stream = await responder(transport).respond({
      model: "test-model",
      input: "Hi",
      stream: true,
    });

    expect(stream).toBeInstanceOf(ResponseStream);
    expect(transport.requests[0]!.stream).toBe(true);
    expect(transport.requests[0]!.body).toMatchObject({ stream: true });
    const response = await stream.finalResponse();
    expect(response.status).toBe("completed");
    expect(await stream.outputText()).toBe("Hello");
  });

  it("passes the text format schema to the stream", async () => {
    const json = '{"city":"Oslo","temp":3}';
    const transport = new FakeTransport(
      streamResponse(chunkedStream(textStreamFrames([json.slice(0, 10), json.slice(10)]))),
    );

    const stream = await responder(transport).respond({
      model: "test-model",
      input: "Weather?",
      stream: true,
      text_format: { name: "weather", schema: Weather },
    });

    expect(await stream.structuredOutput()).toEqual({
      kind: "match",
      value: { city: "Oslo", temp: 3 },
    });
  });

  it("forwards the caller's abort signal to the transport", async () => {
    const transport = new FakeTransport(
      streamResponse(chunkedStream(textStreamFrames(["Hi"]))),
    );
    const controller = new AbortController();

    await responder(transport).respond(
      { model: "test-model", input: "Hi", stream: true },
      { signal: controller.signal },
    );
    const sent = transport.requests[0]!.signal;
    expect(sent?.aborted).toBe(false);

    controller.abort();

    expect(sent?.aborted).toBe(true);
  });

  it("starts aborted when the caller's signal already is", async () => {
    const transport = new FakeTransport(jsonResponse(completedBody("ok")));
    const controller = new AbortController();
    controller.abort();

    await responder(transport).respond({ model: "m", input: "x" }, { signal: controller.signal });

    expect(transport.requests[0]!.signal?.aborted).toBe(true);
  });

  it("rejects with the HTTP error before building a stream", async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new globalThis.Response("rate limited", { status: 429 }));
    const client = new Responder({ apiKey: "test-secret", fetch: fetchFn, env: {} });

    const error = await client
      .respond({ model: "m", input: "x", stream: true })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 429, body: "rate limited" });
    expect(error).not.toBeInstanceOf(ResponseStream);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("rejects a JSON body where an event stream was expected", async () => {
    const transport = new FakeTransport(jsonResponse(completedBody("ok")));

    await expect(
      responder(transport).respond({ model: "m", input: "x", stream: true }),
    ).rejects.toBeInstanceOf(InvalidResponseError);
  });

  it("keeps concurrent calls independent", async () => {
    const transport = new FakeTransport(
      streamResponse(chunkedStream(textStreamFrames(["one"]))),
      streamResponse(chunkedStream(textStreamFrames(["two"]))),
    );
    const client = responder(transport);

    const [a, b] = await Promise.all([
      client.respond({ model: "m", input: "1", stream: true }),
      client.respond({ model: "m", input: "2", stream: true }),
    ]);

    expect(await b.outputText()).toBe("two");
    expect(await a.outputText()).toBe("one");
    expect(transport.requests[0]!.signal).not.toBe(transport.requests[1]!.signal);
  });
});
