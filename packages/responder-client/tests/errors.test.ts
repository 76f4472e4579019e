import { describe, it, expect } from "vitest";
import {
  AbortError,
  ConfigurationError,
  HttpError,
  InvalidResponseError,
  NetworkError,
  RateLimitError,
  RequestTimeoutError,
  SDKError,
  StreamAbortedError,
  StreamError,
} from "../src/types/errors.js";

describe("error hierarchy", () => {
  it("roots every error at SDKError", () => {
    const errors = [
      new RateLimitError("x", { status: 429, body: "" }),
      new RequestTimeoutError("x"),
      new AbortError("x"),
      new NetworkError("x"),
      new StreamError("x"),
      new StreamAbortedError(),
      new InvalidResponseError("x"),
      new ConfigurationError("x"),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(SDKError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it("sets the name of each class", () => {
    expect(new RateLimitError("x", { status: 429, body: "" }).name).toBe("RateLimitError");
    expect(new StreamAbortedError().name).toBe("StreamAbortedError");
    expect(new ConfigurationError("x").name).toBe("ConfigurationError");
  });

  it("flags transient failures as retryable", () => {
    expect(new RateLimitError("x", { status: 429, body: "" }).retryable).toBe(true);
    expect(new RequestTimeoutError("x").retryable).toBe(true);
    expect(new NetworkError("x").retryable).toBe(true);
    expect(new StreamError("x").retryable).toBe(true);
    expect(new AbortError("x").retryable).toBe(false);
    expect(new StreamAbortedError().retryable).toBe(false);
    expect(new ConfigurationError("x").retryable).toBe(false);
  });

  it("keeps status, body and cause on HttpError", () => {
    const cause = new Error("root");
    const error = new HttpError("teapot", { status: 418, body: "short and stout", cause });

    expect(error.status).toBe(418);
    expect(error.body).toBe("short and stout");
    expect(error.cause).toBe(cause);
    expect(error.retryable).toBe(false);
  });

  it("has a default message for StreamAbortedError", () => {
    expect(new StreamAbortedError().message).toBe(
      "Stream was closed before the response completed",
    );
  });
});
