import { describe, it, expect } from "vitest";
import { loadConfig, DEFAULT_BASE_URL } from "../src/config.js";
import { ConfigurationError } from "../src/types/errors.js";

describe("loadConfig", () => {
  it("reads the API key from the environment and applies defaults", () => {
    const config = loadConfig({}, { OPENROUTER_API_KEY: "test-secret" });

    expect(config).toEqual({
      apiKey: "test-secret",
      baseUrl: DEFAULT_BASE_URL,
      closeGraceMs: 250,
      headers: {},
    });
  });

  it("falls back to RESPONDER_API_KEY", () => {
    expect(loadConfig({}, { RESPONDER_API_KEY: "test-secret" }).apiKey).toBe("test-secret");
  });

  it("coerces numeric environment values", () => {
    const config = loadConfig(
      {},
      {
        OPENROUTER_API_KEY: "test-secret",
        RESPONDER_BASE_URL: "https://example.test/v1",
        RESPONDER_TIMEOUT_MS: "5000",
        RESPONDER_CLOSE_GRACE_MS: "0",
        RESPONDER_LOG_LEVEL: "debug",
      },
    );

    expect(config).toMatchObject({
      baseUrl: "https://example.test/v1",
      timeout: 5000,
      closeGraceMs: 0,
      logLevel: "debug",
    });
  });

  it("lets explicit options win over the environment, ignoring undefined ones", () => {
    const config = loadConfig(
      { apiKey: "explicit", timeout: undefined, headers: { "X-Title": "demo" } },
      { OPENROUTER_API_KEY: "from-env", RESPONDER_TIMEOUT_MS: "100" },
    );

    expect(config.apiKey).toBe("explicit");
    expect(config.timeout).toBe(100);
    expect(config.headers).toEqual({ "X-Title": "demo" });
  });

  it("rejects a missing API key", () => {
    expect(() => loadConfig({}, {})).toThrow(
      new ConfigurationError(
        "Invalid responder configuration: apiKey: API key is required (set OPENROUTER_API_KEY)",
      ),
    );
  });

  it("treats an empty API key as missing", () => {
    expect(() => loadConfig({ apiKey: "" }, {})).toThrow(/apiKey: API key is required/);
  });

  it("reports each invalid field", () => {
    expect(() =>
      loadConfig({ apiKey: "test-secret", baseUrl: "not a url", logLevel: "loud" }, {}),
    ).toThrow(/baseUrl: .*; logLevel: Unknown log level/);
  });

  it("rejects a non-numeric timeout", () => {
    expect(() =>
      loadConfig({}, { OPENROUTER_API_KEY: "test-secret", RESPONDER_TIMEOUT_MS: "soon" }),
    ).toThrow(ConfigurationError);
  });
});
