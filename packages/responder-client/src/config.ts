/**
 * Responder configuration: explicit options merged over environment
 * variables and validated with zod.
 *
 * Environment variables:
 *   OPENROUTER_API_KEY (or RESPONDER_API_KEY)
 *   RESPONDER_BASE_URL
 *   RESPONDER_TIMEOUT_MS
 *   RESPONDER_CLOSE_GRACE_MS
 *   RESPONDER_LOG_LEVEL
 */

import { z } from "zod";
import { parseLogLevel } from "./logging.js";
import { ConfigurationError } from "./types/index.js";
import { DEFAULT_CLOSE_GRACE_MS } from "./stream/response-stream.js";

export const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";

const LogLevelNameSchema = z
  .string()
  .refine((name) => parseLogLevel(name) !== undefined, { message: "Unknown log level" });

export const ResponderConfigSchema = z.object({
  apiKey: z
    .string({ required_error: "API key is required (set OPENROUTER_API_KEY)" })
    .min(1, "API key is required (set OPENROUTER_API_KEY)"),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  /** Connection/headers timeout in milliseconds. Unset means no timeout. */
  timeout: z.coerce.number().int().positive().optional(),
  closeGraceMs: z.coerce.number().int().nonnegative().default(DEFAULT_CLOSE_GRACE_MS),
  headers: z.record(z.string()).default({}),
  logLevel: LogLevelNameSchema.optional(),
});

export type ResponderConfig = z.infer<typeof ResponderConfigSchema>;
export type ResponderConfigInput = z.input<typeof ResponderConfigSchema>;

type Env = Readonly<Record<string, string | undefined>>;

function envDefaults(env: Env): Record<string, string> {
  const entries: Array<[keyof ResponderConfigInput, string | undefined]> = [
    ["apiKey", env["OPENROUTER_API_KEY"] || env["RESPONDER_API_KEY"]],
    ["baseUrl", env["RESPONDER_BASE_URL"]],
    ["timeout", env["RESPONDER_TIMEOUT_MS"]],
    ["closeGraceMs", env["RESPONDER_CLOSE_GRACE_MS"]],
    ["logLevel", env["RESPONDER_LOG_LEVEL"]],
  ];
  return Object.fromEntries(
    entries.filter((entry): entry is [keyof ResponderConfigInput, string] => Boolean(entry[1])),
  );
}

/** Validate explicit options, filling gaps from the environment. */
export function loadConfig(
  options: Partial<ResponderConfigInput> = {},
  env: Env = process.env,
): ResponderConfig {
  const defined = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined),
  );
  const result = ResponderConfigSchema.safeParse({ ...envDefaults(env), ...defined });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid responder configuration: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}
