/**
 * Translate a non-streaming Responses API body into a Response.
 *
 * Uses the same item schemas as the streaming path so both produce the
 * same shape for the same output.
 */

import { InvalidResponseError, type Response } from "../types/index.js";
import { freezeResponse } from "../stream/assembler.js";
import { ResponseSnapshotSchema } from "./schemas.js";

export function translateResponse(body: unknown): Response {
  const parsed = ResponseSnapshotSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidResponseError(
      `Response body does not match the expected shape: ${parsed.error.message}`,
      { cause: parsed.error },
    );
  }
  const { output_positions: _positions, ...response } = parsed.data;
  return freezeResponse({ ...response, complete: true });
}
