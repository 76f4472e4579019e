/**
 * Input turn items. The protocol keeps no conversation state, so every
 * call carries the full history as an ordered list of these items.
 */

import { Role } from "./enums.js";
import type { Response } from "./response.js";

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

export interface InputTextContent {
  readonly type: "input_text";
  readonly text: string;
}

export interface InputImageContent {
  readonly type: "input_image";
  /** http(s) URL or a `data:` URL. */
  readonly image_url: string;
  readonly detail?: "auto" | "low" | "high";
}

/** Prior assistant text echoed back as history. */
export interface OutputTextContent {
  readonly type: "output_text";
  readonly text: string;
}

export type InputContent =
  | InputTextContent
  | InputImageContent
  | OutputTextContent;

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

export interface InputMessage {
  readonly type: "message";
  readonly role: Role;
  readonly content: string | readonly InputContent[];
}

export interface FunctionCallInput {
  readonly type: "function_call";
  readonly call_id: string;
  readonly name: string;
  readonly arguments: string;
}

export interface FunctionCallOutputInput {
  readonly type: "function_call_output";
  readonly call_id: string;
  readonly output: string;
}

export type InputItem = InputMessage | FunctionCallInput | FunctionCallOutputInput;

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a system message from plain text. */
export function createSystemMessage(text: string): InputMessage {
  return { type: "message", role: Role.SYSTEM, content: text };
}

/** Create a user message from plain text. */
export function createUserMessage(text: string): InputMessage {
  return {
    type: "message",
    role: Role.USER,
    content: [{ type: "input_text", text }],
  };
}

/** Create an assistant message from plain text. */
export function createAssistantMessage(text: string): InputMessage {
  return {
    type: "message",
    role: Role.ASSISTANT,
    content: [{ type: "output_text", text }],
  };
}

/**
 * Create the result item for a function call. Non-string results are
 * JSON-encoded.
 */
export function createFunctionCallOutput(
  call_id: string,
  output: unknown,
): FunctionCallOutputInput {
  return {
    type: "function_call_output",
    call_id,
    output: typeof output === "string" ? output : JSON.stringify(output),
  };
}

/**
 * Replay a response's output as input items for the next turn: messages
 * become assistant messages, function calls are echoed verbatim. Reasoning
 * items are not replayed.
 */
export function toInputItems(response: Pick<Response, "output">): InputItem[] {
  const items: InputItem[] = [];
  for (const item of response.output) {
    switch (item.type) {
      case "message":
        items.push({
          type: "message",
          role: Role.ASSISTANT,
          content: item.content.map((part) => ({
            type: "output_text" as const,
            text: part.text,
          })),
        });
        break;
      case "function_call":
        items.push({
          type: "function_call",
          call_id: item.call_id,
          name: item.name,
          arguments: item.arguments,
        });
        break;
      case "reasoning":
        break;
    }
  }
  return items;
}
