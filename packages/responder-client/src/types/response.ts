/**
 * Response and output item types for the responder client.
 *
 * Field names follow the Responses wire format so that a non-streaming body
 * and a streamed-then-assembled response have the same shape.
 */

import { OutputItemType } from "./enums.js";

// ---------------------------------------------------------------------------
// Message content
// ---------------------------------------------------------------------------

/** A URL citation attached to a span of output text. */
export interface UrlCitation {
  readonly type: "url_citation";
  readonly url: string;
  readonly title?: string;
  readonly content?: string;
  readonly start_index: number;
  readonly end_index: number;
}

export type Annotation = UrlCitation;

/**
 * One part of an assistant message. A part without annotations is plain
 * text; with annotations it is citation-annotated text.
 */
export interface OutputTextPart {
  readonly type: "output_text";
  readonly text: string;
  readonly annotations: readonly Annotation[];
}

export interface SummaryTextPart {
  readonly type: "summary_text";
  readonly text: string;
}

// ---------------------------------------------------------------------------
// OutputItem
// ---------------------------------------------------------------------------

export type ItemStatus = "in_progress" | "completed" | "incomplete";

export interface MessageItem {
  readonly type: typeof OutputItemType.MESSAGE;
  readonly id: string;
  readonly role: "assistant";
  readonly status?: ItemStatus;
  readonly content: readonly OutputTextPart[];
}

export interface ReasoningItem {
  readonly type: typeof OutputItemType.REASONING;
  readonly id: string;
  readonly summary: readonly SummaryTextPart[];
}

export interface FunctionCallItem {
  readonly type: typeof OutputItemType.FUNCTION_CALL;
  readonly id: string;
  /** Identifier to echo back in the matching function_call_output. */
  readonly call_id: string;
  readonly name: string;
  /** Raw JSON text; parsing is left to the caller. */
  readonly arguments: string;
  /** Call index (the item's position in the response output). */
  readonly index: number;
  readonly status?: ItemStatus;
}

export type OutputItem = MessageItem | ReasoningItem | FunctionCallItem;

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

/**
 * Token counts reported by the server. Fields the server did not send stay
 * unset; nothing here is estimated locally.
 */
export interface Usage {
  readonly input_tokens?: number;
  readonly output_tokens?: number;
  readonly total_tokens?: number;
  readonly reasoning_tokens?: number;
  readonly cached_tokens?: number;
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

export type ResponseStatus =
  | "in_progress"
  | "completed"
  | "incomplete"
  | "failed"
  | (string & {});

export interface ResponseErrorInfo {
  readonly code?: string;
  readonly message: string;
}

export interface Response {
  readonly id: string;
  readonly model: string;
  readonly status: ResponseStatus;
  readonly output: readonly OutputItem[];
  readonly usage?: Usage;
  /** True once the response reached a terminal state; the value is frozen. */
  readonly complete: boolean;
  readonly error?: ResponseErrorInfo;
  readonly incomplete_details?: { readonly reason?: string };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isMessage(item: OutputItem): item is MessageItem {
  return item.type === OutputItemType.MESSAGE;
}

/** Concatenate the output_text parts of a single message item. */
export function getMessageText(item: MessageItem): string {
  return item.content.map((part) => part.text).join("");
}

/**
 * Concatenated output text across all message items, in output order.
 * Returns an empty string when the response has no message.
 */
export function getOutputText(response: Pick<Response, "output">): string {
  return response.output.filter(isMessage).map(getMessageText).join("");
}

/** Concatenated reasoning summaries, one summary part per line. */
export function getReasoningText(response: Pick<Response, "output">): string {
  const parts: string[] = [];
  for (const item of response.output) {
    if (item.type === OutputItemType.REASONING) {
      for (const part of item.summary) parts.push(part.text);
    }
  }
  return parts.join("\n");
}

/** All function_call items ordered by call index. */
export function getFunctionCalls(
  response: Pick<Response, "output">,
): FunctionCallItem[] {
  return response.output
    .filter(
      (item): item is FunctionCallItem =>
        item.type === OutputItemType.FUNCTION_CALL,
    )
    .sort((a, b) => a.index - b.index);
}

/** The first message item, if any. */
export function getFirstMessage(
  response: Pick<Response, "output">,
): MessageItem | undefined {
  return response.output.find(isMessage);
}
