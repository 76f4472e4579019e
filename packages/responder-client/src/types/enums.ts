/**
 * Core enums for the responder client.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Roles accepted on input turn items. */
export const Role = {
  SYSTEM: "system",
  DEVELOPER: "developer",
  USER: "user",
  ASSISTANT: "assistant",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// OutputItemType
// ---------------------------------------------------------------------------

/** Discriminator tags for OutputItem. */
export const OutputItemType = {
  /** Assistant message with ordered output_text parts. */
  MESSAGE: "message",
  /** Reasoning summary produced before the answer. */
  REASONING: "reasoning",
  /** A model-initiated function call with raw arguments. */
  FUNCTION_CALL: "function_call",
} as const satisfies Record<string, string>;

export type OutputItemType = (typeof OutputItemType)[keyof typeof OutputItemType];

// ---------------------------------------------------------------------------
// EventType
// ---------------------------------------------------------------------------

/** Discriminator tags for ResponseEvent. */
export const EventType = {
  CREATED: "created",
  IN_PROGRESS: "in_progress",
  OUTPUT_ITEM_ADDED: "output_item_added",
  OUTPUT_ITEM_DONE: "output_item_done",
  CONTENT_PART_ADDED: "content_part_added",
  /** Incremental output text. */
  TEXT_DELTA: "text_delta",
  TEXT_DONE: "text_done",
  /** A citation attached to an output_text part. */
  ANNOTATION_ADDED: "annotation_added",
  /** Incremental reasoning summary text. */
  REASONING_DELTA: "reasoning_delta",
  REASONING_DONE: "reasoning_done",
  /** Incremental function-call arguments (partial JSON). */
  FUNCTION_CALL_DELTA: "function_call_delta",
  FUNCTION_CALL_DONE: "function_call_done",
  /** Terminal: generation finished normally. Carries usage. */
  COMPLETED: "completed",
  /** Terminal: generation stopped early (e.g. max_output_tokens). */
  INCOMPLETE: "incomplete",
  /** Terminal: the server gave up on the response. */
  FAILED: "failed",
  /** Error reported inside the stream. */
  ERROR: "error",
} as const satisfies Record<string, string>;

export type EventType = (typeof EventType)[keyof typeof EventType];
