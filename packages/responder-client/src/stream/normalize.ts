/**
 * Event normalizer: SSE frame -> ResponseEvent.
 *
 * Wire types (dot notation) map to internal tags through a static table;
 * each tag has a payload schema. Frames that fail JSON parsing or shape
 * validation, and frames of unknown types, normalize to `SKIP`. A bad frame
 * never ends the stream.
 */

import { z } from "zod";
import { createLogger } from "../logging.js";
import {
  EventType,
  type AnnotationAddedEvent,
  type CompletedEvent,
  type ContentPartAddedEvent,
  type CreatedEvent,
  type ErrorEvent,
  type FailedEvent,
  type FunctionCallDeltaEvent,
  type FunctionCallDoneEvent,
  type IncompleteEvent,
  type InProgressEvent,
  type OutputItemAddedEvent,
  type OutputItemDoneEvent,
  type ReasoningDeltaEvent,
  type ReasoningDoneEvent,
  type ResponseEvent,
  type TextDeltaEvent,
  type TextDoneEvent,
} from "../types/index.js";
import type { SSEFrame } from "../utils/sse.js";
import { isRecord } from "../utils/guards.js";
import {
  IndexSchema,
  OutputTextPartSchema,
  ResponseSnapshotSchema,
  UrlCitationSchema,
  WireOutputItemSchema,
  toOutputItem,
} from "../wire/schemas.js";

const logger = createLogger("normalize");

/** Returned for frames that carry no usable event. */
export const SKIP = Symbol("skip");
export type Skip = typeof SKIP;

// ---------------------------------------------------------------------------
// Wire type table
// ---------------------------------------------------------------------------

export const WIRE_EVENT_TYPES: Readonly<Record<string, EventType>> = {
  "response.created": EventType.CREATED,
  "response.in_progress": EventType.IN_PROGRESS,
  "response.output_item.added": EventType.OUTPUT_ITEM_ADDED,
  "response.output_item.done": EventType.OUTPUT_ITEM_DONE,
  "response.content_part.added": EventType.CONTENT_PART_ADDED,
  "response.output_text.delta": EventType.TEXT_DELTA,
  "response.output_text.done": EventType.TEXT_DONE,
  "response.output_text.annotation.added": EventType.ANNOTATION_ADDED,
  "response.reasoning_summary_text.delta": EventType.REASONING_DELTA,
  "response.reasoning_summary_text.done": EventType.REASONING_DONE,
  "response.function_call_arguments.delta": EventType.FUNCTION_CALL_DELTA,
  "response.function_call_arguments.done": EventType.FUNCTION_CALL_DONE,
  "response.completed": EventType.COMPLETED,
  "response.incomplete": EventType.INCOMPLETE,
  "response.failed": EventType.FAILED,
  error: EventType.ERROR,
};

export function lookupEventType(wireType: string): EventType | undefined {
  return Object.hasOwn(WIRE_EVENT_TYPES, wireType) ? WIRE_EVENT_TYPES[wireType] : undefined;
}

// ---------------------------------------------------------------------------
// Payload schemas, one per tag
// ---------------------------------------------------------------------------

type EventSchema<E extends ResponseEvent> = z.ZodType<E, z.ZodTypeDef, unknown>;

type EventSchemaTable = {
  readonly [K in EventType]: EventSchema<Extract<ResponseEvent, { type: K }>>;
};

const ResponsePayload = z.object({ response: ResponseSnapshotSchema });

const ItemPayload = z.object({ output_index: IndexSchema, item: WireOutputItemSchema });

const EVENT_SCHEMAS: EventSchemaTable = {
  [EventType.CREATED]: ResponsePayload.transform(
    (p): CreatedEvent => ({ type: EventType.CREATED, response: p.response }),
  ),
  [EventType.IN_PROGRESS]: ResponsePayload.transform(
    (p): InProgressEvent => ({ type: EventType.IN_PROGRESS, response: p.response }),
  ),
  [EventType.OUTPUT_ITEM_ADDED]: ItemPayload.transform(
    (p): OutputItemAddedEvent => ({
      type: EventType.OUTPUT_ITEM_ADDED,
      output_index: p.output_index,
      item: toOutputItem(p.item, p.output_index),
    }),
  ),
  [EventType.OUTPUT_ITEM_DONE]: ItemPayload.transform(
    (p): OutputItemDoneEvent => ({
      type: EventType.OUTPUT_ITEM_DONE,
      output_index: p.output_index,
      item: toOutputItem(p.item, p.output_index),
    }),
  ),
  [EventType.CONTENT_PART_ADDED]: z
    .object({
      output_index: IndexSchema,
      content_index: IndexSchema.default(0),
      part: OutputTextPartSchema,
    })
    .transform(
      (p): ContentPartAddedEvent => ({ type: EventType.CONTENT_PART_ADDED, ...p }),
    ),
  [EventType.TEXT_DELTA]: z
    .object({
      output_index: IndexSchema,
      content_index: IndexSchema.default(0),
      item_id: z.string().optional(),
      delta: z.string(),
    })
    .transform((p): TextDeltaEvent => ({ type: EventType.TEXT_DELTA, ...p })),
  [EventType.TEXT_DONE]: z
    .object({
      output_index: IndexSchema,
      content_index: IndexSchema.default(0),
      text: z.string(),
    })
    .transform((p): TextDoneEvent => ({ type: EventType.TEXT_DONE, ...p })),
  [EventType.ANNOTATION_ADDED]: z
    .object({
      output_index: IndexSchema,
      content_index: IndexSchema.default(0),
      annotation: UrlCitationSchema,
    })
    .transform((p): AnnotationAddedEvent => ({ type: EventType.ANNOTATION_ADDED, ...p })),
  [EventType.REASONING_DELTA]: z
    .object({
      output_index: IndexSchema,
      summary_index: IndexSchema.default(0),
      item_id: z.string().optional(),
      delta: z.string(),
    })
    .transform((p): ReasoningDeltaEvent => ({ type: EventType.REASONING_DELTA, ...p })),
  [EventType.REASONING_DONE]: z
    .object({
      output_index: IndexSchema,
      summary_index: IndexSchema.default(0),
      text: z.string(),
    })
    .transform((p): ReasoningDoneEvent => ({ type: EventType.REASONING_DONE, ...p })),
  [EventType.FUNCTION_CALL_DELTA]: z
    .object({
      output_index: IndexSchema,
      item_id: z.string().optional(),
      delta: z.string(),
    })
    .transform((p): FunctionCallDeltaEvent => ({ type: EventType.FUNCTION_CALL_DELTA, ...p })),
  [EventType.FUNCTION_CALL_DONE]: z
    .object({
      output_index: IndexSchema,
      item_id: z.string().optional(),
      arguments: z.string(),
    })
    .transform((p): FunctionCallDoneEvent => ({ type: EventType.FUNCTION_CALL_DONE, ...p })),
  [EventType.COMPLETED]: ResponsePayload.transform(
    (p): CompletedEvent => ({ type: EventType.COMPLETED, response: p.response }),
  ),
  [EventType.INCOMPLETE]: ResponsePayload.transform(
    (p): IncompleteEvent => ({ type: EventType.INCOMPLETE, response: p.response }),
  ),
  [EventType.FAILED]: ResponsePayload.transform(
    (p): FailedEvent => ({ type: EventType.FAILED, response: p.response }),
  ),
  [EventType.ERROR]: z
    .object({
      code: z.union([z.string(), z.number()]).nullish(),
      message: z.string(),
    })
    .transform(
      (p): ErrorEvent => ({
        type: EventType.ERROR,
        message: p.message,
        ...(p.code != null ? { code: String(p.code) } : {}),
      }),
    ),
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Normalize one SSE frame. The frame's `event:` field names the wire type;
 * when absent, the payload's `type` field is used instead.
 */
export function normalizeFrame(frame: SSEFrame): ResponseEvent | Skip {
  if (frame.data.trim() === "[DONE]") {
    logger.debug("Skipping [DONE] sentinel");
    return SKIP;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(frame.data);
  } catch {
    logger.warn(`Skipping ${frame.event ?? "untyped"} frame: data is not valid JSON`);
    return SKIP;
  }

  const wireType =
    frame.event ??
    (isRecord(payload) && typeof payload["type"] === "string" ? payload["type"] : undefined);
  if (wireType === undefined) {
    logger.warn("Skipping frame without an event type");
    return SKIP;
  }

  const tag = lookupEventType(wireType);
  if (tag === undefined) {
    logger.debug(`Skipping unhandled event type ${wireType}`);
    return SKIP;
  }

  const schema: EventSchema<ResponseEvent> = EVENT_SCHEMAS[tag];
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid payload";
    logger.warn(`Skipping ${wireType} event with unexpected shape (${where})`);
    return SKIP;
  }
  return result.data;
}
