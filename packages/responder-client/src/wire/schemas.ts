/**
 * Zod schemas for the Responses wire format.
 *
 * Shared by the streaming normalizer and the non-streaming translator so
 * both paths produce identical OutputItem / Response values. Schemas are
 * lenient about fields the client does not use and strict about the ones
 * it does.
 */

import { z } from "zod";
import {
  OutputItemType,
  type Annotation,
  type FunctionCallItem,
  type MessageItem,
  type OutputItem,
  type OutputTextPart,
  type ReasoningItem,
  type ResponseSnapshot,
  type Usage,
} from "../types/index.js";

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

export const IndexSchema = z.number().int().nonnegative();

export const UrlCitationSchema = z.object({
  type: z.literal("url_citation"),
  url: z.string(),
  title: z.string().optional(),
  content: z.string().optional(),
  start_index: z.number().int(),
  end_index: z.number().int(),
});

/** Keeps the annotations the client models; others are dropped. */
const AnnotationListSchema = z
  .array(z.unknown())
  .nullish()
  .transform((list): Annotation[] => {
    const annotations: Annotation[] = [];
    for (const entry of list ?? []) {
      const parsed = UrlCitationSchema.safeParse(entry);
      if (parsed.success) annotations.push(parsed.data);
    }
    return annotations;
  });

export const OutputTextPartSchema = z
  .object({
    type: z.literal("output_text"),
    text: z.string().default(""),
    annotations: AnnotationListSchema,
  })
  .transform(
    (part): OutputTextPart => ({
      type: "output_text",
      text: part.text,
      annotations: part.annotations,
    }),
  );

/** Keeps output_text parts; refusals and unknown part types are dropped. */
const ContentListSchema = z
  .array(z.unknown())
  .nullish()
  .transform((list): OutputTextPart[] => {
    const parts: OutputTextPart[] = [];
    for (const entry of list ?? []) {
      const parsed = OutputTextPartSchema.safeParse(entry);
      if (parsed.success) parts.push(parsed.data);
    }
    return parts;
  });

const ItemStatusSchema = z
  .enum(["in_progress", "completed", "incomplete"])
  .optional()
  .catch(undefined);

// ---------------------------------------------------------------------------
// Output items
// ---------------------------------------------------------------------------

const MessageItemSchema = z.object({
  type: z.literal("message"),
  id: z.string().default(""),
  status: ItemStatusSchema,
  content: ContentListSchema,
});

const ReasoningItemSchema = z.object({
  type: z.literal("reasoning"),
  id: z.string().default(""),
  summary: z
    .array(z.object({ text: z.string() }))
    .nullish()
    .transform((list) => (list ?? []).map((s) => ({ type: "summary_text" as const, text: s.text }))),
});

const FunctionCallItemSchema = z.object({
  type: z.literal("function_call"),
  id: z.string().optional(),
  call_id: z.string().optional(),
  name: z.string().default(""),
  arguments: z.string().default(""),
  status: ItemStatusSchema,
});

export const WireOutputItemSchema = z.discriminatedUnion("type", [
  MessageItemSchema,
  ReasoningItemSchema,
  FunctionCallItemSchema,
]);

export type WireOutputItem = z.infer<typeof WireOutputItemSchema>;

/**
 * Convert a validated wire item to an OutputItem. `index` is the item's
 * output index, which is also the call index for function calls.
 */
export function toOutputItem(item: WireOutputItem, index: number): OutputItem {
  const status = item.type === "reasoning" ? undefined : item.status;
  const statusField = status ? { status } : {};

  switch (item.type) {
    case "message": {
      const message: MessageItem = {
        type: OutputItemType.MESSAGE,
        id: item.id,
        role: "assistant",
        content: item.content,
        ...statusField,
      };
      return message;
    }
    case "reasoning": {
      const reasoning: ReasoningItem = {
        type: OutputItemType.REASONING,
        id: item.id,
        summary: item.summary,
      };
      return reasoning;
    }
    case "function_call": {
      const id = item.id ?? item.call_id ?? "";
      const call: FunctionCallItem = {
        type: OutputItemType.FUNCTION_CALL,
        id,
        call_id: item.call_id ?? id,
        name: item.name,
        arguments: item.arguments,
        index,
        ...statusField,
      };
      return call;
    }
  }
}

export interface PositionedItem {
  /** Position in the wire `output` array. */
  index: number;
  item: OutputItem;
}

/** Parse an `output` array, skipping unknown item types but keeping positions. */
export function toOutputItems(list: readonly unknown[] | null | undefined): PositionedItem[] {
  const items: PositionedItem[] = [];
  (list ?? []).forEach((entry, index) => {
    const parsed = WireOutputItemSchema.safeParse(entry);
    if (parsed.success) items.push({ index, item: toOutputItem(parsed.data, index) });
  });
  return items;
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export const UsageSchema = z
  .object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
    input_tokens_details: z.object({ cached_tokens: z.number().optional() }).nullish(),
    output_tokens_details: z.object({ reasoning_tokens: z.number().optional() }).nullish(),
  })
  .transform((raw): Usage => {
    const usage: {
      -readonly [K in keyof Usage]: Usage[K];
    } = {};
    if (raw.input_tokens !== undefined) usage.input_tokens = raw.input_tokens;
    if (raw.output_tokens !== undefined) usage.output_tokens = raw.output_tokens;
    if (raw.total_tokens !== undefined) usage.total_tokens = raw.total_tokens;
    const reasoning = raw.output_tokens_details?.reasoning_tokens;
    if (reasoning !== undefined) usage.reasoning_tokens = reasoning;
    const cached = raw.input_tokens_details?.cached_tokens;
    if (cached !== undefined) usage.cached_tokens = cached;
    return usage;
  });

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

const ErrorInfoSchema = z.object({
  code: z.union([z.string(), z.number()]).nullish(),
  message: z.string(),
});

export const ResponseSnapshotSchema = z
  .object({
    id: z.string().default(""),
    model: z.string().default(""),
    status: z.string().nullish(),
    output: z.array(z.unknown()).nullish(),
    usage: UsageSchema.nullish(),
    error: ErrorInfoSchema.nullish(),
    incomplete_details: z.object({ reason: z.string().optional() }).nullish(),
  })
  .transform((raw): ResponseSnapshot => {
    const positioned = toOutputItems(raw.output);
    const snapshot: ResponseSnapshot = {
      id: raw.id,
      model: raw.model,
      status: raw.status ?? "in_progress",
      output: positioned.map((entry) => entry.item),
      output_positions: positioned.map((entry) => entry.index),
    };
    return {
      ...snapshot,
      ...(raw.usage ? { usage: raw.usage } : {}),
      ...(raw.error
        ? {
            error: {
              message: raw.error.message,
              ...(raw.error.code != null ? { code: String(raw.error.code) } : {}),
            },
          }
        : {}),
      ...(raw.incomplete_details ? { incomplete_details: raw.incomplete_details } : {}),
    };
  });
