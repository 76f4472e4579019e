/**
 * ResponseAssembler: folds normalized events into a Response.
 *
 * Items live in slots keyed by output index and are created lazily by
 * whichever event first names an index. Deltas append; `*_done` events only
 * fill a part that received no deltas. Function-call arguments are merged by
 * the ToolCallAggregator. The terminal event supplies status, usage and any
 * items the stream never announced, after which the result is frozen.
 */

import { createLogger } from "../logging.js";
import {
  EventType,
  OutputItemType,
  isTerminalEvent,
  type Annotation,
  type ErrorEvent,
  type ItemStatus,
  type OutputItem,
  type OutputTextPart,
  type Response,
  type ResponseErrorInfo,
  type ResponseEvent,
  type ResponseSnapshot,
  type TerminalEvent,
  type Usage,
} from "../types/index.js";
import { ToolCallAggregator } from "./tool-calls.js";

const logger = createLogger("assembler");

// ---------------------------------------------------------------------------
// Slots
// ---------------------------------------------------------------------------

interface TextBuffer {
  chunks: string[];
  annotations: Annotation[];
}

interface MessageSlot {
  kind: typeof OutputItemType.MESSAGE;
  id: string;
  status?: ItemStatus;
  parts: Map<number, TextBuffer>;
}

interface ReasoningSlot {
  kind: typeof OutputItemType.REASONING;
  id: string;
  summaries: Map<number, TextBuffer>;
}

/** Call data itself lives in the aggregator. */
interface FunctionCallSlot {
  kind: typeof OutputItemType.FUNCTION_CALL;
}

type Slot = MessageSlot | ReasoningSlot | FunctionCallSlot;

function newBuffer(): TextBuffer {
  return { chunks: [], annotations: [] };
}

function bufferAt(map: Map<number, TextBuffer>, index: number): TextBuffer {
  let buffer = map.get(index);
  if (!buffer) {
    buffer = newBuffer();
    map.set(index, buffer);
  }
  return buffer;
}

function fillIfEmpty(buffer: TextBuffer, text: string): void {
  if (buffer.chunks.length === 0 && text.length > 0) buffer.chunks.push(text);
}

function bufferText(buffer: TextBuffer): string {
  return buffer.chunks.join("");
}

function sortedEntries<V>(map: Map<number, V>): [number, V][] {
  return [...map.entries()].sort(([a], [b]) => a - b);
}

// ---------------------------------------------------------------------------
// Freezing
// ---------------------------------------------------------------------------

function freezeItem(item: OutputItem): OutputItem {
  switch (item.type) {
    case OutputItemType.MESSAGE:
      for (const part of item.content) {
        Object.freeze(part.annotations);
        Object.freeze(part);
      }
      Object.freeze(item.content);
      break;
    case OutputItemType.REASONING:
      item.summary.forEach((part) => Object.freeze(part));
      Object.freeze(item.summary);
      break;
    case OutputItemType.FUNCTION_CALL:
      break;
  }
  return Object.freeze(item);
}

/** Deep-freeze a complete response. */
export function freezeResponse(response: Response): Response {
  response.output.forEach(freezeItem);
  Object.freeze(response.output);
  if (response.usage) Object.freeze(response.usage);
  if (response.error) Object.freeze(response.error);
  if (response.incomplete_details) Object.freeze(response.incomplete_details);
  return Object.freeze(response);
}

// ---------------------------------------------------------------------------
// ResponseAssembler
// ---------------------------------------------------------------------------

const TERMINAL_STATUS = {
  [EventType.COMPLETED]: "completed",
  [EventType.INCOMPLETE]: "incomplete",
  [EventType.FAILED]: "failed",
} as const satisfies Record<TerminalEvent["type"], string>;

export class ResponseAssembler {
  private id = "";
  private model = "";
  private status = "in_progress";
  private slots: Map<number, Slot> = new Map();
  private toolCalls = new ToolCallAggregator();
  private final: Response | undefined;
  private errorEvent: ErrorEvent | undefined;

  /** True once a terminal event has been applied. */
  get complete(): boolean {
    return this.final !== undefined;
  }

  /** The last `error` event seen, if any. */
  get lastError(): ErrorEvent | undefined {
    return this.errorEvent;
  }

  apply(event: ResponseEvent): void {
    if (this.final) {
      logger.debug(`Ignoring ${event.type} after terminal event`);
      return;
    }

    if (isTerminalEvent(event)) {
      this.finalize(event);
      return;
    }

    switch (event.type) {
      case EventType.CREATED:
      case EventType.IN_PROGRESS:
        this.adoptMetadata(event.response);
        break;

      case EventType.OUTPUT_ITEM_ADDED:
        this.applyItem(event.output_index, event.item, false);
        break;

      case EventType.OUTPUT_ITEM_DONE:
        this.applyItem(event.output_index, event.item, true);
        break;

      case EventType.CONTENT_PART_ADDED: {
        const buffer = bufferAt(this.message(event.output_index).parts, event.content_index);
        fillIfEmpty(buffer, event.part.text);
        buffer.annotations.push(...event.part.annotations);
        break;
      }

      case EventType.TEXT_DELTA: {
        const slot = this.message(event.output_index, event.item_id);
        bufferAt(slot.parts, event.content_index).chunks.push(event.delta);
        break;
      }

      case EventType.TEXT_DONE:
        fillIfEmpty(
          bufferAt(this.message(event.output_index).parts, event.content_index),
          event.text,
        );
        break;

      case EventType.ANNOTATION_ADDED:
        bufferAt(this.message(event.output_index).parts, event.content_index).annotations.push(
          event.annotation,
        );
        break;

      case EventType.REASONING_DELTA: {
        const slot = this.reasoning(event.output_index, event.item_id);
        bufferAt(slot.summaries, event.summary_index).chunks.push(event.delta);
        break;
      }

      case EventType.REASONING_DONE:
        fillIfEmpty(
          bufferAt(this.reasoning(event.output_index).summaries, event.summary_index),
          event.text,
        );
        break;

      case EventType.FUNCTION_CALL_DELTA:
        this.functionCall(event.output_index, event.item_id);
        this.toolCalls.append(event.output_index, event.delta);
        break;

      case EventType.FUNCTION_CALL_DONE:
        this.functionCall(event.output_index, event.item_id);
        this.toolCalls.finish(event.output_index, { arguments: event.arguments });
        break;

      case EventType.ERROR:
        logger.warn(`Server reported an error event: ${event.message}`);
        this.errorEvent = event;
        break;
    }
  }

  /** The response assembled so far. Not frozen; `complete` is false until the terminal event. */
  snapshot(): Response {
    if (this.final) return this.final;
    return {
      id: this.id,
      model: this.model,
      status: this.status,
      output: this.buildOutput(),
      complete: false,
    };
  }

  /** Text of the first message item accumulated so far. */
  firstMessageText(): string {
    for (const [, slot] of sortedEntries(this.slots)) {
      if (slot.kind === OutputItemType.MESSAGE) {
        return sortedEntries(slot.parts)
          .map(([, buffer]) => bufferText(buffer))
          .join("");
      }
    }
    return "";
  }

  /**
   * Apply a terminal event and return the frozen response. Calling it again
   * returns the same value.
   */
  finalize(event: TerminalEvent): Response {
    if (this.final) return this.final;

    const terminal = event.response;
    this.adoptMetadata(terminal);
    this.status =
      terminal.status === "in_progress" ? TERMINAL_STATUS[event.type] : terminal.status;

    let position = -1;
    terminal.output.forEach((item, i) => {
      position =
        terminal.output_positions?.[i] ??
        (item.type === OutputItemType.FUNCTION_CALL ? item.index : position + 1);
      this.applyItem(this.terminalPosition(item, position), item, true);
    });

    const response: Response = {
      id: this.id,
      model: this.model,
      status: this.status,
      output: this.buildOutput(),
      complete: true,
      ...(terminal.usage ? { usage: copyUsage(terminal.usage) } : {}),
      ...(terminal.error ? { error: copyError(terminal.error) } : {}),
      ...(terminal.incomplete_details
        ? { incomplete_details: { ...terminal.incomplete_details } }
        : {}),
    };
    this.final = freezeResponse(response);
    return this.final;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private adoptMetadata(snapshot: ResponseSnapshot): void {
    if (snapshot.id) this.id = snapshot.id;
    if (snapshot.model) this.model = snapshot.model;
    this.status = snapshot.status;
  }

  private applyItem(index: number, item: OutputItem, done: boolean): void {
    switch (item.type) {
      case OutputItemType.MESSAGE: {
        const slot = this.message(index, item.id);
        if (item.status) slot.status = item.status;
        item.content.forEach((part, i) => {
          const buffer = bufferAt(slot.parts, i);
          fillIfEmpty(buffer, part.text);
          if (buffer.annotations.length === 0) buffer.annotations.push(...part.annotations);
        });
        break;
      }
      case OutputItemType.REASONING: {
        const slot = this.reasoning(index, item.id);
        item.summary.forEach((part, i) => fillIfEmpty(bufferAt(slot.summaries, i), part.text));
        break;
      }
      case OutputItemType.FUNCTION_CALL:
        this.functionCall(index);
        this.toolCalls.start(index, { itemId: item.id, callId: item.call_id, name: item.name });
        if (done || item.status === "completed") {
          this.toolCalls.finish(index, { arguments: item.arguments });
        }
        break;
    }
  }

  /**
   * Where a terminal-payload item belongs. Items the stream never announced
   * are adopted at their wire position; announced ones only fill gaps. A
   * message or reasoning item is matched by id first. Without wire positions
   * the position is guessed from the previous item.
   */
  private terminalPosition(item: OutputItem, position: number): number {
    if (item.type !== OutputItemType.FUNCTION_CALL && item.id) {
      for (const [index, slot] of this.slots) {
        if (slot.kind === OutputItemType.FUNCTION_CALL) continue;
        if (slot.kind === item.type && slot.id === item.id) return index;
      }
    }
    const existing = this.slots.get(position);
    if (!existing || existing.kind === item.type) return position;

    let next = 0;
    while (this.slots.has(next)) next++;
    return next;
  }

  private message(index: number, id?: string): MessageSlot {
    const slot = this.slots.get(index);
    if (slot?.kind === OutputItemType.MESSAGE) {
      if (id && !slot.id) slot.id = id;
      return slot;
    }
    this.warnReplaced(index, slot, OutputItemType.MESSAGE);
    const created: MessageSlot = { kind: OutputItemType.MESSAGE, id: id ?? "", parts: new Map() };
    this.slots.set(index, created);
    return created;
  }

  private reasoning(index: number, id?: string): ReasoningSlot {
    const slot = this.slots.get(index);
    if (slot?.kind === OutputItemType.REASONING) {
      if (id && !slot.id) slot.id = id;
      return slot;
    }
    this.warnReplaced(index, slot, OutputItemType.REASONING);
    const created: ReasoningSlot = {
      kind: OutputItemType.REASONING,
      id: id ?? "",
      summaries: new Map(),
    };
    this.slots.set(index, created);
    return created;
  }

  private functionCall(index: number, itemId?: string): void {
    const slot = this.slots.get(index);
    if (slot?.kind !== OutputItemType.FUNCTION_CALL) {
      this.warnReplaced(index, slot, OutputItemType.FUNCTION_CALL);
      this.slots.set(index, { kind: OutputItemType.FUNCTION_CALL });
    }
    if (itemId) this.toolCalls.start(index, { itemId });
  }

  private warnReplaced(index: number, slot: Slot | undefined, kind: string): void {
    if (slot) logger.warn(`Output index ${index} changed from ${slot.kind} to ${kind}`);
  }

  private buildOutput(): OutputItem[] {
    const calls = new Map(this.toolCalls.toItems().map((call) => [call.index, call]));
    const output: OutputItem[] = [];

    for (const [index, slot] of sortedEntries(this.slots)) {
      switch (slot.kind) {
        case OutputItemType.MESSAGE:
          output.push({
            type: OutputItemType.MESSAGE,
            id: slot.id,
            role: "assistant",
            content: sortedEntries(slot.parts).map(
              ([, buffer]): OutputTextPart => ({
                type: "output_text",
                text: bufferText(buffer),
                annotations: [...buffer.annotations],
              }),
            ),
            ...(slot.status ? { status: slot.status } : {}),
          });
          break;
        case OutputItemType.REASONING:
          output.push({
            type: OutputItemType.REASONING,
            id: slot.id,
            summary: sortedEntries(slot.summaries).map(([, buffer]) => ({
              type: "summary_text" as const,
              text: bufferText(buffer),
            })),
          });
          break;
        case OutputItemType.FUNCTION_CALL: {
          const call = calls.get(index);
          if (call) output.push(call);
          break;
        }
      }
    }
    return output;
  }
}

function copyUsage(usage: Usage): Usage {
  return { ...usage };
}

function copyError(error: ResponseErrorInfo): ResponseErrorInfo {
  return { ...error };
}
