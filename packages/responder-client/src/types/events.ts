/**
 * Normalized stream events.
 *
 * Every wire event the client understands maps to exactly one variant of
 * `ResponseEvent`; each variant carries only the fields relevant to it.
 */

import { EventType } from "./enums.js";
import type {
  Annotation,
  OutputItem,
  OutputTextPart,
  Response,
} from "./response.js";

/** A response as reported inside lifecycle events (not yet assembled). */
export interface ResponseSnapshot extends Omit<Response, "complete"> {
  /**
   * Wire position of each `output` item. Items of types the client does not
   * model are dropped, so positions can skip.
   */
  readonly output_positions?: readonly number[];
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

export interface CreatedEvent {
  readonly type: typeof EventType.CREATED;
  readonly response: ResponseSnapshot;
}

export interface InProgressEvent {
  readonly type: typeof EventType.IN_PROGRESS;
  readonly response: ResponseSnapshot;
}

export interface OutputItemAddedEvent {
  readonly type: typeof EventType.OUTPUT_ITEM_ADDED;
  readonly output_index: number;
  readonly item: OutputItem;
}

export interface OutputItemDoneEvent {
  readonly type: typeof EventType.OUTPUT_ITEM_DONE;
  readonly output_index: number;
  readonly item: OutputItem;
}

export interface ContentPartAddedEvent {
  readonly type: typeof EventType.CONTENT_PART_ADDED;
  readonly output_index: number;
  readonly content_index: number;
  readonly part: OutputTextPart;
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

export interface TextDeltaEvent {
  readonly type: typeof EventType.TEXT_DELTA;
  readonly output_index: number;
  readonly content_index: number;
  readonly item_id?: string;
  readonly delta: string;
}

export interface TextDoneEvent {
  readonly type: typeof EventType.TEXT_DONE;
  readonly output_index: number;
  readonly content_index: number;
  readonly text: string;
}

export interface AnnotationAddedEvent {
  readonly type: typeof EventType.ANNOTATION_ADDED;
  readonly output_index: number;
  readonly content_index: number;
  readonly annotation: Annotation;
}

// ---------------------------------------------------------------------------
// Reasoning
// ---------------------------------------------------------------------------

export interface ReasoningDeltaEvent {
  readonly type: typeof EventType.REASONING_DELTA;
  readonly output_index: number;
  readonly summary_index: number;
  readonly item_id?: string;
  readonly delta: string;
}

export interface ReasoningDoneEvent {
  readonly type: typeof EventType.REASONING_DONE;
  readonly output_index: number;
  readonly summary_index: number;
  readonly text: string;
}

// ---------------------------------------------------------------------------
// Function calls
// ---------------------------------------------------------------------------

export interface FunctionCallDeltaEvent {
  readonly type: typeof EventType.FUNCTION_CALL_DELTA;
  /** Call index; fragments are merged by this, never by arrival order. */
  readonly output_index: number;
  readonly item_id?: string;
  readonly delta: string;
}

export interface FunctionCallDoneEvent {
  readonly type: typeof EventType.FUNCTION_CALL_DONE;
  readonly output_index: number;
  readonly item_id?: string;
  readonly arguments: string;
}

// ---------------------------------------------------------------------------
// Terminal / error
// ---------------------------------------------------------------------------

export interface CompletedEvent {
  readonly type: typeof EventType.COMPLETED;
  readonly response: ResponseSnapshot;
}

export interface IncompleteEvent {
  readonly type: typeof EventType.INCOMPLETE;
  readonly response: ResponseSnapshot;
}

export interface FailedEvent {
  readonly type: typeof EventType.FAILED;
  readonly response: ResponseSnapshot;
}

export interface ErrorEvent {
  readonly type: typeof EventType.ERROR;
  readonly code?: string;
  readonly message: string;
}

export type TerminalEvent = CompletedEvent | IncompleteEvent | FailedEvent;

export type ResponseEvent =
  | CreatedEvent
  | InProgressEvent
  | OutputItemAddedEvent
  | OutputItemDoneEvent
  | ContentPartAddedEvent
  | TextDeltaEvent
  | TextDoneEvent
  | AnnotationAddedEvent
  | ReasoningDeltaEvent
  | ReasoningDoneEvent
  | FunctionCallDeltaEvent
  | FunctionCallDoneEvent
  | TerminalEvent
  | ErrorEvent;

/** True for the events after which the server sends nothing further. */
export function isTerminalEvent(event: ResponseEvent): event is TerminalEvent {
  return (
    event.type === EventType.COMPLETED ||
    event.type === EventType.INCOMPLETE ||
    event.type === EventType.FAILED
  );
}
