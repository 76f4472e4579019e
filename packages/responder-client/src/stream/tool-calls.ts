/**
 * Merges streamed function-call fragments into complete calls.
 *
 * Fragments are keyed by call index only; deltas for several calls may
 * arrive interleaved in any order. Arguments are kept as raw text.
 */

import { OutputItemType, type FunctionCallItem } from "../types/index.js";

export interface ToolCallStart {
  itemId?: string;
  callId?: string;
  name?: string;
}

interface ToolCallBuilder {
  itemId: string;
  callId: string;
  name: string;
  argumentChunks: string[];
  done: boolean;
}

export class ToolCallAggregator {
  private builders: Map<number, ToolCallBuilder> = new Map();

  /**
   * Record metadata for the call at `index`. Safe to call after fragments
   * have already arrived; accumulated arguments are kept.
   */
  start(index: number, meta: ToolCallStart): void {
    const builder = this.builder(index);
    if (meta.itemId) builder.itemId = meta.itemId;
    if (meta.callId) builder.callId = meta.callId;
    if (meta.name) builder.name = meta.name;
  }

  append(index: number, fragment: string): void {
    this.builder(index).argumentChunks.push(fragment);
  }

  /** A complete `arguments` payload only fills a call that got no fragments. */
  finish(index: number, payload: { arguments?: string }): void {
    const builder = this.builder(index);
    if (builder.argumentChunks.length === 0 && payload.arguments) {
      builder.argumentChunks.push(payload.arguments);
    }
    builder.done = true;
  }

  /** Function call items ordered by index. */
  toItems(): FunctionCallItem[] {
    return [...this.builders.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, b]): FunctionCallItem => {
        const id = b.itemId || b.callId;
        return {
          type: OutputItemType.FUNCTION_CALL,
          id,
          call_id: b.callId || id,
          name: b.name,
          arguments: b.argumentChunks.join(""),
          index,
          ...(b.done ? { status: "completed" as const } : {}),
        };
      });
  }

  private builder(index: number): ToolCallBuilder {
    let builder = this.builders.get(index);
    if (!builder) {
      builder = { itemId: "", callId: "", name: "", argumentChunks: [], done: false };
      this.builders.set(index, builder);
    }
    return builder;
  }
}
