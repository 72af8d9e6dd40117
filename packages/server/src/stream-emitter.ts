import type { Writable } from "node:stream";
import { outcomePayload, type AgentEvent, type DoneReason } from "@pharmacy-agent/core";

/** Frames as the chat page reads them. */
export type WireEvent =
  | { type: "token"; content: string }
  | { type: "tool_call"; name: string; input: unknown; output: unknown }
  | { type: "error"; content: string }
  | { type: "done"; reason: DoneReason };

export function toWireEvent(event: AgentEvent): WireEvent {
  switch (event.type) {
    case "text_delta":
      return { type: "token", content: event.text };
    case "tool_call":
      return {
        type: "tool_call",
        name: event.name,
        input: event.input,
        output: outcomePayload(event.output),
      };
    case "error":
      return { type: "error", content: event.message };
    case "done":
      return { type: "done", reason: event.reason };
  }
}

export function formatFrame(event: WireEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

/**
 * Writes SSE frames to a response in the order they are sent. When the
 * socket buffer is full, `send` waits for `drain` before resolving, which
 * in turn holds back the agent loop feeding it.
 */
export class SseEmitter {
  private readonly sink: Writable;

  constructor(sink: Writable) {
    this.sink = sink;
  }

  get closed(): boolean {
    return this.sink.destroyed || this.sink.writableEnded;
  }

  /** Resolves false when the client is gone and nothing was written. */
  async send(event: AgentEvent): Promise<boolean> {
    return this.write(toWireEvent(event));
  }

  async write(event: WireEvent): Promise<boolean> {
    if (this.closed) return false;
    if (!this.sink.write(formatFrame(event))) {
      await this.drained();
    }
    return !this.sink.destroyed;
  }

  end(): void {
    if (!this.closed) this.sink.end();
  }

  private drained(): Promise<void> {
    return new Promise((resolve) => {
      const settle = (): void => {
        this.sink.off("drain", settle);
        this.sink.off("close", settle);
        resolve();
      };
      this.sink.once("drain", settle);
      this.sink.once("close", settle);
    });
  }
}
