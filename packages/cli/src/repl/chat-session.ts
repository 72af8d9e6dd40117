import { randomUUID } from "node:crypto";
import type { DoneReason, IncomingTurn } from "@pharmacy-agent/core";
import type { LoopFactory } from "@pharmacy-agent/server";
import type { OutputFormatter } from "./output-formatter.js";

export type ChatOutcome = DoneReason | "cancelled";

/**
 * Client-side conversation state for the terminal chat. The full history
 * goes out with every message, the same way the web page does it; the
 * server side keeps nothing between requests.
 */
export class ChatSession {
  private readonly createLoop: LoopFactory;
  private readonly formatter: OutputFormatter;
  private history: IncomingTurn[] = [];

  constructor(createLoop: LoopFactory, formatter: OutputFormatter) {
    this.createLoop = createLoop;
    this.formatter = formatter;
  }

  get turns(): readonly IncomingTurn[] {
    return this.history;
  }

  reset(): void {
    this.history = [];
  }

  /**
   * Runs one request and renders its events. The exchange is kept in the
   * history unless the request failed or was cancelled.
   */
  async send(text: string, signal?: AbortSignal): Promise<ChatOutcome> {
    const turns: IncomingTurn[] = [...this.history, { role: "user", content: text }];
    const loop = this.createLoop(randomUUID());

    let reply = "";
    let outcome: ChatOutcome = "cancelled";

    for await (const event of loop.run(turns, signal)) {
      switch (event.type) {
        case "text_delta":
          reply += event.text;
          this.formatter.delta(event.text);
          break;
        case "tool_call":
          this.formatter.toolCall(event.name, event.input, event.output);
          break;
        case "error":
          this.formatter.error(event.message);
          break;
        case "done":
          outcome = event.reason;
          break;
      }
    }
    this.formatter.endStream();

    if (outcome !== "failed" && outcome !== "cancelled") {
      this.history = reply ? [...turns, { role: "assistant", content: reply }] : turns;
    }
    return outcome;
  }
}
