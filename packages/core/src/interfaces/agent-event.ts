import type { ToolOutcome } from "./tool.js";

export type DoneReason = "completed" | "blocked" | "failed" | "limit_exceeded";

// Events the loop emits, in strict production order. The final event of
// every run is `done`.
export type AgentEvent =
  | { type: "text_delta"; text: string }
  | {
      type: "tool_call";
      id: string;
      name: string;
      input: unknown;
      output: ToolOutcome;
    }
  | { type: "error"; code: string; message: string }
  | { type: "done"; reason: DoneReason };
