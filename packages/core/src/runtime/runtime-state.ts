import { randomUUID } from "node:crypto";
import type { ConversationTurn } from "../interfaces/message.js";
import type { ToolResult } from "../interfaces/tool.js";

// Immutable snapshot handed to observers and the request builder
export interface RuntimeSnapshot {
  readonly requestId: string;
  readonly agentId: string;
  readonly round: number;
  readonly messages: readonly ConversationTurn[];
  readonly pendingToolCalls: readonly string[];    // ids awaiting results
  readonly completedToolResults: readonly ToolResult[];
  readonly phase: RuntimePhase;
}

export type RuntimePhase =
  | "start"
  | "policy_check"
  | "blocked"
  | "model_turn"
  | "tool_exec"
  | "done"
  | "limit_exceeded"
  | "failed"
  | "cancelled";

export type NewTurn = Omit<ConversationTurn, "id" | "ordinal" | "timestamp">;

// Mutable state; only the AgentLoop mutates it
export class RuntimeState {
  private _snapshot: RuntimeSnapshot;

  constructor(requestId: string, agentId: string) {
    this._snapshot = {
      requestId,
      agentId,
      round: 0,
      messages: [],
      pendingToolCalls: [],
      completedToolResults: [],
      phase: "start",
    };
  }

  get snapshot(): RuntimeSnapshot {
    return Object.freeze({ ...this._snapshot });
  }

  /** Appends a turn at the next ordinal. The sequence is never reordered. */
  appendTurn(turn: NewTurn): ConversationTurn {
    const appended: ConversationTurn = {
      ...turn,
      id: randomUUID(),
      ordinal: this._snapshot.messages.length,
      timestamp: Date.now(),
    };
    this._snapshot = {
      ...this._snapshot,
      messages: [...this._snapshot.messages, appended],
    };
    return appended;
  }

  /**
   * Starts the next model round-trip. Refuses while any tool call of the
   * previous round is still without a result.
   */
  advanceRound(): void {
    if (this._snapshot.pendingToolCalls.length > 0) {
      throw new Error(
        `Cannot start a new round with unanswered tool calls: ${this._snapshot.pendingToolCalls.join(", ")}`
      );
    }
    this._snapshot = {
      ...this._snapshot,
      round: this._snapshot.round + 1,
      completedToolResults: [],
    };
  }

  setPhase(phase: RuntimePhase): void {
    this._snapshot = { ...this._snapshot, phase };
  }

  recordToolCall(callId: string): void {
    if (this._snapshot.pendingToolCalls.includes(callId)) {
      throw new Error(`Tool call "${callId}" is already pending`);
    }
    this._snapshot = {
      ...this._snapshot,
      pendingToolCalls: [...this._snapshot.pendingToolCalls, callId],
    };
  }

  /** Each pending call takes exactly one result. */
  recordToolResult(result: ToolResult): void {
    if (!this._snapshot.pendingToolCalls.includes(result.toolCallId)) {
      throw new Error(`No pending tool call "${result.toolCallId}" for this result`);
    }
    this._snapshot = {
      ...this._snapshot,
      pendingToolCalls: this._snapshot.pendingToolCalls.filter(
        (id) => id !== result.toolCallId
      ),
      completedToolResults: [...this._snapshot.completedToolResults, result],
    };
  }

  /** Drops the conversation buffer once the request is over. */
  release(): void {
    this._snapshot = {
      ...this._snapshot,
      messages: [],
      pendingToolCalls: [],
      completedToolResults: [],
    };
  }
}
