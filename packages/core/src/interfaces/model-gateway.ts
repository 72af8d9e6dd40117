import { z } from "zod";
import type { ConversationTurn } from "./message.js";
import { ToolCallSchema, type ToolDefinition } from "./tool.js";

export interface ModelRequest {
  model?: string | undefined;
  systemPrompt?: string | undefined;
  messages: readonly ConversationTurn[];
  tools: readonly ToolDefinition[];
  maxTokens: number;
  temperature?: number | undefined;
  signal: AbortSignal;
}

// One round-trip yields any number of deltas and
// tool calls, then exactly one turn_complete (or an error)
export const GatewayEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("text_delta"),
    text: z.string(),
  }),
  z.object({
    type: z.literal("tool_call"),
    call: ToolCallSchema,
  }),
  z.object({
    type: z.literal("turn_complete"),
    stopReason: z.enum(["end_turn", "tool_use", "max_tokens", "stop_sequence"]),
  }),
  z.object({
    type: z.literal("error"),
    code: z.string(),
    message: z.string(),
  }),
]);
export type GatewayEvent = z.infer<typeof GatewayEventSchema>;

/**
 * Remote language model capability. Implementations report provider
 * failures as `error` events; they may also throw, and the loop treats
 * both the same way.
 */
export interface ModelGateway {
  readonly providerId: string;
  stream(request: ModelRequest): AsyncIterable<GatewayEvent>;
}
