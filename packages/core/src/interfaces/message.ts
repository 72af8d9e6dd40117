import { z } from "zod";
import { ToolCallSchema } from "./tool.js";

export const RoleSchema = z.enum(["user", "assistant", "system", "tool"]);
export type Role = z.infer<typeof RoleSchema>;

export const ConversationTurnSchema = z.object({
  id: z.string().uuid(),
  // position in the request's conversation; assigned on append
  ordinal: z.number().int().nonnegative(),
  role: RoleSchema,
  content: z.string(),
  timestamp: z.number().int().positive(),
  toolCallId: z.string().optional(),  // for role=tool responses
  toolCalls: z.array(ToolCallSchema).optional(),  // for assistant turns that requested tools
});
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

// History as supplied by the caller on every request
export const IncomingTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});
export type IncomingTurn = z.infer<typeof IncomingTurnSchema>;
