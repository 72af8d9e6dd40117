import { z } from "zod";

export const ToolParameterSchema = z.object({
  type: z.enum(["string", "integer", "number", "boolean"]),
  description: z.string(),
  required: z.boolean().default(false),
  pattern: z.string().optional(),
});
export type ToolParameter = z.infer<typeof ToolParameterSchema>;

// What the model sees: name, purpose and argument schema
export const ToolDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/),
  description: z.string().min(1),
  parameters: z.record(ToolParameterSchema),
});
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;

export const ToolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  // raw JSON text exactly as the model produced it
  arguments: z.string(),
});
export type ToolCall = z.infer<typeof ToolCallSchema>;

export const ToolOutcomeSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("ok"), data: z.unknown() }),
  z.object({ status: z.literal("not_found"), error: z.string() }),
  z.object({ status: z.literal("validation_error"), error: z.string() }),
]);
export type ToolOutcome = z.infer<typeof ToolOutcomeSchema>;

export const ToolResultSchema = z.object({
  toolCallId: z.string().min(1),
  name: z.string(),
  // parsed arguments, or the raw text when it was not valid JSON
  input: z.unknown(),
  outcome: ToolOutcomeSchema,
  durationMs: z.number().nonnegative(),
});
export type ToolResult = z.infer<typeof ToolResultSchema>;

/**
 * An executable tool. Argument validation happens inside `execute`, so a
 * tool never sees input that does not match its declared parameters.
 */
export interface Tool {
  readonly definition: ToolDefinition;
  execute(args: unknown): ToolOutcome;
}
