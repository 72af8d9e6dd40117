import { z } from "zod";

export const AgentConfigSchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9-]*$/),
  name: z.string().min(1),
  description: z.string().optional(),
  systemPrompt: z.string().optional(),
  model: z.string().optional(),  // overrides the gateway default
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().default(1024),
  // model round-trips allowed per request before giving up
  maxRounds: z.number().int().positive().default(6),
  gatewayTimeoutMs: z.number().int().positive().default(60_000),
});
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
