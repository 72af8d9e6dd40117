import { z } from "zod";

/**
 * Schema for the YAML frontmatter block in persona markdown files.
 *
 * @example
 * ---
 * id: pharmacy-assistant
 * name: Pharmacy Assistant
 * description: Answers stock, price and prescription questions
 * model: gpt-4o-mini
 * temperature: 0.2
 * maxRounds: 6
 * ---
 */
export const AgentFrontmatterSchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9-]*$/, {
    message: 'Agent id must start with a lowercase letter and contain only lowercase letters, digits, and hyphens',
  }),
  name: z.string().min(1, { message: "Agent name must not be empty" }),
  description: z.string().optional(),
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  maxRounds: z.number().int().positive().optional(),
  gatewayTimeoutMs: z.number().int().positive().optional(),
  // Inline system prompt; the markdown body is appended after it
  systemPrompt: z.string().optional(),
});

export type AgentFrontmatter = z.infer<typeof AgentFrontmatterSchema>;
