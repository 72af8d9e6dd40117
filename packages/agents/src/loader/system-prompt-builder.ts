import type { AgentFrontmatter } from "../interfaces/agent-frontmatter.js";

/** Inline `systemPrompt` first, then the markdown body. Blank parts are dropped. */
export function buildSystemPrompt(
  frontmatter: Pick<AgentFrontmatter, "systemPrompt">,
  markdownBody: string
): string {
  return [frontmatter.systemPrompt, markdownBody]
    .map((part) => part?.trim() ?? "")
    .filter((part) => part.length > 0)
    .join("\n\n");
}
