import matter from "gray-matter";
import { AgentFrontmatterSchema, type AgentFrontmatter } from "../interfaces/agent-frontmatter.js";

export interface AgentParseResult {
  frontmatter: AgentFrontmatter;
  markdownBody: string;
}

export interface AgentParseError {
  file: string;
  message: string;
}

export type AgentParseOutcome =
  | { ok: true; result: AgentParseResult }
  | { ok: false; error: AgentParseError };

/**
 * Splits a persona file into validated frontmatter and the markdown body
 * that becomes (part of) the system prompt.
 */
export function parseAgentFrontmatter(content: string, filePath: string): AgentParseOutcome {
  const fail = (message: string): AgentParseOutcome => ({
    ok: false,
    error: { file: filePath, message: `${filePath}: ${message}` },
  });

  if (!matter.test(content)) {
    return fail("missing YAML frontmatter block");
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(content);
  } catch (err) {
    return fail(`Failed to parse YAML frontmatter: ${err instanceof Error ? err.message : String(err)}`);
  }

  const validation = AgentFrontmatterSchema.safeParse(parsed.data);
  if (!validation.success) {
    const issues = validation.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return fail(`Agent frontmatter validation failed: ${issues}`);
  }

  return {
    ok: true,
    result: {
      frontmatter: validation.data,
      markdownBody: parsed.content.trim(),
    },
  };
}
