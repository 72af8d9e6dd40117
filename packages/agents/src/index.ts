// Loader pipeline
export {
  AgentLoader,
  loadAgents,
  DEFAULT_PERSONAS_DIR,
} from "./loader/agent-loader.js";
export type { AgentLoaderOptions } from "./loader/agent-loader.js";

// Registry
export { AgentRegistry } from "./registry/agent-registry.js";

// Frontmatter interface
export { AgentFrontmatterSchema } from "./interfaces/agent-frontmatter.js";
export type { AgentFrontmatter } from "./interfaces/agent-frontmatter.js";

// Utilities
export { parseAgentFrontmatter } from "./loader/frontmatter-parser.js";
export type { AgentParseResult, AgentParseError, AgentParseOutcome } from "./loader/frontmatter-parser.js";

export { buildSystemPrompt } from "./loader/system-prompt-builder.js";
