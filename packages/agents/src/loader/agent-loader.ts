import { readFile, readdir } from "node:fs/promises";
import { resolve, join } from "node:path";
import { fileURLToPath } from "node:url";
import { AgentConfigSchema, logger, type AgentConfig, type Logger } from "@pharmacy-agent/core";
import { parseAgentFrontmatter } from "./frontmatter-parser.js";
import { buildSystemPrompt } from "./system-prompt-builder.js";
import { AgentRegistry } from "../registry/agent-registry.js";

/** Personas shipped with the package. */
export const DEFAULT_PERSONAS_DIR = fileURLToPath(new URL("../../personas/", import.meta.url));

export interface AgentLoaderOptions {
  agentsDir: string;
  logger?: Logger | undefined;
}

/**
 * AgentLoader turns a directory of persona markdown files into a registry:
 * every *.md below `agentsDir` is parsed with gray-matter, its frontmatter
 * validated, the system prompt assembled, and the result registered.
 *
 * A file that fails to parse is skipped with a warning. Two files with the
 * same id fail the whole load.
 */
export class AgentLoader {
  private readonly options: AgentLoaderOptions;
  private readonly log: Logger;

  constructor(options: AgentLoaderOptions) {
    this.options = options;
    this.log = (options.logger ?? logger).child({ module: "agent-loader" });
  }

  async load(): Promise<AgentRegistry> {
    const files = await this.discover();
    const loaded = await Promise.all(files.map((file) => this.tryLoadFile(file)));

    // files are sorted, so registration order does not depend on the file system
    const registry = new AgentRegistry();
    for (const agent of loaded) {
      if (agent) registry.register(agent);
    }

    this.log.debug({ agents: registry.size, dir: this.options.agentsDir }, "personas loaded");
    return registry;
  }

  private async discover(): Promise<string[]> {
    try {
      const entries = await readdir(this.options.agentsDir, {
        recursive: true,
        withFileTypes: true,
      });
      return entries
        .filter((e) => e.isFile() && e.name.endsWith(".md"))
        .map((e) => resolve(join(e.parentPath, e.name)))
        .sort();
    } catch (err) {
      this.log.warn({ err, dir: this.options.agentsDir }, "personas directory is not readable");
      return [];
    }
  }

  private async tryLoadFile(file: string): Promise<AgentConfig | undefined> {
    try {
      return await this.loadFile(file);
    } catch (err) {
      this.log.warn({ file, err }, "skipping persona file");
      return undefined;
    }
  }

  private async loadFile(file: string): Promise<AgentConfig> {
    const outcome = parseAgentFrontmatter(await readFile(file, "utf-8"), file);
    if (!outcome.ok) {
      throw new Error(outcome.error.message);
    }

    const { frontmatter, markdownBody } = outcome.result;
    const systemPrompt = buildSystemPrompt(frontmatter, markdownBody);
    return AgentConfigSchema.parse({
      ...frontmatter,
      ...(systemPrompt ? { systemPrompt } : {}),
    });
  }
}

export async function loadAgents(options: AgentLoaderOptions): Promise<AgentRegistry> {
  return new AgentLoader(options).load();
}
