import type { AgentConfig } from "@pharmacy-agent/core";

/**
 * Loaded personas by id. Ids are unique; a second registration under the
 * same id throws.
 */
export class AgentRegistry {
  private readonly agents: Map<string, AgentConfig> = new Map();

  register(agent: AgentConfig): void {
    if (this.agents.has(agent.id)) {
      throw new Error(`Duplicate agent id "${agent.id}": already registered.`);
    }
    this.agents.set(agent.id, agent);
  }

  get(id: string): AgentConfig | undefined {
    return this.agents.get(id);
  }

  /** Like get(), but names the available ids when `id` is missing. */
  require(id: string): AgentConfig {
    const agent = this.agents.get(id);
    if (!agent) {
      const known = this.list().map((a) => a.id);
      throw new Error(
        `Unknown agent "${id}". Available: ${known.length > 0 ? known.join(", ") : "(none)"}`
      );
    }
    return agent;
  }

  /** Sorted by id. */
  list(): AgentConfig[] {
    return Array.from(this.agents.values()).sort((a, b) => a.id.localeCompare(b.id));
  }

  get size(): number {
    return this.agents.size;
  }
}
