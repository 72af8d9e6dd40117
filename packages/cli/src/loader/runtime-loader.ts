import {
  AgentConfigSchema,
  AgentLoop,
  PolicyFilter,
  ToolCatalog,
  createPharmacyTools,
  logger as rootLogger,
  type AgentConfig,
  type DatasetStore,
  type Logger,
  type ModelGateway,
} from "@pharmacy-agent/core";
import { DEFAULT_PERSONAS_DIR, loadAgents } from "@pharmacy-agent/agents";
import { loadDataset } from "@pharmacy-agent/dataset";
import { createGateway } from "@pharmacy-agent/providers";
import type { AppConfig } from "../config/app-config.js";

export interface LoadedRuntime {
  agent: AgentConfig;
  gateway: ModelGateway;
  catalog: ToolCatalog;
  policy: PolicyFilter;
  store: DatasetStore;
  /** A fresh, single-use loop per request. */
  createLoop(requestId?: string): AgentLoop;
}

export interface RuntimeLoaderOptions {
  /** Replaces the gateway built from `config.provider`. */
  gateway?: ModelGateway | undefined;
  dataDir?: string | undefined;
  logger?: Logger | undefined;
}

/**
 * RuntimeLoader wires everything a chat request needs:
 *
 * 1. Load the dataset and the personas in parallel
 * 2. Pick the configured persona and apply env overrides to its limits
 * 3. Build the gateway, tool catalog and policy filter
 *
 * Everything returned is read-only and shared by all requests; only the
 * AgentLoop is per request.
 */
export class RuntimeLoader {
  private readonly config: AppConfig;
  private readonly options: RuntimeLoaderOptions;
  private readonly log: Logger;

  constructor(config: AppConfig, options: RuntimeLoaderOptions = {}) {
    this.config = config;
    this.options = options;
    this.log = (options.logger ?? rootLogger).child({ module: "runtime-loader" });
  }

  async load(): Promise<LoadedRuntime> {
    const agentsDir = this.config.personasDir ?? DEFAULT_PERSONAS_DIR;

    const [store, registry] = await Promise.all([
      loadDataset(this.options.dataDir),
      loadAgents({ agentsDir, logger: this.options.logger }),
    ]);

    const agent = this.applyOverrides(registry.require(this.config.agentId));
    const gateway = this.options.gateway ?? createGateway(this.config.provider);
    const catalog = new ToolCatalog(createPharmacyTools(store));
    const policy = new PolicyFilter();

    this.log.info(
      {
        agent: agent.id,
        provider: gateway.providerId,
        tools: catalog.size,
        ...store.counts,
      },
      "runtime loaded"
    );

    const logger = this.options.logger;
    return {
      agent,
      gateway,
      catalog,
      policy,
      store,
      createLoop: (requestId) =>
        new AgentLoop({ gateway, catalog, policy, agentConfig: agent, requestId, logger }),
    };
  }

  private applyOverrides(agent: AgentConfig): AgentConfig {
    const { maxToolRounds, gatewayTimeoutMs } = this.config;
    return AgentConfigSchema.parse({
      ...agent,
      ...(maxToolRounds !== undefined ? { maxRounds: maxToolRounds } : {}),
      ...(gatewayTimeoutMs !== undefined ? { gatewayTimeoutMs } : {}),
    });
  }
}

export async function loadRuntime(
  config: AppConfig,
  options: RuntimeLoaderOptions = {}
): Promise<LoadedRuntime> {
  return new RuntimeLoader(config, options).load();
}
