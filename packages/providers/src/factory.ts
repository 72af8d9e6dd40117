import type { ModelGateway } from "@pharmacy-agent/core";
import { AnthropicGateway } from "./anthropic/anthropic-gateway.js";
import { OpenAIGateway } from "./openai/openai-gateway.js";

export type ProviderConfig =
  | {
      provider: "anthropic";
      apiKey: string;
      defaultModel: string;
    }
  | {
      provider: "openai";
      apiKey: string;
      defaultModel: string;
      baseURL?: string | undefined;
    };

/**
 * createGateway() instantiates the ModelGateway for a provider config.
 *
 * @example
 * const gateway = createGateway({
 *   provider: "openai",
 *   apiKey: config.openaiApiKey,
 *   defaultModel: "gpt-4o-mini",
 * });
 */
export function createGateway(config: ProviderConfig): ModelGateway {
  switch (config.provider) {
    case "anthropic":
      return new AnthropicGateway({
        apiKey: config.apiKey,
        defaultModel: config.defaultModel,
      });

    case "openai":
      return new OpenAIGateway({
        apiKey: config.apiKey,
        defaultModel: config.defaultModel,
        ...(config.baseURL ? { baseURL: config.baseURL } : {}),
      });

    default: {
      // TypeScript exhaustiveness check
      const _exhaustive: never = config;
      throw new Error(`Unknown provider: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
