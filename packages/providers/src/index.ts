export { AnthropicGateway } from "./anthropic/anthropic-gateway.js";
export type { AnthropicGatewayConfig } from "./anthropic/anthropic-gateway.js";

export { OpenAIGateway } from "./openai/openai-gateway.js";
export type { OpenAIGatewayConfig } from "./openai/openai-gateway.js";

export { toInputSchema } from "./shared/tool-schema.js";
export type { ToolInputSchema, JsonSchemaProperty } from "./shared/tool-schema.js";

export { createGateway } from "./factory.js";
export type { ProviderConfig } from "./factory.js";
