// ── Interfaces ────────────────────────────────────────────────────────────────

// message
export {
  RoleSchema,
  ConversationTurnSchema,
  IncomingTurnSchema,
} from "./interfaces/message.js";
export type { Role, ConversationTurn, IncomingTurn } from "./interfaces/message.js";

// tool
export {
  ToolParameterSchema,
  ToolDefinitionSchema,
  ToolCallSchema,
  ToolOutcomeSchema,
  ToolResultSchema,
} from "./interfaces/tool.js";
export type {
  ToolParameter,
  ToolDefinition,
  ToolCall,
  ToolOutcome,
  ToolResult,
  Tool,
} from "./interfaces/tool.js";

// model-gateway
export { GatewayEventSchema } from "./interfaces/model-gateway.js";
export type { GatewayEvent, ModelGateway, ModelRequest } from "./interfaces/model-gateway.js";

// agent-config
export { AgentConfigSchema } from "./interfaces/agent-config.js";
export type { AgentConfig } from "./interfaces/agent-config.js";

// agent-event
export type { AgentEvent, DoneReason } from "./interfaces/agent-event.js";

// dataset-store
export {
  MedicationRecordSchema,
  StockRecordSchema,
  UserRecordSchema,
  PrescriptionRecordSchema,
} from "./interfaces/dataset-store.js";
export type {
  MedicationRecord,
  StockRecord,
  UserRecord,
  PrescriptionRecord,
  DatasetStore,
} from "./interfaces/dataset-store.js";

// ── Errors & logging ──────────────────────────────────────────────────────────

export { AgentLoopError, GatewayFailure, InvalidHistory, LoopLimitExceeded } from "./errors.js";
export type { GatewayFailureKind } from "./errors.js";

export { logger } from "./logger.js";
export type { Logger } from "./logger.js";

// ── Policy ────────────────────────────────────────────────────────────────────

export {
  PolicyFilter,
  PolicyCategorySchema,
  PolicyLanguageSchema,
  PolicyRuleSetSchema,
  parsePolicyRules,
  loadDefaultPolicyRules,
  compilePattern,
  isHebrew,
} from "./policy/policy-filter.js";
export type {
  PolicyCategory,
  PolicyLanguage,
  PolicyRuleSet,
  PolicyDecision,
} from "./policy/policy-filter.js";

// ── Catalog & dispatch ────────────────────────────────────────────────────────

export { defineTool, describeParameters } from "./catalog/define-tool.js";
export type { ToolSpec } from "./catalog/define-tool.js";

export { createPharmacyTools, localIsoDate } from "./catalog/pharmacy-tools.js";
export type { PharmacyToolOptions } from "./catalog/pharmacy-tools.js";

export { ToolCatalog } from "./catalog/tool-catalog.js";

export { ToolDispatcher, outcomePayload, serializeOutcome } from "./dispatch/tool-dispatcher.js";

// ── Runtime ───────────────────────────────────────────────────────────────────

export { RuntimeState } from "./runtime/runtime-state.js";
export type { RuntimeSnapshot, RuntimePhase, NewTurn } from "./runtime/runtime-state.js";

export {
  AgentLoop,
  UNABLE_TO_COMPLETE_MESSAGE,
  GATEWAY_ERROR_MESSAGE,
} from "./runtime/runtime-loop.js";
export type { AgentLoopOptions } from "./runtime/runtime-loop.js";
