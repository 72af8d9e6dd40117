// Configuration
export { EnvSchema, ConfigError, loadAppConfig } from "./config/app-config.js";
export type { AppConfig, Env } from "./config/app-config.js";

// Runtime wiring
export { RuntimeLoader, loadRuntime } from "./loader/runtime-loader.js";
export type { LoadedRuntime, RuntimeLoaderOptions } from "./loader/runtime-loader.js";

// Terminal chat
export { REPL } from "./repl/repl.js";
export type { REPLOptions } from "./repl/repl.js";
export { ChatSession } from "./repl/chat-session.js";
export type { ChatOutcome } from "./repl/chat-session.js";
export { OutputFormatter } from "./repl/output-formatter.js";
export type { OutputFormatterOptions, TextSink } from "./repl/output-formatter.js";
