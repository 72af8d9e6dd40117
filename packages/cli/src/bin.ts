#!/usr/bin/env -S npx tsx
import "dotenv/config";
import { logger } from "@pharmacy-agent/core";
import { close, createApp, listen } from "@pharmacy-agent/server";
import { ConfigError, loadAppConfig } from "./config/app-config.js";
import { loadRuntime } from "./loader/runtime-loader.js";
import { REPL } from "./repl/repl.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  const command = process.argv[2] ?? "serve";

  if (command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  if (command === "--version" || command === "-V") {
    console.log(VERSION);
    return;
  }

  if (command !== "serve" && command !== "chat") {
    console.error(`Unknown command "${command}".`);
    printHelp();
    process.exitCode = 1;
    return;
  }

  const config = loadAppConfig();
  // pino lines would interleave with the conversation
  logger.level = command === "chat" && process.env.LOG_LEVEL === undefined ? "warn" : config.logLevel;

  const runtime = await loadRuntime(config);

  if (command === "chat") {
    const repl = new REPL({
      createLoop: runtime.createLoop,
      agentName: runtime.agent.name,
      version: VERSION,
    });
    await repl.start();
    process.exit(0);
  }

  const app = createApp({ createLoop: runtime.createLoop, corsOrigin: config.corsOrigin });
  const server = await listen(app, { port: config.port, host: config.host });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "shutting down");
    close(server).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

function printHelp(): void {
  console.log(`
pharmacy-agent v${VERSION}: pharmacy assistant chat service

Usage:
  pharmacy-agent [serve]     Start the HTTP server (POST /chat, GET /health, chat page at /)
  pharmacy-agent chat        Chat in the terminal
  pharmacy-agent --help      Show this help
  pharmacy-agent --version   Show version

Configuration is read from the environment and from a .env file:
  MODEL_PROVIDER       openai (default) or anthropic
  OPENAI_API_KEY       required for openai
  OPENAI_MODEL         default gpt-4o-mini
  OPENAI_BASE_URL      optional OpenAI-compatible endpoint
  ANTHROPIC_API_KEY    required for anthropic
  ANTHROPIC_MODEL      default claude-3-5-haiku-latest
  PORT, HOST           default 8000, 0.0.0.0
  AGENT_ID             persona to use, default pharmacy-assistant
  PERSONAS_DIR         directory of persona markdown files
  MAX_TOOL_ROUNDS      overrides the persona's maxRounds
  GATEWAY_TIMEOUT_MS   overrides the persona's gatewayTimeoutMs
  CORS_ORIGIN          allowed origin, default *
  LOG_LEVEL            pino level, default info

In the chat:
  /reset   Start a new conversation
  /exit    Quit
`);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error(
      "[pharmacy-agent] Fatal error:",
      err instanceof Error ? err.message : String(err)
    );
  }
  process.exit(1);
});
