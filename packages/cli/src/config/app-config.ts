import { z } from "zod";
import type { ProviderConfig } from "@pharmacy-agent/providers";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const positiveInt = z.coerce.number().int().positive();

export const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
    HOST: z.string().min(1).default("0.0.0.0"),

    MODEL_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_BASE_URL: z.string().url().optional(),
    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: z.string().min(1).default("claude-3-5-haiku-latest"),

    AGENT_ID: z.string().min(1).default("pharmacy-assistant"),
    PERSONAS_DIR: optionalString,
    // Override the persona's own limits when set
    MAX_TOOL_ROUNDS: positiveInt.optional(),
    GATEWAY_TIMEOUT_MS: positiveInt.optional(),

    CORS_ORIGIN: z.string().min(1).default("*"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  })
  .superRefine((env, ctx) => {
    const key = env.MODEL_PROVIDER === "openai" ? "OPENAI_API_KEY" : "ANTHROPIC_API_KEY";
    if (!env[key]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `${key} is required when MODEL_PROVIDER=${env.MODEL_PROVIDER}`,
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  port: number;
  host: string;
  provider: ProviderConfig;
  agentId: string;
  personasDir?: string | undefined;
  maxToolRounds?: number | undefined;
  gatewayTimeoutMs?: number | undefined;
  corsOrigin: string;
  logLevel: Env["LOG_LEVEL"];
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Validates environment variables into an AppConfig. Reads only the
 * object it is given; callers load `.env` files beforehand.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return toAppConfig(result.data);
}

function toAppConfig(env: Env): AppConfig {
  const provider: ProviderConfig =
    env.MODEL_PROVIDER === "openai"
      ? {
          provider: "openai",
          apiKey: env.OPENAI_API_KEY ?? "",
          defaultModel: env.OPENAI_MODEL,
          ...(env.OPENAI_BASE_URL !== undefined ? { baseURL: env.OPENAI_BASE_URL } : {}),
        }
      : {
          provider: "anthropic",
          apiKey: env.ANTHROPIC_API_KEY ?? "",
          defaultModel: env.ANTHROPIC_MODEL,
        };

  return {
    port: env.PORT,
    host: env.HOST,
    provider,
    agentId: env.AGENT_ID,
    ...(env.PERSONAS_DIR !== undefined ? { personasDir: env.PERSONAS_DIR } : {}),
    ...(env.MAX_TOOL_ROUNDS !== undefined ? { maxToolRounds: env.MAX_TOOL_ROUNDS } : {}),
    ...(env.GATEWAY_TIMEOUT_MS !== undefined ? { gatewayTimeoutMs: env.GATEWAY_TIMEOUT_MS } : {}),
    corsOrigin: env.CORS_ORIGIN,
    logLevel: env.LOG_LEVEL,
  };
}
