import { z } from "zod";
import type { ModelProviderName } from "./errors.js";

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(8080, 1),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  JSON_BODY_LIMIT: z.string().min(1).default("8mb"),

  MODEL_PROVIDER: z.enum(["gemini", "anthropic", "openrouter", "dev"]).default("gemini"),
  GEMINI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  GEMINI_FLASH_MODEL: z.string().min(1).default("gemini-2.0-flash"),
  GEMINI_PRO_MODEL: z.string().min(1).default("gemini-1.5-pro"),
  CLAUDE_MODEL: z.string().min(1).default("claude-3-5-sonnet-latest"),
  OPENROUTER_MODEL: z.string().min(1).default("openai/gpt-4o"),

  BATCH_TOKEN_THRESHOLD: intFromEnv(6000, 50),
  BATCH_OVERLAP_LINES: intFromEnv(3, 0),
  BATCH_CONCURRENCY: intFromEnv(4, 1),

  MODEL_MAX_OUTPUT_TOKENS: intFromEnv(4096, 64),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  MODEL_TIMEOUT_MS: intFromEnv(60_000, 1000),
  MODEL_MAX_RETRIES: intFromEnv(2, 0),
  MODEL_RETRY_BASE_MS: intFromEnv(500, 0),

  PROJECT_STORE: z.enum(["memory", "file"]).default("memory"),
  DATA_DIR: z.string().min(1).default("./data")
});

export type ModelSettings = {
  provider: ModelProviderName;
  requestedProvider: ModelProviderName;
  apiKey?: string;
  flashModel: string;
  proModel: string;
  maxOutputTokens: number;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
  retryBaseMs: number;
};

export type BatchSettings = {
  tokenThreshold: number;
  overlapLines: number;
  concurrency: number;
};

export type AppConfig = {
  port: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  jsonBodyLimit: string;
  model: ModelSettings;
  batch: BatchSettings;
  projectStore: "memory" | "file";
  dataDir: string;
};

function pickApiKey(env: z.infer<typeof envSchema>, provider: ModelProviderName): string | undefined {
  const raw =
    provider === "gemini"
      ? env.GEMINI_API_KEY
      : provider === "anthropic"
        ? env.ANTHROPIC_API_KEY
        : provider === "openrouter"
          ? env.OPENROUTER_API_KEY
          : undefined;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * "flash" and "pro" are the aliases the editor UI sends. Providers other than Gemini
 * only have one configured default model, so both aliases land on it.
 */
function resolveAliases(env: z.infer<typeof envSchema>, provider: ModelProviderName): { flash: string; pro: string } {
  if (provider === "anthropic") {
    return { flash: env.CLAUDE_MODEL, pro: env.CLAUDE_MODEL };
  }
  if (provider === "openrouter") {
    return { flash: env.OPENROUTER_MODEL, pro: env.OPENROUTER_MODEL };
  }
  return { flash: env.GEMINI_FLASH_MODEL, pro: env.GEMINI_PRO_MODEL };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  let provider: ModelProviderName = env.MODEL_PROVIDER;
  const apiKey = pickApiKey(env, provider);
  if (provider !== "dev" && !apiKey) {
    provider = "dev";
  }
  const aliases = resolveAliases(env, env.MODEL_PROVIDER);

  return Object.freeze({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    jsonBodyLimit: env.JSON_BODY_LIMIT,
    model: {
      provider,
      requestedProvider: env.MODEL_PROVIDER,
      apiKey,
      flashModel: aliases.flash,
      proModel: aliases.pro,
      maxOutputTokens: env.MODEL_MAX_OUTPUT_TOKENS,
      temperature: env.MODEL_TEMPERATURE,
      timeoutMs: env.MODEL_TIMEOUT_MS,
      maxRetries: env.MODEL_MAX_RETRIES,
      retryBaseMs: env.MODEL_RETRY_BASE_MS
    },
    batch: {
      tokenThreshold: env.BATCH_TOKEN_THRESHOLD,
      overlapLines: env.BATCH_OVERLAP_LINES,
      concurrency: env.BATCH_CONCURRENCY
    },
    projectStore: env.PROJECT_STORE,
    dataDir: env.DATA_DIR
  });
}

export function resolveModelName(settings: ModelSettings, requested?: string): string {
  const value = requested?.trim();
  if (!value || value === "pro") {
    return settings.proModel;
  }
  if (value === "flash") {
    return settings.flashModel;
  }
  return value;
}
