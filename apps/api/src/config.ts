import path from "path";
import { ConfigError } from "@reelgen/shared";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Settings = Readonly<{
  openaiApiKey: string;
  openaiBaseUrl: string;
  openaiTimeoutMs: number;
  llmModel: string;
  embeddingModel: string;
  temperature: number;
  maxTokens: number;
  llmRetry: Readonly<{ maxAttempts: number; baseDelayMs: number; maxDelayMs: number }>;
  generationMaxAttempts: number;
  topK: number;
  indexPath: string;
  port: number;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  adminToken?: string;
}>;

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw && raw.trim() ? raw.trim() : fallback;
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  opts: { min?: number; max?: number; integer?: boolean } = {},
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigError(name, `expected a number, got "${raw}"`);
  if (opts.integer && !Number.isInteger(value))
    throw new ConfigError(name, `expected an integer, got "${raw}"`);
  if (opts.min !== undefined && value < opts.min)
    throw new ConfigError(name, `must be >= ${opts.min}`);
  if (opts.max !== undefined && value > opts.max)
    throw new ConfigError(name, `must be <= ${opts.max}`);
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = readString(env, "LOG_LEVEL", "info").toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) throw new ConfigError("LOG_LEVEL", `expected one of ${LOG_LEVELS.join(", ")}`);
  return level;
}

/** Reads every tunable once. Call after `dotenv/config` has populated the env. */
export function loadSettings(env: Env = process.env): Settings {
  const openaiApiKey = readString(env, "OPENAI_API_KEY", "");
  if (!openaiApiKey) throw new ConfigError("OPENAI_API_KEY", "is required");

  const baseDelayMs = readNumber(env, "LLM_RETRY_BASE_MS", 1000, { min: 0, integer: true });
  const maxDelayMs = readNumber(env, "LLM_RETRY_MAX_MS", 8000, { min: 0, integer: true });
  if (maxDelayMs < baseDelayMs)
    throw new ConfigError("LLM_RETRY_MAX_MS", "must be >= LLM_RETRY_BASE_MS");

  const adminToken = readString(env, "ADMIN_TOKEN", "");

  return Object.freeze({
    openaiApiKey,
    openaiBaseUrl: readString(env, "OPENAI_BASE_URL", "https://api.openai.com/v1"),
    openaiTimeoutMs: readNumber(env, "OPENAI_TIMEOUT_MS", 30000, { min: 1, integer: true }),
    llmModel: readString(env, "OPENAI_LLM_MODEL", "gpt-4-turbo-preview"),
    embeddingModel: readString(env, "OPENAI_EMBEDDING_MODEL", "text-embedding-3-small"),
    temperature: readNumber(env, "LLM_TEMPERATURE", 0.7, { min: 0, max: 2 }),
    maxTokens: readNumber(env, "LLM_MAX_TOKENS", 1500, { min: 1, integer: true }),
    llmRetry: Object.freeze({
      maxAttempts: readNumber(env, "LLM_MAX_ATTEMPTS", 3, { min: 1, max: 10, integer: true }),
      baseDelayMs,
      maxDelayMs,
    }),
    generationMaxAttempts: readNumber(env, "GENERATION_MAX_ATTEMPTS", 2, {
      min: 1,
      max: 5,
      integer: true,
    }),
    topK: readNumber(env, "RAG_TOP_K", 5, { min: 0, max: 50, integer: true }),
    indexPath: path.resolve(readString(env, "INDEX_PATH", "data/reel_index.json")),
    port: readNumber(env, "PORT", 4000, { min: 0, max: 65535, integer: true }),
    requestTimeoutMs: readNumber(env, "REQUEST_TIMEOUT_MS", 120000, { min: 1000, integer: true }),
    logLevel: readLogLevel(env),
    adminToken: adminToken || undefined,
  });
}
