import { ConfigError } from "./errors";
import { safeStr, truthyStr } from "./utils/text";

// ============================
// Config
// ============================
export type AiConfig = {
  apiKey: string;
  model: string;
  baseURL: string | undefined;
  temperature: number;
  topP: number;
  maxOutputTokens: number;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  startupProbe: boolean;
};

export type AppConfig = {
  port: number;
  maxUploadBytes: number;
  maxPromptChars: number;
  corsOrigins: "*" | string[];
  ai: AiConfig;
};

export const DEFAULT_MODEL = "gpt-4.1-mini";

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  bounds: { min: number; max: number; integer?: boolean },
  problems: string[]
): number {
  const raw = safeStr(env[name]);
  if (!raw) return fallback;

  const n = Number(raw);
  if (!Number.isFinite(n) || n < bounds.min || n > bounds.max || (bounds.integer && !Number.isInteger(n))) {
    const kind = bounds.integer ? "an integer" : "a number";
    problems.push(`${name} must be ${kind} between ${bounds.min} and ${bounds.max} (got "${raw}")`);
    return fallback;
  }
  return n;
}

function readOrigins(raw: string): "*" | string[] {
  const parts = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (parts.length === 0 || parts.includes("*")) return "*";
  return parts;
}

/**
 * Reads the process environment once into an immutable config object.
 * Throws ConfigError listing every invalid or missing variable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const apiKey = safeStr(env.OPENAI_API_KEY);
  if (!apiKey) problems.push("OPENAI_API_KEY is required");

  const ai: AiConfig = Object.freeze({
    apiKey,
    model: safeStr(env.AI_MODEL) || DEFAULT_MODEL,
    baseURL: safeStr(env.AI_BASE_URL) || undefined,
    temperature: readNumber(env, "AI_TEMPERATURE", 0.1, { min: 0, max: 2 }, problems),
    topP: 0.8,
    maxOutputTokens: readNumber(env, "AI_MAX_OUTPUT_TOKENS", 1024, { min: 64, max: 32_768, integer: true }, problems),
    timeoutMs: readNumber(env, "AI_TIMEOUT_MS", 60_000, { min: 1_000, max: 600_000, integer: true }, problems),
    maxAttempts: readNumber(env, "AI_MAX_ATTEMPTS", 3, { min: 1, max: 10, integer: true }, problems),
    retryBaseDelayMs: readNumber(env, "AI_RETRY_BASE_DELAY_MS", 1_000, { min: 0, max: 60_000, integer: true }, problems),
    startupProbe: truthyStr(env.AI_STARTUP_PROBE),
  });

  const config: AppConfig = Object.freeze({
    port: readNumber(env, "PORT", 5000, { min: 0, max: 65_535, integer: true }, problems),
    maxUploadBytes: readNumber(env, "MAX_UPLOAD_BYTES", 16 * 1024 * 1024, { min: 1024, max: 100 * 1024 * 1024, integer: true }, problems),
    maxPromptChars: readNumber(env, "MAX_PROMPT_CHARS", 60_000, { min: 1_000, max: 1_000_000, integer: true }, problems),
    corsOrigins: readOrigins(safeStr(env.CORS_ORIGINS) || "*"),
    ai,
  });

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}
