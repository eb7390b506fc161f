import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./error/errors.js";
import { LOG_LEVELS } from "./util/logging.js";

const upper = (v: unknown) => (typeof v === "string" ? v.trim().toUpperCase() : v);
const lower = (v: unknown) => (typeof v === "string" ? v.trim().toLowerCase() : v);
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

export const SettingsSchema = z.object({
  openaiApiKey: z.string().trim().min(1, "OPENAI_API_KEY is required"),
  anthropicApiKey: z.string().trim().min(1, "ANTHROPIC_API_KEY is required"),
  defaultProvider: z.preprocess(lower, z.enum(["openai", "anthropic"])).default("openai"),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  maxTokens: z.coerce.number().int().positive().default(1000),
  costWarningThreshold: z.coerce.number().min(0).default(0.1),
  costLimitThreshold: z.coerce.number().min(0).default(1.0),
  logLevel: z.preprocess(upper, z.enum(LOG_LEVELS)).default("INFO"),
});

export type Settings = z.infer<typeof SettingsSchema>;

export type Env = Record<string, string | undefined>;

/**
 * Validates settings taken from an environment-style record.
 * Missing or blank optional values fall back to their defaults.
 */
export function parseSettings(env: Env): Settings {
  const result = SettingsSchema.safeParse({
    openaiApiKey: env.OPENAI_API_KEY ?? "",
    anthropicApiKey: env.ANTHROPIC_API_KEY ?? "",
    defaultProvider: blankToUndefined(env.DEFAULT_PROVIDER),
    temperature: blankToUndefined(env.TEMPERATURE),
    maxTokens: blankToUndefined(env.MAX_TOKENS),
    costWarningThreshold: blankToUndefined(env.COST_WARNING_THRESHOLD),
    costLimitThreshold: blankToUndefined(env.COST_LIMIT_THRESHOLD),
    logLevel: blankToUndefined(env.LOG_LEVEL),
  });

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/** Reads `.env`, then the process environment; `overrides` win over both. */
export function loadSettings(overrides: Env = {}): Settings {
  dotenv.config();
  return parseSettings({ ...process.env, ...overrides });
}

// "sk-abc…wxyz" style, for echoing keys back to the user
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return "*".repeat(secret.length);
  return `${secret.slice(0, 3)}…${secret.slice(-4)}`;
}
