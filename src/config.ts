// Wellness Retention Engine - Configuration
// Environment variables are validated once at startup; everything downstream
// receives the typed AppConfig.

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { stripQuotes } from "./utils.js";

const envSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: "OPENAI_API_KEY is required" })
    .transform(stripQuotes)
    .pipe(z.string().min(1, "OPENAI_API_KEY must not be empty")),
  API_HOST: z.string().min(1).default("0.0.0.0"),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  COACH_MODEL: z.string().min(1).default("gpt-4o-mini"),
  DATA_DIR: z.string().min(1).default("data"),
  MODELS_DIR: z.string().min(1).default("ml_models"),
  PLAN_STORE_CAPACITY: z.coerce.number().int().min(1).default(1000),
});

export interface AppConfig {
  openaiApiKey: string;
  host: string;
  port: number;
  embeddingModel: string;
  coachModel: string;
  dataDir: string;
  modelsDir: string;
  planStoreCapacity: number;
}

/**
 * Parses configuration from an environment map (normally `process.env`).
 * Empty strings count as unset so that blank lines in .env fall back to defaults.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 && !issue.message.includes(String(issue.path[0]))
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }

  const parsed = result.data;
  return {
    openaiApiKey: parsed.OPENAI_API_KEY,
    host: parsed.API_HOST,
    port: parsed.API_PORT,
    embeddingModel: parsed.EMBEDDING_MODEL,
    coachModel: parsed.COACH_MODEL,
    dataDir: parsed.DATA_DIR,
    modelsDir: parsed.MODELS_DIR,
    planStoreCapacity: parsed.PLAN_STORE_CAPACITY,
  };
}
