/**
 * Environment Configuration
 *
 * Parses process.env once into a typed config object.
 * Every tunable the query engine reads at runtime lives here; fixed values
 * live in ./constants.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),

  DATABASE_URL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),

  ANSWER_MODEL: z.string().default("gpt-4o"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),

  QUERY_SEED: z.coerce.number().int().default(42),
  QUERY_TOP_K: z.coerce.number().int().min(1).max(100).default(10),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  ENTITY_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  MEETINGS_SOURCE_URL: z.string().url().optional(),

  AUDIT_LOG_DIR: z.string().default("audit_logs"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_TO_FILE: booleanFlag.default("true"),
  LOG_DIR: z.string().default("logs"),

  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`[Config] Invalid environment: ${fromZodError(parsed.error).message}`);
  }
  return parsed.data;
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
