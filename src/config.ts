/**
 * config.ts - Environment configuration
 *
 * What this file does:
 * Reads settings from environment variables (optionally loaded from a .env
 * file) and validates them with zod. Every entry point calls loadConfig()
 * once at startup and passes the result down; nothing else reads
 * process.env.
 *
 * Required settings depend on what runs:
 * - DATABASE_URL: needed for the Postgres store (migrate, backfill, similar)
 * - OPENAI_API_KEY: needed wherever embeddings are generated (backfill, embed)
 * Use requireDatabaseUrl() / requireOpenAIKey() at the point of need so a
 * similarity-only command doesn't demand an API key it never uses.
 */

import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import {
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_TIMEOUT_MS,
} from "./embedding/openai-embedding";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  EMBEDDING_TIMEOUT_MS: positiveInt(DEFAULT_EMBEDDING_TIMEOUT_MS),
  DB_STATEMENT_TIMEOUT_MS: positiveInt(30_000),
  SIMILARITY_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(50).default(5),
  BACKFILL_CONCURRENCY: positiveInt(1),
  BACKFILL_BATCH_SIZE: positiveInt(100),
  OTEL_TRACING_ENABLED: booleanFlag,
  OTEL_EXPORTER_TYPE: z.enum(["console", "otlp"]).default("console"),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
});

export interface AppConfig {
  databaseUrl?: string;
  openaiApiKey?: string;
  embeddingModel: string;
  embeddingTimeoutMs: number;
  dbStatementTimeoutMs: number;
  similarityDefaultLimit: number;
  backfillConcurrency: number;
  backfillBatchSize: number;
  tracing: {
    enabled: boolean;
    exporterType: "console" | "otlp";
    otlpEndpoint?: string;
  };
}

/**
 * Validates `env` and maps it to AppConfig.
 *
 * Empty strings are treated as unset, so `OPENAI_API_KEY=` in a .env file
 * behaves like a missing key rather than an invalid one.
 *
 * @throws ConfigurationError naming every variable that failed validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      cleaned[key] = value;
    }
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const e = parsed.data;
  if (e.OTEL_TRACING_ENABLED && e.OTEL_EXPORTER_TYPE === "otlp" && !e.OTEL_EXPORTER_OTLP_ENDPOINT) {
    throw new ConfigurationError(
      "Invalid configuration:\n  OTEL_EXPORTER_OTLP_ENDPOINT: required when OTEL_EXPORTER_TYPE=otlp"
    );
  }

  return {
    databaseUrl: e.DATABASE_URL,
    openaiApiKey: e.OPENAI_API_KEY,
    embeddingModel: e.EMBEDDING_MODEL,
    embeddingTimeoutMs: e.EMBEDDING_TIMEOUT_MS,
    dbStatementTimeoutMs: e.DB_STATEMENT_TIMEOUT_MS,
    similarityDefaultLimit: e.SIMILARITY_DEFAULT_LIMIT,
    backfillConcurrency: e.BACKFILL_CONCURRENCY,
    backfillBatchSize: e.BACKFILL_BATCH_SIZE,
    tracing: {
      enabled: e.OTEL_TRACING_ENABLED,
      exporterType: e.OTEL_EXPORTER_TYPE,
      otlpEndpoint: e.OTEL_EXPORTER_OTLP_ENDPOINT,
    },
  };
}

/**
 * Loads a .env file from the working directory into process.env, without
 * overriding variables that are already set.
 */
export function loadDotEnv(): void {
  loadEnv();
}

export function requireDatabaseUrl(config: AppConfig): string {
  if (!config.databaseUrl) {
    throw new ConfigurationError(
      "DATABASE_URL environment variable is not set. " +
        "Export it (e.g., postgres://localhost:5432/reports) or pass --database-url."
    );
  }
  return config.databaseUrl;
}

export function requireOpenAIKey(config: AppConfig): string {
  if (!config.openaiApiKey) {
    throw new ConfigurationError(
      "OPENAI_API_KEY environment variable is not set. Export your API key to generate embeddings."
    );
  }
  return config.openaiApiKey;
}
