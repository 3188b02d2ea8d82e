import { describe, it, expect } from "vitest";
import { loadConfig, requireDatabaseUrl, requireOpenAIKey } from "./config";
import { ConfigurationError } from "./errors";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: undefined,
      openaiApiKey: undefined,
      embeddingModel: "text-embedding-3-small",
      embeddingTimeoutMs: 30_000,
      dbStatementTimeoutMs: 30_000,
      similarityDefaultLimit: 5,
      backfillConcurrency: 1,
      backfillBatchSize: 100,
      tracing: { enabled: false, exporterType: "console", otlpEndpoint: undefined },
    });
  });

  it("reads and coerces every setting", () => {
    const config = loadConfig({
      DATABASE_URL: "postgres://localhost:5432/test",
      OPENAI_API_KEY: "test-secret",
      EMBEDDING_MODEL: "custom-model",
      EMBEDDING_TIMEOUT_MS: "5000",
      DB_STATEMENT_TIMEOUT_MS: "2000",
      SIMILARITY_DEFAULT_LIMIT: "10",
      BACKFILL_CONCURRENCY: "4",
      BACKFILL_BATCH_SIZE: "25",
      OTEL_TRACING_ENABLED: "1",
      OTEL_EXPORTER_TYPE: "otlp",
      OTEL_EXPORTER_OTLP_ENDPOINT: "http://localhost:4318",
    });

    expect(config).toEqual({
      databaseUrl: "postgres://localhost:5432/test",
      openaiApiKey: "test-secret",
      embeddingModel: "custom-model",
      embeddingTimeoutMs: 5000,
      dbStatementTimeoutMs: 2000,
      similarityDefaultLimit: 10,
      backfillConcurrency: 4,
      backfillBatchSize: 25,
      tracing: { enabled: true, exporterType: "otlp", otlpEndpoint: "http://localhost:4318" },
    });
  });

  it("treats empty strings as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "", BACKFILL_CONCURRENCY: "" });
    expect(config.openaiApiKey).toBeUndefined();
    expect(config.backfillConcurrency).toBe(1);
  });

  it("names every invalid variable", () => {
    expect(() =>
      loadConfig({ BACKFILL_CONCURRENCY: "zero", SIMILARITY_DEFAULT_LIMIT: "80" })
    ).toThrow(/Invalid configuration:\n {2}SIMILARITY_DEFAULT_LIMIT: .*\n {2}BACKFILL_CONCURRENCY: /);
  });

  it("rejects an unknown tracing flag", () => {
    expect(() => loadConfig({ OTEL_TRACING_ENABLED: "yes" })).toThrow(ConfigurationError);
  });

  it("requires an OTLP endpoint only when tracing is on", () => {
    expect(() => loadConfig({ OTEL_TRACING_ENABLED: "true", OTEL_EXPORTER_TYPE: "otlp" })).toThrow(
      "OTEL_EXPORTER_OTLP_ENDPOINT: required when OTEL_EXPORTER_TYPE=otlp"
    );
    expect(loadConfig({ OTEL_EXPORTER_TYPE: "otlp" }).tracing.enabled).toBe(false);
  });
});

describe("requireDatabaseUrl / requireOpenAIKey", () => {
  it("return the value when set", () => {
    const config = loadConfig({ DATABASE_URL: "postgres://db/test", OPENAI_API_KEY: "test-secret" });
    expect(requireDatabaseUrl(config)).toBe("postgres://db/test");
    expect(requireOpenAIKey(config)).toBe("test-secret");
  });

  it("throw ConfigurationError when missing", () => {
    const config = loadConfig({});
    expect(() => requireDatabaseUrl(config)).toThrow("DATABASE_URL environment variable is not set");
    expect(() => requireOpenAIKey(config)).toThrow(ConfigurationError);
  });
});
