#!/usr/bin/env node
/**
 * index.ts - CLI entry point for report-similarity
 *
 * What this file does:
 * The `report-similarity` command. Subcommands:
 *
 *   migrate                  apply sql/schema.sql to DATABASE_URL
 *   backfill [kind]          embed reports/findings that have no embedding
 *   similar <kind> <id>      list the entities most similar to one entity
 *   embed <kind> <id>        (re)generate one entity's embedding
 *
 * Every subcommand loads .env, validates config, and builds the services
 * once. Failures print a one-line message from describeError() and exit 1.
 */

import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { loadConfig, loadDotEnv, requireDatabaseUrl, type AppConfig } from "./config";
import { describeError } from "./errors";
import { createServices, type CreateServicesOptions, type Services } from "./service";
import { MAX_LIMIT, type SimilarityFilters } from "./similarity/engine";
import { toSimilarResponse } from "./similarity/response";
import { applySchema } from "./store/migrate";
import { createPool } from "./store/postgres-store";
import {
  ENTITY_KINDS,
  FINDING_CATEGORIES,
  FINDING_SEVERITIES,
  type EntityKind,
} from "./store/types";
import { formatSimilarResults, summarize } from "./tools/core";
import { initTracing, type TracingHandle } from "./tracing";

const log = (message: string): void => console.log(message); // eslint-disable-line no-console

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseKind(value: string): EntityKind {
  const parsed = z.enum(ENTITY_KINDS).safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Must be one of: ${ENTITY_KINDS.join(", ")}.`);
  }
  return parsed.data;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(",").map((s) => s.trim()).filter(Boolean)];
}

const similarOptionsSchema = z.object({
  user: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(MAX_LIMIT).optional(),
  enforceAccess: z.boolean(),
  status: z.array(z.string()).optional(),
  region: z.string().min(1).optional(),
  category: z.enum(FINDING_CATEGORIES).optional(),
  severity: z.enum(FINDING_SEVERITIES).optional(),
  json: z.boolean().optional(),
});

type SimilarOptions = z.infer<typeof similarOptionsSchema>;

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

interface GlobalOptions {
  databaseUrl?: string;
}

function configFrom(program: Command): AppConfig {
  loadDotEnv();
  const config = loadConfig();
  const globals = program.opts<GlobalOptions>();
  return globals.databaseUrl ? { ...config, databaseUrl: globals.databaseUrl } : config;
}

/**
 * Builds services, runs `fn`, and always releases the pool and flushes
 * spans, whether `fn` succeeds or throws.
 */
async function withServices(
  program: Command,
  options: CreateServicesOptions,
  fn: (services: Services, config: AppConfig) => Promise<void>
): Promise<void> {
  const config = configFrom(program);
  const tracing: TracingHandle = initTracing({ ...config.tracing, onProgress: log });
  const services = createServices(config, { onProgress: log, ...options });
  try {
    await fn(services, config);
  } finally {
    await services.close();
    await tracing.shutdown();
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("report-similarity")
    .description("Embeddings and access-controlled similarity search for cluster tuning reports")
    .version("0.1.0")
    .option("--database-url <url>", "Postgres connection string (default: DATABASE_URL env)");

  program
    .command("migrate")
    .description("Apply the database schema (idempotent)")
    .action(async () => {
      const config = configFrom(program);
      const pool = createPool({
        connectionString: requireDatabaseUrl(config),
        statementTimeoutMs: config.dbStatementTimeoutMs,
      });
      try {
        await applySchema(pool, { onProgress: log });
      } finally {
        await pool.end();
      }
    });

  program
    .command("backfill")
    .description("Generate embeddings for entities that don't have one")
    .argument("[kind]", "report or finding (default: both)", parseKind)
    .option("--concurrency <n>", "parallel embedding calls", parsePositiveInt)
    .option("--batch-size <n>", "ids fetched per page", parsePositiveInt)
    .option("--dry-run", "count candidates without embedding anything")
    .action(
      async (
        kind: EntityKind | undefined,
        options: { concurrency?: number; batchSize?: number; dryRun?: boolean }
      ) => {
        await withServices(program, { requireEmbeddings: !options.dryRun }, async ({ service }) => {
          const backfillOptions = {
            concurrency: options.concurrency,
            batchSize: options.batchSize,
            dryRun: options.dryRun ?? false,
          };
          const results = kind
            ? [await service.backfill(kind, backfillOptions)]
            : Object.values(await service.backfillAll(backfillOptions));

          log("");
          for (const result of results) {
            log(summarize(result));
          }
          if (results.some((result) => result.failed > 0)) {
            process.exitCode = 1;
          }
        });
      }
    );

  program
    .command("similar")
    .description("List the entities most similar to one report or finding")
    .argument("<kind>", "report or finding", parseKind)
    .argument("<id>", "id of the source entity")
    .option("--user <id>", "user the search runs as")
    .option("--limit <n>", `number of results (1-${MAX_LIMIT})`, parsePositiveInt)
    .option("--no-enforce-access", "search across all customers")
    .option("--status <status>", "status to include (repeatable or comma-separated)", collect)
    .option("--region <region>", "only match this region")
    .option("--category <category>", "findings only: only match this category")
    .option("--severity <severity>", "findings only: only match this severity")
    .option("--json", "print the JSON response instead of text")
    .action(async (kind: EntityKind, id: string, rawOptions: unknown) => {
      const parsed = similarOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        throw new InvalidArgumentError(
          parsed.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join("; ")
        );
      }
      const options: SimilarOptions = parsed.data;

      await withServices(program, { requireEmbeddings: false }, async ({ service }) => {
        const request = {
          entityId: id,
          limit: options.limit,
          caller: options.user,
          enforceAccess: options.enforceAccess,
          filters: toFilters(options),
        };

        if (kind === "report") {
          const result = await service.similarTo({ ...request, kind: "report" });
          log(options.json ? JSON.stringify(toSimilarResponse(result), null, 2) : formatSimilarResults(result));
          return;
        }

        const result = await service.similarTo({ ...request, kind: "finding" });
        if (options.json) {
          const items = result.results.map(({ entity, distance, similarity }) => ({
            id: entity.id,
            reportId: entity.reportId,
            title: entity.title,
            category: entity.category,
            severity: entity.severity,
            distance,
            similarity,
          }));
          log(JSON.stringify({ sourceId: result.source.id, count: items.length, results: items }, null, 2));
        } else {
          log(formatSimilarResults(result));
        }
      });
    });

  program
    .command("embed")
    .description("Generate (or regenerate) the embedding for one entity")
    .argument("<kind>", "report or finding", parseKind)
    .argument("<id>", "entity id")
    .action(async (kind: EntityKind, id: string) => {
      await withServices(program, {}, async ({ service }) => {
        const outcome = await service.generateEmbeddingForId(kind, id);
        if (outcome.ok) {
          log(`Embedded ${kind} ${id}.`);
        } else {
          process.exitCode = 1;
        }
      });
    });

  return program;
}

function toFilters(options: SimilarOptions): SimilarityFilters {
  const filters: SimilarityFilters = {};
  if (options.status !== undefined) filters.status = options.status;
  if (options.region !== undefined) filters.region = options.region;
  if (options.category !== undefined) filters.category = options.category;
  if (options.severity !== undefined) filters.severity = options.severity;
  return filters;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
  });
