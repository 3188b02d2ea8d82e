/**
 * service.ts - Composition root and the service facade
 *
 * What this file does:
 * Builds the process-wide objects (pg Pool, OpenAI client) exactly once
 * and wires them into the generator, resolver, engine and pipeline. Entry
 * points (CLI, MCP server, seed script) call createServices() at startup
 * and services.close() on the way out.
 *
 * SimilarityService is the surface the rest of an application calls:
 * - generateEmbeddingFor / generateEmbeddingForId: best-effort, never throw
 *   for content, provider or store failures
 * - similarTo / findSimilar: typed errors on failure, [] only for "no matches"
 * - backfill / backfillAll: counts, never abort on a single entity
 */

import type { Pool } from "pg";
import type { AppConfig } from "./config";
import { requireDatabaseUrl, requireOpenAIKey } from "./config";
import { AccessResolver } from "./access/resolver";
import { EmbeddingGenerator } from "./embedding/generator";
import { DisabledEmbeddingProvider } from "./embedding/disabled-provider";
import { OpenAIEmbedding } from "./embedding/openai-embedding";
import type { EmbeddingProvider } from "./embedding/types";
import {
  backfill,
  backfillAll,
  embedAfterCreate,
  embedAfterUpdate,
  generateEmbeddingFor,
  generateEmbeddingForId,
} from "./pipeline";
import type { BackfillOptions, BackfillResult, EmbeddingOutcome } from "./pipeline";
import {
  SimilarityEngine,
  type FindSimilarRequest,
  type SimilarityResult,
  type SimilarToRequest,
  type SimilarToResult,
} from "./similarity/engine";
import {
  createPool,
  PostgresAccessStore,
  PostgresEntityStore,
} from "./store/postgres-store";
import type {
  AccessStore,
  EmbeddableEntity,
  EntityKind,
  EntityStore,
} from "./store/types";

export interface SimilarityServiceDeps {
  store: EntityStore;
  accessStore: AccessStore;
  provider: EmbeddingProvider;
  defaultLimit?: number;
  backfillDefaults?: Pick<BackfillOptions, "batchSize" | "concurrency">;
  onProgress?: (message: string) => void;
}

export class SimilarityService {
  readonly store: EntityStore;
  readonly generator: EmbeddingGenerator;
  readonly resolver: AccessResolver;
  readonly engine: SimilarityEngine;
  private readonly backfillDefaults: Pick<BackfillOptions, "batchSize" | "concurrency">;
  private readonly onProgress?: (message: string) => void;

  constructor(deps: SimilarityServiceDeps) {
    this.store = deps.store;
    this.generator = new EmbeddingGenerator(deps.provider);
    this.resolver = new AccessResolver(deps.accessStore);
    this.engine = new SimilarityEngine(deps.store, this.resolver, {
      dimensions: deps.provider.dimensions,
      defaultLimit: deps.defaultLimit,
    });
    this.backfillDefaults = deps.backfillDefaults ?? {};
    this.onProgress = deps.onProgress;
  }

  generateEmbeddingFor(entity: EmbeddableEntity): Promise<EmbeddingOutcome> {
    return generateEmbeddingFor(entity, this.embedDeps());
  }

  generateEmbeddingForId(kind: EntityKind, id: string): Promise<EmbeddingOutcome> {
    return generateEmbeddingForId(kind, id, this.embedDeps());
  }

  embedAfterCreate(entity: EmbeddableEntity): Promise<EmbeddingOutcome> {
    return embedAfterCreate(entity, this.embedDeps());
  }

  embedAfterUpdate(before: EmbeddableEntity, after: EmbeddableEntity): Promise<EmbeddingOutcome> {
    return embedAfterUpdate(before, after, this.embedDeps());
  }

  similarTo<K extends EntityKind>(request: SimilarToRequest<K>): Promise<SimilarToResult<K>> {
    return this.engine.similarTo(request);
  }

  findSimilar<K extends EntityKind>(request: FindSimilarRequest<K>): Promise<SimilarityResult<K>[]> {
    return this.engine.findSimilar(request);
  }

  backfill(kind: EntityKind, options: BackfillOptions = {}): Promise<BackfillResult> {
    return backfill(kind, this.backfillDeps(), this.backfillOptions(options));
  }

  backfillAll(
    options: BackfillOptions = {}
  ): Promise<{ reports: BackfillResult; findings: BackfillResult }> {
    return backfillAll(this.backfillDeps(), this.backfillOptions(options));
  }

  private embedDeps() {
    return { store: this.store, generator: this.generator, onProgress: this.onProgress };
  }

  private backfillDeps() {
    return { store: this.store, generator: this.generator };
  }

  private backfillOptions(options: BackfillOptions): BackfillOptions {
    return {
      ...this.backfillDefaults,
      onProgress: this.onProgress,
      ...stripUndefined(options),
    };
  }
}

function stripUndefined(options: BackfillOptions): BackfillOptions {
  const result: BackfillOptions = {};
  if (options.batchSize !== undefined) result.batchSize = options.batchSize;
  if (options.concurrency !== undefined) result.concurrency = options.concurrency;
  if (options.dryRun !== undefined) result.dryRun = options.dryRun;
  if (options.onProgress !== undefined) result.onProgress = options.onProgress;
  return result;
}

/**
 * Everything an entry point needs, plus the one call that releases it.
 */
export interface Services {
  service: SimilarityService;
  pool: Pool;
  close(): Promise<void>;
}

export interface CreateServicesOptions {
  onProgress?: (message: string) => void;
  /** Replaces the OpenAI provider. */
  provider?: EmbeddingProvider;
  /**
   * When false, a missing OPENAI_API_KEY is allowed and any embedding
   * request fails with ConfigurationError. For search-only commands.
   */
  requireEmbeddings?: boolean;
}

/**
 * Builds the Postgres-backed service from config.
 *
 * @throws ConfigurationError when DATABASE_URL is missing, or when
 *   OPENAI_API_KEY is missing and embeddings are required
 */
export function createServices(config: AppConfig, options: CreateServicesOptions = {}): Services {
  const databaseUrl = requireDatabaseUrl(config);
  const provider = options.provider ?? createProvider(config, options.requireEmbeddings ?? true);

  const pool = createPool({
    connectionString: databaseUrl,
    statementTimeoutMs: config.dbStatementTimeoutMs,
  });

  const service = new SimilarityService({
    store: new PostgresEntityStore(pool),
    accessStore: new PostgresAccessStore(pool),
    provider,
    defaultLimit: config.similarityDefaultLimit,
    backfillDefaults: {
      batchSize: config.backfillBatchSize,
      concurrency: config.backfillConcurrency,
    },
    onProgress: options.onProgress,
  });

  return {
    service,
    pool,
    close: () => pool.end(),
  };
}

function createProvider(config: AppConfig, required: boolean): EmbeddingProvider {
  if (!required && !config.openaiApiKey) {
    return new DisabledEmbeddingProvider();
  }
  return new OpenAIEmbedding({
    apiKey: requireOpenAIKey(config),
    model: config.embeddingModel,
    timeoutMs: config.embeddingTimeoutMs,
  });
}
