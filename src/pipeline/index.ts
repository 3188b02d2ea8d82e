/**
 * pipeline/index.ts - Public API for writing embeddings
 *
 * Usage:
 *   import { backfill, embedAfterCreate } from "./pipeline";
 */

export {
  backfill,
  backfillAll,
  forEachWithConcurrency,
  DEFAULT_BACKFILL_BATCH_SIZE,
  DEFAULT_BACKFILL_CONCURRENCY,
} from "./backfill";
export type { BackfillDeps } from "./backfill";
export {
  embedAfterCreate,
  embedAfterUpdate,
  generateEmbeddingFor,
  generateEmbeddingForId,
} from "./embed-entity";
export type { EmbedEntityDeps } from "./embed-entity";
export type {
  BackfillOptions,
  BackfillResult,
  EmbeddingFailureReason,
  EmbeddingOutcome,
} from "./types";
