/**
 * types.ts - Shared types for the embedding pipeline
 *
 * Two paths write embeddings:
 * - embed-entity.ts: one entity, right after it is created or edited
 * - backfill.ts: every entity still missing an embedding, in pages
 *
 * Both report per-entity results as EmbeddingOutcome and never throw for
 * content, provider, configuration or store failures. Backfill alone turns
 * a configuration failure into an aborted run.
 */

import type { EntityKind } from "../store/types";

export type EmbeddingFailureReason =
  | "empty_content"
  | "provider_error"
  | "store_unavailable"
  | "not_found"
  | "configuration";

export type EmbeddingOutcome =
  | { ok: true; kind: EntityKind; id: string; status: "embedded" | "unchanged" }
  | { ok: false; kind: EntityKind; id: string; reason: EmbeddingFailureReason; message: string };

export interface BackfillOptions {
  /** Parallel provider calls. Defaults to 1 (sequential). */
  concurrency?: number;
  /** Ids fetched per page. Defaults to 100. */
  batchSize?: number;
  /** Count and list candidates without embedding or writing. */
  dryRun?: boolean;
  /**
   * Progress callback for long-running operations.
   * Defaults to stdout.
   */
  onProgress?: (message: string) => void;
}

export interface BackfillResult {
  kind: EntityKind;
  /** Entities lacking an embedding when the run started. */
  candidates: number;
  attempted: number;
  succeeded: number;
  failed: number;
  dryRun: boolean;
}
