/**
 * backfill.ts - Embed every entity that is still missing an embedding
 *
 * What this file does:
 * Finds reports (or findings) with `embedding IS NULL` and embeds them one
 * by one. It is safe to run repeatedly: a run after a complete run finds
 * nothing and reports attempted = 0.
 *
 * How it pages:
 * Ids come from the store in pages of `batchSize`, oldest first. After each
 * page the listing starts over from the top, because rows embedded in
 * that page no longer match. Ids that failed during this run are excluded
 * from later pages, so one bad entity can't stall the run and is never
 * retried twice in the same run.
 *
 * Each entity commits on its own. A failure is logged as a warning and
 * counted without aborting the run. The exception is a configuration
 * failure (embeddings disabled), which would fail every entity the same
 * way: the run stops with ConfigurationError.
 */

import { ConfigurationError } from "../errors";
import { withSpan } from "../tracing";
import type { EntityKind } from "../store/types";
import { generateEmbeddingForId, type EmbedEntityDeps } from "./embed-entity";
import type { BackfillOptions, BackfillResult, EmbeddingOutcome } from "./types";

export const DEFAULT_BACKFILL_BATCH_SIZE = 100;
export const DEFAULT_BACKFILL_CONCURRENCY = 1;

export type BackfillDeps = Omit<EmbedEntityDeps, "onProgress">;

/**
 * Embeds every entity of `kind` that has no embedding yet.
 *
 * @returns Counts of what the run attempted, and how that went
 * @throws StoreUnavailableError if the candidate listing itself fails
 * @throws ConfigurationError if embedding generation is disabled
 */
export async function backfill(
  kind: EntityKind,
  deps: BackfillDeps,
  options: BackfillOptions = {}
): Promise<BackfillResult> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  const batchSize = options.batchSize ?? DEFAULT_BACKFILL_BATCH_SIZE;
  const concurrency = options.concurrency ?? DEFAULT_BACKFILL_CONCURRENCY;
  const dryRun = options.dryRun ?? false;

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  return withSpan(
    "embedding.backfill",
    {
      "backfill.kind": kind,
      "backfill.batch_size": batchSize,
      "backfill.concurrency": concurrency,
      "backfill.dry_run": dryRun,
    },
    async (span) => {
      const candidates = await deps.store.countMissingEmbeddings(kind);
      const result: BackfillResult = {
        kind,
        candidates,
        attempted: 0,
        succeeded: 0,
        failed: 0,
        dryRun,
      };

      if (candidates === 0) {
        onProgress(`No ${kind}s need embeddings.`);
        return result;
      }

      if (dryRun) {
        const ids = await deps.store.listMissingEmbeddings(kind, { limit: batchSize });
        onProgress(`Dry run: ${candidates} ${kind}(s) without embeddings.`);
        for (const id of ids) {
          onProgress(`  ${kind} ${id}`);
        }
        if (candidates > ids.length) {
          onProgress(`  ... and ${candidates - ids.length} more`);
        }
        return result;
      }

      onProgress(`Backfilling ${candidates} ${kind}(s) without embeddings...`);

      const failedIds = new Set<string>();
      const seen = new Set<string>();
      const entityDeps: EmbedEntityDeps = { ...deps, onProgress };

      for (;;) {
        const page = await deps.store.listMissingEmbeddings(kind, {
          limit: batchSize,
          excludeIds: [...failedIds],
        });
        const fresh = page.filter((id) => !seen.has(id));
        if (fresh.length === 0) {
          break;
        }

        await forEachWithConcurrency(fresh, concurrency, async (id) => {
          seen.add(id);
          result.attempted++;
          const outcome: EmbeddingOutcome = await generateEmbeddingForId(kind, id, entityDeps);
          if (outcome.ok) {
            result.succeeded++;
          } else if (outcome.reason === "configuration") {
            throw new ConfigurationError(outcome.message);
          } else {
            result.failed++;
            failedIds.add(id);
          }
        });

        onProgress(
          `Embedded ${result.succeeded} of ${candidates} ${kind}(s)` +
            (result.failed > 0 ? ` (${result.failed} failed)` : "")
        );
      }

      span.setAttribute("backfill.attempted", result.attempted);
      span.setAttribute("backfill.succeeded", result.succeeded);
      span.setAttribute("backfill.failed", result.failed);

      onProgress(
        `Backfill complete for ${kind}s: ${result.attempted} attempted, ${result.succeeded} succeeded, ${result.failed} failed.`
      );
      return result;
    }
  );
}

/**
 * Backfills reports, then findings.
 */
export async function backfillAll(
  deps: BackfillDeps,
  options: BackfillOptions = {}
): Promise<{ reports: BackfillResult; findings: BackfillResult }> {
  const reports = await backfill("report", deps, options);
  const findings = await backfill("finding", deps, options);
  return { reports, findings };
}

/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 *
 * Workers pull the next index from a shared cursor, so a slow item doesn't
 * hold up the rest of its batch. Once a worker rejects, no lane starts
 * another item.
 */
export async function forEachWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  let cursor = 0;
  let stopped = false;
  const lanes = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (!stopped && cursor < items.length) {
      const item = items[cursor++];
      try {
        await worker(item);
      } catch (error) {
        stopped = true;
        throw error;
      }
    }
  });
  await Promise.all(lanes);
}
