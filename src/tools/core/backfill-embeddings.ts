/**
 * backfill-embeddings core - Generate missing embeddings on demand
 *
 * Exposed as the backfill_embeddings MCP tool. Progress lines are collected
 * and returned with the summary instead of being printed, because stdout
 * belongs to the MCP transport.
 */

import { z } from "zod";
import { describeError } from "../../errors";
import type { BackfillResult } from "../../pipeline";
import type { SimilarityService } from "../../service";
import type { ToolResult } from "./find-similar";

export const backfillEmbeddingsSchema = z.object({
  kind: z
    .enum(["report", "finding", "all"])
    .optional()
    .describe("Which entities to backfill (default: all)"),
  dryRun: z
    .boolean()
    .optional()
    .describe("Only count entities missing embeddings; embed nothing"),
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(16)
    .optional()
    .describe("Parallel embedding calls (default: 1)"),
});

export type BackfillEmbeddingsInput = z.infer<typeof backfillEmbeddingsSchema>;

export const backfillEmbeddingsDescription = `Generate embeddings for reports and findings that don't have one yet.

Safe to run repeatedly: entities that already have an embedding are skipped,
and a failure on one entity is counted without stopping the run. Use dryRun
to see how many entities are waiting.`;

export async function backfillEmbeddings(
  service: SimilarityService,
  input: BackfillEmbeddingsInput
): Promise<ToolResult> {
  const log: string[] = [];
  const options = {
    dryRun: input.dryRun,
    concurrency: input.concurrency,
    onProgress: (message: string) => log.push(message),
  };

  try {
    const results: BackfillResult[] = [];
    const kind = input.kind ?? "all";
    if (kind === "all") {
      const both = await service.backfillAll(options);
      results.push(both.reports, both.findings);
    } else {
      results.push(await service.backfill(kind, options));
    }

    const summary = results.map(summarize).join("\n");
    return { text: [...log, "", summary].join("\n"), isError: false };
  } catch (error) {
    return { text: [...log, `Error: ${describeError(error)}`].join("\n"), isError: true };
  }
}

export function summarize(result: BackfillResult): string {
  if (result.dryRun) {
    return `${result.kind}: ${result.candidates} without embeddings (dry run, nothing written)`;
  }
  return `${result.kind}: ${result.attempted} attempted, ${result.succeeded} succeeded, ${result.failed} failed`;
}
