/**
 * format-results.ts - Formats similarity results as readable text
 *
 * What this file does:
 * Turns a SimilarToResult into the plain-text block the CLI prints and the
 * MCP tools return. Both surfaces share this formatter so their output
 * stays identical.
 *
 * Example output:
 *   Found 2 reports similar to "Slow range scans on orders" (5f0c...):
 *
 *   1. Hot ranges after bulk import (distance: 0.18, very similar; similarity 0.91)
 *      id=9a1e..., cluster=prod-east, status=published, region=US
 *
 *   2. ...
 */

import type { EmbeddableEntity, EntityKind } from "../../store/types";
import type { SimilarityResult, SimilarToResult } from "../../similarity/engine";

export function formatSimilarResults<K extends EntityKind>(result: SimilarToResult<K>): string {
  const { source, results } = result;
  const noun = source.kind === "report" ? "report" : "finding";

  if (results.length === 0) {
    return `No ${noun}s similar to "${source.title}" (${source.id}) that you have access to.`;
  }

  const header = `Found ${results.length} ${noun}${results.length === 1 ? "" : "s"} similar to "${source.title}" (${source.id}):\n`;
  const formatted = results.map((item, index) => formatOne(item, index));
  return header + "\n" + formatted.join("\n\n");
}

function formatOne<K extends EntityKind>(item: SimilarityResult<K>, index: number): string {
  const label = describeSimilarity(item.distance);
  return [
    `${index + 1}. ${item.entity.title} (distance: ${item.distance.toFixed(2)}, ${label}; similarity ${item.similarity.toFixed(2)})`,
    `   ${formatDetails(item.entity)}`,
  ].join("\n");
}

/**
 * Converts a cosine distance into a human-readable label.
 *
 * - 0.0-0.3: very similar
 * - 0.3-0.6: similar
 * - 0.6-1.0: somewhat related
 * - 1.0-2.0: weak match
 */
export function describeSimilarity(distance: number): string {
  if (distance < 0.3) return "very similar";
  if (distance < 0.6) return "similar";
  if (distance < 1.0) return "somewhat related";
  return "weak match";
}

function formatDetails(entity: EmbeddableEntity): string {
  const pairs: Array<[string, string | null]> =
    entity.kind === "report"
      ? [
          ["id", entity.id],
          ["cluster", entity.clusterId],
          ["status", entity.status],
          ["region", entity.region],
        ]
      : [
          ["id", entity.id],
          ["report", entity.reportId],
          ["category", entity.category],
          ["severity", entity.severity],
          ["status", entity.status],
          ["region", entity.region],
        ];

  return pairs
    .filter((pair): pair is [string, string] => pair[1] !== null && pair[1] !== "")
    .map(([key, value]) => `${key}=${value}`)
    .join(", ");
}
