/**
 * JSON shape returned to "similar reports" consumers (the report detail
 * page, `similar --json`). Ids and titles only; vectors never leave the
 * service.
 */

import type { SimilarToResult } from "./engine";

export interface SimilarReportItem {
  id: string;
  title: string;
  clusterId: string;
  status: string;
  similarityScore: number;
  distance: number;
  createdAt: string;
}

export interface SimilarReportsResponse {
  sourceId: string;
  sourceTitle: string;
  count: number;
  results: SimilarReportItem[];
}

export function toSimilarResponse(result: SimilarToResult<"report">): SimilarReportsResponse {
  const results = result.results.map(({ entity, distance, similarity }) => ({
    id: entity.id,
    title: entity.title,
    clusterId: entity.clusterId,
    status: entity.status,
    similarityScore: roundScore(similarity),
    distance: roundScore(distance),
    createdAt: entity.createdAt.toISOString(),
  }));

  return {
    sourceId: result.source.id,
    sourceTitle: result.source.title,
    count: results.length,
    results,
  };
}

/** Rounds to four decimals. */
function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
