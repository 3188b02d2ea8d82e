/**
 * find-similar core - "Which reports/findings look like this one?"
 *
 * What this file does:
 * Holds the input schemas, descriptions and execute functions behind the
 * find_similar_reports and find_similar_findings tools. The MCP layer only
 * registers them; the CLI `similar` command calls the same functions.
 *
 * The caller's user id scopes the search: admins see every customer, others
 * only customers they hold a grant for. PII-flagged entities never appear.
 */

import { z } from "zod";
import { describeError } from "../../errors";
import type { SimilarityService } from "../../service";
import { MAX_LIMIT, type SimilarityFilters } from "../../similarity/engine";
import { toSimilarResponse, type SimilarReportsResponse } from "../../similarity/response";
import {
  FINDING_CATEGORIES,
  FINDING_SEVERITIES,
  FINDING_STATUSES,
  REPORT_STATUSES,
} from "../../store/types";
import { formatSimilarResults } from "./format-results";

const commonFields = {
  id: z.string().min(1).describe("Id of the source entity to find neighbours for"),
  userId: z
    .string()
    .min(1)
    .optional()
    .describe(
      "User the search runs as. Non-admins only see customers they are granted. Required unless enforceAccess is false."
    ),
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_LIMIT)
    .optional()
    .describe(`Maximum number of results (1-${MAX_LIMIT}, default 5)`),
  enforceAccess: z
    .boolean()
    .optional()
    .describe("Apply customer access control (default: true)"),
  region: z.string().optional().describe("Only match entities in this region (e.g., 'US', 'EU')"),
};

export const findSimilarReportsSchema = z.object({
  ...commonFields,
  status: z
    .array(z.enum(REPORT_STATUSES))
    .optional()
    .describe("Report statuses to include (default: published and in_review)"),
});

export const findSimilarFindingsSchema = z.object({
  ...commonFields,
  status: z
    .array(z.enum(FINDING_STATUSES))
    .optional()
    .describe("Finding statuses to include. false_positive findings are always excluded."),
  category: z.enum(FINDING_CATEGORIES).optional().describe("Only match this finding category"),
  severity: z.enum(FINDING_SEVERITIES).optional().describe("Only match this finding severity"),
});

export type FindSimilarReportsInput = z.infer<typeof findSimilarReportsSchema>;
export type FindSimilarFindingsInput = z.infer<typeof findSimilarFindingsSchema>;

export const findSimilarReportsDescription = `Find past cluster tuning reports that resemble a given report.

Ranks reports by cosine distance between their embeddings. By default only
published and in_review reports are considered. Results are limited to
customers the requesting user can access, and PII-flagged reports are never
returned.

Use this to reuse analysis from earlier reports on similar clusters.`;

export const findSimilarFindingsDescription = `Find findings that resemble a given finding, across all reports.

Ranks findings by cosine distance between their embeddings. Findings marked
false_positive are never returned. Optional filters narrow by category,
severity, status and region. Results respect customer access control.`;

/**
 * Result of a tool execution: the text to show, and whether it failed.
 */
export interface ToolResult {
  text: string;
  isError: boolean;
}

/**
 * Report searches also carry the JSON response shape for `similar --json`
 * and UI consumers.
 */
export async function findSimilarReports(
  service: SimilarityService,
  input: FindSimilarReportsInput
): Promise<ToolResult & { response?: SimilarReportsResponse }> {
  try {
    const result = await service.similarTo({
      kind: "report",
      entityId: input.id,
      limit: input.limit,
      caller: input.userId,
      enforceAccess: input.enforceAccess ?? true,
      filters: reportFilters(input),
    });
    return { text: formatSimilarResults(result), isError: false, response: toSimilarResponse(result) };
  } catch (error) {
    return { text: `Error: ${describeError(error)}`, isError: true };
  }
}

export async function findSimilarFindings(
  service: SimilarityService,
  input: FindSimilarFindingsInput
): Promise<ToolResult> {
  try {
    const result = await service.similarTo({
      kind: "finding",
      entityId: input.id,
      limit: input.limit,
      caller: input.userId,
      enforceAccess: input.enforceAccess ?? true,
      filters: findingFilters(input),
    });
    return { text: formatSimilarResults(result), isError: false };
  } catch (error) {
    return { text: `Error: ${describeError(error)}`, isError: true };
  }
}

function reportFilters(input: FindSimilarReportsInput): SimilarityFilters {
  const filters: SimilarityFilters = {};
  if (input.status !== undefined) filters.status = input.status;
  if (input.region !== undefined) filters.region = input.region;
  return filters;
}

function findingFilters(input: FindSimilarFindingsInput): SimilarityFilters {
  const filters: SimilarityFilters = {};
  if (input.status !== undefined) filters.status = input.status;
  if (input.region !== undefined) filters.region = input.region;
  if (input.category !== undefined) filters.category = input.category;
  if (input.severity !== undefined) filters.severity = input.severity;
  return filters;
}
