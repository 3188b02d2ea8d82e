/**
 * MCP tool registration
 *
 * Registers three tools on an McpServer:
 * - find_similar_reports: reports that resemble a given report
 * - find_similar_findings: findings that resemble a given finding
 * - backfill_embeddings: generate embeddings that are still missing
 *
 * Each handler is wrapped with withToolTracing, so one tool call is one
 * "execute_tool <name>" span with the store and embedding spans under it.
 * The tool logic lives in tools/core and is shared with the CLI.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SimilarityService } from "../../service";
import { withToolTracing } from "../../tracing/tool-tracing";
import {
  backfillEmbeddings,
  backfillEmbeddingsDescription,
  backfillEmbeddingsSchema,
  findSimilarFindings,
  findSimilarFindingsDescription,
  findSimilarFindingsSchema,
  findSimilarReports,
  findSimilarReportsDescription,
  findSimilarReportsSchema,
  type BackfillEmbeddingsInput,
  type FindSimilarFindingsInput,
  type FindSimilarReportsInput,
  type ToolResult,
} from "../core";

export const TOOL_NAMES = [
  "find_similar_reports",
  "find_similar_findings",
  "backfill_embeddings",
] as const;

function toMcpResult(result: ToolResult) {
  return {
    content: [{ type: "text" as const, text: result.text }],
    isError: result.isError,
  };
}

/**
 * Registers every tool against `service`.
 */
export function registerTools(server: McpServer, service: SimilarityService): void {
  server.registerTool(
    "find_similar_reports",
    {
      description: findSimilarReportsDescription,
      inputSchema: findSimilarReportsSchema.shape,
    },
    withToolTracing("find_similar_reports", async (input: FindSimilarReportsInput) =>
      toMcpResult(await findSimilarReports(service, input))
    )
  );

  server.registerTool(
    "find_similar_findings",
    {
      description: findSimilarFindingsDescription,
      inputSchema: findSimilarFindingsSchema.shape,
    },
    withToolTracing("find_similar_findings", async (input: FindSimilarFindingsInput) =>
      toMcpResult(await findSimilarFindings(service, input))
    )
  );

  server.registerTool(
    "backfill_embeddings",
    {
      description: backfillEmbeddingsDescription,
      inputSchema: backfillEmbeddingsSchema.shape,
    },
    withToolTracing("backfill_embeddings", async (input: BackfillEmbeddingsInput) =>
      toMcpResult(await backfillEmbeddings(service, input))
    )
  );
}
