/**
 * tools/core - Framework-agnostic tool logic
 *
 * Schemas, descriptions and execute functions. The MCP layer (tools/mcp)
 * and the CLI both call into these.
 */

export {
  findSimilarReports,
  findSimilarReportsSchema,
  findSimilarReportsDescription,
  findSimilarFindings,
  findSimilarFindingsSchema,
  findSimilarFindingsDescription,
} from "./find-similar";
export type {
  FindSimilarReportsInput,
  FindSimilarFindingsInput,
  ToolResult,
} from "./find-similar";

export {
  backfillEmbeddings,
  backfillEmbeddingsSchema,
  backfillEmbeddingsDescription,
  summarize,
} from "./backfill-embeddings";
export type { BackfillEmbeddingsInput } from "./backfill-embeddings";

export { formatSimilarResults, describeSimilarity } from "./format-results";
