/**
 * embedding/index.ts - Public API for embedding generation
 *
 * Import from here rather than from the individual files.
 */

export type { EmbeddingProvider, BatchEmbeddingOutcome } from "./types";
export type { EmbeddingsClient, OpenAIEmbeddingOptions } from "./openai-embedding";

export { composeEntityText } from "./compose";
export { EmbeddingGenerator } from "./generator";
export {
  OpenAIEmbedding,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_EMBEDDING_TIMEOUT_MS,
} from "./openai-embedding";
