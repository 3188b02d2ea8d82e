import { ConfigurationError } from "../errors";
import { EMBEDDING_DIMENSIONS } from "../store/types";
import type { EmbeddingProvider } from "./types";

/**
 * Stands in for the real provider in processes that only search stored
 * vectors (e.g. `similar` without OPENAI_API_KEY). Any embedding request is
 * a configuration error.
 */
export class DisabledEmbeddingProvider implements EmbeddingProvider {
  readonly model = "disabled";

  constructor(readonly dimensions: number = EMBEDDING_DIMENSIONS) {}

  async embed(): Promise<number[]> {
    throw this.error();
  }

  async embedMany(): Promise<number[][]> {
    throw this.error();
  }

  private error(): ConfigurationError {
    return new ConfigurationError(
      "Embedding generation is disabled: OPENAI_API_KEY is not set."
    );
  }
}
