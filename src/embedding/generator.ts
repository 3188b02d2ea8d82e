/**
 * generator.ts - Embedding generation for text and entities
 *
 * What this file does:
 * Sits between callers and the EmbeddingProvider. It rejects empty text
 * before any network call and checks every vector that comes back. It also
 * turns a batch of texts into one outcome per input, so a single bad entry
 * never hides the good ones.
 *
 * Failures propagate: EmptyContentError for blank input, ConfigurationError
 * from a disabled provider, ProviderError for everything the provider gets
 * wrong. Nothing here retries.
 */

import { ConfigurationError, EmptyContentError, ProviderError } from "../errors";
import { withSpan } from "../tracing";
import type { EmbeddableEntity } from "../store/types";
import { composeEntityText } from "./compose";
import { assertVector, toProviderError } from "./openai-embedding";
import type { BatchEmbeddingOutcome, EmbeddingProvider } from "./types";

export class EmbeddingGenerator {
  constructor(private readonly provider: EmbeddingProvider) {}

  get dimensions(): number {
    return this.provider.dimensions;
  }

  /**
   * Embeds one non-empty text.
   *
   * @throws EmptyContentError when the text is blank (no provider call is made)
   * @throws ProviderError when the provider fails or returns a malformed vector
   */
  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      throw new EmptyContentError();
    }

    return withSpan(
      "embedding.generate",
      { "embedding.model": this.provider.model, "embedding.input_count": 1 },
      async () => {
        const vector = await this.callProvider(() => this.provider.embed(text));
        assertVector(vector, this.provider.dimensions);
        return vector;
      }
    );
  }

  /**
   * Embeds many texts, returning exactly one outcome per input in input order.
   *
   * Blank entries get an EmptyContentError outcome and are not sent. The rest
   * go to the provider in one call. If that call fails, every sent entry
   * carries the same ProviderError.
   */
  async embedBatch(texts: string[]): Promise<BatchEmbeddingOutcome[]> {
    const outcomes = texts.map((): BatchEmbeddingOutcome => ({
      ok: false,
      error: new EmptyContentError(),
    }));

    const sendIndexes: number[] = [];
    texts.forEach((text, index) => {
      if (text.trim()) sendIndexes.push(index);
    });
    if (sendIndexes.length === 0) {
      return outcomes;
    }

    return withSpan(
      "embedding.generate_batch",
      {
        "embedding.model": this.provider.model,
        "embedding.input_count": texts.length,
        "embedding.sent_count": sendIndexes.length,
      },
      async () => {
        let vectors: number[][];
        try {
          vectors = await this.callProvider(() =>
            this.provider.embedMany(sendIndexes.map((index) => texts[index]))
          );
          if (vectors.length !== sendIndexes.length) {
            throw new ProviderError(
              `Provider returned ${vectors.length} embeddings for ${sendIndexes.length} inputs`
            );
          }
        } catch (error) {
          const failure = error instanceof ConfigurationError ? error : toProviderError(error);
          for (const index of sendIndexes) {
            outcomes[index] = { ok: false, error: failure };
          }
          return outcomes;
        }

        sendIndexes.forEach((inputIndex, position) => {
          const vector = vectors[position];
          try {
            assertVector(vector, this.provider.dimensions);
            outcomes[inputIndex] = { ok: true, vector };
          } catch (error) {
            outcomes[inputIndex] = { ok: false, error: toProviderError(error) };
          }
        });
        return outcomes;
      }
    );
  }

  /**
   * Embeds the composed text of a report or finding.
   *
   * @throws EmptyContentError when the entity composes to blank text
   */
  async embedEntity(entity: EmbeddableEntity): Promise<number[]> {
    const text = composeEntityText(entity);
    if (!text.trim()) {
      throw new EmptyContentError(`text for ${entity.kind} ${entity.id}`);
    }
    return this.embed(text);
  }

  private async callProvider<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw toProviderError(error);
    }
  }
}
