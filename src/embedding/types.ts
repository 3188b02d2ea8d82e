/**
 * Text-to-vector provider contract.
 *
 * Implementations return vectors of exactly `dimensions` finite numbers, one
 * per input and in input order, or reject with ProviderError.
 */
export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

/** One entry of an embedBatch() result, aligned with its input. */
export type BatchEmbeddingOutcome =
  | { ok: true; vector: number[] }
  | { ok: false; error: Error };
