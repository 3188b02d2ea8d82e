/**
 * openai-embedding.ts - OpenAI embedding provider
 *
 * What this file does:
 * Implements EmbeddingProvider on top of OpenAI's embeddings endpoint.
 * Report and finding text goes in, 1536-dimensional vectors come out.
 *
 * Why text-embedding-3-small?
 * - It accepts a `dimensions` parameter, so the vector length always matches
 *   the VECTOR(1536) column
 * - Cheap enough to embed every report and finding on creation
 *
 * Retries:
 * The SDK's built-in retries are switched off (maxRetries: 0). A failure
 * becomes a ProviderError with a `retryable` hint and the caller decides.
 * Entity creation logs and moves on; backfill counts the failure and picks
 * the entity up on its next run.
 */

import OpenAI from "openai";
import { ConfigurationError, ProviderError } from "../errors";
import { EMBEDDING_DIMENSIONS } from "../store/types";
import type { EmbeddingProvider } from "./types";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_EMBEDDING_TIMEOUT_MS = 30_000;

/**
 * The slice of the OpenAI SDK client this provider calls.
 *
 * Tests pass a fake with this shape instead of a real client.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      dimensions?: number;
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}

export interface OpenAIEmbeddingOptions {
  /** Defaults to OPENAI_API_KEY. Ignored when `client` is given. */
  apiKey?: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  client?: EmbeddingsClient;
}

/**
 * Usage:
 *   const provider = new OpenAIEmbedding({ apiKey: config.openaiApiKey });
 *   const [a, b] = await provider.embedMany(["slow range scans", "hot ranges"]);
 *   // a.length === 1536
 */
export class OpenAIEmbedding implements EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  private readonly client: EmbeddingsClient;

  constructor(options: OpenAIEmbeddingOptions = {}) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS;

    if (options.client) {
      this.client = options.client;
      return;
    }

    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        "OpenAI API key is required. Set OPENAI_API_KEY environment variable " +
          "or pass apiKey in options."
      );
    }
    this.client = new OpenAI({
      apiKey,
      timeout: options.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  /**
   * Sends every text in a single request and returns the vectors in input
   * order. The response is re-sorted by `index` before it is checked.
   */
  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let response: Awaited<ReturnType<EmbeddingsClient["embeddings"]["create"]>>;
    try {
      response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        dimensions: this.dimensions,
      });
    } catch (error) {
      throw toProviderError(error);
    }

    if (!Array.isArray(response.data) || response.data.length !== texts.length) {
      throw new ProviderError(
        `OpenAI returned ${response.data?.length ?? 0} embeddings for ${texts.length} inputs`
      );
    }

    const sorted = [...response.data].sort((a, b) => a.index - b.index);
    return sorted.map((item, position) => {
      if (item.index !== position) {
        throw new ProviderError(`OpenAI response is missing the embedding for input ${position}`);
      }
      assertVector(item.embedding, this.dimensions);
      return item.embedding;
    });
  }
}

/**
 * Throws ProviderError unless `vector` is exactly `dimensions` finite numbers.
 */
export function assertVector(vector: unknown, dimensions: number): asserts vector is number[] {
  if (!Array.isArray(vector)) {
    throw new ProviderError("Embedding is not an array");
  }
  if (vector.length !== dimensions) {
    throw new ProviderError(
      `Embedding has ${vector.length} dimensions, expected ${dimensions}`
    );
  }
  for (const value of vector) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ProviderError("Embedding contains a non-finite value");
    }
  }
}

/**
 * Maps an SDK failure to ProviderError.
 *
 * Rate limits (429), server errors (5xx) and failures with no HTTP status
 * (connection refused, timeout) are retryable. Anything else, auth
 * included, is not.
 */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);
  const retryable = status === undefined || status === 429 || status >= 500;
  return new ProviderError(message, { cause: error, retryable, status });
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}
