/**
 * vector.ts - pgvector text format and cosine distance
 *
 * pgvector reads and writes vectors as `[0.1,0.2,...]`. Vectors are sent as
 * that literal with a `::vector` cast and read back through `embedding::text`,
 * so pg never needs a custom type parser.
 */

import { z } from "zod";
import { StoreUnavailableError } from "../errors";

const vectorSchema = z.array(z.number().finite()).nonempty();

export function formatVector(vector: readonly number[]): string {
  return `[${vector.join(",")}]`;
}

/**
 * Parses pgvector's text output. Null stays null (no embedding yet).
 *
 * @throws StoreUnavailableError when the column holds something that is not a vector
 */
export function parseVector(value: string | null): number[] | null {
  if (value === null) {
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(value);
  } catch (error) {
    throw new StoreUnavailableError("vector decode", error);
  }

  const parsed = vectorSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new StoreUnavailableError(
      "vector decode",
      new Error(`Column value is not a numeric vector: ${parsed.error.issues[0]?.message ?? "invalid"}`)
    );
  }
  return parsed.data;
}

/**
 * Cosine distance, 1 - cos(a, b), in [0, 2]. Matches pgvector's `<=>`.
 *
 * A zero vector has no direction; it is treated as orthogonal to everything
 * (distance 1) where pgvector would return NaN.
 */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 1;
  }

  const cosine = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return 1 - Math.min(1, Math.max(-1, cosine));
}
