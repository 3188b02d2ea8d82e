/**
 * embed-entity.ts - Generate and persist one entity's embedding
 *
 * What this file does:
 * The follow-up step after a report or finding is created or edited:
 * compose its text, embed it, and write the vector onto the row. The entity
 * is already saved by the time this runs. A failure here leaves it without
 * an embedding (backfill picks it up later) and never undoes the create.
 *
 * The provider call happens before, and outside of, the single UPDATE that
 * stores the vector.
 */

import {
  ConfigurationError,
  EmptyContentError,
  ProviderError,
  StoreUnavailableError,
  describeError,
} from "../errors";
import { composeEntityText } from "../embedding/compose";
import type { EmbeddingGenerator } from "../embedding/generator";
import type { EmbeddableEntity, EntityKind, EntityStore } from "../store/types";
import type { EmbeddingFailureReason, EmbeddingOutcome } from "./types";

export interface EmbedEntityDeps {
  store: EntityStore;
  generator: EmbeddingGenerator;
  /** Receives a warning line for each failure. Defaults to stdout. */
  onProgress?: (message: string) => void;
}

/**
 * Embeds `entity` and stores the vector.
 *
 * Never throws for empty content, provider, store or configuration
 * failures (a disabled provider); those come back as
 * `{ ok: false, reason, message }`. Anything else is a bug and
 * propagates.
 */
export async function generateEmbeddingFor(
  entity: EmbeddableEntity,
  deps: EmbedEntityDeps
): Promise<EmbeddingOutcome> {
  const onProgress = deps.onProgress ?? console.log; // eslint-disable-line no-console

  try {
    const vector = await deps.generator.embedEntity(entity);
    const written = await deps.store.setEmbedding(entity.kind, entity.id, vector);
    if (!written) {
      return failure(entity.kind, entity.id, "not_found", `${entity.kind} ${entity.id} no longer exists`, onProgress);
    }
    return { ok: true, kind: entity.kind, id: entity.id, status: "embedded" };
  } catch (error) {
    const reason = failureReason(error);
    if (reason === null) {
      throw error;
    }
    return failure(entity.kind, entity.id, reason, describeError(error), onProgress);
  }
}

/**
 * Loads an entity by id, then embeds it.
 */
export async function generateEmbeddingForId(
  kind: EntityKind,
  id: string,
  deps: EmbedEntityDeps
): Promise<EmbeddingOutcome> {
  const onProgress = deps.onProgress ?? console.log; // eslint-disable-line no-console

  let entity: EmbeddableEntity | null;
  try {
    entity = await deps.store.getEntity(kind, id);
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      return failure(kind, id, "store_unavailable", describeError(error), onProgress);
    }
    throw error;
  }
  if (!entity) {
    return failure(kind, id, "not_found", `No ${kind} with id ${id}`, onProgress);
  }
  return generateEmbeddingFor(entity, deps);
}

/**
 * Runs after an entity has been persisted. The outcome is for the caller to
 * log or surface; it is not part of the create result.
 */
export async function embedAfterCreate(
  entity: EmbeddableEntity,
  deps: EmbedEntityDeps
): Promise<EmbeddingOutcome> {
  return generateEmbeddingFor(entity, deps);
}

/**
 * Runs after an entity has been edited. Re-embeds only when the composed
 * text changed, or when the entity has no embedding yet.
 */
export async function embedAfterUpdate(
  before: EmbeddableEntity,
  after: EmbeddableEntity,
  deps: EmbedEntityDeps
): Promise<EmbeddingOutcome> {
  const unchanged = composeEntityText(before) === composeEntityText(after);
  const hasEmbedding = after.embedding !== null || before.embedding !== null;
  if (unchanged && hasEmbedding) {
    return { ok: true, kind: after.kind, id: after.id, status: "unchanged" };
  }
  return generateEmbeddingFor(after, deps);
}

function failureReason(error: unknown): EmbeddingFailureReason | null {
  if (error instanceof EmptyContentError) return "empty_content";
  if (error instanceof ProviderError) return "provider_error";
  if (error instanceof StoreUnavailableError) return "store_unavailable";
  if (error instanceof ConfigurationError) return "configuration";
  return null;
}

function failure(
  kind: EntityKind,
  id: string,
  reason: EmbeddingFailureReason,
  message: string,
  onProgress: (message: string) => void
): EmbeddingOutcome {
  onProgress(`Warning: no embedding for ${kind} ${id} (${message})`);
  return { ok: false, kind, id, reason, message };
}
