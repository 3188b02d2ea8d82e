/**
 * engine.ts - Access-controlled nearest-neighbour search
 *
 * What this file does:
 * Turns a "find things like this" request into one filtered store query and
 * scores what comes back. The engine owns every rule about what a caller
 * may see. The store only applies the predicates it is handed.
 *
 * Rules applied to every query:
 * 1. The query vector must be present and exactly D finite numbers
 * 2. Tenancy: with enforceAccess, a non-admin caller sees only customers
 *    they hold a grant for (no grants = no results, no store call). Admins,
 *    or enforceAccess=false, get no tenancy predicate.
 * 3. PII-flagged entities never match (enforced in the store, unconditionally)
 * 4. Status: reports default to published + in_review; findings never
 *    include false_positive, whatever status filter is given
 * 5. Optional exact filters: region (both kinds), category and severity
 *    (findings only)
 * 6. The source entity (excludeId) never matches itself
 *
 * Ranking is cosine distance ascending, ties by id, truncated to `limit`.
 * Each result carries the raw distance and a similarity score in [0, 1].
 *
 * Nothing here catches errors. A store failure propagates as
 * StoreUnavailableError and is never turned into an empty list.
 */

import {
  EmbeddingMissingError,
  EntityNotFoundError,
  InvalidQueryError,
} from "../errors";
import { withSpan } from "../tracing";
import type { AccessResolver } from "../access/resolver";
import {
  EMBEDDING_DIMENSIONS,
  FINDING_STATUSES,
  REPORT_STATUSES,
  type CandidateQuery,
  type EntityKind,
  type EntityOf,
  type EntityStore,
  type FindingCategory,
  type FindingSeverity,
} from "../store/types";

export const DEFAULT_LIMIT = 5;
export const MAX_LIMIT = 50;

/** Statuses a report query matches when no status filter is given. */
export const DEFAULT_REPORT_STATUSES = ["published", "in_review"] as const;

/** Finding statuses that never match, whatever the filter says. */
export const EXCLUDED_FINDING_STATUSES = ["false_positive"] as const;

export interface SimilarityFilters {
  /** Replaces the default status set (reports) or narrows it (findings). */
  status?: readonly string[];
  region?: string;
  /** Findings only. */
  category?: FindingCategory;
  /** Findings only. */
  severity?: FindingSeverity;
}

export interface FindSimilarRequest<K extends EntityKind = EntityKind> {
  kind: K;
  queryVector: number[] | null | undefined;
  limit?: number;
  excludeId?: string;
  /** User id of whoever is asking. Required for a scoped query. */
  caller?: string;
  enforceAccess: boolean;
  filters?: SimilarityFilters;
}

export interface SimilarToRequest<K extends EntityKind = EntityKind> {
  kind: K;
  entityId: string;
  limit?: number;
  caller?: string;
  enforceAccess: boolean;
  filters?: SimilarityFilters;
}

export interface SimilarityResult<K extends EntityKind = EntityKind> {
  entity: EntityOf<K>;
  /** Cosine distance, 0 (same direction) to 2 (opposite). */
  distance: number;
  /** max(0, 1 - distance / 2). */
  similarity: number;
}

export interface SimilarToResult<K extends EntityKind = EntityKind> {
  source: EntityOf<K>;
  results: SimilarityResult<K>[];
}

export interface SimilarityEngineOptions {
  dimensions?: number;
  defaultLimit?: number;
}

/**
 * Maps a cosine distance to a similarity score in [0, 1].
 *
 * Only meaningful for cosine distance, whose range is [0, 2].
 */
export function similarityFromDistance(distance: number): number {
  return Math.max(0, 1 - distance / 2);
}

export class SimilarityEngine {
  private readonly dimensions: number;
  private readonly defaultLimit: number;

  constructor(
    private readonly store: EntityStore,
    private readonly resolver: AccessResolver,
    options: SimilarityEngineOptions = {}
  ) {
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS;
    this.defaultLimit = options.defaultLimit ?? DEFAULT_LIMIT;
  }

  /**
   * Finds the entities of `kind` nearest to `queryVector` that the caller
   * may see.
   *
   * @throws EmbeddingMissingError when no query vector is given
   * @throws InvalidQueryError for a malformed vector, limit or filter
   * @throws StoreUnavailableError when the store fails
   */
  async findSimilar<K extends EntityKind>(
    request: FindSimilarRequest<K>
  ): Promise<SimilarityResult<K>[]> {
    const vector = this.checkVector(request.queryVector);
    const limit = this.checkLimit(request.limit);
    const filters = request.filters ?? {};
    checkFilters(request.kind, filters);

    return withSpan(
      "similarity.find_similar",
      {
        "similarity.kind": request.kind,
        "similarity.limit": limit,
        "similarity.enforce_access": request.enforceAccess,
        "similarity.filters": Object.keys(filters).sort().join(","),
      },
      async (span) => {
        const customerIds = await this.tenancyFor(request);
        if (customerIds !== undefined && customerIds.length === 0) {
          span.setAttribute("similarity.result_count", 0);
          return [];
        }

        const query: CandidateQuery<K> = {
          kind: request.kind,
          vector,
          limit,
          customerIds,
          excludeId: request.excludeId,
          region: filters.region,
          ...statusPredicates(request.kind, filters.status),
          ...(request.kind === "finding"
            ? { category: filters.category, severity: filters.severity }
            : {}),
        };

        const candidates = await this.store.findNearest(query);
        span.setAttribute("similarity.result_count", candidates.length);
        return candidates.map((candidate) => ({
          entity: candidate.entity,
          distance: candidate.distance,
          similarity: similarityFromDistance(candidate.distance),
        }));
      }
    );
  }

  /**
   * Loads a source entity and finds the entities most similar to it,
   * excluding the source itself.
   *
   * @throws EntityNotFoundError when the source does not exist
   * @throws EmbeddingMissingError when the source has no embedding yet
   */
  async similarTo<K extends EntityKind>(request: SimilarToRequest<K>): Promise<SimilarToResult<K>> {
    return withSpan(
      "similarity.similar_to",
      { "similarity.kind": request.kind, "similarity.source_id": request.entityId },
      async () => {
        const source = await this.store.getEntity(request.kind, request.entityId);
        if (!source) {
          throw new EntityNotFoundError(request.kind, request.entityId);
        }
        if (!source.embedding) {
          throw new EmbeddingMissingError(request.kind, request.entityId);
        }

        const results = await this.findSimilar({
          kind: request.kind,
          queryVector: source.embedding,
          limit: request.limit,
          excludeId: request.entityId,
          caller: request.caller,
          enforceAccess: request.enforceAccess,
          filters: request.filters,
        });
        return { source, results };
      }
    );
  }

  /**
   * Customer ids the query is restricted to, or undefined for no tenancy
   * predicate. A scoped query with no caller resolves as an unknown user.
   */
  private async tenancyFor(request: FindSimilarRequest): Promise<string[] | undefined> {
    if (!request.enforceAccess) {
      return undefined;
    }
    if (request.caller === undefined) {
      return [];
    }
    const scope = await this.resolver.resolveScope(request.caller);
    return scope.kind === "all" ? undefined : scope.customerIds;
  }

  private checkVector(vector: number[] | null | undefined): number[] {
    if (vector === null || vector === undefined) {
      throw new EmbeddingMissingError();
    }
    if (vector.length !== this.dimensions) {
      throw new InvalidQueryError(
        `Query vector has ${vector.length} dimensions, expected ${this.dimensions}`
      );
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new InvalidQueryError("Query vector contains a non-finite value");
    }
    return vector;
  }

  private checkLimit(limit: number | undefined): number {
    const value = limit ?? this.defaultLimit;
    if (!Number.isInteger(value) || value < 1 || value > MAX_LIMIT) {
      throw new InvalidQueryError(`limit must be an integer from 1 to ${MAX_LIMIT}, got ${value}`);
    }
    return value;
  }
}

function checkFilters(kind: EntityKind, filters: SimilarityFilters): void {
  if (kind === "report" && (filters.category !== undefined || filters.severity !== undefined)) {
    throw new InvalidQueryError("category and severity filters apply to findings only");
  }
  if (filters.status !== undefined) {
    const allowed: readonly string[] = kind === "report" ? REPORT_STATUSES : FINDING_STATUSES;
    const unknown = filters.status.filter((status) => !allowed.includes(status));
    if (unknown.length > 0) {
      throw new InvalidQueryError(
        `Unknown ${kind} status: ${unknown.join(", ")}. Valid statuses: ${allowed.join(", ")}`
      );
    }
    if (filters.status.length === 0) {
      throw new InvalidQueryError("status filter must name at least one status");
    }
  }
}

function statusPredicates(
  kind: EntityKind,
  status: readonly string[] | undefined
): Pick<CandidateQuery, "statuses" | "excludedStatuses"> {
  if (kind === "report") {
    return { statuses: status ?? DEFAULT_REPORT_STATUSES };
  }
  return { statuses: status, excludedStatuses: EXCLUDED_FINDING_STATUSES };
}
