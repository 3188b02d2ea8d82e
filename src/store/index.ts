/**
 * store/index.ts - Public API for entity and access storage
 *
 * Usage:
 *   import { createPool, PostgresEntityStore, type EntityStore } from "./store";
 */

export type {
  AccessGrant,
  AccessLevel,
  AccessStore,
  Candidate,
  CandidateQuery,
  EmbeddableEntity,
  EntityKind,
  EntityOf,
  EntityStore,
  Finding,
  FindingCategory,
  FindingSeverity,
  FindingStatus,
  Report,
  ReportStatus,
  User,
  UserRole,
} from "./types";
export {
  DISTANCE_METRIC,
  EMBEDDING_DIMENSIONS,
  ENTITY_KINDS,
  FINDING_CATEGORIES,
  FINDING_SEVERITIES,
  FINDING_STATUSES,
  REPORT_STATUSES,
  USER_ROLES,
} from "./types";

export type { Queryable, PoolOptions } from "./postgres-store";
export {
  createPool,
  PostgresAccessStore,
  PostgresEntityStore,
} from "./postgres-store";
export { InMemoryStore } from "./memory-store";
export { applySchema } from "./migrate";
export { cosineDistance, formatVector, parseVector } from "./vector";
