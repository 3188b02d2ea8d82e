/**
 * types.ts - Entity, access, and store interfaces
 *
 * What this file does:
 * Defines the shapes the rest of the system codes against. The similarity
 * engine, backfill job, and access resolver only ever see these interfaces;
 * PostgresStore and InMemoryStore are interchangeable behind them.
 *
 * Key concepts:
 * - EmbeddableEntity: a Report or a Finding, discriminated by `kind`
 * - EntityStore: read entities, write embeddings, run filtered nearest-neighbour queries
 * - AccessStore: read-only lookup of user roles and customer grants
 */

/** Every stored embedding has exactly this many dimensions. */
export const EMBEDDING_DIMENSIONS = 1536;

/**
 * The distance the stores rank by. pgvector's `<=>` and the in-process store
 * both compute cosine distance, which ranges from 0 (same direction) to 2
 * (opposite). The similarity score formula assumes this range.
 */
export const DISTANCE_METRIC = "cosine" as const;

export const ENTITY_KINDS = ["report", "finding"] as const;
export type EntityKind = (typeof ENTITY_KINDS)[number];

export const REPORT_STATUSES = ["draft", "in_review", "published", "archived"] as const;
export type ReportStatus = (typeof REPORT_STATUSES)[number];

export const FINDING_STATUSES = ["open", "acknowledged", "resolved", "false_positive"] as const;
export type FindingStatus = (typeof FINDING_STATUSES)[number];

export const FINDING_CATEGORIES = [
  "performance",
  "configuration",
  "security",
  "reliability",
  "monitoring",
] as const;
export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

export const FINDING_SEVERITIES = ["low", "medium", "high", "critical"] as const;
export type FindingSeverity = (typeof FINDING_SEVERITIES)[number];

export const USER_ROLES = ["admin", "analyst", "reviewer", "viewer"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const ACCESS_LEVELS = ["read", "write", "admin"] as const;
export type AccessLevel = (typeof ACCESS_LEVELS)[number];

/**
 * Fields shared by both entity kinds: identity, tenancy, and the vector.
 *
 * `embedding` is null until generated. Once present it reflects the text at
 * generation time; later edits leave it stale until something regenerates it.
 */
interface EntityBase {
  id: string;
  title: string;
  customerId: string | null;
  region: string | null;
  piiFlag: boolean;
  embedding: number[] | null;
  createdAt: Date;
}

export interface Report extends EntityBase {
  kind: "report";
  clusterId: string;
  description: string | null;
  status: ReportStatus;
  crdbVersion: string | null;
}

export interface Finding extends EntityBase {
  kind: "finding";
  reportId: string;
  description: string;
  category: FindingCategory;
  severity: FindingSeverity;
  status: FindingStatus;
  tags: string[];
}

export type EmbeddableEntity = Report | Finding;

/** Maps an entity kind to its entity type, e.g. EntityOf<"report"> = Report. */
export type EntityOf<K extends EntityKind> = Extract<EmbeddableEntity, { kind: K }>;

export interface User {
  id: string;
  name: string;
  email: string | null;
  role: UserRole;
}

export interface AccessGrant {
  userId: string;
  customerId: string;
  accessLevel: AccessLevel;
  grantedBy: string | null;
}

/**
 * Predicates for a nearest-neighbour query, already resolved by the engine.
 *
 * The store applies exactly what it is given: the engine decides the default
 * statuses and tenancy scope, the store turns them into SQL (or a scan).
 * Every query also excludes `pii_flag = true` and rows with no embedding;
 * neither is optional.
 */
export interface CandidateQuery<K extends EntityKind = EntityKind> {
  kind: K;
  vector: number[];
  limit: number;
  /** Only these statuses; undefined means no status restriction. */
  statuses?: readonly string[];
  /** Statuses that never match, applied after `statuses`. */
  excludedStatuses?: readonly string[];
  /** Restrict to these customers; undefined means every customer. */
  customerIds?: readonly string[];
  region?: string;
  category?: FindingCategory;
  severity?: FindingSeverity;
  excludeId?: string;
}

/** A candidate row paired with its raw distance from the query vector. */
export interface Candidate<K extends EntityKind = EntityKind> {
  entity: EntityOf<K>;
  distance: number;
}

/**
 * Persistence for reports and findings, including their embeddings.
 *
 * All methods reject with StoreUnavailableError when the backend fails.
 */
export interface EntityStore {
  getEntity<K extends EntityKind>(kind: K, id: string): Promise<EntityOf<K> | null>;

  /** Writes one entity's embedding in a single statement. Returns false if the row is gone. */
  setEmbedding(kind: EntityKind, id: string, embedding: number[]): Promise<boolean>;

  /**
   * Ids of entities of `kind` with no embedding, oldest first.
   * `excludeIds` lets a caller page past rows it has already tried.
   */
  listMissingEmbeddings(
    kind: EntityKind,
    options: { limit: number; excludeIds?: readonly string[] }
  ): Promise<string[]>;

  /** Counts entities of `kind` still lacking an embedding. */
  countMissingEmbeddings(kind: EntityKind): Promise<number>;

  /**
   * Filtered nearest neighbours, distance ascending, ties broken by id
   * ascending, at most `query.limit` rows.
   */
  findNearest<K extends EntityKind>(query: CandidateQuery<K>): Promise<Candidate<K>[]>;

  /** The distance the store ranks by, as a named capability. */
  distanceTo(a: number[], b: number[]): Promise<number>;
}

/**
 * Read-only access-control data.
 */
export interface AccessStore {
  getUser(userId: string): Promise<User | null>;
  listGrants(userId: string): Promise<AccessGrant[]>;
}
