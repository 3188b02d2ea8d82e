/**
 * postgres-store.ts - PostgreSQL + pgvector implementation of the stores
 *
 * What this file does:
 * Implements EntityStore and AccessStore with raw SQL over a pg Pool. This
 * is the only file that talks to the database; everything else codes
 * against the interfaces in types.ts.
 *
 * How the vector query works:
 * The embedding lives on the entity row as VECTOR(1536). A similarity query
 * is one SELECT that applies every predicate (PII, status, tenancy, region,
 * category, severity, excluded id) and orders by `embedding <=> $1::vector`,
 * pgvector's cosine distance. Postgres does the exact distance computation
 * over the filtered rows.
 *
 * Errors:
 * Any pg failure is wrapped once, here, as StoreUnavailableError with the
 * original error as `cause`.
 */

import { Pool, type QueryResultRow } from "pg";
import { StoreUnavailableError } from "../errors";
import { ENTITY_DECODERS, toGrant, toUser } from "./rows";
import type {
  AccessGrant,
  AccessStore,
  Candidate,
  CandidateQuery,
  EntityKind,
  EntityOf,
  EntityStore,
  User,
} from "./types";
import { formatVector } from "./vector";

/**
 * The part of pg's Pool (or PoolClient) the stores use.
 *
 * Tests pass a fake that records the SQL and returns canned rows.
 */
export interface Queryable {
  query<R extends QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

export interface PoolOptions {
  connectionString: string;
  statementTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

/**
 * Creates the process-wide pg Pool.
 *
 * statement_timeout bounds every query server-side, so a slow similarity
 * query fails with a pg error instead of hanging the caller.
 */
export function createPool(options: PoolOptions): Pool {
  return new Pool({
    connectionString: options.connectionString,
    connectionTimeoutMillis: options.connectionTimeoutMs ?? 10_000,
    statement_timeout: options.statementTimeoutMs ?? 30_000,
  });
}

const TABLES: Record<EntityKind, string> = {
  report: "reports",
  finding: "findings",
};

const COLUMNS: Record<EntityKind, string> = {
  report: [
    "id::text AS id",
    "cluster_id",
    "title",
    "description",
    "status",
    "crdb_version",
    "customer_id::text AS customer_id",
    "region",
    "pii_flag",
    "embedding::text AS embedding",
    "created_at",
  ].join(", "),
  finding: [
    "id::text AS id",
    "report_id::text AS report_id",
    "title",
    "description",
    "category",
    "severity",
    "status",
    "tags",
    "customer_id::text AS customer_id",
    "region",
    "pii_flag",
    "embedding::text AS embedding",
    "created_at",
  ].join(", "),
};

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Runs one statement, wrapping any pg failure as StoreUnavailableError.
 */
async function run<R extends QueryResultRow>(
  db: Queryable,
  operation: string,
  text: string,
  values: unknown[] = []
): Promise<{ rows: R[]; rowCount: number | null }> {
  try {
    return await db.query<R>(text, values);
  } catch (error) {
    throw new StoreUnavailableError(operation, error);
  }
}

/**
 * Builds the parameterized nearest-neighbour SELECT for a candidate query.
 *
 * Exported for tests, which assert on the generated SQL and parameters.
 * `$1` is always the query vector and the last parameter is always the limit.
 */
export function buildNearestQuery(query: CandidateQuery): { text: string; values: unknown[] } {
  const values: unknown[] = [formatVector(query.vector)];
  const where = ["embedding IS NOT NULL", "pii_flag = FALSE"];

  const param = (value: unknown): string => {
    values.push(value);
    return `$${values.length}`;
  };

  if (query.statuses !== undefined) {
    where.push(`status = ANY(${param([...query.statuses])}::text[])`);
  }
  if (query.excludedStatuses !== undefined && query.excludedStatuses.length > 0) {
    where.push(`status <> ALL(${param([...query.excludedStatuses])}::text[])`);
  }
  if (query.customerIds !== undefined) {
    where.push(`customer_id::text = ANY(${param([...query.customerIds])}::text[])`);
  }
  if (query.region !== undefined) {
    where.push(`region = ${param(query.region)}`);
  }
  if (query.kind === "finding" && query.category !== undefined) {
    where.push(`category = ${param(query.category)}`);
  }
  if (query.kind === "finding" && query.severity !== undefined) {
    where.push(`severity = ${param(query.severity)}`);
  }
  if (query.excludeId !== undefined) {
    where.push(`id::text <> ${param(query.excludeId)}`);
  }
  const limit = param(query.limit);

  const text = [
    `SELECT ${COLUMNS[query.kind]}, embedding <=> $1::vector AS distance`,
    `FROM ${TABLES[query.kind]}`,
    `WHERE ${where.join("\n  AND ")}`,
    "ORDER BY distance ASC, id ASC",
    `LIMIT ${limit}`,
  ].join("\n");

  return { text, values };
}

/**
 * EntityStore backed by Postgres with the pgvector extension.
 *
 * Usage:
 *   const pool = createPool({ connectionString: config.databaseUrl });
 *   const store = new PostgresEntityStore(pool);
 *   const report = await store.getEntity("report", id);
 */
export class PostgresEntityStore implements EntityStore {
  constructor(private readonly db: Queryable) {}

  async getEntity<K extends EntityKind>(kind: K, id: string): Promise<EntityOf<K> | null> {
    // Non-UUID ids can never match and would make Postgres reject the cast.
    if (!UUID_PATTERN.test(id)) {
      return null;
    }
    const { rows } = await run(
      this.db,
      `get ${kind}`,
      `SELECT ${COLUMNS[kind]} FROM ${TABLES[kind]} WHERE id = $1`,
      [id]
    );
    if (rows.length === 0) {
      return null;
    }
    const decode = ENTITY_DECODERS[kind];
    return decode(rows[0]);
  }

  async setEmbedding(kind: EntityKind, id: string, embedding: number[]): Promise<boolean> {
    const { rowCount } = await run(
      this.db,
      `set ${kind} embedding`,
      `UPDATE ${TABLES[kind]} SET embedding = $2::vector WHERE id = $1`,
      [id, formatVector(embedding)]
    );
    return (rowCount ?? 0) > 0;
  }

  async listMissingEmbeddings(
    kind: EntityKind,
    options: { limit: number; excludeIds?: readonly string[] }
  ): Promise<string[]> {
    const excludeIds = options.excludeIds ?? [];
    const { rows } = await run<{ id: string }>(
      this.db,
      `list ${kind} without embedding`,
      [
        `SELECT id::text AS id FROM ${TABLES[kind]}`,
        "WHERE embedding IS NULL",
        "  AND NOT (id::text = ANY($2::text[]))",
        "ORDER BY created_at ASC, id ASC",
        "LIMIT $1",
      ].join("\n"),
      [options.limit, [...excludeIds]]
    );
    return rows.map((row) => row.id);
  }

  async countMissingEmbeddings(kind: EntityKind): Promise<number> {
    const { rows } = await run<{ count: number }>(
      this.db,
      `count ${kind} without embedding`,
      `SELECT count(*)::int AS count FROM ${TABLES[kind]} WHERE embedding IS NULL`
    );
    return rows[0]?.count ?? 0;
  }

  async findNearest<K extends EntityKind>(query: CandidateQuery<K>): Promise<Candidate<K>[]> {
    const { text, values } = buildNearestQuery(query);
    const { rows } = await run<QueryResultRow & { distance: number }>(
      this.db,
      `similar ${query.kind} query`,
      text,
      values
    );
    const decode = ENTITY_DECODERS[query.kind];
    return rows.map((row) => ({
      entity: decode(row),
      distance: Number(row.distance),
    }));
  }

  async distanceTo(a: number[], b: number[]): Promise<number> {
    const { rows } = await run<{ distance: number }>(
      this.db,
      "vector distance",
      "SELECT $1::vector <=> $2::vector AS distance",
      [formatVector(a), formatVector(b)]
    );
    if (rows.length === 0) {
      throw new StoreUnavailableError("vector distance", new Error("no row returned"));
    }
    return Number(rows[0].distance);
  }
}

/**
 * AccessStore over the users and user_access tables.
 */
export class PostgresAccessStore implements AccessStore {
  constructor(private readonly db: Queryable) {}

  async getUser(userId: string): Promise<User | null> {
    const { rows } = await run(
      this.db,
      "get user",
      "SELECT id, name, email, role FROM users WHERE id = $1",
      [userId]
    );
    return rows.length > 0 ? toUser(rows[0]) : null;
  }

  async listGrants(userId: string): Promise<AccessGrant[]> {
    const { rows } = await run(
      this.db,
      "list user grants",
      [
        "SELECT user_id, customer_id::text AS customer_id, access_level, granted_by",
        "FROM user_access",
        "WHERE user_id = $1",
        "ORDER BY customer_id",
      ].join("\n"),
      [userId]
    );
    return rows.map(toGrant);
  }
}
