/**
 * memory-store.ts - In-process EntityStore and AccessStore
 *
 * What this file does:
 * Holds reports, findings, users and grants in Maps and answers similarity
 * queries by linear scan with the same cosine distance pgvector uses. The
 * engine, backfill and MCP tools run against it in tests.
 *
 * Entities are copied on the way in and on the way out, so a caller
 * mutating a returned object never changes what is stored.
 */

import type {
  AccessGrant,
  AccessStore,
  Candidate,
  CandidateQuery,
  EmbeddableEntity,
  EntityKind,
  EntityOf,
  EntityStore,
  Finding,
  Report,
  User,
} from "./types";
import { cosineDistance } from "./vector";

function copy<T extends EmbeddableEntity>(entity: T): T {
  return {
    ...entity,
    embedding: entity.embedding ? [...entity.embedding] : null,
    ...(entity.kind === "finding" ? { tags: [...entity.tags] } : {}),
  };
}

export class InMemoryStore implements EntityStore, AccessStore {
  private readonly tables: { [K in EntityKind]: Map<string, EntityOf<K>> } = {
    report: new Map(),
    finding: new Map(),
  };
  private readonly users = new Map<string, User>();
  private readonly grants: AccessGrant[] = [];

  // -------------------------------------------------------------------------
  // Seeding helpers
  // -------------------------------------------------------------------------

  addReport(report: Report): void {
    this.tables.report.set(report.id, copy(report));
  }

  /** Adds a finding. The parent report must already exist. */
  addFinding(finding: Finding): void {
    if (!this.tables.report.has(finding.reportId)) {
      throw new Error(`Cannot add finding ${finding.id}: report ${finding.reportId} does not exist`);
    }
    this.tables.finding.set(finding.id, copy(finding));
  }

  /** Deletes a report and, with it, its findings and their embeddings. */
  deleteReport(id: string): boolean {
    for (const finding of this.tables.finding.values()) {
      if (finding.reportId === id) {
        this.tables.finding.delete(finding.id);
      }
    }
    return this.tables.report.delete(id);
  }

  addUser(user: User): void {
    this.users.set(user.id, { ...user });
  }

  grant(grant: AccessGrant): void {
    const index = this.grants.findIndex(
      (g) => g.userId === grant.userId && g.customerId === grant.customerId
    );
    if (index >= 0) {
      this.grants[index] = { ...grant };
    } else {
      this.grants.push({ ...grant });
    }
  }

  // -------------------------------------------------------------------------
  // EntityStore
  // -------------------------------------------------------------------------

  async getEntity<K extends EntityKind>(kind: K, id: string): Promise<EntityOf<K> | null> {
    const table: Map<string, EntityOf<K>> = this.tables[kind];
    const entity = table.get(id);
    return entity ? copy(entity) : null;
  }

  async setEmbedding(kind: EntityKind, id: string, embedding: number[]): Promise<boolean> {
    const entity = this.tables[kind].get(id);
    if (!entity) {
      return false;
    }
    entity.embedding = [...embedding];
    return true;
  }

  async listMissingEmbeddings(
    kind: EntityKind,
    options: { limit: number; excludeIds?: readonly string[] }
  ): Promise<string[]> {
    const excluded = new Set(options.excludeIds ?? []);
    return this.entitiesOf(kind)
      .filter((entity) => entity.embedding === null && !excluded.has(entity.id))
      .sort(byCreatedThenId)
      .slice(0, options.limit)
      .map((entity) => entity.id);
  }

  async countMissingEmbeddings(kind: EntityKind): Promise<number> {
    return this.entitiesOf(kind).filter((entity) => entity.embedding === null).length;
  }

  async findNearest<K extends EntityKind>(query: CandidateQuery<K>): Promise<Candidate<K>[]> {
    const table: Map<string, EntityOf<K>> = this.tables[query.kind];
    const candidates: Candidate<K>[] = [];

    for (const entity of table.values()) {
      if (entity.embedding === null || !matches(entity, query)) {
        continue;
      }
      candidates.push({
        entity: copy(entity),
        distance: cosineDistance(query.vector, entity.embedding),
      });
    }

    candidates.sort(
      (a, b) => a.distance - b.distance || compareIds(a.entity.id, b.entity.id)
    );
    return candidates.slice(0, query.limit);
  }

  async distanceTo(a: number[], b: number[]): Promise<number> {
    return cosineDistance(a, b);
  }

  // -------------------------------------------------------------------------
  // AccessStore
  // -------------------------------------------------------------------------

  async getUser(userId: string): Promise<User | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async listGrants(userId: string): Promise<AccessGrant[]> {
    return this.grants
      .filter((g) => g.userId === userId)
      .map((g) => ({ ...g }))
      .sort((a, b) => compareIds(a.customerId, b.customerId));
  }

  private entitiesOf(kind: EntityKind): EmbeddableEntity[] {
    return kind === "report"
      ? [...this.tables.report.values()]
      : [...this.tables.finding.values()];
  }
}

/**
 * Applies the same predicates as the Postgres WHERE clause.
 */
function matches(entity: EmbeddableEntity, query: CandidateQuery): boolean {
  if (entity.piiFlag) return false;
  if (query.excludeId !== undefined && entity.id === query.excludeId) return false;
  if (query.statuses !== undefined && !query.statuses.includes(entity.status)) return false;
  if (query.excludedStatuses?.includes(entity.status)) return false;
  if (query.customerIds !== undefined) {
    if (entity.customerId === null || !query.customerIds.includes(entity.customerId)) {
      return false;
    }
  }
  if (query.region !== undefined && entity.region !== query.region) return false;
  if (entity.kind === "finding") {
    if (query.category !== undefined && entity.category !== query.category) return false;
    if (query.severity !== undefined && entity.severity !== query.severity) return false;
  }
  return true;
}

function byCreatedThenId(a: EmbeddableEntity, b: EmbeddableEntity): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || compareIds(a.id, b.id);
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
