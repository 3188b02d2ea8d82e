/**
 * rows.ts - Validation of rows read from Postgres
 *
 * Every row is parsed with zod before it becomes a Report, Finding, User or
 * AccessGrant, so a schema drift shows up as a StoreUnavailableError at the
 * boundary instead of a bad value deep in the engine.
 */

import { z } from "zod";
import { StoreUnavailableError } from "../errors";
import {
  ACCESS_LEVELS,
  FINDING_CATEGORIES,
  FINDING_SEVERITIES,
  FINDING_STATUSES,
  REPORT_STATUSES,
  USER_ROLES,
  type AccessGrant,
  type EntityKind,
  type EntityOf,
  type Finding,
  type Report,
  type User,
} from "./types";
import { parseVector } from "./vector";

const baseRow = {
  id: z.string(),
  title: z.string(),
  customer_id: z.string().nullable(),
  region: z.string().nullable(),
  pii_flag: z.boolean(),
  embedding: z.string().nullable(),
  created_at: z.coerce.date(),
};

const reportRowSchema = z.object({
  ...baseRow,
  cluster_id: z.string(),
  description: z.string().nullable(),
  status: z.enum(REPORT_STATUSES),
  crdb_version: z.string().nullable(),
});

const findingRowSchema = z.object({
  ...baseRow,
  report_id: z.string(),
  description: z.string(),
  category: z.enum(FINDING_CATEGORIES),
  severity: z.enum(FINDING_SEVERITIES),
  status: z.enum(FINDING_STATUSES),
  tags: z.array(z.string()).nullable(),
});

const userRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string().nullable(),
  role: z.enum(USER_ROLES),
});

const grantRowSchema = z.object({
  user_id: z.string(),
  customer_id: z.string(),
  access_level: z.enum(ACCESS_LEVELS),
  granted_by: z.string().nullable(),
});

function parseRow<S extends z.ZodTypeAny>(schema: S, row: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid row";
    throw new StoreUnavailableError(`${what} row decode`, new Error(detail));
  }
  return parsed.data;
}

export function toReport(row: unknown): Report {
  const r = parseRow(reportRowSchema, row, "report");
  return {
    kind: "report",
    id: r.id,
    clusterId: r.cluster_id,
    title: r.title,
    description: r.description,
    status: r.status,
    crdbVersion: r.crdb_version,
    customerId: r.customer_id,
    region: r.region,
    piiFlag: r.pii_flag,
    embedding: parseVector(r.embedding),
    createdAt: r.created_at,
  };
}

export function toFinding(row: unknown): Finding {
  const f = parseRow(findingRowSchema, row, "finding");
  return {
    kind: "finding",
    id: f.id,
    reportId: f.report_id,
    title: f.title,
    description: f.description,
    category: f.category,
    severity: f.severity,
    status: f.status,
    tags: f.tags ?? [],
    customerId: f.customer_id,
    region: f.region,
    piiFlag: f.pii_flag,
    embedding: parseVector(f.embedding),
    createdAt: f.created_at,
  };
}

/** Row decoder per entity kind; indexing with a generic K keeps the result type. */
export const ENTITY_DECODERS: { [K in EntityKind]: (row: unknown) => EntityOf<K> } = {
  report: toReport,
  finding: toFinding,
};

export function toUser(row: unknown): User {
  return parseRow(userRowSchema, row, "user");
}

export function toGrant(row: unknown): AccessGrant {
  const g = parseRow(grantRowSchema, row, "user_access");
  return {
    userId: g.user_id,
    customerId: g.customer_id,
    accessLevel: g.access_level,
    grantedBy: g.granted_by,
  };
}
