import { describe, it, expect } from "vitest";
import { StoreUnavailableError } from "../errors";
import { ENTITY_DECODERS, toFinding, toGrant, toReport, toUser } from "./rows";

function reportRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: "9b1deb4d-3b7d-4bad-9bdd-2b0d7b3dcb6d",
    cluster_id: "test-cluster",
    title: "Slow queries",
    description: null,
    status: "published",
    crdb_version: "v23.1.0",
    customer_id: null,
    region: "EU",
    pii_flag: false,
    embedding: "[0.1,0.2]",
    created_at: "2024-03-01T12:00:00.000Z",
    ...overrides,
  };
}

describe("toReport", () => {
  it("maps snake_case columns and decodes the embedding", () => {
    expect(toReport(reportRow())).toEqual({
      kind: "report",
      id: "9b1deb4d-3b7d-4bad-9bdd-2b0d7b3dcb6d",
      clusterId: "test-cluster",
      title: "Slow queries",
      description: null,
      status: "published",
      crdbVersion: "v23.1.0",
      customerId: null,
      region: "EU",
      piiFlag: false,
      embedding: [0.1, 0.2],
      createdAt: new Date("2024-03-01T12:00:00.000Z"),
    });
  });

  it("accepts a Date for created_at", () => {
    const createdAt = new Date("2024-05-05T00:00:00Z");
    expect(toReport(reportRow({ created_at: createdAt })).createdAt).toEqual(createdAt);
  });

  it("rejects an unknown status with the column path", () => {
    expect(() => toReport(reportRow({ status: "deleted" }))).toThrow(StoreUnavailableError);
    expect(() => toReport(reportRow({ status: "deleted" }))).toThrow(/report row decode: status:/);
  });
});

describe("toFinding", () => {
  const row = {
    id: "f-1",
    report_id: "r-1",
    title: "Pool too large",
    description: "Too many connections",
    category: "configuration",
    severity: "medium",
    status: "open",
    tags: null,
    customer_id: "c-1",
    region: null,
    pii_flag: false,
    embedding: null,
    created_at: "2024-03-02T00:00:00Z",
  };

  it("maps null tags to an empty list", () => {
    const finding = toFinding(row);
    expect(finding.tags).toEqual([]);
    expect(finding.reportId).toBe("r-1");
    expect(finding.embedding).toBeNull();
  });

  it("is reachable through ENTITY_DECODERS", () => {
    expect(ENTITY_DECODERS.finding(row).kind).toBe("finding");
  });
});

describe("toUser and toGrant", () => {
  it("decodes a user row", () => {
    expect(toUser({ id: "u1", name: "Test User", email: null, role: "analyst" })).toEqual({
      id: "u1",
      name: "Test User",
      email: null,
      role: "analyst",
    });
  });

  it("decodes a grant row", () => {
    expect(
      toGrant({ user_id: "u1", customer_id: "c1", access_level: "read", granted_by: "system" })
    ).toEqual({ userId: "u1", customerId: "c1", accessLevel: "read", grantedBy: "system" });
  });

  it("rejects an unknown role", () => {
    expect(() => toUser({ id: "u1", name: "x", email: null, role: "owner" })).toThrow(
      "user row decode"
    );
  });
});
