/**
 * find-similar.test.ts - Unit tests for the find_similar_* tool logic
 *
 * Builds a SimilarityService over InMemoryStore with 3-dimension vectors
 * and checks the text each tool returns, including the error text a tool
 * caller sees instead of an exception.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { EmbeddingProvider } from "../../embedding/types";
import { SimilarityService } from "../../service";
import { InMemoryStore } from "../../store/memory-store";
import { makeFinding, makeReport } from "../../testing/fixtures";
import { findSimilarFindings, findSimilarFindingsSchema, findSimilarReports } from "./find-similar";

const provider: EmbeddingProvider = {
  model: "fake-model",
  dimensions: 3,
  embed: async () => [1, 0, 0],
  embedMany: async (texts) => texts.map(() => [1, 0, 0]),
};

function createService(): { store: InMemoryStore; service: SimilarityService } {
  const store = new InMemoryStore();
  store.addUser({ id: "alice", name: "Alice", email: null, role: "analyst" });
  store.grant({ userId: "alice", customerId: "acme", accessLevel: "read", grantedBy: null });

  store.addReport(
    makeReport({ id: "src", title: "Write latency spikes", customerId: "acme", embedding: [1, 0, 0] })
  );
  store.addReport(
    makeReport({
      id: "r2",
      title: "Import hotspot",
      clusterId: "prod-east",
      customerId: "acme",
      embedding: [0.8, 0.6, 0],
    })
  );
  store.addReport(
    makeReport({ id: "r3", title: "Other tenant", customerId: "globex", embedding: [1, 0, 0] })
  );
  store.addReport(makeReport({ id: "pending", customerId: "acme", embedding: null }));

  const service = new SimilarityService({ store, accessStore: store, provider, onProgress: () => {} });
  return { store, service };
}

describe("findSimilarReports", () => {
  let service: SimilarityService;

  beforeEach(() => {
    ({ service } = createService());
  });

  it("returns the caller's visible neighbours as text and JSON", async () => {
    const result = await findSimilarReports(service, { id: "src", userId: "alice" });

    expect(result.isError).toBe(false);
    expect(result.text).toBe(
      [
        'Found 1 report similar to "Write latency spikes" (src):',
        "",
        "1. Import hotspot (distance: 0.20, very similar; similarity 0.90)",
        "   id=r2, cluster=prod-east, status=published, region=US",
      ].join("\n")
    );
    expect(result.response).toMatchObject({
      sourceId: "src",
      count: 1,
      results: [{ id: "r2", similarityScore: 0.9, distance: 0.2 }],
    });
  });

  it("enforces access by default, so no user means no results", async () => {
    const result = await findSimilarReports(service, { id: "src" });

    expect(result.isError).toBe(false);
    expect(result.text).toBe(
      'No reports similar to "Write latency spikes" (src) that you have access to.'
    );
  });

  it("searches every customer when access enforcement is off", async () => {
    const result = await findSimilarReports(service, { id: "src", enforceAccess: false });
    expect(result.response?.results.map((r) => r.id)).toEqual(["r3", "r2"]);
  });

  it("reports a missing source as an error result", async () => {
    const result = await findSimilarReports(service, { id: "missing", userId: "alice" });
    expect(result).toEqual({ text: "Error: No report with id missing", isError: true });
  });

  it("tells the caller how to fix a source with no embedding", async () => {
    const result = await findSimilarReports(service, { id: "pending", userId: "alice" });
    expect(result).toEqual({
      text: "Error: This report (pending) has no embedding yet. Edit it or run a backfill to generate one.",
      isError: true,
    });
  });
});

describe("findSimilarFindings", () => {
  let store: InMemoryStore;
  let service: SimilarityService;

  beforeEach(() => {
    ({ store, service } = createService());
    store.addFinding(
      makeFinding({ id: "f0", reportId: "src", title: "Source finding", embedding: [0, 1, 0] })
    );
    store.addFinding(
      makeFinding({
        id: "f-sec",
        reportId: "r2",
        title: "Open port",
        category: "security",
        severity: "critical",
        customerId: "acme",
        embedding: [0, 1, 0],
      })
    );
    store.addFinding(
      makeFinding({ id: "f-perf", reportId: "r2", title: "Hot range", customerId: "acme", embedding: [0, 1, 0] })
    );
  });

  it("applies category and severity filters", async () => {
    const result = await findSimilarFindings(service, {
      id: "f0",
      userId: "alice",
      category: "security",
      severity: "critical",
    });

    expect(result.isError).toBe(false);
    expect(result.text).toContain("1. Open port (distance: 0.00, very similar; similarity 1.00)");
    expect(result.text).not.toContain("Hot range");
  });

  it("schema rejects an unknown category before the service is called", () => {
    const parsed = findSimilarFindingsSchema.safeParse({ id: "f0", category: "cosmetic" });
    expect(parsed.success).toBe(false);
  });
});
