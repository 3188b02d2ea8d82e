/**
 * engine.test.ts - Unit tests for SimilarityEngine
 *
 * Runs the engine against InMemoryStore, which applies the same predicates
 * as the Postgres query, so these tests pin down the rules the engine owns:
 * tenancy, PII exclusion, status defaults, self-exclusion, ranking, limits
 * and input validation.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { AccessResolver } from "../access/resolver";
import {
  EmbeddingMissingError,
  EntityNotFoundError,
  InvalidQueryError,
  StoreUnavailableError,
} from "../errors";
import { InMemoryStore } from "../store/memory-store";
import { basis, direction, makeFinding, makeReport } from "../testing/fixtures";
import { MAX_LIMIT, SimilarityEngine, similarityFromDistance } from "./engine";

// ---------------------------------------------------------------------------
// Fixture: two customers, an analyst for each, and an admin
// ---------------------------------------------------------------------------

function seedStore(): InMemoryStore {
  const store = new InMemoryStore();
  store.addUser({ id: "alice", name: "Alice", email: null, role: "analyst" });
  store.addUser({ id: "bob", name: "Bob", email: null, role: "analyst" });
  store.addUser({ id: "carol", name: "Carol", email: null, role: "admin" });
  store.addUser({ id: "dana", name: "Dana", email: null, role: "viewer" });
  store.grant({ userId: "alice", customerId: "acme", accessLevel: "read", grantedBy: null });
  store.grant({ userId: "bob", customerId: "globex", accessLevel: "read", grantedBy: null });

  store.addReport(makeReport({ id: "acme-1", customerId: "acme", embedding: direction(0) }));
  store.addReport(makeReport({ id: "acme-2", customerId: "acme", embedding: direction(20) }));
  store.addReport(makeReport({ id: "globex-1", customerId: "globex", embedding: direction(10) }));
  store.addReport(
    makeReport({ id: "globex-pii", customerId: "globex", embedding: direction(1), piiFlag: true })
  );
  store.addReport(
    makeReport({ id: "acme-draft", customerId: "acme", embedding: direction(2), status: "draft" })
  );
  store.addReport(
    makeReport({ id: "acme-review", customerId: "acme", embedding: direction(40), status: "in_review" })
  );
  store.addReport(makeReport({ id: "acme-empty", customerId: "acme", embedding: null }));
  return store;
}

function createEngine(store: InMemoryStore): SimilarityEngine {
  return new SimilarityEngine(store, new AccessResolver(store));
}

function ids(results: Array<{ entity: { id: string } }>): string[] {
  return results.map((result) => result.entity.id);
}

describe("similarityFromDistance", () => {
  it("maps cosine distance [0, 2] onto [1, 0]", () => {
    expect(similarityFromDistance(0)).toBe(1);
    expect(similarityFromDistance(1)).toBe(0.5);
    expect(similarityFromDistance(2)).toBe(0);
    expect(similarityFromDistance(2.5)).toBe(0);
  });
});

describe("SimilarityEngine.findSimilar", () => {
  let store: InMemoryStore;
  let engine: SimilarityEngine;

  beforeEach(() => {
    store = seedStore();
    engine = createEngine(store);
  });

  it("ranks by distance and returns distance and similarity", async () => {
    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      enforceAccess: false,
    });

    expect(ids(results)).toEqual(["acme-1", "globex-1", "acme-2", "acme-review"]);
    expect(results[0].distance).toBeCloseTo(0, 10);
    expect(results[0].similarity).toBeCloseTo(1, 10);
    for (const result of results) {
      expect(result.similarity).toBeCloseTo(1 - result.distance / 2, 10);
    }
  });

  it("scopes an analyst to their granted customers", async () => {
    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      caller: "alice",
      enforceAccess: true,
    });
    expect(ids(results)).toEqual(["acme-1", "acme-2", "acme-review"]);
  });

  it("gives an admin without grants the same results as unenforced access", async () => {
    const admin = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      caller: "carol",
      enforceAccess: true,
    });
    const unenforced = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      enforceAccess: false,
    });

    expect(ids(admin)).toEqual(ids(unenforced));
    expect(ids(admin)).toEqual(["acme-1", "globex-1", "acme-2", "acme-review"]);
  });

  it("returns nothing, without a store query, for a caller with no grants", async () => {
    const findNearest = vi.spyOn(store, "findNearest");

    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      caller: "dana",
      enforceAccess: true,
    });

    expect(results).toEqual([]);
    expect(findNearest).not.toHaveBeenCalled();
  });

  it("treats a scoped query with no caller as an unknown user", async () => {
    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      enforceAccess: true,
    });
    expect(results).toEqual([]);
  });

  it("never returns PII-flagged reports, even to an admin", async () => {
    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(1),
      caller: "carol",
      enforceAccess: true,
      limit: MAX_LIMIT,
    });
    expect(ids(results)).not.toContain("globex-pii");
  });

  it("matches published and in_review reports by default", async () => {
    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(2),
      enforceAccess: false,
    });
    expect(ids(results)).not.toContain("acme-draft");
    expect(ids(results)).toContain("acme-review");
  });

  it("replaces the default statuses with an explicit filter", async () => {
    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(2),
      enforceAccess: false,
      filters: { status: ["draft"] },
    });
    expect(ids(results)).toEqual(["acme-draft"]);
  });

  it("excludes the given id", async () => {
    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      enforceAccess: false,
      excludeId: "acme-1",
      limit: 1,
    });
    expect(ids(results)).toEqual(["globex-1"]);
  });

  it("honours the limit and defaults to 5", async () => {
    for (let i = 0; i < 8; i++) {
      store.addReport(makeReport({ id: `extra-${i}`, customerId: "acme", embedding: direction(50 + i) }));
    }

    const byDefault = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      enforceAccess: false,
    });
    const two = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      enforceAccess: false,
      limit: 2,
    });

    expect(byDefault).toHaveLength(5);
    expect(ids(two)).toEqual(["acme-1", "globex-1"]);
  });

  it("returns an empty list, not an error, when nothing matches", async () => {
    const results = await engine.findSimilar({
      kind: "report",
      queryVector: direction(0),
      enforceAccess: false,
      filters: { region: "APAC" },
    });
    expect(results).toEqual([]);
  });

  describe("findings", () => {
    beforeEach(() => {
      store.addFinding(
        makeFinding({ id: "f-open", reportId: "acme-1", customerId: "acme", embedding: basis(3) })
      );
      store.addFinding(
        makeFinding({
          id: "f-fp",
          reportId: "acme-1",
          customerId: "acme",
          embedding: basis(3),
          status: "false_positive",
        })
      );
      store.addFinding(
        makeFinding({
          id: "f-sec",
          reportId: "acme-1",
          customerId: "acme",
          embedding: basis(3),
          category: "security",
          severity: "critical",
          status: "resolved",
        })
      );
    });

    it("never returns false positives, with or without a status filter", async () => {
      const unfiltered = await engine.findSimilar({
        kind: "finding",
        queryVector: basis(3),
        enforceAccess: false,
      });
      const filtered = await engine.findSimilar({
        kind: "finding",
        queryVector: basis(3),
        enforceAccess: false,
        filters: { status: ["false_positive", "open"] },
      });

      expect(ids(unfiltered)).toEqual(["f-open", "f-sec"]);
      expect(ids(filtered)).toEqual(["f-open"]);
    });

    it("filters by category and severity", async () => {
      const results = await engine.findSimilar({
        kind: "finding",
        queryVector: basis(3),
        enforceAccess: false,
        filters: { category: "security", severity: "critical" },
      });
      expect(ids(results)).toEqual(["f-sec"]);
    });
  });

  describe("validation", () => {
    it("throws EmbeddingMissingError for a missing query vector", async () => {
      await expect(
        engine.findSimilar({ kind: "report", queryVector: null, enforceAccess: false })
      ).rejects.toThrow(EmbeddingMissingError);
    });

    it("throws InvalidQueryError for a vector of the wrong length", async () => {
      await expect(
        engine.findSimilar({ kind: "report", queryVector: [1, 0, 0], enforceAccess: false })
      ).rejects.toThrow("Query vector has 3 dimensions, expected 1536");
    });

    it("throws InvalidQueryError for a non-finite component", async () => {
      const vector = direction(0);
      vector[7] = Number.NaN;
      await expect(
        engine.findSimilar({ kind: "report", queryVector: vector, enforceAccess: false })
      ).rejects.toThrow(InvalidQueryError);
    });

    it.each([0, -1, 51, 2.5])("rejects limit %s", async (limit) => {
      await expect(
        engine.findSimilar({ kind: "report", queryVector: direction(0), enforceAccess: false, limit })
      ).rejects.toThrow(InvalidQueryError);
    });

    it("rejects finding-only filters on a report query", async () => {
      await expect(
        engine.findSimilar({
          kind: "report",
          queryVector: direction(0),
          enforceAccess: false,
          filters: { category: "security" },
        })
      ).rejects.toThrow("category and severity filters apply to findings only");
    });

    it("rejects an unknown or empty status filter", async () => {
      await expect(
        engine.findSimilar({
          kind: "report",
          queryVector: direction(0),
          enforceAccess: false,
          filters: { status: ["open"] },
        })
      ).rejects.toThrow("Unknown report status: open");
      await expect(
        engine.findSimilar({
          kind: "finding",
          queryVector: direction(0),
          enforceAccess: false,
          filters: { status: [] },
        })
      ).rejects.toThrow("status filter must name at least one status");
    });
  });

  it("propagates a store failure instead of returning an empty list", async () => {
    vi.spyOn(store, "findNearest").mockRejectedValueOnce(
      new StoreUnavailableError("similar report query", new Error("timeout"))
    );
    await expect(
      engine.findSimilar({ kind: "report", queryVector: direction(0), enforceAccess: false })
    ).rejects.toThrow(StoreUnavailableError);
  });
});

describe("SimilarityEngine.similarTo", () => {
  let store: InMemoryStore;
  let engine: SimilarityEngine;

  beforeEach(() => {
    store = seedStore();
    engine = createEngine(store);
  });

  it("searches with the source's embedding and never returns the source", async () => {
    const { source, results } = await engine.similarTo({
      kind: "report",
      entityId: "acme-1",
      caller: "alice",
      enforceAccess: true,
    });

    expect(source.id).toBe("acme-1");
    expect(ids(results)).toEqual(["acme-2", "acme-review"]);
  });

  it("throws EntityNotFoundError for an unknown id", async () => {
    await expect(
      engine.similarTo({ kind: "report", entityId: "missing", enforceAccess: false })
    ).rejects.toThrow(EntityNotFoundError);
  });

  it("throws EmbeddingMissingError when the source has no embedding", async () => {
    const error = await engine
      .similarTo({ kind: "report", entityId: "acme-empty", enforceAccess: false })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingMissingError);
    expect(error).toMatchObject({ entityKind: "report", entityId: "acme-empty" });
  });

  it("returns the same ids for the same request", async () => {
    const request = { kind: "report" as const, entityId: "acme-2", enforceAccess: false };
    const first = await engine.similarTo(request);
    const second = await engine.similarTo(request);
    expect(ids(second.results)).toEqual(ids(first.results));
  });
});
