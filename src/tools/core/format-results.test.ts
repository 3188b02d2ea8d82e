import { describe, it, expect } from "vitest";
import { makeFinding, makeReport } from "../../testing/fixtures";
import { describeSimilarity, formatSimilarResults } from "./format-results";

describe("describeSimilarity", () => {
  it.each([
    [0, "very similar"],
    [0.29, "very similar"],
    [0.3, "similar"],
    [0.6, "somewhat related"],
    [1.0, "weak match"],
    [1.7, "weak match"],
  ])("labels distance %s as %s", (distance, label) => {
    expect(describeSimilarity(distance)).toBe(label);
  });
});

describe("formatSimilarResults", () => {
  const source = makeReport({ id: "src", title: "Slow range scans" });

  it("formats each report with its distance, label and details", () => {
    const text = formatSimilarResults({
      source,
      results: [
        {
          entity: makeReport({ id: "r2", title: "Hot ranges", clusterId: "prod-east", region: "US" }),
          distance: 0.2,
          similarity: 0.9,
        },
        {
          entity: makeReport({ id: "r3", title: "Pool limits", clusterId: "dev", region: null, status: "in_review" }),
          distance: 0.8,
          similarity: 0.6,
        },
      ],
    });

    expect(text).toBe(
      [
        'Found 2 reports similar to "Slow range scans" (src):',
        "",
        "1. Hot ranges (distance: 0.20, very similar; similarity 0.90)",
        "   id=r2, cluster=prod-east, status=published, region=US",
        "",
        "2. Pool limits (distance: 0.80, somewhat related; similarity 0.60)",
        "   id=r3, cluster=dev, status=in_review",
      ].join("\n")
    );
  });

  it("formats findings with their report, category and severity", () => {
    const text = formatSimilarResults({
      source: makeFinding({ id: "f0", title: "Sequential keys" }),
      results: [
        {
          entity: makeFinding({
            id: "f1",
            reportId: "r9",
            title: "Write hotspot",
            category: "performance",
            severity: "critical",
            status: "acknowledged",
            region: "EU",
          }),
          distance: 0.4,
          similarity: 0.8,
        },
      ],
    });

    expect(text).toBe(
      [
        'Found 1 finding similar to "Sequential keys" (f0):',
        "",
        "1. Write hotspot (distance: 0.40, similar; similarity 0.80)",
        "   id=f1, report=r9, category=performance, severity=critical, status=acknowledged, region=EU",
      ].join("\n")
    );
  });

  it("says so when nothing matched", () => {
    expect(formatSimilarResults({ source, results: [] })).toBe(
      'No reports similar to "Slow range scans" (src) that you have access to.'
    );
  });
});
