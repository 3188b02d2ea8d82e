/**
 * Shared test fixtures: entity builders and 1536-dimension vectors with
 * known cosine distances between them.
 *
 * direction(deg) lies in the plane of the first two axes, so the cosine
 * distance between direction(a) and direction(b) is 1 - cos(a - b):
 * 0 for the same angle, 1 for 90 degrees apart, 2 for 180.
 */

import { EMBEDDING_DIMENSIONS, type Finding, type Report } from "../store/types";

export function direction(degrees: number, dimensions = EMBEDDING_DIMENSIONS): number[] {
  const radians = (degrees * Math.PI) / 180;
  const vector = new Array<number>(dimensions).fill(0);
  vector[0] = Math.cos(radians);
  vector[1] = Math.sin(radians);
  return vector;
}

/** A unit vector along axis `index`. */
export function basis(index: number, dimensions = EMBEDDING_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  vector[index] = 1;
  return vector;
}

export function makeReport(overrides: Partial<Report> = {}): Report {
  return {
    kind: "report",
    id: "report-1",
    clusterId: "test-cluster",
    title: "High write latency",
    description: "p99 latency above 500ms during imports",
    status: "published",
    crdbVersion: "v23.2.0",
    customerId: "customer-a",
    region: "US",
    piiFlag: false,
    embedding: null,
    createdAt: new Date("2024-01-01T00:00:00Z"),
    ...overrides,
  };
}

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    kind: "finding",
    id: "finding-1",
    reportId: "report-1",
    title: "Hot range on sequential keys",
    description: "All inserts land on the last range",
    category: "performance",
    severity: "high",
    status: "open",
    tags: ["hot-range"],
    customerId: "customer-a",
    region: "US",
    piiFlag: false,
    embedding: null,
    createdAt: new Date("2024-01-02T00:00:00Z"),
    ...overrides,
  };
}
