/**
 * compose.ts - Builds the text that gets embedded for a report or finding
 *
 * The composed text decides what "similar" means. Title comes first, then
 * the free-text description, then the labelled structured fields, one per
 * line:
 *
 *   report:   title / description / "Cluster: <id>" / "Version: <v>"
 *   finding:  title / description / "Category: c" / "Severity: s" / "Tags: a, b"
 *
 * Blank fields are skipped. The result is not checked for emptiness here;
 * the generator rejects empty text before it reaches the provider.
 */

import type { EmbeddableEntity, Finding, Report } from "../store/types";

export function composeEntityText(entity: EmbeddableEntity): string {
  const lines = entity.kind === "report" ? reportLines(entity) : findingLines(entity);
  return lines.join("\n");
}

function reportLines(report: Report): string[] {
  const lines: string[] = [];
  pushIfPresent(lines, report.title);
  pushIfPresent(lines, report.description);
  lines.push(`Cluster: ${report.clusterId}`);
  if (report.crdbVersion && report.crdbVersion.trim()) {
    lines.push(`Version: ${report.crdbVersion.trim()}`);
  }
  return lines;
}

function findingLines(finding: Finding): string[] {
  const lines: string[] = [];
  pushIfPresent(lines, finding.title);
  pushIfPresent(lines, finding.description);
  lines.push(`Category: ${finding.category}`);
  lines.push(`Severity: ${finding.severity}`);

  const tags = finding.tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
  if (tags.length > 0) {
    lines.push(`Tags: ${tags.join(", ")}`);
  }
  return lines;
}

function pushIfPresent(lines: string[], value: string | null): void {
  if (value && value.trim()) {
    lines.push(value.trim());
  }
}
