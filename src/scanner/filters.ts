import type { Finding, Severity, SeverityCounts } from "./types.js";

export const SEVERITY_RANK: Record<Severity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export interface AggregationSettings {
  levels: ReadonlySet<Severity>;
  disabledRules: ReadonlySet<string>;
}

export interface Aggregate {
  findings: Finding[];
  counts: SeverityCounts;
  total: number;
}

export function emptyCounts(): SeverityCounts {
  return { critical: 0, high: 0, medium: 0, low: 0 };
}

export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const counts = emptyCounts();
  for (const finding of findings) {
    counts[finding.severity] += 1;
  }
  return counts;
}

/** Most severe first; source order within a severity. */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    a.line - b.line ||
    a.column - b.column ||
    a.rule_id.localeCompare(b.rule_id)
  );
}

export function filterFindings(findings: readonly Finding[], settings: AggregationSettings): Finding[] {
  return findings.filter(
    (finding) => settings.levels.has(finding.severity) && !settings.disabledRules.has(finding.rule_id),
  );
}

export function aggregate(findings: readonly Finding[], settings: AggregationSettings): Aggregate {
  const kept = filterFindings(findings, settings).sort(compareFindings);
  return { findings: kept, counts: countBySeverity(kept), total: kept.length };
}
