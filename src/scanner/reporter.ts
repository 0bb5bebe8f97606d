import path from "node:path";
import type { Decision, Finding, Rule, Severity, SeverityCounts, Verdict } from "./types.js";
import { SEVERITIES } from "./types.js";
import { countBySeverity } from "./filters.js";
import type { FileReport } from "./scan.js";
import { findRule } from "./rules/index.js";

export function severityLabel(severity: Severity): string {
  switch (severity) {
    case "critical":
      return "CRITICAL";
    case "high":
      return "HIGH";
    case "medium":
      return "MEDIUM";
    case "low":
      return "LOW";
    default:
      return "UNKNOWN";
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** "1 CRITICAL, 2 HIGH"; severities with no findings are left out. */
export function formatCounts(counts: SeverityCounts): string {
  return SEVERITIES.filter((severity) => counts[severity] > 0)
    .map((severity) => `${counts[severity]} ${severityLabel(severity)}`)
    .join(", ");
}

export function formatFindingLine(finding: Finding): string {
  return `[${finding.rule_id}:${severityLabel(finding.severity)}] line ${finding.line}: ${finding.message}`;
}

/**
 * Warning text for the harness: findings grouped by severity, each with its
 * fix. Only the first `maxIssues` are rendered. Empty for an empty verdict.
 */
export function formatFeedback(
  verdict: Verdict,
  filePath: string,
  maxIssues: number,
  includeTips = false,
): string {
  if (verdict.total === 0) {
    return "";
  }
  const lines: string[] = [];
  lines.push(
    `⚠️ antipattern-guard: ${plural(verdict.total, "issue")} found in ${path.basename(filePath)} (${formatCounts(verdict.counts)})`,
  );

  const shown = verdict.findings.slice(0, Math.max(0, maxIssues));
  for (const severity of SEVERITIES) {
    const group = shown.filter((finding) => finding.severity === severity);
    if (group.length === 0) {
      continue;
    }
    lines.push("");
    lines.push(`${severityLabel(severity)}:`);
    for (const finding of group) {
      lines.push(`  ${formatFindingLine(finding)}`);
      lines.push(`    Fix: ${finding.recommendation}`);
      if (finding.snippet) {
        lines.push(`    > ${finding.snippet}`);
      }
    }
  }

  const remaining = verdict.total - shown.length;
  if (remaining > 0) {
    lines.push("");
    lines.push(`…and ${remaining} more`);
  }

  if (includeTips) {
    const tips = formatTips(shown);
    if (tips.length > 0) {
      lines.push("", "Tips:", ...tips);
    }
  }
  return lines.join("\n");
}

/** One line per distinct rule among the findings, in order of first appearance. */
function formatTips(findings: readonly Finding[]): string[] {
  const ruleIds = [...new Set(findings.map((finding) => finding.rule_id))];
  return ruleIds.flatMap((ruleId) => {
    const rule = findRule(ruleId);
    return rule ? [`  - ${rule.id}: ${rule.description}`] : [];
  });
}

/** Reason that halts the caller; built from critical findings only. */
export function formatBlockReason(verdict: Verdict, filePath: string): string {
  const critical = verdict.findings.filter((finding) => finding.severity === "critical");
  const lines = [
    `Blocked: ${plural(critical.length, "critical issue")} in ${path.basename(filePath)} must be fixed.`,
  ];
  for (const finding of critical) {
    lines.push(`- ${formatFindingLine(finding)}`);
    lines.push(`  Fix: ${finding.recommendation}`);
  }
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// CLI reports
// ---------------------------------------------------------------------------

export interface ReportMeta {
  tool: "antipattern-guard";
  version: string;
  scannedAt: string;
}

export interface ReportSummary {
  files: number;
  total: number;
  bySeverity: SeverityCounts;
  blocked: boolean;
}

export interface ReportIgnoredFinding {
  ruleId: string;
  line: number;
  reason: string;
  annotationLine: number;
}

export interface ReportFile {
  file: string;
  decision: Decision;
  skipped?: string;
  findings: Finding[];
  ignoredFindings: ReportIgnoredFinding[];
}

export interface ReportModel {
  meta: ReportMeta;
  summary: ReportSummary;
  files: ReportFile[];
}

export function buildReport(results: Array<{ path: string; report: FileReport }>, meta: ReportMeta): ReportModel {
  const files = results.map(({ path: requested, report }): ReportFile => ({
    file: report.file?.displayPath ?? requested,
    decision: report.verdict.decision,
    skipped: report.skipped,
    findings: report.verdict.findings,
    ignoredFindings: report.ignoredFindings.map((entry) => ({
      ruleId: entry.finding.rule_id,
      line: entry.finding.line,
      reason: entry.reason,
      annotationLine: entry.annotationLine,
    })),
  }));
  const all = files.flatMap((file) => file.findings);
  return {
    meta,
    summary: {
      files: files.length,
      total: all.length,
      bySeverity: countBySeverity(all),
      blocked: files.some((file) => file.decision === "block"),
    },
    files,
  };
}

export function formatJsonReport(report: ReportModel): string {
  return JSON.stringify(report, null, 2);
}

export function formatTerminalReport(report: ReportModel, limit = 10): string {
  const lines: string[] = [];
  const { bySeverity } = report.summary;

  lines.push("antipattern-guard report");
  lines.push("========================");
  lines.push(`Scanned at    : ${report.meta.scannedAt}`);
  lines.push(`Files         : ${report.summary.files}`);
  lines.push(`Total issues  : ${report.summary.total}`);
  lines.push(
    `Severity      : Critical ${bySeverity.critical} | High ${bySeverity.high} | Medium ${bySeverity.medium} | Low ${bySeverity.low}`,
  );
  const ignored = report.files.reduce((sum, file) => sum + file.ignoredFindings.length, 0);
  if (ignored > 0) {
    lines.push(`Ignored       : ${ignored}`);
  }

  for (const file of report.files) {
    lines.push("");
    if (file.skipped) {
      lines.push(`${file.file}: not analysed (${file.skipped})`);
      continue;
    }
    if (file.findings.length === 0) {
      lines.push(`${file.file}: no issues`);
      continue;
    }
    lines.push(`${file.file}: ${file.decision.toUpperCase()}`);
    const shown = file.findings.slice(0, Math.max(0, limit));
    for (const finding of shown) {
      lines.push(`  ${formatFindingLine(finding)}`);
      lines.push(`    Fix: ${finding.recommendation}`);
    }
    if (shown.length < file.findings.length) {
      lines.push(`  ...and ${file.findings.length - shown.length} more`);
    }
  }

  if (report.summary.total === 0) {
    lines.push("");
    lines.push("No issues found.");
  }
  return lines.join("\n");
}

export function formatRuleList(rules: readonly Rule[]): string {
  const width = Math.max(0, ...rules.map((rule) => rule.id.length));
  return rules
    .map((rule) => `${rule.id.padEnd(width)}  ${severityLabel(rule.severity).padEnd(8)}  ${rule.category.padEnd(12)}  ${rule.title}`)
    .join("\n");
}
