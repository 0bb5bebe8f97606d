import { analyzeSource } from "../../src/scanner/scan.js";
import type { Finding } from "../../src/scanner/types.js";

/** Joins source lines with a trailing newline, the way editors save files. */
export function py(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

export function scan(source: string, filePath = "module.py"): Finding[] {
  const outcome = analyzeSource(source, filePath);
  if (outcome.status !== "ok") {
    throw new Error(`scan did not complete: ${outcome.status}`);
  }
  return outcome.value.findings;
}

export function ruleIds(source: string, filePath?: string): string[] {
  return scan(source, filePath).map((finding) => finding.rule_id);
}

export function findingsFor(source: string, ruleId: string, filePath?: string): Finding[] {
  return scan(source, filePath).filter((finding) => finding.rule_id === ruleId);
}

export function linesOf(findings: readonly Finding[]): number[] {
  return findings.map((finding) => finding.line);
}
