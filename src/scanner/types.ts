import type { NodeKind, NodeOfKind, PyNode } from "./syntax.js";
import type { VisitContext } from "./traversal.js";

export type Severity = "low" | "medium" | "high" | "critical";

export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low"];

export type Category =
  | "runtime"
  | "performance"
  | "complexity"
  | "security"
  | "organization"
  | "resource"
  | "gotcha";

export const CATEGORIES: readonly Category[] = [
  "runtime",
  "performance",
  "complexity",
  "security",
  "organization",
  "resource",
  "gotcha",
];

export interface Finding {
  rule_id: string;
  title: string;
  category: Category;
  severity: Severity;
  file: string;
  line: number;
  column: number;
  message: string;
  recommendation: string;
  snippet?: string;
}

/** What a rule reports; the engine turns it into a Finding. */
export interface RuleMatch {
  node: PyNode;
  message: string;
  /** Overrides the rule's generic recommendation. */
  recommendation?: string;
}

export interface RuleSpec<K extends NodeKind> {
  id: string;
  title: string;
  category: Category;
  severity: Severity;
  kinds: readonly K[];
  description: string;
  recommendation: string;
  check(node: NodeOfKind<K>, context: VisitContext): RuleMatch | undefined;
}

export interface Rule {
  id: string;
  title: string;
  category: Category;
  severity: Severity;
  kinds: readonly NodeKind[];
  description: string;
  recommendation: string;
  evaluate(node: PyNode, context: VisitContext): RuleMatch | undefined;
}

export type StageOutcome<T> =
  | { status: "ok"; value: T }
  | { status: "skip"; reason: string }
  | { status: "error"; stage: string; error: unknown };

export type Decision = "silent" | "warn" | "block";

export type SeverityCounts = Record<Severity, number>;

export interface Verdict {
  decision: Decision;
  /** Filtered findings, most severe first. */
  findings: Finding[];
  counts: SeverityCounts;
  total: number;
}
