import type { Finding, Rule, StageOutcome, Verdict } from "./types.js";
import type { Config } from "./config.js";
import { RULES } from "./rules/index.js";
import { buildDispatchTable, traverse, type DispatchTable } from "./traversal.js";
import { buildSyntaxTree } from "./tree-builder.js";
import { loadSource, splitLines, type SourceFile } from "./source-loader.js";
import { aggregate } from "./filters.js";
import { buildVerdict, silentVerdict } from "./policy.js";
import { logDebug, logError } from "../utils/logger.js";

export interface IgnoredFinding {
  finding: Finding;
  reason: string;
  annotationLine: number;
}

export interface ScanResult {
  findings: Finding[];
  ignoredFindings: IgnoredFinding[];
}

export interface FileReport {
  file?: SourceFile;
  verdict: Verdict;
  ignoredFindings: IgnoredFinding[];
  /** Why the file was not analysed, when it was not. */
  skipped?: string;
}

const defaultTable = buildDispatchTable(RULES);

function tableFor(rules: readonly Rule[] | undefined): DispatchTable {
  return rules === undefined || rules === RULES ? defaultTable : buildDispatchTable(rules);
}

/**
 * Runs every rule over one source text. Findings come back deduplicated,
 * in source order, with inline `# guard-ignore` directives applied.
 */
export function analyzeSource(
  source: string,
  filePath: string,
  options?: { rules?: readonly Rule[] },
): StageOutcome<ScanResult> {
  const tree = buildSyntaxTree(source);
  if (tree.status !== "ok") {
    return tree.status === "skip" ? tree : { status: "error", stage: tree.stage, error: tree.error };
  }

  const lines = splitLines(source);
  let findings: Finding[];
  try {
    findings = traverse(tree.value, tableFor(options?.rules), filePath, lines);
  } catch (error) {
    return { status: "error", stage: "traversal", error };
  }

  const ordered = dedupeFindings(findings).sort(
    (a, b) => a.line - b.line || a.column - b.column || a.rule_id.localeCompare(b.rule_id),
  );
  const { activeFindings, ignoredFindings } = applyIgnoreDirectives(lines, ordered);
  return { status: "ok", value: { findings: activeFindings, ignoredFindings } };
}

/**
 * Loader, builder, traversal, aggregation and policy for one file.
 * Skips and internal errors both end in a silent verdict.
 */
export function runPipeline(filePath: string, config: Config): FileReport {
  const loaded = loadSource(filePath, config);
  if (loaded.status !== "ok") {
    return settle(filePath, loaded);
  }

  const file = loaded.value;
  const scanned = analyzeSource(file.content, file.displayPath);
  if (scanned.status !== "ok") {
    return { ...settle(filePath, scanned), file };
  }

  for (const ignored of scanned.value.ignoredFindings) {
    logDebug("finding suppressed inline", {
      rule: ignored.finding.rule_id,
      line: ignored.finding.line,
      reason: ignored.reason,
    });
  }
  const result = aggregate(scanned.value.findings, config);
  return {
    file,
    verdict: buildVerdict(result, config),
    ignoredFindings: scanned.value.ignoredFindings,
  };
}

function settle(filePath: string, outcome: Exclude<StageOutcome<unknown>, { status: "ok" }>): FileReport {
  if (outcome.status === "skip") {
    logDebug("file not analysed", { file: filePath, reason: outcome.reason });
    return { verdict: silentVerdict(), ignoredFindings: [], skipped: outcome.reason };
  }
  logError(`${outcome.stage} stage failed; allowing the edit`, { file: filePath, error: outcome.error });
  return { verdict: silentVerdict(), ignoredFindings: [], skipped: `${outcome.stage}-error` };
}

function dedupeFindings(findings: Finding[]): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];
  for (const finding of findings) {
    const key = [finding.rule_id, finding.line, finding.column].join("|");
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(finding);
  }
  return unique;
}

interface IgnoreDirective {
  ruleId: string;
  reason: string;
  line: number;
  /** The comment is the whole line, so it may cover the line below. */
  standalone: boolean;
  consumed: boolean;
}

const IGNORE_PATTERN = /#\s*guard-ignore\s+([a-z0-9-]+)\s*:\s*(.*)$/;

export function parseIgnoreDirectives(lines: readonly string[]): IgnoreDirective[] {
  const directives: IgnoreDirective[] = [];
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    const match = IGNORE_PATTERN.exec(line);
    if (!match) {
      continue;
    }
    const reason = match[2].trim();
    if (reason.length === 0) {
      continue;
    }
    directives.push({
      ruleId: match[1],
      reason,
      line: index + 1,
      standalone: line.trimStart().startsWith("#"),
      consumed: false,
    });
  }
  return directives;
}

function applyIgnoreDirectives(
  lines: readonly string[],
  findings: Finding[],
): { activeFindings: Finding[]; ignoredFindings: IgnoredFinding[] } {
  const directives = parseIgnoreDirectives(lines);
  if (directives.length === 0) {
    return { activeFindings: findings, ignoredFindings: [] };
  }

  const activeFindings: Finding[] = [];
  const ignoredFindings: IgnoredFinding[] = [];
  for (const finding of findings) {
    const match = directives.find(
      (directive) =>
        !directive.consumed &&
        directive.ruleId === finding.rule_id &&
        (directive.line === finding.line || (directive.standalone && directive.line === finding.line - 1)),
    );
    if (match) {
      match.consumed = true;
      ignoredFindings.push({ finding, reason: match.reason, annotationLine: match.line });
      continue;
    }
    activeFindings.push(finding);
  }
  return { activeFindings, ignoredFindings };
}
