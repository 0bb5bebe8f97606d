import { Command, InvalidArgumentError } from "commander";
import { runPipeline } from "./scanner/scan.js";
import {
  buildReport,
  formatJsonReport,
  formatRuleList,
  formatTerminalReport,
} from "./scanner/reporter.js";
import { CATEGORIES, SEVERITIES, type Category, type Severity } from "./scanner/types.js";
import { AVAILABLE_RULE_IDS, RULES, findRule, rulesInCategory } from "./scanner/rules/index.js";
import { StaticExplainer, formatExplanation } from "./scanner/explainer.js";
import { loadConfig, withOverrides } from "./scanner/config.js";
import { runHook } from "./hook/run.js";
import { setDebugEnabled } from "./utils/logger.js";

export const VERSION = "0.1.0";

function parseSeverities(value: string): Severity[] {
  const requested = value
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
  const levels = SEVERITIES.filter((severity) => requested.includes(severity));
  const invalid = requested.filter((entry) => !SEVERITIES.some((severity) => severity === entry));
  if (invalid.length > 0 || levels.length === 0) {
    throw new InvalidArgumentError(
      `Invalid --severity "${value}". Expected a comma-separated list of: ${SEVERITIES.join(", ")}.`,
    );
  }
  return levels;
}

function parseRuleIds(value: string): string[] {
  const rules = value
    .split(",")
    .map((rule) => rule.trim().toLowerCase())
    .filter((rule) => rule.length > 0);

  if (rules.length === 0) {
    throw new InvalidArgumentError("Invalid --disable value. Provide a comma-separated list of rule IDs.");
  }

  const invalid = rules.filter((rule) => !AVAILABLE_RULE_IDS.includes(rule));
  if (invalid.length > 0) {
    throw new InvalidArgumentError(
      `Unknown rule ID(s): ${invalid.join(", ")}. Run 'antipattern-guard rules' to list them.`,
    );
  }
  return rules;
}

function parseLimit(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Invalid --limit "${value}". Expected a non-negative number.`);
  }
  return parsed;
}

function parseCategory(value: string): Category {
  const normalized = value.trim().toLowerCase();
  const category = CATEGORIES.find((candidate) => candidate === normalized);
  if (!category) {
    throw new InvalidArgumentError(`Invalid --category "${value}". Expected one of: ${CATEGORIES.join(", ")}.`);
  }
  return category;
}

export function runCli(argv: string[]): void {
  const program = new Command();

  program
    .name("antipattern-guard")
    .description("Post-edit hook that flags Python antipatterns before they land")
    .version(VERSION)
    .addHelpText(
      "after",
      "\nInline suppression:\n  # guard-ignore <rule-id>: <reason>   on the flagged line or the line above.\n",
    );

  program
    .command("hook", { isDefault: true })
    .description("Read one hook invocation on stdin and write the decision JSON to stdout")
    .action(() => {
      runHook();
    });

  program
    .command("scan")
    .description("Scan Python files and print a report")
    .argument("<files...>", "Python files to scan")
    .option("-s, --severity <levels>", "Comma-separated severities to report", parseSeverities)
    .option("-d, --disable <ids>", "Comma-separated rule IDs to skip", parseRuleIds)
    .option("--limit <number>", "Limit findings shown per file", parseLimit)
    .option("--json", "Print the report as JSON")
    .option("--debug", "Log pipeline decisions to stderr")
    .action(
      (
        files: string[],
        options: {
          severity?: Severity[];
          disable?: string[];
          limit?: number;
          json?: boolean;
          debug?: boolean;
        },
      ) => {
        const base = loadConfig();
        const config = withOverrides(base, {
          levels: options.severity ? new Set(options.severity) : base.levels,
          disabledRules: options.disable ? new Set([...base.disabledRules, ...options.disable]) : base.disabledRules,
          debug: options.debug ?? base.debug,
        });
        setDebugEnabled(config.debug);

        const results = files.map((file) => ({ path: file, report: runPipeline(file, config) }));
        const report = buildReport(results, {
          tool: "antipattern-guard",
          version: VERSION,
          scannedAt: new Date().toISOString(),
        });

        const rendered = options.json
          ? formatJsonReport(report)
          : formatTerminalReport(report, options.limit ?? config.maxIssues);
        process.stdout.write(`${rendered}\n`);
        if (report.summary.blocked) {
          process.exitCode = 1;
        }
      },
    );

  program
    .command("rules")
    .description("List the rule catalogue")
    .option("-c, --category <category>", "Only rules of one category", parseCategory)
    .action((options: { category?: Category }) => {
      const rules = options.category ? rulesInCategory(options.category) : RULES;
      process.stdout.write(`${formatRuleList(rules)}\n`);
    });

  program
    .command("explain")
    .argument("<rule_id>", "Rule ID to explain")
    .action((ruleId: string) => {
      const rule = findRule(ruleId.trim().toLowerCase());
      if (!rule) {
        throw new InvalidArgumentError(
          `Unknown rule ID "${ruleId}". Run 'antipattern-guard rules' to list them.`,
        );
      }
      const explanation = new StaticExplainer().explain(rule);
      process.stdout.write(`${formatExplanation(rule, explanation)}\n`);
    });

  program.parse(argv);
}
