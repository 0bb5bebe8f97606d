import type { Rule } from "./types.js";
import { severityLabel } from "./reporter.js";

export interface RuleExplanation {
  summary: string;
  whyRisky: string;
  howToFix: string;
  codeExample?: string;
}

export interface Explainer {
  explain(rule: Rule): RuleExplanation;
}

const CODE_EXAMPLES: Record<string, string> = {
  "mutable-default": `# Bad
def add(item, items=[]):
    items.append(item)
    return items

# Good
def add(item, items=None):
    if items is None:
        items = []
    items.append(item)
    return items`,
  "injection-heuristic": `# Bad
cursor.execute(f"SELECT * FROM users WHERE id = {user_id}")

# Good
cursor.execute("SELECT * FROM users WHERE id = %s", (user_id,))`,
  "command-injection": `# Bad
subprocess.run(f"tar -xf {archive}", shell=True)

# Good
subprocess.run(["tar", "-xf", archive], check=True)`,
  "try-without-logging": `# Bad
try:
    sync()
except SyncError:
    return None

# Good
try:
    sync()
except SyncError:
    logger.exception("sync failed")
    return None`,
  "late-binding-closure": `# Bad
handlers = [lambda: notify(user) for user in users]

# Good
handlers = [lambda user=user: notify(user) for user in users]`,
  "open-without-context": `# Bad
data = open(path).read()

# Good
with open(path) as handle:
    data = handle.read()`,
  "http-call-without-timeout": `# Bad
requests.get(url)

# Good
requests.get(url, timeout=10)`,
  "mutate-while-iterating": `# Bad
for item in items:
    if item.expired:
        items.remove(item)

# Good
items = [item for item in items if not item.expired]`,
};

export class StaticExplainer implements Explainer {
  explain(rule: Rule): RuleExplanation {
    return {
      summary: `${rule.title} (${rule.category}, ${severityLabel(rule.severity)})`,
      whyRisky: rule.description,
      howToFix: rule.recommendation,
      codeExample: CODE_EXAMPLES[rule.id],
    };
  }
}

export function formatExplanation(rule: Rule, explanation: RuleExplanation): string {
  const lines = [
    `${rule.id}: ${explanation.summary}`,
    "",
    `Why: ${explanation.whyRisky}`,
    `Fix: ${explanation.howToFix}`,
  ];
  if (explanation.codeExample) {
    lines.push("", explanation.codeExample);
  }
  return lines.join("\n");
}
