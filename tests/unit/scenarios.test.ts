import { describe, expect, it } from "vitest";
import { analyzeSource } from "../../src/scanner/scan.js";
import { aggregate } from "../../src/scanner/filters.js";
import { buildVerdict } from "../../src/scanner/policy.js";
import { SEVERITIES } from "../../src/scanner/types.js";
import { py, scan } from "./helpers.js";

const settings = {
  levels: new Set(SEVERITIES),
  disabledRules: new Set<string>(),
  blockOnCritical: true,
};

function verdictFor(source: string) {
  return buildVerdict(aggregate(scan(source), settings), settings);
}

describe("end-to-end scenarios", () => {
  it("reports a mutable default argument as a warning", () => {
    const source = py("def f(x=[]): x.append(1); return x");
    const findings = scan(source);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      rule_id: "mutable-default",
      severity: "high",
      category: "runtime",
      line: 1,
      column: 8,
      snippet: "def f(x=[]): x.append(1); return x",
    });
    expect(verdictFor(source).decision).toBe("warn");
  });

  it("blocks a query built from an f-string", () => {
    const source = py('cursor.execute(f"SELECT * FROM users WHERE id = {user_id}")');
    const findings = scan(source);

    expect(findings.map((finding) => finding.rule_id)).toEqual(["injection-heuristic"]);
    expect(findings[0].severity).toBe("critical");
    expect(findings[0].message).toBe("execute() receives a query built with an f-string; possible SQL injection.");
    expect(verdictFor(source).decision).toBe("block");
  });

  it("accepts a handler that logs the exception", () => {
    const source = py(
      "import logging",
      "",
      "logger = logging.getLogger(__name__)",
      "",
      "",
      "def load(path):",
      "    try:",
      "        with open(path) as handle:",
      "            return handle.read()",
      "    except OSError as error:",
      '        logger.error("could not read %s: %s", path, error)',
      "        return None",
    );

    expect(scan(source)).toEqual([]);
    expect(verdictFor(source).decision).toBe("silent");
  });

  it("warns about an async function without a try block", () => {
    const source = py(
      "async def fetch(http_client):",
      '    response = await http_client.get("/items")',
      "    return response",
    );
    const findings = scan(source);

    expect(findings.map((finding) => [finding.rule_id, finding.severity, finding.line])).toEqual([
      ["async-without-error-handling", "medium", 1],
    ]);
    expect(findings[0].message).toBe("async function 'fetch' has no try/except around its awaits.");
    expect(verdictFor(source).decision).toBe("warn");
  });

  it("gives the same findings on every run", () => {
    const source = py(
      "def render(rows, seen=[]):",
      '    out = ""',
      "    for row in rows:",
      "        out += row",
      "    return eval(out)",
    );
    const first = analyzeSource(source, "render.py");
    const second = analyzeSource(source, "render.py");

    expect(second).toEqual(first);
  });
});
