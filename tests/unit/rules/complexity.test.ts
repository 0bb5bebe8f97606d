import { describe, expect, it } from "vitest";
import { findingsFor, linesOf, py } from "../helpers.js";

function branches(count: number): string[] {
  const lines: string[] = [];
  for (let index = 0; index < count; index += 1) {
    lines.push(`    if x == ${index}:`, `        y = ${index}`);
  }
  return lines;
}

describe("complexity rules", () => {
  it("cyclomatic-complexity reports past ten paths", () => {
    const busy = py("def busy(x):", ...branches(10), "    return y");
    const [finding] = findingsFor(busy, "cyclomatic-complexity");
    expect(finding.message).toBe("Function 'busy' has cyclomatic complexity 11 (limit 10).");

    const fine = py("def fine(x):", ...branches(9), "    return y");
    expect(findingsFor(fine, "cyclomatic-complexity")).toEqual([]);
  });

  it("too-many-parameters ignores self", () => {
    const many = py("class A:", "    def f(self, a, b, c, d, e, g):", "        pass");
    expect(findingsFor(many, "too-many-parameters").map((finding) => finding.message)).toEqual([
      "Function 'f' takes 6 parameters (limit 5).",
    ]);
    const five = py("class A:", "    def f(self, a, b, c, d, e):", "        pass");
    expect(findingsFor(five, "too-many-parameters")).toEqual([]);
  });

  it("long-function measures the body", () => {
    const body = (count: number) => Array.from({ length: count }, (_, index) => `    x${index} = ${index}`);
    expect(findingsFor(py("def long():", ...body(51)), "long-function").map((finding) => finding.message)).toEqual([
      "Function 'long' body spans 51 lines (limit 50).",
    ]);
    expect(findingsFor(py("def short():", ...body(50)), "long-function")).toEqual([]);
  });

  it("deep-nesting reports the first block past the limit once", () => {
    const source = py(
      "def f(a, b, c):",
      "    if a:",
      "        for x in a:",
      "            while b:",
      "                with c:",
      "                    if x:",
      "                        if b:",
      "                            pass",
    );
    const findings = findingsFor(source, "deep-nesting");
    expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
      [6, "Control flow is nested 5 levels deep."],
    ]);
  });

  it("deep-nesting does not count elif as a level", () => {
    const source = py(
      "def f(a, b, c):",
      "    if a:",
      "        for x in a:",
      "            while b:",
      "                if c:",
      "                    pass",
      "                elif x:",
      "                    pass",
    );
    expect(findingsFor(source, "deep-nesting")).toEqual([]);
  });

  it("too-many-returns counts return statements", () => {
    const lines = ["def pick(x):"];
    for (let index = 0; index < 7; index += 1) {
      lines.push(`    if x == ${index}:`, `        return ${index}`);
    }
    expect(findingsFor(py(...lines), "too-many-returns").map((finding) => finding.message)).toEqual([
      "Function 'pick' has 7 return statements (limit 6).",
    ]);
  });

  describe("else-after-return", () => {
    it("reports else after return", () => {
      const source = py("def sign(x):", "    if x > 0:", "        return 1", "    else:", "        return -1");
      expect(linesOf(findingsFor(source, "else-after-return"))).toEqual([2]);
    });

    it("accepts an elif chain", () => {
      const source = py(
        "def sign(x):",
        "    if x > 0:",
        "        return 1",
        "    elif x < 0:",
        "        return -1",
        "    return 0",
      );
      expect(findingsFor(source, "else-after-return")).toEqual([]);
    });
  });

  it("complex-comprehension reports three for clauses and nesting", () => {
    const source = py(
      "flat = [a for a in x for b in y for c in z]",
      "grid = [[cell for cell in row] for row in rows]",
      "pairs = [(a, b) for a in x for b in y]",
    );
    const findings = findingsFor(source, "complex-comprehension");
    expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
      [1, "Comprehension has 3 for clauses."],
      [2, "Comprehension builds another comprehension per element."],
    ]);
  });

  it("complex-boolean-expression reports the whole chain once", () => {
    const source = py("if a and b and c and d and e:", "    pass", "if a and b and c and d:", "    pass");
    const findings = findingsFor(source, "complex-boolean-expression");
    expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
      [1, "'and' chain has 5 operands (limit 4)."],
    ]);
  });
});
