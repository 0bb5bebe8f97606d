import { describe, expect, it, vi } from "vitest";
import { findingsFor, linesOf, py } from "../helpers.js";

describe("performance rules", () => {
  describe("string-concat-in-loop", () => {
    it("reports += on a string built in a loop", () => {
      const source = py(
        "def render(rows):",
        '    out = ""',
        "    for row in rows:",
        "        out += row",
        "    return out",
      );
      const [finding] = findingsFor(source, "string-concat-in-loop");
      expect(finding.line).toBe(4);
      expect(finding.message).toBe("String 'out' is built with += inside a loop.");
    });

    it("accepts numeric accumulators", () => {
      const source = py("def total(rows):", "    total = 0", "    for row in rows:", "        total += row.price", "    return total");
      expect(findingsFor(source, "string-concat-in-loop")).toEqual([]);
    });
  });

  it("query-in-loop reports one query per iteration", () => {
    const source = py(
      "def load(ids):",
      "    for item_id in ids:",
      '        cursor.execute("SELECT 1")',
      "        User.objects.get(pk=item_id)",
    );
    expect(linesOf(findingsFor(source, "query-in-loop"))).toEqual([3, 4]);
  });

  it("list-membership-in-loop reports list literals only", () => {
    const source = py(
      "for x in xs:",
      "    if x in [1, 2]:",
      "        pass",
      "    if x in {1, 2}:",
      "        pass",
    );
    expect(linesOf(findingsFor(source, "list-membership-in-loop"))).toEqual([2]);
  });

  it("list-membership-in-loop reads 'not in' tests", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const source = py(
      "for i in items:",
      "    if i not in [1, 2]:",
      "        pass",
      "    if i not in seen:",
      "        pass",
    );
    expect(linesOf(findingsFor(source, "list-membership-in-loop"))).toEqual([2]);
    expect(stderr).not.toHaveBeenCalled();
    stderr.mockRestore();
  });

  it("range-len-iteration covers loops and comprehensions", () => {
    const source = py(
      "for i in range(len(items)):",
      "    show(items[i])",
      "pairs = [items[i] for i in range(len(items))]",
      "for i in range(10):",
      "    pass",
    );
    expect(linesOf(findingsFor(source, "range-len-iteration"))).toEqual([1, 3]);
  });

  it("dict-keys-iteration covers iteration and membership", () => {
    const source = py("for k in d.keys():", "    pass", "if k in d.keys():", "    pass", "for k in d:", "    pass");
    const findings = findingsFor(source, "dict-keys-iteration");
    expect(findings.map((finding) => [finding.line, finding.column])).toEqual([
      [1, 9],
      [3, 8],
    ]);
  });

  it("materialized-any-all reports list comprehensions passed to reducers", () => {
    const source = py("ok = any([x > 0 for x in xs])", "ok = any(x > 0 for x in xs)", "n = sum([1, 2])");
    const findings = findingsFor(source, "materialized-any-all");
    expect(findings.map((finding) => finding.message)).toEqual([
      "any() receives a list comprehension; a generator is enough.",
    ]);
  });

  it("regex-compile-in-loop names the enclosing function", () => {
    const source = py(
      "PATTERN = re.compile(r'\\d+')",
      "def scan(lines):",
      "    for line in lines:",
      "        re.compile(r'\\w+').match(line)",
    );
    const findings = findingsFor(source, "regex-compile-in-loop");
    expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
      [4, "re.compile() runs on every iteration in 'scan'."],
    ]);
  });
});
