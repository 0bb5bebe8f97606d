import { afterEach, describe, expect, it, vi } from "vitest";
import { buildSyntaxTree } from "../../src/scanner/tree-builder.js";
import { buildDispatchTable, isGuarded, traverse } from "../../src/scanner/traversal.js";
import { defineRule } from "../../src/scanner/rules/define.js";
import { splitLines } from "../../src/scanner/source-loader.js";
import type { Finding, Rule } from "../../src/scanner/types.js";
import { py } from "./helpers.js";

function run(source: string, rules: readonly Rule[]): Finding[] {
  const tree = buildSyntaxTree(source);
  if (tree.status !== "ok") {
    throw new Error("expected a tree");
  }
  return traverse(tree.value, buildDispatchTable(rules), "mark.py", splitLines(source));
}

/** Records the frame kinds active at every call to a function named mark*. */
function frameRecorder(seen: string[]): Rule {
  return defineRule({
    id: "frame-mark",
    title: "mark",
    category: "runtime",
    severity: "low",
    kinds: ["Call"],
    description: "test mark",
    recommendation: "none",
    check(call, context) {
      if (call.func.kind === "Name" && call.func.id.startsWith("mark")) {
        seen.push(`${call.func.id}:${context.frames.map((frame) => frame.kind).join(">")}`);
      }
      return undefined;
    },
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildDispatchTable", () => {
  it("files each rule under every kind it handles", () => {
    const mark = frameRecorder([]);
    const table = buildDispatchTable([mark]);
    expect([...table.keys()]).toEqual(["Call"]);
    expect(table.get("Call")).toEqual([mark]);
  });
});

/** Records block depth and the scope's string names at every call to a function named mark*. */
function scopeRecorder(seen: string[]): Rule {
  return defineRule({
    id: "scope-mark",
    title: "mark",
    category: "runtime",
    severity: "low",
    kinds: ["Call"],
    description: "test mark",
    recommendation: "none",
    check(call, context) {
      if (call.func.kind === "Name" && call.func.id.startsWith("mark")) {
        seen.push(`${call.func.id}:${context.blockDepth}:${[...context.scopeFacts.stringNames].join(",")}`);
      }
      return undefined;
    },
  });
}

describe("traverse", () => {
  it("tracks block depth per function and the innermost scope's facts", () => {
    const seen: string[] = [];
    run(
      py(
        'label = "x"',
        "def outer():",
        '    title = "y"',
        "    mark_a()",
        "    if x:",
        "        for y in z:",
        "            mark_b()",
        "    elif w:",
        "        mark_c()",
        "class Box:",
        '    name = "z"',
        "    mark_d()",
        "mark_e()",
      ),
      [scopeRecorder(seen)],
    );
    expect(seen).toEqual([
      "mark_a:0:title",
      "mark_b:2:title",
      "mark_c:1:title",
      "mark_d:undefined:name",
      "mark_e:undefined:label",
    ]);
  });

  it("pushes guarded, handler and finally frames", () => {
    const seen: string[] = [];
    run(
      py(
        "def outer():",
        "    try:",
        "        mark_body()",
        "    except ValueError:",
        "        mark_handler()",
        "    finally:",
        "        mark_finally()",
      ),
      [frameRecorder(seen)],
    );
    expect(seen).toEqual([
      "mark_body:function>guarded",
      "mark_handler:function>handler",
      "mark_finally:function>finally",
    ]);
  });

  it("evaluates a loop's iterable outside the loop frame", () => {
    const seen: string[] = [];
    run(py("for item in mark_iter():", "    mark_body()"), [frameRecorder(seen)]);
    expect(seen).toEqual(["mark_iter:", "mark_body:loop"]);
  });

  it("evaluates a comprehension's first iterable outside it", () => {
    const seen: string[] = [];
    run(py("values = [mark_element(x) for x in mark_iter()]"), [frameRecorder(seen)]);
    expect(seen).toEqual(["mark_iter:", "mark_element:comprehension"]);
  });

  it("does not carry an enclosing try into a nested function", () => {
    const guarded: Array<[string, boolean]> = [];
    const rule = defineRule({
      id: "guard-mark",
      title: "mark",
      category: "runtime",
      severity: "low",
      kinds: ["Call"],
      description: "test mark",
      recommendation: "none",
      check(call, context) {
        guarded.push([call.func.text, isGuarded(context)]);
        return undefined;
      },
    });
    run(
      py(
        "def outer():",
        "    try:",
        "        def inner():",
        "            commit()",
        "        inner()",
        "    except Exception:",
        "        raise",
      ),
      [rule],
    );
    expect(guarded).toEqual([
      ["commit", false],
      ["inner", true],
    ]);
  });

  it("keeps going when one rule throws", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const failing = defineRule({
      id: "always-fails",
      title: "fails",
      category: "runtime",
      severity: "low",
      kinds: ["Call"],
      description: "test rule",
      recommendation: "none",
      check() {
        throw new Error("boom");
      },
    });
    const reporting = defineRule({
      id: "reports-calls",
      title: "reports",
      category: "runtime",
      severity: "low",
      kinds: ["Call"],
      description: "test rule",
      recommendation: "Do something else.",
      check(call) {
        return { node: call, message: `call to ${call.func.text}` };
      },
    });

    const findings = run(py("first()", "second()"), [failing, reporting]);

    expect(findings.map((finding) => [finding.rule_id, finding.line, finding.message])).toEqual([
      ["reports-calls", 1, "call to first"],
      ["reports-calls", 2, "call to second"],
    ]);
    expect(findings[0]).toMatchObject({
      file: "mark.py",
      column: 0,
      recommendation: "Do something else.",
      snippet: "first()",
    });
    expect(stderr).toHaveBeenCalledTimes(2);
  });
});
