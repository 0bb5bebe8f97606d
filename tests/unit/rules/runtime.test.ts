import { describe, expect, it } from "vitest";
import { findingsFor, linesOf, py } from "../helpers.js";

describe("runtime rules", () => {
  describe("mutable-default", () => {
    it("reports the default value", () => {
      const [finding] = findingsFor(py("def f(items=[]):", "    return items"), "mutable-default");
      expect(finding).toMatchObject({ line: 1, column: 12 });
      expect(finding.recommendation).toBe("Use 'items=None' and assign a fresh value when it is None.");
    });

    it("covers factory calls and lambdas", () => {
      expect(findingsFor(py("def h(cache=dict()):", "    return cache"), "mutable-default")).toHaveLength(1);
      expect(findingsFor(py("handler = lambda acc={}: acc"), "mutable-default")).toHaveLength(1);
    });

    it("accepts None and tuples", () => {
      expect(findingsFor(py("def g(items=None, pair=(1, 2)):", "    return items"), "mutable-default")).toEqual([]);
    });
  });

  describe("dangerous-eval", () => {
    it("reports eval but not literal_eval", () => {
      const source = py("result = eval(expression)", "value = ast.literal_eval(text)", "run(exec_args)");
      expect(linesOf(findingsFor(source, "dangerous-eval"))).toEqual([1]);
    });
  });

  it("bare-except reports only untyped handlers", () => {
    const source = py(
      "try:",
      "    run()",
      "except:",
      "    raise",
      "try:",
      "    run()",
      "except ValueError:",
      "    raise",
    );
    expect(linesOf(findingsFor(source, "bare-except"))).toEqual([3]);
  });

  it("assert-in-production skips test files", () => {
    const source = py("assert x > 0");
    expect(findingsFor(source, "assert-in-production", "app/module.py").map((finding) => finding.severity)).toEqual(["high"]);
    expect(findingsFor(source, "assert-in-production", "tests/test_module.py")).toEqual([]);
    expect(findingsFor(source, "assert-in-production", "tests/conftest.py")).toEqual([]);
  });

  it("global-statement names the rebound variables", () => {
    const [finding] = findingsFor(py("def bump():", "    global counter, total", "    counter += 1"), "global-statement");
    expect(finding.message).toBe("Function rebinds module state: counter, total.");
    expect(finding.line).toBe(2);
  });

  describe("mutable-class-attribute", () => {
    it("reports list, dict and set class attributes", () => {
      const source = py("class Registry:", "    handlers = []", "    name = 'registry'", "    index = {}");
      expect(linesOf(findingsFor(source, "mutable-class-attribute"))).toEqual([2, 4]);
    });

    it("accepts ClassVar annotations", () => {
      const source = py("class Registry:", "    handlers: ClassVar[list] = []");
      expect(findingsFor(source, "mutable-class-attribute")).toEqual([]);
    });
  });

  describe("return-in-finally", () => {
    it("reports return inside finally", () => {
      const source = py("def f():", "    try:", "        return 1", "    finally:", "        return 2");
      expect(linesOf(findingsFor(source, "return-in-finally"))).toEqual([5]);
    });

    it("reports break that leaves finally", () => {
      const source = py("for item in items:", "    try:", "        pass", "    finally:", "        break");
      expect(linesOf(findingsFor(source, "return-in-finally"))).toEqual([5]);
    });

    it("accepts break in a loop inside finally", () => {
      const source = py(
        "def g(items):",
        "    try:",
        "        pass",
        "    finally:",
        "        for item in items:",
        "            break",
      );
      expect(findingsFor(source, "return-in-finally")).toEqual([]);
    });
  });

  describe("shadowed-builtin", () => {
    it("reports functions, parameters and assignments", () => {
      const source = py("def list():", "    pass", "def show(id):", "    return id", 'input = "x"');
      const findings = findingsFor(source, "shadowed-builtin");
      expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
        [1, "'list' shadows the builtin of the same name."],
        [3, "'id' shadows the builtin of the same name."],
        [5, "'input' shadows the builtin of the same name."],
      ]);
    });

    it("accepts methods named after builtins", () => {
      const source = py("class Query:", "    def filter(self):", "        return self");
      expect(findingsFor(source, "shadowed-builtin")).toEqual([]);
    });
  });

  it("eq-without-hash reports classes missing __hash__", () => {
    const source = py(
      "class Point:",
      "    def __eq__(self, other):",
      "        return True",
      "class Hashable:",
      "    def __eq__(self, other):",
      "        return True",
      "    __hash__ = None",
    );
    const findings = findingsFor(source, "eq-without-hash");
    expect(findings.map((finding) => finding.message)).toEqual([
      "Class 'Point' defines __eq__ but not __hash__; instances become unhashable.",
    ]);
  });

  it("init-returns-value reports the offending return", () => {
    const source = py(
      "class A:",
      "    def __init__(self):",
      "        if self:",
      "            return None",
      "        return 1",
    );
    expect(linesOf(findingsFor(source, "init-returns-value"))).toEqual([5]);
  });

  it("async-without-error-handling accepts a guarded coroutine", () => {
    const source = py(
      "async def fetch(client):",
      "    try:",
      '        return await client.get("/")',
      "    except TimeoutError:",
      "        raise",
    );
    expect(findingsFor(source, "async-without-error-handling")).toEqual([]);
  });

  describe("try-without-logging", () => {
    const handler = (...body: string[]) => py("try:", "    run()", "except ValueError:", ...body.map((line) => `    ${line}`));

    it("reports a handler that does not log", () => {
      expect(linesOf(findingsFor(handler("result = None"), "try-without-logging"))).toEqual([3]);
    });

    it("reports a bare re-raise that logs nothing", () => {
      expect(findingsFor(handler("raise"), "try-without-logging").map((finding) => [finding.line, finding.message])).toEqual([
        [3, "Exception is caught without being logged."],
      ]);
    });

    it("accepts logging, also when followed by a re-raise", () => {
      expect(findingsFor(handler('logger.exception("run failed")'), "try-without-logging")).toEqual([]);
      expect(findingsFor(handler('logger.exception("run failed")', "raise"), "try-without-logging")).toEqual([]);
    });

    it("accepts an awaited logging call", () => {
      const source = py(
        "async def run_job():",
        "    try:",
        "        await job()",
        "    except ValueError:",
        '        await notifier.error("job failed")',
      );
      expect(findingsFor(source, "try-without-logging")).toEqual([]);
    });
  });

  describe("api-endpoint-without-guard", () => {
    it("reports route handlers without try", () => {
      const source = py('@app.route("/items")', "def items():", "    return load()");
      const [finding] = findingsFor(source, "api-endpoint-without-guard");
      expect(finding.line).toBe(2);
      expect(finding.message).toBe("Endpoint 'items' has no error handling.");
    });

    it("accepts handlers with a try block and undecorated functions", () => {
      const guarded = py(
        '@router.get("/items")',
        "def items():",
        "    try:",
        "        return load()",
        "    except LookupError:",
        "        raise",
      );
      expect(findingsFor(guarded, "api-endpoint-without-guard")).toEqual([]);
      expect(findingsFor(py("def items():", "    return load()"), "api-endpoint-without-guard")).toEqual([]);
    });
  });
});
