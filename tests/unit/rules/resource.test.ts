import { describe, expect, it } from "vitest";
import { findingsFor, linesOf, py } from "../helpers.js";

describe("resource rules", () => {
  describe("open-without-context", () => {
    it("reports a bare open", () => {
      expect(linesOf(findingsFor(py("data = open(path).read()"), "open-without-context"))).toEqual([1]);
    });

    it("accepts with, closing() and returned handles", () => {
      const source = py(
        "with open(path) as handle:",
        "    data = handle.read()",
        "with closing(open(path)) as handle:",
        "    pass",
        "def reader(path):",
        "    return open(path)",
      );
      expect(findingsFor(source, "open-without-context")).toEqual([]);
    });
  });

  describe("db-operation-without-guard", () => {
    it("reports unguarded commits inside functions", () => {
      const source = py("def save(session, user):", "    session.add(user)", "    session.commit()");
      const findings = findingsFor(source, "db-operation-without-guard");
      expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
        [3, "Database call 'commit()' is not inside a try block."],
      ]);
    });

    it("accepts guarded calls and module-level scripts", () => {
      const source = py(
        "def save(session):",
        "    try:",
        "        session.commit()",
        "    except DatabaseError:",
        "        session.rollback()",
        "        raise",
        "session.commit()",
      );
      expect(linesOf(findingsFor(source, "db-operation-without-guard"))).toEqual([5]);
    });

    it("does not let a nested function inherit the guard", () => {
      const source = py(
        "def outer(session):",
        "    try:",
        "        def inner():",
        "            session.commit()",
        "        inner()",
        "    except Exception:",
        "        raise",
      );
      expect(linesOf(findingsFor(source, "db-operation-without-guard"))).toEqual([4]);
    });
  });

  describe("http calls", () => {
    it("reports missing guard and timeout", () => {
      const source = py("def fetch(url):", "    return requests.get(url)");
      expect(linesOf(findingsFor(source, "http-call-without-guard"))).toEqual([2]);
      expect(findingsFor(source, "http-call-without-timeout").map((finding) => finding.message)).toEqual([
        "HTTP call 'requests.get()' has no timeout.",
      ]);
    });

    it("accepts guarded calls with a timeout", () => {
      const source = py(
        "def fetch(url, **options):",
        "    try:",
        "        first = requests.get(url, timeout=5)",
        "        second = httpx.post(url, **options)",
        "        return first, second",
        "    except requests.RequestException:",
        "        raise",
      );
      expect(findingsFor(source, "http-call-without-guard")).toEqual([]);
      expect(findingsFor(source, "http-call-without-timeout")).toEqual([]);
    });
  });

  it("enter-without-return reports __enter__ returning nothing", () => {
    const source = py(
      "class Session:",
      "    def __enter__(self):",
      "        self.open()",
      "class Managed:",
      "    def __enter__(self):",
      "        return self",
    );
    const findings = findingsFor(source, "enter-without-return");
    expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
      [2, "__enter__ returns None; 'with ... as name' binds None."],
    ]);
  });

  describe("lock-acquire-without-release", () => {
    it("reports acquire in a function without try", () => {
      const source = py("def work(lock):", "    lock.acquire()", "    step()", "    lock.release()");
      expect(linesOf(findingsFor(source, "lock-acquire-without-release"))).toEqual([2]);
    });

    it("accepts acquire followed by try/finally", () => {
      const source = py(
        "def work(lock):",
        "    lock.acquire()",
        "    try:",
        "        step()",
        "    finally:",
        "        lock.release()",
      );
      expect(findingsFor(source, "lock-acquire-without-release")).toEqual([]);
    });
  });
});
