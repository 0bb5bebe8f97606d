import { describe, expect, it } from "vitest";
import { findingsFor, linesOf, py } from "../helpers.js";

describe("organization rules", () => {
  it("wildcard-import names the module", () => {
    const findings = findingsFor(py("from os.path import *", "from os import path"), "wildcard-import");
    expect(findings.map((finding) => finding.message)).toEqual([
      "'from os.path import *' pulls unknown names into the module.",
    ]);
  });

  it("multiple-imports reports comma-separated imports", () => {
    const findings = findingsFor(py("import os, sys", "import json"), "multiple-imports");
    expect(findings.map((finding) => [finding.line, finding.message])).toEqual([[1, "One statement imports os, sys."]]);
  });

  it("god-class counts methods", () => {
    const methods = (count: number) =>
      Array.from({ length: count }, (_, index) => [`    def m${index}(self):`, "        pass"]).flat();
    expect(linesOf(findingsFor(py("class Big:", ...methods(21)), "god-class"))).toEqual([1]);
    expect(findingsFor(py("class Fine:", ...methods(20)), "god-class")).toEqual([]);
  });

  describe("duplicate-definition", () => {
    it("reports the second definition", () => {
      const source = py("def handler():", "    pass", "", "def handler():", "    return 1");
      const findings = findingsFor(source, "duplicate-definition");
      expect(findings.map((finding) => [finding.line, finding.message])).toEqual([
        [4, "'handler' is already defined on line 1; this definition replaces it."],
      ]);
    });

    it("accepts property setters and overloads", () => {
      const source = py(
        "class A:",
        "    @property",
        "    def value(self):",
        "        return self._value",
        "",
        "    @value.setter",
        "    def value(self, new):",
        "        self._value = new",
        "",
        "@overload",
        "def parse(x: int) -> int: ...",
        "@overload",
        "def parse(x: str) -> str: ...",
        "def parse(x):",
        "    return x",
      );
      expect(findingsFor(source, "duplicate-definition")).toEqual([]);
    });

    it("treats nested scopes separately", () => {
      const source = py("def run():", "    pass", "class Job:", "    def run(self):", "        pass");
      expect(findingsFor(source, "duplicate-definition")).toEqual([]);
    });
  });
});
