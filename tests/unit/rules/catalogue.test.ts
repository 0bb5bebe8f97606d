import { describe, expect, it } from "vitest";
import { AVAILABLE_RULE_IDS, RULES, findRule, rulesInCategory } from "../../../src/scanner/rules/index.js";
import { CATEGORIES, SEVERITIES } from "../../../src/scanner/types.js";

describe("rule catalogue", () => {
  it("has unique kebab-case ids", () => {
    expect(new Set(AVAILABLE_RULE_IDS).size).toBe(RULES.length);
    for (const id of AVAILABLE_RULE_IDS) {
      expect(id).toMatch(/^[a-z0-9]+(-[a-z0-9]+)*$/);
    }
  });

  it("gives every rule metadata and at least one node kind", () => {
    for (const rule of RULES) {
      expect(CATEGORIES).toContain(rule.category);
      expect(SEVERITIES).toContain(rule.severity);
      expect(rule.title.length).toBeGreaterThan(0);
      expect(rule.recommendation.length).toBeGreaterThan(0);
      expect(rule.kinds.length).toBeGreaterThan(0);
    }
  });

  it("covers every category", () => {
    for (const category of CATEGORIES) {
      expect(rulesInCategory(category).length).toBeGreaterThan(0);
    }
  });

  it("looks rules up by id", () => {
    expect(findRule("mutable-default")?.severity).toBe("high");
    expect(findRule("injection-heuristic")?.severity).toBe("critical");
    expect(findRule("assert-in-production")?.severity).toBe("high");
    expect(findRule("no-such-rule")).toBeUndefined();
  });
});
