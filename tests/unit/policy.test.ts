import { describe, expect, it } from "vitest";
import { aggregate, compareFindings, countBySeverity, filterFindings } from "../../src/scanner/filters.js";
import { buildVerdict, decide, silentVerdict } from "../../src/scanner/policy.js";
import { SEVERITIES } from "../../src/scanner/types.js";
import { makeFinding } from "./factories.js";

const everything = { levels: new Set(SEVERITIES), disabledRules: new Set<string>() };

describe("filters", () => {
  it("sorts the most severe first, then by position", () => {
    const low = makeFinding({ severity: "low", line: 1 });
    const criticalLate = makeFinding({ severity: "critical", line: 9 });
    const criticalEarly = makeFinding({ severity: "critical", line: 2 });
    const high = makeFinding({ severity: "high", line: 3 });

    expect([low, criticalLate, criticalEarly, high].sort(compareFindings)).toEqual([
      criticalEarly,
      criticalLate,
      high,
      low,
    ]);
  });

  it("keeps only enabled levels and rules", () => {
    const findings = [
      makeFinding({ severity: "low", rule_id: "bool-equality" }),
      makeFinding({ severity: "high", rule_id: "mutable-default" }),
      makeFinding({ severity: "medium", rule_id: "bare-except" }),
    ];
    const kept = filterFindings(findings, {
      levels: new Set(["high", "medium"] as const),
      disabledRules: new Set(["bare-except"]),
    });
    expect(kept.map((finding) => finding.rule_id)).toEqual(["mutable-default"]);
  });

  it("counts by severity", () => {
    const findings = [
      makeFinding({ severity: "critical" }),
      makeFinding({ severity: "medium" }),
      makeFinding({ severity: "medium" }),
    ];
    expect(countBySeverity(findings)).toEqual({ critical: 1, high: 0, medium: 2, low: 0 });
  });

  it("aggregates to counts that add up to the total", () => {
    const result = aggregate(
      [makeFinding({ severity: "high" }), makeFinding({ severity: "low" })],
      everything,
    );
    expect(result.total).toBe(2);
    expect(result.counts.critical + result.counts.high + result.counts.medium + result.counts.low).toBe(result.total);
  });
});

describe("policy", () => {
  it("is silent with no findings", () => {
    expect(decide(aggregate([], everything), { blockOnCritical: true })).toBe("silent");
  });

  it("blocks on a critical finding", () => {
    const result = aggregate([makeFinding({ severity: "critical" }), makeFinding({ severity: "low" })], everything);
    expect(decide(result, { blockOnCritical: true })).toBe("block");
    expect(decide(result, { blockOnCritical: false })).toBe("warn");
  });

  it("warns on non-critical findings", () => {
    const result = aggregate([makeFinding({ severity: "high" })], everything);
    expect(buildVerdict(result, { blockOnCritical: true })).toMatchObject({ decision: "warn", total: 1 });
  });

  it("builds an empty silent verdict", () => {
    expect(silentVerdict()).toEqual({
      decision: "silent",
      findings: [],
      counts: { critical: 0, high: 0, medium: 0, low: 0 },
      total: 0,
    });
  });
});
