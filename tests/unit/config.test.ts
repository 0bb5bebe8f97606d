import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_MAX_BYTES,
  DEFAULT_MAX_ISSUES,
  DEFAULT_MAX_LINES,
  loadConfig,
  withOverrides,
} from "../../src/scanner/config.js";

const cwd = path.resolve("/work");

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadConfig({}, cwd);
    expect(config.enabled).toBe(true);
    expect([...config.levels]).toEqual(["critical", "high", "medium", "low"]);
    expect(config.blockOnCritical).toBe(true);
    expect(config.disabledRules.size).toBe(0);
    expect(config.maxIssues).toBe(DEFAULT_MAX_ISSUES);
    expect(config.includeTips).toBe(false);
    expect(config.maxLines).toBe(DEFAULT_MAX_LINES);
    expect(config.maxBytes).toBe(DEFAULT_MAX_BYTES);
    expect(config.projectDir).toBe(cwd);
    expect(config.debug).toBe(false);
  });

  it("reads every setting from the environment", () => {
    const config = loadConfig(
      {
        ANTIPATTERN_GUARD_ENABLED: "no",
        ANTIPATTERN_GUARD_LEVELS: "Critical, high",
        ANTIPATTERN_GUARD_BLOCK_ON_CRITICAL: "off",
        ANTIPATTERN_GUARD_DISABLED: "bare-except, global-statement",
        ANTIPATTERN_GUARD_MAX_ISSUES: "3",
        ANTIPATTERN_GUARD_INCLUDE_TIPS: "yes",
        ANTIPATTERN_GUARD_MAX_LINES: "200",
        ANTIPATTERN_GUARD_MAX_BYTES: "4096",
        ANTIPATTERN_GUARD_DEBUG: "1",
        CLAUDE_PROJECT_DIR: "project",
      },
      cwd,
    );
    expect(config.enabled).toBe(false);
    expect([...config.levels]).toEqual(["critical", "high"]);
    expect(config.blockOnCritical).toBe(false);
    expect([...config.disabledRules]).toEqual(["bare-except", "global-statement"]);
    expect(config.maxIssues).toBe(3);
    expect(config.includeTips).toBe(true);
    expect(config.maxLines).toBe(200);
    expect(config.maxBytes).toBe(4096);
    expect(config.debug).toBe(true);
    expect(config.projectDir).toBe(path.join(cwd, "project"));
  });

  it("falls back to the default and warns on invalid values", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const config = loadConfig(
      {
        ANTIPATTERN_GUARD_MAX_ISSUES: "many",
        ANTIPATTERN_GUARD_LEVELS: "urgent",
        ANTIPATTERN_GUARD_ENABLED: "maybe",
      },
      cwd,
    );
    expect(config.maxIssues).toBe(DEFAULT_MAX_ISSUES);
    expect(config.levels.size).toBe(4);
    expect(config.enabled).toBe(true);
    expect(stderr).toHaveBeenCalledTimes(3);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ ANTIPATTERN_GUARD_MAX_ISSUES: "  " }, cwd).maxIssues).toBe(DEFAULT_MAX_ISSUES);
  });

  it("rejects zero and negative limits", () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    expect(loadConfig({ ANTIPATTERN_GUARD_MAX_ISSUES: "0" }, cwd).maxIssues).toBe(DEFAULT_MAX_ISSUES);
    expect(loadConfig({ ANTIPATTERN_GUARD_MAX_LINES: "-5" }, cwd).maxLines).toBe(DEFAULT_MAX_LINES);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}, cwd))).toBe(true);
    expect(Object.isFrozen(withOverrides(loadConfig({}, cwd), { maxIssues: 1 }))).toBe(true);
  });
});
