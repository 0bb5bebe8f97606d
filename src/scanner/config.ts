import path from "node:path";
import { z } from "zod";
import type { Severity } from "./types.js";
import { logWarning } from "../utils/logger.js";

export interface Config {
  enabled: boolean;
  levels: ReadonlySet<Severity>;
  blockOnCritical: boolean;
  disabledRules: ReadonlySet<string>;
  /** Caps what the reporter renders, not what is found. */
  maxIssues: number;
  /** Appends each reported rule's description to the feedback. */
  includeTips: boolean;
  maxLines: number;
  maxBytes: number;
  projectDir: string;
  debug: boolean;
}

export const ENV_PREFIX = "ANTIPATTERN_GUARD_";

export const DEFAULT_MAX_ISSUES = 10;
export const DEFAULT_MAX_LINES = 10_000;
export const DEFAULT_MAX_BYTES = 1_048_576;

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);

const booleanSetting = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["1", "0", "true", "false", "yes", "no", "on", "off"]))
  .transform((value) => TRUE_WORDS.has(value));

const positiveIntSetting = z.string().trim().pipe(z.coerce.number().int().positive());

const severityList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0),
  )
  .pipe(z.array(z.enum(["critical", "high", "medium", "low"])).min(1));

const idList = z.string().transform((value) =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0),
);

type Env = Readonly<Record<string, string | undefined>>;

function readSetting<T>(env: Env, name: string, schema: z.ZodType<T, z.ZodTypeDef, string>, fallback: T): T {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  logWarning(`ignoring invalid ${name}, using the default`, {
    value: raw,
    issue: parsed.error.issues[0]?.message,
  });
  return fallback;
}

/** Reads the environment once; the result is frozen and passed by parameter. */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): Config {
  const levels = readSetting(env, `${ENV_PREFIX}LEVELS`, severityList, ["critical", "high", "medium", "low"]);
  const projectDir = env.CLAUDE_PROJECT_DIR?.trim();
  return Object.freeze({
    enabled: readSetting(env, `${ENV_PREFIX}ENABLED`, booleanSetting, true),
    levels: new Set<Severity>(levels),
    blockOnCritical: readSetting(env, `${ENV_PREFIX}BLOCK_ON_CRITICAL`, booleanSetting, true),
    disabledRules: new Set(readSetting(env, `${ENV_PREFIX}DISABLED`, idList, [])),
    maxIssues: readSetting(env, `${ENV_PREFIX}MAX_ISSUES`, positiveIntSetting, DEFAULT_MAX_ISSUES),
    includeTips: readSetting(env, `${ENV_PREFIX}INCLUDE_TIPS`, booleanSetting, false),
    maxLines: readSetting(env, `${ENV_PREFIX}MAX_LINES`, positiveIntSetting, DEFAULT_MAX_LINES),
    maxBytes: readSetting(env, `${ENV_PREFIX}MAX_BYTES`, positiveIntSetting, DEFAULT_MAX_BYTES),
    projectDir: path.resolve(cwd, projectDir ? projectDir : "."),
    debug: readSetting(env, `${ENV_PREFIX}DEBUG`, booleanSetting, false),
  });
}

export function withOverrides(config: Config, overrides: Partial<Config>): Config {
  return Object.freeze({ ...config, ...overrides });
}
