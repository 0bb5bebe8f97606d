import fs from "node:fs";
import path from "node:path";
import type { StageOutcome } from "./types.js";

export const PYTHON_EXTENSIONS: readonly string[] = [".py", ".pyi"];

export interface SourceFile {
  /** Resolved absolute path. */
  path: string;
  /** Path relative to the project root, used in reports. */
  displayPath: string;
  content: string;
  lines: readonly string[];
  lineCount: number;
}

export interface LoadOptions {
  projectDir: string;
  maxLines: number;
  maxBytes: number;
  extensions?: readonly string[];
}

export type SkipReason =
  | "empty-path"
  | "unsupported-extension"
  | "not-found"
  | "outside-project"
  | "not-a-file"
  | "too-large"
  | "too-many-lines"
  | "unreadable";

function skip(reason: SkipReason): StageOutcome<SourceFile> {
  return { status: "skip", reason };
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

function resolveReal(target: string): string | SkipReason {
  try {
    return fs.realpathSync(target);
  } catch (error) {
    return errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR" ? "not-found" : "unreadable";
  }
}

export function splitLines(content: string): string[] {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/** Validates and reads one source file. Never throws; refusals come back as skips. */
export function loadSource(filePath: string, options: LoadOptions): StageOutcome<SourceFile> {
  if (filePath.trim() === "") {
    return skip("empty-path");
  }
  const extensions = options.extensions ?? PYTHON_EXTENSIONS;
  if (!extensions.includes(path.extname(filePath))) {
    return skip("unsupported-extension");
  }

  const realFile = resolveReal(path.resolve(options.projectDir, filePath));
  if (realFile === "not-found" || realFile === "unreadable") {
    return skip(realFile);
  }
  const realRoot = resolveReal(options.projectDir);
  const root = realRoot === "not-found" || realRoot === "unreadable" ? path.resolve(options.projectDir) : realRoot;
  const relative = path.relative(root, realFile);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return skip("outside-project");
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(realFile);
  } catch {
    return skip("unreadable");
  }
  if (!stats.isFile()) {
    return skip("not-a-file");
  }
  if (stats.size > options.maxBytes) {
    return skip("too-large");
  }

  let content: string;
  try {
    content = fs.readFileSync(realFile, "utf8");
  } catch {
    return skip("unreadable");
  }

  const lines = splitLines(content);
  if (lines.length > options.maxLines) {
    return skip("too-many-lines");
  }

  return {
    status: "ok",
    value: { path: realFile, displayPath: relative, content, lines, lineCount: lines.length },
  };
}
