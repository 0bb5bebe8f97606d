import fs from "node:fs";
import { loadConfig, type Config } from "../scanner/config.js";
import { runPipeline } from "../scanner/scan.js";
import { isAnalysedTool, parseHookInput } from "./input.js";
import { renderVerdict, silentOutput, type HookOutput } from "./output.js";
import { logDebug, logError, setDebugEnabled } from "../utils/logger.js";

/** A failure somewhere in the hook, tagged with the stage it came from. */
export class HookError extends Error {
  constructor(
    readonly stage: string,
    readonly original: unknown,
  ) {
    super(`${stage} failed: ${original instanceof Error ? original.message : String(original)}`);
    this.name = "HookError";
  }
}

export interface HookIO {
  readInput(): string;
  write(text: string): void;
  env?: Readonly<Record<string, string | undefined>>;
  cwd?: string;
}

export const processIO: HookIO = {
  readInput: () => fs.readFileSync(0, "utf8"),
  write: (text) => {
    process.stdout.write(text);
  },
};

function stage<T>(name: string, body: () => T): T {
  try {
    return body();
  } catch (error) {
    throw new HookError(name, error);
  }
}

function decideOutput(io: HookIO): HookOutput {
  const config: Config = stage("config", () => loadConfig(io.env ?? process.env, io.cwd ?? process.cwd()));
  setDebugEnabled(config.debug);
  if (!config.enabled) {
    logDebug("disabled by configuration");
    return silentOutput();
  }

  const raw = stage("read-input", () => io.readInput());
  const request = parseHookInput(raw);
  if (request.status !== "ok") {
    logDebug("hook input ignored", { reason: request.status === "skip" ? request.reason : request.stage });
    return silentOutput();
  }

  const { toolName, filePath, succeeded } = request.value;
  if (!isAnalysedTool(toolName) || !succeeded) {
    logDebug("tool call not analysed", { tool: toolName, succeeded });
    return silentOutput();
  }

  const report = stage("pipeline", () => runPipeline(filePath, config));
  logDebug("verdict", {
    file: filePath,
    decision: report.verdict.decision,
    total: report.verdict.total,
    skipped: report.skipped,
  });
  return renderVerdict(report.verdict, report.file?.displayPath ?? filePath, config);
}

/**
 * Reads one invocation, writes exactly one JSON decision. Every failure
 * resolves to the silent decision; the process exit code stays 0.
 */
export function runHook(io: HookIO = processIO): HookOutput {
  let output: HookOutput;
  try {
    output = decideOutput(io);
  } catch (error) {
    const stageName = error instanceof HookError ? error.stage : "hook";
    logError("hook failed; allowing the edit", { stage: stageName, error });
    output = silentOutput();
  }
  io.write(`${JSON.stringify(output)}\n`);
  return output;
}
