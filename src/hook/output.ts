import type { Config } from "../scanner/config.js";
import type { Verdict } from "../scanner/types.js";
import { formatBlockReason, formatFeedback } from "../scanner/reporter.js";

export const HOOK_EVENT_NAME = "PostToolUse";

export interface SilentOutput {
  suppressOutput: true;
}

export interface FeedbackOutput {
  decision?: "block";
  reason?: string;
  hookSpecificOutput: {
    hookEventName: typeof HOOK_EVENT_NAME;
    additionalContext: string;
  };
}

export type HookOutput = SilentOutput | FeedbackOutput;

export function silentOutput(): SilentOutput {
  return { suppressOutput: true };
}

export function warnOutput(context: string): FeedbackOutput {
  return { hookSpecificOutput: { hookEventName: HOOK_EVENT_NAME, additionalContext: context } };
}

export function blockOutput(reason: string, context: string): FeedbackOutput {
  return { decision: "block", reason, ...warnOutput(context) };
}

export function renderVerdict(
  verdict: Verdict,
  filePath: string,
  config: Pick<Config, "maxIssues" | "includeTips">,
): HookOutput {
  switch (verdict.decision) {
    case "silent":
      return silentOutput();
    case "warn":
      return warnOutput(formatFeedback(verdict, filePath, config.maxIssues, config.includeTips));
    case "block":
      return blockOutput(
        formatBlockReason(verdict, filePath),
        formatFeedback(verdict, filePath, config.maxIssues, config.includeTips),
      );
    default:
      return silentOutput();
  }
}
