import { z } from "zod";
import type { StageOutcome } from "../scanner/types.js";

export const ANALYSED_TOOLS: readonly string[] = ["Write", "Edit", "MultiEdit"];

const toolResponseSchema = z
  .object({
    success: z.boolean().optional(),
    filePath: z.string().optional(),
  })
  .passthrough();

export const hookInputSchema = z
  .object({
    session_id: z.string().optional(),
    hook_event_name: z.string().optional(),
    tool_name: z.string(),
    tool_input: z
      .object({
        file_path: z.string().optional(),
        content: z.string().optional(),
      })
      .passthrough(),
    // Harnesses differ here; anything unexpected counts as absent.
    tool_response: toolResponseSchema.optional().catch(undefined),
  })
  .passthrough();

export type HookInput = z.infer<typeof hookInputSchema>;

export interface HookRequest {
  toolName: string;
  filePath: string;
  /** False only when the harness reports the edit failed. */
  succeeded: boolean;
}

export function parseHookInput(raw: string): StageOutcome<HookRequest> {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return { status: "skip", reason: "invalid-json" };
  }
  const parsed = hookInputSchema.safeParse(payload);
  if (!parsed.success) {
    return { status: "skip", reason: "invalid-input" };
  }
  const input = parsed.data;
  return {
    status: "ok",
    value: {
      toolName: input.tool_name,
      filePath: input.tool_input.file_path ?? input.tool_response?.filePath ?? "",
      succeeded: input.tool_response?.success !== false,
    },
  };
}

export function isAnalysedTool(toolName: string): boolean {
  return ANALYSED_TOOLS.includes(toolName);
}
