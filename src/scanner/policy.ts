import { emptyCounts, type Aggregate } from "./filters.js";
import type { Decision, Verdict } from "./types.js";

export interface PolicySettings {
  blockOnCritical: boolean;
}

export function decide(result: Aggregate, settings: PolicySettings): Decision {
  if (result.total === 0) {
    return "silent";
  }
  if (settings.blockOnCritical && result.counts.critical > 0) {
    return "block";
  }
  return "warn";
}

export function buildVerdict(result: Aggregate, settings: PolicySettings): Verdict {
  return { decision: decide(result, settings), ...result };
}

export function silentVerdict(): Verdict {
  return { decision: "silent", findings: [], counts: emptyCounts(), total: 0 };
}
