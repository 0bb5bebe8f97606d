import type { Category, Rule } from "../types.js";
import { RUNTIME_RULES } from "./runtime.js";
import { PERFORMANCE_RULES } from "./performance.js";
import { COMPLEXITY_RULES } from "./complexity.js";
import { SECURITY_RULES } from "./security.js";
import { ORGANIZATION_RULES } from "./organization.js";
import { RESOURCE_RULES } from "./resource.js";
import { GOTCHA_RULES } from "./gotcha.js";

export const RULES: readonly Rule[] = [
  ...RUNTIME_RULES,
  ...PERFORMANCE_RULES,
  ...COMPLEXITY_RULES,
  ...SECURITY_RULES,
  ...ORGANIZATION_RULES,
  ...RESOURCE_RULES,
  ...GOTCHA_RULES,
];

export const AVAILABLE_RULE_IDS = RULES.map((rule) => rule.id);

export function findRule(id: string): Rule | undefined {
  return RULES.find((rule) => rule.id === id);
}

export function rulesInCategory(category: Category): Rule[] {
  return RULES.filter((rule) => rule.category === category);
}
