import { isKind, type NodeKind } from "../syntax.js";
import type { Rule, RuleSpec } from "../types.js";

/** Narrows the node to the rule's kinds before calling its check. */
export function defineRule<K extends NodeKind>(spec: RuleSpec<K>): Rule {
  const { check, kinds, ...meta } = spec;
  return {
    ...meta,
    kinds,
    evaluate(node, context) {
      return isKind(node, kinds) ? check(node, context) : undefined;
    },
  };
}
