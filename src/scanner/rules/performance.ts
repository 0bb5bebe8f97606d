import type { CallNode, PyNode, ScopeFacts } from "../syntax.js";
import { insideLoop, nearestFunction } from "../traversal.js";
import { defineRule } from "./define.js";
import { calleeName, dottedName } from "../../utils/ast.js";

function isStringValue(node: PyNode, facts: ScopeFacts): boolean {
  switch (node.kind) {
    case "Str":
      return !node.bytes;
    case "Name":
      return facts.stringNames.has(node.id);
    case "Call":
      return node.func.kind === "Name" && node.func.id === "str";
    case "BinOp":
      return node.op === "+" && (isStringValue(node.left, facts) || isStringValue(node.right, facts));
    default:
      return false;
  }
}

export const ruleStringConcatInLoop = defineRule({
  id: "string-concat-in-loop",
  title: "String concatenation in a loop",
  category: "performance",
  severity: "medium",
  kinds: ["AugAssign"],
  description: "Strings are immutable; '+=' in a loop copies the whole string on every iteration.",
  recommendation: "Collect the parts in a list and ''.join() them after the loop.",
  check(node, context) {
    if (node.op !== "+" || !insideLoop(context)) {
      return undefined;
    }
    const facts = context.scopeFacts;
    const targetIsString = node.target.kind === "Name" && facts.stringNames.has(node.target.id);
    if (!targetIsString && !isStringValue(node.value, facts)) {
      return undefined;
    }
    return { node, message: `String '${node.target.text}' is built with += inside a loop.` };
  },
});

const QUERY_METHODS = new Set([
  "execute",
  "executemany",
  "query",
  "filter",
  "filter_by",
  "find",
  "find_one",
  "raw",
]);

function isQueryCall(call: CallNode): boolean {
  if (call.func.kind !== "Attribute") {
    return false;
  }
  if (QUERY_METHODS.has(call.func.attr)) {
    return true;
  }
  // Django managers: Model.objects.get(...)
  const receiver = dottedName(call.func.value);
  return receiver !== undefined && receiver.endsWith(".objects");
}

export const ruleQueryInLoop = defineRule({
  id: "query-in-loop",
  title: "Database query inside a loop",
  category: "performance",
  severity: "medium",
  kinds: ["Call"],
  description: "One query per iteration (the N+1 pattern) multiplies round trips.",
  recommendation: "Fetch the rows in one query (IN clause, join, prefetch) before the loop.",
  check(call, context) {
    if (!insideLoop(context) || !isQueryCall(call)) {
      return undefined;
    }
    return { node: call, message: `Query '${call.func.text}()' runs once per loop iteration.` };
  },
});

function isListLike(node: PyNode | undefined): boolean {
  return node !== undefined && (node.kind === "List" || (node.kind === "Comprehension" && node.variant === "list"));
}

export const ruleListMembershipInLoop = defineRule({
  id: "list-membership-in-loop",
  title: "List membership test inside a loop",
  category: "performance",
  severity: "low",
  kinds: ["Compare"],
  description: "'x in [..]' scans the list on every iteration.",
  recommendation: "Build a set once, outside the loop, and test membership against it.",
  check(node, context) {
    if (!insideLoop(context)) {
      return undefined;
    }
    const index = node.ops.findIndex(
      (op, position) => (op === "in" || op === "not in") && isListLike(node.comparators[position]),
    );
    if (index < 0) {
      return undefined;
    }
    return { node, message: "Membership test against a list inside a loop is O(n) per iteration." };
  },
});

function iterOf(node: PyNode): PyNode | undefined {
  return node.kind === "For" || node.kind === "CompFor" ? node.iter : undefined;
}

export const ruleRangeLenIteration = defineRule({
  id: "range-len-iteration",
  title: "range(len(...)) iteration",
  category: "performance",
  severity: "low",
  kinds: ["For", "CompFor"],
  description: "Indexing through range(len(x)) is slower and noisier than iterating directly.",
  recommendation: "Iterate over the sequence, or use enumerate() when the index is needed.",
  check(node) {
    const iter = iterOf(node);
    if (iter?.kind !== "Call" || iter.func.kind !== "Name" || iter.func.id !== "range" || iter.args.length !== 1) {
      return undefined;
    }
    const [inner] = iter.args;
    if (inner.kind !== "Call" || inner.func.kind !== "Name" || inner.func.id !== "len") {
      return undefined;
    }
    return { node: iter, message: "Loop iterates over range(len(...)) instead of the sequence." };
  },
});

function isKeysCall(node: PyNode): boolean {
  return node.kind === "Call" && node.func.kind === "Attribute" && node.func.attr === "keys" && node.args.length === 0;
}

export const ruleDictKeysIteration = defineRule({
  id: "dict-keys-iteration",
  title: "Redundant .keys()",
  category: "performance",
  severity: "low",
  kinds: ["For", "CompFor", "Compare"],
  description: "Iterating or testing membership on a dict already works on its keys.",
  recommendation: "Drop the .keys() call.",
  check(node) {
    if (node.kind === "Compare") {
      const { ops } = node;
      const keys = node.comparators.find(
        (comparator, position) =>
          (ops[position] === "in" || ops[position] === "not in") && isKeysCall(comparator),
      );
      return keys ? { node: keys, message: "Membership test calls .keys() needlessly." } : undefined;
    }
    const iter = iterOf(node);
    if (!iter || !isKeysCall(iter)) {
      return undefined;
    }
    return { node: iter, message: "Loop iterates over .keys() instead of the dict itself." };
  },
});

const REDUCERS = new Set(["any", "all", "sum", "min", "max"]);

export const ruleMaterializedAnyAll = defineRule({
  id: "materialized-any-all",
  title: "Reducer over a list comprehension",
  category: "performance",
  severity: "low",
  kinds: ["Call"],
  description: "Building a list only to reduce it allocates every element and disables short-circuiting.",
  recommendation: "Pass a generator expression: drop the square brackets.",
  check(call) {
    const name = calleeName(call);
    const [first] = call.args;
    if (call.func.kind !== "Name" || name === undefined || !REDUCERS.has(name) || !first) {
      return undefined;
    }
    if (first.kind !== "Comprehension" || first.variant !== "list") {
      return undefined;
    }
    return { node: call, message: `${name}() receives a list comprehension; a generator is enough.` };
  },
});

export const ruleRegexCompileInLoop = defineRule({
  id: "regex-compile-in-loop",
  title: "re.compile inside a loop",
  category: "performance",
  severity: "low",
  kinds: ["Call"],
  description: "Compiling the same pattern on every iteration repeats work.",
  recommendation: "Compile the pattern once at module level.",
  check(call, context) {
    if (dottedName(call.func) !== "re.compile" || !insideLoop(context)) {
      return undefined;
    }
    const scope = nearestFunction(context);
    const where = scope?.kind === "FunctionDef" ? ` in '${scope.name}'` : "";
    return { node: call, message: `re.compile() runs on every iteration${where}.` };
  },
});

export const PERFORMANCE_RULES = [
  ruleStringConcatInLoop,
  ruleQueryInLoop,
  ruleListMembershipInLoop,
  ruleRangeLenIteration,
  ruleDictKeysIteration,
  ruleMaterializedAnyAll,
  ruleRegexCompileInLoop,
];
