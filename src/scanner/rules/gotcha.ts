import type { CompareNode, PyNode } from "../syntax.js";
import { enclosingLoops, type VisitContext } from "../traversal.js";
import { defineRule } from "./define.js";
import { calleeName, dottedName } from "../../utils/ast.js";

/** Each `(left, op, right)` link of a comparison chain. */
function* comparisonPairs(node: CompareNode): Generator<[PyNode, string, PyNode]> {
  let left = node.left;
  for (let index = 0; index < node.ops.length; index += 1) {
    const right: PyNode | undefined = node.comparators[index];
    if (!right) {
      return;
    }
    yield [left, node.ops[index], right];
    left = right;
  }
}

function findPair(
  node: CompareNode,
  ops: readonly string[],
  operand: (candidate: PyNode) => boolean,
): [PyNode, string, PyNode] | undefined {
  for (const pair of comparisonPairs(node)) {
    const [left, op, right] = pair;
    if (ops.includes(op) && (operand(left) || operand(right))) {
      return pair;
    }
  }
  return undefined;
}

export const ruleIdentityLiteralComparison = defineRule({
  id: "identity-literal-comparison",
  title: "'is' comparison with a literal",
  category: "gotcha",
  severity: "high",
  kinds: ["Compare"],
  description: "'is' tests object identity; whether equal numbers or strings are the same object is an interpreter detail.",
  recommendation: "Compare values with == or !=.",
  check(node) {
    const pair = findPair(node, ["is", "is not"], (operand) => operand.kind === "Num" || (operand.kind === "Str" && !operand.formatted));
    if (!pair) {
      return undefined;
    }
    const replacement = pair[1] === "is" ? "==" : "!=";
    return {
      node,
      message: `'${pair[1]}' compares identity with a literal.`,
      recommendation: `Use '${replacement}' to compare values.`,
    };
  },
});

function isNone(node: PyNode): boolean {
  return node.kind === "Constant" && node.value === "None";
}

function isBool(node: PyNode): boolean {
  return node.kind === "Constant" && (node.value === "True" || node.value === "False");
}

export const ruleNoneEquality = defineRule({
  id: "none-equality",
  title: "Equality comparison with None",
  category: "gotcha",
  severity: "medium",
  kinds: ["Compare"],
  description: "== calls __eq__, which classes can override; None is a singleton best tested by identity.",
  recommendation: "Use 'is None' or 'is not None'.",
  check(node) {
    const pair = findPair(node, ["==", "!="], isNone);
    if (!pair) {
      return undefined;
    }
    const replacement = pair[1] === "==" ? "is None" : "is not None";
    return { node, message: `'${pair[1]} None' should be '${replacement}'.` };
  },
});

export const ruleBoolEquality = defineRule({
  id: "bool-equality",
  title: "Equality comparison with True/False",
  category: "gotcha",
  severity: "low",
  kinds: ["Compare"],
  description: "Comparing to True or False is redundant and behaves surprisingly for truthy non-bool values.",
  recommendation: "Test the value directly: 'if flag:' or 'if not flag:'.",
  check(node) {
    const pair = findPair(node, ["==", "!="], isBool);
    if (!pair) {
      return undefined;
    }
    const literal = isBool(pair[2]) ? pair[2].text : pair[0].text;
    return { node, message: `Comparison '${pair[1]} ${literal}' is redundant.` };
  },
});

function isTypeCall(node: PyNode): boolean {
  return node.kind === "Call" && node.func.kind === "Name" && node.func.id === "type" && node.args.length === 1;
}

export const ruleTypeEquality = defineRule({
  id: "type-equality",
  title: "type() comparison",
  category: "gotcha",
  severity: "low",
  kinds: ["Compare"],
  description: "Comparing type() results ignores subclasses.",
  recommendation: "Use isinstance(value, T).",
  check(node) {
    const pair = findPair(node, ["==", "!=", "is", "is not"], isTypeCall);
    if (!pair) {
      return undefined;
    }
    return { node, message: "type() comparison rejects subclasses; prefer isinstance()." };
  },
});

const MUTATING_METHODS = new Set([
  "append",
  "extend",
  "insert",
  "remove",
  "pop",
  "clear",
  "add",
  "discard",
  "update",
  "popitem",
  "setdefault",
]);

const VIEW_METHODS = new Set(["items", "keys", "values"]);

/** Name of the collection a for loop walks: `d` for `d`, `d.items()`. */
function iteratedCollection(iter: PyNode): string | undefined {
  if (iter.kind === "Call" && iter.func.kind === "Attribute" && iter.args.length === 0 && VIEW_METHODS.has(iter.func.attr)) {
    return dottedName(iter.func.value);
  }
  return dottedName(iter);
}

function iteratedBy(context: VisitContext, name: string): boolean {
  return enclosingLoops(context).some(
    (frame) => frame.node.kind === "For" && iteratedCollection(frame.node.iter) === name,
  );
}

function deletedCollections(targets: readonly PyNode[]): string[] {
  const names: string[] = [];
  for (const target of targets) {
    if (target.kind === "Tuple") {
      names.push(...deletedCollections(target.elts));
    } else if (target.kind === "Subscript") {
      const name = dottedName(target.value);
      if (name !== undefined) {
        names.push(name);
      }
    }
  }
  return names;
}

export const ruleMutateWhileIterating = defineRule({
  id: "mutate-while-iterating",
  title: "Collection modified while iterating",
  category: "gotcha",
  severity: "high",
  kinds: ["Call", "Delete"],
  description: "Changing a list while looping over it skips elements; changing a dict or set raises RuntimeError.",
  recommendation: "Iterate over a copy (list(items), dict(d)) or build a new collection.",
  check(node, context) {
    if (node.kind === "Delete") {
      const name = deletedCollections(node.targets).find((candidate) => iteratedBy(context, candidate));
      return name === undefined ? undefined : { node, message: `'${name}' is modified with del while being iterated.` };
    }
    if (node.func.kind !== "Attribute" || !MUTATING_METHODS.has(node.func.attr)) {
      return undefined;
    }
    const name = dottedName(node.func.value);
    if (name === undefined || !iteratedBy(context, name)) {
      return undefined;
    }
    return { node, message: `'${name}.${node.func.attr}()' modifies the collection the loop iterates.` };
  },
});

export const ruleSilentExcept = defineRule({
  id: "silent-except",
  title: "Exception silently ignored",
  category: "gotcha",
  severity: "medium",
  kinds: ["ExceptHandler"],
  description: "A handler that only passes hides failures completely.",
  recommendation: "Handle the error, log it, or use contextlib.suppress for deliberate ignores.",
  check(handler) {
    const silent = handler.body.every(
      (statement) =>
        statement.kind === "Pass" ||
        statement.kind === "Continue" ||
        (statement.kind === "ExprStmt" && statement.value.kind === "Constant" && statement.value.value === "Ellipsis"),
    );
    if (!silent || handler.body.length === 0) {
      return undefined;
    }
    return { node: handler, message: "Exception is swallowed without any handling." };
  },
});

export const ruleLateBindingClosure = defineRule({
  id: "late-binding-closure",
  title: "Closure over a loop variable",
  category: "gotcha",
  severity: "medium",
  kinds: ["Lambda", "FunctionDef"],
  description: "Closures look loop variables up when called, so every closure created in the loop sees the last value.",
  recommendation: "Bind the current value as a default argument: lambda item=item: ...",
  check(node, context) {
    const loops = enclosingLoops(context);
    if (loops.length === 0) {
      return undefined;
    }
    const own = new Set(node.params.map((param) => param.name));
    for (const loop of loops) {
      for (const name of loop.boundNames) {
        if (!own.has(name) && node.facts.referencedNames.has(name)) {
          const what = node.kind === "Lambda" ? "lambda" : `function '${node.name}'`;
          return {
            node,
            message: `${what} captures loop variable '${name}' by reference.`,
            recommendation: `Bind it as a default: ${name}=${name}.`,
          };
        }
      }
    }
    return undefined;
  },
});

const TIME_DEPENDENT_CALLS = new Set(["now", "utcnow", "today", "time", "monotonic", "perf_counter", "uuid1", "uuid4", "random"]);

export const ruleCallInDefault = defineRule({
  id: "call-in-default",
  title: "Time-dependent call in a default",
  category: "gotcha",
  severity: "medium",
  kinds: ["Param"],
  description: "Defaults are evaluated once, at definition time, so every call shares the same timestamp or id.",
  recommendation: "Default to None and compute the value inside the function.",
  check(param) {
    const value = param.defaultValue;
    if (value?.kind !== "Call") {
      return undefined;
    }
    const name = calleeName(value);
    if (name === undefined || !TIME_DEPENDENT_CALLS.has(name)) {
      return undefined;
    }
    return { node: value, message: `Default of '${param.name}' calls ${name}() once, at definition time.` };
  },
});

export const ruleImplicitStringConcat = defineRule({
  id: "implicit-string-concat",
  title: "Implicit string concatenation in a collection",
  category: "gotcha",
  severity: "medium",
  kinds: ["List", "Tuple", "Set"],
  description: "Adjacent string literals merge; inside a collection this usually means a missing comma.",
  recommendation: "Add the missing comma, or wrap an intentional concatenation in parentheses with '+'.",
  check(node) {
    if (node.elts.length < 2) {
      return undefined;
    }
    const merged = node.elts.find((element) => element.kind === "Str" && element.implicitConcat);
    if (!merged) {
      return undefined;
    }
    return { node: merged, message: "Adjacent string literals are merged into one element; missing comma?" };
  },
});

export const GOTCHA_RULES = [
  ruleIdentityLiteralComparison,
  ruleNoneEquality,
  ruleBoolEquality,
  ruleTypeEquality,
  ruleMutateWhileIterating,
  ruleSilentExcept,
  ruleLateBindingClosure,
  ruleCallInDefault,
  ruleImplicitStringConcat,
];
