import path from "node:path";
import type { CallNode, KeywordNode, PyNode } from "../scanner/syntax.js";

/** `a.b.c` for names and attribute chains, undefined for anything else. */
export function dottedName(node: PyNode): string | undefined {
  if (node.kind === "Name") {
    return node.id;
  }
  if (node.kind === "Attribute") {
    const base = dottedName(node.value);
    return base === undefined ? undefined : `${base}.${node.attr}`;
  }
  return undefined;
}

/** Last segment of the callee: `execute` for `db.cursor().execute(...)`. */
export function calleeName(call: CallNode): string | undefined {
  if (call.func.kind === "Name") {
    return call.func.id;
  }
  if (call.func.kind === "Attribute") {
    return call.func.attr;
  }
  return undefined;
}

/** Root name of the receiver chain: `requests` for `requests.get`. */
export function calleeRoot(call: CallNode): string | undefined {
  let node: PyNode = call.func;
  while (node.kind === "Attribute") {
    node = node.value;
  }
  return node.kind === "Name" ? node.id : undefined;
}

export function findKeyword(call: CallNode, name: string): KeywordNode | undefined {
  return call.keywords.find((keyword) => keyword.arg === name);
}

export function isConstant(node: PyNode, value: "None" | "True" | "False" | "Ellipsis"): boolean {
  return node.kind === "Constant" && node.value === value;
}

export function isStaticString(node: PyNode): boolean {
  return node.kind === "Str" && !node.formatted;
}

/** Names a binding target introduces: `i, (k, v)` yields i, k, v. */
export function boundNames(target: PyNode): Set<string> {
  const names = new Set<string>();
  const pending: PyNode[] = [target];
  let node = pending.pop();
  while (node) {
    if (node.kind === "Name") {
      names.add(node.id);
    } else if (node.kind === "Tuple" || node.kind === "List") {
      pending.push(...node.elts);
    } else if (node.kind === "Starred") {
      pending.push(node.value);
    }
    node = pending.pop();
  }
  return names;
}

const MUTABLE_FACTORIES = new Set(["list", "dict", "set", "defaultdict", "OrderedDict", "deque"]);

/** List/dict/set displays, their comprehensions and empty factory calls. */
export function isMutableValue(node: PyNode): boolean {
  switch (node.kind) {
    case "List":
    case "Dict":
    case "Set":
      return true;
    case "Comprehension":
      return node.variant !== "generator";
    case "Call": {
      const name = dottedName(node.func);
      return name !== undefined && MUTABLE_FACTORIES.has(name.split(".").pop() ?? name);
    }
    default:
      return false;
  }
}

/** Operands of one `and`/`or` chain; nested chains of the same operator flatten. */
export function boolOperands(node: PyNode, op: "and" | "or"): PyNode[] {
  if (node.kind === "BoolOp" && node.op === op) {
    return [...boolOperands(node.left, op), ...boolOperands(node.right, op)];
  }
  return [node];
}

const TEST_FILE = /^(test_.*|.*_test|conftest)\.pyi?$/;

export function isTestFile(filePath: string): boolean {
  return TEST_FILE.test(path.basename(filePath));
}
