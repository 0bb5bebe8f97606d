import type { CallNode } from "../syntax.js";
import { insideFunction, isGuarded, nearestFunction } from "../traversal.js";
import { defineRule } from "./define.js";
import { calleeName, calleeRoot, findKeyword, isConstant } from "../../utils/ast.js";

const CONTEXT_WRAPPERS = new Set(["closing", "enter_context"]);

export const ruleOpenWithoutContext = defineRule({
  id: "open-without-context",
  title: "open() outside a with statement",
  category: "resource",
  severity: "medium",
  kinds: ["Call"],
  description: "A file opened without 'with' stays open until garbage collection, or leaks on error.",
  recommendation: "Use 'with open(...) as handle:' so the file is closed on every path.",
  check(call, context) {
    if (call.func.kind !== "Name" || call.func.id !== "open") {
      return undefined;
    }
    const parent = context.parent;
    if (parent?.kind === "WithItem" || parent?.kind === "Return") {
      return undefined;
    }
    if (parent?.kind === "Call") {
      const wrapper = calleeName(parent);
      if (wrapper !== undefined && CONTEXT_WRAPPERS.has(wrapper)) {
        return undefined;
      }
    }
    return { node: call, message: "File opened without a context manager may never be closed." };
  },
});

const DB_OPERATIONS = new Set([
  "execute",
  "executemany",
  "query",
  "filter",
  "filter_by",
  "commit",
  "rollback",
  "save",
  "create",
  "bulk_create",
  "insert",
  "insert_one",
  "insert_many",
  "update",
  "update_one",
  "delete",
  "delete_one",
]);

export const ruleDbOperationWithoutGuard = defineRule({
  id: "db-operation-without-guard",
  title: "Database operation without error handling",
  category: "resource",
  severity: "medium",
  kinds: ["Call"],
  description: "Database calls fail on connectivity, constraints and timeouts; unhandled, they leave transactions open.",
  recommendation: "Wrap the operation in try/except, roll back on failure and log the error.",
  check(call, context) {
    if (call.func.kind !== "Attribute" || !DB_OPERATIONS.has(call.func.attr)) {
      return undefined;
    }
    if (!insideFunction(context) || isGuarded(context)) {
      return undefined;
    }
    return { node: call, message: `Database call '${call.func.attr}()' is not inside a try block.` };
  },
});

const HTTP_CLIENTS = new Set(["requests", "httpx"]);
const HTTP_METHODS = new Set(["get", "post", "put", "patch", "delete", "head", "options", "request", "stream"]);

function isHttpCall(call: CallNode): boolean {
  const root = calleeRoot(call);
  return (
    call.func.kind === "Attribute" &&
    HTTP_METHODS.has(call.func.attr) &&
    root !== undefined &&
    HTTP_CLIENTS.has(root)
  );
}

export const ruleHttpCallWithoutGuard = defineRule({
  id: "http-call-without-guard",
  title: "HTTP call without error handling",
  category: "resource",
  severity: "medium",
  kinds: ["Call"],
  description: "Network calls raise on DNS failures, refused connections and timeouts.",
  recommendation: "Catch the client's exception type (requests.RequestException, httpx.HTTPError) and handle it.",
  check(call, context) {
    if (!isHttpCall(call) || !insideFunction(context) || isGuarded(context)) {
      return undefined;
    }
    return { node: call, message: `HTTP call '${call.func.text}()' is not inside a try block.` };
  },
});

export const ruleHttpCallWithoutTimeout = defineRule({
  id: "http-call-without-timeout",
  title: "HTTP call without timeout",
  category: "resource",
  severity: "medium",
  kinds: ["Call"],
  description: "requests waits forever by default; a stalled server hangs the caller.",
  recommendation: "Pass timeout=..., e.g. timeout=10.",
  check(call) {
    if (!isHttpCall(call) || findKeyword(call, "timeout")) {
      return undefined;
    }
    // **kwargs may carry the timeout.
    if (call.args.some((arg) => arg.kind === "Starred" && arg.isDouble)) {
      return undefined;
    }
    return { node: call, message: `HTTP call '${call.func.text}()' has no timeout.` };
  },
});

export const ruleEnterWithoutReturn = defineRule({
  id: "enter-without-return",
  title: "__enter__ returns nothing",
  category: "resource",
  severity: "medium",
  kinds: ["FunctionDef"],
  description: "'with X() as x' binds whatever __enter__ returns; returning nothing binds None.",
  recommendation: "Return self (or the managed resource) from __enter__.",
  check(node, context) {
    if ((node.name !== "__enter__" && node.name !== "__aenter__") || context.parent?.kind !== "ClassDef") {
      return undefined;
    }
    const returnsValue = node.facts.returns.some(
      (ret) => ret.value !== undefined && !isConstant(ret.value, "None"),
    );
    if (returnsValue) {
      return undefined;
    }
    return { node, message: `${node.name} returns None; 'with ... as name' binds None.` };
  },
});

export const ruleLockAcquireWithoutRelease = defineRule({
  id: "lock-acquire-without-release",
  title: "Lock acquired without try/finally",
  category: "resource",
  severity: "medium",
  kinds: ["Call"],
  description: "If the code between acquire() and release() raises, the lock is never released.",
  recommendation: "Use 'with lock:' or release in a finally block.",
  check(call, context) {
    if (call.func.kind !== "Attribute" || call.func.attr !== "acquire" || isGuarded(context)) {
      return undefined;
    }
    const scope = nearestFunction(context);
    if (!scope || scope.facts.tryBlocks > 0) {
      return undefined;
    }
    return { node: call, message: `'${call.func.text}()' has no try/finally to release it.` };
  },
});

export const RESOURCE_RULES = [
  ruleOpenWithoutContext,
  ruleDbOperationWithoutGuard,
  ruleHttpCallWithoutGuard,
  ruleHttpCallWithoutTimeout,
  ruleEnterWithoutReturn,
  ruleLockAcquireWithoutRelease,
];
