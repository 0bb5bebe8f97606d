import type { PyNode } from "../syntax.js";
import type { VisitContext } from "../traversal.js";
import { defineRule } from "./define.js";
import { calleeName, isConstant, isMutableValue, isTestFile } from "../../utils/ast.js";

export const ruleMutableDefault = defineRule({
  id: "mutable-default",
  title: "Mutable default argument",
  category: "runtime",
  severity: "high",
  kinds: ["Param"],
  description:
    "Default values are evaluated once, when the function is defined. A list, dict or set default is shared by every call that omits the argument.",
  recommendation: "Default to None and create the container inside the function.",
  check(param) {
    if (!param.defaultValue || !isMutableValue(param.defaultValue)) {
      return undefined;
    }
    return {
      node: param.defaultValue,
      message: `Parameter '${param.name}' has a mutable default that is shared between calls.`,
      recommendation: `Use '${param.name}=None' and assign a fresh value when it is None.`,
    };
  },
});

export const ruleDangerousEval = defineRule({
  id: "dangerous-eval",
  title: "eval/exec call",
  category: "runtime",
  severity: "high",
  kinds: ["Call"],
  description: "eval and exec run arbitrary code built at runtime.",
  recommendation: "Use ast.literal_eval for data, or an explicit dispatch table for behaviour.",
  check(call) {
    if (call.func.kind !== "Name" || (call.func.id !== "eval" && call.func.id !== "exec")) {
      return undefined;
    }
    return { node: call, message: `${call.func.id}() executes dynamically built code.` };
  },
});

export const ruleBareExcept = defineRule({
  id: "bare-except",
  title: "Bare except clause",
  category: "runtime",
  severity: "medium",
  kinds: ["ExceptHandler"],
  description: "A bare except also catches SystemExit and KeyboardInterrupt.",
  recommendation: "Catch the specific exceptions you expect, or at least 'except Exception'.",
  check(handler) {
    if (handler.type) {
      return undefined;
    }
    return { node: handler, message: "Bare 'except:' catches every exception, including interrupts." };
  },
});

export const ruleAssertInProduction = defineRule({
  id: "assert-in-production",
  title: "assert used for runtime checks",
  category: "runtime",
  severity: "high",
  kinds: ["Assert"],
  description: "Assertions are stripped when Python runs with -O.",
  recommendation: "Raise an explicit exception such as ValueError instead.",
  check(node, context) {
    if (isTestFile(context.filePath)) {
      return undefined;
    }
    return { node, message: "assert is removed under 'python -O'; the check silently disappears." };
  },
});

export const ruleGlobalStatement = defineRule({
  id: "global-statement",
  title: "global statement",
  category: "runtime",
  severity: "medium",
  kinds: ["Global"],
  description: "Module-level mutable state shared through 'global' is hard to test and reason about.",
  recommendation: "Pass the value in and return the new value, or wrap the state in a class.",
  check(node) {
    return { node, message: `Function rebinds module state: ${node.names.join(", ")}.` };
  },
});

export const ruleMutableClassAttribute = defineRule({
  id: "mutable-class-attribute",
  title: "Mutable class attribute",
  category: "runtime",
  severity: "medium",
  kinds: ["Assign"],
  description: "A mutable value assigned in the class body is shared by every instance.",
  recommendation: "Initialise the attribute in __init__, or use dataclasses.field(default_factory=...).",
  check(node, context) {
    if (context.parent?.kind !== "ClassDef" || !node.value || !isMutableValue(node.value)) {
      return undefined;
    }
    if (node.annotation?.text.includes("ClassVar")) {
      return undefined;
    }
    const [target] = node.targets;
    const name = target?.kind === "Name" ? target.id : node.text.split("=")[0].trim();
    return { node, message: `Class attribute '${name}' is a mutable value shared by all instances.` };
  },
});

function escapesFinally(context: VisitContext, stopAtLoop: boolean): boolean {
  for (let index = context.frames.length - 1; index >= 0; index -= 1) {
    const frame = context.frames[index];
    if (frame.kind === "finally") {
      return true;
    }
    if (frame.kind === "function" || frame.kind === "class") {
      return false;
    }
    if (stopAtLoop && (frame.kind === "loop" || frame.kind === "comprehension")) {
      return false;
    }
  }
  return false;
}

export const ruleReturnInFinally = defineRule({
  id: "return-in-finally",
  title: "Control flow leaves a finally block",
  category: "runtime",
  severity: "high",
  kinds: ["Return", "Break", "Continue"],
  description: "return, break or continue inside finally discards any exception in flight.",
  recommendation: "Move the statement after the try statement.",
  check(node, context) {
    if (!escapesFinally(context, node.kind !== "Return")) {
      return undefined;
    }
    const keyword = node.kind.toLowerCase();
    return { node, message: `'${keyword}' inside finally swallows any pending exception.` };
  },
});

const SHADOWED_BUILTINS = new Set([
  "all",
  "any",
  "bytes",
  "callable",
  "compile",
  "dict",
  "dir",
  "filter",
  "float",
  "format",
  "hash",
  "id",
  "input",
  "int",
  "iter",
  "len",
  "list",
  "map",
  "max",
  "min",
  "next",
  "object",
  "open",
  "print",
  "range",
  "set",
  "sorted",
  "str",
  "sum",
  "tuple",
  "type",
  "vars",
  "zip",
]);

function shadowedName(node: PyNode, context: VisitContext): string | undefined {
  switch (node.kind) {
    case "FunctionDef":
    case "ClassDef":
      // Methods and nested classes live in the class namespace.
      return context.parent?.kind === "ClassDef" ? undefined : node.name;
    case "Param":
      return node.variant === "positional" ? node.name : undefined;
    case "Assign": {
      if (context.parent?.kind === "ClassDef") {
        return undefined;
      }
      const target = node.targets.find((candidate) => candidate.kind === "Name");
      return target?.kind === "Name" ? target.id : undefined;
    }
    default:
      return undefined;
  }
}

export const ruleShadowedBuiltin = defineRule({
  id: "shadowed-builtin",
  title: "Builtin name shadowed",
  category: "runtime",
  severity: "medium",
  kinds: ["FunctionDef", "ClassDef", "Param", "Assign"],
  description: "Rebinding a builtin name hides the builtin for the rest of the scope.",
  recommendation: "Rename the binding, e.g. add a suffix or use a more specific name.",
  check(node, context) {
    const name = shadowedName(node, context);
    if (name === undefined || !SHADOWED_BUILTINS.has(name)) {
      return undefined;
    }
    return { node, message: `'${name}' shadows the builtin of the same name.` };
  },
});

export const ruleEqWithoutHash = defineRule({
  id: "eq-without-hash",
  title: "__eq__ without __hash__",
  category: "runtime",
  severity: "medium",
  kinds: ["ClassDef"],
  description: "Defining __eq__ sets __hash__ to None, so instances can no longer be used in sets or as dict keys.",
  recommendation: "Define __hash__ consistently with __eq__, or set '__hash__ = None' explicitly.",
  check(node) {
    const defines = (name: string): boolean =>
      node.facts.definitions.has(name) ||
      node.body.some(
        (statement) =>
          statement.kind === "Assign" &&
          statement.targets.some((target) => target.kind === "Name" && target.id === name),
      );
    if (!defines("__eq__") || defines("__hash__")) {
      return undefined;
    }
    return { node, message: `Class '${node.name}' defines __eq__ but not __hash__; instances become unhashable.` };
  },
});

export const ruleInitReturnsValue = defineRule({
  id: "init-returns-value",
  title: "__init__ returns a value",
  category: "runtime",
  severity: "high",
  kinds: ["FunctionDef"],
  description: "__init__ must return None; anything else raises TypeError at instantiation.",
  recommendation: "Remove the return value, or use a classmethod factory.",
  check(node, context) {
    if (node.name !== "__init__" || context.parent?.kind !== "ClassDef") {
      return undefined;
    }
    const offending = node.facts.returns.find(
      (ret) => ret.value !== undefined && !isConstant(ret.value, "None"),
    );
    if (!offending) {
      return undefined;
    }
    return { node: offending, message: "__init__ returns a value; instantiation raises TypeError." };
  },
});

export const ruleAsyncWithoutErrorHandling = defineRule({
  id: "async-without-error-handling",
  title: "Async function without error handling",
  category: "runtime",
  severity: "medium",
  kinds: ["FunctionDef"],
  description: "Exceptions raised in a coroutine without a try block surface far from their cause, or vanish in fire-and-forget tasks.",
  recommendation: "Wrap the awaited operations in try/except and log or translate the failure.",
  check(node) {
    if (!node.isAsync || node.facts.tryBlocks > 0) {
      return undefined;
    }
    return { node, message: `async function '${node.name}' has no try/except around its awaits.` };
  },
});

const LOGGING_CALLS = new Set([
  "debug",
  "info",
  "warning",
  "warn",
  "error",
  "critical",
  "exception",
  "log",
  "print",
]);

function isLoggingStatement(statement: PyNode): boolean {
  if (statement.kind !== "ExprStmt") {
    return false;
  }
  const value = statement.value.kind === "Await" ? statement.value.value : statement.value;
  if (value.kind !== "Call") {
    return false;
  }
  const name = calleeName(value);
  return name !== undefined && LOGGING_CALLS.has(name);
}

export const ruleTryWithoutLogging = defineRule({
  id: "try-without-logging",
  title: "Exception handled without logging",
  category: "runtime",
  severity: "medium",
  kinds: ["ExceptHandler"],
  description: "A handler that does not log leaves no trace of the failure where it was caught.",
  recommendation: "Log the exception (logger.exception keeps the traceback) before handling or re-raising it.",
  check(handler) {
    if (handler.body.some(isLoggingStatement)) {
      return undefined;
    }
    return { node: handler, message: "Exception is caught without being logged." };
  },
});

const ROUTE_DECORATORS = new Set([
  "route",
  "get",
  "post",
  "put",
  "patch",
  "delete",
  "api_route",
  "websocket",
]);

function isRouteDecorator(decorator: PyNode): boolean {
  const target = decorator.kind === "Call" ? decorator.func : decorator;
  return target.kind === "Attribute" && ROUTE_DECORATORS.has(target.attr);
}

export const ruleApiEndpointWithoutGuard = defineRule({
  id: "api-endpoint-without-guard",
  title: "API endpoint without error handling",
  category: "runtime",
  severity: "medium",
  kinds: ["FunctionDef"],
  description: "Unhandled exceptions in a request handler turn into opaque 500 responses.",
  recommendation: "Catch expected failures and return an explicit error response.",
  check(node) {
    if (node.facts.tryBlocks > 0 || !node.decorators.some(isRouteDecorator)) {
      return undefined;
    }
    return { node, message: `Endpoint '${node.name}' has no error handling.` };
  },
});

export const RUNTIME_RULES = [
  ruleMutableDefault,
  ruleDangerousEval,
  ruleBareExcept,
  ruleAssertInProduction,
  ruleGlobalStatement,
  ruleMutableClassAttribute,
  ruleReturnInFinally,
  ruleShadowedBuiltin,
  ruleEqWithoutHash,
  ruleInitReturnsValue,
  ruleAsyncWithoutErrorHandling,
  ruleTryWithoutLogging,
  ruleApiEndpointWithoutGuard,
];
