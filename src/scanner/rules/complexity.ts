import { opensBlock } from "../traversal.js";
import { defineRule } from "./define.js";
import { boolOperands } from "../../utils/ast.js";

export const MAX_COMPLEXITY = 10;
export const MAX_PARAMETERS = 5;
export const MAX_FUNCTION_LINES = 50;
export const MAX_NESTING = 4;
export const MAX_RETURNS = 6;
export const MAX_BOOL_OPERANDS = 4;

export const ruleCyclomaticComplexity = defineRule({
  id: "cyclomatic-complexity",
  title: "High cyclomatic complexity",
  category: "complexity",
  severity: "medium",
  kinds: ["FunctionDef"],
  description: `Functions with more than ${MAX_COMPLEXITY} independent paths are hard to test exhaustively.`,
  recommendation: "Extract branches into helper functions or replace conditionals with a lookup table.",
  check(node) {
    const complexity = 1 + node.facts.decisionPoints;
    if (complexity <= MAX_COMPLEXITY) {
      return undefined;
    }
    return {
      node,
      message: `Function '${node.name}' has cyclomatic complexity ${complexity} (limit ${MAX_COMPLEXITY}).`,
    };
  },
});

export const ruleTooManyParameters = defineRule({
  id: "too-many-parameters",
  title: "Too many parameters",
  category: "complexity",
  severity: "medium",
  kinds: ["FunctionDef"],
  description: `More than ${MAX_PARAMETERS} parameters usually means the function does too much.`,
  recommendation: "Group related parameters into a dataclass or split the function.",
  check(node) {
    const count = node.params.filter((param) => param.name !== "self" && param.name !== "cls").length;
    if (count <= MAX_PARAMETERS) {
      return undefined;
    }
    return { node, message: `Function '${node.name}' takes ${count} parameters (limit ${MAX_PARAMETERS}).` };
  },
});

export const ruleLongFunction = defineRule({
  id: "long-function",
  title: "Long function",
  category: "complexity",
  severity: "low",
  kinds: ["FunctionDef"],
  description: `Function bodies over ${MAX_FUNCTION_LINES} lines are hard to read in one go.`,
  recommendation: "Split the function into smaller, named steps.",
  check(node) {
    const first = node.body[0];
    const last = node.body[node.body.length - 1];
    if (!first || !last) {
      return undefined;
    }
    const length = last.span.endLine - first.span.line + 1;
    if (length <= MAX_FUNCTION_LINES) {
      return undefined;
    }
    return { node, message: `Function '${node.name}' body spans ${length} lines (limit ${MAX_FUNCTION_LINES}).` };
  },
});

export const ruleDeepNesting = defineRule({
  id: "deep-nesting",
  title: "Deeply nested control flow",
  category: "complexity",
  severity: "medium",
  kinds: ["If", "For", "While", "Try", "With"],
  description: `Control blocks nested deeper than ${MAX_NESTING} levels hide the main path.`,
  recommendation: "Use guard clauses and early returns, or extract the inner block.",
  check(node, context) {
    if (!opensBlock(node)) {
      return undefined;
    }
    const outer = context.blockDepth;
    // Reported once, at the first block past the limit.
    if (outer !== MAX_NESTING) {
      return undefined;
    }
    return { node, message: `Control flow is nested ${MAX_NESTING + 1} levels deep.` };
  },
});

export const ruleTooManyReturns = defineRule({
  id: "too-many-returns",
  title: "Too many return statements",
  category: "complexity",
  severity: "low",
  kinds: ["FunctionDef"],
  description: `More than ${MAX_RETURNS} exits make a function's result hard to follow.`,
  recommendation: "Compute the result in one place, or split the function.",
  check(node) {
    const count = node.facts.returns.length;
    if (count <= MAX_RETURNS) {
      return undefined;
    }
    return { node, message: `Function '${node.name}' has ${count} return statements (limit ${MAX_RETURNS}).` };
  },
});

export const ruleElseAfterReturn = defineRule({
  id: "else-after-return",
  title: "else after return",
  category: "complexity",
  severity: "low",
  kinds: ["If"],
  description: "When the if branch always leaves, the else branch only adds indentation.",
  recommendation: "Remove the else and dedent its body.",
  check(node) {
    const last = node.body[node.body.length - 1];
    if (!last || (last.kind !== "Return" && last.kind !== "Raise")) {
      return undefined;
    }
    const [onlyBranch] = node.orelse;
    if (!onlyBranch || (node.orelse.length === 1 && onlyBranch.kind === "If" && onlyBranch.isElif)) {
      return undefined;
    }
    const keyword = last.kind === "Return" ? "return" : "raise";
    return { node, message: `Unnecessary else after '${keyword}'.` };
  },
});

export const ruleComplexComprehension = defineRule({
  id: "complex-comprehension",
  title: "Complex comprehension",
  category: "complexity",
  severity: "low",
  kinds: ["Comprehension"],
  description: "Comprehensions with several for clauses or nested comprehensions are hard to read.",
  recommendation: "Rewrite as explicit loops or extract a helper generator.",
  check(node) {
    if (node.generators.length > 2) {
      return { node, message: `Comprehension has ${node.generators.length} for clauses.` };
    }
    if (node.element.kind === "Comprehension") {
      return { node, message: "Comprehension builds another comprehension per element." };
    }
    return undefined;
  },
});

export const ruleComplexBooleanExpression = defineRule({
  id: "complex-boolean-expression",
  title: "Complex boolean expression",
  category: "complexity",
  severity: "low",
  kinds: ["BoolOp"],
  description: `Conditions chaining more than ${MAX_BOOL_OPERANDS} operands are hard to verify.`,
  recommendation: "Name the sub-conditions with local variables or a helper predicate.",
  check(node, context) {
    const parent = context.parent;
    if (parent?.kind === "BoolOp" && parent.op === node.op) {
      return undefined;
    }
    const operands = boolOperands(node, node.op).length;
    if (operands <= MAX_BOOL_OPERANDS) {
      return undefined;
    }
    return { node, message: `'${node.op}' chain has ${operands} operands (limit ${MAX_BOOL_OPERANDS}).` };
  },
});

export const COMPLEXITY_RULES = [
  ruleCyclomaticComplexity,
  ruleTooManyParameters,
  ruleLongFunction,
  ruleDeepNesting,
  ruleTooManyReturns,
  ruleElseAfterReturn,
  ruleComplexComprehension,
  ruleComplexBooleanExpression,
];
