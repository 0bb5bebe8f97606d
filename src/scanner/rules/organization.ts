import type { DefinitionNode, PyNode } from "../syntax.js";
import { defineRule } from "./define.js";
import { dottedName } from "../../utils/ast.js";

export const MAX_METHODS = 20;

export const ruleWildcardImport = defineRule({
  id: "wildcard-import",
  title: "Wildcard import",
  category: "organization",
  severity: "high",
  kinds: ["ImportFrom"],
  description: "'import *' hides where names come from and can silently shadow local names.",
  recommendation: "Import the names you use explicitly, or import the module.",
  check(node) {
    if (!node.wildcard) {
      return undefined;
    }
    return { node, message: `'from ${node.module} import *' pulls unknown names into the module.` };
  },
});

export const ruleMultipleImports = defineRule({
  id: "multiple-imports",
  title: "Several modules imported on one line",
  category: "organization",
  severity: "low",
  kinds: ["Import"],
  description: "One import per line keeps diffs and sorting tools predictable.",
  recommendation: "Split the statement into one 'import' per module.",
  check(node) {
    if (node.names.length < 2) {
      return undefined;
    }
    return { node, message: `One statement imports ${node.names.map((alias) => alias.name).join(", ")}.` };
  },
});

export const ruleGodClass = defineRule({
  id: "god-class",
  title: "Class with too many methods",
  category: "organization",
  severity: "low",
  kinds: ["ClassDef"],
  description: `Classes with more than ${MAX_METHODS} methods usually carry several responsibilities.`,
  recommendation: "Split the class along its responsibilities, or move helpers to functions.",
  check(node) {
    const methods = node.body.filter((statement) => statement.kind === "FunctionDef").length;
    if (methods <= MAX_METHODS) {
      return undefined;
    }
    return { node, message: `Class '${node.name}' defines ${methods} methods (limit ${MAX_METHODS}).` };
  },
});

function isRedefinitionAllowed(decorator: PyNode): boolean {
  const target = decorator.kind === "Call" ? decorator.func : decorator;
  const name = dottedName(target);
  if (name === undefined) {
    return false;
  }
  return (
    name === "overload" ||
    name.endsWith(".overload") ||
    name.endsWith(".setter") ||
    name.endsWith(".getter") ||
    name.endsWith(".deleter") ||
    name.endsWith(".register")
  );
}

function isOverload(node: DefinitionNode): boolean {
  return node.decorators.some(isRedefinitionAllowed);
}

export const ruleDuplicateDefinition = defineRule({
  id: "duplicate-definition",
  title: "Duplicate definition",
  category: "organization",
  severity: "medium",
  kinds: ["FunctionDef", "ClassDef"],
  description: "A second def or class with the same name silently replaces the first.",
  recommendation: "Rename or remove one of the definitions.",
  check(node, context) {
    const scope = context.parent;
    if (scope?.kind !== "Module" && scope?.kind !== "ClassDef") {
      return undefined;
    }
    const siblings = scope.facts.definitions.get(node.name) ?? [];
    const position = siblings.indexOf(node);
    if (position < 1 || isOverload(node) || siblings.slice(0, position).some(isOverload)) {
      return undefined;
    }
    const first = siblings[0];
    return {
      node,
      message: `'${node.name}' is already defined on line ${first.span.line}; this definition replaces it.`,
    };
  },
});

export const ORGANIZATION_RULES = [
  ruleWildcardImport,
  ruleMultipleImports,
  ruleGodClass,
  ruleDuplicateDefinition,
];
