import { createRequire } from "node:module";
import Parser from "tree-sitter";
import type {
  AssignNode,
  ClassDefNode,
  CompForNode,
  ComprehensionVariant,
  DefinitionNode,
  ExceptHandlerNode,
  FunctionDefNode,
  IfNode,
  ImportAlias,
  KeywordNode,
  LambdaNode,
  ModuleNode,
  ParamNode,
  PyNode,
  ReturnNode,
  ScopeFacts,
  Span,
  StrNode,
  WithItemNode,
} from "./syntax.js";
import type { StageOutcome } from "./types.js";
import { logDebug } from "../utils/logger.js";

type TSNode = Parser.SyntaxNode;

const require = createRequire(import.meta.url);

let sharedParser: Parser | undefined;

function getParser(): Parser {
  if (!sharedParser) {
    const language: unknown = require("tree-sitter-python");
    const parser = new Parser();
    parser.setLanguage(language);
    sharedParser = parser;
  }
  return sharedParser;
}

const COMPARISON_OPERATORS = new Set([
  "<",
  "<=",
  "==",
  "!=",
  ">=",
  ">",
  "<>",
  "in",
  "not in",
  "is",
  "is not",
]);

function mergeOperator(leaves: readonly string[]): string {
  const twoWord = leaves.find((leaf) => leaf.includes(" "));
  return twoWord ?? leaves.join(" ");
}

const COMPREHENSION_VARIANTS: Record<string, ComprehensionVariant> = {
  list_comprehension: "list",
  set_comprehension: "set",
  dictionary_comprehension: "dict",
  generator_expression: "generator",
};

const STRING_LITERAL = /^([A-Za-z]*)("""|'''|"|')([\s\S]*)\2$/;

export function buildSyntaxTree(source: string): StageOutcome<ModuleNode> {
  let root: TSNode;
  try {
    const tree = getParser().parse(source, undefined, {
      bufferSize: Math.max(32 * 1024, source.length * 2 + 1),
    });
    root = tree.rootNode;
  } catch (error) {
    return { status: "error", stage: "parse", error };
  }

  const broken = findSyntaxError(root);
  if (broken) {
    logDebug("syntax error, file not analysed", { line: broken.startPosition.row + 1 });
    return { status: "skip", reason: "syntax-error" };
  }

  try {
    return { status: "ok", value: new TreeConverter().convertModule(root) };
  } catch (error) {
    return { status: "error", stage: "convert", error };
  }
}

function findSyntaxError(root: TSNode): TSNode | undefined {
  const pending: TSNode[] = [root];
  let node = pending.pop();
  while (node) {
    if (node.type === "ERROR") {
      return node;
    }
    const children = node.children;
    // Tokens the parser had to invent are zero-width leaves.
    if (children.length === 0 && node.startIndex === node.endIndex && node.type !== "module") {
      return node;
    }
    for (const child of children) {
      pending.push(child);
    }
    node = pending.pop();
  }
  return undefined;
}

function spanOf(node: TSNode): Span {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column,
    endLine: node.endPosition.row + 1,
    endColumn: node.endPosition.column,
  };
}

function namedChildren(node: TSNode): TSNode[] {
  return node.namedChildren.filter((child) => child.type !== "comment");
}

function sameNode(left: TSNode, right: TSNode | null): boolean {
  return right !== null && left.startIndex === right.startIndex && left.endIndex === right.endIndex;
}

function isAsyncNode(node: TSNode): boolean {
  return node.children[0]?.type === "async";
}

class ScopeAccumulator {
  decisionPoints = 0;
  tryBlocks = 0;
  readonly returns: ReturnNode[] = [];
  readonly stringNames = new Set<string>();
  readonly referencedNames = new Set<string>();

  freeze(body: readonly PyNode[]): ScopeFacts {
    const definitions = new Map<string, DefinitionNode[]>();
    for (const statement of body) {
      if (statement.kind === "FunctionDef" || statement.kind === "ClassDef") {
        const named = definitions.get(statement.name) ?? [];
        named.push(statement);
        definitions.set(statement.name, named);
      }
    }
    return {
      decisionPoints: this.decisionPoints,
      tryBlocks: this.tryBlocks,
      returns: [...this.returns],
      stringNames: new Set(this.stringNames),
      referencedNames: new Set(this.referencedNames),
      definitions,
    };
  }
}

class TreeConverter {
  private scope = new ScopeAccumulator();
  private readonly enclosing: ScopeAccumulator[] = [];

  convertModule(root: TSNode): ModuleNode {
    const body = namedChildren(root).map((child) => this.statement(child));
    return {
      kind: "Module",
      span: spanOf(root),
      text: root.text,
      children: body,
      body,
      facts: this.scope.freeze(body),
    };
  }

  private enterScope(): void {
    this.enclosing.push(this.scope);
    this.scope = new ScopeAccumulator();
  }

  private leaveScope(body: readonly PyNode[]): ScopeFacts {
    const finished = this.scope;
    const parent = this.enclosing.pop();
    if (!parent) {
      throw new Error("scope stack underflow");
    }
    parent.tryBlocks += finished.tryBlocks;
    for (const name of finished.referencedNames) {
      parent.referencedNames.add(name);
    }
    this.scope = parent;
    return finished.freeze(body);
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  private block(node: TSNode | null): PyNode[] {
    if (!node) {
      return [];
    }
    if (node.type !== "block") {
      return [this.statement(node)];
    }
    return namedChildren(node).map((child) => this.statement(child));
  }

  private statement(node: TSNode): PyNode {
    switch (node.type) {
      case "expression_statement":
        return this.expressionStatement(node);
      case "function_definition":
        return this.functionDef(node, []);
      case "class_definition":
        return this.classDef(node, []);
      case "decorated_definition":
        return this.decorated(node);
      case "if_statement":
        return this.ifStatement(node, false);
      case "for_statement":
        return this.forStatement(node);
      case "while_statement":
        return this.whileStatement(node);
      case "try_statement":
        return this.tryStatement(node);
      case "with_statement":
        return this.withStatement(node);
      case "return_statement":
        return this.returnStatement(node);
      case "pass_statement":
        return { kind: "Pass", span: spanOf(node), text: node.text, children: [] };
      case "break_statement":
        return { kind: "Break", span: spanOf(node), text: node.text, children: [] };
      case "continue_statement":
        return { kind: "Continue", span: spanOf(node), text: node.text, children: [] };
      case "global_statement":
      case "nonlocal_statement": {
        const names = namedChildren(node).map((child) => child.text);
        return {
          kind: node.type === "global_statement" ? "Global" : "Nonlocal",
          span: spanOf(node),
          text: node.text,
          children: [],
          names,
        };
      }
      case "assert_statement": {
        const [test, msg] = namedChildren(node).map((child) => this.expression(child));
        const children = msg ? [test, msg] : [test];
        return { kind: "Assert", span: spanOf(node), text: node.text, children, test, msg };
      }
      case "raise_statement":
        return this.raiseStatement(node);
      case "delete_statement": {
        const targets = namedChildren(node).map((child) => this.expression(child));
        return { kind: "Delete", span: spanOf(node), text: node.text, children: targets, targets };
      }
      case "import_statement":
        return {
          kind: "Import",
          span: spanOf(node),
          text: node.text,
          children: [],
          names: this.importNames(namedChildren(node)),
        };
      case "import_from_statement":
      case "future_import_statement":
        return this.importFrom(node);
      default:
        return this.other(node);
    }
  }

  private expressionStatement(node: TSNode): PyNode {
    const parts = namedChildren(node);
    if (parts.length === 1) {
      const only = parts[0];
      if (only.type === "assignment") {
        return this.assignment(only);
      }
      if (only.type === "augmented_assignment") {
        return this.augmentedAssignment(only);
      }
    }
    const value =
      parts.length === 1
        ? this.expression(parts[0])
        : this.sequence("Tuple", node, parts);
    return { kind: "ExprStmt", span: spanOf(node), text: node.text, children: [value], value };
  }

  private assignment(node: TSNode): AssignNode {
    const targets: PyNode[] = [];
    let annotation: PyNode | undefined;
    let value: PyNode | undefined;
    let current: TSNode | null = node;

    while (current) {
      const left = current.childForFieldName("left");
      if (left) {
        targets.push(this.expression(left));
      }
      const type = current.childForFieldName("type");
      if (type && !annotation) {
        annotation = this.expression(type);
      }
      const right: TSNode | null = current.childForFieldName("right");
      if (right?.type === "assignment") {
        current = right;
        continue;
      }
      value = right ? this.expression(right) : undefined;
      current = null;
    }

    if (value?.kind === "Str") {
      for (const target of targets) {
        if (target.kind === "Name") {
          this.scope.stringNames.add(target.id);
        }
      }
    }

    const children: PyNode[] = [...targets];
    if (annotation) children.push(annotation);
    if (value) children.push(value);
    return { kind: "Assign", span: spanOf(node), text: node.text, children, targets, annotation, value };
  }

  private augmentedAssignment(node: TSNode): PyNode {
    const target = this.expression(this.field(node, "left"));
    const value = this.expression(this.field(node, "right"));
    const operator = node.childForFieldName("operator")?.type ?? "+=";
    return {
      kind: "AugAssign",
      span: spanOf(node),
      text: node.text,
      children: [target, value],
      target,
      op: operator.replace(/=$/, ""),
      value,
    };
  }

  private decorated(node: TSNode): PyNode {
    const decorators = namedChildren(node)
      .filter((child) => child.type === "decorator")
      .map((decorator) => {
        const [expression] = namedChildren(decorator);
        return expression ? this.expression(expression) : this.other(decorator);
      });
    const definition = node.childForFieldName("definition");
    if (definition?.type === "function_definition") {
      return this.functionDef(definition, decorators);
    }
    if (definition?.type === "class_definition") {
      return this.classDef(definition, decorators);
    }
    return this.other(node);
  }

  private functionDef(node: TSNode, decorators: PyNode[]): FunctionDefNode {
    const params = this.parameters(node.childForFieldName("parameters"));
    const returnType = node.childForFieldName("return_type");
    const returnAnnotation = returnType ? this.expression(returnType) : undefined;

    this.enterScope();
    const body = this.block(node.childForFieldName("body"));
    const facts = this.leaveScope(body);

    const children: PyNode[] = [...decorators, ...params];
    if (returnAnnotation) children.push(returnAnnotation);
    children.push(...body);
    return {
      kind: "FunctionDef",
      span: spanOf(node),
      text: node.text,
      children,
      name: node.childForFieldName("name")?.text ?? "",
      isAsync: isAsyncNode(node),
      decorators,
      params,
      returnAnnotation,
      body,
      facts,
    };
  }

  private parameters(node: TSNode | null): ParamNode[] {
    if (!node) {
      return [];
    }
    const params: ParamNode[] = [];
    for (const child of namedChildren(node)) {
      const param = this.parameter(child);
      if (param) {
        params.push(param);
      }
    }
    return params;
  }

  private parameter(node: TSNode): ParamNode | undefined {
    const make = (
      nameNode: TSNode | null,
      annotationNode: TSNode | null,
      defaultNode: TSNode | null,
    ): ParamNode | undefined => {
      if (!nameNode) {
        return undefined;
      }
      const { name, variant } = describeParamName(nameNode);
      const annotation = annotationNode ? this.expression(annotationNode) : undefined;
      const defaultValue = defaultNode ? this.expression(defaultNode) : undefined;
      const children: PyNode[] = [];
      if (annotation) children.push(annotation);
      if (defaultValue) children.push(defaultValue);
      return {
        kind: "Param",
        span: spanOf(node),
        text: node.text,
        children,
        name,
        variant,
        annotation,
        defaultValue,
      };
    };

    switch (node.type) {
      case "identifier":
      case "list_splat_pattern":
      case "dictionary_splat_pattern":
        return make(node, null, null);
      case "typed_parameter":
        return make(namedChildren(node)[0] ?? null, node.childForFieldName("type"), null);
      case "default_parameter":
        return make(node.childForFieldName("name"), null, node.childForFieldName("value"));
      case "typed_default_parameter":
        return make(
          node.childForFieldName("name"),
          node.childForFieldName("type"),
          node.childForFieldName("value"),
        );
      default:
        // keyword_separator, positional_separator
        return undefined;
    }
  }

  private classDef(node: TSNode, decorators: PyNode[]): ClassDefNode {
    const superclasses = node.childForFieldName("superclasses");
    const bases = superclasses ? this.argumentList(superclasses) : [];

    this.enterScope();
    const body = this.block(node.childForFieldName("body"));
    const facts = this.leaveScope(body);

    return {
      kind: "ClassDef",
      span: spanOf(node),
      text: node.text,
      children: [...decorators, ...bases, ...body],
      name: node.childForFieldName("name")?.text ?? "",
      decorators,
      bases,
      body,
      facts,
    };
  }

  private ifStatement(node: TSNode, isElif: boolean): IfNode {
    this.scope.decisionPoints += 1;
    const test = this.expression(this.field(node, "condition"));
    const body = this.block(node.childForFieldName("consequence"));

    const alternatives = namedChildren(node).filter(
      (child) => child.type === "elif_clause" || child.type === "else_clause",
    );
    const orelse = this.elseChain(alternatives);

    return {
      kind: "If",
      span: spanOf(node),
      text: node.text,
      children: [test, ...body, ...orelse],
      test,
      body,
      orelse,
      isElif,
    };
  }

  private elseChain(alternatives: TSNode[]): PyNode[] {
    const [first, ...rest] = alternatives;
    if (!first) {
      return [];
    }
    if (first.type === "else_clause") {
      return this.block(first.childForFieldName("body"));
    }
    this.scope.decisionPoints += 1;
    const test = this.expression(this.field(first, "condition"));
    const body = this.block(first.childForFieldName("consequence"));
    const orelse = this.elseChain(rest);
    const elif: IfNode = {
      kind: "If",
      span: spanOf(first),
      text: first.text,
      children: [test, ...body, ...orelse],
      test,
      body,
      orelse,
      isElif: true,
    };
    return [elif];
  }

  private elseBody(node: TSNode): PyNode[] {
    const clause = node.childForFieldName("alternative") ??
      namedChildren(node).find((child) => child.type === "else_clause") ??
      null;
    return clause ? this.block(clause.childForFieldName("body")) : [];
  }

  private forStatement(node: TSNode): PyNode {
    this.scope.decisionPoints += 1;
    const target = this.expression(this.field(node, "left"));
    const iter = this.expression(this.field(node, "right"));
    const body = this.block(node.childForFieldName("body"));
    const orelse = this.elseBody(node);
    return {
      kind: "For",
      span: spanOf(node),
      text: node.text,
      children: [target, iter, ...body, ...orelse],
      target,
      iter,
      body,
      orelse,
      isAsync: isAsyncNode(node),
    };
  }

  private whileStatement(node: TSNode): PyNode {
    this.scope.decisionPoints += 1;
    const test = this.expression(this.field(node, "condition"));
    const body = this.block(node.childForFieldName("body"));
    const orelse = this.elseBody(node);
    return {
      kind: "While",
      span: spanOf(node),
      text: node.text,
      children: [test, ...body, ...orelse],
      test,
      body,
      orelse,
    };
  }

  private tryStatement(node: TSNode): PyNode {
    this.scope.tryBlocks += 1;
    const body = this.block(node.childForFieldName("body"));
    const handlers: ExceptHandlerNode[] = [];
    let orelse: PyNode[] = [];
    let finalbody: PyNode[] = [];

    for (const child of namedChildren(node)) {
      if (child.type === "except_clause" || child.type === "except_group_clause") {
        handlers.push(this.exceptHandler(child));
      } else if (child.type === "else_clause") {
        orelse = this.block(child.childForFieldName("body"));
      } else if (child.type === "finally_clause") {
        finalbody = this.block(namedChildren(child).find((part) => part.type === "block") ?? null);
      }
    }

    return {
      kind: "Try",
      span: spanOf(node),
      text: node.text,
      children: [...body, ...handlers, ...orelse, ...finalbody],
      body,
      handlers,
      orelse,
      finalbody,
    };
  }

  private exceptHandler(node: TSNode): ExceptHandlerNode {
    this.scope.decisionPoints += 1;
    const parts = namedChildren(node);
    const blockNode = parts.find((part) => part.type === "block") ?? null;
    const header = parts.filter((part) => part.type !== "block");

    let type: PyNode | undefined;
    let name: string | undefined;
    const [first, second] = header;
    if (first?.type === "as_pattern") {
      const [caught, alias] = namedChildren(first);
      type = caught ? this.expression(caught) : undefined;
      name = alias?.text;
    } else if (first) {
      type = this.expression(first);
      name = second?.text;
    }

    const body = this.block(blockNode);
    return {
      kind: "ExceptHandler",
      span: spanOf(node),
      text: node.text,
      children: type ? [type, ...body] : body,
      type,
      name,
      body,
      isGroup: node.type === "except_group_clause",
    };
  }

  private withStatement(node: TSNode): PyNode {
    const clause = namedChildren(node).find((child) => child.type === "with_clause");
    const items = clause
      ? namedChildren(clause)
          .filter((child) => child.type === "with_item")
          .map((item) => this.withItem(item))
      : [];
    const body = this.block(node.childForFieldName("body"));
    return {
      kind: "With",
      span: spanOf(node),
      text: node.text,
      children: [...items, ...body],
      items,
      body,
      isAsync: isAsyncNode(node),
    };
  }

  private withItem(node: TSNode): WithItemNode {
    const valueNode = node.childForFieldName("value") ?? namedChildren(node)[0] ?? null;
    let context: PyNode;
    let alias: PyNode | undefined;
    if (valueNode?.type === "as_pattern") {
      const [inner] = namedChildren(valueNode);
      const aliasNode = valueNode.childForFieldName("alias");
      context = inner ? this.expression(inner) : this.other(valueNode);
      alias = aliasNode ? this.expression(aliasNode) : undefined;
    } else {
      context = valueNode ? this.expression(valueNode) : this.other(node);
      const aliasNode = node.childForFieldName("alias");
      alias = aliasNode ? this.expression(aliasNode) : undefined;
    }
    return {
      kind: "WithItem",
      span: spanOf(node),
      text: node.text,
      children: alias ? [context, alias] : [context],
      context,
      alias,
    };
  }

  private returnStatement(node: TSNode): PyNode {
    const parts = namedChildren(node);
    const value =
      parts.length === 0
        ? undefined
        : parts.length === 1
          ? this.expression(parts[0])
          : this.sequence("Tuple", node, parts);
    const ret: ReturnNode = {
      kind: "Return",
      span: spanOf(node),
      text: node.text,
      children: value ? [value] : [],
      value,
    };
    this.scope.returns.push(ret);
    return ret;
  }

  private raiseStatement(node: TSNode): PyNode {
    const causeNode = node.childForFieldName("cause");
    const parts = namedChildren(node).filter((child) => !sameNode(child, causeNode));
    const exc = parts[0] ? this.expression(parts[0]) : undefined;
    const cause = causeNode ? this.expression(causeNode) : undefined;
    const children: PyNode[] = [];
    if (exc) children.push(exc);
    if (cause) children.push(cause);
    return { kind: "Raise", span: spanOf(node), text: node.text, children, exc, cause };
  }

  private importNames(parts: TSNode[]): ImportAlias[] {
    const names: ImportAlias[] = [];
    for (const part of parts) {
      if (part.type === "aliased_import") {
        names.push({
          name: part.childForFieldName("name")?.text ?? "",
          asname: part.childForFieldName("alias")?.text,
        });
      } else if (part.type === "dotted_name" || part.type === "identifier") {
        names.push({ name: part.text });
      }
    }
    return names;
  }

  private importFrom(node: TSNode): PyNode {
    const moduleNode = node.childForFieldName("module_name");
    const module = node.type === "future_import_statement" ? "__future__" : moduleNode?.text ?? "";
    const parts = namedChildren(node).filter((child) => !sameNode(child, moduleNode));
    return {
      kind: "ImportFrom",
      span: spanOf(node),
      text: node.text,
      children: [],
      module,
      names: this.importNames(parts),
      wildcard: parts.some((child) => child.type === "wildcard_import"),
    };
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  private field(node: TSNode, name: string): TSNode {
    const child = node.childForFieldName(name);
    if (!child) {
      throw new Error(`${node.type} at line ${node.startPosition.row + 1} has no ${name}`);
    }
    return child;
  }

  private expression(node: TSNode): PyNode {
    switch (node.type) {
      case "identifier":
      case "keyword_identifier": {
        this.scope.referencedNames.add(node.text);
        return { kind: "Name", span: spanOf(node), text: node.text, children: [], id: node.text };
      }
      case "parenthesized_expression":
      case "type":
      case "as_pattern_target": {
        const [inner] = namedChildren(node);
        return inner ? this.expression(inner) : this.other(node);
      }
      case "attribute": {
        const value = this.expression(this.field(node, "object"));
        return {
          kind: "Attribute",
          span: spanOf(node),
          text: node.text,
          children: [value],
          value,
          attr: node.childForFieldName("attribute")?.text ?? "",
        };
      }
      case "subscript": {
        const value = this.expression(this.field(node, "value"));
        const slices = namedChildren(node)
          .slice(1)
          .map((child) => this.expression(child));
        const slice =
          slices.length === 1 ? slices[0] : this.syntheticTuple(node, slices);
        return {
          kind: "Subscript",
          span: spanOf(node),
          text: node.text,
          children: [value, slice],
          value,
          slice,
        };
      }
      case "call":
        return this.call(node);
      case "string":
      case "concatenated_string":
        return this.string(node);
      case "integer":
      case "float":
        return { kind: "Num", span: spanOf(node), text: node.text, children: [], value: node.text };
      case "none":
        return this.constant(node, "None");
      case "true":
        return this.constant(node, "True");
      case "false":
        return this.constant(node, "False");
      case "ellipsis":
        return this.constant(node, "Ellipsis");
      case "list":
      case "list_pattern":
        return this.sequence("List", node, namedChildren(node));
      case "tuple":
      case "tuple_pattern":
      case "expression_list":
      case "pattern_list":
        return this.sequence("Tuple", node, namedChildren(node));
      case "set":
        return this.sequence("Set", node, namedChildren(node));
      case "dictionary":
        return {
          kind: "Dict",
          span: spanOf(node),
          text: node.text,
          children: namedChildren(node).map((child) => this.expression(child)),
        };
      case "list_comprehension":
      case "set_comprehension":
      case "dictionary_comprehension":
      case "generator_expression":
        return this.comprehension(node);
      case "comparison_operator":
        return this.comparison(node);
      case "boolean_operator": {
        this.scope.decisionPoints += 1;
        const left = this.expression(this.field(node, "left"));
        const right = this.expression(this.field(node, "right"));
        const op = node.childForFieldName("operator")?.type === "or" ? "or" : "and";
        return { kind: "BoolOp", span: spanOf(node), text: node.text, children: [left, right], op, left, right };
      }
      case "binary_operator": {
        const left = this.expression(this.field(node, "left"));
        const right = this.expression(this.field(node, "right"));
        const op = node.childForFieldName("operator")?.type ?? "";
        return { kind: "BinOp", span: spanOf(node), text: node.text, children: [left, right], left, op, right };
      }
      case "not_operator": {
        const operand = this.expression(this.field(node, "argument"));
        return { kind: "UnaryOp", span: spanOf(node), text: node.text, children: [operand], op: "not", operand };
      }
      case "unary_operator": {
        const operand = this.expression(this.field(node, "argument"));
        const op = node.childForFieldName("operator")?.type ?? "";
        return { kind: "UnaryOp", span: spanOf(node), text: node.text, children: [operand], op, operand };
      }
      case "conditional_expression": {
        const [body, test, orelse] = namedChildren(node).map((child) => this.expression(child));
        if (!body || !test || !orelse) {
          return this.other(node);
        }
        return { kind: "IfExp", span: spanOf(node), text: node.text, children: [body, test, orelse], body, test, orelse };
      }
      case "await": {
        const [inner] = namedChildren(node);
        if (!inner) {
          return this.other(node);
        }
        const value = this.expression(inner);
        return { kind: "Await", span: spanOf(node), text: node.text, children: [value], value };
      }
      case "yield": {
        const [inner] = namedChildren(node);
        const value = inner ? this.expression(inner) : undefined;
        const isFrom = node.children.some((child) => child.type === "from");
        return { kind: "Yield", span: spanOf(node), text: node.text, children: value ? [value] : [], value, isFrom };
      }
      case "list_splat":
      case "dictionary_splat":
      case "list_splat_pattern":
      case "dictionary_splat_pattern": {
        const [inner] = namedChildren(node);
        if (!inner) {
          return this.other(node);
        }
        const value = this.expression(inner);
        return {
          kind: "Starred",
          span: spanOf(node),
          text: node.text,
          children: [value],
          value,
          isDouble: node.type.startsWith("dictionary"),
        };
      }
      case "named_expression": {
        const target = this.expression(this.field(node, "name"));
        const value = this.expression(this.field(node, "value"));
        return { kind: "NamedExpr", span: spanOf(node), text: node.text, children: [target, value], target, value };
      }
      case "lambda":
        return this.lambda(node);
      case "assignment":
        return this.assignment(node);
      case "augmented_assignment":
        return this.augmentedAssignment(node);
      default:
        return this.other(node);
    }
  }

  private constant(node: TSNode, value: "None" | "True" | "False" | "Ellipsis"): PyNode {
    return { kind: "Constant", span: spanOf(node), text: node.text, children: [], value };
  }

  private sequence(kind: "List" | "Tuple" | "Set", node: TSNode, parts: TSNode[]): PyNode {
    const elts = parts.map((part) => this.expression(part));
    return { kind, span: spanOf(node), text: node.text, children: elts, elts };
  }

  private syntheticTuple(node: TSNode, elts: PyNode[]): PyNode {
    return { kind: "Tuple", span: spanOf(node), text: node.text, children: elts, elts };
  }

  private call(node: TSNode): PyNode {
    const func = this.expression(this.field(node, "function"));
    const argumentsNode = node.childForFieldName("arguments");
    const args: PyNode[] = [];
    const keywords: KeywordNode[] = [];

    if (argumentsNode?.type === "generator_expression") {
      args.push(this.comprehension(argumentsNode));
    } else if (argumentsNode) {
      for (const argument of this.argumentList(argumentsNode)) {
        if (argument.kind === "Keyword") {
          keywords.push(argument);
        } else {
          args.push(argument);
        }
      }
    }

    return {
      kind: "Call",
      span: spanOf(node),
      text: node.text,
      children: [func, ...args, ...keywords],
      func,
      args,
      keywords,
    };
  }

  private argumentList(node: TSNode): PyNode[] {
    return namedChildren(node).map((child): PyNode => {
      if (child.type !== "keyword_argument") {
        return this.expression(child);
      }
      const value = this.expression(this.field(child, "value"));
      return {
        kind: "Keyword",
        span: spanOf(child),
        text: child.text,
        children: [value],
        arg: child.childForFieldName("name")?.text ?? "",
        value,
      };
    });
  }

  private string(node: TSNode): StrNode {
    const pieces = node.type === "concatenated_string"
      ? namedChildren(node).filter((child) => child.type === "string")
      : [node];
    let formatted = false;
    let bytes = false;
    const values: string[] = [];
    const interpolations: PyNode[] = [];

    for (const piece of pieces) {
      const match = STRING_LITERAL.exec(piece.text);
      const prefix = match?.[1]?.toLowerCase() ?? "";
      formatted ||= prefix.includes("f");
      bytes ||= prefix.includes("b");
      values.push(match?.[3] ?? piece.text);
      for (const part of namedChildren(piece)) {
        if (part.type !== "interpolation") {
          continue;
        }
        const expression = part.childForFieldName("expression") ?? namedChildren(part)[0];
        if (expression) {
          interpolations.push(this.expression(expression));
        }
      }
    }

    return {
      kind: "Str",
      span: spanOf(node),
      text: node.text,
      children: interpolations,
      value: values.join(""),
      formatted: formatted || interpolations.length > 0,
      bytes,
      implicitConcat: pieces.length > 1,
      interpolations,
    };
  }

  private comprehension(node: TSNode): PyNode {
    const bodyNode = node.childForFieldName("body");
    const element = bodyNode ? this.expression(bodyNode) : this.other(node);
    const generators: CompForNode[] = [];
    let pendingIfs: PyNode[] = [];

    const flush = (clause: TSNode): void => {
      const target = this.expression(this.field(clause, "left"));
      const iter = this.expression(this.field(clause, "right"));
      generators.push({
        kind: "CompFor",
        span: spanOf(clause),
        text: clause.text,
        children: [target, iter],
        target,
        iter,
        ifs: [],
        isAsync: isAsyncNode(clause),
      });
    };

    for (const child of namedChildren(node)) {
      if (child.type === "for_in_clause") {
        this.attachIfs(generators, pendingIfs);
        pendingIfs = [];
        flush(child);
      } else if (child.type === "if_clause") {
        this.scope.decisionPoints += 1;
        const [condition] = namedChildren(child);
        if (condition) {
          pendingIfs.push(this.expression(condition));
        }
      }
    }
    this.attachIfs(generators, pendingIfs);

    return {
      kind: "Comprehension",
      span: spanOf(node),
      text: node.text,
      children: [element, ...generators],
      variant: COMPREHENSION_VARIANTS[node.type] ?? "generator",
      element,
      generators,
    };
  }

  private attachIfs(generators: CompForNode[], ifs: PyNode[]): void {
    const last = generators.pop();
    if (!last) {
      return;
    }
    if (ifs.length === 0) {
      generators.push(last);
      return;
    }
    generators.push({ ...last, children: [...last.children, ...ifs], ifs: [...last.ifs, ...ifs] });
  }

  private comparison(node: TSNode): PyNode {
    const operands: PyNode[] = [];
    // Leaves of one operator position; "is not" and "not in" arrive as two leaves.
    const positions: string[][] = [];
    let afterOperator = false;
    for (const child of node.children) {
      if (child.type === "comment") {
        continue;
      }
      if (COMPARISON_OPERATORS.has(child.type) || child.type === "not") {
        const current = positions[positions.length - 1];
        if (afterOperator && current) {
          current.push(child.type);
        } else {
          positions.push([child.type]);
        }
        afterOperator = true;
      } else {
        operands.push(this.expression(child));
        afterOperator = false;
      }
    }
    const ops = positions.map(mergeOperator);
    const [left, ...comparators] = operands;
    if (!left) {
      return this.other(node);
    }
    return {
      kind: "Compare",
      span: spanOf(node),
      text: node.text,
      children: operands,
      left,
      ops,
      comparators,
    };
  }

  private lambda(node: TSNode): LambdaNode {
    const params = this.parameters(node.childForFieldName("parameters"));
    this.enterScope();
    const body = this.expression(this.field(node, "body"));
    const facts = this.leaveScope([]);
    return {
      kind: "Lambda",
      span: spanOf(node),
      text: node.text,
      children: [...params, body],
      params,
      body,
      facts,
    };
  }

  private other(node: TSNode): PyNode {
    return {
      kind: "Other",
      span: spanOf(node),
      text: node.text,
      children: namedChildren(node).map((child) =>
        isStatementType(child.type) ? this.statement(child) : this.expression(child),
      ),
      type: node.type,
    };
  }
}

function describeParamName(node: TSNode): { name: string; variant: ParamNode["variant"] } {
  if (node.type === "list_splat_pattern") {
    return { name: node.text.replace(/^\*/, ""), variant: "vararg" };
  }
  if (node.type === "dictionary_splat_pattern") {
    return { name: node.text.replace(/^\*\*/, ""), variant: "kwarg" };
  }
  return { name: node.text, variant: "positional" };
}

function isStatementType(type: string): boolean {
  return type.endsWith("_statement") || type.endsWith("_definition") || type === "block";
}
