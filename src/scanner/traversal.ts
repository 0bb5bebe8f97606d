import type {
  ClassDefNode,
  ComprehensionNode,
  ExceptHandlerNode,
  ForNode,
  FunctionDefNode,
  LambdaNode,
  ModuleNode,
  NodeKind,
  PyNode,
  ScopeFacts,
  TryNode,
  WhileNode,
} from "./syntax.js";
import type { Finding, Rule } from "./types.js";
import { boundNames } from "../utils/ast.js";
import { logError } from "../utils/logger.js";

export type ContextFrame =
  | { kind: "function"; node: FunctionDefNode | LambdaNode }
  | { kind: "class"; node: ClassDefNode }
  | { kind: "loop"; node: ForNode | WhileNode; boundNames: ReadonlySet<string> }
  | { kind: "comprehension"; node: ComprehensionNode; boundNames: ReadonlySet<string> }
  | { kind: "guarded"; node: TryNode }
  | { kind: "handler"; node: ExceptHandlerNode }
  | { kind: "finally"; node: TryNode };

export type FrameKind = ContextFrame["kind"];

/**
 * What a rule sees at each node. The arrays are live views owned by the
 * walker: read them during the call, never keep them.
 */
export interface VisitContext {
  readonly frames: readonly ContextFrame[];
  readonly parent: PyNode | undefined;
  /**
   * Control blocks (if, for, while, try, with) enclosing the node inside its
   * function; undefined at module and class level.
   */
  readonly blockDepth: number | undefined;
  /** Facts of the innermost function, lambda or class, else of the module. */
  readonly scopeFacts: ScopeFacts;
  readonly module: ModuleNode;
  readonly filePath: string;
  readonly lines: readonly string[];
}

export type DispatchTable = ReadonlyMap<NodeKind, readonly Rule[]>;

export function buildDispatchTable(rules: readonly Rule[]): DispatchTable {
  const table = new Map<NodeKind, Rule[]>();
  for (const rule of rules) {
    for (const kind of rule.kinds) {
      const bucket = table.get(kind);
      if (bucket) {
        bucket.push(rule);
      } else {
        table.set(kind, [rule]);
      }
    }
  }
  return table;
}

// ---------------------------------------------------------------------------
// Context queries
// ---------------------------------------------------------------------------

/** Frames from the innermost outwards, stopping after the nearest function. */
function* framesInFunction(context: VisitContext): Generator<ContextFrame> {
  for (let index = context.frames.length - 1; index >= 0; index -= 1) {
    const frame = context.frames[index];
    yield frame;
    if (frame.kind === "function") {
      return;
    }
  }
}

export function nearestFunction(context: VisitContext): FunctionDefNode | LambdaNode | undefined {
  for (const frame of framesInFunction(context)) {
    if (frame.kind === "function") {
      return frame.node;
    }
  }
  return undefined;
}

export function insideFunction(context: VisitContext): boolean {
  return nearestFunction(context) !== undefined;
}

/** A nested function does not inherit the guard of an enclosing try. */
export function isGuarded(context: VisitContext): boolean {
  for (const frame of framesInFunction(context)) {
    if (frame.kind === "guarded") {
      return true;
    }
  }
  return false;
}

/** Loops and comprehensions of the current function, innermost first. */
export function enclosingLoops(
  context: VisitContext,
): Array<Extract<ContextFrame, { kind: "loop" | "comprehension" }>> {
  const loops: Array<Extract<ContextFrame, { kind: "loop" | "comprehension" }>> = [];
  for (const frame of framesInFunction(context)) {
    if (frame.kind === "loop" || frame.kind === "comprehension") {
      loops.push(frame);
    }
  }
  return loops;
}

export function insideLoop(context: VisitContext): boolean {
  return enclosingLoops(context).length > 0;
}

/** Whether the node counts towards nesting depth; an elif continues its chain. */
export function opensBlock(node: PyNode): boolean {
  switch (node.kind) {
    case "If":
      return !node.isElif;
    case "For":
    case "While":
    case "Try":
    case "With":
      return true;
    default:
      return false;
  }
}

export function sourceLine(context: VisitContext, line: number): string {
  return context.lines[line - 1] ?? "";
}

// ---------------------------------------------------------------------------
// Walker
// ---------------------------------------------------------------------------

class Walker implements VisitContext {
  readonly frames: ContextFrame[] = [];
  readonly findings: Finding[] = [];
  blockDepth: number | undefined = undefined;
  scopeFacts: ScopeFacts;
  private readonly ancestors: PyNode[] = [];

  constructor(
    readonly module: ModuleNode,
    readonly filePath: string,
    readonly lines: readonly string[],
    private readonly table: DispatchTable,
  ) {
    this.scopeFacts = module.facts;
  }

  get parent(): PyNode | undefined {
    return this.ancestors[this.ancestors.length - 1];
  }

  visit(node: PyNode): void {
    this.dispatch(node);
    const { blockDepth, scopeFacts } = this;
    this.enter(node);
    this.ancestors.push(node);
    try {
      this.descend(node);
    } finally {
      this.ancestors.pop();
      this.blockDepth = blockDepth;
      this.scopeFacts = scopeFacts;
    }
  }

  /** Updates depth and scope for everything below the node. */
  private enter(node: PyNode): void {
    switch (node.kind) {
      case "FunctionDef":
      case "Lambda":
        this.blockDepth = 0;
        this.scopeFacts = node.facts;
        return;
      case "ClassDef":
        this.blockDepth = undefined;
        this.scopeFacts = node.facts;
        return;
      default:
        if (this.blockDepth !== undefined && opensBlock(node)) {
          this.blockDepth += 1;
        }
    }
  }

  private visitAll(nodes: readonly PyNode[]): void {
    for (const node of nodes) {
      this.visit(node);
    }
  }

  private within(frame: ContextFrame, body: () => void): void {
    this.frames.push(frame);
    try {
      body();
    } finally {
      this.frames.pop();
    }
  }

  private descend(node: PyNode): void {
    switch (node.kind) {
      case "FunctionDef":
        this.visitAll(node.decorators);
        this.visitAll(node.params);
        if (node.returnAnnotation) {
          this.visit(node.returnAnnotation);
        }
        this.within({ kind: "function", node }, () => this.visitAll(node.body));
        return;
      case "Lambda":
        this.visitAll(node.params);
        this.within({ kind: "function", node }, () => this.visit(node.body));
        return;
      case "ClassDef":
        this.visitAll(node.decorators);
        this.visitAll(node.bases);
        this.within({ kind: "class", node }, () => this.visitAll(node.body));
        return;
      case "For":
        this.visit(node.target);
        this.visit(node.iter);
        this.within({ kind: "loop", node, boundNames: boundNames(node.target) }, () =>
          this.visitAll(node.body),
        );
        this.visitAll(node.orelse);
        return;
      case "While":
        this.within({ kind: "loop", node, boundNames: new Set() }, () => {
          this.visit(node.test);
          this.visitAll(node.body);
        });
        this.visitAll(node.orelse);
        return;
      case "Try":
        this.within({ kind: "guarded", node }, () => this.visitAll(node.body));
        this.visitAll(node.handlers);
        this.visitAll(node.orelse);
        this.within({ kind: "finally", node }, () => this.visitAll(node.finalbody));
        return;
      case "ExceptHandler":
        if (node.type) {
          this.visit(node.type);
        }
        this.within({ kind: "handler", node }, () => this.visitAll(node.body));
        return;
      case "Comprehension":
        this.descendComprehension(node);
        return;
      default:
        this.visitAll(node.children);
    }
  }

  private descendComprehension(node: ComprehensionNode): void {
    const [first] = node.generators;
    if (first) {
      this.visit(first.iter);
    }
    const names = new Set<string>();
    for (const generator of node.generators) {
      for (const name of boundNames(generator.target)) {
        names.add(name);
      }
    }
    this.within({ kind: "comprehension", node, boundNames: names }, () => {
      for (const generator of node.generators) {
        this.dispatch(generator);
        this.ancestors.push(generator);
        try {
          this.visit(generator.target);
          if (generator !== first) {
            this.visit(generator.iter);
          }
          this.visitAll(generator.ifs);
        } finally {
          this.ancestors.pop();
        }
      }
      this.visit(node.element);
    });
  }

  private dispatch(node: PyNode): void {
    const rules = this.table.get(node.kind);
    if (!rules) {
      return;
    }
    for (const rule of rules) {
      try {
        const match = rule.evaluate(node, this);
        if (!match) {
          continue;
        }
        const { line, column } = match.node.span;
        this.findings.push({
          rule_id: rule.id,
          title: rule.title,
          category: rule.category,
          severity: rule.severity,
          file: this.filePath,
          line,
          column,
          message: match.message,
          recommendation: match.recommendation ?? rule.recommendation,
          snippet: sourceLine(this, line).trim() || undefined,
        });
      } catch (error) {
        logError(`rule ${rule.id} failed; skipping it for this node`, {
          file: this.filePath,
          line: node.span.line,
          error,
        });
      }
    }
  }
}

/** One pre-order pass over the module; every rule sees each node of its kinds once. */
export function traverse(
  module: ModuleNode,
  table: DispatchTable,
  filePath: string,
  lines: readonly string[],
): Finding[] {
  const walker = new Walker(module, filePath, lines, table);
  walker.visit(module);
  return walker.findings;
}
