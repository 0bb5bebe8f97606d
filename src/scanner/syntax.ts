/**
 * Closed syntax model for Python sources.
 *
 * The tree builder converts tree-sitter's concrete tree into these nodes.
 * Every node carries its span, its source text and its children in visit
 * order; kind-specific fields point into `children`.
 */

export interface Span {
  /** 1-based. */
  line: number;
  /** 0-based. */
  column: number;
  endLine: number;
  endColumn: number;
}

interface NodeBase<K extends string> {
  readonly kind: K;
  readonly span: Span;
  readonly text: string;
  readonly children: readonly PyNode[];
}

/**
 * Facts collected bottom-up while a scope is built, so rules can answer
 * "does this function contain a try?" without walking the subtree again.
 */
export interface ScopeFacts {
  /** Decision points in this scope only (nested defs and lambdas excluded). */
  readonly decisionPoints: number;
  /** Try statements anywhere in the subtree, nested scopes included. */
  readonly tryBlocks: number;
  /** Return statements of this scope only. */
  readonly returns: readonly ReturnNode[];
  /** Names bound to a string literal in this scope. */
  readonly stringNames: ReadonlySet<string>;
  /** Every name read or written anywhere in the subtree. */
  readonly referencedNames: ReadonlySet<string>;
  /** Defs and classes directly in the body, by name, in source order. */
  readonly definitions: ReadonlyMap<string, readonly DefinitionNode[]>;
}

export interface ModuleNode extends NodeBase<"Module"> {
  readonly body: readonly PyNode[];
  readonly facts: ScopeFacts;
}

export interface FunctionDefNode extends NodeBase<"FunctionDef"> {
  readonly name: string;
  readonly isAsync: boolean;
  readonly decorators: readonly PyNode[];
  readonly params: readonly ParamNode[];
  readonly returnAnnotation?: PyNode;
  readonly body: readonly PyNode[];
  readonly facts: ScopeFacts;
}

export type ParamVariant = "positional" | "vararg" | "kwarg";

export interface ParamNode extends NodeBase<"Param"> {
  readonly name: string;
  readonly variant: ParamVariant;
  readonly annotation?: PyNode;
  readonly defaultValue?: PyNode;
}

export interface LambdaNode extends NodeBase<"Lambda"> {
  readonly params: readonly ParamNode[];
  readonly body: PyNode;
  readonly facts: ScopeFacts;
}

export interface ClassDefNode extends NodeBase<"ClassDef"> {
  readonly name: string;
  readonly decorators: readonly PyNode[];
  readonly bases: readonly PyNode[];
  readonly body: readonly PyNode[];
  readonly facts: ScopeFacts;
}

export interface IfNode extends NodeBase<"If"> {
  readonly test: PyNode;
  readonly body: readonly PyNode[];
  /** An `elif` appears here as a single nested If with `isElif` set. */
  readonly orelse: readonly PyNode[];
  readonly isElif: boolean;
}

export interface ForNode extends NodeBase<"For"> {
  readonly target: PyNode;
  readonly iter: PyNode;
  readonly body: readonly PyNode[];
  readonly orelse: readonly PyNode[];
  readonly isAsync: boolean;
}

export interface WhileNode extends NodeBase<"While"> {
  readonly test: PyNode;
  readonly body: readonly PyNode[];
  readonly orelse: readonly PyNode[];
}

export interface TryNode extends NodeBase<"Try"> {
  readonly body: readonly PyNode[];
  readonly handlers: readonly ExceptHandlerNode[];
  readonly orelse: readonly PyNode[];
  readonly finalbody: readonly PyNode[];
}

export interface ExceptHandlerNode extends NodeBase<"ExceptHandler"> {
  readonly type?: PyNode;
  readonly name?: string;
  readonly body: readonly PyNode[];
  readonly isGroup: boolean;
}

export interface WithNode extends NodeBase<"With"> {
  readonly items: readonly WithItemNode[];
  readonly body: readonly PyNode[];
  readonly isAsync: boolean;
}

export interface WithItemNode extends NodeBase<"WithItem"> {
  readonly context: PyNode;
  readonly alias?: PyNode;
}

export interface ReturnNode extends NodeBase<"Return"> {
  readonly value?: PyNode;
}

export interface AssignNode extends NodeBase<"Assign"> {
  /** `a = b = 1` yields two targets. */
  readonly targets: readonly PyNode[];
  readonly value?: PyNode;
  readonly annotation?: PyNode;
}

export interface AugAssignNode extends NodeBase<"AugAssign"> {
  readonly target: PyNode;
  /** Operator without the `=`, e.g. `+`. */
  readonly op: string;
  readonly value: PyNode;
}

export interface GlobalNode extends NodeBase<"Global"> {
  readonly names: readonly string[];
}

export interface NonlocalNode extends NodeBase<"Nonlocal"> {
  readonly names: readonly string[];
}

export interface AssertNode extends NodeBase<"Assert"> {
  readonly test: PyNode;
  readonly msg?: PyNode;
}

export interface RaiseNode extends NodeBase<"Raise"> {
  readonly exc?: PyNode;
  readonly cause?: PyNode;
}

export interface DeleteNode extends NodeBase<"Delete"> {
  readonly targets: readonly PyNode[];
}

export type PassNode = NodeBase<"Pass">;
export type BreakNode = NodeBase<"Break">;
export type ContinueNode = NodeBase<"Continue">;

export interface ImportAlias {
  readonly name: string;
  readonly asname?: string;
}

export interface ImportNode extends NodeBase<"Import"> {
  readonly names: readonly ImportAlias[];
}

export interface ImportFromNode extends NodeBase<"ImportFrom"> {
  readonly module: string;
  readonly names: readonly ImportAlias[];
  readonly wildcard: boolean;
}

export interface ExprStmtNode extends NodeBase<"ExprStmt"> {
  readonly value: PyNode;
}

export interface CallNode extends NodeBase<"Call"> {
  readonly func: PyNode;
  readonly args: readonly PyNode[];
  readonly keywords: readonly KeywordNode[];
}

export interface KeywordNode extends NodeBase<"Keyword"> {
  readonly arg: string;
  readonly value: PyNode;
}

export interface AttributeNode extends NodeBase<"Attribute"> {
  readonly value: PyNode;
  readonly attr: string;
}

export interface SubscriptNode extends NodeBase<"Subscript"> {
  readonly value: PyNode;
  readonly slice: PyNode;
}

export interface NameNode extends NodeBase<"Name"> {
  readonly id: string;
}

export interface StrNode extends NodeBase<"Str"> {
  /** Literal content without prefix and quotes; pieces are joined. */
  readonly value: string;
  readonly formatted: boolean;
  readonly bytes: boolean;
  readonly implicitConcat: boolean;
  readonly interpolations: readonly PyNode[];
}

export interface NumNode extends NodeBase<"Num"> {
  readonly value: string;
}

export type ConstantValue = "None" | "True" | "False" | "Ellipsis";

export interface ConstantNode extends NodeBase<"Constant"> {
  readonly value: ConstantValue;
}

export interface ListNode extends NodeBase<"List"> {
  readonly elts: readonly PyNode[];
}

export interface TupleNode extends NodeBase<"Tuple"> {
  readonly elts: readonly PyNode[];
}

export interface SetNode extends NodeBase<"Set"> {
  readonly elts: readonly PyNode[];
}

export type DictNode = NodeBase<"Dict">;

export type ComprehensionVariant = "list" | "set" | "dict" | "generator";

export interface ComprehensionNode extends NodeBase<"Comprehension"> {
  readonly variant: ComprehensionVariant;
  readonly element: PyNode;
  readonly generators: readonly CompForNode[];
}

export interface CompForNode extends NodeBase<"CompFor"> {
  readonly target: PyNode;
  readonly iter: PyNode;
  readonly ifs: readonly PyNode[];
  readonly isAsync: boolean;
}

export interface CompareNode extends NodeBase<"Compare"> {
  readonly left: PyNode;
  /** `is not` and `not in` are single entries. */
  readonly ops: readonly string[];
  readonly comparators: readonly PyNode[];
}

export interface BoolOpNode extends NodeBase<"BoolOp"> {
  readonly op: "and" | "or";
  readonly left: PyNode;
  readonly right: PyNode;
}

export interface BinOpNode extends NodeBase<"BinOp"> {
  readonly left: PyNode;
  readonly op: string;
  readonly right: PyNode;
}

export interface UnaryOpNode extends NodeBase<"UnaryOp"> {
  readonly op: string;
  readonly operand: PyNode;
}

export interface IfExpNode extends NodeBase<"IfExp"> {
  readonly body: PyNode;
  readonly test: PyNode;
  readonly orelse: PyNode;
}

export interface AwaitNode extends NodeBase<"Await"> {
  readonly value: PyNode;
}

export interface YieldNode extends NodeBase<"Yield"> {
  readonly value?: PyNode;
  readonly isFrom: boolean;
}

export interface StarredNode extends NodeBase<"Starred"> {
  readonly value: PyNode;
  readonly isDouble: boolean;
}

export interface NamedExprNode extends NodeBase<"NamedExpr"> {
  readonly target: PyNode;
  readonly value: PyNode;
}

/** Grammar constructs no rule looks into (match, slices, dict pairs, ...). */
export interface OtherNode extends NodeBase<"Other"> {
  readonly type: string;
}

export type PyNode =
  | ModuleNode
  | FunctionDefNode
  | ParamNode
  | LambdaNode
  | ClassDefNode
  | IfNode
  | ForNode
  | WhileNode
  | TryNode
  | ExceptHandlerNode
  | WithNode
  | WithItemNode
  | ReturnNode
  | AssignNode
  | AugAssignNode
  | GlobalNode
  | NonlocalNode
  | AssertNode
  | RaiseNode
  | DeleteNode
  | PassNode
  | BreakNode
  | ContinueNode
  | ImportNode
  | ImportFromNode
  | ExprStmtNode
  | CallNode
  | KeywordNode
  | AttributeNode
  | SubscriptNode
  | NameNode
  | StrNode
  | NumNode
  | ConstantNode
  | ListNode
  | TupleNode
  | SetNode
  | DictNode
  | ComprehensionNode
  | CompForNode
  | CompareNode
  | BoolOpNode
  | BinOpNode
  | UnaryOpNode
  | IfExpNode
  | AwaitNode
  | YieldNode
  | StarredNode
  | NamedExprNode
  | OtherNode;

export type NodeKind = PyNode["kind"];

export type NodeOfKind<K extends NodeKind> = Extract<PyNode, { kind: K }>;

export type DefinitionNode = FunctionDefNode | ClassDefNode;

export function isKind<K extends NodeKind>(
  node: PyNode,
  kinds: readonly K[],
): node is NodeOfKind<K> {
  const accepted: readonly NodeKind[] = kinds;
  return accepted.includes(node.kind);
}
