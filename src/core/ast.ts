// src/core/ast.ts
//
// Quill AST (Abstract Syntax Tree)
// --------------------------------
// Canonical tree produced by the parser and executed directly by the
// evaluator (there is no bytecode stage):
//
//   Lexer  -> tokens
//   Parser -> AST (this file)
//   Evaluator -> values
//
// Every construct is an expression: a block yields its last value, loops
// yield their result per the loop result law, declarations yield void.
//
// Nodes own their children and are never mutated after parsing; the same
// tree may be evaluated by many scopes at once.

export type Integer = number;

/* =========================================================
   Source locations
   ========================================================= */

export type Position = {
  /** Absolute offset from file start (0-based). */
  offset: Integer;
  /** Line index (0-based). */
  line: Integer;
  /** Column index (0-based). */
  column: Integer;
};

export type Range = {
  start: Position;
  end: Position;
};

export type SourceFile = {
  fileName: string;
  text: string;
};

export const UNKNOWN_POSITION: Position = Object.freeze({
  offset: 0,
  line: 0,
  column: 0,
});

export const UNKNOWN_RANGE: Range = Object.freeze({
  start: UNKNOWN_POSITION,
  end: UNKNOWN_POSITION,
});

export function sourceFile(text: string, fileName = "<eval>"): SourceFile {
  return { fileName, text };
}

/* =========================================================
   Node kinds
   ========================================================= */

export const NODE_KINDS = [
  // Program / blocks
  "Program",
  "BlockExpression",

  // Literals
  "IntLiteral",
  "RealLiteral",
  "StringLiteral",
  "CharLiteral",
  "BooleanLiteral",
  "NullLiteral",
  "VoidLiteral",
  "ListLiteral",

  // References / access
  "Identifier",
  "ThisExpression",
  "MemberExpression",
  "IndexExpression",
  "CallExpression",

  // Operators
  "UnaryExpression",
  "UpdateExpression",
  "BinaryExpression",
  "LogicalExpression",
  "RangeExpression",
  "TypeCheckExpression",
  "CastExpression",
  "AssignmentExpression",
  "PairExpression",

  // Functions
  "LambdaExpression",

  // Control flow
  "IfExpression",
  "WhenExpression",
  "WhileExpression",
  "DoWhileExpression",
  "ForInExpression",
  "BreakExpression",
  "ContinueExpression",
  "ReturnExpression",
  "ThrowExpression",
  "TryExpression",

  // Declarations
  "VariableDeclaration",
  "FunctionDeclaration",
  "ClassDeclaration",
  "EnumDeclaration",
  "InitBlock",
  "ImportDeclaration",
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type NodeBase = {
  kind: NodeKind;
  range: Range;
};

/* =========================================================
   Program / unions
   ========================================================= */

export type Program = NodeBase & {
  kind: "Program";
  fileName: string;
  /** From the `package a.b.c` header, if present. */
  packageName: string | null;
  body: Expression[];
};

export type Expression =
  | BlockExpression
  | Literal
  | Identifier
  | ThisExpression
  | MemberExpression
  | IndexExpression
  | CallExpression
  | UnaryExpression
  | UpdateExpression
  | BinaryExpression
  | LogicalExpression
  | RangeExpression
  | TypeCheckExpression
  | CastExpression
  | AssignmentExpression
  | PairExpression
  | LambdaExpression
  | IfExpression
  | WhenExpression
  | WhileExpression
  | DoWhileExpression
  | ForInExpression
  | BreakExpression
  | ContinueExpression
  | ReturnExpression
  | ThrowExpression
  | TryExpression
  | Declaration
  | ImportDeclaration;

export type Literal =
  | IntLiteral
  | RealLiteral
  | StringLiteral
  | CharLiteral
  | BooleanLiteral
  | NullLiteral
  | VoidLiteral
  | ListLiteral;

export type Declaration =
  | VariableDeclaration
  | FunctionDeclaration
  | ClassDeclaration
  | EnumDeclaration;

/* =========================================================
   Blocks
   ========================================================= */

export type BlockExpression = NodeBase & {
  kind: "BlockExpression";
  body: Expression[];
};

/* =========================================================
   Literals
   ========================================================= */

export type IntLiteral = NodeBase & {
  kind: "IntLiteral";
  value: bigint;
};

export type RealLiteral = NodeBase & {
  kind: "RealLiteral";
  value: number;
};

export type StringLiteral = NodeBase & {
  kind: "StringLiteral";
  value: string;
};

export type CharLiteral = NodeBase & {
  kind: "CharLiteral";
  value: string;
};

export type BooleanLiteral = NodeBase & {
  kind: "BooleanLiteral";
  value: boolean;
};

export type NullLiteral = NodeBase & {
  kind: "NullLiteral";
};

export type VoidLiteral = NodeBase & {
  kind: "VoidLiteral";
};

export type ListLiteral = NodeBase & {
  kind: "ListLiteral";
  elements: ListElement[];
};

export type ListElement =
  | { spread: false; value: Expression }
  | { spread: true; value: Expression };

/* =========================================================
   References / access
   ========================================================= */

export type Identifier = NodeBase & {
  kind: "Identifier";
  name: string;
};

export type ThisExpression = NodeBase & {
  kind: "ThisExpression";
};

export type MemberExpression = NodeBase & {
  kind: "MemberExpression";
  object: Expression;
  name: string;
  /** `a?.b` */
  nullSafe: boolean;
};

export type IndexExpression = NodeBase & {
  kind: "IndexExpression";
  object: Expression;
  indices: Expression[];
  /** `a?[i]` */
  nullSafe: boolean;
};

export type CallArgument =
  | { kind: "positional"; value: Expression; range: Range }
  | { kind: "named"; name: string; value: Expression; range: Range }
  | { kind: "spread"; value: Expression; range: Range };

export type CallExpression = NodeBase & {
  kind: "CallExpression";
  callee: Expression;
  args: CallArgument[];
  /** `f(x) { ... }` or `f { ... }` */
  trailingLambda: LambdaExpression | null;
  /** `f?(x)` */
  nullSafe: boolean;
};

/* =========================================================
   Operators
   ========================================================= */

export type UnaryOperator = "-" | "+" | "!" | "~";

export type UnaryExpression = NodeBase & {
  kind: "UnaryExpression";
  operator: UnaryOperator;
  operand: Expression;
};

export type UpdateExpression = NodeBase & {
  kind: "UpdateExpression";
  operator: "++" | "--";
  prefix: boolean;
  target: Expression;
};

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "==="
  | "!=="
  | "<"
  | "<="
  | ">"
  | ">="
  | "<=>"
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>"
  | "in"
  | "!in";

export type BinaryExpression = NodeBase & {
  kind: "BinaryExpression";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
};

export type LogicalExpression = NodeBase & {
  kind: "LogicalExpression";
  /** `?:` is elvis (also spelled `??`). */
  operator: "&&" | "||" | "?:";
  left: Expression;
  right: Expression;
};

export type RangeExpression = NodeBase & {
  kind: "RangeExpression";
  start: Expression | null;
  end: Expression | null;
  inclusive: boolean;
};

export type TypeCheckExpression = NodeBase & {
  kind: "TypeCheckExpression";
  negated: boolean;
  value: Expression;
  type: Expression;
};

export type CastExpression = NodeBase & {
  kind: "CastExpression";
  /** `as?` yields null instead of raising. */
  safe: boolean;
  value: Expression;
  type: Expression;
};

export type AssignmentOperator = "=" | "+=" | "-=" | "*=" | "/=" | "%=";

export type AssignmentExpression = NodeBase & {
  kind: "AssignmentExpression";
  operator: AssignmentOperator;
  target: Expression;
  value: Expression;
};

/** `key => value`, builds a map entry. */
export type PairExpression = NodeBase & {
  kind: "PairExpression";
  key: Expression;
  value: Expression;
};

/* =========================================================
   Types / annotations (metadata only)
   ========================================================= */

export type TypeRef = {
  name: string;
  nullable: boolean;
  args: TypeRef[];
  range: Range;
};

export type Annotation = {
  name: string;
  range: Range;
};

export type Visibility = "public" | "protected" | "private";

/* =========================================================
   Functions
   ========================================================= */

export type Parameter = {
  name: string;
  range: Range;
  type: TypeRef | null;
  defaultValue: Expression | null;
  /** `rest...` */
  variadic: boolean;
  /** Constructor header only: `val x` / `var x` / plain `x`. */
  fieldKind: "val" | "var" | null;
  visibility: Visibility;
  annotations: Annotation[];
  transient: boolean;
};

export type LambdaExpression = NodeBase & {
  kind: "LambdaExpression";
  /** null when the lambda declares no parameter list (implicit `it`). */
  params: Parameter[] | null;
  body: BlockExpression;
  label: string | null;
  /** True when the body creates no closures, so the call frame may be recycled. */
  poolable: boolean;
};

/* =========================================================
   Control flow
   ========================================================= */

export type IfExpression = NodeBase & {
  kind: "IfExpression";
  test: Expression;
  consequent: Expression;
  alternate: Expression | null;
};

export type WhenCondition =
  | { kind: "value"; value: Expression }
  | { kind: "in"; negated: boolean; value: Expression }
  | { kind: "is"; negated: boolean; type: Expression };

export type WhenBranch = {
  conditions: WhenCondition[];
  body: Expression;
  range: Range;
};

export type WhenExpression = NodeBase & {
  kind: "WhenExpression";
  subject: Expression | null;
  branches: WhenBranch[];
  elseBranch: Expression | null;
};

export type WhileExpression = NodeBase & {
  kind: "WhileExpression";
  label: string | null;
  test: Expression;
  body: Expression;
  elseBody: Expression | null;
};

export type DoWhileExpression = NodeBase & {
  kind: "DoWhileExpression";
  label: string | null;
  body: Expression;
  test: Expression;
  elseBody: Expression | null;
};

export type ForInExpression = NodeBase & {
  kind: "ForInExpression";
  label: string | null;
  variable: string;
  iterable: Expression;
  body: Expression;
  elseBody: Expression | null;
};

export type BreakExpression = NodeBase & {
  kind: "BreakExpression";
  label: string | null;
  value: Expression | null;
};

export type ContinueExpression = NodeBase & {
  kind: "ContinueExpression";
  label: string | null;
};

export type ReturnExpression = NodeBase & {
  kind: "ReturnExpression";
  label: string | null;
  value: Expression | null;
};

export type ThrowExpression = NodeBase & {
  kind: "ThrowExpression";
  value: Expression;
};

export type CatchClause = {
  /** null for `catch { ... }` (binds `it`). */
  name: string | null;
  /** Empty list catches everything. */
  types: Expression[];
  body: BlockExpression;
  range: Range;
};

export type TryExpression = NodeBase & {
  kind: "TryExpression";
  body: BlockExpression;
  catches: CatchClause[];
  finalizer: BlockExpression | null;
};

/* =========================================================
   Declarations
   ========================================================= */

export type Modifiers = {
  visibility: Visibility;
  isStatic: boolean;
  isOverride: boolean;
  isAbstract: boolean;
  annotations: Annotation[];
};

export type Accessor = {
  /** Setter parameter name; null for getters. */
  param: string | null;
  body: Expression;
  range: Range;
};

export type VariableDeclaration = NodeBase & {
  kind: "VariableDeclaration";
  mutable: boolean;
  name: string;
  nameRange: Range;
  type: TypeRef | null;
  initializer: Expression | null;
  /** `val x by expr` */
  delegate: Expression | null;
  getter: Accessor | null;
  setter: Accessor | null;
  setterVisibility: Visibility | null;
  modifiers: Modifiers;
  transient: boolean;
};

export type FunctionDeclaration = NodeBase & {
  kind: "FunctionDeclaration";
  name: string;
  nameRange: Range;
  params: Parameter[];
  returnType: TypeRef | null;
  /** null for abstract or delegated functions. */
  body: Expression | null;
  /** `fun f(x) = expr` */
  expressionBody: boolean;
  /** `fun f by expr` */
  delegate: Expression | null;
  modifiers: Modifiers;
  poolable: boolean;
};

export type BaseSpecifier = {
  type: Expression;
  args: CallArgument[] | null;
  range: Range;
};

export type ClassMember = VariableDeclaration | FunctionDeclaration | ClassDeclaration | EnumDeclaration | InitBlock;

export type InitBlock = NodeBase & {
  kind: "InitBlock";
  body: BlockExpression;
};

export type ClassDeclaration = NodeBase & {
  kind: "ClassDeclaration";
  name: string;
  nameRange: Range;
  /** `object Name { }` declares a singleton. */
  isObject: boolean;
  /** null when the class has no constructor header. */
  constructorParams: Parameter[] | null;
  bases: BaseSpecifier[];
  members: ClassMember[];
  modifiers: Modifiers;
};

export type EnumEntryDeclaration = {
  name: string;
  range: Range;
};

export type EnumDeclaration = NodeBase & {
  kind: "EnumDeclaration";
  name: string;
  nameRange: Range;
  entries: EnumEntryDeclaration[];
  modifiers: Modifiers;
};

export type ImportDeclaration = NodeBase & {
  kind: "ImportDeclaration";
  packageName: string;
  /** `import a.b.{x, y}`; null imports every public binding. */
  symbols: string[] | null;
};

/* =========================================================
   Helpers
   ========================================================= */

export function defaultModifiers(): Modifiers {
  return { visibility: "public", isStatic: false, isOverride: false, isAbstract: false, annotations: [] };
}

export function hasAnnotation(list: Annotation[], name: string): boolean {
  return list.some((a) => a.name === name);
}
