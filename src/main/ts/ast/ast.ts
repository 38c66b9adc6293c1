import { Span } from "../common/span.js";

/**
 * Every node carries an id unique within its program. The checker keys its
 * annotations by id, so the tree itself stays untouched after parsing.
 */
export interface Node {
  id: number;
  span: Span;
}

export type Statement =
  | FnDecl
  | VarDecl
  | AssignStmt
  | ExpressionStmt
  | PrintStmt
  | WhileStmt
  | IfStmt
  | BlockStmt
  | WithStmt
  | RawStmt;

export type Expression =
  | IntLiteralExpr
  | StringLiteralExpr
  | IdentifierExpr
  | UnaryExpr
  | BinaryExpr
  | CallExpr;

export type DeclaredType = "int" | "untyped";

export type ArithmeticOperator = "+" | "-" | "*" | "/";
export type ComparisonOperator = "<" | ">" | "<=" | ">=" | "==" | "!=";
export type BinaryOperator = ArithmeticOperator | ComparisonOperator;

export type ConditionMode = "int" | "str";

export type TargetName = "shell" | "batch";

export interface Program extends Node {
  kind: "Program";
  statements: Statement[];
}

// --- Statements ---

/**
 * Example: `fn add(int x, y) { print(x + 1, y); }`
 */
export interface FnDecl extends Node {
  kind: "FnDecl";
  name: string;
  params: Param[];
  body: BlockStmt;
}

export interface Param extends Node {
  kind: "Param";
  name: string;
  declaredType: DeclaredType;
}

/**
 * Example: `let int x = 10;`, `let str name = "a";`, `let name = "a";`
 */
export interface VarDecl extends Node {
  kind: "VarDecl";
  declaredType: DeclaredType;
  name: string;
  initializer: Expression;
}

/**
 * Example: `x = x + 1;`
 */
export interface AssignStmt extends Node {
  kind: "AssignStmt";
  name: string;
  value: Expression;
}

/**
 * Example: `add(1, 2);`
 */
export interface ExpressionStmt extends Node {
  kind: "ExpressionStmt";
  expression: Expression;
}

/**
 * Example: `print("Result: ", result);`
 */
export interface PrintStmt extends Node {
  kind: "PrintStmt";
  args: Expression[];
}

/**
 * The `int(...)` / `str(...)` marker around a `while` or `if` test.
 */
export interface Condition extends Node {
  kind: "Condition";
  mode: ConditionMode;
  expression: Expression;
}

export interface WhileStmt extends Node {
  kind: "WhileStmt";
  condition: Condition;
  body: BlockStmt;
}

export interface IfStmt extends Node {
  kind: "IfStmt";
  condition: Condition;
  thenBranch: BlockStmt;
  elseBranch?: IfStmt | BlockStmt;
}

export interface BlockStmt extends Node {
  kind: "BlockStmt";
  statements: Statement[];
}

/**
 * Example: `with batch { |> "dir /b"; }`
 */
export interface WithStmt extends Node {
  kind: "WithStmt";
  target: TargetName;
  body: BlockStmt;
}

/**
 * Example: `|> "ls -la";`
 */
export interface RawStmt extends Node {
  kind: "RawStmt";
  text: string;
}

// --- Expressions ---

export interface IntLiteralExpr extends Node {
  kind: "IntLiteralExpr";
  value: number;
}

export interface StringLiteralExpr extends Node {
  kind: "StringLiteralExpr";
  value: string;
  /** Source text between the quotes, escapes included. */
  raw: string;
}

export interface IdentifierExpr extends Node {
  kind: "IdentifierExpr";
  name: string;
}

export interface UnaryExpr extends Node {
  kind: "UnaryExpr";
  operator: "-";
  operand: Expression;
}

export interface BinaryExpr extends Node {
  kind: "BinaryExpr";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface CallExpr extends Node {
  kind: "CallExpr";
  callee: string;
  args: Expression[];
}

export function isComparison(
  operator: BinaryOperator
): operator is ComparisonOperator {
  return (
    operator === "<" ||
    operator === ">" ||
    operator === "<=" ||
    operator === ">=" ||
    operator === "==" ||
    operator === "!="
  );
}
