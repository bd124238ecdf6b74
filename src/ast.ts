import type { Literal, Token } from "./token.ts";

export type ExprType =
  | "Literal"
  | "Variable"
  | "Assign"
  | "Binary"
  | "Logical"
  | "Unary"
  | "Call"
  | "Get"
  | "Set"
  | "This"
  | "Super"
  | "Grouping";

export type StmtType =
  | "Expression"
  | "Print"
  | "Var"
  | "Block"
  | "If"
  | "While"
  | "Function"
  | "Return"
  | "Class";

export interface Node<T extends string> {
  readonly type: T;
}

export type Expr =
  | LiteralExpr
  | Variable
  | Assign
  | Binary
  | Logical
  | Unary
  | Call
  | Get
  | Set
  | This
  | Super
  | Grouping;

export interface LiteralExpr extends Node<"Literal"> {
  readonly value: Literal;
}

export interface Variable extends Node<"Variable"> {
  readonly name: Token;
}

export interface Assign extends Node<"Assign"> {
  readonly name: Token;
  readonly value: Expr;
}

export interface Binary extends Node<"Binary"> {
  readonly left: Expr;
  readonly operator: Token;
  readonly right: Expr;
}

export interface Logical extends Node<"Logical"> {
  readonly left: Expr;
  readonly operator: Token;
  readonly right: Expr;
}

export interface Unary extends Node<"Unary"> {
  readonly operator: Token;
  readonly right: Expr;
}

export interface Call extends Node<"Call"> {
  readonly callee: Expr;
  readonly paren: Token; // closing paren, for error locations
  readonly args: readonly Expr[];
}

export interface Get extends Node<"Get"> {
  readonly object: Expr;
  readonly name: Token;
}

export interface Set extends Node<"Set"> {
  readonly object: Expr;
  readonly name: Token;
  readonly value: Expr;
}

export interface This extends Node<"This"> {
  readonly keyword: Token;
}

export interface Super extends Node<"Super"> {
  readonly keyword: Token;
  readonly method: Token;
}

export interface Grouping extends Node<"Grouping"> {
  readonly expression: Expr;
}

export type Stmt =
  | ExpressionStmt
  | Print
  | Var
  | Block
  | If
  | While
  | FunctionStmt
  | Return
  | ClassStmt;

export interface ExpressionStmt extends Node<"Expression"> {
  readonly expression: Expr;
}

export interface Print extends Node<"Print"> {
  readonly expression: Expr;
}

export interface Var extends Node<"Var"> {
  readonly name: Token;
  readonly initializer: Expr | null;
}

export interface Block extends Node<"Block"> {
  readonly statements: readonly Stmt[];
}

export interface If extends Node<"If"> {
  readonly condition: Expr;
  readonly thenBranch: Stmt;
  readonly elseBranch: Stmt | null;
}

export interface While extends Node<"While"> {
  readonly condition: Expr;
  readonly body: Stmt;
}

export interface FunctionStmt extends Node<"Function"> {
  readonly name: Token;
  readonly params: readonly Token[];
  readonly body: readonly Stmt[];
}

export interface Return extends Node<"Return"> {
  readonly keyword: Token;
  readonly value: Expr | null;
}

export interface ClassStmt extends Node<"Class"> {
  readonly name: Token;
  readonly superclass: Variable | null;
  readonly methods: readonly FunctionStmt[];
}
