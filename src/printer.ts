import type { Expr, FunctionStmt, Stmt } from "./ast.ts";

const INDENT = "  ";

/** Renders the AST as parenthesized prefix expressions, for debugging */
export class AstPrinter {
  public print = (statements: readonly Stmt[]): string =>
    statements.map((stmt) => this.stmt(stmt, 0)).join("\n");

  public expr = (expr: Expr): string => {
    switch (expr.type) {
      case "Literal": {
        if (expr.value === null) return "nil";
        if (typeof expr.value === "string") return `"${expr.value}"`;
        return String(expr.value);
      }
      case "Variable":
        return expr.name.lexeme;
      case "Assign":
        return this.parenthesize("=", expr.name.lexeme, expr.value);
      case "Binary":
      case "Logical":
        return this.parenthesize(expr.operator.lexeme, expr.left, expr.right);
      case "Unary":
        return this.parenthesize(expr.operator.lexeme, expr.right);
      case "Call":
        return this.parenthesize("call", expr.callee, ...expr.args);
      case "Get":
        return this.parenthesize(".", expr.object, expr.name.lexeme);
      case "Set":
        return this.parenthesize(
          "=",
          this.parenthesize(".", expr.object, expr.name.lexeme),
          expr.value,
        );
      case "This":
        return "this";
      case "Super":
        return this.parenthesize("super", expr.method.lexeme);
      case "Grouping":
        return this.parenthesize("group", expr.expression);
    }
  };

  private stmt = (stmt: Stmt, depth: number): string => {
    const pad = INDENT.repeat(depth);
    switch (stmt.type) {
      case "Expression":
        return `${pad}${this.expr(stmt.expression)};`;
      case "Print":
        return `${pad}print ${this.expr(stmt.expression)};`;
      case "Var":
        return stmt.initializer
          ? `${pad}var ${stmt.name.lexeme} = ${this.expr(stmt.initializer)};`
          : `${pad}var ${stmt.name.lexeme};`;
      case "Block":
        return `${pad}${this.block(stmt.statements, depth)}`;
      case "If": {
        const head = `${pad}if ${this.expr(stmt.condition)}\n${
          this.stmt(stmt.thenBranch, depth + 1)
        }`;
        return stmt.elseBranch
          ? `${head}\n${pad}else\n${this.stmt(stmt.elseBranch, depth + 1)}`
          : head;
      }
      case "While":
        return `${pad}while ${this.expr(stmt.condition)}\n${
          this.stmt(stmt.body, depth + 1)
        }`;
      case "Function":
        return `${pad}fun ${this.signature(stmt, depth)}`;
      case "Return":
        return stmt.value
          ? `${pad}return ${this.expr(stmt.value)};`
          : `${pad}return;`;
      case "Class": {
        const superclass = stmt.superclass
          ? ` < ${stmt.superclass.name.lexeme}`
          : "";
        const methods = stmt.methods.map((method) =>
          `${INDENT.repeat(depth + 1)}${this.signature(method, depth + 1)}`
        );
        return [`${pad}class ${stmt.name.lexeme}${superclass} {`, ...methods, `${pad}}`]
          .join("\n");
      }
    }
  };

  private signature = (fn: FunctionStmt, depth: number): string => {
    const params = fn.params.map((param) => param.lexeme).join(", ");
    return `${fn.name.lexeme}(${params}) ${this.block(fn.body, depth)}`;
  };

  // the opening brace goes on the caller's line
  private block = (statements: readonly Stmt[], depth: number): string => {
    if (statements.length === 0) return "{}";
    const body = statements.map((stmt) => this.stmt(stmt, depth + 1));
    return ["{", ...body, `${INDENT.repeat(depth)}}`].join("\n");
  };

  private parenthesize = (
    name: string,
    ...parts: (Expr | string)[]
  ): string => {
    const rendered = parts.map((part) =>
      typeof part === "string" ? part : this.expr(part)
    );
    return `(${[name, ...rendered].join(" ")})`;
  };
}
