import type {
  Expr,
  FunctionStmt,
  Stmt,
  Variable,
} from "./ast.ts";
import { isStackOverflow, ParseError } from "./errors.ts";
import type { ErrorReporter } from "./reporter.ts";
import { type Token, TokenType } from "./token.ts";

const MAX_ARGS = 255;

type FunctionKind = "none" | "function" | "method" | "initializer";
type ClassKind = "none" | "class" | "subclass";

/**Parser */
export class Parser {
  private pos = 0;
  private functionKind: FunctionKind = "none";
  private classKind: ClassKind = "none";

  constructor(
    private tokens: readonly Token[],
    private reporter: ErrorReporter,
  ) {}

  public parse = (): Stmt[] => {
    const statements: Stmt[] = [];
    while (!this.atEnd()) {
      try {
        const stmt = this.declaration();
        if (stmt) statements.push(stmt);
      } catch (e) {
        if (!isStackOverflow(e)) throw e;
        this.error(this.peek(), "Too much nesting.");
        this.synchronize();
      }
    }
    return statements;
  };

  private declaration = (): Stmt | null => {
    try {
      if (this.match(TokenType.CLASS)) return this.classDeclaration();
      if (this.match(TokenType.FUN)) return this.func("function");
      if (this.match(TokenType.VAR)) return this.varDeclaration();
      return this.statement();
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      this.synchronize();
      return null;
    }
  };

  private classDeclaration = (): Stmt => {
    const name = this.consume(TokenType.IDENTIFIER, "Expect class name.");

    let superclass: Variable | null = null;
    if (this.match(TokenType.LESS)) {
      const superName = this.consume(
        TokenType.IDENTIFIER,
        "Expect superclass name.",
      );
      if (superName.lexeme === name.lexeme) {
        this.error(superName, "A class can't inherit from itself.");
      }
      superclass = { type: "Variable", name: superName };
    }

    this.consume(TokenType.LEFT_BRACE, "Expect '{' before class body.");

    const enclosingClass = this.classKind;
    this.classKind = superclass ? "subclass" : "class";
    const methods: FunctionStmt[] = [];
    try {
      while (!this.check(TokenType.RIGHT_BRACE) && !this.atEnd()) {
        methods.push(this.func("method"));
      }
    } finally {
      this.classKind = enclosingClass;
    }

    this.consume(TokenType.RIGHT_BRACE, "Expect '}' after class body.");
    return { type: "Class", name, superclass, methods };
  };

  private func = (kind: "function" | "method"): FunctionStmt => {
    const name = this.consume(TokenType.IDENTIFIER, `Expect ${kind} name.`);
    this.consume(TokenType.LEFT_PAREN, `Expect '(' after ${kind} name.`);

    const params: Token[] = [];
    if (!this.check(TokenType.RIGHT_PAREN)) {
      do {
        if (params.length >= MAX_ARGS) {
          this.error(
            this.peek(),
            `Can't have more than ${MAX_ARGS} parameters.`,
          );
        }
        params.push(
          this.consume(TokenType.IDENTIFIER, "Expect parameter name."),
        );
      } while (this.match(TokenType.COMMA));
    }
    this.consume(TokenType.RIGHT_PAREN, "Expect ')' after parameters.");
    this.consume(TokenType.LEFT_BRACE, `Expect '{' before ${kind} body.`);

    const enclosingFunction = this.functionKind;
    this.functionKind = kind === "method" && name.lexeme === "init"
      ? "initializer"
      : kind;
    try {
      const body = this.block();
      return { type: "Function", name, params, body };
    } finally {
      this.functionKind = enclosingFunction;
    }
  };

  private varDeclaration = (): Stmt => {
    const name = this.consume(TokenType.IDENTIFIER, "Expect variable name.");
    const initializer = this.match(TokenType.EQUAL) ? this.expression() : null;
    this.consume(
      TokenType.SEMICOLON,
      "Expect ';' after variable declaration.",
    );
    return { type: "Var", name, initializer };
  };

  private statement = (): Stmt => {
    if (this.match(TokenType.FOR)) return this.forStatement();
    if (this.match(TokenType.IF)) return this.ifStatement();
    if (this.match(TokenType.PRINT)) return this.printStatement();
    if (this.match(TokenType.RETURN)) return this.returnStatement();
    if (this.match(TokenType.WHILE)) return this.whileStatement();
    if (this.match(TokenType.LEFT_BRACE)) {
      return { type: "Block", statements: this.block() };
    }
    return this.expressionStatement();
  };

  // desugared into a while loop wrapped in a block
  private forStatement = (): Stmt => {
    this.consume(TokenType.LEFT_PAREN, "Expect '(' after 'for'.");

    let initializer: Stmt | null;
    if (this.match(TokenType.SEMICOLON)) initializer = null;
    else if (this.match(TokenType.VAR)) initializer = this.varDeclaration();
    else initializer = this.expressionStatement();

    const condition: Expr = this.check(TokenType.SEMICOLON)
      ? { type: "Literal", value: true }
      : this.expression();
    this.consume(TokenType.SEMICOLON, "Expect ';' after loop condition.");

    const increment = this.check(TokenType.RIGHT_PAREN)
      ? null
      : this.expression();
    this.consume(TokenType.RIGHT_PAREN, "Expect ')' after for clauses.");

    let body = this.statement();
    if (increment) {
      body = {
        type: "Block",
        statements: [body, { type: "Expression", expression: increment }],
      };
    }
    body = { type: "While", condition, body };
    if (initializer) {
      body = { type: "Block", statements: [initializer, body] };
    }
    return body;
  };

  private ifStatement = (): Stmt => {
    this.consume(TokenType.LEFT_PAREN, "Expect '(' after 'if'.");
    const condition = this.expression();
    this.consume(TokenType.RIGHT_PAREN, "Expect ')' after if condition.");

    const thenBranch = this.statement();
    const elseBranch = this.match(TokenType.ELSE) ? this.statement() : null;
    return { type: "If", condition, thenBranch, elseBranch };
  };

  private printStatement = (): Stmt => {
    const expression = this.expression();
    this.consume(TokenType.SEMICOLON, "Expect ';' after value.");
    return { type: "Print", expression };
  };

  private returnStatement = (): Stmt => {
    const keyword = this.previous();
    if (this.functionKind === "none") {
      this.error(keyword, "Can't return from top-level code.");
    }

    let value: Expr | null = null;
    if (!this.check(TokenType.SEMICOLON)) {
      if (this.functionKind === "initializer") {
        this.error(keyword, "Can't return a value from an initializer.");
      }
      value = this.expression();
    }
    this.consume(TokenType.SEMICOLON, "Expect ';' after return value.");
    return { type: "Return", keyword, value };
  };

  private whileStatement = (): Stmt => {
    this.consume(TokenType.LEFT_PAREN, "Expect '(' after 'while'.");
    const condition = this.expression();
    this.consume(TokenType.RIGHT_PAREN, "Expect ')' after condition.");
    const body = this.statement();
    return { type: "While", condition, body };
  };

  private block = (): Stmt[] => {
    const statements: Stmt[] = [];
    while (!this.check(TokenType.RIGHT_BRACE) && !this.atEnd()) {
      const stmt = this.declaration();
      if (stmt) statements.push(stmt);
    }
    this.consume(TokenType.RIGHT_BRACE, "Expect '}' after block.");
    return statements;
  };

  private expressionStatement = (): Stmt => {
    const expression = this.expression();
    this.consume(TokenType.SEMICOLON, "Expect ';' after expression.");
    return { type: "Expression", expression };
  };

  private expression = (): Expr => this.assignment();

  private assignment = (): Expr => {
    const expr = this.or();

    if (this.match(TokenType.EQUAL)) {
      const equals = this.previous();
      const value = this.assignment();

      if (expr.type === "Variable") {
        return { type: "Assign", name: expr.name, value };
      }
      if (expr.type === "Get") {
        return { type: "Set", object: expr.object, name: expr.name, value };
      }
      // reported without synchronizing: the parser is not confused
      this.error(equals, "Invalid assignment target.");
    }
    return expr;
  };

  private or = (): Expr => {
    let left = this.and();
    while (this.match(TokenType.OR)) {
      const operator = this.previous();
      const right = this.and();
      left = { type: "Logical", left, operator, right };
    }
    return left;
  };

  private and = (): Expr => {
    let left = this.equality();
    while (this.match(TokenType.AND)) {
      const operator = this.previous();
      const right = this.equality();
      left = { type: "Logical", left, operator, right };
    }
    return left;
  };

  private binary = (
    operand: () => Expr,
    ...operators: TokenType[]
  ): Expr => {
    let left = operand();
    while (this.match(...operators)) {
      const operator = this.previous();
      const right = operand();
      left = { type: "Binary", left, operator, right };
    }
    return left;
  };

  private equality = (): Expr =>
    this.binary(
      this.comparison,
      TokenType.BANG_EQUAL,
      TokenType.EQUAL_EQUAL,
    );

  private comparison = (): Expr =>
    this.binary(
      this.term,
      TokenType.GREATER,
      TokenType.GREATER_EQUAL,
      TokenType.LESS,
      TokenType.LESS_EQUAL,
    );

  private term = (): Expr =>
    this.binary(this.factor, TokenType.MINUS, TokenType.PLUS);

  private factor = (): Expr =>
    this.binary(this.unary, TokenType.SLASH, TokenType.STAR);

  private unary = (): Expr => {
    if (this.match(TokenType.BANG, TokenType.MINUS)) {
      const operator = this.previous();
      const right = this.unary();
      return { type: "Unary", operator, right };
    }
    return this.call();
  };

  private call = (): Expr => {
    let expr = this.primary();
    while (true) {
      if (this.match(TokenType.LEFT_PAREN)) {
        expr = this.finishCall(expr);
      } else if (this.match(TokenType.DOT)) {
        const name = this.consume(
          TokenType.IDENTIFIER,
          "Expect property name after '.'.",
        );
        expr = { type: "Get", object: expr, name };
      } else {
        break;
      }
    }
    return expr;
  };

  private finishCall = (callee: Expr): Expr => {
    const args: Expr[] = [];
    if (!this.check(TokenType.RIGHT_PAREN)) {
      do {
        if (args.length >= MAX_ARGS) {
          this.error(this.peek(), `Can't have more than ${MAX_ARGS} arguments.`);
        }
        args.push(this.expression());
      } while (this.match(TokenType.COMMA));
    }
    const paren = this.consume(
      TokenType.RIGHT_PAREN,
      "Expect ')' after arguments.",
    );
    return { type: "Call", callee, paren, args };
  };

  private primary = (): Expr => {
    if (this.match(TokenType.FALSE)) return { type: "Literal", value: false };
    if (this.match(TokenType.TRUE)) return { type: "Literal", value: true };
    if (this.match(TokenType.NIL)) return { type: "Literal", value: null };

    if (this.match(TokenType.NUMBER, TokenType.STRING)) {
      return { type: "Literal", value: this.previous().literal };
    }

    if (this.match(TokenType.SUPER)) {
      const keyword = this.previous();
      if (this.classKind === "none") {
        this.error(keyword, "Can't use 'super' outside of a class.");
      } else if (this.classKind === "class") {
        this.error(
          keyword,
          "Can't use 'super' in a class with no superclass.",
        );
      }
      this.consume(TokenType.DOT, "Expect '.' after 'super'.");
      const method = this.consume(
        TokenType.IDENTIFIER,
        "Expect superclass method name.",
      );
      return { type: "Super", keyword, method };
    }

    if (this.match(TokenType.THIS)) {
      const keyword = this.previous();
      if (this.classKind === "none") {
        this.error(keyword, "Can't use 'this' outside of a class.");
      }
      return { type: "This", keyword };
    }

    if (this.match(TokenType.IDENTIFIER)) {
      return { type: "Variable", name: this.previous() };
    }

    if (this.match(TokenType.LEFT_PAREN)) {
      const expression = this.expression();
      this.consume(TokenType.RIGHT_PAREN, "Expect ')' after expression.");
      return { type: "Grouping", expression };
    }

    throw this.error(this.peek(), "Expect expression.");
  };

  private match = (...types: TokenType[]): boolean => {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  };

  private consume = (type: TokenType, message: string): Token => {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), message);
  };

  private check = (type: TokenType): boolean =>
    !this.atEnd() && this.peek().type === type;

  private advance = (): Token => {
    if (!this.atEnd()) this.pos++;
    return this.previous();
  };

  private atEnd = (): boolean => this.peek().type === TokenType.EOF;

  private peek = (): Token => this.tokens[this.pos];

  private previous = (): Token => this.tokens[this.pos - 1];

  // reports and hands back the error; callers throw it only to unwind
  private error = (token: Token, message: string): ParseError => {
    const error = new ParseError(token, message);
    this.reporter.parseError(error);
    return error;
  };

  private synchronize = (): void => {
    this.advance();
    while (!this.atEnd()) {
      if (this.previous().type === TokenType.SEMICOLON) return;
      switch (this.peek().type) {
        case TokenType.CLASS:
        case TokenType.FUN:
        case TokenType.VAR:
        case TokenType.FOR:
        case TokenType.IF:
        case TokenType.WHILE:
        case TokenType.PRINT:
        case TokenType.RETURN:
          return;
      }
      this.advance();
    }
  };
}

export const parse = (
  tokens: readonly Token[],
  reporter: ErrorReporter,
): Stmt[] => new Parser(tokens, reporter).parse();
