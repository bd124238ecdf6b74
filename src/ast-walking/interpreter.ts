import type {
  Binary,
  Call,
  ClassStmt,
  Expr,
  Get,
  Stmt,
  Super,
  Unary,
} from "../ast.ts";
import { isStackOverflow, RuntimeError } from "../errors.ts";
import type { ErrorReporter } from "../reporter.ts";
import { type Token, TokenType } from "../token.ts";
import { nativeFuncs } from "./core.ts";
import { Environment } from "./environment.ts";
import {
  arity,
  type Callable,
  findMethod,
  isCallable,
  isClass,
  isEqual,
  isInstance,
  isTruthy,
  type LoxClass,
  type LoxFunction,
  type LoxInstance,
  type NativeFunction,
  stringify,
  type Value,
} from "./values.ts";

// the token an error raised by the host is reported at
const locate = (expr: Expr): Token | null => {
  switch (expr.type) {
    case "Variable":
    case "Assign":
    case "Get":
    case "Set":
      return expr.name;
    case "Binary":
    case "Logical":
    case "Unary":
      return expr.operator;
    case "Call":
      return expr.paren;
    case "This":
    case "Super":
      return expr.keyword;
    case "Literal":
    case "Grouping":
      return null;
  }
};

/** How a statement finished; `return` unwinds to the nearest call */
export type Completion =
  | { type: "Normal" }
  | { type: "Return"; value: Value };

const NORMAL: Completion = { type: "Normal" };

export interface InterpreterOptions {
  /** Receives one line per `print` */
  out?: (line: string) => void;
  natives?: Record<string, NativeFunction>;
}

/**Interpreter */
export class Interpreter {
  public readonly globals = new Environment();
  private environment: Environment = this.globals;
  private location: Token | null = null;
  private out: (line: string) => void;

  constructor(private reporter: ErrorReporter, options: InterpreterOptions = {}) {
    this.out = options.out ?? ((line) => process.stdout.write(`${line}\n`));
    for (const [name, nf] of Object.entries(options.natives ?? nativeFuncs)) {
      this.globals.define(name, nf);
    }
  }

  public interpret = (statements: readonly Stmt[]): void => {
    this.location = null;
    try {
      for (const stmt of statements) this.execute(stmt);
    } catch (e) {
      this.environment = this.globals;
      this.reporter.runtimeError(this.runtimeError(e));
    }
  };

  // host errors outside any call are reported at the last expression reached
  private runtimeError = (e: unknown): RuntimeError => {
    if (e instanceof RuntimeError) return e;
    if (!(e instanceof RangeError) || !this.location) throw e;
    return new RuntimeError(
      this.location,
      isStackOverflow(e) ? "Stack overflow." : `${e.message}.`,
    );
  };

  private execute = (stmt: Stmt): Completion => {
    switch (stmt.type) {
      case "Expression": {
        this.evaluate(stmt.expression);
        return NORMAL;
      }
      case "Print": {
        this.out(stringify(this.evaluate(stmt.expression)));
        return NORMAL;
      }
      case "Var": {
        const value = stmt.initializer ? this.evaluate(stmt.initializer) : null;
        this.environment.define(stmt.name.lexeme, value);
        return NORMAL;
      }
      case "Block": {
        return this.executeBlock(
          stmt.statements,
          new Environment(this.environment),
        );
      }
      case "If": {
        if (isTruthy(this.evaluate(stmt.condition))) {
          return this.execute(stmt.thenBranch);
        }
        if (stmt.elseBranch) return this.execute(stmt.elseBranch);
        return NORMAL;
      }
      case "While": {
        while (isTruthy(this.evaluate(stmt.condition))) {
          const completion = this.execute(stmt.body);
          if (completion.type === "Return") return completion;
        }
        return NORMAL;
      }
      case "Function": {
        const fn: LoxFunction = {
          type: "LoxFunction",
          declaration: stmt,
          closure: this.environment,
          isInitializer: false,
        };
        this.environment.define(stmt.name.lexeme, fn);
        return NORMAL;
      }
      case "Return": {
        const value = stmt.value ? this.evaluate(stmt.value) : null;
        return { type: "Return", value };
      }
      case "Class": {
        this.declareClass(stmt);
        return NORMAL;
      }
    }
  };

  public executeBlock = (
    statements: readonly Stmt[],
    environment: Environment,
  ): Completion => {
    const previous = this.environment;
    this.environment = environment;
    try {
      for (const stmt of statements) {
        const completion = this.execute(stmt);
        if (completion.type === "Return") return completion;
      }
      return NORMAL;
    } finally {
      this.environment = previous;
    }
  };

  private declareClass = (stmt: ClassStmt): void => {
    let superclass: LoxClass | null = null;
    if (stmt.superclass) {
      const value = this.evaluate(stmt.superclass);
      if (!isClass(value)) {
        throw new RuntimeError(
          stmt.superclass.name,
          "Superclass must be a class.",
        );
      }
      superclass = value;
    }

    this.environment.define(stmt.name.lexeme, null);

    // methods see `super` one scope above their `this` binding
    let closure = this.environment;
    if (superclass) {
      closure = new Environment(this.environment);
      closure.define("super", superclass);
    }

    const methods = new Map<string, LoxFunction>();
    for (const method of stmt.methods) {
      methods.set(method.name.lexeme, {
        type: "LoxFunction",
        declaration: method,
        closure,
        isInitializer: method.name.lexeme === "init",
      });
    }

    const klass: LoxClass = {
      type: "LoxClass",
      name: stmt.name.lexeme,
      superclass,
      methods,
    };
    this.environment.assign(stmt.name, klass);
  };

  private evaluate = (expr: Expr): Value => {
    this.location = locate(expr) ?? this.location;
    switch (expr.type) {
      case "Literal":
        return expr.value;
      case "Grouping":
        return this.evaluate(expr.expression);
      case "Variable":
        return this.environment.get(expr.name);
      case "Assign": {
        const value = this.evaluate(expr.value);
        this.environment.assign(expr.name, value);
        return value;
      }
      case "Logical": {
        const left = this.evaluate(expr.left);
        if (expr.operator.type === TokenType.OR) {
          if (isTruthy(left)) return left;
        } else if (!isTruthy(left)) {
          return left;
        }
        return this.evaluate(expr.right);
      }
      case "Unary":
        return this.unary(expr);
      case "Binary":
        return this.binary(expr);
      case "Call":
        return this.call(expr);
      case "Get":
        return this.getProperty(expr);
      case "Set": {
        const object = this.evaluate(expr.object);
        if (!isInstance(object)) {
          throw new RuntimeError(expr.name, "Only instances have fields.");
        }
        const value = this.evaluate(expr.value);
        object.fields.set(expr.name.lexeme, value);
        return value;
      }
      case "This":
        return this.environment.get(expr.keyword);
      case "Super":
        return this.superMethod(expr);
    }
  };

  private unary = (expr: Unary): Value => {
    const right = this.evaluate(expr.right);
    if (expr.operator.type === TokenType.BANG) return !isTruthy(right);
    if (typeof right !== "number") {
      throw new RuntimeError(
        expr.operator,
        `Operand of '${expr.operator.lexeme}' must be a number.`,
      );
    }
    return -right;
  };

  private binary = (expr: Binary): Value => {
    const left = this.evaluate(expr.left);
    const right = this.evaluate(expr.right);
    const op = expr.operator;

    switch (op.type) {
      case TokenType.EQUAL_EQUAL:
        return isEqual(left, right);
      case TokenType.BANG_EQUAL:
        return !isEqual(left, right);
      case TokenType.PLUS: {
        if (typeof left === "number" && typeof right === "number") {
          return left + right;
        }
        if (typeof left === "string" && typeof right === "string") {
          return this.concat(op, left, right);
        }
        throw new RuntimeError(
          op,
          "Operands of '+' must be two numbers or two strings.",
        );
      }
    }

    if (typeof left !== "number" || typeof right !== "number") {
      throw new RuntimeError(
        op,
        `Operands of '${op.lexeme}' must be numbers.`,
      );
    }
    switch (op.type) {
      case TokenType.MINUS:
        return left - right;
      case TokenType.STAR:
        return left * right;
      case TokenType.SLASH:
        return left / right;
      case TokenType.GREATER:
        return left > right;
      case TokenType.GREATER_EQUAL:
        return left >= right;
      case TokenType.LESS:
        return left < right;
      case TokenType.LESS_EQUAL:
        return left <= right;
      default:
        throw new RuntimeError(op, `Unknown operator '${op.lexeme}'.`);
    }
  };

  private concat = (op: Token, left: string, right: string): string => {
    try {
      return left + right;
    } catch (e) {
      if (e instanceof RangeError && !isStackOverflow(e)) {
        throw new RuntimeError(op, "String too long.");
      }
      throw e;
    }
  };

  private call = (expr: Call): Value => {
    const callee = this.evaluate(expr.callee);
    const args = expr.args.map((arg) => this.evaluate(arg));

    if (!isCallable(callee)) {
      throw new RuntimeError(
        expr.paren,
        "Can only call functions and classes.",
      );
    }
    const expected = arity(callee);
    if (args.length !== expected) {
      throw new RuntimeError(
        expr.paren,
        `Expected ${expected} arguments but got ${args.length}.`,
      );
    }

    try {
      return this.invoke(callee, args);
    } catch (e) {
      // fatal to the run
      if (isStackOverflow(e)) {
        throw new RuntimeError(expr.paren, "Stack overflow.");
      }
      throw e;
    }
  };

  private invoke = (callee: Callable, args: Value[]): Value => {
    switch (callee.type) {
      case "NativeFunction":
        return callee.fn(...args);
      case "LoxFunction":
        return this.callFunction(callee, args, null);
      case "BoundMethod":
        return this.callFunction(callee.method, args, callee.receiver);
      case "LoxClass": {
        const instance: LoxInstance = {
          type: "LoxInstance",
          klass: callee,
          fields: new Map(),
        };
        const initializer = findMethod(callee, "init");
        if (initializer) this.callFunction(initializer, args, instance);
        return instance;
      }
    }
  };

  private callFunction = (
    fn: LoxFunction,
    args: Value[],
    receiver: LoxInstance | null,
  ): Value => {
    let closure = fn.closure;
    if (receiver) {
      closure = new Environment(fn.closure);
      closure.define("this", receiver);
    }

    const environment = new Environment(closure);
    fn.declaration.params.forEach((param, i) => {
      environment.define(param.lexeme, args[i]);
    });

    const completion = this.executeBlock(fn.declaration.body, environment);
    if (fn.isInitializer && receiver) return receiver;
    return completion.type === "Return" ? completion.value : null;
  };

  private getProperty = (expr: Get): Value => {
    const object = this.evaluate(expr.object);
    if (!isInstance(object)) {
      throw new RuntimeError(expr.name, "Only instances have properties.");
    }

    const name = expr.name.lexeme;
    if (object.fields.has(name)) return object.fields.get(name) ?? null;

    const method = findMethod(object.klass, name);
    if (method) return { type: "BoundMethod", receiver: object, method };

    throw new RuntimeError(expr.name, `Undefined property '${name}'.`);
  };

  // resolved from the class the running method was declared in
  private superMethod = (expr: Super): Value => {
    const superclass = this.environment.get(expr.keyword);
    const thisToken: Token = {
      ...expr.keyword,
      type: TokenType.THIS,
      lexeme: "this",
    };
    const receiver = this.environment.get(thisToken);
    if (!isClass(superclass) || !isInstance(receiver)) {
      throw new RuntimeError(expr.keyword, "Invalid use of 'super'.");
    }

    const method = findMethod(superclass, expr.method.lexeme);
    if (!method) {
      throw new RuntimeError(
        expr.method,
        `Undefined property '${expr.method.lexeme}'.`,
      );
    }
    return { type: "BoundMethod", receiver, method };
  };
}
