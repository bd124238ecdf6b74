import type { Stmt } from "./ast.ts";
import type { Environment } from "./ast-walking/environment.ts";
import {
  Interpreter,
  type InterpreterOptions,
} from "./ast-walking/interpreter.ts";
import { scan } from "./lexer.ts";
import { parse } from "./parser.ts";
import type { ErrorReporter } from "./reporter.ts";

export type RunStatus = "ok" | "static-error" | "runtime-error";

export const ExitCode = {
  OK: 0,
  USAGE: 64,
  STATIC_ERROR: 65,
  NO_INPUT: 66,
  RUNTIME_ERROR: 70,
  IO_ERROR: 74,
} as const;

/** One interpreter per session, so REPL lines share globals */
export class Lox {
  private interpreter: Interpreter;

  constructor(
    private reporter: ErrorReporter,
    options: InterpreterOptions = {},
  ) {
    this.interpreter = new Interpreter(reporter, options);
  }

  public static exitCode = (status: RunStatus): number => {
    switch (status) {
      case "ok":
        return ExitCode.OK;
      case "static-error":
        return ExitCode.STATIC_ERROR;
      case "runtime-error":
        return ExitCode.RUNTIME_ERROR;
    }
  };

  public get globals(): Environment {
    return this.interpreter.globals;
  }

  /** Scans and parses, or returns null once a static error was reported */
  public compile = (src: string): Stmt[] | null => {
    const tokens = scan(src, this.reporter);
    if (this.reporter.hadError) return null;
    const statements = parse(tokens, this.reporter);
    return this.reporter.hadError ? null : statements;
  };

  public run = (src: string): RunStatus => {
    this.reporter.reset();
    const statements = this.compile(src);
    if (!statements) return "static-error";

    this.interpreter.interpret(statements);
    return this.reporter.hadRuntimeError ? "runtime-error" : "ok";
  };
}
