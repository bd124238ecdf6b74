export { Lexer, scan } from "./lexer.ts";
export { parse, Parser } from "./parser.ts";
export { Interpreter } from "./ast-walking/interpreter.ts";
export type {
  Completion,
  InterpreterOptions,
} from "./ast-walking/interpreter.ts";
export { Environment } from "./ast-walking/environment.ts";
export { stringify } from "./ast-walking/values.ts";
export type { Callable, LoxInstance, Value } from "./ast-walking/values.ts";
export { ErrorReporter } from "./reporter.ts";
export type { ReporterOptions, Sink } from "./reporter.ts";
export {
  isStackOverflow,
  LoxError,
  ParseError,
  RuntimeError,
  ScanError,
} from "./errors.ts";
export { AstPrinter } from "./printer.ts";
export { ExitCode, Lox } from "./lox.ts";
export type { RunStatus } from "./lox.ts";
export { type Token, TokenType } from "./token.ts";
