import type { Token } from "./token.ts";

/** Base class for every error the interpreter reports */
export abstract class LoxError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(message);
    this.name = this.constructor.name;
    this.line = line;
    this.column = column;
  }
}

/** Unterminated string or unrecognized character */
export class ScanError extends LoxError {}

/** Unexpected token or invalid assignment target */
export class ParseError extends LoxError {
  readonly token: Token;

  constructor(token: Token, message: string) {
    super(message, token.line, token.column);
    this.token = token;
  }
}

/** Fatal to the current run: the language has no catch construct */
export class RuntimeError extends LoxError {
  readonly token: Token;

  constructor(token: Token, message: string) {
    super(message, token.line, token.column);
    this.token = token;
  }
}

/** The host ran out of call stack */
export const isStackOverflow = (e: unknown): boolean =>
  e instanceof RangeError && e.message === "Maximum call stack size exceeded";
