import { ErrorReporter } from "../src/reporter.ts";
import { Lox, type RunStatus } from "../src/lox.ts";
import { scan } from "../src/lexer.ts";
import { parse } from "../src/parser.ts";
import type { Stmt } from "../src/ast.ts";
import { type Token, TokenType } from "../src/token.ts";

export type Session = {
  lox: Lox;
  output: string[];
  errors: string[];
};

export const session = (): Session => {
  const output: string[] = [];
  const errors: string[] = [];
  const reporter = new ErrorReporter({
    sink: (line) => errors.push(line),
    color: false,
  });
  const lox = new Lox(reporter, { out: (line) => output.push(line) });
  return { lox, output, errors };
};

export const run = (
  src: string,
): { output: string[]; errors: string[]; status: RunStatus } => {
  const { lox, output, errors } = session();
  const status = lox.run(src);
  return { output, errors, status };
};

export const parseSource = (
  src: string,
): { statements: Stmt[]; errors: string[] } => {
  const errors: string[] = [];
  const reporter = new ErrorReporter({
    sink: (line) => errors.push(line),
    color: false,
  });
  const statements = parse(scan(src, reporter), reporter);
  return { statements, errors };
};

export const ident = (lexeme: string, line = 1): Token => ({
  type: TokenType.IDENTIFIER,
  lexeme,
  literal: null,
  line,
  column: 1,
});
