import assert from "node:assert/strict";
import { test } from "node:test";
import { ParseError, RuntimeError, ScanError } from "../src/errors.ts";
import { ErrorReporter } from "../src/reporter.ts";
import { type Token, TokenType } from "../src/token.ts";

const token = (type: TokenType, lexeme: string): Token => ({
  type,
  lexeme,
  literal: null,
  line: 3,
  column: 9,
});

const reporter = (): { reporter: ErrorReporter; lines: string[] } => {
  const lines: string[] = [];
  return {
    reporter: new ErrorReporter({
      sink: (line) => lines.push(line),
      color: false,
    }),
    lines,
  };
};

test("ErrorReporter: static errors", () => {
  const { reporter: r, lines } = reporter();
  r.scanError(new ScanError("Unexpected character '@'.", 1, 2));
  r.parseError(
    new ParseError(token(TokenType.IDENTIFIER, "foo"), "Expect ';'."),
  );
  r.parseError(new ParseError(token(TokenType.EOF, ""), "Expect '}'."));

  assert.deepEqual(lines, [
    "[line 1, column 2] Error: Unexpected character '@'.",
    "[line 3, column 9] Error at 'foo': Expect ';'.",
    "[line 3, column 9] Error at end: Expect '}'.",
  ]);
  assert.equal(r.hadError, true);
  assert.equal(r.hadRuntimeError, false);
  assert.equal(r.errorCount, 3);
});

test("ErrorReporter: runtime errors are counted apart", () => {
  const { reporter: r, lines } = reporter();
  r.runtimeError(
    new RuntimeError(token(TokenType.MINUS, "-"), "Operand must be a number."),
  );
  assert.deepEqual(lines, [
    "[line 3, column 9] Runtime error: Operand must be a number.",
  ]);
  assert.equal(r.hadError, false);
  assert.equal(r.hadRuntimeError, true);
});

test("ErrorReporter: reset clears both flags", () => {
  const { reporter: r } = reporter();
  r.report(1, 1, "", "boom");
  r.runtimeError(new RuntimeError(token(TokenType.PLUS, "+"), "boom"));
  r.reset();
  assert.equal(r.hadError, false);
  assert.equal(r.hadRuntimeError, false);
  assert.equal(r.errorCount, 0);
});
