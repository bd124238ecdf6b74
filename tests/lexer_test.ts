import assert from "node:assert/strict";
import { test } from "node:test";
import { Lexer } from "../src/lexer.ts";
import { ErrorReporter } from "../src/reporter.ts";
import { type Token, TokenType } from "../src/token.ts";

const lex = (src: string): { tokens: Token[]; errors: string[] } => {
  const errors: string[] = [];
  const reporter = new ErrorReporter({
    sink: (line) => errors.push(line),
    color: false,
  });
  const tokens = new Lexer(src, reporter).scanTokens();
  return { tokens, errors };
};

const types = (src: string): TokenType[] =>
  lex(src).tokens.map((token) => token.type);

test("Lexer: declaration", () => {
  const { tokens, errors } = lex("var x = 1.5;");
  assert.deepEqual(errors, []);
  assert.deepEqual(tokens, [
    { type: TokenType.VAR, lexeme: "var", literal: null, line: 1, column: 1 },
    {
      type: TokenType.IDENTIFIER,
      lexeme: "x",
      literal: null,
      line: 1,
      column: 5,
    },
    { type: TokenType.EQUAL, lexeme: "=", literal: null, line: 1, column: 7 },
    {
      type: TokenType.NUMBER,
      lexeme: "1.5",
      literal: 1.5,
      line: 1,
      column: 9,
    },
    {
      type: TokenType.SEMICOLON,
      lexeme: ";",
      literal: null,
      line: 1,
      column: 12,
    },
    { type: TokenType.EOF, lexeme: "", literal: null, line: 1, column: 13 },
  ]);
});

test("Lexer: longest match for two-character operators", () => {
  assert.deepEqual(types("!= ! == = <= < >= >"), [
    TokenType.BANG_EQUAL,
    TokenType.BANG,
    TokenType.EQUAL_EQUAL,
    TokenType.EQUAL,
    TokenType.LESS_EQUAL,
    TokenType.LESS,
    TokenType.GREATER_EQUAL,
    TokenType.GREATER,
    TokenType.EOF,
  ]);
});

test("Lexer: keywords are case-sensitive", () => {
  const { tokens } = lex("class Class nil true");
  assert.deepEqual(tokens.map((token) => token.type), [
    TokenType.CLASS,
    TokenType.IDENTIFIER,
    TokenType.NIL,
    TokenType.TRUE,
    TokenType.EOF,
  ]);
  assert.equal(tokens[2].literal, null);
  assert.equal(tokens[3].literal, true);
});

test("Lexer: comments and line tracking", () => {
  const { tokens } = lex("// comment\nprint 1;\n");
  assert.deepEqual(
    tokens.map(({ type, line, column }) => [type, line, column]),
    [
      [TokenType.PRINT, 2, 1],
      [TokenType.NUMBER, 2, 7],
      [TokenType.SEMICOLON, 2, 8],
      [TokenType.EOF, 3, 1],
    ],
  );
});

test("Lexer: trailing dot is not part of a number", () => {
  const { tokens } = lex("123.");
  assert.deepEqual(tokens.map((token) => token.type), [
    TokenType.NUMBER,
    TokenType.DOT,
    TokenType.EOF,
  ]);
  assert.equal(tokens[0].literal, 123);
});

test("Lexer: string literal", () => {
  const { tokens } = lex('"hi there"');
  assert.equal(tokens[0].type, TokenType.STRING);
  assert.equal(tokens[0].lexeme, '"hi there"');
  assert.equal(tokens[0].literal, "hi there");
});

test("Lexer: unterminated string at end of input", () => {
  const { tokens, errors } = lex('print "abc');
  assert.deepEqual(errors, [
    "[line 1, column 7] Error: Unterminated string.",
  ]);
  assert.deepEqual(tokens.map((token) => token.type), [
    TokenType.PRINT,
    TokenType.EOF,
  ]);
});

test("Lexer: strings may not span lines", () => {
  const { tokens, errors } = lex('"ab\nprint 1;');
  assert.deepEqual(errors, [
    "[line 1, column 1] Error: Unterminated string.",
  ]);
  assert.deepEqual(
    tokens.map(({ type, line }) => [type, line]),
    [
      [TokenType.PRINT, 2],
      [TokenType.NUMBER, 2],
      [TokenType.SEMICOLON, 2],
      [TokenType.EOF, 2],
    ],
  );
});

test("Lexer: keeps scanning after an unexpected character", () => {
  const { tokens, errors } = lex("@ 1 #");
  assert.deepEqual(errors, [
    "[line 1, column 1] Error: Unexpected character '@'.",
    "[line 1, column 5] Error: Unexpected character '#'.",
  ]);
  assert.deepEqual(tokens.map((token) => token.type), [
    TokenType.NUMBER,
    TokenType.EOF,
  ]);
});
