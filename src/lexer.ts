import { ScanError } from "./errors.ts";
import type { ErrorReporter } from "./reporter.ts";
import { keywords, type Literal, type Token, TokenType } from "./token.ts";
import { isalnum, isalpha, isdigit } from "./utils.ts";

/**Lexer */
export class Lexer {
  private tokens: Token[] = [];
  private start = 0;
  private pos = 0;
  private line = 1;
  private lineStart = 0;

  constructor(private src: string, private reporter: ErrorReporter) {}

  public scanTokens = (): Token[] => {
    while (!this.atEnd()) {
      this.start = this.pos;
      this.scanToken();
    }
    this.start = this.pos;
    this.addToken(TokenType.EOF, null, "");
    return this.tokens;
  };

  private atEnd = (): boolean => this.pos >= this.src.length;

  private current = (): string =>
    this.pos < this.src.length ? this.src[this.pos] : "\0";

  private peekNext = (): string =>
    this.pos + 1 < this.src.length ? this.src[this.pos + 1] : "\0";

  private bump = (): string => this.src[this.pos++];

  private match = (expected: string): boolean => {
    if (this.current() !== expected) return false;
    this.pos++;
    return true;
  };

  private newline = (): void => {
    this.line++;
    this.lineStart = this.pos;
  };

  private column = (): number => this.start - this.lineStart + 1;

  private addToken = (
    type: TokenType,
    literal: Literal = null,
    lexeme: string = this.src.slice(this.start, this.pos),
  ): void => {
    this.tokens.push({
      type,
      lexeme,
      literal,
      line: this.line,
      column: this.column(),
    });
  };

  private error = (message: string): void => {
    this.reporter.scanError(new ScanError(message, this.line, this.column()));
  };

  private scanToken = (): void => {
    const c = this.bump();
    switch (c) {
      case "(":
        return this.addToken(TokenType.LEFT_PAREN);
      case ")":
        return this.addToken(TokenType.RIGHT_PAREN);
      case "{":
        return this.addToken(TokenType.LEFT_BRACE);
      case "}":
        return this.addToken(TokenType.RIGHT_BRACE);
      case ",":
        return this.addToken(TokenType.COMMA);
      case ".":
        return this.addToken(TokenType.DOT);
      case "-":
        return this.addToken(TokenType.MINUS);
      case "+":
        return this.addToken(TokenType.PLUS);
      case ";":
        return this.addToken(TokenType.SEMICOLON);
      case "*":
        return this.addToken(TokenType.STAR);
      case "!":
        return this.addToken(
          this.match("=") ? TokenType.BANG_EQUAL : TokenType.BANG,
        );
      case "=":
        return this.addToken(
          this.match("=") ? TokenType.EQUAL_EQUAL : TokenType.EQUAL,
        );
      case "<":
        return this.addToken(
          this.match("=") ? TokenType.LESS_EQUAL : TokenType.LESS,
        );
      case ">":
        return this.addToken(
          this.match("=") ? TokenType.GREATER_EQUAL : TokenType.GREATER,
        );
      case "/": {
        if (this.match("/")) {
          while (this.current() !== "\n" && !this.atEnd()) this.bump();
          return;
        }
        return this.addToken(TokenType.SLASH);
      }
      case " ":
      case "\r":
      case "\t":
        return;
      case "\n":
        return this.newline();
      case '"':
        return this.string();
      default: {
        if (isdigit(c)) return this.number();
        if (isalpha(c)) return this.identifier();
        return this.error(`Unexpected character '${c}'.`);
      }
    }
  };

  private string = (): void => {
    while (this.current() !== '"') {
      if (this.atEnd() || this.current() === "\n") {
        return this.error("Unterminated string.");
      }
      this.bump();
    }
    this.bump();
    this.addToken(
      TokenType.STRING,
      this.src.slice(this.start + 1, this.pos - 1),
    );
  };

  private number = (): void => {
    while (isdigit(this.current())) this.bump();

    // a trailing '.' belongs to the next token
    if (this.current() === "." && isdigit(this.peekNext())) {
      this.bump();
      while (isdigit(this.current())) this.bump();
    }

    this.addToken(
      TokenType.NUMBER,
      Number(this.src.slice(this.start, this.pos)),
    );
  };

  private identifier = (): void => {
    while (isalnum(this.current())) this.bump();

    const text = this.src.slice(this.start, this.pos);
    const type = keywords.get(text) ?? TokenType.IDENTIFIER;
    switch (type) {
      case TokenType.TRUE:
        return this.addToken(type, true);
      case TokenType.FALSE:
        return this.addToken(type, false);
      default:
        return this.addToken(type);
    }
  };
}

export const scan = (src: string, reporter: ErrorReporter): Token[] =>
  new Lexer(src, reporter).scanTokens();
