import { Chalk, type ChalkInstance } from "chalk";
import type { ParseError, RuntimeError, ScanError } from "./errors.ts";
import { TokenType } from "./token.ts";

export type Sink = (line: string) => void;

export interface ReporterOptions {
  sink?: Sink;
  color?: boolean;
}

/** Formats and counts diagnostics; gates execution and exit codes */
export class ErrorReporter {
  private sink: Sink;
  private chalk: ChalkInstance;
  private errors = 0;
  private runtimeErrors = 0;

  constructor(options: ReporterOptions = {}) {
    this.sink = options.sink ?? ((line) => console.error(line));
    this.chalk = options.color === false
      ? new Chalk({ level: 0 })
      : new Chalk();
  }

  public get hadError(): boolean {
    return this.errors > 0;
  }

  public get hadRuntimeError(): boolean {
    return this.runtimeErrors > 0;
  }

  public get errorCount(): number {
    return this.errors + this.runtimeErrors;
  }

  public report = (
    line: number,
    column: number,
    where: string,
    message: string,
  ): void => {
    this.sink(
      `${this.location(line, column)} ${
        this.chalk.red(`Error${where}`)
      }: ${message}`,
    );
    this.errors++;
  };

  public scanError = (error: ScanError): void => {
    this.report(error.line, error.column, "", error.message);
  };

  public parseError = (error: ParseError): void => {
    const where = error.token.type === TokenType.EOF
      ? " at end"
      : ` at '${error.token.lexeme}'`;
    this.report(error.line, error.column, where, error.message);
  };

  public runtimeError = (error: RuntimeError): void => {
    this.sink(
      `${this.location(error.line, error.column)} ${
        this.chalk.red("Runtime error")
      }: ${error.message}`,
    );
    this.runtimeErrors++;
  };

  // interactive mode keeps going after an error
  public reset = (): void => {
    this.errors = 0;
    this.runtimeErrors = 0;
  };

  private location = (line: number, column: number): string =>
    this.chalk.dim(`[line ${line}, column ${column}]`);
}
