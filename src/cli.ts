import chalk from "chalk";
import { Command, type CommanderError } from "commander";
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import {
  AstPrinter,
  ErrorReporter,
  ExitCode,
  Lox,
  Parser,
  scan,
} from "./mod.ts";
import { formatToken } from "./token.ts";

type GlobalOptions = { color: boolean };

const configure = (command: Command): ErrorReporter => {
  const { color } = command.optsWithGlobals<GlobalOptions>();
  if (!color) chalk.level = 0;
  return new ErrorReporter({ color });
};

const readSource = async (file: string): Promise<string> => {
  try {
    return await readFile(file, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      console.error(chalk.red(`Error: File '${file}' not found`));
      return process.exit(ExitCode.NO_INPUT);
    }
    console.error(chalk.red(`Error reading file '${file}': ${String(e)}`));
    return process.exit(ExitCode.IO_ERROR);
  }
};

const interpret = async (file: string, reporter: ErrorReporter): Promise<void> => {
  const src = await readSource(file);
  const lox = new Lox(reporter);
  process.exitCode = Lox.exitCode(lox.run(src));
};

const repl = async (reporter: ErrorReporter): Promise<void> => {
  console.log(chalk.bold("Lox REPL"));

  const lox = new Lox(reporter);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("> ");
  rl.prompt();

  // an empty line ends the session
  for await (const line of rl) {
    if (line.trim() === "") break;
    lox.run(line);
    rl.prompt();
  }
  rl.close();
};

const printAST = async (file: string, reporter: ErrorReporter): Promise<void> => {
  const src = await readSource(file);
  const tokens = scan(src, reporter);
  const statements = new Parser(tokens, reporter).parse();
  if (reporter.hadError) {
    process.exitCode = ExitCode.STATIC_ERROR;
    return;
  }
  console.log(new AstPrinter().print(statements));
};

const printTokens = async (
  file: string,
  reporter: ErrorReporter,
): Promise<void> => {
  const src = await readSource(file);
  for (const token of scan(src, reporter)) console.log(formatToken(token));
  if (reporter.hadError) process.exitCode = ExitCode.STATIC_ERROR;
};

/** Help and version exit cleanly; every other commander error is a usage error */
export const usageExitCode = (e: CommanderError): number =>
  e.exitCode === 0 ? ExitCode.OK : ExitCode.USAGE;

export const createProgram = (): Command => {
  const program = new Command()
    .name("lox")
    .version("0.1.0")
    .description("Lox tree-walking interpreter")
    .option("--no-color", "Disable coloured diagnostics")
    .allowExcessArguments(false)
    .exitOverride();

  // subcommand names win over a script of the same name
  program
    .argument(
      "[script]",
      "Lox source file, as ./<name> when named like a command; starts the REPL when omitted",
    )
    .action(async (script: string | undefined, _, command: Command) => {
      const reporter = configure(command);
      if (script === undefined) await repl(reporter);
      else await interpret(script, reporter);
    });

  program
    .command("repl")
    .description("Lox REPL")
    .action(async (_, command: Command) => {
      await repl(configure(command));
    });

  program
    .command("run <file>")
    .description("Run a Lox source file")
    .action(async (file: string, _, command: Command) => {
      await interpret(file, configure(command));
    });

  program
    .command("ast <file>")
    .description("Show the AST of a Lox source file")
    .action(async (file: string, _, command: Command) => {
      await printAST(file, configure(command));
    });

  program
    .command("tokens <file>")
    .description("Show the tokens of a Lox source file")
    .action(async (file: string, _, command: Command) => {
      await printTokens(file, configure(command));
    });

  return program;
};
