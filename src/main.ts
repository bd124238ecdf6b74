#!/usr/bin/env -S npx tsx
import { CommanderError } from "commander";
import { createProgram, usageExitCode } from "./cli.ts";

const main = async (): Promise<void> => {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (e) {
    if (!(e instanceof CommanderError)) throw e;
    process.exit(usageExitCode(e));
  }
};

await main();
