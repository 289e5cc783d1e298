#!/usr/bin/env node

import chalk from "chalk";
import { CommanderError } from "commander";
import { createProgram } from "./program";

async function main(argv: string[]): Promise<void> {
  const program = createProgram();
  program.exitOverride();

  try {
    await program.parseAsync(argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // commander has already printed usage problems
      if (error.code !== "commander.help" && error.code !== "commander.helpDisplayed" && error.code !== "commander.version") {
        process.exitCode = error.exitCode;
      }
      return;
    }
    console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

void main(process.argv);
