import chalk from "chalk";
import type { ComputeLogCallback, LogLevel } from "@computekit/compute-common";

export interface LogStreams {
  stdout: Pick<NodeJS.WritableStream, "write">;
  stderr: Pick<NodeJS.WritableStream, "write">;
}

const COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Log sink for the CLI. Warnings and errors go to stderr, debug lines only
 * show with --verbose.
 */
export function createConsoleLog(
  verbose: boolean,
  streams: LogStreams = { stdout: process.stdout, stderr: process.stderr }
): ComputeLogCallback {
  return (message, level, context) => {
    if (level === "debug" && !verbose) {
      return;
    }
    const details = verbose && context ? ` ${chalk.gray(JSON.stringify(context))}` : "";
    const line = `${COLORS[level](message)}${details}\n`;
    if (level === "warn" || level === "error") {
      streams.stderr.write(line);
    } else {
      streams.stdout.write(line);
    }
  };
}
