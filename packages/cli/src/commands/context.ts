import ora from "ora";
import type { Ora } from "ora";
import type { ComputeLogCallback } from "@computekit/compute-common";
import type { ComputeClient } from "@computekit/compute-gcp";
import type { CliOptions } from "../options";

/**
 * What every command handler runs against.
 */
export interface CommandContext {
  client: ComputeClient;
  options: CliOptions;
  log: ComputeLogCallback;
  /** Writes one line of command output */
  print: (line: string) => void;
  /** Starts a spinner for a long wait */
  progress: (text: string) => Ora;
}

export const startSpinner = (text: string): Ora => ora(text).start();
