import { Command } from "commander";
import type { Ora } from "ora";
import type { ComputeLogCallback } from "@computekit/compute-common";
import { createComputeClient } from "@computekit/compute-gcp";
import type { ComputeClient } from "@computekit/compute-gcp";
import {
  appendMetadata,
  listDiskTypes,
  listImages,
  listInstances,
  listMachineTypes,
  listNetworks,
  listRegions,
  listTemplates,
  listZones,
  snapshot,
  startSpinner,
  waitForOperation,
} from "./commands";
import type { CommandContext } from "./commands";
import { createConsoleLog } from "./logger";
import { resolveCliOptions } from "./options";
import type { CliEnv, CliFlags, CliOptions } from "./options";
import { collect } from "./parsers";

export const COMPUTEKIT_VERSION = "0.1.0";

export interface ProgramDeps {
  createClient?: (options: CliOptions, log: ComputeLogCallback) => ComputeClient;
  print?: (line: string) => void;
  progress?: (text: string) => Ora;
  env?: CliEnv;
}

type Handler = (ctx: CommandContext) => Promise<boolean | void>;

export function createProgram(deps: ProgramDeps = {}): Command {
  const createClient =
    deps.createClient ??
    ((options: CliOptions, log: ComputeLogCallback) =>
      createComputeClient({ projectId: options.project, keyFilename: options.keyFile, log }));
  const print = deps.print ?? ((line: string) => void process.stdout.write(`${line}\n`));
  const progress = deps.progress ?? startSpinner;
  const env = deps.env ?? process.env;

  const run = async (command: Command, handler: Handler): Promise<void> => {
    const options = resolveCliOptions(command.optsWithGlobals<CliFlags>(), env);
    const log = createConsoleLog(options.verbose);
    const client = createClient(options, log);
    const ok = await handler({ client, options, log, print, progress });
    if (ok === false) {
      process.exitCode = 1;
    }
  };

  const program = new Command();

  program
    .name("computekit")
    .description("computekit CLI - Compute Engine resources, snapshots and operations")
    .version(COMPUTEKIT_VERSION)
    .option("-p, --project <id>", "Project ID (env: COMPUTEKIT_PROJECT)")
    .option("-z, --zone <zone>", "Zone name or self link (env: COMPUTEKIT_ZONE)")
    .option("--key-file <path>", "Service account key file (env: COMPUTEKIT_KEY_FILE)")
    .option("--timeout <ms>", "Wait budget in milliseconds (env: COMPUTEKIT_TIMEOUT_MS)")
    .option("-v, --verbose", "Show debug output");

  // Listings
  program
    .command("regions")
    .description("List regions, deprecated ones excluded")
    .action(async (_flags: unknown, command: Command) => run(command, listRegions));

  program
    .command("zones <region>")
    .description("List the zones of a region")
    .action(async (region: string, _flags: unknown, command: Command) =>
      run(command, (ctx) => listZones(ctx, region))
    );

  program
    .command("machine-types")
    .description("List machine types of the zone")
    .action(async (_flags: unknown, command: Command) => run(command, listMachineTypes));

  program
    .command("disk-types")
    .description("List disk types of the zone")
    .option("--boot", "Only disk types usable as a boot disk")
    .action(async (flags: { boot?: boolean }, command: Command) =>
      run(command, (ctx) => listDiskTypes(ctx, flags))
    );

  program
    .command("images")
    .description("List images of the project, deprecated ones excluded")
    .action(async (_flags: unknown, command: Command) => run(command, listImages));

  program
    .command("networks")
    .description("List networks of the project")
    .action(async (_flags: unknown, command: Command) => run(command, listNetworks));

  program
    .command("templates")
    .description("List instance templates of the project")
    .action(async (_flags: unknown, command: Command) => run(command, listTemplates));

  program
    .command("instances")
    .description("List instances across all zones")
    .option("-l, --label <key=value>", "Only instances carrying this label (repeatable)", collect, [])
    .action(async (flags: { label?: string[] }, command: Command) =>
      run(command, (ctx) => listInstances(ctx, flags))
    );

  // Long-running operations
  program
    .command("snapshot <instance>")
    .description("Snapshot every disk attached to an instance")
    .option("--cancel-siblings", "Stop waiting on the other disks once one fails")
    .action(async (instance: string, flags: { cancelSiblings?: boolean }, command: Command) =>
      run(command, (ctx) => snapshot(ctx, instance, flags))
    );

  program
    .command("metadata <instance> <entries...>")
    .description("Add or replace metadata entries (key=value) on an instance")
    .action(async (instance: string, entries: string[], _flags: unknown, command: Command) =>
      run(command, (ctx) => appendMetadata(ctx, instance, entries))
    );

  program
    .command("wait <operation>")
    .description("Wait for a zonal operation to complete")
    .action(async (operation: string, _flags: unknown, command: Command) =>
      run(command, (ctx) => waitForOperation(ctx, operation))
    );

  return program;
}
