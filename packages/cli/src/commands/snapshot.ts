import chalk from "chalk";
import { formatOperationError, hasOperationErrors } from "@computekit/compute-common";
import type { CommandContext } from "./context";
import { requireZone } from "../options";

export async function snapshot(
  ctx: CommandContext,
  instanceId: string,
  flags: { cancelSiblings?: boolean }
): Promise<boolean> {
  const zone = requireZone(ctx.options);
  const spinner = ctx.progress(`Snapshotting disks of ${instanceId}...`);

  try {
    const results = await ctx.client.createSnapshot(ctx.options.project, zone, instanceId, ctx.options.timeoutMs, {
      log: ctx.log,
      cancelSiblingsOnFailure: flags.cancelSiblings ?? false,
    });
    spinner.succeed(`Snapshotted ${results.length} disk(s) of ${instanceId}`);

    let clean = true;
    for (const result of results) {
      if (hasOperationErrors(result.error)) {
        clean = false;
        ctx.print(`${chalk.cyan(result.diskName)} ${chalk.red(formatOperationError(result.error))}`);
      } else {
        ctx.print(`${chalk.cyan(result.diskName)} ${chalk.green("ok")}`);
      }
    }
    return clean;
  } catch (error) {
    spinner.fail(`Snapshot of ${instanceId} failed`);
    throw error;
  }
}
