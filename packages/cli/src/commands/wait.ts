import { formatOperationError, hasOperationErrors } from "@computekit/compute-common";
import type { CommandContext } from "./context";
import { requireZone } from "../options";

export async function waitForOperation(ctx: CommandContext, operationId: string): Promise<boolean> {
  const zone = requireZone(ctx.options);
  const spinner = ctx.progress(`Waiting for ${operationId}...`);

  try {
    const error = await ctx.client.waitForOperationCompletion(
      ctx.options.project,
      operationId,
      zone,
      ctx.options.timeoutMs,
      { log: ctx.log }
    );
    if (hasOperationErrors(error)) {
      spinner.warn(`${operationId} finished with errors: ${formatOperationError(error)}`);
      return false;
    }
    spinner.succeed(`${operationId} is DONE`);
    return true;
  } catch (error) {
    spinner.fail(`Gave up waiting for ${operationId}`);
    throw error;
  }
}
