import { formatOperationError, hasOperationErrors } from "@computekit/compute-common";
import type { CommandContext } from "./context";
import { requireZone } from "../options";
import { parseMetadataItems } from "../parsers";

export async function appendMetadata(ctx: CommandContext, instanceId: string, entries: string[]): Promise<boolean> {
  const zone = requireZone(ctx.options);
  const items = parseMetadataItems(entries);
  const spinner = ctx.progress(`Updating metadata of ${instanceId}...`);

  try {
    const error = await ctx.client.appendInstanceMetadata(
      ctx.options.project,
      zone,
      instanceId,
      items,
      ctx.options.timeoutMs,
      { log: ctx.log }
    );
    if (hasOperationErrors(error)) {
      spinner.warn(`Metadata update of ${instanceId} finished with errors: ${formatOperationError(error)}`);
      return false;
    }
    spinner.succeed(`Set ${items.map((item) => item.key).join(", ")} on ${instanceId}`);
    return true;
  } catch (error) {
    spinner.fail(`Metadata update of ${instanceId} failed`);
    throw error;
  }
}
