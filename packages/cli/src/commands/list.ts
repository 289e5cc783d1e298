import chalk from "chalk";
import type { CommandContext } from "./context";
import { requireZone } from "../options";
import { parseLabels, regionLink } from "../parsers";

interface Named {
  name?: string | null;
  description?: string | null;
}

function printNamed(ctx: CommandContext, items: readonly Named[], empty: string): void {
  if (items.length === 0) {
    ctx.print(chalk.gray(empty));
    return;
  }
  for (const item of items) {
    const description = item.description ? ` ${chalk.gray(item.description)}` : "";
    ctx.print(`${chalk.cyan(item.name ?? "")}${description}`);
  }
}

export async function listRegions(ctx: CommandContext): Promise<void> {
  printNamed(ctx, await ctx.client.getRegions(ctx.options.project), "No regions found");
}

export async function listZones(ctx: CommandContext, region: string): Promise<void> {
  const zones = await ctx.client.getZones(ctx.options.project, regionLink(ctx.options.project, region));
  printNamed(ctx, zones, `No zones found in ${region}`);
}

export async function listMachineTypes(ctx: CommandContext): Promise<void> {
  const zone = requireZone(ctx.options);
  printNamed(ctx, await ctx.client.getMachineTypes(ctx.options.project, zone), `No machine types in ${zone}`);
}

export async function listDiskTypes(ctx: CommandContext, flags: { boot?: boolean }): Promise<void> {
  const zone = requireZone(ctx.options);
  const diskTypes = flags.boot
    ? await ctx.client.getBootDiskTypes(ctx.options.project, zone)
    : await ctx.client.getDiskTypes(ctx.options.project, zone);
  printNamed(ctx, diskTypes, `No disk types in ${zone}`);
}

export async function listImages(ctx: CommandContext): Promise<void> {
  printNamed(ctx, await ctx.client.getImages(ctx.options.project), "No images found");
}

export async function listNetworks(ctx: CommandContext): Promise<void> {
  printNamed(ctx, await ctx.client.getNetworks(ctx.options.project), "No networks found");
}

export async function listTemplates(ctx: CommandContext): Promise<void> {
  printNamed(ctx, await ctx.client.getTemplates(ctx.options.project), "No instance templates found");
}

export async function listInstances(ctx: CommandContext, flags: { label?: string[] }): Promise<void> {
  const labels = parseLabels(flags.label ?? []);
  const instances = await ctx.client.getInstancesWithLabel(ctx.options.project, labels);
  if (instances.length === 0) {
    ctx.print(chalk.gray("No instances found"));
    return;
  }
  for (const instance of instances) {
    const status = String(instance.status ?? "UNKNOWN");
    const color = status === "RUNNING" ? chalk.green : status === "TERMINATED" ? chalk.gray : chalk.yellow;
    const zone = instance.zone ? instance.zone.slice(instance.zone.lastIndexOf("/") + 1) : "";
    ctx.print(`${chalk.cyan(instance.name ?? "")} ${zone} ${color(status)}`);
  }
}
