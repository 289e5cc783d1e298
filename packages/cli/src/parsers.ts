import { InvalidArgumentError } from "@computekit/compute-common";
import type { MetadataItem } from "@computekit/compute-common";

/**
 * Split a `key=value` argument. The value may itself contain `=`.
 */
export function parseKeyValue(input: string): { key: string; value: string } {
  const separator = input.indexOf("=");
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${input}"`);
  }
  return { key: input.slice(0, separator), value: input.slice(separator + 1) };
}

/** Repeated `--label k=v` flags; the last value of a key wins. */
export function parseLabels(inputs: readonly string[]): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const input of inputs) {
    const { key, value } = parseKeyValue(input);
    labels[key] = value;
  }
  return labels;
}

export function parseMetadataItems(inputs: readonly string[]): MetadataItem[] {
  return inputs.map(parseKeyValue);
}

/** Commander reducer for repeatable options. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Expand a bare region name into the self link the API reports on zones.
 */
export function regionLink(project: string, region: string): string {
  if (region.includes("/")) {
    return region;
  }
  return `https://www.googleapis.com/compute/v1/projects/${project}/regions/${region}`;
}
