import type { DeprecationStatus } from "../types";

/**
 * Filter then sort a resource list returned by the API.
 * A missing list is treated as empty. The input is never mutated.
 */
export function processResourceList<T>(
  items: readonly T[] | null | undefined,
  filter?: (item: T) => boolean,
  compare?: (a: T, b: T) => number
): T[] {
  const kept = filter ? (items ?? []).filter(filter) : [...(items ?? [])];
  return compare ? kept.sort(compare) : kept;
}

export function isDeprecated(status: DeprecationStatus | null | undefined): boolean {
  if (!status) return false;
  return String(status.state ?? "").toUpperCase() === "DEPRECATED";
}

/** Code-unit string ordering, independent of the host locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function byName<T extends { name?: string | null }>(a: T, b: T): number {
  return compareStrings(a.name ?? "", b.name ?? "");
}
