import type { MetadataItem } from "../types";
import { checkNotNull } from "./preconditions";

/**
 * Merge two metadata lists by key.
 *
 * Every winner entry is kept, in order, followed by the loser entries whose key
 * the winner does not define. A missing loser list counts as empty.
 */
export function mergeMetadataItems<T extends MetadataItem>(
  winner: readonly T[],
  loser?: readonly T[] | null
): T[] {
  checkNotNull(winner, "winner");
  if (!loser) {
    return [...winner];
  }

  const winnerKeys = new Set(winner.map((item) => item.key));
  return [...winner, ...loser.filter((item) => !winnerKeys.has(item.key))];
}
