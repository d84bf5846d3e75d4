import type { IpoEntry } from "../types.js";

/**
 * Entries whose id is not in `knownIds`, in fetched order.
 *
 * Unlike a plain `filter` on `knownIds`, an id repeated within the batch is
 * also dropped after its first occurrence, so each id is alerted once.
 */
export function detectNew(
  entries: readonly IpoEntry[],
  knownIds: ReadonlySet<number>
): IpoEntry[] {
  const emitted = new Set<number>();
  return entries.filter((e) => {
    if (knownIds.has(e.id) || emitted.has(e.id)) return false;
    emitted.add(e.id);
    return true;
  });
}
