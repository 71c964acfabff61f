/**
 * Sector Search - Aggregator
 *
 * Merges per-sector conflict lists into distinct drone ids.
 * The same pair is flagged in every sector it shares, and a drone with
 * several partners is flagged once per pair; only the id matters here,
 * never the coordinates.
 */

export function collectConflictIds(
  idLists: Iterable<ReadonlyArray<number>>,
): Set<number> {
  const ids = new Set<number>()
  for (const list of idLists) {
    for (const id of list) ids.add(id)
  }
  return ids
}

/**
 * Count distinct drones in conflict
 */
export function countDistinctConflicts(
  idLists: Iterable<ReadonlyArray<number>>,
): number {
  return collectConflictIds(idLists).size
}
