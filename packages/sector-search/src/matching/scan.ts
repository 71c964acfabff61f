/**
 * Sector Search - Cell Scanner
 *
 * Brute-force pair check inside one sector bucket.
 *
 * Cost is k(k-1)/2 distance checks for a bucket of k drones. Summed over
 * F roughly even sectors that is about N²/F, against N²/2 for the whole
 * airspace at once.
 */

import type { DronePoint } from '../vocabulary'

/**
 * Euclidean distance between two drones
 */
export function distance(a: DronePoint, b: DronePoint): number {
  const dx = a.x - b.x
  const dy = a.y - b.y
  return Math.sqrt(dx * dx + dy * dy)
}

/**
 * Whether two drones are in conflict (strictly closer than the radius)
 */
export function inConflict(
  a: DronePoint,
  b: DronePoint,
  conflictRadius: number,
): boolean {
  return distance(a, b) < conflictRadius
}

/**
 * Number of unordered pairs checked for a bucket of `count` drones
 */
export function countComparisons(count: number): number {
  return count < 2 ? 0 : (count * (count - 1)) / 2
}

/**
 * Find drones in conflict within one sector.
 *
 * Both ids are pushed once per conflicting pair, so an id repeats when a
 * drone conflicts with several others. Deduplication happens in the
 * aggregator.
 *
 * @returns Ids of conflicting drones, with repeats
 */
export function scanSector(
  drones: ReadonlyArray<DronePoint>,
  conflictRadius: number,
): Array<number> {
  const conflicts: Array<number> = []
  if (drones.length < 2) return conflicts

  // Each unordered pair once
  for (let a = 0; a < drones.length; a++) {
    const droneA = drones[a]
    for (let b = a + 1; b < drones.length; b++) {
      const droneB = drones[b]
      if (inConflict(droneA, droneB, conflictRadius)) {
        conflicts.push(droneA.id, droneB.id)
      }
    }
  }

  return conflicts
}
