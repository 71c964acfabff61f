/**
 * Brute-Force Reference
 *
 * The O(N²) all-pairs check over every drone at once: one scan of a single
 * bucket holding the whole airspace. Sector search must always agree with it.
 */

import {
  invalidArgument,
  searchOptionsSchema,
  validateDroneCoordinates,
} from '../vocabulary'
import type { DronePoint, DronePositions } from '../vocabulary'
import { collectConflictIds, scanSector } from '../matching'
import { toDronePoints } from './drones'

const radiusSchema = searchOptionsSchema.shape.conflictRadius

export function findConflictsBruteForce(
  drones: ReadonlyArray<DronePoint>,
  conflictRadius: number,
): Set<number> {
  return collectConflictIds([scanSector(drones, conflictRadius)])
}

/**
 * Count drones in conflict by comparing every pair
 */
export function countConflictsBruteForce(
  points: DronePositions,
  conflictRadius: number,
): number {
  const radius = radiusSchema.safeParse(conflictRadius)
  if (!radius.success) {
    throw invalidArgument('conflict radius', radius.error)
  }

  const coordinates = validateDroneCoordinates(points)
  if (!coordinates.success) {
    throw invalidArgument('drone positions', coordinates.error)
  }

  return findConflictsBruteForce(toDronePoints(coordinates.data), radius.data).size
}
