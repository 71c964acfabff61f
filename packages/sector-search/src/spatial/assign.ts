/**
 * Sector Search - Assigner
 *
 * Places every drone in each sector whose coverage contains it.
 * A drone maps to two sectors per axis, so it lands in four sector buckets;
 * that duplication is what lets a pair straddling a seam meet in a shared
 * sector, and it is resolved later by the aggregator.
 */

import type { DronePoint } from '../vocabulary'
import { addToSector } from './grid'
import type { Sector, SectorMap } from './grid'
import { mapCoordinate } from './mapping'

/**
 * The four sectors a drone belongs to: (xLo, yLo), (xLo, yHi), (xHi, yLo), (xHi, yHi)
 *
 * @param project - Maps a coordinate before sector lookup (clamping policy)
 */
export function sectorsForDrone(
  drone: DronePoint,
  boundaries: ReadonlyArray<number>,
  project: (coordinate: number) => number = (coordinate) => coordinate,
): Array<Sector> {
  const xs = mapCoordinate(boundaries, project(drone.x))
  const ys = mapCoordinate(boundaries, project(drone.y))

  const sectors: Array<Sector> = []
  for (const x of xs) {
    for (const y of ys) {
      sectors.push({ x, y })
    }
  }
  return sectors
}

/**
 * Assign drones to the sector map (mutates `sectors`)
 *
 * @returns Number of bucket insertions
 */
export function assignToSectors(
  drones: ReadonlyArray<DronePoint>,
  boundaries: ReadonlyArray<number>,
  sectors: SectorMap,
  project?: (coordinate: number) => number,
): number {
  let insertions = 0

  for (const drone of drones) {
    for (const sector of sectorsForDrone(drone, boundaries, project)) {
      addToSector(sectors, sector, drone)
      insertions++
    }
  }

  return insertions
}
