/**
 * Sector Search - Grid Builder
 *
 * Splits the square airspace into overlapping sectors.
 *
 * Responsibilities:
 * - Build the boundary sequence for one axis (the airspace is square, so the
 *   same sequence serves both axes)
 * - Create the sector map drones are assigned into
 *
 * Sectors overlap by a full sector width: a coordinate belongs to two
 * adjacent sectors per axis.
 *
 *     boundaries  [0     10      20      30      40 ...]
 *                  |--sector 1---|
 *                         |--sector 2---|
 *                                 |--sector 3---| ...
 *
 * Two drones closer than the conflict radius always share a sector as long
 * as the sector width is at least the radius.
 */

import { invalidArgument, searchOptionsSchema, sectorKeywords } from '../vocabulary'
import type { DronePoint } from '../vocabulary'

// ============================================================================
// Types
// ============================================================================

/**
 * Sector indices along x and y
 */
export type Sector = {
  x: number
  y: number
}

/**
 * Sector buckets keyed by `"x,y"`.
 *
 * `dimension` is one more than the boundary count, leaving room for the
 * fictitious sector past the last boundary. Buckets are created on first
 * insertion; a key with no bucket reads as an empty sector.
 */
export type SectorMap = {
  dimension: number
  buckets: Map<string, Array<DronePoint>>
}

export type SectorGrid = {
  boundaries: Array<number>
  sectors: SectorMap
}

const { maxSegmentsPerAxis } = sectorKeywords.grid

const gridArgsSchema = searchOptionsSchema
  .pick({
    airspaceSize: true,
    conflictRadius: true,
    padMult: true,
  })
  .refine(
    ({ airspaceSize, conflictRadius, padMult }) =>
      airspaceSize / (conflictRadius * padMult) <= maxSegmentsPerAxis,
    {
      message: `spans more than ${maxSegmentsPerAxis} sectors per axis at this conflictRadius and padMult`,
      path: ['airspaceSize'],
    },
  )

// ============================================================================
// Boundaries
// ============================================================================

/**
 * Build the boundary sequence for one axis.
 *
 * Every multiple of `conflictRadius * padMult` below `airspaceSize`, then
 * `airspaceSize` itself so no stragglers are lost past the last full sector.
 * `padMult` is at least 2: a `k * width` offset may land an ulp short, and a
 * full interior segment must still be no narrower than the radius.
 *
 * @example
 * buildBoundaries(20, 4, 2) // [0, 8, 16, 20]
 */
export function buildBoundaries(
  airspaceSize: number,
  conflictRadius: number,
  padMult?: number,
): Array<number> {
  const parsed = gridArgsSchema.safeParse({
    airspaceSize,
    conflictRadius,
    padMult,
  })
  if (!parsed.success) {
    throw invalidArgument('grid arguments', parsed.error)
  }

  const width = parsed.data.conflictRadius * parsed.data.padMult
  const boundaries: Array<number> = []

  // k * width rather than a running sum, so offsets don't drift
  for (let k = 0; k * width < parsed.data.airspaceSize; k++) {
    boundaries.push(k * width)
  }
  boundaries.push(parsed.data.airspaceSize)

  return boundaries
}

/**
 * Split the airspace into overlapping sectors
 *
 * @returns Boundary sequence and an empty sector map
 */
export function splitIntoSectors(
  airspaceSize: number,
  conflictRadius: number,
  padMult?: number,
): SectorGrid {
  const boundaries = buildBoundaries(airspaceSize, conflictRadius, padMult)
  return { boundaries, sectors: createSectorMap(boundaries) }
}

// ============================================================================
// Sector Map
// ============================================================================

export function createSectorMap(boundaries: ReadonlyArray<number>): SectorMap {
  return {
    dimension: boundaries.length + 1,
    buckets: new Map(),
  }
}

/**
 * Get sector key for the bucket map
 */
export function sectorKey(sector: Sector): string {
  return `${sector.x},${sector.y}`
}

/**
 * Whether a sector lies inside the map. Every sector the cell mapper
 * produces does, the outer-edge sectors included.
 */
export function isValidSector(sector: Sector, map: SectorMap): boolean {
  return (
    sector.x >= 0 &&
    sector.x < map.dimension &&
    sector.y >= 0 &&
    sector.y < map.dimension
  )
}

/**
 * Add a drone reference to a sector.
 * The sector must come from `mapCoordinate` over the map's own boundaries.
 */
export function addToSector(
  map: SectorMap,
  sector: Sector,
  drone: DronePoint,
): void {
  const key = sectorKey(sector)
  const bucket = map.buckets.get(key)
  if (!bucket) {
    map.buckets.set(key, [drone])
  } else {
    bucket.push(drone)
  }
}

/**
 * Drones in a sector; empty for sectors that never received one
 */
export function getSectorDrones(
  map: SectorMap,
  sector: Sector,
): ReadonlyArray<DronePoint> {
  return map.buckets.get(sectorKey(sector)) ?? []
}

/**
 * Buckets that hold at least one drone
 */
export function getOccupiedSectors(
  map: SectorMap,
): Array<ReadonlyArray<DronePoint>> {
  return Array.from(map.buckets.values())
}
