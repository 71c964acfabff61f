/**
 * Sector Search - Preparation
 *
 * Validation and the first pipeline stages shared by the sync and async
 * searches: parse options, check positions, build the grid, assign drones.
 * Every failure is thrown here, before any scanning.
 */

import { createStopwatch } from '@airspace/system'
import type { Stopwatch } from '@airspace/system'
import {
  SectorSearchError,
  asyncSearchOptionsSchema,
  invalidArgument,
  sectorKeywords,
  validateDroneCoordinates,
  validateSearchOptions,
} from '../vocabulary'
import type {
  AsyncSearchConfig,
  Coordinate,
  DronePoint,
  SearchConfig,
} from '../vocabulary'
import { assignToSectors, splitIntoSectors } from '../spatial'
import type { SectorMap } from '../spatial'
import { formatDrone, toDronePoints } from './drones'

// ============================================================================
// Types
// ============================================================================

export type PreparedSearch = {
  config: SearchConfig
  drones: Array<DronePoint>
  boundaries: Array<number>
  sectors: SectorMap
  insertions: number
  stopwatch: Stopwatch
}

// ============================================================================
// Option Parsing
// ============================================================================

export function parseSearchOptions(options: unknown): SearchConfig {
  const result = validateSearchOptions(options)
  if (!result.success) {
    throw invalidArgument('search options', result.error)
  }
  return result.data
}

export function parseAsyncSearchOptions(options: unknown): AsyncSearchConfig {
  const result = asyncSearchOptionsSchema.safeParse(options)
  if (!result.success) {
    throw invalidArgument('search options', result.error)
  }
  return result.data
}

// ============================================================================
// Position Checks
// ============================================================================

/**
 * Validate positions against the options.
 *
 * @returns Parsed positions
 * @throws {SectorSearchError} for malformed positions, a limit above the
 *   number of positions, or (reject policy) a position outside the airspace
 */
export function checkPositions(
  points: unknown,
  config: SearchConfig,
): Array<Coordinate> {
  const result = validateDroneCoordinates(points)
  if (!result.success) {
    throw invalidArgument('drone positions', result.error)
  }
  const coordinates = result.data

  if (config.limit > coordinates.length) {
    const issue = `limit: ${config.limit} exceeds the ${coordinates.length} drones available`
    throw new SectorSearchError(
      sectorKeywords.errorCodes.invalidArgument,
      `Invalid search options: ${issue}`,
      [issue],
    )
  }

  if (config.outOfBounds === sectorKeywords.outOfBounds.reject) {
    const outside = coordinates.findIndex(
      ([x, y]) =>
        x < 0 || y < 0 || x > config.airspaceSize || y > config.airspaceSize,
    )
    if (outside !== -1) {
      const [x, y] = coordinates[outside]
      const issue = `${formatDrone({ id: outside, x, y })} lies outside the airspace [0, ${config.airspaceSize}]`
      throw new SectorSearchError(
        sectorKeywords.errorCodes.outOfBounds,
        issue,
        [issue],
      )
    }
  }

  return coordinates
}

// ============================================================================
// Preparation
// ============================================================================

/**
 * Validate positions, build the grid and assign the processed drones.
 *
 * Under the clamp policy coordinates are clamped into the airspace for
 * sector lookup only; drones keep their real coordinates for distances.
 */
export function prepareSearch(
  points: unknown,
  config: SearchConfig,
): PreparedSearch {
  const stopwatch = createStopwatch()
  const coordinates = checkPositions(points, config)

  const count =
    config.limit === sectorKeywords.limit.all ? coordinates.length : config.limit
  const drones = toDronePoints(coordinates, count)

  const { boundaries, sectors } = splitIntoSectors(
    config.airspaceSize,
    config.conflictRadius,
    config.padMult,
  )

  const project =
    config.outOfBounds === sectorKeywords.outOfBounds.clamp
      ? (coordinate: number) =>
          Math.max(0, Math.min(config.airspaceSize, coordinate))
      : undefined

  const insertions = assignToSectors(drones, boundaries, sectors, project)
  stopwatch.lap(sectorKeywords.phases.assign)

  return { config, drones, boundaries, sectors, insertions, stopwatch }
}
