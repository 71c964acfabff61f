/**
 * Sector Search - Pipeline
 *
 * Counts drones flying too close to one another.
 *
 * Logic:
 * 1. Validate options and positions
 * 2. Split the airspace into overlapping sectors
 * 3. Assign each drone to the sectors it lies in
 * 4. Scan each sector for conflicting pairs
 * 5. Merge the flagged ids and count the distinct ones
 *
 * Sector scans are independent once assignment is done, so the async
 * variant fans them out in batches; both variants return the same count.
 */

import { fanOut } from '@airspace/system'
import { sectorKeywords } from '../vocabulary'
import type {
  AsyncSearchOptionsInput,
  DronePositions,
  SearchOptionsInput,
} from '../vocabulary'
import { collectConflictIds, scanSector } from '../matching'
import { getOccupiedSectors } from '../spatial'
import { collectDiagnostics, reportDiagnostics } from './diagnostics'
import type { DiagnosticsCallback } from './diagnostics'
import {
  parseAsyncSearchOptions,
  parseSearchOptions,
  prepareSearch,
} from './prepare'
import type { PreparedSearch } from './prepare'

// ============================================================================
// Types
// ============================================================================

export type SearchOptions = SearchOptionsInput & {
  /** Receives diagnostics after each search when `debug` is set */
  onDiagnostics?: DiagnosticsCallback
}

export type AsyncSearchOptions = AsyncSearchOptionsInput & {
  onDiagnostics?: DiagnosticsCallback
}

// ============================================================================
// Pipeline
// ============================================================================

function finishSearch(
  prepared: PreparedSearch,
  idLists: ReadonlyArray<ReadonlyArray<number>>,
  onDiagnostics?: DiagnosticsCallback,
): Set<number> {
  const { stopwatch, config } = prepared
  stopwatch.lap(sectorKeywords.phases.scan)

  const ids = collectConflictIds(idLists)
  stopwatch.lap(sectorKeywords.phases.aggregate)

  if (config.debug) {
    const buckets = getOccupiedSectors(prepared.sectors)
    reportDiagnostics(
      collectDiagnostics(prepared, buckets, idLists, ids.size),
      onDiagnostics,
    )
  }

  return ids
}

function runSearch(
  points: DronePositions,
  options: SearchOptions,
): Set<number> {
  const prepared = prepareSearch(points, parseSearchOptions(options))
  const { conflictRadius } = prepared.config

  const idLists = getOccupiedSectors(prepared.sectors).map((drones) =>
    scanSector(drones, conflictRadius),
  )

  return finishSearch(prepared, idLists, options.onDiagnostics)
}

/**
 * Count the drones in conflict over an airspace
 *
 * @param points - [x, y] position of each drone, in the same units as the
 *   radius and airspace size
 * @returns Number of distinct drones with at least one other drone strictly
 *   closer than `conflictRadius`
 * @throws {SectorSearchError} before any processing, for invalid options or
 *   positions
 *
 * @example
 * ```ts
 * countConflicts([[0, 0], [2, 2], [15, 15]], {
 *   conflictRadius: 4,
 *   airspaceSize: 20,
 * }) // 2
 * ```
 */
export function countConflicts(
  points: DronePositions,
  options: SearchOptions,
): number {
  return runSearch(points, options).size
}

/**
 * Ids (input indices) of the drones in conflict, ascending
 */
export function findConflictingDrones(
  points: DronePositions,
  options: SearchOptions,
): Array<number> {
  return Array.from(runSearch(points, options)).sort((a, b) => a - b)
}

/**
 * Same count as `countConflicts`, scanning sectors in fan-out batches of
 * `batchSize` and yielding to the event loop between batches.
 */
export async function countConflictsAsync(
  points: DronePositions,
  options: AsyncSearchOptions,
): Promise<number> {
  const config = parseAsyncSearchOptions(options)
  const prepared = prepareSearch(points, config)

  const idLists = await fanOut(
    getOccupiedSectors(prepared.sectors),
    (drones) => scanSector(drones, config.conflictRadius),
    { batchSize: config.batchSize },
  )

  return finishSearch(prepared, idLists, options.onDiagnostics).size
}
