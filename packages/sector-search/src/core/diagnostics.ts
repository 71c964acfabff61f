/**
 * Sector Search - Diagnostics
 *
 * Intermediate counts and phase timings, reported only when `debug` is on.
 * Nothing here feeds back into the returned count.
 */

import { timed } from '@airspace/system'
import { sectorKeywords } from '../vocabulary'
import type { DronePoint } from '../vocabulary'
import { countComparisons } from '../matching'
import { findConflictsBruteForce } from './bruteForce'
import type { PreparedSearch } from './prepare'

// ============================================================================
// Types
// ============================================================================

export type SearchDiagnostics = {
  /** Drones processed (the `limit` prefix) */
  processed: number
  boundaryCount: number
  /** Sectors holding at least one drone */
  occupiedSectors: number
  /** Drone references stored across all sectors */
  insertions: number
  /** Pair distance checks across all sectors */
  comparisons: number
  /** Ids flagged before deduplication */
  flagged: number
  conflicts: number
  /** Milliseconds per phase (assign, scan, aggregate) */
  timings: Record<string, number>
  /** All-pairs comparison, run when `limit` is set */
  bruteForce?: {
    conflicts: number
    elapsedMs: number
  }
}

export type DiagnosticsCallback = (diagnostics: SearchDiagnostics) => void

// ============================================================================
// Collection
// ============================================================================

export function collectDiagnostics(
  prepared: PreparedSearch,
  buckets: ReadonlyArray<ReadonlyArray<DronePoint>>,
  idLists: ReadonlyArray<ReadonlyArray<number>>,
  conflicts: number,
): SearchDiagnostics {
  const diagnostics: SearchDiagnostics = {
    processed: prepared.drones.length,
    boundaryCount: prepared.boundaries.length,
    occupiedSectors: buckets.length,
    insertions: prepared.insertions,
    comparisons: buckets.reduce(
      (total, bucket) => total + countComparisons(bucket.length),
      0,
    ),
    flagged: idLists.reduce((total, ids) => total + ids.length, 0),
    conflicts,
    timings: prepared.stopwatch.laps(),
  }

  // Benchmarking a prefix: compare against the unsectored search
  if (prepared.config.limit !== sectorKeywords.limit.all) {
    const { result, elapsedMs } = timed(() =>
      findConflictsBruteForce(prepared.drones, prepared.config.conflictRadius),
    )
    diagnostics.bruteForce = { conflicts: result.size, elapsedMs }
  }

  return diagnostics
}

// ============================================================================
// Reporting
// ============================================================================

const formatMs = (ms: number | undefined) => (ms ?? 0).toFixed(3)

export function reportDiagnostics(
  diagnostics: SearchDiagnostics,
  onDiagnostics?: DiagnosticsCallback,
): void {
  const tag = sectorKeywords.logTag
  const { timings } = diagnostics
  const { phases } = sectorKeywords

  console.log(
    `${tag} Assigned ${diagnostics.processed} drones to ${diagnostics.occupiedSectors} sectors ` +
      `(${diagnostics.insertions} insertions) in ${formatMs(timings[phases.assign])} ms`,
  )
  console.log(
    `${tag} Scanned ${diagnostics.occupiedSectors} sectors (${diagnostics.comparisons} comparisons) ` +
      `in ${formatMs(timings[phases.scan])} ms. Drones in conflict: ${diagnostics.conflicts}`,
  )

  const { bruteForce } = diagnostics
  if (bruteForce) {
    console.log(
      `${tag} Brute force over ${diagnostics.processed} drones took ${formatMs(bruteForce.elapsedMs)} ms. ` +
        `Drones in conflict: ${bruteForce.conflicts}`,
    )
    if (bruteForce.conflicts !== diagnostics.conflicts) {
      console.warn(
        `${tag} Brute force found ${bruteForce.conflicts} drones in conflict, sector search ${diagnostics.conflicts}`,
      )
    }
  }

  onDiagnostics?.(diagnostics)
}
