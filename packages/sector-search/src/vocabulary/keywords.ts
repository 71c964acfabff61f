/**
 * Sector Search Keywords
 *
 * Single source of truth for all sector-search constants.
 *
 * Philosophy:
 * - No magic strings or numbers anywhere in the codebase
 * - Defaults live here, never as module-level airspace state
 */

export const sectorKeywords = {
  /**
   * Option defaults
   */
  defaults: {
    /** Sector width in conflict radii */
    padMult: 10,
    /** Sectors scanned per fan-out batch (async search) */
    batchSize: 64,
  },

  /**
   * Grid bounds. Sectors at least two radii wide keep every conflicting
   * pair inside a shared sector even when boundary offsets round down.
   */
  grid: {
    minPadMult: 2,
    maxSegmentsPerAxis: 1_000_000,
  },

  /**
   * `limit` sentinel meaning "process every drone"
   */
  limit: {
    all: -1,
  },

  /**
   * Policy for coordinates outside [0, airspaceSize]
   */
  outOfBounds: {
    reject: 'reject',
    clamp: 'clamp',
  },

  errorCodes: {
    invalidArgument: 'invalid-argument',
    outOfBounds: 'out-of-bounds',
  },

  /**
   * Pipeline phases, used as stopwatch labels
   */
  phases: {
    assign: 'assign',
    scan: 'scan',
    aggregate: 'aggregate',
  },

  /**
   * Benchmark defaults: 128 km airspace, 500 m separation, 10k drones
   */
  benchmark: {
    airspaceSize: 128_000,
    conflictRadius: 500,
    droneCount: 10_000,
    seed: 1,
  },

  logTag: '[SectorSearch]',
} as const

// ============================================================================
// Type Exports
// ============================================================================

export type OutOfBoundsPolicy =
  (typeof sectorKeywords.outOfBounds)[keyof typeof sectorKeywords.outOfBounds]

export type SectorSearchErrorCode =
  (typeof sectorKeywords.errorCodes)[keyof typeof sectorKeywords.errorCodes]

export type SearchPhase =
  (typeof sectorKeywords.phases)[keyof typeof sectorKeywords.phases]
