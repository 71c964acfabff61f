/**
 * @airspace/sector-search
 *
 * Counts drones flying too close to one another, using overlapping sectors
 * instead of comparing every pair.
 *
 * @example
 * ```ts
 * import { countConflicts } from '@airspace/sector-search'
 *
 * countConflicts(positions, { conflictRadius: 500, airspaceSize: 128_000 })
 * ```
 */

// ============================================================================
// Vocabulary - Keywords, schemas and errors
// ============================================================================

export * from './vocabulary'

// ============================================================================
// Spatial - Grid builder, cell mapper, assigner
// ============================================================================

export * from './spatial'

// ============================================================================
// Matching - Cell scanner and aggregator
// ============================================================================

export * from './matching'

// ============================================================================
// Core - Pipeline, brute-force reference, diagnostics
// ============================================================================

export * from './core'

// ============================================================================
// Testing - Seeded position generators
// ============================================================================

export * from './testing'

// ============================================================================
// Package Metadata
// ============================================================================

export const PACKAGE_NAME = '@airspace/sector-search'
export const VERSION = '0.1.0'
