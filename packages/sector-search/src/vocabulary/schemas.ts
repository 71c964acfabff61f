/**
 * Sector Search Schemas
 *
 * Zod schemas for everything crossing the public API: drone positions and
 * search options. Types are inferred from the schemas.
 *
 * Units are whatever the caller uses (meters by convention), as long as
 * positions, radius and airspace size agree.
 */

import { z } from 'zod'
import { sectorKeywords } from './keywords'

// ============================================================================
// Positions
// ============================================================================

/**
 * One drone position: exactly two finite numbers, [x, y]
 */
export const coordinateSchema = z.tuple([z.number().finite(), z.number().finite()])

export type Coordinate = readonly [number, number]

export const droneCoordinatesSchema = z.array(coordinateSchema)

/**
 * Positions as accepted from callers; each entry is checked against
 * `coordinateSchema` before use
 */
export type DronePositions = ReadonlyArray<ReadonlyArray<number>>

/**
 * Drone inside the pipeline. `id` is the index of its position in the
 * input sequence.
 */
export const dronePointSchema = z
  .object({
    id: z.number().int().nonnegative(),
    x: z.number().finite(),
    y: z.number().finite(),
  })
  .readonly()

export type DronePoint = z.infer<typeof dronePointSchema>

// ============================================================================
// Options
// ============================================================================

export const searchOptionsSchema = z.object({
  conflictRadius: z.number().finite().positive(),
  airspaceSize: z.number().finite().positive(),
  padMult: z
    .number()
    .int()
    .min(sectorKeywords.grid.minPadMult)
    .default(sectorKeywords.defaults.padMult),
  limit: z
    .number()
    .int()
    .min(sectorKeywords.limit.all)
    .default(sectorKeywords.limit.all),
  debug: z.boolean().default(false),
  outOfBounds: z
    .enum([sectorKeywords.outOfBounds.reject, sectorKeywords.outOfBounds.clamp])
    .default(sectorKeywords.outOfBounds.reject),
})

/** Options as accepted from callers (defaults optional) */
export type SearchOptionsInput = z.input<typeof searchOptionsSchema>

/** Options after parsing (defaults applied) */
export type SearchConfig = z.output<typeof searchOptionsSchema>

export const asyncSearchOptionsSchema = searchOptionsSchema.extend({
  batchSize: z
    .number()
    .int()
    .positive()
    .default(sectorKeywords.defaults.batchSize),
})

export type AsyncSearchOptionsInput = z.input<typeof asyncSearchOptionsSchema>

export type AsyncSearchConfig = z.output<typeof asyncSearchOptionsSchema>

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate search options
 */
export function validateSearchOptions(options: unknown) {
  return searchOptionsSchema.safeParse(options)
}

/**
 * Validate drone positions
 */
export function validateDroneCoordinates(points: unknown) {
  return droneCoordinatesSchema.safeParse(points)
}
