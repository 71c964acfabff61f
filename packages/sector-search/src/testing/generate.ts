/**
 * Drone Position Generator
 *
 * Seeded positions for tests and benchmarks. The same seed always yields
 * the same airspace, so benchmark runs are comparable.
 */

import { z } from 'zod'
import { invalidArgument, searchOptionsSchema } from '../vocabulary'
import type { Coordinate } from '../vocabulary'

export const generatorOptionsSchema = z.object({
  count: z.number().int().nonnegative(),
  airspaceSize: searchOptionsSchema.shape.airspaceSize,
  seed: z.number().int().default(1),
  /** Truncate coordinates to whole units */
  integer: z.boolean().default(false),
})

export type GeneratorOptions = z.input<typeof generatorOptionsSchema>

/**
 * mulberry32: small 32-bit PRNG returning floats in [0, 1)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0

  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Generate drone positions uniformly spread over [0, airspaceSize)
 */
export function generateDronePositions(
  options: GeneratorOptions,
): Array<Coordinate> {
  const parsed = generatorOptionsSchema.safeParse(options)
  if (!parsed.success) {
    throw invalidArgument('generator options', parsed.error)
  }

  const { count, airspaceSize, seed, integer } = parsed.data
  const random = createRandom(seed)
  const coordinate = () => {
    const value = random() * airspaceSize
    return integer ? Math.floor(value) : value
  }

  return Array.from({ length: count }, () => [coordinate(), coordinate()] as const)
}

/**
 * Generate `count` positions packed within `spread` of a center point
 */
export function generateCluster(
  count: number,
  center: Coordinate,
  spread: number,
  seed = 1,
): Array<Coordinate> {
  const random = createRandom(seed)
  return Array.from(
    { length: count },
    () =>
      [
        center[0] + (random() - 0.5) * spread,
        center[1] + (random() - 0.5) * spread,
      ] as const,
  )
}
