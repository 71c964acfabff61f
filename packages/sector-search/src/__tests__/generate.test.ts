/**
 * Position Generator Tests
 */

import { describe, expect, it } from 'vitest'
import {
  SectorSearchError,
  createRandom,
  generateCluster,
  generateDronePositions,
} from '@airspace/sector-search'

describe('createRandom', () => {
  it('should repeat the sequence for the same seed', () => {
    const a = createRandom(42)
    const b = createRandom(42)

    for (let i = 0; i < 10; i++) {
      expect(a()).toBe(b())
    }
  })

  it('should stay within [0, 1)', () => {
    const random = createRandom(3)

    for (let i = 0; i < 1000; i++) {
      const value = random()
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })
})

describe('generateDronePositions', () => {
  it('should generate the requested count inside the airspace', () => {
    const positions = generateDronePositions({ count: 200, airspaceSize: 50, seed: 5 })

    expect(positions).toHaveLength(200)
    for (const [x, y] of positions) {
      expect(x).toBeGreaterThanOrEqual(0)
      expect(x).toBeLessThan(50)
      expect(y).toBeGreaterThanOrEqual(0)
      expect(y).toBeLessThan(50)
    }
  })

  it('should be deterministic per seed', () => {
    const options = { count: 20, airspaceSize: 1000, seed: 9 }

    expect(generateDronePositions(options)).toEqual(generateDronePositions(options))
    expect(generateDronePositions(options)).not.toEqual(
      generateDronePositions({ ...options, seed: 10 }),
    )
  })

  it('should truncate to whole units when asked', () => {
    const positions = generateDronePositions({
      count: 50,
      airspaceSize: 100,
      integer: true,
    })

    for (const [x, y] of positions) {
      expect(Number.isInteger(x)).toBe(true)
      expect(Number.isInteger(y)).toBe(true)
    }
  })

  it('should generate nothing for a zero count', () => {
    expect(generateDronePositions({ count: 0, airspaceSize: 10 })).toEqual([])
  })

  it('should reject invalid options', () => {
    expect(() => generateDronePositions({ count: -1, airspaceSize: 10 })).toThrow(
      SectorSearchError,
    )
    expect(() => generateDronePositions({ count: 5, airspaceSize: 0 })).toThrow(
      /^Invalid generator options: airspaceSize: /,
    )
  })
})

describe('generateCluster', () => {
  it('should keep every position within half the spread of the center', () => {
    const positions = generateCluster(100, [40, 60], 10, 2)

    expect(positions).toHaveLength(100)
    for (const [x, y] of positions) {
      expect(Math.abs(x - 40)).toBeLessThanOrEqual(5)
      expect(Math.abs(y - 60)).toBeLessThanOrEqual(5)
    }
  })
})
