/**
 * Grid Builder Tests
 *
 * Boundary sequences, sector map storage and argument validation.
 */

import { describe, expect, it } from 'vitest'
import {
  SectorSearchError,
  addToSector,
  buildBoundaries,
  getOccupiedSectors,
  getSectorDrones,
  isValidSector,
  sectorKey,
  sectorKeywords,
  splitIntoSectors,
} from '@airspace/sector-search'
import type { DronePoint } from '@airspace/sector-search'

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('Expected function to throw')
}

describe('buildBoundaries', () => {
  it('should step by radius * padMult and end at the airspace size', () => {
    expect(buildBoundaries(20, 4, 2)).toEqual([0, 8, 16, 20])
  })

  it('should not repeat the airspace size when it is a multiple of the width', () => {
    expect(buildBoundaries(16, 4, 2)).toEqual([0, 8, 16])
  })

  it('should keep a shorter final segment', () => {
    expect(buildBoundaries(10, 1.5, 2)).toEqual([0, 3, 6, 9, 10])
  })

  it('should produce a single sector when the width covers the airspace', () => {
    expect(buildBoundaries(20, 4, 5)).toEqual([0, 20])
  })

  it('should default padMult to 10', () => {
    const boundaries = buildBoundaries(128_000, 500)

    expect(boundaries).toHaveLength(27)
    expect(boundaries[1]).toBe(5000)
    expect(boundaries[25]).toBe(125_000)
    expect(boundaries[26]).toBe(128_000)
  })

  it('should be monotonically increasing from 0', () => {
    const boundaries = buildBoundaries(1000, 7, 3)

    expect(boundaries[0]).toBe(0)
    expect(boundaries[boundaries.length - 1]).toBe(1000)
    for (let i = 1; i < boundaries.length; i++) {
      expect(boundaries[i]).toBeGreaterThan(boundaries[i - 1])
    }
  })

  describe('validation', () => {
    it.each([
      { label: 'zero radius', airspaceSize: 20, conflictRadius: 0, padMult: 2 },
      { label: 'negative airspace', airspaceSize: -20, conflictRadius: 4, padMult: 2 },
      { label: 'fractional padMult', airspaceSize: 20, conflictRadius: 4, padMult: 1.5 },
      { label: 'zero padMult', airspaceSize: 20, conflictRadius: 4, padMult: 0 },
      { label: 'padMult of 1', airspaceSize: 20, conflictRadius: 1.3, padMult: 1 },
      { label: 'too many sectors', airspaceSize: 1e9, conflictRadius: 1e-3, padMult: 2 },
      { label: 'NaN radius', airspaceSize: 20, conflictRadius: Number.NaN, padMult: 2 },
      {
        label: 'infinite airspace',
        airspaceSize: Number.POSITIVE_INFINITY,
        conflictRadius: 4,
        padMult: 2,
      },
    ])('should reject $label', ({ airspaceSize, conflictRadius, padMult }) => {
      const error = captureError(() =>
        buildBoundaries(airspaceSize, conflictRadius, padMult),
      )

      expect(error).toBeInstanceOf(SectorSearchError)
      expect(error).toMatchObject({
        code: sectorKeywords.errorCodes.invalidArgument,
      })
    })

    it('should name the offending argument', () => {
      expect(() => buildBoundaries(20, 0, 2)).toThrow(
        /^Invalid grid arguments: conflictRadius: /,
      )
    })

    it('should cap the number of sectors per axis', () => {
      expect(() => buildBoundaries(1e9, 1e-3, 2)).toThrow(
        'Invalid grid arguments: airspaceSize: spans more than 1000000 sectors per axis at this conflictRadius and padMult',
      )
      expect(buildBoundaries(2_000_000, 1, 2)).toHaveLength(1_000_001)
    })
  })
})

describe('splitIntoSectors', () => {
  it('should return boundaries and an empty map one cell wider', () => {
    const { boundaries, sectors } = splitIntoSectors(20, 4, 2)

    expect(boundaries).toEqual([0, 8, 16, 20])
    expect(sectors.dimension).toBe(5)
    expect(sectors.buckets.size).toBe(0)
  })
})

describe('sector map', () => {
  const drone: DronePoint = { id: 7, x: 1, y: 2 }

  it('should key sectors by "x,y"', () => {
    expect(sectorKey({ x: 1, y: 2 })).toBe('1,2')
  })

  it('should store shared drone references', () => {
    const { sectors } = splitIntoSectors(20, 4, 2)

    addToSector(sectors, { x: 1, y: 2 }, drone)

    expect(getSectorDrones(sectors, { x: 1, y: 2 })[0]).toBe(drone)
  })

  it('should read a sector with no bucket as empty', () => {
    const { sectors } = splitIntoSectors(20, 4, 2)

    expect(getSectorDrones(sectors, { x: 4, y: 4 })).toEqual([])
  })

  it('should tell sectors inside the map from those outside', () => {
    const { sectors } = splitIntoSectors(20, 4, 2)

    expect(isValidSector({ x: 4, y: 0 }, sectors)).toBe(true)
    expect(isValidSector({ x: 5, y: 0 }, sectors)).toBe(false)
    expect(isValidSector({ x: 0, y: -1 }, sectors)).toBe(false)
  })

  it('should list only occupied sectors', () => {
    const { sectors } = splitIntoSectors(20, 4, 2)
    const other: DronePoint = { id: 8, x: 3, y: 3 }

    addToSector(sectors, { x: 0, y: 0 }, drone)
    addToSector(sectors, { x: 0, y: 0 }, other)
    addToSector(sectors, { x: 2, y: 1 }, other)

    expect(getOccupiedSectors(sectors)).toEqual([[drone, other], [other]])
  })
})
