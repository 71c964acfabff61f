/**
 * Sector Search - Cell Mapper
 *
 * Maps a coordinate along one axis to the two overlapping sectors it falls in.
 */

/**
 * Pair of sector indices along one axis; `hi` is always `lo + 1`
 */
export type AxisSectors = readonly [lo: number, hi: number]

/**
 * Index of the first boundary strictly greater than `position`,
 * or `boundaries.length` when there is none.
 */
function upperBound(boundaries: ReadonlyArray<number>, position: number): number {
  let low = 0
  let high = boundaries.length

  while (low < high) {
    const mid = (low + high) >>> 1
    if (boundaries[mid] > position) {
      high = mid
    } else {
      low = mid + 1
    }
  }

  return low
}

/**
 * Determine the sectors `position` falls in along one axis.
 *
 * `hi` is the index of the first boundary strictly greater than `position`
 * and `lo = hi - 1`, so a position exactly on a boundary belongs to the
 * sector whose boundary lies above it. Past the last boundary (the outer
 * edge itself) `hi` clamps to the last index; below the first boundary it
 * clamps to 1.
 *
 * The outer sectors cover a fictitious strip outside the airspace; they
 * only ever hold edge drones.
 *
 * @example
 * mapCoordinate([0, 10, 20, 30, 40], 17) // [1, 2]
 */
export function mapCoordinate(
  boundaries: ReadonlyArray<number>,
  position: number,
): AxisSectors {
  const last = boundaries.length - 1
  const hi = Math.max(1, Math.min(upperBound(boundaries, position), last))
  return [hi - 1, hi]
}
