/**
 * Drone construction from raw positions
 */

import type { Coordinate, DronePoint } from '../vocabulary'

/**
 * Turn raw positions into drones; the id is the position's index.
 *
 * @param count - Only the first `count` positions (defaults to all)
 */
export function toDronePoints(
  coordinates: ReadonlyArray<Coordinate>,
  count: number = coordinates.length,
): Array<DronePoint> {
  return coordinates
    .slice(0, count)
    .map(([x, y], id) => Object.freeze({ id, x, y }))
}

export function formatDrone(drone: DronePoint): string {
  return `Drone ${drone.id} @ (x,y) (${drone.x}, ${drone.y})`
}
