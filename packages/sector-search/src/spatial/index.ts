/**
 * Spatial Module
 *
 * Pure functions for partitioning the airspace:
 * - Grid builder (boundaries and sector map)
 * - Cell mapper (coordinate to overlapping sectors)
 * - Assigner (drones into sector buckets)
 */

// Grid builder and sector map
export * from './grid'

// Cell mapper
export * from './mapping'

// Assigner
export * from './assign'
