/**
 * Core Module
 *
 * Pipeline orchestration, the brute-force reference and diagnostics.
 */

// Pipeline
export * from './sectorSearch'

// Brute-force reference
export * from './bruteForce'

// Diagnostics
export * from './diagnostics'

// Drone construction
export * from './drones'
