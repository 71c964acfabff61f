/**
 * @airspace/system
 *
 * Generic system utilities shared by the airspace packages.
 * Nothing here knows about drones or sectors.
 *
 * ## Modules
 *
 * ### Fan-Out
 * Batched fan-out/fan-in of independent jobs, yielding to the event loop
 * between batches.
 *
 * ### Stopwatch
 * Lap timer for phase timings, with an injectable clock.
 */

// ============================================================================
// Fan-Out
// ============================================================================

export * from './fanOut'

// ============================================================================
// Stopwatch
// ============================================================================

export * from './stopwatch'
