/**
 * Matching Module
 *
 * Conflict detection inside sectors and aggregation across sectors.
 */

// Cell scanner
export * from './scan'

// Aggregator
export * from './aggregate'
