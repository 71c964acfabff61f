/**
 * Sector Search Vocabulary
 *
 * Public exports for keywords, schemas and errors.
 */

// Keywords
export * from './keywords'

// Schemas
export * from './schemas'

// Errors
export * from './errors'
