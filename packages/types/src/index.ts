/**
 * Centralized type definitions for the light-client argument pipeline
 */

// Consensus parameters and chain state
export * from './consensus'
// Error kinds
export * from './errors'
// Field-element values
export * from './field'
// Header records
export * from './header'
// Safe types
export * from './safe'
