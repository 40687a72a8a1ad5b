/**
 * Utility exports
 */

export * from './hex'
