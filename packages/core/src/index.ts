/**
 * Core package: logging, environment, record schemas and hex helpers
 */

export * from './env'
export * from './logger'
export * from './schemas'
export * from './utils'
