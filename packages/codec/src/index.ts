/**
 * Codec package: field-value serialization, tuple flattening and the
 * program-argument layout
 */

export * from './field-value'
export * from './flatten'
export * from './json-shim'
export * from './program-args'
export * from './serialize'
