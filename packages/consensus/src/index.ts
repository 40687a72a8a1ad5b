/**
 * Consensus package: activation rules, compact targets, Equihash solutions,
 * chain-state tracking and header formatting
 */

export * from './activation'
export * from './bootstrap'
export * from './chain-state'
export * from './compact-target'
export * from './equihash'
export * from './generate'
export * from './header'
export * from './header-source'
export * from './params'
export * from './rolling-window'
