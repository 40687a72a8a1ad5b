export * from './chain-state'
export * from './header-record'
