export * from './blocklist'
export * from './contracts'
export * from './engine'
export * from './errors'
export * from './flags'
export * from './grouping'
