export * from './flags/index.js'
export * from './config/index.js'
export * from './io/index.js'
export * from './cli/index.js'
