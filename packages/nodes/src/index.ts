export * from './types/index.js'
export * from './registry.js'
export * from './validator.js'
