export * from './types.js'
export * from './graph.js'
export * from './analyzer.js'
export * from './suggestions.js'
