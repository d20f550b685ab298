export * from './types.js'
export * from './in_memory.js'
export * from './result_cache.js'
