export * from './types.js'
export * from './errorHandler.js'
export * from './autoFix.js'
