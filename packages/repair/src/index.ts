export * from './types.js'
export * from './workflowValidator.js'
export * from './projectRepair.js'
export * from './service.js'
