export * as CommonSchemas from './common.js'
export * as ToolSchemas from './tools.js'
