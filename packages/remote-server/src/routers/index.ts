export * as HealthRouter from './health/index.js'
export * as McpRouter from './mcp/index.js'
