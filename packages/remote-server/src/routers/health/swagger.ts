import type { RouteConfig } from '@asteasolutions/zod-to-openapi'
import { ToolSchemas } from '../../schemas/index.js'

export const health: RouteConfig = {
  method: 'get',
  path: '/health',
  tags: ['Health'],
  summary: 'Liveness probe with the number of registered tools',
  responses: {
    200: {
      description: 'Server is up',
      content: { 'application/json': { schema: ToolSchemas.HealthResponse } },
    },
  },
}

export const doc: RouteConfig[] = [health]
