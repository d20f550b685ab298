import type { RouteConfig } from '@asteasolutions/zod-to-openapi'
import { CommonSchemas, ToolSchemas } from '../../schemas/index.js'

export const TOOLS = 'Tools'
export const basePath = '/mcp'

export const listTools: RouteConfig = {
  method: 'get',
  path: `${basePath}/tools`,
  tags: [TOOLS],
  summary: 'List the available tools',
  description: 'Every tool with its description and the JSON schema of its parameters.',
  responses: {
    200: {
      description: 'Tool list',
      content: { 'application/json': { schema: ToolSchemas.ToolList } },
    },
  },
}

export const execute: RouteConfig = {
  method: 'post',
  path: `${basePath}/execute`,
  tags: [TOOLS],
  summary: 'Run a tool',
  description: `
Runs the named tool with the given parameters and returns its result under \`result\`.

Tool-level problems (an unreadable project, an unknown node type) are reported inside
\`result\` as \`{ success: false, error }\`; the HTTP status is then still 200.
  `.trim(),
  request: {
    body: {
      content: { 'application/json': { schema: ToolSchemas.ExecuteRequest } },
    },
  },
  responses: {
    200: {
      description: 'Tool ran',
      content: { 'application/json': { schema: ToolSchemas.ExecuteResponse } },
    },
    400: {
      description: 'Request or tool parameters failed validation',
      content: { 'application/json': { schema: CommonSchemas.ValidationError } },
    },
    404: {
      description: 'Unknown tool',
      content: { 'application/json': { schema: CommonSchemas.ErrorResponse } },
    },
    500: {
      description: 'Tool failed',
      content: { 'application/json': { schema: CommonSchemas.ErrorResponse } },
    },
  },
}

export const doc: RouteConfig[] = [listTools, execute]
