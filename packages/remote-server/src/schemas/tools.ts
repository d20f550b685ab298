import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const ExecuteRequest = z
  .object({
    tool: z.string().min(1),
    parameters: z.record(z.string(), z.unknown()).default({}),
  })
  .openapi('ExecuteRequest')
export type ExecuteRequestType = z.infer<typeof ExecuteRequest>

export const ToolInfo = z
  .object({
    name: z.string(),
    description: z.string(),
    input_schema: z.record(z.string(), z.unknown()),
  })
  .openapi('ToolInfo')
export type ToolInfoType = z.infer<typeof ToolInfo>

export const ToolList = z
  .object({
    success: z.literal(true),
    tools: z.array(ToolInfo),
  })
  .openapi('ToolList')

export const ExecuteResponse = z
  .object({
    success: z.literal(true),
    tool: z.string(),
    result: z.unknown(),
  })
  .openapi('ExecuteResponse')

export const HealthResponse = z
  .object({
    status: z.literal('healthy'),
    tools: z.number().int(),
  })
  .openapi('HealthResponse')

const Document = z.record(z.string(), z.unknown())

const DataSource = z.object({ project_data: Document })
const PathSource = z.object({ project_path: z.string().min(1) })

export const ValidateWorkflowParams = z.object({
  workflow: Document,
  strict_mode: z.boolean().default(false),
})

export const ProjectParams = z.union([DataSource, PathSource])

const RepairFlags = {
  auto_fix: z.boolean().default(true),
  backup: z.boolean().default(true),
}
export const RepairParams = z.union([
  DataSource.extend(RepairFlags),
  PathSource.extend(RepairFlags),
])

export const OptimizeParams = z.union([z.object({ workflow: Document }), DataSource, PathSource])

const ContextNode = z.object({
  id: z.number().int().optional(),
  type: z.string(),
  name: z.string().optional(),
  properties: z.record(z.string(), z.unknown()).optional(),
})

export const SuggestParams = z.object({
  current_nodes: z.array(z.string()),
  context: z.object({ nodes: z.array(ContextNode).optional() }).default({}),
})

export const NodeTypeParams = z.object({ node_type: z.string().min(1) })

export const PatternParams = z.object({ directory: z.string().min(1) })

export const VerifyParams = PathSource
