import { z } from 'zod'
import type { TerrainService } from '@terrakit/repair'
import { type IssueSchemaType, toIssues } from './schemas/common.js'
import {
  NodeTypeParams,
  OptimizeParams,
  PatternParams,
  ProjectParams,
  RepairParams,
  SuggestParams,
  ValidateWorkflowParams,
  VerifyParams,
} from './schemas/tools.js'

export type ToolCall =
  | { success: true; run: (service: TerrainService) => Promise<unknown> }
  | { success: false; issues: IssueSchemaType[] }

export interface Tool {
  readonly name: string
  readonly description: string
  readonly parameters: z.ZodType
  parse(raw: unknown): ToolCall
}

interface ToolDefinition<S extends z.ZodType> {
  name: string
  description: string
  parameters: S
  run(service: TerrainService, params: z.infer<S>): unknown
}

export function defineTool<S extends z.ZodType>(definition: ToolDefinition<S>): Tool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    parse(raw) {
      const parsed = definition.parameters.safeParse(raw ?? {})
      if (!parsed.success) return { success: false, issues: toIssues(parsed.error) }
      const params = parsed.data
      return { success: true, run: async (service) => definition.run(service, params) }
    },
  }
}

export const TOOLS: readonly Tool[] = [
  defineTool({
    name: 'validate_and_fix_workflow',
    description: 'Validate a {nodes, connections} workflow and return a corrected copy',
    parameters: ValidateWorkflowParams,
    run: (service, p) => service.validateAndFix(p.workflow, p.strict_mode),
  }),
  defineTool({
    name: 'analyze_gaea2_project',
    description: 'Report diagnostics and a health score for a project document or file',
    parameters: ProjectParams,
    run: (service, p) =>
      'project_data' in p
        ? service.analyzeProject(p.project_data)
        : service.analyzeProjectFile(p.project_path),
  }),
  defineTool({
    name: 'repair_gaea2_project',
    description: 'Repair a project document, or a project file in place with a backup',
    parameters: RepairParams,
    run: (service, p) => {
      const options = { autoFix: p.auto_fix, backup: p.backup }
      return 'project_data' in p
        ? service.repairProject(p.project_data, options)
        : service.repairProjectFile(p.project_path, options)
    },
  }),
  defineTool({
    name: 'optimize_gaea2_properties',
    description: 'Cap expensive simulation settings and drop pass-through Combine nodes',
    parameters: OptimizeParams,
    run: (service, p) => {
      if ('workflow' in p) return service.optimizeProject(p.workflow)
      if ('project_data' in p) return service.optimizeProject(p.project_data)
      return service.optimizeProjectFile(p.project_path)
    },
  }),
  defineTool({
    name: 'suggest_gaea2_nodes',
    description: 'Suggest next nodes, missing nodes, property values and similar patterns',
    parameters: SuggestParams,
    run: (service, p) => service.suggestNodes(p.current_nodes, p.context),
  }),
  defineTool({
    name: 'get_node_properties',
    description: 'List the property definitions of a node type',
    parameters: NodeTypeParams,
    run: (service, p) => {
      if (!service.isValidNodeType(p.node_type)) {
        return { success: false, error: `Unknown node type: ${p.node_type}` }
      }
      return {
        success: true,
        node_type: p.node_type,
        has_specific_properties: service.registry.hasNodeSpecificProperties(p.node_type),
        properties: service.getNodeProperties(p.node_type),
      }
    },
  }),
  defineTool({
    name: 'is_valid_node_type',
    description: 'Check whether a node type exists in the schema',
    parameters: NodeTypeParams,
    run: (service, p) => ({
      success: true,
      node_type: p.node_type,
      valid: service.isValidNodeType(p.node_type),
    }),
  }),
  defineTool({
    name: 'analyze_workflow_patterns',
    description: 'Learn node frequencies and patterns from a directory of project files',
    parameters: PatternParams,
    run: (service, p) => service.analyzeWorkflowPatterns(p.directory),
  }),
  defineTool({
    name: 'verify_gaea2_project',
    description: 'Ask the configured checker whether a saved project opens',
    parameters: VerifyParams,
    run: (service, p) => service.verifyProjectOpens(p.project_path),
  }),
]
