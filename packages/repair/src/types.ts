import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import { ErrorDict, ErrorSummary } from '@terrakit/diagnostics'
import { WorkflowGraph } from '@terrakit/workflow'
extendZodWithOpenApi(z)

export const ProjectHealth = z
  .object({
    node_count: z.number().int(),
    connection_count: z.number().int(),
    errors: ErrorSummary,
    can_auto_fix: z.boolean(),
    health_score: z.number().min(0).max(100),
  })
  .openapi('ProjectHealth')
export type ProjectHealthType = z.infer<typeof ProjectHealth>

export const Failure = z
  .object({ success: z.literal(false), error: z.string() })
  .openapi('Failure')
export type FailureType = z.infer<typeof Failure>

export const AnalyzeProjectResult = z
  .object({
    success: z.literal(true),
    analysis: ProjectHealth,
    errors: z.array(ErrorDict),
  })
  .openapi('AnalyzeProjectResult')
export type AnalyzeProjectResultType = z.infer<typeof AnalyzeProjectResult>
export type AnalyzeOutcome = AnalyzeProjectResultType | FailureType

export interface RepairOptions {
  autoFix?: boolean
  backup?: boolean
}

export interface RepairResult {
  success: true
  original_analysis: AnalyzeProjectResultType
  post_repair_analysis: AnalyzeOutcome
  fixes_applied: string[]
  backup_available: boolean
  backup_data?: Record<string, unknown>
  repaired_document: Record<string, unknown>
}
export type RepairOutcome = RepairResult | FailureType

export interface RepairFileResult extends RepairResult {
  saved_path: string
  backup_path?: string
}
export type RepairFileOutcome = RepairFileResult | FailureType

export interface OptimizeResult {
  success: true
  optimizations_applied: string[]
  optimization_count: number
  optimized_document?: Record<string, unknown>
  workflow?: z.infer<typeof WorkflowGraph>
}
export type OptimizeOutcome = OptimizeResult | FailureType

export const ValidateAndFixResult = z
  .object({
    valid: z.boolean(),
    fixed: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
    fixes_applied: z.array(z.string()),
    workflow: WorkflowGraph,
  })
  .openapi('ValidateAndFixResult')
export type ValidateAndFixResultType = z.infer<typeof ValidateAndFixResult>

// Result of asking the rendering application whether a saved project opens.
export interface OpenCheckResult {
  success: boolean
  error?: string
}

export interface ProjectOpenChecker {
  canOpen(path: string): Promise<OpenCheckResult>
}
