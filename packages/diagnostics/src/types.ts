import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export enum Severity {
  CRITICAL = 'critical',
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info',
}

export enum Category {
  VALIDATION = 'validation',
  CONNECTION = 'connection',
  PROPERTY = 'property',
  STRUCTURE = 'structure',
  COMPATIBILITY = 'compatibility',
  PERFORMANCE = 'performance',
}

// What the automatic fixer can actually do about a diagnostic.
export const FixCapability = z.enum(['clamp', 'removal', 'default-fill', 'none'])
export type FixCapabilityType = z.infer<typeof FixCapability>

export interface Diagnostic {
  message: string
  severity: Severity
  category: Category
  nodeId?: number
  propertyName?: string
  suggestion?: string
  fix: FixCapabilityType
}

export const ErrorDict = z
  .object({
    message: z.string(),
    severity: z.enum(Severity),
    category: z.enum(Category),
    node_id: z.number().int().nullable(),
    property_name: z.string().nullable(),
    suggestion: z.string().nullable(),
    auto_fixable: z.boolean(),
    fix: FixCapability,
  })
  .openapi('ErrorDict')
export type ErrorDictType = z.infer<typeof ErrorDict>

export const ErrorSummary = z
  .object({
    total_errors: z.number().int(),
    critical: z.number().int(),
    errors: z.number().int(),
    warnings: z.number().int(),
    info: z.number().int(),
    auto_fixable: z.number().int(),
    has_critical: z.boolean(),
    by_category: z.record(z.enum(Category), z.number().int()),
  })
  .openapi('ErrorSummary')
export type ErrorSummaryType = z.infer<typeof ErrorSummary>

export function isAutoFixable(diagnostic: Diagnostic): boolean {
  return diagnostic.fix !== 'none'
}

export function toErrorDict(diagnostic: Diagnostic): ErrorDictType {
  return {
    message: diagnostic.message,
    severity: diagnostic.severity,
    category: diagnostic.category,
    node_id: diagnostic.nodeId ?? null,
    property_name: diagnostic.propertyName ?? null,
    suggestion: diagnostic.suggestion ?? null,
    auto_fixable: isAutoFixable(diagnostic),
    fix: diagnostic.fix,
  }
}
