import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const IssueSchema = z
  .object({
    path: z.string(),
    message: z.string(),
    code: z.string(),
  })
  .openapi('Issue')
export type IssueSchemaType = z.infer<typeof IssueSchema>

export const ErrorResponse = z
  .object({
    success: z.literal(false),
    error: z.string(),
  })
  .openapi('ErrorResponse')

export const ValidationError = z
  .object({
    success: z.literal(false),
    error: z.literal('ValidationError'),
    issues: z.array(IssueSchema),
  })
  .openapi('ValidationError')
export type ValidationErrorType = z.infer<typeof ValidationError>

export function toIssues(error: z.ZodError): IssueSchemaType[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
    code: issue.code,
  }))
}
