import type { NextFunction, Request, Response } from 'express'
import type { z } from 'zod'
import { makeLogger } from '@terrakit/logger'
import { type ValidationErrorType, toIssues } from '../schemas/common.js'

const logger = makeLogger('validate-middleware')

export type BodyCheck<T extends z.ZodType> =
  | { success: true; data: z.infer<T> }
  | { success: false; body: ValidationErrorType }

export function checkBody<T extends z.ZodType>(schema: T, body: unknown): BodyCheck<T> {
  const result = schema.safeParse(body)
  if (result.success) return { success: true, data: result.data }

  const issues = toIssues(result.error)
  logger.error('invalid payload found', { issues })
  return { success: false, body: { success: false, error: 'ValidationError', issues } }
}

export function validateBody<T extends z.ZodType>(schema: T) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const checked = checkBody(schema, req.body)
    if (!checked.success) {
      res.status(400).json(checked.body)
      return
    }
    // parsed & validated
    req.body = checked.data
    next()
  }
}
