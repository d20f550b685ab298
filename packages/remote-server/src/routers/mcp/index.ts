import { type RequestHandler, Router } from 'express'
import type { Logger } from '@terrakit/logger'
import type { ToolDispatcher } from '../../dispatcher.js'
import { validateBody } from '../../middlewares/index.js'
import { ToolSchemas } from '../../schemas/index.js'

export { basePath, doc } from './swagger.js'

export function handleListTools(dispatcher: ToolDispatcher): RequestHandler {
  return (_req, res) => {
    res.status(200).json({ success: true, tools: dispatcher.list() })
  }
}

// Expects a body already checked by validateBody(ExecuteRequest).
export function handleExecute(dispatcher: ToolDispatcher, logger: Logger): RequestHandler {
  return async (req, res) => {
    const { tool, parameters } = ToolSchemas.ExecuteRequest.parse(req.body)
    const outcome = await dispatcher.execute(tool, parameters)
    if (outcome.status !== 200) logger.debug('tool call rejected', { tool, status: outcome.status })
    res.status(outcome.status).json(outcome.body)
  }
}

export function create(dispatcher: ToolDispatcher, logger: Logger): Router {
  const router = Router()
  router.get('/tools', handleListTools(dispatcher))
  router.post(
    '/execute',
    validateBody(ToolSchemas.ExecuteRequest),
    handleExecute(dispatcher, logger),
  )
  return router
}
