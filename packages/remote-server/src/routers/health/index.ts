import { type RequestHandler, Router } from 'express'
import type { ToolDispatcher } from '../../dispatcher.js'

export { doc } from './swagger.js'

export function handleHealth(dispatcher: ToolDispatcher): RequestHandler {
  return (_req, res) => {
    res.status(200).json({ status: 'healthy', tools: dispatcher.size })
  }
}

export function create(dispatcher: ToolDispatcher): Router {
  const router = Router()
  router.get('/health', handleHealth(dispatcher))
  return router
}
