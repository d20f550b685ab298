import express, { type Request, type RequestHandler, type Response } from 'express'
import { describe, expect, it } from 'vitest'
import { makeLogger } from '@terrakit/logger'
import { TerrainService } from '@terrakit/repair'
import { ToolDispatcher } from '../dispatcher.js'
import { validateBody } from '../middlewares/index.js'
import { HealthRouter, McpRouter } from '../routers/index.js'
import { ToolSchemas } from '../schemas/index.js'
import { buildOpenapiDoc } from '../swagger/index.js'

const dispatcher = new ToolDispatcher(new TerrainService())
const logger = makeLogger('routes-test')

interface Sent {
  status?: number
  body?: unknown
  nextCalled: boolean
}

// Drives a handler with request/response objects built on express's own prototypes.
async function invoke(
  handler: RequestHandler,
  body: unknown = {},
): Promise<Sent & { req: Request }> {
  const req: Request = Object.create(express.request)
  req.body = body
  const res: Response = Object.create(express.response)
  const sent: Sent = { nextCalled: false }
  res.status = (code: number) => {
    sent.status = code
    return res
  }
  res.json = (payload: unknown) => {
    sent.body = payload
    return res
  }
  await handler(req, res, () => {
    sent.nextCalled = true
  })
  return { ...sent, req }
}

describe('routes', () => {
  it('reports health with the tool count', async () => {
    const sent = await invoke(HealthRouter.handleHealth(dispatcher))
    expect(sent.status).toBe(200)
    expect(sent.body).toEqual({ status: 'healthy', tools: 9 })
  })

  it('lists tools', async () => {
    const sent = await invoke(McpRouter.handleListTools(dispatcher))
    expect(sent.body).toMatchObject({ success: true })
    expect(sent.body).toHaveProperty('tools.length', 9)
  })

  it('rejects an execute request without a tool name', async () => {
    const sent = await invoke(validateBody(ToolSchemas.ExecuteRequest), { parameters: {} })

    expect(sent.status).toBe(400)
    expect(sent.nextCalled).toBe(false)
    expect(sent.body).toMatchObject({
      success: false,
      error: 'ValidationError',
      issues: [{ path: 'tool', code: 'invalid_type' }],
    })
  })

  it('fills default parameters and passes valid requests on', async () => {
    const sent = await invoke(validateBody(ToolSchemas.ExecuteRequest), { tool: 'x' })
    expect(sent.nextCalled).toBe(true)
    expect(sent.req.body).toEqual({ tool: 'x', parameters: {} })
  })

  it('executes a tool and uses its status code', async () => {
    const execute = McpRouter.handleExecute(dispatcher, logger)

    const ran = await invoke(execute, {
      tool: 'is_valid_node_type',
      parameters: { node_type: 'Nope' },
    })
    expect(ran.status).toBe(200)
    expect(ran.body).toMatchObject({ result: { valid: false } })

    const unknown = await invoke(execute, { tool: 'missing', parameters: {} })
    expect(unknown.status).toBe(404)
  })

  it('documents every route', () => {
    const doc = buildOpenapiDoc()
    expect(Object.keys(doc.paths ?? {}).sort()).toEqual(['/health', '/mcp/execute', '/mcp/tools'])
  })
})
