import type { Server as HttpServer } from 'node:http'
import express, { type ErrorRequestHandler, type Express } from 'express'
import helmet from 'helmet'
import cors from 'cors'
import swaggerUi from 'swagger-ui-express'

import { type Logger, makeLogger } from '@terrakit/logger'
import { errorMessage, isRecord } from '@terrakit/utils'
import type { ToolDispatcher } from './dispatcher.js'
import { HealthRouter, McpRouter } from './routers/index.js'
import { buildOpenapiDoc } from './swagger/index.js'

export interface ServerOptions {
  host: string
  port: number
  allowedOrigins: string[]
  bodyLimit?: string
}

export class Server {
  readonly app: Express = express()
  private httpServer?: HttpServer
  private readonly logger: Logger

  constructor(
    private readonly dispatcher: ToolDispatcher,
    private readonly options: ServerOptions,
    logger?: Logger,
  ) {
    this.logger = logger ?? makeLogger('RemoteServer')
    if (!Number.isInteger(options.port) || options.port < 0 || options.port >= 65536) {
      throw new Error(`Invalid port: ${options.port}`)
    }
    this.configureMiddleware()
    this.configureRouters()
  }

  public async start(): Promise<void> {
    const { host, port } = this.options
    await new Promise<void>((resolve, reject) => {
      const httpServer = this.app.listen(port, host, () => {
        this.logger.info(`API on ${host}:${port}  |  Docs: http://${host}:${port}/docs`)
        resolve()
      })
      httpServer.on('error', (err) => {
        this.logger.error(`Failed to start server: ${errorMessage(err)}`)
        reject(err)
      })
      this.httpServer = httpServer
    })
  }

  public async stop(): Promise<void> {
    const httpServer = this.httpServer
    if (!httpServer) return
    this.httpServer = undefined
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()))
    })
    this.logger.info('server stopped')
  }

  private configureMiddleware(): void {
    const origins = this.options.allowedOrigins
    this.app.use(cors({ origin: origins.includes('*') ? '*' : origins }))
    this.app.use(express.json({ limit: this.options.bodyLimit ?? '10mb' }))
    this.app.use(helmet())
    this.app.use('/docs', swaggerUi.serve, swaggerUi.setup(buildOpenapiDoc()))
  }

  private configureRouters(): void {
    this.app.use(HealthRouter.create(this.dispatcher))
    this.app.use(McpRouter.basePath, McpRouter.create(this.dispatcher, this.logger))
    this.app.use(this.errorHandler())
  }

  // Body-parser rejections carry their own status; anything else is a 500.
  private errorHandler(): ErrorRequestHandler {
    return (err: unknown, _req, res, _next) => {
      const status = isRecord(err) && typeof err.status === 'number' ? err.status : 500
      this.logger.error(`Request failed: ${errorMessage(err)}`, { status })
      res.status(status).json({ success: false, error: errorMessage(err) })
    }
  }
}
