import { existsSync } from 'node:fs'
import { InMemoryKeyValueStore, ResultCache } from '@terrakit/keystore'
import { WorkflowAnalyzer } from '@terrakit/knowledge'
import { type Logger, makeLogger } from '@terrakit/logger'
import { SchemaRegistry } from '@terrakit/nodes'
import { Server, ToolDispatcher } from '@terrakit/remote-server'
import { TerrainService } from '@terrakit/repair'
import type { AppConfig } from './config.js'

export interface TerrainApp {
  config: AppConfig
  service: TerrainService
  dispatcher: ToolDispatcher
  server: Server
  cache: ResultCache
  close(): Promise<void>
}

/**
 * Wires registry, analyzer, cache, service and HTTP server from configuration.
 * Nothing listens until `server.start()` is called.
 */
export async function createApp(
  config: AppConfig,
  logger: Logger = makeLogger('terrain-tools'),
): Promise<TerrainApp> {
  const registry = config.SCHEMA_PATH
    ? SchemaRegistry.fromFile(config.SCHEMA_PATH)
    : SchemaRegistry.bundled()

  const analyzer = new WorkflowAnalyzer({ logger: logger.child({ component: 'analyzer' }) })
  if (config.PATTERN_DB_PATH) {
    if (existsSync(config.PATTERN_DB_PATH)) {
      await analyzer.loadAnalysis(config.PATTERN_DB_PATH)
      logger.info('pattern database loaded', { path: config.PATTERN_DB_PATH })
    } else {
      logger.warn(`Pattern database ${config.PATTERN_DB_PATH} not found, starting empty`)
    }
  }

  const cache = new ResultCache(new InMemoryKeyValueStore({ namespace: 'terrain-tools' }), {
    ttlSeconds: config.CACHE_TTL_SECONDS,
  })
  const service = new TerrainService({ registry, analyzer, cache })
  const dispatcher = new ToolDispatcher(service)
  const server = new Server(dispatcher, {
    host: config.HOST,
    port: config.PORT,
    allowedOrigins: config.ALLOWED_ORIGINS,
    bodyLimit: config.BODY_LIMIT,
  })

  return {
    config,
    service,
    dispatcher,
    server,
    cache,
    async close() {
      await server.stop()
      await cache.close()
    },
  }
}
