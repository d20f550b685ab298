import {
  OpenAPIRegistry,
  OpenApiGeneratorV3,
  type RouteConfig,
} from '@asteasolutions/zod-to-openapi'
import { HealthRouter, McpRouter } from '../routers/index.js'

export type OpenApiDocument = ReturnType<OpenApiGeneratorV3['generateDocument']>

export function buildOpenapiDoc(version = '0.1.0'): OpenApiDocument {
  const registry = new OpenAPIRegistry()
  const allDocs: RouteConfig[] = [...HealthRouter.doc, ...McpRouter.doc]
  for (const element of allDocs) registry.registerPath(element)

  const generator = new OpenApiGeneratorV3(registry.definitions)
  return generator.generateDocument({
    openapi: '3.0.0',
    info: { title: 'Terrain Tools API', version },
  })
}
