import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
import { PropertyDefinition } from './property.js'
extendZodWithOpenApi(z)

export enum NodeCategory {
  primitive = 'primitive',
  terrain = 'terrain',
  modify = 'modify',
  surface = 'surface',
  simulate = 'simulate',
  derive = 'derive',
  colorize = 'colorize',
  output = 'output',
  utility = 'utility',
}

export const SchemaSnapshot = z
  .object({
    version: z.string(),
    valid_node_types: z.array(z.string()),
    node_properties: z.record(z.string(), z.record(z.string(), PropertyDefinition)),
    common_properties: z.record(z.string(), PropertyDefinition),
    node_categories: z.record(z.string(), z.array(z.string())).optional(),
  })
  .openapi('SchemaSnapshot')

export type SchemaSnapshotType = z.infer<typeof SchemaSnapshot>
