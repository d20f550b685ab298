import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export enum PropertyType {
  int = 'int',
  float = 'float',
  bool = 'bool',
  enum = 'enum',
  float2 = 'float2',
  string = 'string',
}

export const Float2 = z.object({ X: z.number(), Y: z.number() }).openapi('Float2')
export type Float2Type = z.infer<typeof Float2>

export const PropertyDefinition = z
  .object({
    // not z.enum(PropertyType): unrecognised type strings must still load
    type: z.string(),
    default: z.unknown().optional(),
    range: z.tuple([z.number(), z.number()]).optional(),
    values: z.array(z.string()).optional(),
    description: z.string().optional(),
  })
  .openapi('PropertyDefinition')

export type PropertyDefinitionType = z.infer<typeof PropertyDefinition>

export type PropertyTable = Readonly<Record<string, PropertyDefinitionType>>
