import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { makeLogger } from '@terrakit/logger'
import { TerrainError, deepFreeze, errorMessage } from '@terrakit/utils'
import {
  NodeCategory,
  type PropertyDefinitionType,
  type PropertyTable,
  SchemaSnapshot,
  type SchemaSnapshotType,
} from './types/index.js'

export const BUNDLED_SCHEMA_PATH = fileURLToPath(
  new URL('../data/gaea2-schema.json', import.meta.url),
)

export type DefinitionSource = 'node' | 'common'

export interface ResolvedDefinition {
  definition: PropertyDefinitionType
  source: DefinitionSource
}

/**
 * Read-only view over a schema snapshot: the valid node types, their
 * property tables and the common fallback table.
 *
 * The snapshot is frozen on construction, so one registry can be shared by
 * any number of concurrent validations.
 */
export class SchemaRegistry {
  private readonly logger = makeLogger('SchemaRegistry')
  private readonly validTypes: ReadonlySet<string>
  private readonly categoryByType = new Map<string, string>()

  constructor(private readonly snapshot: SchemaSnapshotType) {
    deepFreeze(snapshot)
    this.validTypes = new Set(snapshot.valid_node_types)
    for (const [category, types] of Object.entries(snapshot.node_categories ?? {})) {
      for (const type of types) {
        if (!this.categoryByType.has(type)) this.categoryByType.set(type, category)
      }
    }
    this.logger.trace('schema loaded', {
      version: snapshot.version,
      nodeTypes: this.validTypes.size,
      nodeTables: Object.keys(snapshot.node_properties).length,
    })
  }

  static parse(raw: unknown, source = 'inline'): SchemaRegistry {
    const result = SchemaSnapshot.safeParse(raw)
    if (!result.success) {
      const first = result.error.issues[0]
      const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue'
      throw new TerrainError('PARSE', `Invalid schema snapshot from ${source} (${where})`, {
        path: source,
      })
    }
    return new SchemaRegistry(result.data)
  }

  static fromFile(path: string): SchemaRegistry {
    let text: string
    try {
      text = readFileSync(path, 'utf8')
    } catch (err) {
      throw new TerrainError('FILE', `Cannot read schema snapshot: ${errorMessage(err)}`, {
        path,
        cause: err,
      })
    }
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      throw new TerrainError('PARSE', `Schema snapshot is not JSON: ${errorMessage(err)}`, {
        path,
        cause: err,
      })
    }
    return SchemaRegistry.parse(raw, path)
  }

  static bundled(): SchemaRegistry {
    return SchemaRegistry.fromFile(BUNDLED_SCHEMA_PATH)
  }

  get version(): string {
    return this.snapshot.version
  }

  isValidNodeType(type: string): boolean {
    return this.validTypes.has(type)
  }

  nodeTypes(): readonly string[] {
    return this.snapshot.valid_node_types
  }

  hasNodeSpecificProperties(type: string): boolean {
    return Object.hasOwn(this.snapshot.node_properties, type)
  }

  // node-specific table when one exists, else the common table
  getPropertyDefinitions(type: string): PropertyTable {
    if (this.hasNodeSpecificProperties(type)) {
      return this.snapshot.node_properties[type] ?? this.snapshot.common_properties
    }
    return this.snapshot.common_properties
  }

  resolveProperty(type: string, name: string): ResolvedDefinition | null {
    const own = this.hasNodeSpecificProperties(type)
      ? this.snapshot.node_properties[type]
      : undefined
    if (own && Object.hasOwn(own, name)) {
      const definition = own[name]
      if (definition) return { definition, source: 'node' }
    }
    if (Object.hasOwn(this.snapshot.common_properties, name)) {
      const definition = this.snapshot.common_properties[name]
      if (definition) return { definition, source: 'common' }
    }
    return null
  }

  categoryOf(type: string): string | undefined {
    return this.categoryByType.get(type)
  }

  typesInCategory(category: string): readonly string[] {
    return this.snapshot.node_categories?.[category] ?? []
  }

  // export-like nodes are legitimately terminal
  isTerminalType(type: string): boolean {
    return this.categoryOf(type) === NodeCategory.output
  }

  isGeneratorType(type: string): boolean {
    return this.categoryOf(type) === NodeCategory.terrain
  }

  toSnapshot(): SchemaSnapshotType {
    return this.snapshot
  }
}
