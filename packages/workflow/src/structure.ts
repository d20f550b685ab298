import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { v4 as uuidv4 } from 'uuid'
import { type Logger, makeLogger } from '@terrakit/logger'
import { TerrainError, deepClone, errorMessage, formatValue, isRecord } from '@terrakit/utils'

export const REQUIRED_KEYS = ['$id', 'Assets', 'Id', 'Metadata'] as const
export const REQUIRED_ASSET_KEYS = ['Terrain', 'Automation', 'BuildDefinition', 'State'] as const
export const REQUIRED_TERRAIN_KEYS = [
  'Id',
  'Metadata',
  'Nodes',
  'Groups',
  'Notes',
  'GraphTabs',
] as const
export const REQUIRED_METADATA_KEYS = ['Name', 'Version', 'DateCreated', 'DateLastSaved'] as const
export const DATE_FIELDS = ['DateCreated', 'DateLastBuilt', 'DateLastSaved'] as const

const MAX_DEPTH = 10

const NODES_NOT_OBJECT = 'Terrain.Nodes must be an object'
const INVALID_NODES = 'Invalid Nodes structure'

// Findings `fix` leaves alone: a malformed node table is never replaced.
export const UNFIXABLE_STRUCTURE_ERRORS: ReadonlySet<string> = new Set([
  NODES_NOT_OBJECT,
  INVALID_NODES,
])

export const SCAFFOLD_PATH = fileURLToPath(
  new URL('../data/project-scaffold.json', import.meta.url),
)

const Block = z.record(z.string(), z.unknown())
export const ProjectScaffold = z.object({
  terrain: Block,
  automation: Block,
  buildDefinition: Block,
  state: Block,
})
export type ProjectScaffoldType = z.infer<typeof ProjectScaffold>

export function loadScaffold(path: string = SCAFFOLD_PATH): ProjectScaffoldType {
  try {
    return ProjectScaffold.parse(JSON.parse(readFileSync(path, 'utf8')))
  } catch (err) {
    throw new TerrainError('PARSE', `Cannot load project scaffold: ${errorMessage(err)}`, {
      path,
      cause: err,
    })
  }
}

let bundledScaffold: ProjectScaffoldType | undefined

function defaultScaffold(): ProjectScaffoldType {
  bundledScaffold ??= loadScaffold()
  return bundledScaffold
}

// `YYYY-MM-DD HH:MM:SSZ`, always UTC.
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')}Z`
}

const VENDOR_DATE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})Z$/
const ISO_DATE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/

/** Accepts ISO-8601 when the value contains `T`, otherwise the vendor format. */
export function isValidDate(value: unknown): boolean {
  if (typeof value !== 'string') return false
  if (value.includes('T')) {
    return ISO_DATE.test(value) && !Number.isNaN(Date.parse(value))
  }
  const m = VENDOR_DATE.exec(value)
  if (!m) return false
  const [, y, mo, d, h, mi, s] = m.map(Number)
  const parsed = new Date(Date.UTC(y, mo - 1, d, h, mi, s))
  return (
    parsed.getUTCFullYear() === y &&
    parsed.getUTCMonth() + 1 === mo &&
    parsed.getUTCDate() === d &&
    parsed.getUTCHours() === h &&
    parsed.getUTCMinutes() === mi &&
    parsed.getUTCSeconds() === s
  )
}

export interface StructureValidation {
  valid: boolean
  errors: string[]
  warnings: string[]
}

export interface StructureFix {
  document: Record<string, unknown>
  fixes: string[]
}

export interface StructureReport {
  has_required_keys: boolean
  structure_depth: number
  node_count: number
  has_export: boolean
  has_metadata: boolean
  has_build_definition: boolean
}

export interface StructureValidatorOptions {
  now?: () => Date
  newId?: () => string
  scaffold?: ProjectScaffoldType
  logger?: Logger
}

/**
 * Checks and repairs the project envelope: top-level keys, metadata and the
 * asset block. Node semantics are not looked at here.
 *
 * `fix` only ever adds or replaces missing and malformed parts; it works on a
 * clone and leaves the caller's document untouched.
 */
export class StructureValidator {
  private readonly now: () => Date
  private readonly newId: () => string
  private readonly scaffold: ProjectScaffoldType
  private readonly logger: Logger

  constructor(options: StructureValidatorOptions = {}) {
    this.now = options.now ?? (() => new Date())
    this.newId = options.newId ?? (() => uuidv4())
    this.scaffold = options.scaffold ?? defaultScaffold()
    this.logger = options.logger ?? makeLogger('StructureValidator')
  }

  validate(document: unknown): StructureValidation {
    const errors: string[] = []
    const warnings: string[] = []

    if (!isRecord(document)) {
      return { valid: false, errors: ['Project data must be an object'], warnings }
    }

    for (const key of REQUIRED_KEYS) {
      if (!(key in document)) errors.push(`Missing required top-level key: ${key}`)
    }
    if ('$id' in document && typeof document.$id !== 'string') {
      warnings.push('$id should be a string')
    }
    if ('Id' in document && typeof document.Id !== 'string') {
      warnings.push('Id should be a string')
    }

    if ('Assets' in document) this.validateAssets(document.Assets, errors, warnings)
    if ('Metadata' in document) this.validateMetadata(document.Metadata, errors, warnings)

    this.logger.trace('structure validated', { errors: errors.length, warnings: warnings.length })
    return { valid: errors.length === 0, errors, warnings }
  }

  fix(document: unknown, projectName?: string): StructureFix {
    const fixes: string[] = []
    const fixed: Record<string, unknown> = isRecord(document) ? deepClone(document) : {}
    const timestamp = formatTimestamp(this.now())

    if (!('$id' in fixed)) {
      fixed.$id = '1'
      fixes.push('Added missing $id')
    } else if (typeof fixed.$id !== 'string') {
      fixed.$id = formatValue(fixed.$id)
      fixes.push('Converted $id to a string')
    }
    if (!('Id' in fixed)) {
      fixed.Id = this.newId().slice(0, 8)
      fixes.push('Generated missing project Id')
    } else if (typeof fixed.Id !== 'string') {
      fixed.Id = formatValue(fixed.Id)
      fixes.push('Converted Id to a string')
    }
    if (!('Branch' in fixed)) {
      fixed.Branch = 1
      fixes.push('Added default Branch=1')
    }

    if (isRecord(fixed.Metadata)) {
      this.fixMetadata(fixed.Metadata, timestamp, fixes, projectName)
    } else {
      fixed.Metadata = this.defaultMetadata(timestamp, projectName)
      fixes.push('Created default metadata')
    }

    if (isRecord(fixed.Assets)) {
      this.fixAssets(fixed, fixed.Assets, timestamp, fixes, projectName)
    } else {
      const terrain = takeBareTerrain(fixed)
      const assets = { $id: '2', $values: [this.defaultAsset(timestamp, projectName, terrain)] }
      fixed.Assets = assets
      fixes.push('Created default assets structure')
      if (terrain) {
        fixes.push('Moved top-level Terrain into Assets.$values')
        this.fixAssets(fixed, assets, timestamp, fixes, projectName)
      }
    }

    this.logger.trace('structure fixed', { fixes: fixes.length })
    return { document: fixed, fixes }
  }

  report(document: unknown): StructureReport {
    const doc = isRecord(document) ? document : {}
    const report: StructureReport = {
      has_required_keys: REQUIRED_KEYS.every((key) => key in doc),
      structure_depth: structureDepth(doc, 0),
      node_count: 0,
      has_export: false,
      has_metadata: 'Metadata' in doc,
      has_build_definition: false,
    }

    const asset = firstAsset(doc)
    if (!asset) return report
    report.has_build_definition = 'BuildDefinition' in asset

    const terrain = asset.Terrain
    if (isRecord(terrain) && isRecord(terrain.Nodes)) {
      const entries = Object.entries(terrain.Nodes).filter(([key]) => key !== '$id')
      report.node_count = entries.length
      report.has_export = entries.some(([, node]) => {
        return isRecord(node) && typeof node.$type === 'string' && node.$type.includes('Export')
      })
    }
    return report
  }

  private validateAssets(assets: unknown, errors: string[], warnings: string[]): void {
    if (!isRecord(assets)) {
      errors.push('Assets must be an object')
      return
    }
    if (!('$values' in assets)) {
      errors.push('Assets missing $values array')
      return
    }
    const values = assets.$values
    if (!Array.isArray(values)) {
      errors.push('Assets.$values must be an array')
      return
    }
    const asset: unknown = values[0]
    if (asset === undefined) {
      errors.push('Assets.$values is empty')
      return
    }
    if (!isRecord(asset)) {
      errors.push('Asset must be an object')
      return
    }

    for (const key of REQUIRED_ASSET_KEYS) {
      if (!(key in asset)) warnings.push(`Asset missing key: ${key}`)
    }
    if ('Terrain' in asset) this.validateTerrain(asset.Terrain, errors, warnings)
  }

  private validateTerrain(terrain: unknown, errors: string[], warnings: string[]): void {
    if (!isRecord(terrain)) {
      errors.push('Terrain must be an object')
      return
    }
    for (const key of REQUIRED_TERRAIN_KEYS) {
      if (!(key in terrain)) warnings.push(`Terrain missing key: ${key}`)
    }
    if (!('Nodes' in terrain)) return

    const nodes = terrain.Nodes
    if (!isRecord(nodes)) {
      errors.push(NODES_NOT_OBJECT)
      return
    }
    const first = Object.values(nodes)[0]
    if (!('$id' in nodes) && first !== undefined && !isRecord(first)) {
      errors.push(INVALID_NODES)
    }
  }

  private validateMetadata(metadata: unknown, errors: string[], warnings: string[]): void {
    if (!isRecord(metadata)) {
      errors.push('Metadata must be an object')
      return
    }
    for (const key of REQUIRED_METADATA_KEYS) {
      if (!(key in metadata)) warnings.push(`Metadata missing ${key}`)
    }
    for (const field of DATE_FIELDS) {
      if (field in metadata && !isValidDate(metadata[field])) {
        warnings.push(`Invalid date format in ${field}: ${String(metadata[field])}`)
      }
    }
  }

  private fixMetadata(
    metadata: Record<string, unknown>,
    timestamp: string,
    fixes: string[],
    projectName?: string,
  ): void {
    if (!metadata.Name) {
      metadata.Name = projectName ?? 'Untitled'
      fixes.push('Added missing metadata Name')
    }
    if (!('Version' in metadata)) {
      metadata.Version = '1.0'
      fixes.push('Added default Version')
    }
    for (const field of DATE_FIELDS) {
      if (!isValidDate(metadata[field])) {
        metadata[field] = timestamp
        fixes.push(`Fixed ${field}`)
      }
    }
  }

  // A bare or legacy keyed Terrain is moved into `$values[0]`, never replaced.
  private fixAssets(
    document: Record<string, unknown>,
    assets: Record<string, unknown>,
    timestamp: string,
    fixes: string[],
    projectName?: string,
  ): void {
    if (!('$id' in assets)) {
      assets.$id = '2'
      fixes.push('Added missing Assets.$id')
    }
    if (!('$values' in assets)) {
      const legacy = takeLegacyAsset(assets)
      if (legacy) {
        assets.$values = [legacy.asset]
        fixes.push(`Moved legacy asset ${legacy.key} into Assets.$values`)
      } else {
        const terrain = takeBareTerrain(document)
        assets.$values = [this.defaultAsset(timestamp, projectName, terrain)]
        fixes.push('Created default Assets.$values')
        if (!terrain) return
        fixes.push('Moved top-level Terrain into Assets.$values')
      }
    }

    const values = assets.$values
    const asset: unknown = Array.isArray(values) ? values[0] : undefined
    if (!isRecord(asset)) {
      assets.$values = [this.defaultAsset(timestamp, projectName)]
      fixes.push('Fixed Assets.$values')
      return
    }

    if (isRecord(asset.Terrain)) {
      this.fixTerrain(asset.Terrain, timestamp, fixes, projectName)
    } else {
      asset.Terrain = this.defaultTerrain(timestamp, projectName)
      fixes.push('Added missing Terrain')
    }
    if (!('Automation' in asset)) {
      asset.Automation = deepClone(this.scaffold.automation)
      fixes.push('Added default Automation')
    }
    if (!('BuildDefinition' in asset)) {
      asset.BuildDefinition = deepClone(this.scaffold.buildDefinition)
      fixes.push('Added default BuildDefinition')
    }
    if (!('State' in asset)) {
      asset.State = deepClone(this.scaffold.state)
      fixes.push('Added default State')
    }
  }

  private fixTerrain(
    terrain: Record<string, unknown>,
    timestamp: string,
    fixes: string[],
    projectName?: string,
  ): void {
    const defaults = this.defaultTerrain(timestamp, projectName)
    for (const key of REQUIRED_TERRAIN_KEYS) {
      if (!(key in terrain)) {
        terrain[key] = defaults[key]
        fixes.push(`Added missing Terrain.${key}`)
      }
    }
  }

  private defaultMetadata(timestamp: string, projectName?: string): Record<string, unknown> {
    return {
      $id: '236',
      Name: projectName ?? 'Untitled',
      Description: '',
      Version: '1.0',
      Owner: '',
      DateCreated: timestamp,
      DateLastBuilt: timestamp,
      DateLastSaved: timestamp,
    }
  }

  private defaultTerrain(timestamp: string, projectName?: string): Record<string, unknown> {
    const terrain = deepClone(this.scaffold.terrain)
    const metadata = isRecord(terrain.Metadata) ? terrain.Metadata : {}
    terrain.Id = this.newId()
    terrain.Metadata = {
      ...metadata,
      Name: projectName ?? 'Terrain',
      Description: `Generated on ${timestamp}`,
      DateCreated: timestamp,
      DateLastBuilt: timestamp,
      DateLastSaved: timestamp,
    }
    return terrain
  }

  private defaultAsset(
    timestamp: string,
    projectName?: string,
    terrain?: Record<string, unknown> | null,
  ): Record<string, unknown> {
    return {
      $id: '3',
      Terrain: terrain ?? this.defaultTerrain(timestamp, projectName),
      Automation: deepClone(this.scaffold.automation),
      BuildDefinition: deepClone(this.scaffold.buildDefinition),
      State: deepClone(this.scaffold.state),
    }
  }
}

function takeBareTerrain(document: Record<string, unknown>): Record<string, unknown> | null {
  const terrain = document.Terrain
  if (!isRecord(terrain) || Object.keys(terrain).length === 0) return null
  delete document.Terrain
  return terrain
}

function takeLegacyAsset(
  assets: Record<string, unknown>,
): { key: string; asset: Record<string, unknown> } | null {
  for (const [key, value] of Object.entries(assets)) {
    if (key === '$id' || !isRecord(value) || !('Terrain' in value)) continue
    delete assets[key]
    return { key, asset: value }
  }
  return null
}

function firstAsset(document: Record<string, unknown>): Record<string, unknown> | null {
  const assets = document.Assets
  if (!isRecord(assets) || !Array.isArray(assets.$values)) return null
  const first: unknown = assets.$values[0]
  return isRecord(first) ? first : null
}

function structureDepth(value: unknown, depth: number): number {
  if (!isRecord(value) || depth >= MAX_DEPTH) return depth
  let max = depth
  for (const child of Object.values(value)) {
    if (isRecord(child)) {
      max = Math.max(max, structureDepth(child, depth + 1))
    } else if (Array.isArray(child) && isRecord(child[0])) {
      max = Math.max(max, structureDepth(child[0], depth + 1))
    }
  }
  return max
}
