import { type Logger, makeLogger } from '@terrakit/logger'
import { TERRAIN_CONSTANTS, TerrainError, isNumber, isRecord } from '@terrakit/utils'
import { DEFAULT_SHAPES, type ShapeRecognizer } from './shapes.js'
import { parseNodeTypeIdentifier } from './typeIdentifier.js'
import type { ConnectionType, PositionType, TerrainNodeType, WorkflowGraphType } from './types.js'

// Keys of a node entry that describe the node itself rather than its settings.
export const SYSTEM_KEYS: ReadonlySet<string> = new Set([
  '$id',
  '$type',
  'Id',
  'Name',
  'Position',
  'Ports',
  'Modifiers',
  'SnapIns',
  'NodeSize',
  'PortCount',
  'IsMaskable',
])

export interface LocatedTerrain {
  shape: string
  terrain: Record<string, unknown>
}

export interface ExtractedWorkflow extends WorkflowGraphType {
  shape: string | null
}

export function toNodeId(value: unknown): number | null {
  if (isNumber(value) && Number.isInteger(value)) return value
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number.parseInt(value, 10)
  return null
}

export type NodeEntry = [key: string, entry: Record<string, unknown>]

export function nodeEntries(nodes: Record<string, unknown>): NodeEntry[] {
  const out: NodeEntry[] = []
  for (const [key, entry] of Object.entries(nodes)) {
    if (isRecord(entry)) out.push([key, entry])
  }
  return out
}

// Id field first, then a numeric table key, then the entry's 1-based position.
export function entryNodeId(key: string, entry: Record<string, unknown>, index: number): number {
  return toNodeId(entry.Id) ?? toNodeId(key) ?? index + 1
}

export function portRecords(entry: Record<string, unknown>): Record<string, unknown>[] {
  const ports = entry.Ports
  if (!isRecord(ports) || !Array.isArray(ports.$values)) return []
  const records: Record<string, unknown>[] = []
  for (const port of ports.$values) {
    if (isRecord(port) && isRecord(port.Record)) records.push(port.Record)
  }
  return records
}

export function recordToConnection(record: Record<string, unknown>): ConnectionType | null {
  const from = toNodeId(record.From)
  const to = toNodeId(record.To)
  if (from === null || to === null) return null
  const { DEFAULT_FROM_PORT, DEFAULT_TO_PORT } = TERRAIN_CONSTANTS
  return {
    from_node: from,
    to_node: to,
    from_port: typeof record.FromPort === 'string' ? record.FromPort : DEFAULT_FROM_PORT,
    to_port: typeof record.ToPort === 'string' ? record.ToPort : DEFAULT_TO_PORT,
  }
}

function toPosition(value: unknown): PositionType | undefined {
  if (!isRecord(value) || !isNumber(value.X) || !isNumber(value.Y)) return undefined
  return { x: value.X, y: value.Y }
}

/**
 * Flattens a persisted project document into nodes and connections.
 *
 * Historical document layouts are handled by an ordered list of
 * {@link ShapeRecognizer}s; the first one that finds a terrain wins.
 */
export class WorkflowExtractor {
  private readonly logger: Logger

  constructor(
    private readonly shapes: readonly ShapeRecognizer[] = DEFAULT_SHAPES,
    logger?: Logger,
  ) {
    this.logger = logger ?? makeLogger('WorkflowExtractor')
  }

  locateTerrain(document: unknown): LocatedTerrain | null {
    if (!isRecord(document)) {
      throw new TerrainError('STRUCTURE', 'Project data must be an object')
    }
    for (const shape of this.shapes) {
      const terrain = shape.locateTerrain(document)
      if (terrain) return { shape: shape.name, terrain }
    }
    return null
  }

  extract(document: unknown): ExtractedWorkflow {
    const located = this.locateTerrain(document)
    if (!located) {
      this.logger.trace('no terrain found in document')
      return { nodes: [], connections: [], shape: null }
    }

    const table = located.terrain.Nodes
    if (!isRecord(table)) {
      return { nodes: [], connections: [], shape: located.shape }
    }

    const nodes: TerrainNodeType[] = []
    const connections: ConnectionType[] = []
    nodeEntries(table).forEach(([key, entry], index) => {
      nodes.push(this.toNode(key, entry, index))
      for (const record of portRecords(entry)) {
        const connection = recordToConnection(record)
        if (connection) connections.push(connection)
      }
    })

    this.logger.trace('workflow extracted', {
      shape: located.shape,
      nodes: nodes.length,
      connections: connections.length,
    })
    return { nodes, connections, shape: located.shape }
  }

  private toNode(key: string, entry: Record<string, unknown>, index: number): TerrainNodeType {
    const type = parseNodeTypeIdentifier(entry.$type)
    const properties: Record<string, unknown> = {}
    for (const [name, value] of Object.entries(entry)) {
      if (!SYSTEM_KEYS.has(name)) properties[name] = value
    }
    const node: TerrainNodeType = {
      id: entryNodeId(key, entry, index),
      type,
      name: typeof entry.Name === 'string' && entry.Name !== '' ? entry.Name : type,
      properties,
    }
    const position = toPosition(entry.Position)
    if (position) node.position = position
    return node
  }
}
