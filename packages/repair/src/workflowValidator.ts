import { autoFix } from '@terrakit/diagnostics'
import { type Logger, makeLogger } from '@terrakit/logger'
import { PropertyValidator, type SchemaRegistry } from '@terrakit/nodes'
import { TERRAIN_CONSTANTS, formatValue, isRecord, stableStringify } from '@terrakit/utils'
import {
  type ConnectionType,
  type TerrainNodeType,
  type WorkflowGraphType,
  connectionKey,
  toNodeId,
} from '@terrakit/workflow'
import type { ValidateAndFixResultType } from './types.js'

export interface NormalizedWorkflow extends WorkflowGraphType {
  errors: string[]
}

function idLabel(value: unknown): string {
  return value === undefined || value === null ? 'unknown' : formatValue(value)
}

function port(value: unknown, fallback: string): string {
  return typeof value === 'string' && value !== '' ? value : fallback
}

/**
 * Reads a caller-supplied `{nodes, connections}` workflow into typed nodes
 * and connections. Entries that cannot be read are reported and left out.
 * Connection endpoints may be named `from_node`/`to_node` or `source`/`target`.
 */
export function normalizeWorkflow(input: unknown): NormalizedWorkflow {
  const errors: string[] = []
  const nodes: TerrainNodeType[] = []
  const connections: ConnectionType[] = []
  if (!isRecord(input)) {
    return { nodes, connections, errors: ['Workflow must be an object'] }
  }

  const rawNodes: unknown[] = Array.isArray(input.nodes) ? input.nodes : []
  rawNodes.forEach((raw, i) => {
    if (!isRecord(raw)) {
      errors.push(`Node at index ${i} must be an object`)
      return
    }
    const hasType = typeof raw.type === 'string' && raw.type !== ''
    if (!hasType) {
      errors.push(`Node at index ${i} (id: ${idLabel(raw.id)}) missing required 'type' field`)
    }
    if (raw.id === undefined) {
      errors.push(`Node at index ${i} missing required 'id' field`)
      return
    }
    const id = toNodeId(raw.id)
    if (id === null) {
      errors.push(`Node at index ${i} has invalid id: ${formatValue(raw.id)}`)
      return
    }
    if (typeof raw.type !== 'string' || !hasType) return

    const node: TerrainNodeType = {
      id,
      type: raw.type,
      name: typeof raw.name === 'string' && raw.name !== '' ? raw.name : raw.type,
      properties: isRecord(raw.properties) ? { ...raw.properties } : {},
    }
    if (isRecord(raw.position) && typeof raw.position.x === 'number') {
      const y = raw.position.y
      if (typeof y === 'number') node.position = { x: raw.position.x, y }
    }
    nodes.push(node)
  })

  const rawConnections: unknown[] = Array.isArray(input.connections) ? input.connections : []
  rawConnections.forEach((raw, i) => {
    if (!isRecord(raw)) {
      errors.push(`Connection at index ${i} must be an object`)
      return
    }
    const from = toNodeId(raw.from_node ?? raw.source)
    const to = toNodeId(raw.to_node ?? raw.target)
    if (from === null || to === null) {
      errors.push(`Connection at index ${i} is missing a source or target node`)
      return
    }
    connections.push({
      from_node: from,
      to_node: to,
      from_port: port(raw.from_port, TERRAIN_CONSTANTS.DEFAULT_FROM_PORT),
      to_port: port(raw.to_port, TERRAIN_CONSTANTS.DEFAULT_TO_PORT),
    })
  })

  return { nodes, connections, errors }
}

/**
 * Validates a plain workflow and, unless running strict, returns a corrected
 * copy. `errors` and `valid` always describe the workflow as it came in.
 */
export class WorkflowValidator {
  private readonly validator: PropertyValidator
  private readonly logger: Logger

  constructor(
    private readonly registry: SchemaRegistry,
    logger?: Logger,
  ) {
    this.logger = logger ?? makeLogger('WorkflowValidator')
    this.validator = new PropertyValidator(registry, this.logger)
  }

  validateAndFix(workflow: unknown, strictMode = false): ValidateAndFixResultType {
    const { nodes, connections, errors } = normalizeWorkflow(workflow)
    const warnings: string[] = []

    for (const node of nodes) {
      if (!this.registry.isValidNodeType(node.type)) {
        errors.push(`Invalid node type '${node.type}' for node id '${node.id}'`)
        continue
      }
      const report = this.validator.validateNode(node.type, node.properties)
      errors.push(...report.errors)
    }

    const ids = new Set(nodes.map((n) => n.id))
    const connected = new Set<number>()
    for (const c of connections) {
      if (ids.has(c.from_node)) connected.add(c.from_node)
      else errors.push(`Connection references non-existent source node: ${c.from_node}`)
      if (ids.has(c.to_node)) connected.add(c.to_node)
      else errors.push(`Connection references non-existent target node: ${c.to_node}`)
      if (c.from_node === c.to_node) errors.push(`Node ${c.from_node} connects to itself`)
    }
    for (const node of nodes) {
      if (connected.has(node.id) || this.registry.isTerminalType(node.type)) continue
      warnings.push(`Node '${node.type}' (id: ${node.id}) is not connected to any other nodes`)
    }

    if (strictMode && errors.length > 0) {
      this.logger.info('strict validation failed', { errors: errors.length })
      return {
        valid: false,
        fixed: false,
        errors,
        warnings,
        fixes_applied: [],
        workflow: { nodes, connections },
      }
    }

    const fixes: string[] = []
    const unique = this.dropDuplicates(connections, fixes)
    const coerced = nodes.map((node) => this.writeCoerced(node, fixes))
    const repaired = autoFix(coerced, unique, this.registry)
    fixes.push(...repaired.fixesApplied)

    return {
      valid: errors.length === 0,
      fixed: fixes.length > 0,
      errors,
      warnings,
      fixes_applied: fixes,
      workflow: { nodes: repaired.nodes, connections: repaired.connections },
    }
  }

  private dropDuplicates(
    connections: readonly ConnectionType[],
    fixes: string[],
  ): ConnectionType[] {
    const seen = new Set<string>()
    const unique = connections.filter((c) => {
      const key = connectionKey(c)
      if (seen.has(key)) return false
      seen.add(key)
      return true
    })
    const removed = connections.length - unique.length
    if (removed > 0) fixes.push(`Removed ${removed} duplicate connections`)
    return unique
  }

  // Stores the validator's coerced values; failing properties are left for autoFix.
  private writeCoerced(node: TerrainNodeType, fixes: string[]): TerrainNodeType {
    if (!this.registry.isValidNodeType(node.type)) return node
    const properties = { ...node.properties }
    for (const [name, value] of Object.entries(node.properties)) {
      const check = this.validator.validate(node.type, name, value)
      if (!check.valid || stableStringify(check.value) === stableStringify(value)) continue
      properties[name] = check.value
      fixes.push(`Fixed ${node.name}.${name}: ${formatValue(value)} -> ${formatValue(check.value)}`)
    }
    return { ...node, properties }
  }
}
