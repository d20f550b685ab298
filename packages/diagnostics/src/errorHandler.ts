import { type Logger, makeLogger } from '@terrakit/logger'
import { type PropertyFailure, PropertyValidator, type SchemaRegistry } from '@terrakit/nodes'
import type { ConnectionType, TerrainNodeType } from '@terrakit/workflow'
import {
  Category,
  type Diagnostic,
  type ErrorSummaryType,
  type FixCapabilityType,
  Severity,
  isAutoFixable,
} from './types.js'

export const HEAVY_NODE_TYPES: ReadonlySet<string> = new Set([
  'Erosion',
  'Erosion2',
  'Wizard',
  'Rivers',
  'Snow',
  'Thermal2',
])
export const EROSION_NODE_TYPES: ReadonlySet<string> = new Set(['Erosion', 'Erosion2'])

export const MAX_HEAVY_NODES = 5
export const MAX_EROSION_CHAIN = 3

const FIX_FOR_REASON: Record<PropertyFailure, FixCapabilityType> = {
  range: 'clamp',
  enum: 'none',
  type: 'none',
  shape: 'none',
}

/**
 * Collects diagnostics for one validation run and owns the connection,
 * property and performance checks that produce them.
 *
 * Instances hold per-run state; create one per call rather than sharing.
 */
export class ErrorHandler {
  private diagnostics: Diagnostic[] = []
  private readonly validator: PropertyValidator
  private readonly logger: Logger

  constructor(
    private readonly registry: SchemaRegistry,
    validator?: PropertyValidator,
    logger?: Logger,
  ) {
    this.logger = logger ?? makeLogger('ErrorHandler')
    this.validator = validator ?? new PropertyValidator(registry, this.logger)
  }

  add(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic)
    const line = `${diagnostic.category}: ${diagnostic.message}`
    switch (diagnostic.severity) {
      case Severity.CRITICAL:
      case Severity.ERROR:
        this.logger.error(line)
        break
      case Severity.WARNING:
        this.logger.warn(line)
        break
      default:
        this.logger.info(line)
    }
  }

  clear(): void {
    this.diagnostics = []
  }

  all(): readonly Diagnostic[] {
    return this.diagnostics
  }

  bySeverity(severity: Severity): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === severity)
  }

  byCategory(category: Category): Diagnostic[] {
    return this.diagnostics.filter((d) => d.category === category)
  }

  forNode(nodeId: number): Diagnostic[] {
    return this.diagnostics.filter((d) => d.nodeId === nodeId)
  }

  hasCritical(): boolean {
    return this.diagnostics.some((d) => d.severity === Severity.CRITICAL)
  }

  autoFixable(): Diagnostic[] {
    return this.diagnostics.filter(isAutoFixable)
  }

  summary(): ErrorSummaryType {
    const byCategory: Record<Category, number> = {
      [Category.VALIDATION]: 0,
      [Category.CONNECTION]: 0,
      [Category.PROPERTY]: 0,
      [Category.STRUCTURE]: 0,
      [Category.COMPATIBILITY]: 0,
      [Category.PERFORMANCE]: 0,
    }
    for (const d of this.diagnostics) byCategory[d.category] += 1

    return {
      total_errors: this.diagnostics.length,
      critical: this.bySeverity(Severity.CRITICAL).length,
      errors: this.bySeverity(Severity.ERROR).length,
      warnings: this.bySeverity(Severity.WARNING).length,
      info: this.bySeverity(Severity.INFO).length,
      auto_fixable: this.autoFixable().length,
      has_critical: this.hasCritical(),
      by_category: byCategory,
    }
  }

  /** Orphans, self-loops and dangling endpoints, checked against a set of node ids. */
  validateConnections(
    nodes: readonly TerrainNodeType[],
    connections: readonly ConnectionType[],
  ): Diagnostic[] {
    const found: Diagnostic[] = []
    const ids = new Set(nodes.map((n) => n.id))
    const connected = new Set<number>()
    for (const c of connections) {
      connected.add(c.from_node)
      connected.add(c.to_node)
    }

    for (const node of nodes) {
      if (connected.has(node.id) || this.registry.isTerminalType(node.type)) continue
      found.push({
        message: `Node '${node.name || 'Unnamed'}' is not connected to anything`,
        severity: Severity.WARNING,
        category: Category.CONNECTION,
        nodeId: node.id,
        suggestion: 'Connect this node to the workflow or remove it',
        fix: 'none',
      })
    }

    for (const c of connections) {
      if (c.from_node !== c.to_node) continue
      found.push({
        message: `Node ${c.from_node} connects to itself`,
        severity: Severity.ERROR,
        category: Category.CONNECTION,
        nodeId: c.from_node,
        suggestion: 'Remove self-connection',
        fix: 'removal',
      })
    }

    for (const c of connections) {
      for (const [end, id] of [
        ['source', c.from_node],
        ['target', c.to_node],
      ] as const) {
        if (ids.has(id)) continue
        found.push({
          message: `Connection references non-existent ${end} node: ${id}`,
          severity: Severity.CRITICAL,
          category: Category.CONNECTION,
          suggestion: 'Remove this connection or add the missing node',
          fix: 'removal',
        })
      }
    }

    found.forEach((d) => this.add(d))
    return found
  }

  /** Unknown node types and property failures for every node. */
  validateNodes(nodes: readonly TerrainNodeType[]): Diagnostic[] {
    const found: Diagnostic[] = []
    for (const node of nodes) {
      if (!this.registry.isValidNodeType(node.type)) {
        const diagnostic: Diagnostic = {
          message: `Invalid node type: ${node.type}`,
          severity: Severity.CRITICAL,
          category: Category.VALIDATION,
          nodeId: node.id,
          suggestion: 'Replace the node with a supported node type',
          fix: 'none',
        }
        this.add(diagnostic)
        found.push(diagnostic)
        continue
      }
      found.push(...this.validateProperties(node))
    }
    return found
  }

  validateProperties(node: TerrainNodeType): Diagnostic[] {
    const found: Diagnostic[] = []
    for (const [name, value] of Object.entries(node.properties)) {
      const check = this.validator.validate(node.type, name, value)
      if (check.valid) continue

      const definition = this.registry.resolveProperty(node.type, name)?.definition
      let suggestion: string | undefined
      if (check.reason === 'range' && definition?.range) {
        suggestion = `Set value between ${definition.range[0]} and ${definition.range[1]}`
      } else if (check.reason === 'enum' && definition?.values) {
        suggestion = `Use one of: ${definition.values.join(', ')}`
      }

      const diagnostic: Diagnostic = {
        message: `${node.name}.${name}: ${check.message}`,
        severity: Severity.ERROR,
        category: Category.PROPERTY,
        nodeId: node.id,
        propertyName: name,
        fix: FIX_FOR_REASON[check.reason],
      }
      if (suggestion) diagnostic.suggestion = suggestion
      this.add(diagnostic)
      found.push(diagnostic)
    }
    return found
  }

  checkPerformance(
    nodes: readonly TerrainNodeType[],
    connections: readonly ConnectionType[],
  ): Diagnostic[] {
    const found: Diagnostic[] = []

    const heavy = nodes.filter((n) => HEAVY_NODE_TYPES.has(n.type)).length
    if (heavy > MAX_HEAVY_NODES) {
      found.push({
        message: `Project has ${heavy} heavy computation nodes which may cause slow processing`,
        severity: Severity.WARNING,
        category: Category.PERFORMANCE,
        suggestion:
          'Consider reducing the number of erosion/simulation nodes or use lower settings',
        fix: 'none',
      })
    }

    for (const chain of erosionChains(nodes, connections)) {
      if (chain.length <= MAX_EROSION_CHAIN) continue
      found.push({
        message: `Long erosion chain detected with ${chain.length} nodes`,
        severity: Severity.WARNING,
        category: Category.PERFORMANCE,
        nodeId: chain[0],
        suggestion: 'Consider combining erosion effects or reducing chain length',
        fix: 'none',
      })
    }

    found.forEach((d) => this.add(d))
    return found
  }
}

/**
 * Maximal runs of erosion nodes linked through each node's first outgoing
 * connection. Every erosion node belongs to at most one chain.
 */
export function erosionChains(
  nodes: readonly TerrainNodeType[],
  connections: readonly ConnectionType[],
): number[][] {
  const typeById = new Map(nodes.map((n) => [n.id, n.type]))
  const isErosion = (id: number | undefined): id is number =>
    id !== undefined && EROSION_NODE_TYPES.has(typeById.get(id) ?? '')

  const firstOut = new Map<number, number>()
  for (const c of connections) {
    if (!firstOut.has(c.from_node)) firstOut.set(c.from_node, c.to_node)
  }

  const continued = new Set<number>()
  for (const [from, to] of firstOut) {
    if (isErosion(from) && isErosion(to) && from !== to) continued.add(to)
  }

  const erosionIds = nodes.filter((n) => EROSION_NODE_TYPES.has(n.type)).map((n) => n.id)
  const heads = [
    ...erosionIds.filter((id) => !continued.has(id)),
    ...erosionIds.filter((id) => continued.has(id)),
  ]

  const visited = new Set<number>()
  const chains: number[][] = []
  for (const head of heads) {
    if (visited.has(head)) continue
    const chain: number[] = []
    let current: number | undefined = head
    while (isErosion(current) && !visited.has(current)) {
      visited.add(current)
      chain.push(current)
      current = firstOut.get(current)
    }
    chains.push(chain)
  }
  return chains
}
