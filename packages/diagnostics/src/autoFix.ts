import { type SchemaRegistry, readNumeric } from '@terrakit/nodes'
import { deepClone } from '@terrakit/utils'
import type { ConnectionType, TerrainNodeType } from '@terrakit/workflow'

export interface AutoFixResult {
  nodes: TerrainNodeType[]
  connections: ConnectionType[]
  fixesApplied: string[]
}

/**
 * Applies the fixes that need no judgement: drops self-loops, clamps numeric
 * properties (digit strings included) into their declared range and drops
 * connections to unknown nodes. Works on copies; running it on its own
 * output reports nothing.
 */
export function autoFix(
  nodes: readonly TerrainNodeType[],
  connections: readonly ConnectionType[],
  registry: SchemaRegistry,
): AutoFixResult {
  const fixesApplied: string[] = []
  const fixedNodes = deepClone([...nodes])

  let kept = connections.filter((c) => {
    if (c.from_node !== c.to_node) return true
    fixesApplied.push(`Removed self-connection on node ${c.from_node}`)
    return false
  })

  for (const node of fixedNodes) {
    for (const [name, value] of Object.entries(node.properties)) {
      const definition = registry.resolveProperty(node.type, name)?.definition
      if (!definition?.range) continue
      const n = readNumeric(definition, value)
      if (n === null) continue
      const [min, max] = definition.range
      const clamped = Math.min(Math.max(n, min), max)
      if (clamped === n) continue
      node.properties[name] = clamped
      fixesApplied.push(`Fixed ${node.name}.${name}: ${value} -> ${clamped}`)
    }
  }

  const ids = new Set(fixedNodes.map((n) => n.id))
  kept = kept.filter((c) => {
    if (ids.has(c.from_node) && ids.has(c.to_node)) return true
    fixesApplied.push(`Removed invalid connection: ${c.from_node} -> ${c.to_node}`)
    return false
  })

  return { nodes: fixedNodes, connections: deepClone(kept), fixesApplied }
}
