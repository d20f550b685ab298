import { hasCycle, indexConnections } from './helper.js'
import type { ConnectionType, NodeIdType, TerrainNodeType } from './types.js'

export interface WorkflowStructure {
  node_count: number
  connection_count: number
  orphaned_nodes: NodeIdType[]
  start_nodes: NodeIdType[]
  end_nodes: NodeIdType[]
  node_types: Record<string, number>
  has_cycle: boolean
}

export function analyzeWorkflowStructure(
  nodes: readonly TerrainNodeType[],
  connections: readonly ConnectionType[],
): WorkflowStructure {
  const { outgoing, incoming } = indexConnections(connections)
  const orphaned: NodeIdType[] = []
  const starts: NodeIdType[] = []
  const ends: NodeIdType[] = []
  const nodeTypes: Record<string, number> = {}

  for (const node of nodes) {
    nodeTypes[node.type] = (nodeTypes[node.type] ?? 0) + 1
    const hasIn = incoming.has(node.id)
    const hasOut = outgoing.has(node.id)
    if (!hasIn && !hasOut) {
      orphaned.push(node.id)
      continue
    }
    if (!hasIn) starts.push(node.id)
    if (!hasOut) ends.push(node.id)
  }

  return {
    node_count: nodes.length,
    connection_count: connections.length,
    orphaned_nodes: orphaned,
    start_nodes: starts,
    end_nodes: ends,
    node_types: nodeTypes,
    has_cycle: hasCycle({ nodes: [...nodes], connections: [...connections] }),
  }
}
