import { makeLogger } from '@terrakit/logger'
import type { ConnectionType, NodeIdType, TerrainNodeType, WorkflowGraphType } from './types.js'

const logger = makeLogger('helper')

export interface ConnectionIndex {
  outgoing: Map<NodeIdType, NodeIdType[]>
  incoming: Map<NodeIdType, NodeIdType[]>
}

export function indexConnections(connections: readonly ConnectionType[]): ConnectionIndex {
  const outgoing = new Map<NodeIdType, NodeIdType[]>()
  const incoming = new Map<NodeIdType, NodeIdType[]>()
  for (const c of connections) {
    const outs = outgoing.get(c.from_node)
    if (outs) outs.push(c.to_node)
    else outgoing.set(c.from_node, [c.to_node])

    const ins = incoming.get(c.to_node)
    if (ins) ins.push(c.from_node)
    else incoming.set(c.to_node, [c.from_node])
  }
  return { outgoing, incoming }
}

export function connectionKey(c: ConnectionType): string {
  return `${c.from_node}:${c.from_port}->${c.to_node}:${c.to_port}`
}

export function hasCycle(graph: Readonly<WorkflowGraphType>): boolean {
  const ids = new Set(graph.nodes.map((n) => n.id))
  const inDegree = new Map<NodeIdType, number>()
  ids.forEach((id) => inDegree.set(id, 0))

  const edges = graph.connections.filter((c) => ids.has(c.from_node) && ids.has(c.to_node))
  edges.forEach((e) => {
    inDegree.set(e.to_node, (inDegree.get(e.to_node) ?? 0) + 1)
  })
  const { outgoing } = indexConnections(edges)

  const queue: NodeIdType[] = []
  for (const [id, deg] of inDegree.entries()) {
    if (deg === 0) queue.push(id)
  }

  let visitedCount = 0
  for (const id of queue) {
    visitedCount++
    for (const to of outgoing.get(id) ?? []) {
      const deg = (inDegree.get(to) ?? 0) - 1
      inDegree.set(to, deg)
      if (deg === 0) queue.push(to)
    }
  }

  return visitedCount !== ids.size
}

/**
 * Walks from the first node without an incoming edge (falling back to the
 * first node) along first successors until a dead end or a revisit.
 */
export function traceMainPath(
  nodes: readonly TerrainNodeType[],
  connections: readonly ConnectionType[],
): TerrainNodeType[] {
  if (nodes.length === 0) return []

  const byId = new Map(nodes.map((n) => [n.id, n]))
  const { outgoing, incoming } = indexConnections(connections)
  const start = nodes.find((n) => !incoming.has(n.id)) ?? nodes[0]
  if (!start) return []

  const path: TerrainNodeType[] = []
  const visited = new Set<NodeIdType>()
  let current: TerrainNodeType | undefined = start
  while (current && !visited.has(current.id)) {
    visited.add(current.id)
    path.push(current)
    const next: NodeIdType | undefined = outgoing.get(current.id)?.[0]
    current = next === undefined ? undefined : byId.get(next)
  }

  logger.trace(`main path of ${path.length} nodes from ${start.id}`)
  return path
}
