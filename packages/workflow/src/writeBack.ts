import { deepClone, isRecord } from '@terrakit/utils'
import {
  SYSTEM_KEYS,
  WorkflowExtractor,
  entryNodeId,
  nodeEntries,
  recordToConnection,
} from './extractor.js'
import { connectionKey } from './helper.js'
import type { WorkflowGraphType } from './types.js'

/**
 * Copies a repaired workflow back into a clone of the document it came from.
 *
 * Node entries missing from `graph` are deleted, property values are
 * overwritten, and port records whose connection no longer exists are
 * dropped. Everything else in the document is kept as it was.
 */
export function applyWorkflowToDocument(
  document: Record<string, unknown>,
  graph: Readonly<WorkflowGraphType>,
  extractor: WorkflowExtractor = new WorkflowExtractor(),
): Record<string, unknown> {
  const clone = deepClone(document)
  const located = extractor.locateTerrain(clone)
  if (!located || !isRecord(located.terrain.Nodes)) return clone

  const table = located.terrain.Nodes
  const byId = new Map(graph.nodes.map((n) => [n.id, n]))
  const remaining = new Map<string, number>()
  for (const c of graph.connections) {
    const key = connectionKey(c)
    remaining.set(key, (remaining.get(key) ?? 0) + 1)
  }

  nodeEntries(table).forEach(([key, entry], index) => {
    const node = byId.get(entryNodeId(key, entry, index))
    if (!node) {
      delete table[key]
      return
    }
    for (const [name, value] of Object.entries(node.properties)) {
      if (!SYSTEM_KEYS.has(name)) entry[name] = value
    }
    dropStaleRecords(entry, remaining)
  })

  return clone
}

function dropStaleRecords(entry: Record<string, unknown>, remaining: Map<string, number>): void {
  const ports = entry.Ports
  if (!isRecord(ports) || !Array.isArray(ports.$values)) return

  for (const port of ports.$values) {
    if (!isRecord(port) || !isRecord(port.Record)) continue
    const connection = recordToConnection(port.Record)
    if (!connection) continue

    const key = connectionKey(connection)
    const count = remaining.get(key) ?? 0
    if (count > 0) {
      remaining.set(key, count - 1)
    } else {
      delete port.Record
    }
  }
}
