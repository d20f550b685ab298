import { describe, expect, it } from 'vitest'
import { isRecord } from '@terrakit/utils'
import { WorkflowExtractor } from '../extractor.js'
import { applyWorkflowToDocument } from '../writeBack.js'
import { projectDocument } from '../fixtures.js'

const extractor = new WorkflowExtractor()

function nodeTable(doc: Record<string, unknown>): Record<string, unknown> {
  const located = extractor.locateTerrain(doc)
  const table = located?.terrain.Nodes
  return isRecord(table) ? table : {}
}

describe('applyWorkflowToDocument', () => {
  it('writes properties, removed nodes and removed connections into a clone', () => {
    const doc = projectDocument([
      { id: 1, type: 'Mountain', props: { Scale: 9 } },
      { id: 2, type: 'Erosion', inputs: [{ from: 1 }] },
      { id: 3, type: 'SatMap', inputs: [{ from: 2 }] },
    ])
    const before = structuredClone(doc)
    const graph = extractor.extract(doc)

    const mountain = graph.nodes[0]
    if (mountain) mountain.properties.Scale = 5
    const updated = applyWorkflowToDocument(
      doc,
      {
        nodes: graph.nodes.filter((n) => n.id !== 3),
        connections: graph.connections.filter((c) => c.to_node !== 3),
      },
      extractor,
    )

    expect(doc).toEqual(before)
    expect(Object.keys(nodeTable(updated))).toEqual(['1', '2', '$id'])

    const again = extractor.extract(updated)
    expect(again.nodes.map((n) => [n.id, n.properties])).toEqual([
      [1, { Scale: 5 }],
      [2, {}],
    ])
    expect(again.connections).toEqual([
      { from_node: 1, to_node: 2, from_port: 'Out', to_port: 'In' },
    ])
  })

  it('drops only as many duplicate records as were removed', () => {
    const doc = projectDocument([
      { id: 1, type: 'Mountain' },
      { id: 2, type: 'Erosion', inputs: [{ from: 1 }, { from: 1 }, { from: 2 }] },
    ])
    const graph = extractor.extract(doc)
    expect(graph.connections).toHaveLength(3)

    const updated = applyWorkflowToDocument(doc, {
      nodes: graph.nodes,
      connections: [{ from_node: 1, to_node: 2, from_port: 'Out', to_port: 'In' }],
    })

    expect(extractor.extract(updated).connections).toEqual([
      { from_node: 1, to_node: 2, from_port: 'Out', to_port: 'In' },
    ])
  })

  it('returns an untouched clone when no terrain is present', () => {
    const doc = { Metadata: { Name: 'x' } }
    const updated = applyWorkflowToDocument(doc, { nodes: [], connections: [] })
    expect(updated).toEqual(doc)
    expect(updated).not.toBe(doc)
  })
})
