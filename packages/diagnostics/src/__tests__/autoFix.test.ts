import { describe, expect, it } from 'vitest'
import { SchemaRegistry } from '@terrakit/nodes'
import type { ConnectionType, TerrainNodeType } from '@terrakit/workflow'
import { autoFix } from '../autoFix.js'

const registry = SchemaRegistry.bundled()

function link(from: number, to: number): ConnectionType {
  return { from_node: from, to_node: to, from_port: 'Out', to_port: 'In' }
}

const nodes: TerrainNodeType[] = [
  {
    id: 1,
    type: 'Mountain',
    name: 'Peak',
    properties: { Scale: 9, Height: -0.5, Style: 'Alpine' },
  },
  { id: 2, type: 'Rivers', name: 'Flow', properties: { Headwaters: 1500 } },
]

describe('autoFix', () => {
  it('removes self-loops and dangling connections and clamps ranges', () => {
    const result = autoFix(nodes, [link(1, 2), link(2, 2), link(2, 42)], registry)

    expect(result.connections).toEqual([link(1, 2)])
    expect(result.nodes[0]?.properties).toEqual({ Scale: 5, Height: 0, Style: 'Alpine' })
    expect(result.nodes[1]?.properties).toEqual({ Headwaters: 1000 })
    expect(result.fixesApplied).toEqual([
      'Removed self-connection on node 2',
      'Fixed Peak.Scale: 9 -> 5',
      'Fixed Peak.Height: -0.5 -> 0',
      'Fixed Flow.Headwaters: 1500 -> 1000',
      'Removed invalid connection: 2 -> 42',
    ])
  })

  it('clamps integers given as digit strings', () => {
    const seeded: TerrainNodeType[] = [
      { id: 1, type: 'Mountain', name: 'Peak', properties: { Seed: '5000000' } },
      { id: 2, type: 'Mountain', name: 'Hill', properties: { Seed: '12', Scale: 'big' } },
    ]
    const result = autoFix(seeded, [], registry)

    expect(result.nodes[0]?.properties.Seed).toBe(999999)
    expect(result.nodes[1]?.properties).toEqual({ Seed: '12', Scale: 'big' })
    expect(result.fixesApplied).toEqual(['Fixed Peak.Seed: 5000000 -> 999999'])
  })

  it('leaves its inputs untouched', () => {
    autoFix(nodes, [link(1, 1)], registry)
    expect(nodes[0]?.properties.Scale).toBe(9)
  })

  it('reports nothing when run on its own output', () => {
    const first = autoFix(nodes, [link(1, 2), link(1, 1), link(3, 1)], registry)
    const second = autoFix(first.nodes, first.connections, registry)

    expect(second.fixesApplied).toEqual([])
    expect(second.nodes).toEqual(first.nodes)
    expect(second.connections).toEqual(first.connections)
  })
})
