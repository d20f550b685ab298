import { describe, expect, it } from 'vitest'
import { TerrainError } from '@terrakit/utils'
import { WorkflowExtractor } from '../extractor.js'
import { UNKNOWN_NODE_TYPE, parseNodeTypeIdentifier } from '../typeIdentifier.js'
import { projectDocument, terrainBlock } from '../fixtures.js'

const extractor = new WorkflowExtractor()

describe('parseNodeTypeIdentifier', () => {
  it('takes the second-to-last segment and strips the assembly suffix', () => {
    expect(parseNodeTypeIdentifier('QuadSpinner.Gaea.Nodes.Mountain, Gaea.Nodes')).toBe('Mountain')
    expect(parseNodeTypeIdentifier('QuadSpinner.Gaea.Nodes.Erosion2, Gaea.Nodes')).toBe('Erosion2')
  })

  it('keeps an undotted name and flags missing identifiers', () => {
    expect(parseNodeTypeIdentifier('Mountain')).toBe('Mountain')
    expect(parseNodeTypeIdentifier('')).toBe(UNKNOWN_NODE_TYPE)
    expect(parseNodeTypeIdentifier(42)).toBe(UNKNOWN_NODE_TYPE)
  })
})

describe('WorkflowExtractor', () => {
  it('extracts nodes and connections from the asset collection shape', () => {
    const doc = projectDocument([
      { id: 10, type: 'Mountain', name: 'Peak', props: { Scale: 1.5, Height: 0.8 } },
      { id: 11, type: 'Erosion', inputs: [{ from: 10 }] },
    ])

    const result = extractor.extract(doc)

    expect(result.shape).toBe('asset-values')
    expect(result.nodes).toEqual([
      {
        id: 10,
        type: 'Mountain',
        name: 'Peak',
        properties: { Scale: 1.5, Height: 0.8 },
        position: { x: 25010, y: 26000 },
      },
      {
        id: 11,
        type: 'Erosion',
        name: 'Erosion',
        properties: {},
        position: { x: 25011, y: 26000 },
      },
    ])
    expect(result.connections).toEqual([
      { from_node: 10, to_node: 11, from_port: 'Out', to_port: 'In' },
    ])
  })

  it('finds a bare Terrain key and a legacy keyed asset', () => {
    const nodes = [{ id: 1, type: 'Mountain' }]
    const bare = extractor.extract({ Terrain: terrainBlock(nodes) })
    expect(bare.shape).toBe('bare-terrain')
    expect(bare.nodes.map((n) => n.type)).toEqual(['Mountain'])

    const legacy = extractor.extract({ Assets: { main: { Terrain: terrainBlock(nodes) } } })
    expect(legacy.shape).toBe('legacy-asset')
    expect(legacy.nodes.map((n) => n.id)).toEqual([1])
  })

  it('returns empty lists when no terrain can be located', () => {
    expect(extractor.extract({ Metadata: {} })).toEqual({ nodes: [], connections: [], shape: null })
  })

  it('rejects a document that is not an object', () => {
    expect(() => extractor.extract([1, 2])).toThrow(TerrainError)
    let caught: unknown
    try {
      extractor.extract('text')
    } catch (err) {
      caught = err
    }
    expect(caught).toMatchObject({ code: 'STRUCTURE', message: 'Project data must be an object' })
  })

  it('drops port records with a missing endpoint', () => {
    const doc = projectDocument([
      { id: 1, type: 'Mountain' },
      { id: 2, type: 'Erosion', inputs: [{ from: null }, { from: 1, to: null }] },
    ])
    expect(extractor.extract(doc).connections).toEqual([])
  })

  it('keeps duplicated connections with unconventional ports', () => {
    const swapped = { from: 1, fromPort: 'In', toPort: 'Out' }
    const doc = projectDocument([
      { id: 1, type: 'Mountain' },
      { id: 2, type: 'Erosion', inputs: [swapped, swapped] },
    ])

    const { connections } = extractor.extract(doc)

    expect(connections).toHaveLength(2)
    expect(connections[0]).toEqual({ from_node: 1, to_node: 2, from_port: 'In', to_port: 'Out' })
    expect(connections[1]).toEqual(connections[0])
  })

  it('falls back to the table key and then the entry position for ids', () => {
    const doc = {
      Terrain: {
        Nodes: {
          $id: '6',
          '7': { $type: 'QuadSpinner.Gaea.Nodes.Mountain, Gaea.Nodes' },
          extra: { $type: 'QuadSpinner.Gaea.Nodes.SatMap, Gaea.Nodes' },
        },
      },
    }
    expect(extractor.extract(doc).nodes.map((n) => [n.id, n.type])).toEqual([
      [7, 'Mountain'],
      [2, 'SatMap'],
    ])
  })
})
