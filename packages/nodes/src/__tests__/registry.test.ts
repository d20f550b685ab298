import { describe, expect, it } from 'vitest'
import { TerrainError } from '@terrakit/utils'
import { SchemaRegistry } from '../registry.js'

const registry = SchemaRegistry.bundled()

describe('SchemaRegistry', () => {
  it('knows the bundled node types', () => {
    expect(registry.version).toBe('2.0')
    expect(registry.nodeTypes()).toHaveLength(187)
    expect(registry.isValidNodeType('Mountain')).toBe(true)
    expect(registry.isValidNodeType('ThisNodeDoesNotExist')).toBe(false)
  })

  it('returns the node table when one exists and the common table otherwise', () => {
    expect(Object.keys(registry.getPropertyDefinitions('Mountain'))).toContain('Style')
    expect(registry.hasNodeSpecificProperties('Voronoi')).toBe(false)
    expect(registry.getPropertyDefinitions('Voronoi').Octaves?.range).toEqual([1, 16])
    expect(registry.getPropertyDefinitions('ThisNodeDoesNotExist')).toBe(
      registry.getPropertyDefinitions('Voronoi'),
    )
  })

  it('resolves a property through the node table before the common one', () => {
    expect(registry.resolveProperty('Mountain', 'Scale')).toMatchObject({
      source: 'node',
      definition: { range: [0.1, 5] },
    })
    expect(registry.resolveProperty('Mountain', 'Octaves')?.source).toBe('common')
    expect(registry.resolveProperty('Mountain', 'Sparkle')).toBeNull()
  })

  it('classifies terminal and generator types by category', () => {
    expect(registry.categoryOf('Export')).toBe('output')
    expect(registry.isTerminalType('Unreal')).toBe(true)
    expect(registry.isTerminalType('Erosion')).toBe(false)
    expect(registry.isGeneratorType('Mountain')).toBe(true)
    expect(registry.typesInCategory('output')).toContain('Unity')
  })

  it('exposes frozen tables', () => {
    expect(Object.isFrozen(registry.getPropertyDefinitions('Mountain'))).toBe(true)
    expect(Object.isFrozen(registry.toSnapshot().valid_node_types)).toBe(true)
  })

  it('rejects a malformed snapshot', () => {
    expect(() => SchemaRegistry.parse({ version: '2.0', valid_node_types: 'Mountain' })).toThrow(
      TerrainError,
    )
  })

  it('reports a missing snapshot file as a FILE error', () => {
    try {
      SchemaRegistry.fromFile('/nonexistent/schema.json')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(TerrainError)
      expect(err instanceof TerrainError && err.code).toBe('FILE')
    }
  })
})
