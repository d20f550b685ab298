import { describe, expect, it } from 'vitest'
import { SchemaRegistry } from '../registry.js'
import { PropertyValidator } from '../validator.js'

const registry = SchemaRegistry.bundled()
const validator = new PropertyValidator(registry)

describe('PropertyValidator.validate', () => {
  it('accepts integral numbers for every declared int property', () => {
    const snapshot = registry.toSnapshot()
    const tables = [
      ...Object.entries(snapshot.node_properties),
      ['Voronoi', snapshot.common_properties] as const,
    ]
    let checked = 0
    for (const [nodeType, table] of tables) {
      for (const [name, definition] of Object.entries(table)) {
        if (definition.type !== 'int') continue
        const value = definition.range ? definition.range[0] : 5397.0
        const check = validator.validate(nodeType, name, value)
        expect(check.valid, `${nodeType}.${name}`).toBe(true)
        expect(Number.isInteger(check.value)).toBe(true)
        checked++
      }
    }
    expect(checked).toBeGreaterThan(30)
  })

  it('coerces an integral float to an int', () => {
    expect(validator.validate('Mountain', 'Seed', 5397.0)).toEqual({
      valid: true,
      value: 5397,
      message: null,
    })
  })

  it('rounds a fractional int with a warning', () => {
    expect(validator.validate('Mountain', 'Seed', 12.6)).toEqual({
      valid: true,
      value: 13,
      message: 'Rounded 12.6 to 13',
    })
  })

  it('coerces digit strings and rejects other strings for ints', () => {
    expect(validator.validate('Mountain', 'Seed', '42')).toMatchObject({ valid: true, value: 42 })
    expect(validator.validate('Mountain', 'Seed', 'abc')).toEqual({
      valid: false,
      reason: 'type',
      message: "Property 'Seed' must be an integer",
      value: null,
    })
  })

  it('enforces numeric ranges inclusively', () => {
    expect(validator.validate('Mountain', 'Scale', 0.05)).toMatchObject({
      valid: false,
      reason: 'range',
      message: 'Value 0.05 outside range [0.1, 5]',
    })
    expect(validator.validate('Mountain', 'Scale', 5.01).valid).toBe(false)
    expect(validator.validate('Mountain', 'Scale', 0.1).valid).toBe(true)
    expect(validator.validate('Mountain', 'Scale', 5).valid).toBe(true)
    expect(validator.validate('Mountain', 'Scale', 2.5)).toMatchObject({ valid: true, value: 2.5 })
  })

  it('rejects non-numeric floats', () => {
    expect(validator.validate('Mountain', 'Height', 'tall')).toMatchObject({
      valid: false,
      reason: 'type',
      message: "Property 'Height' must be numeric",
    })
  })

  it('enforces enum membership and names the allowed values', () => {
    expect(validator.validate('Mountain', 'Style', 'Volcanic')).toEqual({
      valid: false,
      reason: 'enum',
      message: "Value 'Volcanic' not in allowed values: [Basic, Eroded, Old, Alpine, Strata]",
      value: null,
    })
    expect(validator.validate('Mountain', 'Style', 'Alpine')).toMatchObject({ valid: true })
  })

  it('tolerates unknown properties with an advisory message', () => {
    expect(validator.validate('Mountain', 'Sparkle', { level: 3 })).toEqual({
      valid: true,
      value: { level: 3 },
      message: "Unknown property 'Sparkle' for node type 'Mountain'",
    })
  })

  it('coerces boolean literals', () => {
    expect(validator.validate('Mountain', 'ReduceDetails', 'True')).toMatchObject({ value: true })
    expect(validator.validate('Mountain', 'ReduceDetails', 0)).toMatchObject({ value: false })
    expect(validator.validate('Mountain', 'ReduceDetails', 'yes').valid).toBe(false)
  })

  it('normalises float2 values', () => {
    expect(validator.validate('SatMap', 'Range', [0.2, 0.8])).toMatchObject({
      value: { X: 0.2, Y: 0.8 },
    })
    expect(validator.validate('SatMap', 'Range', { X: '1', Y: 2 })).toMatchObject({
      value: { X: 1, Y: 2 },
    })
    expect(validator.validate('SatMap', 'Range', 'wide')).toMatchObject({
      valid: false,
      reason: 'shape',
    })
  })

  it('stringifies string properties', () => {
    expect(validator.validate('Portal', 'PortalName', 12)).toMatchObject({ value: '12' })
  })

  it('passes through unrecognised schema types and enums without values', () => {
    const custom = new PropertyValidator(
      SchemaRegistry.parse({
        version: 'test',
        valid_node_types: ['Custom'],
        node_properties: {
          Custom: { Profile: { type: 'curve' }, Mode: { type: 'enum' } },
        },
        common_properties: {},
      }),
    )

    expect(custom.validate('Custom', 'Profile', [0, 1, 0])).toEqual({
      valid: true,
      value: [0, 1, 0],
      message: "Unknown property type 'curve' for Custom.Profile",
    })
    expect(custom.validate('Custom', 'Mode', 'anything')).toEqual({
      valid: true,
      value: 'anything',
      message: null,
    })
  })
})

describe('PropertyValidator.validateNode', () => {
  it('accepts a clean Mountain and coerces its seed', () => {
    const report = validator.validateNode('Mountain', {
      Scale: 1.5,
      Height: 0.8,
      Style: 'Alpine',
      Seed: 12345.0,
    })

    expect(report.valid).toBe(true)
    expect(report.errors).toEqual([])
    expect(report.properties.Seed).toBe(12345)
    expect(Number.isInteger(report.properties.Seed)).toBe(true)
  })

  it('prefixes errors with the node type and property', () => {
    const report = validator.validateNode('Mountain', { Scale: 9, Style: 'Flat', Sparkle: 1 })

    expect(report.errors).toEqual([
      'Mountain.Scale: Value 9 outside range [0.1, 5]',
      "Mountain.Style: Value 'Flat' not in allowed values: [Basic, Eroded, Old, Alpine, Strata]",
    ])
    expect(report.issues.map((i) => i.reason)).toEqual(['range', 'enum'])
    expect(report.warnings).toEqual([
      "Mountain.Sparkle: Unknown property 'Sparkle' for node type 'Mountain'",
    ])
  })

  it('rejects unknown node types', () => {
    expect(validator.validateNode('ThisNodeDoesNotExist', { Scale: 1 })).toMatchObject({
      valid: false,
      errors: ['Invalid node type: ThisNodeDoesNotExist'],
    })
  })
})

describe('PropertyValidator.applyDefaults', () => {
  it('fills only absent properties that declare a default', () => {
    const fill = validator.applyDefaults('Combine', { Mode: 'Add' })

    expect(fill.properties).toEqual({ Mode: 'Add', Ratio: 0.5, Clamp: 'Clamp' })
    expect(fill.added).toEqual([
      { property: 'Ratio', value: 0.5 },
      { property: 'Clamp', value: 'Clamp' },
    ])
  })
})
