import { type Logger, makeLogger } from '@terrakit/logger'
import { formatValue, isNumber, isRecord } from '@terrakit/utils'
import type { SchemaRegistry } from './registry.js'
import { type Float2Type, type PropertyDefinitionType, PropertyType } from './types/index.js'

export type PropertyFailure = 'type' | 'range' | 'enum' | 'shape'

export type PropertyCheck =
  | { valid: true; value: unknown; message: string | null }
  | { valid: false; reason: PropertyFailure; message: string; value: null }

export interface PropertyIssue {
  property: string
  reason: PropertyFailure
  message: string
}

export interface NodePropertyReport {
  valid: boolean
  errors: string[]
  warnings: string[]
  issues: PropertyIssue[]
  properties: Record<string, unknown>
}

export interface DefaultFill {
  properties: Record<string, unknown>
  added: Array<{ property: string; value: unknown }>
}

const BOOL_LITERALS = new Map<unknown, boolean>([
  [0, false],
  [1, true],
  ['0', false],
  ['1', true],
  ['true', true],
  ['false', false],
  ['True', true],
  ['False', false],
])

const fail = (reason: PropertyFailure, message: string): PropertyCheck => ({
  valid: false,
  reason,
  message,
  value: null,
})

const ok = (value: unknown, message: string | null = null): PropertyCheck => ({
  valid: true,
  value,
  message,
})

function toFloat(value: unknown): number | null {
  if (isNumber(value)) return value
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isFinite(n) ? n : null
  }
  return null
}

function toFloat2(value: unknown): Float2Type | null {
  if (isRecord(value)) {
    if (!('X' in value) || !('Y' in value)) return null
    const x = toFloat(value.X)
    const y = toFloat(value.Y)
    return x === null || y === null ? null : { X: x, Y: y }
  }
  if (Array.isArray(value) && value.length >= 2) {
    const x = toFloat(value[0])
    const y = toFloat(value[1])
    return x === null || y === null ? null : { X: x, Y: y }
  }
  return null
}

/**
 * The number an int or float property is range-checked against: ints are
 * rounded and may be given as digit strings. Null for anything else.
 */
export function readNumeric(definition: PropertyDefinitionType, value: unknown): number | null {
  switch (definition.type) {
    case PropertyType.int:
      if (isNumber(value)) return Math.round(value)
      return typeof value === 'string' && /^\d+$/.test(value) ? Number.parseInt(value, 10) : null
    case PropertyType.float:
      return isNumber(value) ? value : null
    default:
      return null
  }
}

/**
 * Coercive property validation against a {@link SchemaRegistry}.
 *
 * Type mismatches that have an obvious reading (integral floats, digit
 * strings, 0/1 for booleans, `[x, y]` pairs) are coerced; range and enum
 * violations are reported, never corrected here.
 */
export class PropertyValidator {
  private readonly logger: Logger

  constructor(
    private readonly registry: SchemaRegistry,
    logger?: Logger,
  ) {
    this.logger = logger ?? makeLogger('PropertyValidator')
  }

  validate(nodeType: string, name: string, value: unknown): PropertyCheck {
    const resolved = this.registry.resolveProperty(nodeType, name)
    if (!resolved) {
      const message = `Unknown property '${name}' for node type '${nodeType}'`
      this.logger.warn(message)
      return ok(value, message)
    }
    return this.coerce(nodeType, name, resolved.definition, value)
  }

  validateNode(nodeType: string, properties: Record<string, unknown>): NodePropertyReport {
    if (!this.registry.isValidNodeType(nodeType)) {
      return {
        valid: false,
        errors: [`Invalid node type: ${nodeType}`],
        warnings: [],
        issues: [],
        properties: {},
      }
    }

    const report: NodePropertyReport = {
      valid: true,
      errors: [],
      warnings: [],
      issues: [],
      properties: {},
    }
    for (const [name, value] of Object.entries(properties)) {
      const check = this.validate(nodeType, name, value)
      if (check.valid) {
        report.properties[name] = check.value
        if (check.message) report.warnings.push(`${nodeType}.${name}: ${check.message}`)
      } else {
        report.valid = false
        report.errors.push(`${nodeType}.${name}: ${check.message}`)
        report.issues.push({ property: name, reason: check.reason, message: check.message })
      }
    }
    return report
  }

  applyDefaults(nodeType: string, properties: Record<string, unknown>): DefaultFill {
    const filled: Record<string, unknown> = { ...properties }
    const added: DefaultFill['added'] = []
    for (const [name, definition] of Object.entries(
      this.registry.getPropertyDefinitions(nodeType),
    )) {
      if (Object.hasOwn(filled, name) || definition.default === undefined) continue
      const value = structuredClone(definition.default)
      filled[name] = value
      added.push({ property: name, value })
    }
    return { properties: filled, added }
  }

  private coerce(
    nodeType: string,
    name: string,
    definition: PropertyDefinitionType,
    value: unknown,
  ): PropertyCheck {
    switch (definition.type) {
      case PropertyType.int: {
        const n = readNumeric(definition, value)
        if (n === null) return fail('type', `Property '${name}' must be an integer`)
        let message: string | null = null
        if (isNumber(value) && n !== value) {
          message = `Rounded ${value} to ${n}`
          this.logger.warn(`${nodeType}.${name}: rounding float ${value} to int`)
        }
        return this.checkRange(definition, n, message)
      }

      case PropertyType.float: {
        const n = readNumeric(definition, value)
        if (n === null) return fail('type', `Property '${name}' must be numeric`)
        return this.checkRange(definition, n, null)
      }

      case PropertyType.bool: {
        if (typeof value === 'boolean') return ok(value)
        const literal = BOOL_LITERALS.get(value)
        if (literal === undefined) return fail('type', `Property '${name}' must be boolean`)
        return ok(literal)
      }

      case PropertyType.enum: {
        if (!definition.values) {
          this.logger.warn(`Enum property '${name}' missing values definition`)
          return ok(value)
        }
        if (typeof value === 'string' && definition.values.includes(value)) return ok(value)
        return fail(
          'enum',
          `Value '${formatValue(value)}' not in allowed values: [${definition.values.join(', ')}]`,
        )
      }

      case PropertyType.float2: {
        const point = toFloat2(value)
        if (!point) {
          return fail('shape', `Property '${name}' must be an object with X,Y or a [x, y] pair`)
        }
        return ok(point)
      }

      case PropertyType.string:
        return ok(formatValue(value))

      default: {
        const message = `Unknown property type '${definition.type}' for ${nodeType}.${name}`
        this.logger.warn(message)
        return ok(value, message)
      }
    }
  }

  private checkRange(
    definition: PropertyDefinitionType,
    value: number,
    message: string | null,
  ): PropertyCheck {
    if (definition.range) {
      const [min, max] = definition.range
      if (value < min || value > max) {
        return fail('range', `Value ${value} outside range [${min}, ${max}]`)
      }
    }
    return ok(value, message)
  }
}
