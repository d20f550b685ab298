export * from './errors.js'

export const TERRAIN_CONSTANTS = {
  DEFAULT_CACHE_TTL_SECONDS: 3600,
  DEFAULT_FROM_PORT: 'Out',
  DEFAULT_TO_PORT: 'In',
  PATTERN_SIMILARITY_THRESHOLD: 0.5,
}

export const deepClone = <T>(x: T): T => {
  return structuredClone(x)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * JSON with object keys sorted at every depth, so equal data always yields
 * the same text regardless of key insertion order.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'null'
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys)
  if (isRecord(value)) {
    const out: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      out[key] = sortKeys(value[key])
    }
    return out
  }
  return value
}

// Renders values for human-readable log lines and messages.
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (value === null || value === undefined) return String(value)
  return JSON.stringify(value) ?? String(value)
}

export function deepFreeze<T>(x: T): T {
  if (typeof x === 'object' && x !== null && !Object.isFrozen(x)) {
    Object.freeze(x)
    for (const value of Object.values(x)) deepFreeze(value)
  }
  return x
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}
