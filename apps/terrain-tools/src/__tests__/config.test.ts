import { describe, expect, it } from 'vitest'
import { loadConfig } from '../config.js'

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      PORT: 8007,
      HOST: '0.0.0.0',
      CACHE_TTL_SECONDS: 3600,
      ALLOWED_ORIGINS: ['*'],
      BODY_LIMIT: '10mb',
    })
  })

  it('coerces numbers and splits origins', () => {
    const config = loadConfig({
      PORT: '9100',
      CACHE_TTL_SECONDS: '60',
      ALLOWED_ORIGINS: 'http://a.test, http://b.test,',
      LOG_LEVEL: 'warn',
      SCHEMA_PATH: '',
    })

    expect(config.PORT).toBe(9100)
    expect(config.CACHE_TTL_SECONDS).toBe(60)
    expect(config.ALLOWED_ORIGINS).toEqual(['http://a.test', 'http://b.test'])
    expect(config.LOG_LEVEL).toBe('warn')
    expect(config.SCHEMA_PATH).toBeUndefined()
  })

  it('throws on invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration \(PORT: /)
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/)
  })
})
