import { Writable } from 'node:stream'
import { describe, expect, it } from 'vitest'
import { createLogger } from '../index.js'

function capture() {
  const lines: Record<string, unknown>[] = []
  const destination = new Writable({
    write(chunk: Buffer, _enc, done) {
      lines.push(JSON.parse(chunk.toString()))
      done()
    },
  })
  return { lines, destination }
}

describe('createLogger', () => {
  it('writes child bindings and meta alongside the message', () => {
    const { lines, destination } = capture()
    const log = createLogger({ level: 'info', destination }).child({ service: 'repair' })

    log.info('analysis done', { nodes: 3 })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({ service: 'repair', nodes: 3, msg: 'analysis done', level: 30 })
  })

  it('drops records below the configured level', () => {
    const { lines, destination } = capture()
    const log = createLogger({ level: 'warn', destination })

    log.trace('hidden')
    log.info('hidden too')
    log.warn('shown')

    expect(lines.map((l) => l.msg)).toEqual(['shown'])
  })
})
