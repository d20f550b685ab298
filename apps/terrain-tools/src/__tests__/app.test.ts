import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { WorkflowAnalyzer } from '@terrakit/knowledge'
import { createApp } from '../app.js'
import { loadConfig } from '../config.js'

const dirs: string[] = []

afterEach(async () => {
  for (const dir of dirs.splice(0)) await rm(dir, { recursive: true, force: true })
})

describe('createApp', () => {
  it('wires the dispatcher without opening a port', async () => {
    const app = await createApp(loadConfig({}))

    expect(app.dispatcher.size).toBe(9)
    const outcome = await app.dispatcher.execute('is_valid_node_type', { node_type: 'Erosion2' })
    expect(outcome.body).toMatchObject({ result: { valid: true } })
    await app.close()
  })

  it('loads a saved pattern database', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'terrain-app-'))
    dirs.push(dir)
    const path = join(dir, 'patterns.json')

    const seed = new WorkflowAnalyzer()
    seed.ingest(
      [
        { id: 1, type: 'Mountain', name: 'Mountain', properties: {} },
        { id: 2, type: 'Rivers', name: 'Rivers', properties: {} },
      ],
      [{ from_node: 1, to_node: 2, from_port: 'Out', to_port: 'In' }],
    )
    await seed.saveAnalysis(path)

    const app = await createApp(loadConfig({ PATTERN_DB_PATH: path }))
    expect(app.service.analyzer.isEmpty).toBe(false)
    expect(app.service.suggestNodes(['Mountain']).next_nodes).toContainEqual({
      node: 'Rivers',
      score: 1,
      source: 'learned',
    })
    await app.close()
  })

  it('starts empty when the pattern database is missing', async () => {
    const app = await createApp(loadConfig({ PATTERN_DB_PATH: '/nonexistent/patterns.json' }))
    expect(app.service.analyzer.isEmpty).toBe(true)
    await app.close()
  })
})
