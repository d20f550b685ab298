import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { InMemoryKeyValueStore, ResultCache } from '@terrakit/keystore'
import { projectDocument } from '@terrakit/workflow/fixtures'
import { TerrainService } from '../service.js'

const stores: InMemoryKeyValueStore[] = []
const dirs: string[] = []

function cachedService(): { service: TerrainService; cache: ResultCache } {
  const store = new InMemoryKeyValueStore({ namespace: 'terrain' })
  stores.push(store)
  const cache = new ResultCache(store)
  return { service: new TerrainService({ cache }), cache }
}

afterEach(async () => {
  for (const store of stores.splice(0)) await store.close()
  for (const dir of dirs.splice(0)) await rm(dir, { recursive: true, force: true })
})

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'terrain-service-'))
  dirs.push(dir)
  return dir
}

const workflow = {
  nodes: [
    { id: 1, type: 'Mountain', properties: { Scale: 2 } },
    { id: 2, type: 'Export' },
  ],
  connections: [{ from_node: 1, to_node: 2 }],
}

describe('TerrainService', () => {
  it('serves repeated validations from the cache', async () => {
    const { service, cache } = cachedService()

    const first = await service.validateAndFix(workflow)
    const second = await service.validateAndFix(workflow)

    expect(first.valid).toBe(true)
    expect(second).toEqual(first)
    expect(cache.stats()).toEqual({ hits: 1, misses: 1 })
  })

  it('keys the cache on strict mode too', async () => {
    const { service, cache } = cachedService()
    await service.validateAndFix(workflow)
    await service.validateAndFix(workflow, true)
    expect(cache.stats()).toEqual({ hits: 0, misses: 2 })
  })

  it('caches successful analyses', async () => {
    const { service, cache } = cachedService()
    const document = projectDocument([{ id: 1, type: 'Mountain' }])

    await service.analyzeProject(document)
    const again = await service.analyzeProject(document)

    expect(again.success).toBe(true)
    expect(cache.stats()).toEqual({ hits: 1, misses: 1 })
  })

  it('works without a cache', async () => {
    const service = new TerrainService()
    const result = await service.validateAndFix(workflow)
    expect(result.errors).toEqual([])
  })

  it('answers schema lookups', () => {
    const service = new TerrainService()
    expect(service.isValidNodeType('Mountain')).toBe(true)
    expect(service.isValidNodeType('Mountains')).toBe(false)
    expect(service.getNodeProperties('Mountain').Style?.default).toBe('Basic')
    expect(service.getNodeProperties('Blur')).toHaveProperty('Octaves')
  })

  it('suggests curated follow-ups before anything is learned', () => {
    const service = new TerrainService()
    const result = service.suggestNodes(['Mountain'])
    expect(result.next_nodes).toContainEqual({ node: 'Erosion', score: 0.9, source: 'curated' })
  })

  it('learns from a directory of projects', async () => {
    const dir = await tempDir()
    const document = projectDocument([
      { id: 1, type: 'Mountain' },
      { id: 2, type: 'Erosion', inputs: [{ from: 1 }] },
    ])
    await writeFile(join(dir, 'one.terrain'), JSON.stringify(document))

    const service = new TerrainService()
    const result = await service.analyzeWorkflowPatterns(dir)
    if (!result.success) throw new Error(result.error)

    expect(result.projects_analyzed).toBe(1)
    expect(result.node_frequency).toEqual({ Mountain: 1, Erosion: 1 })
    expect(service.analyzer.isEmpty).toBe(false)
  })

  it('repairs a project file in place and keeps a backup', async () => {
    const dir = await tempDir()
    const path = join(dir, 'broken.terrain')
    const document = projectDocument([
      { id: 1, type: 'Mountain', props: { Scale: 9 } },
      { id: 2, type: 'Export', inputs: [{ from: 1 }] },
    ])
    await writeFile(path, JSON.stringify(document))

    const result = await new TerrainService().repairProjectFile(path)
    if (!result.success) throw new Error(result.error)

    expect(result.saved_path).toBe(path)
    expect(result.backup_path).toBe(`${path}.backup`)
    expect(result.fixes_applied[0]).toBe('Fixed Mountain.Scale: 9 -> 5')
    expect(JSON.parse(await readFile(`${path}.backup`, 'utf8'))).toEqual(document)
    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual(result.repaired_document)
  })

  it('reports unreadable project files', async () => {
    const dir = await tempDir()
    const service = new TerrainService()
    const missing = join(dir, 'missing.terrain')

    const analysis = await service.analyzeProjectFile(missing)
    expect(analysis.success).toBe(false)

    await writeFile(join(dir, 'bad.terrain'), '{ nope')
    const repair = await service.repairProjectFile(join(dir, 'bad.terrain'))
    if (repair.success) throw new Error('expected a failure')
    expect(repair.error).toMatch(/^Invalid JSON in /)
  })

  it('reports when no open checker is configured', async () => {
    expect(await new TerrainService().verifyProjectOpens('/tmp/a.terrain')).toEqual({
      success: false,
      error: 'No project-open checker configured',
    })
  })

  it('delegates open checks and reports checker failures', async () => {
    const opens = new TerrainService({
      openChecker: { canOpen: async () => ({ success: true }) },
    })
    const throws = new TerrainService({
      openChecker: {
        canOpen: async () => {
          throw new Error('timed out')
        },
      },
    })

    expect(await opens.verifyProjectOpens('a.terrain')).toEqual({ success: true })
    expect(await throws.verifyProjectOpens('a.terrain')).toEqual({
      success: false,
      error: 'timed out',
    })
  })
})
