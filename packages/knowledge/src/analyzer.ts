import { readFile, writeFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { glob } from 'glob'
import { z } from 'zod'
import { type Logger, makeLogger } from '@terrakit/logger'
import { TERRAIN_CONSTANTS, TerrainError, errorMessage, isNumber } from '@terrakit/utils'
import {
  type ConnectionType,
  type TerrainNodeType,
  WorkflowExtractor,
  readProjectFile,
  traceMainPath,
} from '@terrakit/workflow'
import { jaccard } from './graph.js'

export type ObservedValue = string | number | boolean

const Observed = z.union([z.string(), z.number(), z.boolean()])
const Distribution = z.record(z.string(), z.record(z.string(), z.array(Observed)))
const Counts = z.record(z.string(), z.number().int().nonnegative())

export const LearnedPattern = z.object({
  name: z.string(),
  nodes: z.array(z.string()),
  frequency: z.number().int().positive(),
  properties: Distribution,
})
export type LearnedPatternType = z.infer<typeof LearnedPattern>

export const AnalysisSnapshot = z.object({
  version: z.literal(1),
  projects_analyzed: z.number().int().nonnegative(),
  node_frequency: Counts,
  sequences: z.record(z.string(), Counts),
  connection_patterns: Counts,
  property_distributions: Distribution,
  patterns: z.array(LearnedPattern),
})
export type AnalysisSnapshotType = z.infer<typeof AnalysisSnapshot>

export type ProjectAnalysis =
  | { success: true; nodes_analyzed: number; connections_analyzed: number }
  | { success: false; error: string }

export interface DirectoryAnalysis {
  projects_analyzed: number
  total_patterns: number
  node_frequency: Record<string, number>
  results: Array<{ file: string; result: ProjectAnalysis }>
}

export interface LearnedRecommendations {
  next_nodes: Array<{ node: string; frequency: number }>
  missing_nodes: string[]
  property_suggestions: Record<string, Record<string, ObservedValue>>
  similar_patterns: Array<{ name: string; similarity: number; nodes: string[]; frequency: number }>
}

export interface WorkflowTemplate {
  name: string
  nodes: Array<{
    type: string
    name: string
    properties: Record<string, ObservedValue>
    position: { x: number; y: number }
  }>
  frequency: number
}

export interface AnalyzerStatistics {
  projects_analyzed: number
  total_patterns: number
  unique_node_types: number
  most_common_nodes: Record<string, number>
  most_common_patterns: Array<{ name: string; nodes: string[]; frequency: number }>
}

export interface WorkflowAnalyzerOptions {
  extractor?: WorkflowExtractor
  pattern?: string
  logger?: Logger
}

const TEMPLATE_ORIGIN = 25000
const TEMPLATE_SPACING = 1000

function isObserved(value: unknown): value is ObservedValue {
  return typeof value === 'string' || typeof value === 'boolean' || isNumber(value)
}

function increment(counts: Map<string, number>, key: string, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by)
}

// Highest counts first; equal counts keep first-seen order.
export function mostCommon(counts: Map<string, number>, limit?: number): Array<[string, number]> {
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1])
  return limit === undefined ? sorted : sorted.slice(0, limit)
}

export function modeOf(values: readonly ObservedValue[]): ObservedValue | undefined {
  const counts = new Map<ObservedValue, number>()
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1)
  let best: ObservedValue | undefined
  let bestCount = 0
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value
      bestCount = count
    }
  }
  return best
}

// Upper median for even counts.
export function medianOf(values: readonly number[]): number | undefined {
  const sorted = [...values].sort((a, b) => a - b)
  return sorted[Math.floor(sorted.length / 2)]
}

function addObservation(
  into: Map<string, Map<string, ObservedValue[]>>,
  type: string,
  property: string,
  value: ObservedValue,
): void {
  let byProperty = into.get(type)
  if (!byProperty) {
    byProperty = new Map()
    into.set(type, byProperty)
  }
  const values = byProperty.get(property)
  if (values) values.push(value)
  else byProperty.set(property, [value])
}

interface PatternState {
  name: string
  nodes: string[]
  frequency: number
  properties: Map<string, Map<string, ObservedValue[]>>
}

function toRecord<V, R>(map: Map<string, V>, convert: (value: V) => R): Record<string, R> {
  const out: Record<string, R> = {}
  for (const [key, value] of map) out[key] = convert(value)
  return out
}

function fromRecord<V, R>(record: Record<string, V>, convert: (value: V) => R): Map<string, R> {
  return new Map(Object.entries(record).map(([key, value]) => [key, convert(value)]))
}

const copyValues = (values: ObservedValue[]) => [...values]

/**
 * Learns node usage from a corpus of project files: type frequencies, what
 * follows what, property value distributions and recurring main paths.
 */
export class WorkflowAnalyzer {
  private readonly extractor: WorkflowExtractor
  private readonly pattern: string
  private readonly logger: Logger

  private projectsAnalyzed = 0
  private nodeFrequency = new Map<string, number>()
  private sequences = new Map<string, Map<string, number>>()
  private connectionPatterns = new Map<string, number>()
  private propertyDistributions = new Map<string, Map<string, ObservedValue[]>>()
  private patterns: PatternState[] = []

  constructor(options: WorkflowAnalyzerOptions = {}) {
    this.extractor = options.extractor ?? new WorkflowExtractor()
    this.pattern = options.pattern ?? '*.terrain'
    this.logger = options.logger ?? makeLogger('WorkflowAnalyzer')
  }

  get isEmpty(): boolean {
    return this.projectsAnalyzed === 0
  }

  async analyzeProject(path: string): Promise<ProjectAnalysis> {
    try {
      const document = await readProjectFile(path)
      const { nodes, connections } = this.extractor.extract(document)
      if (nodes.length === 0) return { success: false, error: 'No nodes found' }
      this.ingest(nodes, connections)
      return {
        success: true,
        nodes_analyzed: nodes.length,
        connections_analyzed: connections.length,
      }
    } catch (err) {
      this.logger.error(`Failed to analyze ${path}: ${errorMessage(err)}`)
      return { success: false, error: errorMessage(err) }
    }
  }

  async analyzeDirectory(directory: string): Promise<DirectoryAnalysis> {
    const files = (await glob(this.pattern, { cwd: directory, absolute: true, nodir: true })).sort()
    const results: DirectoryAnalysis['results'] = []
    for (const file of files) {
      results.push({ file: basename(file), result: await this.analyzeProject(file) })
    }
    this.logger.info('directory analyzed', { directory, files: files.length })
    return {
      projects_analyzed: this.projectsAnalyzed,
      total_patterns: this.patterns.length,
      node_frequency: Object.fromEntries(mostCommon(this.nodeFrequency, 20)),
      results,
    }
  }

  /** Adds one extracted workflow to the learned statistics. */
  ingest(nodes: readonly TerrainNodeType[], connections: readonly ConnectionType[]): void {
    this.projectsAnalyzed += 1
    for (const node of nodes) increment(this.nodeFrequency, node.type)

    const typeById = new Map(nodes.map((n) => [n.id, n.type]))
    for (const c of connections) {
      const from = typeById.get(c.from_node)
      const to = typeById.get(c.to_node)
      if (from === undefined || to === undefined) continue
      let next = this.sequences.get(from)
      if (!next) {
        next = new Map()
        this.sequences.set(from, next)
      }
      increment(next, to)
      increment(this.connectionPatterns, `${from}->${to}`)
    }

    for (const node of nodes) {
      for (const [name, value] of Object.entries(node.properties)) {
        if (isObserved(value)) addObservation(this.propertyDistributions, node.type, name, value)
      }
    }

    this.learnMainPath(nodes, connections)
  }

  getRecommendations(current: readonly string[]): LearnedRecommendations {
    const present = new Set(current)
    const last = current[current.length - 1]
    const following = last === undefined ? undefined : this.sequences.get(last)

    const similar = this.patterns
      .map((p) => ({
        name: p.name,
        similarity: current.length > 0 ? jaccard(current, p.nodes) : 0,
        nodes: [...p.nodes],
        frequency: p.frequency,
      }))
      .filter((p) => p.similarity >= TERRAIN_CONSTANTS.PATTERN_SIMILARITY_THRESHOLD)
      .sort((a, b) => b.similarity - a.similarity)

    const propertySuggestions: LearnedRecommendations['property_suggestions'] = {}
    for (const type of present) {
      const byProperty = this.propertyDistributions.get(type)
      if (!byProperty) continue
      const suggestions: Record<string, ObservedValue> = {}
      for (const [property, values] of byProperty) {
        const typical = typicalValue(values)
        if (typical !== undefined) suggestions[property] = typical
      }
      propertySuggestions[type] = suggestions
    }

    return {
      next_nodes: following
        ? mostCommon(following, 5).map(([node, frequency]) => ({ node, frequency }))
        : [],
      missing_nodes: mostCommon(this.nodeFrequency, 10)
        .map(([type]) => type)
        .filter((type) => !present.has(type)),
      property_suggestions: propertySuggestions,
      similar_patterns: similar,
    }
  }

  getWorkflowTemplate(patternName: string): WorkflowTemplate | null {
    const pattern = this.patterns.find((p) => p.name === patternName)
    if (!pattern) return null

    return {
      name: pattern.name,
      frequency: pattern.frequency,
      nodes: pattern.nodes.map((type, i) => {
        const properties: Record<string, ObservedValue> = {}
        for (const [property, values] of pattern.properties.get(type) ?? []) {
          const mode = modeOf(values)
          if (mode !== undefined) properties[property] = mode
        }
        return {
          type,
          name: type,
          properties,
          position: { x: TEMPLATE_ORIGIN + i * TEMPLATE_SPACING, y: TEMPLATE_ORIGIN },
        }
      }),
    }
  }

  getStatistics(): AnalyzerStatistics {
    return {
      projects_analyzed: this.projectsAnalyzed,
      total_patterns: this.patterns.length,
      unique_node_types: this.nodeFrequency.size,
      most_common_nodes: Object.fromEntries(mostCommon(this.nodeFrequency, 10)),
      most_common_patterns: [...this.patterns]
        .sort((a, b) => b.frequency - a.frequency)
        .slice(0, 10)
        .map((p) => ({ name: p.name, nodes: [...p.nodes], frequency: p.frequency })),
    }
  }

  /** Learned type frequencies, highest first. */
  frequencies(): Array<[string, number]> {
    return mostCommon(this.nodeFrequency)
  }

  learnedPatterns(): LearnedPatternType[] {
    return this.snapshot().patterns
  }

  snapshot(): AnalysisSnapshotType {
    return {
      version: 1,
      projects_analyzed: this.projectsAnalyzed,
      node_frequency: toRecord(this.nodeFrequency, (n) => n),
      sequences: toRecord(this.sequences, (next) => toRecord(next, (n) => n)),
      connection_patterns: toRecord(this.connectionPatterns, (n) => n),
      property_distributions: toRecord(this.propertyDistributions, (byProperty) =>
        toRecord(byProperty, copyValues),
      ),
      patterns: this.patterns.map((p) => ({
        name: p.name,
        nodes: [...p.nodes],
        frequency: p.frequency,
        properties: toRecord(p.properties, (byProperty) => toRecord(byProperty, copyValues)),
      })),
    }
  }

  restore(raw: unknown): void {
    const result = AnalysisSnapshot.safeParse(raw)
    if (!result.success) {
      const first = result.error.issues[0]
      const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue'
      throw new TerrainError('PARSE', `Invalid analysis snapshot (${where})`)
    }
    const data = result.data
    this.projectsAnalyzed = data.projects_analyzed
    this.nodeFrequency = fromRecord(data.node_frequency, (n) => n)
    this.sequences = fromRecord(data.sequences, (next) => fromRecord(next, (n) => n))
    this.connectionPatterns = fromRecord(data.connection_patterns, (n) => n)
    this.propertyDistributions = fromRecord(data.property_distributions, (byProperty) =>
      fromRecord(byProperty, copyValues),
    )
    this.patterns = data.patterns.map((p) => ({
      name: p.name,
      nodes: [...p.nodes],
      frequency: p.frequency,
      properties: fromRecord(p.properties, (byProperty) => fromRecord(byProperty, copyValues)),
    }))
  }

  async saveAnalysis(path: string): Promise<void> {
    try {
      await writeFile(path, JSON.stringify(this.snapshot(), null, 2), 'utf8')
    } catch (err) {
      throw new TerrainError('FILE', `Cannot write analysis: ${errorMessage(err)}`, {
        path,
        cause: err,
      })
    }
  }

  async loadAnalysis(path: string): Promise<void> {
    let raw: unknown
    try {
      raw = JSON.parse(await readFile(path, 'utf8'))
    } catch (err) {
      throw new TerrainError('FILE', `Cannot read analysis: ${errorMessage(err)}`, {
        path,
        cause: err,
      })
    }
    this.restore(raw)
  }

  private learnMainPath(
    nodes: readonly TerrainNodeType[],
    connections: readonly ConnectionType[],
  ): void {
    if (nodes.length < 2) return
    const path = traceMainPath(nodes, connections).map((n) => n.type)
    if (path.length < 2) return

    const onPath = new Set(path)
    const properties = new Map<string, Map<string, ObservedValue[]>>()
    for (const node of nodes) {
      if (!onPath.has(node.type)) continue
      for (const [name, value] of Object.entries(node.properties)) {
        if (isObserved(value)) addObservation(properties, node.type, name, value)
      }
    }

    const existing = this.patterns.find(
      (p) => p.nodes.length === path.length && p.nodes.every((type, i) => type === path[i]),
    )
    if (!existing) {
      const name = path.slice(0, 3).join('->')
      this.patterns.push({ name, nodes: path, frequency: 1, properties })
      return
    }

    existing.frequency += 1
    for (const [type, byProperty] of properties) {
      for (const [name, values] of byProperty) {
        for (const value of values) addObservation(existing.properties, type, name, value)
      }
    }
  }
}

function typicalValue(values: readonly ObservedValue[]): ObservedValue | undefined {
  const numbers = values.filter(isNumber)
  return numbers.length === values.length ? medianOf(numbers) : modeOf(values)
}
