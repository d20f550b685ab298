import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { makeLogger } from '@terrakit/logger'
import {
  TERRAIN_CONSTANTS,
  TerrainError,
  deepFreeze,
  errorMessage,
  isNumber,
} from '@terrakit/utils'
import {
  KnowledgeSnapshot,
  type KnowledgeSnapshotType,
  type NextNodeSuggestion,
  type NodePatternType,
  type NodeRelationship,
  type PropertySuggestionType,
  RelationType,
  type SimilarPattern,
  type TypeRef,
  type TypedNode,
  type TypePair,
  type WorkflowCheck,
  formatTypeRef,
  parseTypeRef,
} from './types.js'

export const BUNDLED_KNOWLEDGE_PATH = fileURLToPath(
  new URL('../data/knowledge-graph.json', import.meta.url),
)

// Target properties that only take whole numbers.
export const INTEGER_PROPERTIES: ReadonlySet<string> = new Set([
  'FeatureScale',
  'Layers',
  'Levels',
  'Steps',
  'Terraces',
  'Count',
  'Vertices',
  'PixelSize',
  'GridSmallCount',
  'GridLargeCount',
])

const PATTERN_WEIGHT = 0.8

export function jaccard(a: Iterable<string>, b: Iterable<string>): number {
  const left = new Set(a)
  const right = new Set(b)
  let intersection = 0
  for (const item of left) if (right.has(item)) intersection++
  const union = left.size + right.size - intersection
  return union > 0 ? intersection / union : 0
}

function refMatches(ref: TypeRef, type: string): boolean {
  return ref.kind === 'any' || ref.name === type
}

export interface EnhancedWorkflow {
  validation: WorkflowCheck
  property_suggestions: PropertySuggestionType[]
  similar_patterns: string[]
  next_nodes: NextNodeSuggestion[]
  enhancement_summary: {
    issues_found: number
    warnings: number
    suggestions: number
    property_adjustments: number
  }
}

/**
 * Curated relationships, patterns and property constraints between node
 * types. Everything it returns is advisory.
 */
export class KnowledgeGraph {
  private readonly logger = makeLogger('KnowledgeGraph')
  private readonly relationships: readonly NodeRelationship[]

  constructor(private readonly snapshot: KnowledgeSnapshotType) {
    deepFreeze(snapshot)
    this.relationships = deepFreeze(
      snapshot.relationships.map((r) => ({
        from: parseTypeRef(r.from),
        to: parseTypeRef(r.to),
        relation: r.relation,
        strength: r.strength,
        description: r.description,
      })),
    )
    this.logger.trace('knowledge graph loaded', {
      relationships: this.relationships.length,
      patterns: snapshot.patterns.length,
      constraints: snapshot.constraints.length,
    })
  }

  static parse(raw: unknown, source = 'inline'): KnowledgeGraph {
    const result = KnowledgeSnapshot.safeParse(raw)
    if (!result.success) {
      const first = result.error.issues[0]
      const where = first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue'
      throw new TerrainError('PARSE', `Invalid knowledge graph from ${source} (${where})`, {
        path: source,
      })
    }
    return new KnowledgeGraph(result.data)
  }

  static fromFile(path: string): KnowledgeGraph {
    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'))
    } catch (err) {
      throw new TerrainError('FILE', `Cannot load knowledge graph: ${errorMessage(err)}`, {
        path,
        cause: err,
      })
    }
    return KnowledgeGraph.parse(raw, path)
  }

  static bundled(): KnowledgeGraph {
    return KnowledgeGraph.fromFile(BUNDLED_KNOWLEDGE_PATH)
  }

  get version(): string {
    return this.snapshot.version
  }

  get patterns(): readonly NodePatternType[] {
    return this.snapshot.patterns
  }

  /** Relationships touching `type` on either end; wildcard ends match every type. */
  relationshipsFor(type: string, relation?: RelationType): NodeRelationship[] {
    return this.relationships.filter(
      (r) =>
        (relation === undefined || r.relation === relation) &&
        (refMatches(r.from, type) || refMatches(r.to, type)),
    )
  }

  suggestNextNodes(current: readonly string[]): NextNodeSuggestion[] {
    const present = new Set(current)
    const scores = new Map<string, number>()
    const offer = (type: string, score: number) => {
      if (present.has(type)) return
      scores.set(type, Math.max(scores.get(type) ?? 0, score))
    }

    for (const r of this.relationships) {
      if (r.relation !== RelationType.PRECEDES || r.to.kind === 'any') continue
      const sourcePresent = r.from.kind === 'any' ? present.size > 0 : present.has(r.from.name)
      if (sourcePresent) offer(r.to.name, r.strength)
    }

    for (const pattern of this.snapshot.patterns) {
      if (![...present].every((type) => pattern.nodes.includes(type))) continue
      for (const type of pattern.nodes) offer(type, pattern.frequency * PATTERN_WEIGHT)
    }

    return [...scores.entries()]
      .map(([node, score]) => ({ node, score }))
      .sort((a, b) => b.score - a.score)
  }

  /**
   * Conflicts between present types are issues, unmet requirements are
   * warnings, and absent enhancers or missing follow-ups are suggestions.
   * Repeated types and duplicated edges are not treated as defects.
   */
  validateWorkflow(types: readonly string[], edges: readonly TypePair[] = []): WorkflowCheck {
    const present = new Set(types)
    const counts = new Map<string, number>()
    for (const type of types) counts.set(type, (counts.get(type) ?? 0) + 1)
    const issues: string[] = []
    const warnings: string[] = []
    const suggestions: string[] = []

    for (const r of this.relationships) {
      if (r.from.kind === 'any' || r.to.kind === 'any') {
        if (r.relation === RelationType.REQUIRES && r.from.kind === 'type') {
          const others = types.length - (counts.get(r.from.name) ?? 0)
          if (present.has(r.from.name) && others === 0) {
            warnings.push(`${r.from.name} typically requires ${formatTypeRef(r.to)}`)
          }
        }
        continue
      }

      const from = r.from.name
      const to = r.to.name
      switch (r.relation) {
        case RelationType.CONFLICTS: {
          const both =
            from === to ? (counts.get(from) ?? 0) > 1 : present.has(from) && present.has(to)
          if (both) issues.push(`${from} conflicts with ${to}: ${r.description}`)
          break
        }
        case RelationType.REQUIRES:
          if (present.has(from) && !present.has(to)) {
            warnings.push(`${from} typically requires ${to}`)
          }
          break
        case RelationType.ENHANCES:
          if (present.has(to) && !present.has(from)) {
            suggestions.push(`Consider adding ${from} to enhance ${to}`)
          }
          break
        default:
          break
      }
    }

    warnings.push(...this.orderWarnings(edges))

    const top = this.suggestNextNodes(types)
      .slice(0, 3)
      .map((s) => s.node)
    if (top.length > 0) suggestions.push(`Consider adding: ${top.join(', ')}`)

    return { valid: issues.length === 0, issues, warnings, suggestions }
  }

  /**
   * Constraint-derived values for target properties. A named source uses the
   * first node of that type carrying a numeric source property; a wildcard
   * source uses the first such node of any other type.
   */
  suggestPropertyValues(nodes: readonly TypedNode[]): PropertySuggestionType[] {
    const present = new Set(nodes.map((n) => n.type))
    const suggestions: PropertySuggestionType[] = []

    for (const c of this.snapshot.constraints) {
      if (!present.has(c.target)) continue
      const source = parseTypeRef(c.source)
      const value = nodes
        .filter((n) => (source.kind === 'any' ? n.type !== c.target : n.type === source.name))
        .map((n) => n.properties?.[c.sourceProperty])
        .find(isNumber)
      if (value === undefined) continue

      let suggested =
        c.relation === 'proportional' ? value * c.factor : value > 0 ? c.factor / value : c.factor
      if (INTEGER_PROPERTIES.has(c.targetProperty)) suggested = Math.round(suggested)

      suggestions.push({
        node: c.target,
        property: c.targetProperty,
        suggested_value: suggested,
        reason: c.description,
      })
    }
    return suggestions
  }

  findSimilarPatterns(
    types: readonly string[],
    threshold: number = TERRAIN_CONSTANTS.PATTERN_SIMILARITY_THRESHOLD,
  ): SimilarPattern[] {
    return this.snapshot.patterns
      .map((pattern) => ({ pattern, similarity: jaccard(types, pattern.nodes) }))
      .filter((s) => s.similarity >= threshold)
      .sort((a, b) => b.similarity - a.similarity)
  }

  categoryOf(type: string): string | undefined {
    return this.snapshot.categories[type]
  }

  blendModes(): Readonly<Record<string, string>> {
    return this.snapshot.blend_modes
  }

  blendModePurpose(mode: string): string | undefined {
    return this.snapshot.blend_modes[mode]
  }

  enhanceWorkflow(
    nodes: readonly TypedNode[],
    connections: ReadonlyArray<{ from_node: number; to_node: number }>,
  ): EnhancedWorkflow {
    const types = nodes.map((n) => n.type)
    const typeById = new Map<number, string>()
    for (const n of nodes) if (n.id !== undefined) typeById.set(n.id, n.type)
    const edges: TypePair[] = []
    for (const c of connections) {
      const from = typeById.get(c.from_node)
      const to = typeById.get(c.to_node)
      if (from !== undefined && to !== undefined) edges.push([from, to])
    }

    const validation = this.validateWorkflow(types, edges)
    const propertySuggestions = this.suggestPropertyValues(nodes)
    return {
      validation,
      property_suggestions: propertySuggestions,
      similar_patterns: this.findSimilarPatterns(types)
        .slice(0, 3)
        .map((s) => s.pattern.name),
      next_nodes: this.suggestNextNodes(types).slice(0, 5),
      enhancement_summary: {
        issues_found: validation.issues.length,
        warnings: validation.warnings.length,
        suggestions: validation.suggestions.length,
        property_adjustments: propertySuggestions.length,
      },
    }
  }

  // An edge b -> a where a is known to precede b, with no a -> b edge alongside.
  private orderWarnings(edges: readonly TypePair[]): string[] {
    const seen = new Set(edges.map(([a, b]) => `${a}->${b}`))
    const warnings = new Set<string>()
    for (const [a, b] of edges) {
      if (seen.has(`${b}->${a}`)) continue
      const reversed = this.relationships.some(
        (r) =>
          r.relation === RelationType.PRECEDES &&
          r.from.kind === 'type' &&
          r.to.kind === 'type' &&
          r.from.name === b &&
          r.to.name === a,
      )
      if (reversed) warnings.add(`${b} usually comes before ${a}`)
    }
    return [...warnings]
  }
}
