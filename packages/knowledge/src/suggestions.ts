import { type Logger, makeLogger } from '@terrakit/logger'
import type { LearnedRecommendations, WorkflowAnalyzer } from './analyzer.js'
import type { KnowledgeGraph } from './graph.js'
import type { PropertySuggestionType, TypedNode } from './types.js'

export type SuggestionSource = 'curated' | 'learned'

export interface SuggestionContext {
  nodes?: readonly TypedNode[]
}

export interface RankedNode {
  node: string
  score: number
  source: SuggestionSource
}

export interface RankedPattern {
  name: string
  similarity: number
  source: SuggestionSource
}

export interface NodeSuggestions {
  next_nodes: RankedNode[]
  missing_nodes: string[]
  property_suggestions: PropertySuggestionType[]
  similar_patterns: RankedPattern[]
}

const MAX_NEXT_NODES = 10
const MAX_MISSING_NODES = 10

/**
 * One suggestion surface over both signal sources: the curated knowledge
 * graph and whatever the analyzer has learned from real projects.
 */
export class SuggestionEngine {
  private readonly logger: Logger

  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly analyzer: WorkflowAnalyzer,
    logger?: Logger,
  ) {
    this.logger = logger ?? makeLogger('SuggestionEngine')
  }

  suggest(types: readonly string[], context: SuggestionContext = {}): NodeSuggestions {
    const learned = this.analyzer.getRecommendations(types)

    const ranked = new Map<string, RankedNode>()
    const offer = (node: string, score: number, source: SuggestionSource) => {
      const current = ranked.get(node)
      if (!current || score > current.score) ranked.set(node, { node, score, source })
    }
    for (const s of this.graph.suggestNextNodes(types)) offer(s.node, s.score, 'curated')
    const top = learned.next_nodes[0]?.frequency ?? 0
    if (top > 0) {
      for (const s of learned.next_nodes) offer(s.node, s.frequency / top, 'learned')
    }

    const similar: RankedPattern[] = [
      ...this.graph.findSimilarPatterns(types).map((s) => ({
        name: s.pattern.name,
        similarity: s.similarity,
        source: 'curated' as const,
      })),
      ...learned.similar_patterns.map((p) => ({
        name: p.name,
        similarity: p.similarity,
        source: 'learned' as const,
      })),
    ].sort((a, b) => b.similarity - a.similarity)

    const result: NodeSuggestions = {
      next_nodes: [...ranked.values()]
        .sort((a, b) => b.score - a.score)
        .slice(0, MAX_NEXT_NODES),
      missing_nodes: this.analyzer.isEmpty ? this.curatedMissing(types) : learned.missing_nodes,
      property_suggestions: this.propertySuggestions(context.nodes ?? [], learned),
      similar_patterns: similar,
    }
    this.logger.trace('suggestions ready', {
      types: types.length,
      next: result.next_nodes.length,
      patterns: result.similar_patterns.length,
    })
    return result
  }

  // Members of matching curated patterns that the workflow lacks.
  private curatedMissing(types: readonly string[]): string[] {
    const present = new Set(types)
    const missing = new Set<string>()
    for (const { pattern } of this.graph.findSimilarPatterns(types)) {
      for (const type of pattern.nodes) if (!present.has(type)) missing.add(type)
    }
    return [...missing].slice(0, MAX_MISSING_NODES)
  }

  private propertySuggestions(
    nodes: readonly TypedNode[],
    learned: LearnedRecommendations,
  ): PropertySuggestionType[] {
    const out = nodes.length > 0 ? this.graph.suggestPropertyValues(nodes) : []
    const covered = new Set(out.map((s) => `${s.node}.${s.property}`))
    for (const [node, byProperty] of Object.entries(learned.property_suggestions)) {
      for (const [property, value] of Object.entries(byProperty)) {
        if (covered.has(`${node}.${property}`)) continue
        out.push({
          node,
          property,
          suggested_value: value,
          reason: 'Typical value in analyzed projects',
        })
      }
    }
    return out
  }
}

