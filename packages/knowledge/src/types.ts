import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export enum RelationType {
  REQUIRES = 'requires',
  ENHANCES = 'enhances',
  CONFLICTS = 'conflicts',
  FOLLOWS = 'follows',
  PRECEDES = 'precedes',
  COMBINES_WITH = 'combines_with',
  ALTERNATIVE_TO = 'alternative_to',
  PROVIDES_DATA_FOR = 'provides_data_for',
  CONSUMES_DATA_FROM = 'consumes_data_from',
}

// "*" in the data file; never compared against real type names.
export const WILDCARD_TOKEN = '*'

export type TypeRef = { kind: 'type'; name: string } | { kind: 'any' }

export const ANY_TYPE: TypeRef = { kind: 'any' }

export function parseTypeRef(raw: string): TypeRef {
  return raw === WILDCARD_TOKEN ? ANY_TYPE : { kind: 'type', name: raw }
}

export function formatTypeRef(ref: TypeRef): string {
  return ref.kind === 'any' ? 'any node' : ref.name
}

export const RelationshipRecord = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1),
    relation: z.enum(RelationType),
    strength: z.number().min(0).max(1).default(1),
    description: z.string().default(''),
  })
  .openapi('RelationshipRecord')
export type RelationshipRecordType = z.infer<typeof RelationshipRecord>

export interface NodeRelationship {
  from: TypeRef
  to: TypeRef
  relation: RelationType
  strength: number
  description: string
}

export const NodePattern = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    nodes: z.array(z.string()),
    connections: z.array(z.tuple([z.string(), z.string()])).default([]),
    tags: z.array(z.string()).default([]),
    frequency: z.number().nonnegative().default(1),
  })
  .openapi('NodePattern')
export type NodePatternType = z.infer<typeof NodePattern>

export const ConstraintRelation = z.enum(['proportional', 'inversely_proportional'])

export const PropertyConstraint = z
  .object({
    source: z.string().min(1),
    sourceProperty: z.string().min(1),
    target: z.string().min(1),
    targetProperty: z.string().min(1),
    relation: ConstraintRelation,
    factor: z.number(),
    description: z.string().default(''),
  })
  .openapi('PropertyConstraint')
export type PropertyConstraintType = z.infer<typeof PropertyConstraint>

export const KnowledgeSnapshot = z
  .object({
    version: z.string(),
    relationships: z.array(RelationshipRecord),
    patterns: z.array(NodePattern),
    constraints: z.array(PropertyConstraint),
    categories: z.record(z.string(), z.string()).default({}),
    blend_modes: z.record(z.string(), z.string()).default({}),
  })
  .openapi('KnowledgeSnapshot')
export type KnowledgeSnapshotType = z.infer<typeof KnowledgeSnapshot>

export interface NextNodeSuggestion {
  node: string
  score: number
}

export interface WorkflowCheck {
  valid: boolean
  issues: string[]
  warnings: string[]
  suggestions: string[]
}

export const PropertySuggestion = z
  .object({
    node: z.string(),
    property: z.string(),
    suggested_value: z.unknown(),
    reason: z.string(),
  })
  .openapi('PropertySuggestion')
export type PropertySuggestionType = z.infer<typeof PropertySuggestion>

export interface SimilarPattern<P = NodePatternType> {
  pattern: P
  similarity: number
}

// Minimal node view the advisory layer works on.
export interface TypedNode {
  id?: number
  type: string
  name?: string
  properties?: Record<string, unknown>
}

export type TypePair = readonly [from: string, to: string]
