import { z } from 'zod'
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi'
extendZodWithOpenApi(z)

export const NodeId = z.number().int()
export type NodeIdType = z.infer<typeof NodeId>

export const Position = z.object({ x: z.number(), y: z.number() }).openapi('Position')
export type PositionType = z.infer<typeof Position>

export const TerrainNode = z
  .object({
    id: NodeId,
    type: z.string().min(1),
    name: z.string(),
    properties: z.record(z.string(), z.unknown()).default({}),
    position: Position.optional(),
  })
  .openapi('TerrainNode')
export type TerrainNodeType = z.infer<typeof TerrainNode>

export const Connection = z
  .object({
    from_node: NodeId,
    to_node: NodeId,
    from_port: z.string().default('Out'),
    to_port: z.string().default('In'),
  })
  .openapi('Connection')
export type ConnectionType = z.infer<typeof Connection>

export const WorkflowGraph = z
  .object({
    nodes: z.array(TerrainNode),
    connections: z.array(Connection),
  })
  .openapi('WorkflowGraph')
export type WorkflowGraphType = z.infer<typeof WorkflowGraph>

// Caller-supplied workflow before normalisation: entries may be malformed.
export const WorkflowInput = z
  .object({
    nodes: z.array(z.unknown()).default([]),
    connections: z.array(z.unknown()).default([]),
  })
  .openapi('WorkflowInput')
export type WorkflowInputType = z.infer<typeof WorkflowInput>

// Any JSON object; shape checks happen in the structure validator and extractor.
export const ProjectDocument = z.record(z.string(), z.unknown()).openapi('ProjectDocument')
export type ProjectDocumentType = z.infer<typeof ProjectDocument>
