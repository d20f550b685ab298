export type TerrainErrorCode =
  | 'VALIDATION'
  | 'NODE_TYPE'
  | 'PROPERTY'
  | 'CONNECTION'
  | 'STRUCTURE'
  | 'FILE'
  | 'PARSE'
  | 'REPAIR'
  | 'OPTIMIZATION'
  | 'UNKNOWN'

export interface TerrainErrorDetails {
  nodeId?: number
  propertyName?: string
  missingKey?: string
  path?: string
  cause?: unknown
}

export class TerrainError extends Error {
  constructor(
    public readonly code: TerrainErrorCode,
    message: string,
    public readonly details?: TerrainErrorDetails,
  ) {
    super(message)
    this.name = 'TerrainError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
