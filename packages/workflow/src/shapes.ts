import { isRecord } from '@terrakit/utils'

export interface ShapeRecognizer {
  readonly name: string
  locateTerrain(document: Record<string, unknown>): Record<string, unknown> | null
}

// { Assets: { $values: [ { Terrain } ] } }
export const assetValuesShape: ShapeRecognizer = {
  name: 'asset-values',
  locateTerrain(document) {
    const assets = document.Assets
    if (!isRecord(assets) || !Array.isArray(assets.$values)) return null
    const first: unknown = assets.$values[0]
    if (!isRecord(first)) return null
    return isRecord(first.Terrain) ? first.Terrain : null
  },
}

// { Terrain }
export const bareTerrainShape: ShapeRecognizer = {
  name: 'bare-terrain',
  locateTerrain(document) {
    const terrain = document.Terrain
    return isRecord(terrain) && Object.keys(terrain).length > 0 ? terrain : null
  },
}

// { Assets: { <key>: { Terrain } } }
export const legacyAssetShape: ShapeRecognizer = {
  name: 'legacy-asset',
  locateTerrain(document) {
    const assets = document.Assets
    if (!isRecord(assets) || '$values' in assets) return null
    for (const value of Object.values(assets)) {
      if (isRecord(value) && 'Terrain' in value) {
        return isRecord(value.Terrain) ? value.Terrain : null
      }
    }
    return null
  },
}

export const DEFAULT_SHAPES: readonly ShapeRecognizer[] = [
  assetValuesShape,
  bareTerrainShape,
  legacyAssetShape,
]
