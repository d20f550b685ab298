// Sample project documents for tests and demos.
export interface FixtureInput {
  from: number | null
  to?: number | null
  fromPort?: string
  toPort?: string
}

export interface FixtureNode {
  id: number
  type: string
  name?: string
  props?: Record<string, unknown>
  inputs?: FixtureInput[]
}

let refs = 100

function ref(): string {
  refs += 1
  return String(refs)
}

export function nodeEntry(node: FixtureNode): Record<string, unknown> {
  const ports: Record<string, unknown>[] = (node.inputs ?? []).map((input) => ({
    $id: ref(),
    Name: input.toPort ?? 'In',
    Type: 'PrimaryIn',
    Record: {
      $id: ref(),
      From: input.from,
      To: input.to === undefined ? node.id : input.to,
      FromPort: input.fromPort ?? 'Out',
      ToPort: input.toPort ?? 'In',
    },
  }))
  ports.push({ $id: ref(), Name: 'Out', Type: 'PrimaryOut' })

  return {
    $id: ref(),
    $type: `QuadSpinner.Gaea.Nodes.${node.type}, Gaea.Nodes`,
    Id: node.id,
    Name: node.name ?? node.type,
    Position: { $id: ref(), X: 25000 + node.id, Y: 26000 },
    Ports: { $id: ref(), $values: ports },
    ...node.props,
  }
}

export function terrainBlock(nodes: FixtureNode[]): Record<string, unknown> {
  const table: Record<string, unknown> = { $id: '6' }
  for (const node of nodes) table[String(node.id)] = nodeEntry(node)
  return {
    $id: '4',
    Id: 'terrain-1',
    Metadata: { $id: '5', Name: 'Sample', Version: '2.0' },
    Nodes: table,
    Groups: { $id: '221' },
    Notes: { $id: '222' },
    GraphTabs: { $id: '223', $values: [] },
  }
}

export function projectDocument(nodes: FixtureNode[]): Record<string, unknown> {
  return {
    $id: '1',
    Assets: {
      $id: '2',
      $values: [
        {
          $id: '3',
          Terrain: terrainBlock(nodes),
          Automation: { $id: '226' },
          BuildDefinition: { $id: '230', Resolution: 2048 },
          State: { $id: '232' },
        },
      ],
    },
    Id: 'a1b2c3d4',
    Branch: 1,
    Metadata: {
      $id: '236',
      Name: 'Sample',
      Version: '1.0',
      DateCreated: '2024-01-02 03:04:05Z',
      DateLastBuilt: '2024-01-02 03:04:05Z',
      DateLastSaved: '2024-01-02 03:04:05Z',
    },
  }
}
