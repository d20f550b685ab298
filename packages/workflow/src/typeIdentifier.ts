export const UNKNOWN_NODE_TYPE = 'Unknown'

const VENDOR_SUFFIX = ', Gaea'

/**
 * Short node type from a reflection-style identifier, e.g.
 * `QuadSpinner.Gaea.Nodes.Mountain, Gaea.Nodes` -> `Mountain`.
 *
 * All knowledge of the identifier format lives here.
 */
export function parseNodeTypeIdentifier(raw: unknown): string {
  if (typeof raw !== 'string' || raw === '') return UNKNOWN_NODE_TYPE

  const parts = raw.split('.')
  let type = parts.length >= 2 ? (parts[parts.length - 2] ?? raw) : raw
  if (type.endsWith(VENDOR_SUFFIX)) {
    type = type.slice(0, -VENDOR_SUFFIX.length)
  }
  return type
}
