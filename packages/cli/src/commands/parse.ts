import { EdgeKind, NodeKind } from '@hotgraph/graph'
import { InvalidInputError } from '@hotgraph/utils/errors'

/**
 * Parse an optional non-negative integer flag
 */
export function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined)
    return undefined
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0 || value.trim() === '') {
    throw new InvalidInputError(`${flag} must be a non-negative integer, got "${value}"`)
  }
  return parsed
}

export function parseNodeKind(value: string): NodeKind {
  for (const kind of Object.values(NodeKind)) {
    if (kind === value)
      return kind
  }
  throw new InvalidInputError(`unknown node kind "${value}" (expected ${Object.values(NodeKind).join(', ')})`)
}

export function parseEdgeKind(value: string): EdgeKind {
  for (const kind of Object.values(EdgeKind)) {
    if (kind === value)
      return kind
  }
  throw new InvalidInputError(`unknown edge kind "${value}" (expected ${Object.values(EdgeKind).join(', ')})`)
}

/**
 * Parse `key=value` pairs; values are read as JSON when they parse, else kept as strings
 */
export function parseAttrs(pairs: readonly string[] = []): Record<string, unknown> {
  const attrs: Record<string, unknown> = {}
  for (const pair of pairs) {
    const eq = pair.indexOf('=')
    if (eq <= 0) {
      throw new InvalidInputError(`attribute must be key=value, got "${pair}"`)
    }
    const raw = pair.slice(eq + 1)
    attrs[pair.slice(0, eq)] = parseAttrValue(raw)
  }
  return attrs
}

function parseAttrValue(raw: string): unknown {
  try {
    return JSON.parse(raw)
  }
  catch {
    return raw
  }
}
