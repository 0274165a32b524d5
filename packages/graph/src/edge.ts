import { z } from 'zod/v4'

/**
 * Relationship kinds between components
 */
export const EdgeKind = {
  /** Copper: power rails, signal traces, jacks */
  Electrical: 'electrical',
  /** Ownership and control: a driver controls a chip, a class uses a class */
  Logical: 'logical',
  /** Data flow: buses, buffers, message paths */
  Data: 'data',
} as const

export type EdgeKind = (typeof EdgeKind)[keyof typeof EdgeKind]

export const DEFAULT_EDGE_WEIGHT = 1

export const EdgeSchema = z.object({
  /** Source node ID */
  source: z.string().min(1),
  /** Target node ID */
  target: z.string().min(1),
  /** Edge kind; part of edge identity */
  kind: z.enum(['electrical', 'logical', 'data']),
  /** Traversal cost (default 1) */
  weight: z.number().nonnegative().optional(),
  /** One-way relationship; edges are traversable both ways unless set */
  directed: z.boolean().optional(),
})

export type Edge = z.infer<typeof EdgeSchema>

/**
 * Create an edge
 */
export function createEdge(params: {
  source: string
  target: string
  kind: EdgeKind
  weight?: number
  directed?: boolean
}): Edge {
  return EdgeSchema.parse(params)
}

export function edgeWeight(edge: Edge): number {
  return edge.weight ?? DEFAULT_EDGE_WEIGHT
}

export function isDirectedEdge(edge: Edge): boolean {
  return edge.directed === true
}

/** Edge identity = (source, target, kind) */
export function sameEdge(a: Pick<Edge, 'source' | 'target' | 'kind'>, b: Pick<Edge, 'source' | 'target' | 'kind'>): boolean {
  return a.source === b.source && a.target === b.target && a.kind === b.kind
}
