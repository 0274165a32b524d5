/**
 * Generic attribute types for the store layer.
 * Domain-agnostic: hardware/software node types live in @hotgraph/graph/adapters.
 */

/** Generic node attributes stored as a flat record */
export type NodeAttrs = Record<string, unknown>

/**
 * Generic edge attributes. The `type` field is part of edge identity:
 * edge identity = (source, target, type).
 */
export type EdgeAttrs = Record<string, unknown> & { type: string }

export interface StoredNode {
  id: string
  attrs: NodeAttrs
}

export interface StoredEdge {
  source: string
  target: string
  attrs: EdgeAttrs
}

/** Serialized graph; array order is insertion order */
export interface SerializedGraph {
  nodes: StoredNode[]
  edges: StoredEdge[]
}

/** A graph as read from the store, stamped with the revision it was read at */
export interface RevisionedGraph {
  graph: SerializedGraph
  revision: number
}

/** Identity of an edge to remove */
export interface EdgeKey {
  source: string
  target: string
  type: string
}

/**
 * Changes flushed in one persist call.
 * A node entry with `attrs: null` removes the node and its incident edges.
 */
export interface GraphDelta {
  nodes: Array<{ id: string, attrs: NodeAttrs | null }>
  upsertEdges: StoredEdge[]
  removeEdges: EdgeKey[]
}

export interface PersistOpts {
  /** Reject with ConflictError unless the store is still at this revision */
  expectedRevision?: number
}

/** Lifecycle interface for stores that need explicit open/close */
export interface Lifecycle {
  open: (config: unknown) => Promise<void>
  close: () => Promise<void>
}
