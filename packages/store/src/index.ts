// Store interface (generic, domain-agnostic)
export type { GraphStore } from './graph-store'

// Shared types
export type {
  EdgeAttrs,
  EdgeKey,
  GraphDelta,
  Lifecycle,
  NodeAttrs,
  PersistOpts,
  RevisionedGraph,
  SerializedGraph,
  StoredEdge,
  StoredNode,
} from './types'

// Store implementations, imported directly:
//   import { LocalGraphStore } from '@hotgraph/store/local'
