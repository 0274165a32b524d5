import type { GraphDelta, Lifecycle, PersistOpts, RevisionedGraph, SerializedGraph } from './types'

/**
 * GraphStore: authoritative, versioned graph storage.
 *
 * Domain-agnostic: stores nodes as (id, attrs) and edges as (source, target, attrs).
 * Edge identity = (source, target, attrs.type).
 *
 * Every successful write increments the revision by one. Writes are
 * all-or-nothing: a rejected persist leaves the stored graph and revision untouched.
 */
export interface GraphStore extends Lifecycle {
  /** Read the whole graph together with its revision */
  load: () => Promise<RevisionedGraph>

  /** Apply a delta and return the new revision */
  persist: (delta: GraphDelta, opts?: PersistOpts) => Promise<number>

  /** Replace the whole graph and return the new revision */
  import: (graph: SerializedGraph, opts?: PersistOpts) => Promise<number>

  /** Current revision without reading the graph */
  revision: () => Promise<number>
}
