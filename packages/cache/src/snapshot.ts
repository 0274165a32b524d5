import type { RevisionedGraph } from '@hotgraph/store/types'
import type { ZoneRules } from './zone-index'
import { serializedToGraph } from '@hotgraph/graph'
import { GraphIndex } from './graph-index'
import { ZoneIndex } from './zone-index'

/**
 * Everything readers need for one revision. Published by a single reference
 * swap, so a reader that grabbed a snapshot keeps a consistent view.
 */
export interface CacheSnapshot {
  readonly revision: number
  readonly index: GraphIndex
  readonly zones: ZoneIndex
}

export function buildSnapshot(loaded: RevisionedGraph, rules: ZoneRules): CacheSnapshot {
  const graph = serializedToGraph(loaded.graph)
  const index = GraphIndex.build(graph, loaded.revision)
  const zones = ZoneIndex.build(rules, index)
  return Object.freeze({ revision: loaded.revision, index, zones })
}
