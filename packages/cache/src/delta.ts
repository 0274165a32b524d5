import type { Edge, Node } from '@hotgraph/graph'
import type { EdgeKey, GraphDelta, StoredEdge } from '@hotgraph/store/types'
import type { DirtyBatch } from './dirty-tracker'
import type { GraphIndex } from './graph-index'
import { edgeToStored, nodeToAttrs } from '@hotgraph/graph'

/**
 * Collapse a captured batch into the delta sent to the store.
 *
 * Staged changes are folded in order, so the last change to a node or edge
 * wins. Dirty ids without a staged node change are sent as their current node.
 */
export function buildDelta(batch: DirtyBatch, index: GraphIndex): GraphDelta {
  const nodes = new Map<string, Node | null>()
  const upserts = new Map<string, Edge>()
  const removals = new Map<string, EdgeKey>()

  for (const change of batch.changes) {
    switch (change.type) {
      case 'update-node':
        nodes.set(change.node.id, change.node)
        break
      case 'remove-node':
        nodes.set(change.id, null)
        break
      case 'connect': {
        const key = edgeKey(change.edge.source, change.edge.target, change.edge.kind)
        removals.delete(key)
        upserts.set(key, change.edge)
        break
      }
      case 'disconnect': {
        const key = edgeKey(change.source, change.target, change.kind)
        upserts.delete(key)
        removals.set(key, { source: change.source, target: change.target, type: change.kind })
        break
      }
    }
  }

  for (const id of batch.marks.keys()) {
    if (nodes.has(id))
      continue
    const current = index.getNode(id)
    if (current)
      nodes.set(id, current)
  }

  const upsertEdges: StoredEdge[] = [...upserts.values()].map(edgeToStored)
  return {
    nodes: [...nodes].map(([id, node]) => ({ id, attrs: node ? nodeToAttrs(node) : null })),
    upsertEdges,
    removeEdges: [...removals.values()],
  }
}

function edgeKey(source: string, target: string, kind: string): string {
  return JSON.stringify([source, target, kind])
}
