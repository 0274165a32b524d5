/**
 * Adapters: bidirectional converters between component-graph types and generic store attrs.
 */
import type { EdgeAttrs, NodeAttrs, SerializedGraph, StoredEdge } from '@hotgraph/store/types'
import type { Edge } from './edge'
import type { Graph } from './graph'
import type { Node } from './node'
import { MalformedGraphError } from '@hotgraph/utils/errors'
import { EdgeSchema } from './edge'
import { formatIssues } from './graph'
import { NodeSchema } from './node'

// ==================== Node Adapters ====================

/** Convert a domain Node to generic NodeAttrs for storage */
export function nodeToAttrs(node: Node): NodeAttrs {
  const attrs: NodeAttrs = { kind: node.kind }
  if (node.category)
    attrs.category = node.category
  if (Object.keys(node.attrs).length > 0)
    attrs.props = node.attrs
  return attrs
}

/** Reconstruct a typed Node from generic attrs */
export function attrsToNode(id: string, attrs: NodeAttrs): Node {
  const result = NodeSchema.safeParse({
    id,
    kind: attrs.kind,
    category: attrs.category,
    attrs: attrs.props ?? {},
  })
  if (!result.success) {
    throw new MalformedGraphError(`node ${id}: ${formatIssues(result.error.issues)}`)
  }
  return result.data
}

// ==================== Edge Adapters ====================

/** Convert a domain Edge to generic EdgeAttrs for storage */
export function edgeToAttrs(edge: Edge): EdgeAttrs {
  const attrs: EdgeAttrs = { type: edge.kind }
  if (edge.weight != null)
    attrs.weight = edge.weight
  if (edge.directed)
    attrs.directed = true
  return attrs
}

/** Reconstruct a typed Edge from generic attrs */
export function attrsToEdge(source: string, target: string, attrs: EdgeAttrs): Edge {
  const result = EdgeSchema.safeParse({
    source,
    target,
    kind: attrs.type,
    weight: attrs.weight,
    directed: attrs.directed,
  })
  if (!result.success) {
    throw new MalformedGraphError(`edge ${source} -> ${target}: ${formatIssues(result.error.issues)}`)
  }
  return result.data
}

export function edgeToStored(edge: Edge): StoredEdge {
  return { source: edge.source, target: edge.target, attrs: edgeToAttrs(edge) }
}

// ==================== Graph Adapters ====================

export function graphToSerialized(graph: Graph): SerializedGraph {
  return {
    nodes: graph.nodes.map(node => ({ id: node.id, attrs: nodeToAttrs(node) })),
    edges: graph.edges.map(edgeToStored),
  }
}

export function serializedToGraph(serialized: SerializedGraph): Graph {
  return {
    nodes: serialized.nodes.map(n => attrsToNode(n.id, n.attrs)),
    edges: serialized.edges.map(e => attrsToEdge(e.source, e.target, e.attrs)),
  }
}
