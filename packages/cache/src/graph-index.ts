import type { Graph, Node } from '@hotgraph/graph'
import { DEFAULT_EDGE_WEIGHT, edgeWeight, isDirectedEdge } from '@hotgraph/graph'
import { MalformedGraphError, NotFoundError } from '@hotgraph/utils/errors'

/**
 * Immutable adjacency index over one revision of the graph.
 *
 * Neighbor lists follow edge insertion order: for every edge the target is
 * appended to the source's list and, unless the edge is directed, the source
 * to the target's list. Parallel edges collapse into one entry that keeps the
 * smallest weight.
 */
export class GraphIndex {
  private constructor(
    readonly revision: number,
    private readonly nodeMap: ReadonlyMap<string, Node>,
    private readonly weights: ReadonlyMap<string, ReadonlyMap<string, number>>,
    private readonly lists: ReadonlyMap<string, readonly string[]>,
    readonly edgeCount: number,
    /** True when every edge has the default weight, so BFS finds shortest paths */
    readonly unitWeighted: boolean,
  ) {}

  /**
   * Build the index, rejecting duplicate node ids and edges with unknown endpoints
   */
  static build(graph: Graph, revision: number): GraphIndex {
    const nodeMap = new Map<string, Node>()
    const weights = new Map<string, Map<string, number>>()

    for (const node of graph.nodes) {
      if (nodeMap.has(node.id)) {
        throw new MalformedGraphError(`duplicate node id ${node.id}`)
      }
      nodeMap.set(node.id, node)
      weights.set(node.id, new Map())
    }

    let unitWeighted = true
    for (const edge of graph.edges) {
      const out = weights.get(edge.source)
      const back = weights.get(edge.target)
      if (!out || !back) {
        const missing = out ? edge.target : edge.source
        throw new MalformedGraphError(
          `edge ${edge.source} -> ${edge.target} (${edge.kind}) references unknown node ${missing}`,
        )
      }

      const weight = edgeWeight(edge)
      if (weight !== DEFAULT_EDGE_WEIGHT)
        unitWeighted = false

      link(out, edge.target, weight)
      if (!isDirectedEdge(edge))
        link(back, edge.source, weight)
    }

    const lists = new Map<string, readonly string[]>()
    for (const [id, adjacent] of weights) {
      lists.set(id, Object.freeze([...adjacent.keys()]))
    }

    return new GraphIndex(revision, nodeMap, weights, lists, graph.edges.length, unitWeighted)
  }

  get nodeCount(): number {
    return this.nodeMap.size
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id)
  }

  getNode(id: string): Node | undefined {
    return this.nodeMap.get(id)
  }

  requireNode(id: string): Node {
    const node = this.nodeMap.get(id)
    if (!node) {
      throw new NotFoundError('node', id)
    }
    return node
  }

  /** Node ids in graph insertion order */
  nodeIds(): string[] {
    return [...this.nodeMap.keys()]
  }

  nodes(): Node[] {
    return [...this.nodeMap.values()]
  }

  /**
   * Ordered neighbor ids of a node
   */
  neighbors(id: string): readonly string[] {
    const list = this.lists.get(id)
    if (!list) {
      throw new NotFoundError('node', id)
    }
    return list
  }

  /**
   * Neighbors with the traversal weight, in neighbor order
   */
  adjacency(id: string): ReadonlyMap<string, number> {
    const adjacent = this.weights.get(id)
    if (!adjacent) {
      throw new NotFoundError('node', id)
    }
    return adjacent
  }
}

function link(adjacent: Map<string, number>, neighbor: string, weight: number): void {
  const existing = adjacent.get(neighbor)
  if (existing === undefined || weight < existing) {
    // Map.set on an existing key keeps its original position
    adjacent.set(neighbor, weight)
  }
}
