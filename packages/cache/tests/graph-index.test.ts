import type { Graph } from '@hotgraph/graph'
import { GraphIndex } from '@hotgraph/cache/graph-index'
import { createEdge, createHardwareNode } from '@hotgraph/graph'
import { MalformedGraphError, NotFoundError } from '@hotgraph/utils/errors'
import { describe, expect, it } from 'vitest'
import { scenarioGraph } from './fixtures'

function graphOf(ids: string[], edges: Graph['edges']): Graph {
  return { nodes: ids.map(id => createHardwareNode({ id })), edges }
}

describe('GraphIndex', () => {
  it('orders neighbors by edge insertion, both ways for undirected edges', () => {
    const index = GraphIndex.build(scenarioGraph(), 1)

    expect(index.neighbors('dac1')).toEqual(['amp1', 'teensy'])
    expect(index.neighbors('amp1')).toEqual(['dac1'])
    expect(index.neighbors('teensy')).toEqual(['dac1', 'usb'])
    expect(index.neighbors('usb')).toEqual(['teensy'])
  })

  it('gives every neighbor a source edge', () => {
    const graph = scenarioGraph()
    const index = GraphIndex.build(graph, 1)

    for (const id of index.nodeIds()) {
      for (const neighbor of index.neighbors(id)) {
        const hasEdge = graph.edges.some(e =>
          (e.source === id && e.target === neighbor) || (e.target === id && e.source === neighbor))
        expect(hasEdge).toBe(true)
      }
    }
  })

  it('adds directed edges to the source list only', () => {
    const index = GraphIndex.build(graphOf(['a', 'b'], [
      createEdge({ source: 'a', target: 'b', kind: 'data', directed: true }),
    ]), 0)

    expect(index.neighbors('a')).toEqual(['b'])
    expect(index.neighbors('b')).toEqual([])
  })

  it('collapses parallel edges into one neighbor with the smallest weight', () => {
    const index = GraphIndex.build(graphOf(['a', 'b'], [
      createEdge({ source: 'a', target: 'b', kind: 'electrical', weight: 3 }),
      createEdge({ source: 'b', target: 'a', kind: 'data', weight: 1.5 }),
    ]), 0)

    expect(index.neighbors('a')).toEqual(['b'])
    expect(index.adjacency('a').get('b')).toBe(1.5)
    expect(index.adjacency('b').get('a')).toBe(1.5)
    expect(index.edgeCount).toBe(2)
    expect(index.unitWeighted).toBe(false)
  })

  it('reports counts and unit weighting', () => {
    const index = GraphIndex.build(scenarioGraph(), 7)

    expect(index.revision).toBe(7)
    expect(index.nodeCount).toBe(4)
    expect(index.edgeCount).toBe(3)
    expect(index.unitWeighted).toBe(true)
    expect(index.nodeIds()).toEqual(['dac1', 'amp1', 'teensy', 'usb'])
    expect(index.hasNode('usb')).toBe(true)
    expect(index.getNode('ghost')).toBeUndefined()
  })

  it('rejects duplicate node ids', () => {
    expect(() => GraphIndex.build(graphOf(['a', 'a'], []), 0))
      .toThrow('Malformed graph: duplicate node id a')
  })

  it('rejects edges with an unknown endpoint', () => {
    const build = (): GraphIndex => GraphIndex.build(graphOf(['a'], [
      createEdge({ source: 'a', target: 'ghost', kind: 'electrical' }),
    ]), 0)

    expect(build).toThrow(MalformedGraphError)
    expect(build).toThrow('Malformed graph: edge a -> ghost (electrical) references unknown node ghost')
  })

  it('throws NotFoundError for unknown ids', () => {
    const index = GraphIndex.build(scenarioGraph(), 1)

    expect(() => index.neighbors('nonexistent')).toThrow(NotFoundError)
    expect(() => index.requireNode('nonexistent')).toThrow('Node not found: nonexistent')
  })
})
