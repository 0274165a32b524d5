import type { Graph } from '@hotgraph/graph'
import { GraphIndex } from '@hotgraph/cache/graph-index'
import { findPath } from '@hotgraph/cache/path-search'
import { createEdge, createHardwareNode } from '@hotgraph/graph'
import { InvalidInputError, NotFoundError, NotReachableError } from '@hotgraph/utils/errors'
import { describe, expect, it } from 'vitest'
import { scenarioGraph } from './fixtures'

function indexOf(ids: string[], edges: Graph['edges']): GraphIndex {
  return GraphIndex.build({ nodes: ids.map(id => createHardwareNode({ id })), edges }, 0)
}

describe('findPath', () => {
  const scenario = GraphIndex.build(scenarioGraph(), 1)

  it('finds the shortest path through the hub', () => {
    expect(findPath(scenario, 'usb', 'amp1', 5)).toEqual(['usb', 'teensy', 'dac1', 'amp1'])
  })

  it('fails when the hop bound is too small', () => {
    expect(() => findPath(scenario, 'usb', 'amp1', 1)).toThrow(NotReachableError)
    expect(() => findPath(scenario, 'usb', 'amp1', 2)).toThrow('No path from usb to amp1 within 2 hop(s)')
    expect(findPath(scenario, 'usb', 'amp1', 3)).toHaveLength(4)
  })

  it('returns the single node for start === end', () => {
    expect(findPath(scenario, 'dac1', 'dac1', 0)).toEqual(['dac1'])
  })

  it('validates ids and the hop bound', () => {
    expect(() => findPath(scenario, 'usb', 'ghost', 5)).toThrow(NotFoundError)
    expect(() => findPath(scenario, 'ghost', 'usb', 5)).toThrow(NotFoundError)
    expect(() => findPath(scenario, 'usb', 'amp1', -1)).toThrow(InvalidInputError)
    expect(() => findPath(scenario, 'usb', 'amp1', 1.5)).toThrow(InvalidInputError)
  })

  it('satisfies the path properties for every reachable pair', () => {
    for (const start of scenario.nodeIds()) {
      for (const end of scenario.nodeIds()) {
        for (const maxHops of [0, 1, 2, 3]) {
          let path: string[]
          try {
            path = findPath(scenario, start, end, maxHops)
          }
          catch (err) {
            expect(err).toBeInstanceOf(NotReachableError)
            continue
          }
          expect(path[0]).toBe(start)
          expect(path[path.length - 1]).toBe(end)
          expect(path.length).toBeLessThanOrEqual(maxHops + 1)
          for (let i = 1; i < path.length; i++) {
            expect(scenario.neighbors(path[i - 1] ?? '')).toContain(path[i])
          }
        }
      }
    }
  })

  it('breaks ties by adjacency order', () => {
    const index = indexOf(['a', 'b', 'c', 'd'], [
      createEdge({ source: 'a', target: 'b', kind: 'data' }),
      createEdge({ source: 'a', target: 'c', kind: 'data' }),
      createEdge({ source: 'c', target: 'd', kind: 'data' }),
      createEdge({ source: 'b', target: 'd', kind: 'data' }),
    ])
    expect(findPath(index, 'a', 'd', 4)).toEqual(['a', 'b', 'd'])
  })

  it('respects edge direction', () => {
    const index = indexOf(['a', 'b'], [
      createEdge({ source: 'a', target: 'b', kind: 'logical', directed: true }),
    ])
    expect(findPath(index, 'a', 'b', 1)).toEqual(['a', 'b'])
    expect(() => findPath(index, 'b', 'a', 5)).toThrow(NotReachableError)
  })

  describe('weighted graphs', () => {
    const index = indexOf(['a', 'b', 'd'], [
      createEdge({ source: 'a', target: 'b', kind: 'electrical' }),
      createEdge({ source: 'b', target: 'd', kind: 'electrical' }),
      createEdge({ source: 'a', target: 'd', kind: 'electrical', weight: 5 }),
    ])

    it('prefers the cheaper path over the shorter one', () => {
      expect(findPath(index, 'a', 'd', 5)).toEqual(['a', 'b', 'd'])
    })

    it('falls back to a costlier path that fits the hop bound', () => {
      expect(findPath(index, 'a', 'd', 1)).toEqual(['a', 'd'])
    })

    it('breaks equal-cost ties by adjacency order at the branch point', () => {
      const diamond = indexOf(['a', 'b', 'c', 'd'], [
        createEdge({ source: 'a', target: 'b', kind: 'data', weight: 2 }),
        createEdge({ source: 'a', target: 'c', kind: 'data', weight: 1 }),
        createEdge({ source: 'c', target: 'd', kind: 'data', weight: 1 }),
        createEdge({ source: 'b', target: 'd', kind: 'data', weight: 0 }),
      ])
      expect(findPath(diamond, 'a', 'd', 5)).toEqual(['a', 'b', 'd'])
      expect(findPath(diamond, 'd', 'a', 5)).toEqual(['d', 'c', 'a'])
    })

    it('prefers fewer hops among equal-cost paths', () => {
      const shortcut = indexOf(['a', 'b', 'c'], [
        createEdge({ source: 'a', target: 'b', kind: 'data', weight: 1 }),
        createEdge({ source: 'b', target: 'c', kind: 'data', weight: 1 }),
        createEdge({ source: 'a', target: 'c', kind: 'data', weight: 2 }),
      ])
      expect(findPath(shortcut, 'a', 'c', 5)).toEqual(['a', 'c'])
    })

    it('terminates on zero-weight cycles', () => {
      const cyclic = indexOf(['a', 'b', 'c', 'z'], [
        createEdge({ source: 'a', target: 'b', kind: 'data', weight: 0 }),
        createEdge({ source: 'b', target: 'c', kind: 'data', weight: 0 }),
        createEdge({ source: 'c', target: 'a', kind: 'data', weight: 0 }),
      ])
      expect(() => findPath(cyclic, 'a', 'z', 10)).toThrow(NotReachableError)
      expect(findPath(cyclic, 'a', 'c', 10)).toEqual(['a', 'c'])
    })
  })
})
