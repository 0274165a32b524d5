import type { GraphIndex } from './graph-index'
import { InvalidInputError, NotReachableError } from '@hotgraph/utils/errors'

/**
 * Reject hop bounds that are not non-negative integers
 */
export function assertHopBound(maxHops: number): void {
  if (!Number.isInteger(maxHops) || maxHops < 0) {
    throw new InvalidInputError(`maxHops must be a non-negative integer, got ${maxHops}`)
  }
}

/**
 * Shortest path from `start` to `end` using at most `maxHops` edges.
 *
 * Unit-weighted graphs use breadth-first search; otherwise a hop-bounded
 * Dijkstra over (node, hops) states, since the cheapest path may need more
 * hops than the bound allows. Among equally short paths the one reached by
 * following neighbors in adjacency order wins.
 */
export function findPath(index: GraphIndex, start: string, end: string, maxHops: number): string[] {
  assertHopBound(maxHops)
  index.requireNode(start)
  index.requireNode(end)

  if (start === end)
    return [start]

  const path = index.unitWeighted
    ? breadthFirst(index, start, end, maxHops)
    : boundedDijkstra(index, start, end, maxHops)

  if (!path) {
    throw new NotReachableError(start, end, maxHops)
  }
  return path
}

// ==================== Breadth-first ====================

function breadthFirst(index: GraphIndex, start: string, end: string, maxHops: number): string[] | null {
  const parent = new Map<string, string | null>([[start, null]])
  let frontier = [start]

  for (let depth = 0; depth < maxHops && frontier.length > 0; depth++) {
    const next: string[] = []
    for (const id of frontier) {
      for (const neighbor of index.neighbors(id)) {
        if (parent.has(neighbor))
          continue
        parent.set(neighbor, id)
        if (neighbor === end)
          return unwind(parent, end)
        next.push(neighbor)
      }
    }
    frontier = next
  }
  return null
}

function unwind(parent: Map<string, string | null>, end: string): string[] {
  const path: string[] = []
  let cursor: string | null | undefined = end
  while (cursor != null) {
    path.push(cursor)
    cursor = parent.get(cursor)
  }
  return path.reverse()
}

// ==================== Hop-bounded Dijkstra ====================

interface SearchState {
  id: string
  hops: number
  cost: number
  /** Position of each hop in the previous node's adjacency list */
  rank: readonly number[]
  prev: SearchState | null
}

interface Label {
  hops: number
  cost: number
  rank: readonly number[]
}

function boundedDijkstra(index: GraphIndex, start: string, end: string, maxHops: number): string[] | null {
  const queue = new StateQueue()
  // Settled labels per node; a state no better in hops, cost and rank is dropped
  const settled = new Map<string, Label[]>()

  queue.push({ id: start, hops: 0, cost: 0, rank: [], prev: null })

  for (let state = queue.pop(); state; state = queue.pop()) {
    if (state.id === end)
      return statePath(state)

    const labels = settled.get(state.id) ?? []
    if (dominated(labels, state))
      continue
    labels.push({ hops: state.hops, cost: state.cost, rank: state.rank })
    settled.set(state.id, labels)

    if (state.hops === maxHops)
      continue

    let position = 0
    for (const [neighbor, weight] of index.adjacency(state.id)) {
      const next: SearchState = {
        id: neighbor,
        hops: state.hops + 1,
        cost: state.cost + weight,
        rank: [...state.rank, position++],
        prev: state,
      }
      if (!dominated(settled.get(neighbor) ?? [], next))
        queue.push(next)
    }
  }
  return null
}

function dominated(labels: readonly Label[], state: Label): boolean {
  return labels.some((label) => {
    if (label.hops > state.hops || label.cost > state.cost)
      return false
    if (label.hops === state.hops && label.cost === state.cost)
      return compareRank(label.rank, state.rank) <= 0
    return true
  })
}

/**
 * Lexicographic order of adjacency ranks; a prefix sorts first
 */
function compareRank(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0)
      return diff
  }
  return a.length - b.length
}

function statePath(state: SearchState): string[] {
  const path: string[] = []
  for (let cursor: SearchState | null = state; cursor; cursor = cursor.prev) {
    path.push(cursor.id)
  }
  return path.reverse()
}

/**
 * Binary min-heap ordered by cost, then hops, then adjacency rank
 */
class StateQueue {
  private heap: SearchState[] = []

  push(state: SearchState): void {
    const heap = this.heap
    heap.push(state)
    let i = heap.length - 1
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!before(heap[i], heap[parent]))
        break
      swap(heap, i, parent)
      i = parent
    }
  }

  pop(): SearchState | undefined {
    const heap = this.heap
    const top = heap[0]
    const last = heap.pop()
    if (heap.length === 0 || !last)
      return top

    heap[0] = last
    let i = 0
    for (;;) {
      const left = 2 * i + 1
      const right = left + 1
      let smallest = i
      if (left < heap.length && before(heap[left], heap[smallest]))
        smallest = left
      if (right < heap.length && before(heap[right], heap[smallest]))
        smallest = right
      if (smallest === i)
        break
      swap(heap, i, smallest)
      i = smallest
    }
    return top
  }
}

function before(a: SearchState | undefined, b: SearchState | undefined): boolean {
  if (!a || !b)
    return false
  if (a.cost !== b.cost)
    return a.cost < b.cost
  if (a.hops !== b.hops)
    return a.hops < b.hops
  return compareRank(a.rank, b.rank) < 0
}

function swap(heap: SearchState[], i: number, j: number): void {
  const tmp = heap[i]
  const other = heap[j]
  if (tmp && other) {
    heap[i] = other
    heap[j] = tmp
  }
}
