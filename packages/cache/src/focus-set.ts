import type { GraphIndex } from './graph-index'
import { InvalidInputError } from '@hotgraph/utils/errors'

/** Hop limit around the focused ids; null keeps everything reachable */
export type FocusRadius = number | null

/**
 * The operator's working set. Empty means unrestricted.
 *
 * Queries are scoped to every node reachable from a focused id that exists in
 * the current graph, or only to those within `radius` hops when one is set.
 * Focused ids are not validated.
 */
export class FocusSet {
  private focused: readonly string[] = []
  private _radius: FocusRadius
  private _focusedAt: Date | null = null
  private scoped: { revision: number, scope: ReadonlySet<string> } | null = null

  constructor(private readonly defaultRadius: FocusRadius = null) {
    assertRadius(defaultRadius)
    this._radius = defaultRadius
  }

  /**
   * Replace the focus atomically; returns the number of distinct ids
   */
  replace(ids: readonly string[], radius: FocusRadius = this.defaultRadius): number {
    assertRadius(radius)
    this.focused = Object.freeze([...new Set(ids)])
    this._radius = radius
    this._focusedAt = this.focused.length > 0 ? new Date() : null
    this.scoped = null
    return this.focused.length
  }

  clear(): void {
    this.replace([])
  }

  get ids(): readonly string[] {
    return this.focused
  }

  get size(): number {
    return this.focused.length
  }

  get isEmpty(): boolean {
    return this.focused.length === 0
  }

  get radius(): FocusRadius {
    return this._radius
  }

  get focusedAt(): Date | null {
    return this._focusedAt
  }

  /**
   * Ids reachable from the focus (within the radius, if any), or null when
   * the focus is empty
   */
  scope(index: GraphIndex): ReadonlySet<string> | null {
    if (this.isEmpty)
      return null
    if (this.scoped?.revision === index.revision)
      return this.scoped.scope

    const scope = new Set<string>()
    let frontier = this.focused.filter(id => index.hasNode(id))
    for (const id of frontier) scope.add(id)

    const limit = this._radius ?? Number.POSITIVE_INFINITY
    for (let depth = 0; depth < limit && frontier.length > 0; depth++) {
      const next: string[] = []
      for (const id of frontier) {
        for (const neighbor of index.neighbors(id)) {
          if (scope.has(neighbor))
            continue
          scope.add(neighbor)
          next.push(neighbor)
        }
      }
      frontier = next
    }

    this.scoped = { revision: index.revision, scope }
    return scope
  }

  /**
   * Keep the ids inside the focus scope, preserving order
   */
  filter(index: GraphIndex, ids: readonly string[]): string[] {
    const scope = this.scope(index)
    return scope ? ids.filter(id => scope.has(id)) : [...ids]
  }
}

function assertRadius(radius: FocusRadius): void {
  if (radius !== null && (!Number.isInteger(radius) || radius < 0)) {
    throw new InvalidInputError(`focus radius must be a non-negative integer, got ${radius}`)
  }
}
