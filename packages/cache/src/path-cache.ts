export interface PathCacheEntry {
  start: string
  end: string
  maxHops: number
  path: readonly string[]
  /** Index revision the path was computed against */
  revision: number
}

/**
 * Memoized shortest paths keyed by (start, end, maxHops).
 *
 * A reverse index from node id to the keys whose path visits it lets a dirty
 * mark evict exactly the affected entries.
 */
export class PathCache {
  private entries = new Map<string, PathCacheEntry>()
  private byNode = new Map<string, Set<string>>()
  private hitCount = 0
  private missCount = 0

  /**
   * Fresh path for the key, or undefined. An entry from another revision is
   * evicted and counts as a miss.
   */
  get(start: string, end: string, maxHops: number, revision: number): readonly string[] | undefined {
    const key = pathKey(start, end, maxHops)
    const entry = this.entries.get(key)
    if (!entry || entry.revision !== revision) {
      if (entry)
        this.evict(key)
      this.missCount++
      return undefined
    }
    this.hitCount++
    return entry.path
  }

  set(start: string, end: string, maxHops: number, path: readonly string[], revision: number): void {
    const key = pathKey(start, end, maxHops)
    this.evict(key)
    this.entries.set(key, { start, end, maxHops, path: Object.freeze([...path]), revision })
    for (const id of path) {
      let keys = this.byNode.get(id)
      if (!keys) {
        keys = new Set()
        this.byNode.set(id, keys)
      }
      keys.add(key)
    }
  }

  has(start: string, end: string, maxHops: number): boolean {
    return this.entries.has(pathKey(start, end, maxHops))
  }

  /**
   * Evict every entry whose path visits `id`; returns the number evicted
   */
  invalidateNode(id: string): number {
    const keys = this.byNode.get(id)
    if (!keys)
      return 0
    let evicted = 0
    for (const key of [...keys]) {
      if (this.evict(key))
        evicted++
    }
    return evicted
  }

  /**
   * Evict every entry computed against a revision other than `revision`
   */
  retainRevision(revision: number): number {
    let evicted = 0
    for (const [key, entry] of [...this.entries]) {
      if (entry.revision !== revision && this.evict(key))
        evicted++
    }
    return evicted
  }

  clear(): void {
    this.entries.clear()
    this.byNode.clear()
  }

  get size(): number {
    return this.entries.size
  }

  get hits(): number {
    return this.hitCount
  }

  get misses(): number {
    return this.missCount
  }

  resetCounters(): void {
    this.hitCount = 0
    this.missCount = 0
  }

  private evict(key: string): boolean {
    const entry = this.entries.get(key)
    if (!entry)
      return false
    this.entries.delete(key)
    for (const id of entry.path) {
      const keys = this.byNode.get(id)
      keys?.delete(key)
      if (keys && keys.size === 0)
        this.byNode.delete(id)
    }
    return true
  }
}

function pathKey(start: string, end: string, maxHops: number): string {
  return JSON.stringify([start, end, maxHops])
}
