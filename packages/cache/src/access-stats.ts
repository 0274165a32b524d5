export interface AccessCount {
  id: string
  count: number
}

/**
 * Per-node visit counters. Informational only: never drives eviction.
 */
export class AccessStats {
  private counts = new Map<string, number>()
  private total = 0

  recordAccess(id: string): void {
    this.counts.set(id, (this.counts.get(id) ?? 0) + 1)
    this.total++
  }

  recordAll(ids: Iterable<string>): void {
    for (const id of ids) this.recordAccess(id)
  }

  count(id: string): number {
    return this.counts.get(id) ?? 0
  }

  totalAccesses(): number {
    return this.total
  }

  /**
   * The n highest counters, ties broken by ascending id
   */
  topN(n: number): AccessCount[] {
    return [...this.counts]
      .map(([id, count]) => ({ id, count }))
      .sort((a, b) => b.count - a.count || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, Math.max(0, n))
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.counts)
  }

  /**
   * Replace the counters, e.g. from a saved session
   */
  restore(counts: Record<string, number>): void {
    this.reset()
    for (const [id, count] of Object.entries(counts)) {
      if (Number.isInteger(count) && count > 0) {
        this.counts.set(id, count)
        this.total += count
      }
    }
  }

  reset(): void {
    this.counts.clear()
    this.total = 0
  }

  get size(): number {
    return this.counts.size
  }
}
