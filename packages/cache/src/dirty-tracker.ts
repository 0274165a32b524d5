import type { Edge, EdgeKind, Node } from '@hotgraph/graph'

/**
 * A pending mutation of the working set, applied to the store on sync
 */
export type StagedChange
  = | { type: 'update-node', node: Node }
    | { type: 'remove-node', id: string }
    | { type: 'connect', edge: Edge }
    | { type: 'disconnect', source: string, target: string, kind: EdgeKind }

/**
 * The dirty marks and staged changes captured for one flush
 */
export interface DirtyBatch {
  /** Dirty id → mark version at capture time, in marking order */
  marks: ReadonlyMap<string, number>
  changes: readonly StagedChange[]
  /** Sequence number of the last captured change */
  lastSeq: number
}

interface StagedEntry {
  seq: number
  change: StagedChange
}

/**
 * Ids pending synchronization plus the changes staged against them.
 *
 * Every mark bumps the id's version. Acknowledging a batch removes only the
 * ids whose version is unchanged, so a node re-marked while a flush is in
 * flight stays dirty for the next cycle.
 */
export class DirtyTracker {
  private marks = new Map<string, number>()
  private staged: StagedEntry[] = []
  private version = 0
  private seq = 0

  mark(ids: Iterable<string>): void {
    for (const id of ids) {
      this.version++
      // Re-marking keeps the original marking order
      this.marks.set(id, this.version)
    }
  }

  stage(change: StagedChange, affected: readonly string[]): void {
    this.staged.push({ seq: ++this.seq, change })
    this.mark(affected)
  }

  /**
   * Drop staged edge changes touching `id`, used when the node itself is removed
   */
  dropEdgeChanges(id: string): void {
    this.staged = this.staged.filter(({ change }) => {
      if (change.type === 'connect')
        return change.edge.source !== id && change.edge.target !== id
      if (change.type === 'disconnect')
        return change.source !== id && change.target !== id
      return true
    })
  }

  has(id: string): boolean {
    return this.marks.has(id)
  }

  get size(): number {
    return this.marks.size
  }

  ids(): string[] {
    return [...this.marks.keys()]
  }

  pending(): StagedChange[] {
    return this.staged.map(entry => entry.change)
  }

  isPendingRemoval(id: string): boolean {
    return this.staged.some(({ change }) => change.type === 'remove-node' && change.id === id)
  }

  capture(): DirtyBatch {
    return {
      marks: new Map(this.marks),
      changes: this.staged.map(entry => entry.change),
      lastSeq: this.seq,
    }
  }

  acknowledge(batch: DirtyBatch): void {
    for (const [id, version] of batch.marks) {
      if (this.marks.get(id) === version)
        this.marks.delete(id)
    }
    this.staged = this.staged.filter(entry => entry.seq > batch.lastSeq)
  }

  clear(): void {
    this.marks.clear()
    this.staged = []
  }
}
