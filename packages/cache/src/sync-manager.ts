import type { GraphStore } from '@hotgraph/store/graph-store'
import type { RevisionedGraph } from '@hotgraph/store/types'
import type { DirtyTracker } from './dirty-tracker'
import type { CacheSnapshot } from './snapshot'
import { ConflictError, isHotGraphError, PersistenceError } from '@hotgraph/utils/errors'
import { createLogger } from '@hotgraph/utils/logger'
import { Mutex } from 'async-mutex'
import { buildDelta } from './delta'

const log = createLogger('SyncManager')

export const SyncState = {
  Idle: 'idle',
  Flushing: 'flushing',
  Rebuilding: 'rebuilding',
  Failed: 'failed',
} as const

export type SyncState = (typeof SyncState)[keyof typeof SyncState]

/**
 * Owner of the published snapshot
 */
export interface SnapshotHolder {
  current: () => CacheSnapshot
  publish: (snapshot: CacheSnapshot) => void
  rebuild: (loaded: RevisionedGraph) => CacheSnapshot
}

/**
 * Flushes dirty nodes to the store and rebuilds the snapshot from the store's
 * authoritative copy.
 *
 * Runs hold a mutex: a call made while another run is in flight starts after
 * it settles, in call order. A failed run leaves the dirty set and the
 * published snapshot untouched.
 */
export class SyncManager {
  private _state: SyncState = SyncState.Idle
  private _lastError: Error | null = null
  private readonly mutex = new Mutex()

  constructor(
    private readonly store: GraphStore,
    private readonly dirty: DirtyTracker,
    private readonly holder: SnapshotHolder,
  ) {}

  get state(): SyncState {
    return this._state
  }

  get lastError(): Error | null {
    return this._lastError
  }

  /**
   * Flush and rebuild; resolves with the published revision
   */
  sync(targetRevision?: number): Promise<number> {
    return this.mutex.runExclusive(() => this.runSync(targetRevision))
  }

  /**
   * Rebuild from the store without flushing; dirty marks are kept
   */
  refresh(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      this.transition(SyncState.Rebuilding)
      const next = await this.step('refresh', async () => this.holder.rebuild(await this.store.load()))
      this.holder.publish(next)
      this.transition(SyncState.Idle)
      return next.revision
    })
  }

  private async runSync(targetRevision: number | undefined): Promise<number> {
    const current = this.holder.current()
    if (targetRevision !== undefined && targetRevision !== current.revision) {
      throw new ConflictError(targetRevision, current.revision)
    }
    if (this.dirty.size === 0) {
      log.debug(`nothing to sync at revision ${current.revision}`)
      return current.revision
    }

    const batch = this.dirty.capture()
    const delta = buildDelta(batch, current.index)

    this.transition(SyncState.Flushing)
    const persisted = await this.step('flush', () =>
      this.store.persist(delta, { expectedRevision: current.revision }))
    log.debug(`flushed ${batch.marks.size} dirty node(s) as revision ${persisted}`)

    this.transition(SyncState.Rebuilding)
    const next = await this.step('rebuild', async () => this.holder.rebuild(await this.store.load()))

    this.holder.publish(next)
    this.dirty.acknowledge(batch)
    this.transition(SyncState.Idle)
    log.info(`synced ${batch.marks.size} node(s): revision ${current.revision} -> ${next.revision}`)
    return next.revision
  }

  /**
   * Run one phase; on failure enter `failed` and reject with a HotGraphError
   */
  private async step<T>(phase: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run()
    }
    catch (err) {
      const error = isHotGraphError(err)
        ? err
        : new PersistenceError(`${phase} failed: ${err instanceof Error ? err.message : String(err)}`, err)
      this._lastError = error
      this.transition(SyncState.Failed)
      log.warn(`${phase} failed, keeping revision ${this.holder.current().revision}: ${error.message}`)
      throw error
    }
  }

  private transition(next: SyncState): void {
    if (this._state !== next)
      log.debug(`sync state ${this._state} -> ${next}`)
    this._state = next
    if (next === SyncState.Idle)
      this._lastError = null
  }
}
