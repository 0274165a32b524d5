import type { EdgeKind, Node, NodeKind } from '@hotgraph/graph'
import type { GraphStore } from '@hotgraph/store/graph-store'
import type { RevisionedGraph } from '@hotgraph/store/types'
import type { AccessCount } from './access-stats'
import type { StagedChange } from './dirty-tracker'
import type { FocusRadius } from './focus-set'
import type { CacheSnapshot } from './snapshot'
import type { SyncState } from './sync-manager'
import type { ZoneRules } from './zone-index'
import { EdgeSchema, formatIssues, NodeSchema, oppositeKind } from '@hotgraph/graph'
import { InvalidInputError, isHotGraphError, PersistenceError } from '@hotgraph/utils/errors'
import { createLogger } from '@hotgraph/utils/logger'
import { AccessStats } from './access-stats'
import { DEFAULT_MAX_HOPS } from './config'
import { DirtyTracker } from './dirty-tracker'
import { FocusSet } from './focus-set'
import { PathCache } from './path-cache'
import { assertHopBound, findPath } from './path-search'
import { buildSnapshot } from './snapshot'
import { SyncManager } from './sync-manager'

const log = createLogger('HotGraphCache')

export interface HotGraphCacheOptions {
  zones?: ZoneRules
  /** Focus radius used when focus() is called without one; unset keeps everything reachable */
  focusRadius?: FocusRadius
  /** Hop bound used when path() is called without one */
  defaultMaxHops?: number
}

export interface NodePatch {
  kind?: NodeKind
  category?: string
  /** Shallow-merged into the node's attrs */
  attrs?: Record<string, unknown>
}

export interface EdgeInput {
  source: string
  target: string
  kind: EdgeKind
  weight?: number
  directed?: boolean
}

export interface FocusOptions {
  /** null scopes to everything reachable */
  radius?: FocusRadius
}

export interface CacheStats {
  revision: number
  syncState: SyncState
  nodeCount: number
  edgeCount: number
  focusSize: number
  focusRadius: FocusRadius
  pathCacheSize: number
  cacheHits: number
  cacheMisses: number
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number
  totalAccesses: number
  dirtyCount: number
  pendingChanges: number
  topAccessed: AccessCount[]
}

/**
 * Working-set cache over a GraphStore.
 *
 * Queries are synchronous and read the published snapshot once per call.
 * Mutations only mark nodes dirty and stage changes; `sync()` writes them
 * through the store and swaps in the rebuilt snapshot.
 */
export class HotGraphCache {
  readonly paths = new PathCache()
  readonly access = new AccessStats()
  private readonly focusSet: FocusSet
  private readonly dirty = new DirtyTracker()
  private readonly syncManager: SyncManager
  private readonly zoneRules: ZoneRules
  private readonly maxHops: number

  private constructor(
    store: GraphStore,
    private snapshot: CacheSnapshot,
    options: HotGraphCacheOptions,
  ) {
    this.zoneRules = options.zones ?? {}
    this.maxHops = options.defaultMaxHops ?? DEFAULT_MAX_HOPS
    assertHopBound(this.maxHops)
    this.focusSet = new FocusSet(options.focusRadius ?? null)
    this.syncManager = new SyncManager(store, this.dirty, {
      current: () => this.snapshot,
      publish: next => this.publish(next),
      rebuild: loaded => buildSnapshot(loaded, this.zoneRules),
    })
  }

  /**
   * Load the store's current graph and build the first snapshot
   */
  static async open(store: GraphStore, options: HotGraphCacheOptions = {}): Promise<HotGraphCache> {
    let loaded: RevisionedGraph
    try {
      loaded = await store.load()
    }
    catch (err) {
      if (isHotGraphError(err))
        throw err
      throw new PersistenceError(`load failed: ${err instanceof Error ? err.message : String(err)}`, err)
    }
    const snapshot = buildSnapshot(loaded, options.zones ?? {})
    log.debug(`opened at revision ${snapshot.revision} (${snapshot.index.nodeCount} nodes, ${snapshot.index.edgeCount} edges)`)
    return new HotGraphCache(store, snapshot, options)
  }

  get revision(): number {
    return this.snapshot.revision
  }

  get syncState(): SyncState {
    return this.syncManager.state
  }

  get lastSyncError(): Error | null {
    return this.syncManager.lastError
  }

  get defaultMaxHops(): number {
    return this.maxHops
  }

  current(): CacheSnapshot {
    return this.snapshot
  }

  getNode(id: string): Node {
    return this.snapshot.index.requireNode(id)
  }

  // ==================== Queries ====================

  /**
   * Neighbors of `id` in adjacency order, scoped by the focus
   */
  neighbors(id: string): string[] {
    const { index } = this.snapshot
    const result = this.focusSet.filter(index, index.neighbors(id))
    this.access.recordAccess(id)
    return result
  }

  /**
   * Neighbors of the opposite kind: software touching a hardware node, and
   * the reverse
   */
  related(id: string): string[] {
    const { index } = this.snapshot
    const wanted = oppositeKind(index.requireNode(id).kind)
    const opposite = index.neighbors(id).filter(n => index.getNode(n)?.kind === wanted)
    const result = this.focusSet.filter(index, opposite)
    this.access.recordAccess(id)
    return result
  }

  /**
   * Shortest path of at most `maxHops` edges, served from the path cache
   * when a fresh entry exists
   */
  path(start: string, end: string, maxHops: number = this.maxHops): string[] {
    const { index, revision } = this.snapshot
    assertHopBound(maxHops)
    index.requireNode(start)
    index.requireNode(end)

    let path = this.paths.get(start, end, maxHops, revision)
    if (!path) {
      path = findPath(index, start, end, maxHops)
      this.paths.set(start, end, maxHops, path, revision)
    }

    this.access.recordAccess(start)
    this.access.recordAccess(end)
    return [...path]
  }

  zoneMembers(name: string): string[] {
    const members = [...this.snapshot.zones.members(name)]
    this.access.recordAll(members)
    return members
  }

  zoneNames(): string[] {
    return this.snapshot.zones.names()
  }

  // ==================== Focus ====================

  /**
   * Replace the focus; an empty list clears it
   */
  focus(ids: readonly string[], options: FocusOptions = {}): number {
    return options.radius === undefined
      ? this.focusSet.replace(ids)
      : this.focusSet.replace(ids, options.radius)
  }

  focusedIds(): string[] {
    return [...this.focusSet.ids]
  }

  get focusRadius(): FocusRadius {
    return this.focusSet.radius
  }

  // ==================== Dirty Tracking ====================

  /**
   * Mark existing nodes dirty and evict cached paths through them.
   * Nothing is marked when any id is unknown.
   */
  markDirty(ids: readonly string[]): number {
    const { index } = this.snapshot
    for (const id of ids) index.requireNode(id)
    this.dirty.mark(ids)
    this.invalidate(ids)
    return this.dirty.size
  }

  isDirty(id: string): boolean {
    return this.dirty.has(id)
  }

  dirtyCount(): number {
    return this.dirty.size
  }

  dirtyIds(): string[] {
    return this.dirty.ids()
  }

  // ==================== Staged Changes ====================

  /**
   * Stage a replacement of node `id`; returns the node that sync will write
   */
  updateNode(id: string, patch: NodePatch): Node {
    const base = this.stagedNode(id)
    const kind = patch.kind ?? base.kind
    return this.stageNode({
      id,
      kind,
      category: patch.category ?? (kind === base.kind ? base.category : undefined),
      attrs: { ...base.attrs, ...patch.attrs },
    })
  }

  /**
   * Stage removal of node `id` and its incident edges
   */
  removeNode(id: string): number {
    this.snapshot.index.requireNode(id)
    if (this.dirty.isPendingRemoval(id))
      return this.dirty.size
    this.dirty.dropEdgeChanges(id)
    this.stageChange({ type: 'remove-node', id }, [id])
    return this.dirty.size
  }

  /**
   * Stage an edge insert, replacing any edge with the same identity
   */
  connect(input: EdgeInput): number {
    const result = EdgeSchema.safeParse(input)
    if (!result.success) {
      throw new InvalidInputError(`edge: ${formatIssues(result.error.issues)}`)
    }
    const edge = result.data
    this.requireLiveNode(edge.source)
    this.requireLiveNode(edge.target)
    this.stageChange({ type: 'connect', edge }, [edge.source, edge.target])
    return this.dirty.size
  }

  disconnect(source: string, target: string, kind: EdgeKind): number {
    this.requireLiveNode(source)
    this.requireLiveNode(target)
    this.stageChange({ type: 'disconnect', source, target, kind }, [source, target])
    return this.dirty.size
  }

  /**
   * Re-apply a previously staged change, e.g. one read back from a session
   */
  stage(change: StagedChange): void {
    switch (change.type) {
      case 'update-node':
        this.stageNode(change.node)
        break
      case 'remove-node':
        this.removeNode(change.id)
        break
      case 'connect':
        this.connect(change.edge)
        break
      case 'disconnect':
        this.disconnect(change.source, change.target, change.kind)
        break
    }
  }

  pendingChanges(): StagedChange[] {
    return this.dirty.pending()
  }

  // ==================== Sync ====================

  /**
   * Persist dirty nodes and rebuild. Rejects with ConflictError when
   * `targetRevision` is not the published revision.
   */
  sync(targetRevision?: number): Promise<number> {
    return this.syncManager.sync(targetRevision)
  }

  /**
   * Rebuild from the store without flushing
   */
  refresh(): Promise<number> {
    return this.syncManager.refresh()
  }

  // ==================== Stats ====================

  stats(top = 5): CacheStats {
    const { index, revision } = this.snapshot
    const lookups = this.paths.hits + this.paths.misses
    return {
      revision,
      syncState: this.syncManager.state,
      nodeCount: index.nodeCount,
      edgeCount: index.edgeCount,
      focusSize: this.focusSet.size,
      focusRadius: this.focusSet.radius,
      pathCacheSize: this.paths.size,
      cacheHits: this.paths.hits,
      cacheMisses: this.paths.misses,
      hitRate: lookups === 0 ? 0 : this.paths.hits / lookups,
      totalAccesses: this.access.totalAccesses(),
      dirtyCount: this.dirty.size,
      pendingChanges: this.dirty.pending().length,
      topAccessed: this.access.topN(top),
    }
  }

  resetStats(): void {
    this.access.reset()
    this.paths.resetCounters()
  }

  // ==================== Internals ====================

  private stageNode(input: unknown): Node {
    const result = NodeSchema.safeParse(input)
    if (!result.success) {
      throw new InvalidInputError(`node: ${formatIssues(result.error.issues)}`)
    }
    const node = result.data
    this.requireLiveNode(node.id)
    this.stageChange({ type: 'update-node', node }, [node.id])
    return node
  }

  private stageChange(change: StagedChange, affected: readonly string[]): void {
    this.dirty.stage(change, affected)
    this.invalidate(affected)
  }

  private invalidate(ids: readonly string[]): void {
    let evicted = 0
    for (const id of ids) evicted += this.paths.invalidateNode(id)
    if (evicted > 0)
      log.debug(`evicted ${evicted} cached path(s)`)
  }

  /** Current node with any staged update applied */
  private stagedNode(id: string): Node {
    const current = this.requireLiveNode(id)
    let node = current
    for (const change of this.dirty.pending()) {
      if (change.type === 'update-node' && change.node.id === id)
        node = change.node
    }
    return node
  }

  private requireLiveNode(id: string): Node {
    const node = this.snapshot.index.requireNode(id)
    if (this.dirty.isPendingRemoval(id)) {
      throw new InvalidInputError(`node ${id} is staged for removal`)
    }
    return node
  }

  private publish(next: CacheSnapshot): void {
    const previous = this.snapshot.revision
    this.snapshot = next
    const evicted = this.paths.retainRevision(next.revision)
    log.debug(`published revision ${next.revision} (was ${previous}), evicted ${evicted} stale path(s)`)
  }
}
