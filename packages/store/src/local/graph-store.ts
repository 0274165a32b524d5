import type { GraphStore } from '../graph-store'
import type {
  EdgeAttrs,
  GraphDelta,
  NodeAttrs,
  PersistOpts,
  RevisionedGraph,
  SerializedGraph,
  StoredEdge,
} from '../types'
import { mkdirSync, mkdtempSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ConflictError, MalformedGraphError, PersistenceError } from '@hotgraph/utils/errors'
import { createLogger } from '@hotgraph/utils/logger'

const log = createLogger('LocalGraphStore')

interface PersistedData {
  revision: number
  nodes: Array<{ id: string, attrs: NodeAttrs }>
  edges: StoredEdge[]
}

export interface LocalGraphStoreConfig {
  /** Directory holding graph.json, or 'memory' for a temp directory removed on close */
  path: string
}

const EMPTY: PersistedData = { revision: 0, nodes: [], edges: [] }

/**
 * LocalGraphStore: JSON file-based GraphStore.
 *
 * Storage: single JSON file at `{path}/graph.json` holding the revision,
 * the nodes and the edges in insertion order. The file is re-read on every
 * call so writes made by another process are picked up by the next load.
 * Writes go to a temp file that is renamed over graph.json.
 *
 * Memory mode: pass path `'memory'` to use a temp directory.
 */
export class LocalGraphStore implements GraphStore {
  private filePath: string | null = null
  private _tempDir: string | undefined = undefined

  async open(config: unknown): Promise<void> {
    if (!isLocalConfig(config)) {
      throw new TypeError(
        `LocalGraphStore.open() requires config.path: string, got: ${JSON.stringify(config)}`,
      )
    }
    let dir = config.path

    if (dir === 'memory') {
      dir = mkdtempSync(join(tmpdir(), 'hotgraph-local-graph-'))
      this._tempDir = dir
    }
    else {
      mkdirSync(dir, { recursive: true })
    }

    this.filePath = join(dir, 'graph.json')
    // Fail fast on a corrupt file
    this.readState()
  }

  async close(): Promise<void> {
    this.filePath = null
    if (this._tempDir) {
      rmSync(this._tempDir, { recursive: true, force: true })
      this._tempDir = undefined
    }
  }

  async load(): Promise<RevisionedGraph> {
    const state = this.readState()
    return {
      graph: {
        nodes: state.nodes.map(n => ({ id: n.id, attrs: { ...n.attrs } })),
        edges: state.edges.map(e => ({ source: e.source, target: e.target, attrs: { ...e.attrs } })),
      },
      revision: state.revision,
    }
  }

  async revision(): Promise<number> {
    return this.readState().revision
  }

  async persist(delta: GraphDelta, opts: PersistOpts = {}): Promise<number> {
    const state = this.readState()
    checkRevision(state.revision, opts.expectedRevision)

    const nodes = new Map(state.nodes.map(n => [n.id, n.attrs]))
    let edges = [...state.edges]

    for (const { id, attrs } of delta.nodes) {
      if (attrs === null) {
        nodes.delete(id)
        // Cascade-delete edges referencing this node
        edges = edges.filter(e => e.source !== id && e.target !== id)
      }
      else {
        nodes.set(id, attrs)
      }
    }

    for (const key of delta.removeEdges) {
      edges = edges.filter(
        e => !(e.source === key.source && e.target === key.target && e.attrs.type === key.type),
      )
    }

    for (const edge of delta.upsertEdges) {
      if (!nodes.has(edge.source) || !nodes.has(edge.target)) {
        throw new MalformedGraphError(
          `edge ${edge.source} -> ${edge.target} (${edge.attrs.type}) references a missing node`,
        )
      }
      // Replace existing edge with same identity (source, target, type)
      const idx = edges.findIndex(
        e => e.source === edge.source && e.target === edge.target && e.attrs.type === edge.attrs.type,
      )
      if (idx >= 0) {
        edges[idx] = edge
      }
      else {
        edges.push(edge)
      }
    }

    const next: PersistedData = {
      revision: state.revision + 1,
      nodes: [...nodes.entries()].map(([id, attrs]) => ({ id, attrs })),
      edges,
    }
    this.writeState(next)
    log.debug(`persisted ${delta.nodes.length} node change(s) at revision ${next.revision}`)
    return next.revision
  }

  async import(graph: SerializedGraph, opts: PersistOpts = {}): Promise<number> {
    const state = this.readState()
    checkRevision(state.revision, opts.expectedRevision)

    const next: PersistedData = {
      revision: state.revision + 1,
      nodes: graph.nodes.map(n => ({ id: n.id, attrs: n.attrs })),
      edges: graph.edges.map(e => ({ source: e.source, target: e.target, attrs: e.attrs })),
    }
    this.writeState(next)
    return next.revision
  }

  private requirePath(): string {
    if (!this.filePath) {
      throw new PersistenceError('LocalGraphStore is not open')
    }
    return this.filePath
  }

  private readState(): PersistedData {
    const filePath = this.requirePath()
    let raw: string
    try {
      raw = readFileSync(filePath, 'utf8')
    }
    catch (err) {
      if (err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT') {
        return EMPTY
      }
      throw new PersistenceError(`failed to read ${filePath}`, err)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    }
    catch (err) {
      throw new MalformedGraphError(
        `${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      )
    }
    if (!isPersistedData(parsed)) {
      throw new MalformedGraphError(`${filePath} does not contain { revision, nodes, edges }`)
    }
    return parsed
  }

  private writeState(data: PersistedData): void {
    const filePath = this.requirePath()
    const tmpPath = `${filePath}.tmp`
    try {
      writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf8')
      renameSync(tmpPath, filePath)
    }
    catch (err) {
      rmSync(tmpPath, { force: true })
      throw new PersistenceError(`failed to write ${filePath}`, err)
    }
  }
}

function checkRevision(actual: number, expected: number | undefined): void {
  if (expected !== undefined && expected !== actual) {
    throw new ConflictError(expected, actual)
  }
}

function isLocalConfig(config: unknown): config is LocalGraphStoreConfig {
  return typeof config === 'object'
    && config !== null
    && 'path' in config
    && typeof config.path === 'string'
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isEdgeAttrs(value: unknown): value is EdgeAttrs {
  return isRecord(value) && typeof value.type === 'string'
}

function isPersistedData(value: unknown): value is PersistedData {
  if (!isRecord(value) || !Number.isInteger(value.revision))
    return false
  if (!Array.isArray(value.nodes) || !Array.isArray(value.edges))
    return false
  const nodesOk = value.nodes.every(n => isRecord(n) && typeof n.id === 'string' && isRecord(n.attrs))
  const edgesOk = value.edges.every(e =>
    isRecord(e) && typeof e.source === 'string' && typeof e.target === 'string' && isEdgeAttrs(e.attrs),
  )
  return nodesOk && edgesOk
}
