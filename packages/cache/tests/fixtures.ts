import type { Graph } from '@hotgraph/graph'
import type { GraphStore } from '@hotgraph/store/graph-store'
import type { GraphDelta, PersistOpts, RevisionedGraph, SerializedGraph } from '@hotgraph/store/types'
import type { HotGraphCacheOptions } from '@hotgraph/cache/hot-cache'
import { createEdge, createHardwareNode, createSoftwareNode, graphToSerialized } from '@hotgraph/graph'
import { LocalGraphStore } from '@hotgraph/store/local'
import { HotGraphCache } from '@hotgraph/cache/hot-cache'

/**
 * dac1 - amp1, teensy - dac1, usb - teensy; all undirected, unit weight
 */
export function scenarioGraph(): Graph {
  return {
    nodes: [
      createHardwareNode({ id: 'dac1', category: 'ic', attrs: { rail: 'analog' } }),
      createHardwareNode({ id: 'amp1', category: 'ic', attrs: { rail: 'analog' } }),
      createHardwareNode({ id: 'teensy', category: 'module' }),
      createHardwareNode({ id: 'usb', category: 'connector' }),
    ],
    edges: [
      createEdge({ source: 'dac1', target: 'amp1', kind: 'electrical' }),
      createEdge({ source: 'teensy', target: 'dac1', kind: 'data' }),
      createEdge({ source: 'usb', target: 'teensy', kind: 'data' }),
    ],
  }
}

/**
 * Scenario graph plus software nodes wired to the hardware
 */
export function mixedGraph(): Graph {
  const graph = scenarioGraph()
  return {
    nodes: [
      ...graph.nodes,
      createSoftwareNode({ id: 'audio_driver', category: 'driver' }),
      createSoftwareNode({ id: 'usb_stack', category: 'module' }),
    ],
    edges: [
      ...graph.edges,
      createEdge({ source: 'audio_driver', target: 'dac1', kind: 'logical' }),
      createEdge({ source: 'usb_stack', target: 'teensy', kind: 'logical' }),
      createEdge({ source: 'audio_driver', target: 'usb_stack', kind: 'data' }),
    ],
  }
}

export const SCENARIO_ZONES: HotGraphCacheOptions['zones'] = {
  power_analog: { members: ['dac1', 'amp1'] },
}

/**
 * Store that delegates to a LocalGraphStore in memory mode and can be told
 * to fail, corrupt its reads, or hold persist calls until released.
 */
export class TestStore implements GraphStore {
  readonly inner = new LocalGraphStore()
  /** Thrown by the next persist calls while set */
  persistError: unknown = null
  /** Thrown by the next load calls while set */
  loadError: unknown = null
  /** Extra edge appended to loaded graphs while set */
  danglingEdge = false
  readonly expectedRevisions: Array<number | undefined> = []
  private gate: Promise<void> = Promise.resolve()
  private releaseGate: () => void = () => {}

  async open(config: unknown): Promise<void> {
    await this.inner.open(config)
  }

  async close(): Promise<void> {
    await this.inner.close()
  }

  async load(): Promise<RevisionedGraph> {
    if (this.loadError)
      throw this.loadError
    const loaded = await this.inner.load()
    if (this.danglingEdge) {
      loaded.graph.edges.push({ source: 'usb', target: 'ghost', attrs: { type: 'data' } })
    }
    return loaded
  }

  async persist(delta: GraphDelta, opts?: PersistOpts): Promise<number> {
    this.expectedRevisions.push(opts?.expectedRevision)
    await this.gate
    if (this.persistError)
      throw this.persistError
    return this.inner.persist(delta, opts)
  }

  async import(graph: SerializedGraph, opts?: PersistOpts): Promise<number> {
    return this.inner.import(graph, opts)
  }

  async revision(): Promise<number> {
    return this.inner.revision()
  }

  /** Hold persist calls until release() */
  hold(): void {
    this.gate = new Promise((resolve) => {
      this.releaseGate = resolve
    })
  }

  release(): void {
    this.releaseGate()
  }
}

/**
 * A TestStore seeded with `graph` at revision 1 and a cache opened on it
 */
export async function openCache(
  graph: Graph = scenarioGraph(),
  options: HotGraphCacheOptions = { zones: SCENARIO_ZONES },
): Promise<{ store: TestStore, cache: HotGraphCache }> {
  const store = new TestStore()
  await store.open({ path: 'memory' })
  await store.import(graphToSerialized(graph))
  const cache = await HotGraphCache.open(store, options)
  return { store, cache }
}
