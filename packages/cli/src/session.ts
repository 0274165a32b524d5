import type { HotGraphConfig } from '@hotgraph/cache'
import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { CONFIG_DIR, HotGraphCache, loadConfig, resolveStorePath } from '@hotgraph/cache'
import { EdgeSchema, NodeSchema } from '@hotgraph/graph'
import { LocalGraphStore } from '@hotgraph/store/local'
import { createLogger, parseLogLevel, setLogLevel } from '@hotgraph/utils/logger'
import { z } from 'zod/v4'

const log = createLogger('session')

export const SESSION_FILE = path.join(CONFIG_DIR, 'local', 'session.json')

const StagedChangeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('update-node'), node: NodeSchema }),
  z.object({ type: z.literal('remove-node'), id: z.string() }),
  z.object({ type: z.literal('connect'), edge: EdgeSchema }),
  z.object({
    type: z.literal('disconnect'),
    source: z.string(),
    target: z.string(),
    kind: z.enum(['electrical', 'logical', 'data']),
  }),
])

/**
 * Working-set state carried between one-shot CLI invocations
 */
export const SessionStateSchema = z.object({
  revision: z.number().int().nonnegative(),
  focus: z.object({ ids: z.array(z.string()), radius: z.number().int().nonnegative().nullable() }),
  dirty: z.array(z.string()),
  staged: z.array(StagedChangeSchema),
  access: z.record(z.string(), z.number()),
})

export type SessionState = z.infer<typeof SessionStateSchema>

export interface Session {
  root: string
  config: HotGraphConfig
  store: LocalGraphStore
  cache: HotGraphCache
}

/**
 * Open the project's store and cache, then restore the saved session
 */
export async function openSession(root: string): Promise<Session> {
  const config = loadConfig(root)
  const level = config.logLevel ? parseLogLevel(config.logLevel) : undefined
  if (level !== undefined)
    setLogLevel(level)

  const store = new LocalGraphStore()
  await store.open({ path: resolveStorePath(config, root) })
  try {
    const cache = await HotGraphCache.open(store, {
      zones: config.zones,
      focusRadius: config.focusRadius,
      defaultMaxHops: config.defaultMaxHops,
    })
    const session = { root, config, store, cache }
    const state = await readSessionState(root)
    if (state)
      restoreSession(cache, state)
    return session
  }
  catch (error) {
    await store.close()
    throw error
  }
}

export async function saveSession(session: Session): Promise<void> {
  const { cache } = session
  const state: SessionState = {
    revision: cache.revision,
    focus: { ids: cache.focusedIds(), radius: cache.focusRadius },
    dirty: cache.dirtyIds(),
    staged: cache.pendingChanges(),
    access: cache.access.toJSON(),
  }
  const file = path.join(session.root, SESSION_FILE)
  await mkdir(path.dirname(file), { recursive: true })
  await writeFile(file, JSON.stringify(state, null, 2))
}

/**
 * Run `fn` against a restored session and save it afterwards
 */
export async function withSession<T>(root: string, fn: (session: Session) => Promise<T> | T): Promise<T> {
  const session = await openSession(root)
  try {
    const result = await fn(session)
    await saveSession(session)
    return result
  }
  finally {
    await session.store.close()
  }
}

export async function readSessionState(root: string): Promise<SessionState | null> {
  const file = path.join(root, SESSION_FILE)
  if (!existsSync(file))
    return null

  let raw: unknown
  try {
    raw = JSON.parse(await readFile(file, 'utf-8'))
  }
  catch (error) {
    log.warn(`Ignoring unreadable session file: ${error instanceof Error ? error.message : String(error)}`)
    return null
  }
  const result = SessionStateSchema.safeParse(raw)
  if (!result.success) {
    log.warn(`Ignoring invalid session file ${file}`)
    return null
  }
  return result.data
}

/**
 * Re-apply saved focus, staged changes, dirty marks and counters. Entries
 * that no longer apply to the current graph are skipped with a warning.
 */
export function restoreSession(cache: HotGraphCache, state: SessionState): void {
  if (state.revision !== cache.revision) {
    log.warn(`Graph moved from revision ${state.revision} to ${cache.revision} since the last session`)
  }

  cache.focus(state.focus.ids, { radius: state.focus.radius })
  cache.access.restore(state.access)

  for (const change of state.staged) {
    try {
      cache.stage(change)
    }
    catch (error) {
      log.warn(`Dropping staged ${change.type}: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  const known = state.dirty.filter(id => cache.current().index.hasNode(id))
  if (known.length < state.dirty.length) {
    log.warn(`Dropping ${state.dirty.length - known.length} dirty mark(s) for nodes no longer in the graph`)
  }
  if (known.length > 0)
    cache.markDirty(known)
}
