import type { CommandResult, HotGraphCache } from '@hotgraph/cache'
import { executeCommand } from '@hotgraph/cache'
import { z } from 'zod'

/**
 * Input schema for hotgraph_focus tool
 */
export const FocusInputSchema = z.object({
  ids: z.array(z.string()).default([]).describe('Node IDs to focus on; empty clears the focus'),
  radius: z.number().int().nonnegative().optional().describe('Keep only nodes within this many hops; omit to keep everything reachable'),
})

export type FocusInput = z.infer<typeof FocusInputSchema>

/**
 * Input schema for hotgraph_neighbors and hotgraph_related tools
 */
export const NodeInputSchema = z.object({
  id: z.string().min(1).describe('Node ID'),
})

export type NodeInput = z.infer<typeof NodeInputSchema>

/**
 * Input schema for hotgraph_path tool
 */
export const PathInputSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
  maxHops: z.number().int().nonnegative().optional().describe('Maximum number of edges (default from config)'),
})

export type PathInput = z.infer<typeof PathInputSchema>

/**
 * Input schema for hotgraph_zone tool
 */
export const ZoneInputSchema = z.object({
  name: z.string().optional().describe('Zone name; omit to list the declared zones'),
})

export type ZoneInput = z.infer<typeof ZoneInputSchema>

/**
 * Input schema for hotgraph_dirty tool
 */
export const DirtyInputSchema = z.object({
  ids: z.array(z.string().min(1)).min(1).describe('Node IDs with pending modifications'),
})

export type DirtyInput = z.infer<typeof DirtyInputSchema>

/**
 * Input schema for hotgraph_sync tool
 */
export const SyncInputSchema = z.object({
  targetRevision: z.number().int().nonnegative().optional()
    .describe('Fail with CONFLICT unless the cache is at this revision'),
})

export type SyncInput = z.infer<typeof SyncInputSchema>

/**
 * Input schema for hotgraph_stats tool
 */
export const StatsInputSchema = z.object({
  top: z.number().int().positive().optional().describe('Number of most-accessed nodes to list (default 5)'),
})

export type StatsInput = z.infer<typeof StatsInputSchema>

/**
 * Tool definitions for MCP registration
 */
export const HOTGRAPH_TOOLS = {
  hotgraph_focus: {
    name: 'hotgraph_focus',
    description: 'Replace the working set. Neighbor and related queries are limited to nodes reachable from the focused nodes, or within `radius` hops when given.',
  },
  hotgraph_neighbors: {
    name: 'hotgraph_neighbors',
    description: 'List the nodes directly connected to a node, in edge insertion order.',
  },
  hotgraph_path: {
    name: 'hotgraph_path',
    description: 'Find the shortest path between two nodes using at most maxHops edges.',
  },
  hotgraph_zone: {
    name: 'hotgraph_zone',
    description: 'List the members of a named zone (power domain, bus, thermal region), or the zone names.',
  },
  hotgraph_related: {
    name: 'hotgraph_related',
    description: 'List connected nodes of the other kind: software touching a hardware node, or hardware used by a software node.',
  },
  hotgraph_dirty: {
    name: 'hotgraph_dirty',
    description: 'Mark nodes as modified so the next sync writes them back and cached paths through them are dropped.',
  },
  hotgraph_sync: {
    name: 'hotgraph_sync',
    description: 'Write dirty nodes to the store and rebuild the cache. Returns the new revision.',
  },
  hotgraph_stats: {
    name: 'hotgraph_stats',
    description: 'Cache statistics: revision, sync state, focus, path cache hits, dirty count and most accessed nodes.',
  },
} as const

export function executeFocus(cache: HotGraphCache, input: FocusInput): Promise<CommandResult> {
  return executeCommand(cache, { command: 'focus', ...input })
}

export function executeNeighbors(cache: HotGraphCache, input: NodeInput): Promise<CommandResult> {
  return executeCommand(cache, { command: 'neighbors', id: input.id })
}

export function executePath(cache: HotGraphCache, input: PathInput): Promise<CommandResult> {
  return executeCommand(cache, { command: 'path', ...input })
}

export function executeZone(cache: HotGraphCache, input: ZoneInput): Promise<CommandResult> {
  return input.name === undefined
    ? executeCommand(cache, { command: 'zones' })
    : executeCommand(cache, { command: 'zone', name: input.name })
}

export function executeRelated(cache: HotGraphCache, input: NodeInput): Promise<CommandResult> {
  return executeCommand(cache, { command: 'related', id: input.id })
}

export function executeDirty(cache: HotGraphCache, input: DirtyInput): Promise<CommandResult> {
  return executeCommand(cache, { command: 'dirty', ids: input.ids })
}

export function executeSync(cache: HotGraphCache, input: SyncInput): Promise<CommandResult> {
  return executeCommand(cache, { command: 'sync', ...input })
}

export function executeStats(cache: HotGraphCache, input: StatsInput): Promise<CommandResult> {
  return executeCommand(cache, { command: 'stats', ...input })
}
