import type { ErrorInfo } from '@hotgraph/utils/errors'
import type { CacheStats, HotGraphCache } from './hot-cache'
import { formatIssues } from '@hotgraph/graph'
import { InvalidInputError, toErrorInfo } from '@hotgraph/utils/errors'
import { z } from 'zod/v4'

const NodeId = z.string().min(1)
const HopBound = z.number().int().nonnegative()

export const CommandSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('focus'), ids: z.array(z.string()).default([]), radius: HopBound.optional() }),
  z.object({ command: z.literal('neighbors'), id: NodeId }),
  z.object({ command: z.literal('path'), start: NodeId, end: NodeId, maxHops: HopBound.optional() }),
  z.object({ command: z.literal('zone'), name: z.string().min(1) }),
  z.object({ command: z.literal('zones') }),
  z.object({ command: z.literal('related'), id: NodeId }),
  z.object({ command: z.literal('dirty'), ids: z.array(NodeId).min(1) }),
  z.object({ command: z.literal('sync'), targetRevision: HopBound.optional() }),
  z.object({ command: z.literal('stats'), top: z.number().int().positive().optional() }),
])

export type Command = z.infer<typeof CommandSchema>
export type CommandName = Command['command']

export type CommandValue = number | string[] | CacheStats

/**
 * Explicit result of one command; errors never escape as exceptions
 */
export type CommandResult
  = | { ok: true, command: CommandName, value: CommandValue }
    | { ok: false, command?: CommandName, error: ErrorInfo }

/**
 * Validate and run one command against the cache
 */
export async function executeCommand(cache: HotGraphCache, input: unknown): Promise<CommandResult> {
  const parsed = CommandSchema.safeParse(input)
  if (!parsed.success) {
    return { ok: false, error: toErrorInfo(new InvalidInputError(formatIssues(parsed.error.issues))) }
  }
  const command = parsed.data
  try {
    return { ok: true, command: command.command, value: await run(cache, command) }
  }
  catch (err) {
    return { ok: false, command: command.command, error: toErrorInfo(err) }
  }
}

async function run(cache: HotGraphCache, command: Command): Promise<CommandValue> {
  switch (command.command) {
    case 'focus':
      return cache.focus(command.ids, { radius: command.radius })
    case 'neighbors':
      return cache.neighbors(command.id)
    case 'path':
      return cache.path(command.start, command.end, command.maxHops)
    case 'zone':
      return cache.zoneMembers(command.name)
    case 'zones':
      return cache.zoneNames()
    case 'related':
      return cache.related(command.id)
    case 'dirty':
      return cache.markDirty(command.ids)
    case 'sync':
      return cache.sync(command.targetRevision)
    case 'stats':
      return cache.stats(command.top)
  }
}
