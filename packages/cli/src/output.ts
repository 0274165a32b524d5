import type { CacheStats, CommandResult } from '@hotgraph/cache'
import { toErrorInfo } from '@hotgraph/utils/errors'
import { createLogger } from '@hotgraph/utils/logger'

const log = createLogger('CLI')

/**
 * Render a successful command value as terminal text
 */
export function formatResult(result: CommandResult): string {
  if (!result.ok)
    return `${result.error.code}: ${result.error.message}`

  const { command, value } = result
  if (typeof value === 'number') {
    switch (command) {
      case 'focus':
        return value === 0 ? 'Focus cleared' : `Focused on ${value} node(s)`
      case 'dirty':
        return `${value} dirty node(s)`
      default:
        return `Synced at revision ${value}`
    }
  }
  if (Array.isArray(value)) {
    if (command === 'path')
      return value.join(' -> ')
    return value.length > 0 ? value.join('\n') : '(none)'
  }
  return formatStats(value)
}

export function formatStats(stats: CacheStats): string {
  const lines = [
    'Cache statistics:',
    `  Revision: ${stats.revision} (${stats.syncState})`,
    `  Graph: ${stats.nodeCount} nodes, ${stats.edgeCount} edges`,
    `  Focus: ${stats.focusSize} node(s), ${stats.focusRadius === null ? 'all reachable' : `radius ${stats.focusRadius}`}`,
    `  Path cache: ${stats.pathCacheSize} entries, ${stats.cacheHits} hits, ${stats.cacheMisses} misses (${(stats.hitRate * 100).toFixed(1)}% hit rate)`,
    `  Dirty: ${stats.dirtyCount} node(s), ${stats.pendingChanges} staged change(s)`,
    `  Accesses: ${stats.totalAccesses}`,
  ]
  if (stats.topAccessed.length > 0) {
    lines.push('  Most accessed:')
    for (const { id, count } of stats.topAccessed) {
      lines.push(`    ${id}: ${count}`)
    }
  }
  return lines.join('\n')
}

/**
 * Print a command result; failures go to the log and set a non-zero exit code
 */
export function printResult(result: CommandResult): void {
  if (result.ok) {
    console.log(formatResult(result))
  }
  else {
    log.error(formatResult(result))
    process.exitCode = 1
  }
}

/**
 * Run a command action, reporting any error instead of throwing
 */
export async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action()
  }
  catch (error) {
    const { code, message } = toErrorInfo(error)
    log.error(`${code}: ${message}`)
    process.exitCode = 1
  }
}
