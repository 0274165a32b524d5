import type { Command } from 'commander'
import { executeCommand } from '@hotgraph/cache'
import { printResult, runAction } from '../output'
import { withSession } from '../session'
import { parseCount } from './parse'

/**
 * Commands of the query surface: each restores the session, runs one
 * command and saves the session back
 */
export function registerQueryCommands(program: Command): void {
  const root = (): string => program.opts<{ root: string }>().root
  const run = (command: () => Record<string, unknown>): Promise<void> => runAction(() =>
    withSession(root(), async ({ cache }) => printResult(await executeCommand(cache, command()))))

  program
    .command('focus')
    .description('Replace the focus; no ids clears it')
    .argument('[ids...]', 'Node IDs')
    .option('-r, --radius <hops>', 'Keep only nodes within this many hops (default: all reachable)')
    .action(async (ids: string[], options: { radius?: string }) => {
      await run(() => ({ command: 'focus', ids, radius: parseCount(options.radius, '--radius') }))
    })

  program
    .command('neighbors')
    .description('List the neighbors of a node')
    .argument('<id>', 'Node ID')
    .action(async (id: string) => {
      await run(() => ({ command: 'neighbors', id }))
    })

  program
    .command('path')
    .description('Shortest path between two nodes')
    .argument('<start>', 'Start node ID')
    .argument('<end>', 'End node ID')
    .option('-m, --max-hops <hops>', 'Maximum number of edges (default from config)')
    .action(async (start: string, end: string, options: { maxHops?: string }) => {
      await run(() => ({ command: 'path', start, end, maxHops: parseCount(options.maxHops, '--max-hops') }))
    })

  program
    .command('zone')
    .description('List the members of a zone')
    .argument('<name>', 'Zone name')
    .action(async (name: string) => {
      await run(() => ({ command: 'zone', name }))
    })

  program
    .command('zones')
    .description('List the declared zones')
    .action(async () => {
      await run(() => ({ command: 'zones' }))
    })

  program
    .command('related')
    .description('List connected nodes of the other kind (hardware <-> software)')
    .argument('<id>', 'Node ID')
    .action(async (id: string) => {
      await run(() => ({ command: 'related', id }))
    })

  program
    .command('stats')
    .description('Show cache statistics')
    .option('-t, --top <n>', 'Number of most accessed nodes to list', '5')
    .option('--reset', 'Reset access counters and path cache counters')
    .action(async (options: { top: string, reset?: boolean }) => {
      await runAction(() => withSession(root(), async ({ cache }) => {
        if (options.reset) {
          cache.resetStats()
          console.log('Statistics reset')
          return
        }
        printResult(await executeCommand(cache, { command: 'stats', top: parseCount(options.top, '--top') }))
      }))
    })
}
