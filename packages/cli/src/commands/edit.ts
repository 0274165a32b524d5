import type { Command } from 'commander'
import { executeCommand } from '@hotgraph/cache'
import { createLogger } from '@hotgraph/utils/logger'
import { printResult, runAction } from '../output'
import { withSession } from '../session'
import { parseAttrs, parseCount, parseEdgeKind, parseNodeKind } from './parse'

const log = createLogger('edit')

/**
 * Dirty marks, staged changes and sync
 */
export function registerEditCommands(program: Command): void {
  const root = (): string => program.opts<{ root: string }>().root

  program
    .command('dirty')
    .description('Mark nodes as modified')
    .argument('<ids...>', 'Node IDs')
    .action(async (ids: string[]) => {
      await runAction(() => withSession(root(), async ({ cache }) => {
        printResult(await executeCommand(cache, { command: 'dirty', ids }))
      }))
    })

  program
    .command('update')
    .description('Stage a change to a node')
    .argument('<id>', 'Node ID')
    .option('-k, --kind <kind>', 'New kind (hardware, software)')
    .option('-c, --category <category>', 'New category')
    .option('-a, --attr <key=value...>', 'Attributes to set (values parsed as JSON when possible)')
    .action(async (id: string, options: { kind?: string, category?: string, attr?: string[] }) => {
      await runAction(() => withSession(root(), ({ cache }) => {
        const node = cache.updateNode(id, {
          kind: options.kind === undefined ? undefined : parseNodeKind(options.kind),
          category: options.category,
          attrs: parseAttrs(options.attr),
        })
        log.success(`Staged update of ${node.id}; ${cache.dirtyCount()} dirty node(s)`)
      }))
    })

  program
    .command('remove')
    .description('Stage removal of a node and its edges')
    .argument('<id>', 'Node ID')
    .action(async (id: string) => {
      await runAction(() => withSession(root(), ({ cache }) => {
        const dirty = cache.removeNode(id)
        log.success(`Staged removal of ${id}; ${dirty} dirty node(s)`)
      }))
    })

  program
    .command('connect')
    .description('Stage a new edge (replaces an edge with the same source, target and kind)')
    .argument('<source>', 'Source node ID')
    .argument('<target>', 'Target node ID')
    .option('-k, --kind <kind>', 'Edge kind (electrical, logical, data)', 'electrical')
    .option('-w, --weight <weight>', 'Traversal cost')
    .option('-d, --directed', 'One-way edge')
    .action(async (source: string, target: string, options: { kind: string, weight?: string, directed?: boolean }) => {
      await runAction(() => withSession(root(), ({ cache }) => {
        const dirty = cache.connect({
          source,
          target,
          kind: parseEdgeKind(options.kind),
          weight: options.weight === undefined ? undefined : Number(options.weight),
          directed: options.directed,
        })
        log.success(`Staged edge ${source} -> ${target}; ${dirty} dirty node(s)`)
      }))
    })

  program
    .command('disconnect')
    .description('Stage removal of an edge')
    .argument('<source>', 'Source node ID')
    .argument('<target>', 'Target node ID')
    .option('-k, --kind <kind>', 'Edge kind (electrical, logical, data)', 'electrical')
    .action(async (source: string, target: string, options: { kind: string }) => {
      await runAction(() => withSession(root(), ({ cache }) => {
        const dirty = cache.disconnect(source, target, parseEdgeKind(options.kind))
        log.success(`Staged removal of edge ${source} -> ${target}; ${dirty} dirty node(s)`)
      }))
    })

  program
    .command('sync')
    .description('Write dirty nodes and staged changes to the store')
    .argument('[revision]', 'Fail unless the cache is at this revision')
    .action(async (revision: string | undefined) => {
      await runAction(() => withSession(root(), async ({ cache }) => {
        printResult(await executeCommand(cache, {
          command: 'sync',
          targetRevision: parseCount(revision, 'revision'),
        }))
      }))
    })
}
