import type { HotGraphCache } from '@hotgraph/cache'
import type { Command } from 'commander'
import type { Readable } from 'node:stream'
import { createInterface } from 'node:readline'
import { executeCommand } from '@hotgraph/cache'
import { InvalidInputError, toErrorInfo } from '@hotgraph/utils/errors'
import { formatResult, runAction } from '../output'
import { withSession } from '../session'

export const SHELL_HELP = [
  'Commands:',
  '  focus [ids...] [--radius n]   replace the focus (no ids clears it)',
  '  neighbors <id>                neighbors of a node',
  '  path <start> <end> [maxHops]  shortest path',
  '  zone <name>                   zone members',
  '  zones                         declared zones',
  '  related <id>                  connected nodes of the other kind',
  '  dirty <ids...>                mark nodes as modified',
  '  sync [revision]               write dirty nodes to the store',
  '  stats [top]                   cache statistics',
  '  help                          this text',
  '  quit                          leave the shell',
].join('\n')

/**
 * Turn one shell line into a command object for executeCommand
 */
export function parseShellLine(line: string): Record<string, unknown> {
  const [name, ...args] = line.trim().split(/\s+/)
  switch (name) {
    case 'focus': {
      const flag = args.findIndex(arg => arg === '--radius' || arg === '-r')
      if (flag === -1)
        return { command: 'focus', ids: args }
      const ids = args.filter((_, i) => i !== flag && i !== flag + 1)
      return { command: 'focus', ids, radius: toNumber(args[flag + 1], 'radius') }
    }
    case 'neighbors':
    case 'related':
      return { command: name, id: args[0] }
    case 'path':
      return {
        command: 'path',
        start: args[0],
        end: args[1],
        ...(args[2] === undefined ? {} : { maxHops: toNumber(args[2], 'maxHops') }),
      }
    case 'zone':
      return { command: 'zone', name: args[0] }
    case 'zones':
      return { command: 'zones' }
    case 'dirty':
      return { command: 'dirty', ids: args }
    case 'sync':
      return args[0] === undefined ? { command: 'sync' } : { command: 'sync', targetRevision: toNumber(args[0], 'revision') }
    case 'stats':
      return args[0] === undefined ? { command: 'stats' } : { command: 'stats', top: toNumber(args[0], 'top') }
    default:
      throw new InvalidInputError(`unknown command "${name ?? ''}" (type "help")`)
  }
}

function toNumber(value: string | undefined, name: string): number {
  const parsed = Number(value)
  if (value === undefined || value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidInputError(`${name} must be a number, got "${value ?? ''}"`)
  }
  return parsed
}

/**
 * Read commands line by line until `quit` or end of input
 */
export async function runShell(
  cache: HotGraphCache,
  input: Readable,
  write: (text: string) => void,
): Promise<void> {
  const lines = createInterface({ input, terminal: false })
  try {
    for await (const raw of lines) {
      const line = raw.trim()
      if (line === '' || line.startsWith('#'))
        continue
      if (line === 'quit' || line === 'exit')
        break
      if (line === 'help') {
        write(SHELL_HELP)
        continue
      }

      let command: Record<string, unknown>
      try {
        command = parseShellLine(line)
      }
      catch (error) {
        const { code, message } = toErrorInfo(error)
        write(`${code}: ${message}`)
        continue
      }
      write(formatResult(await executeCommand(cache, command)))
    }
  }
  finally {
    lines.close()
  }
}

export function registerShellCommand(program: Command): void {
  program
    .command('shell')
    .description('Interactive shell over the query commands (session saved on exit)')
    .action(async () => {
      const root = program.opts<{ root: string }>().root
      await runAction(() => withSession(root, async ({ cache }) => {
        console.log(`hotgraph shell at revision ${cache.revision}; type "help" for commands`)
        await runShell(cache, process.stdin, text => console.log(text))
      }))
    })
}
