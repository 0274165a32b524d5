import { LogLevels, setLogLevel } from '@hotgraph/utils/logger'
import { Command } from 'commander'
import pkg from '../package.json'
import { registerEditCommands } from './commands/edit'
import { registerGraphCommands } from './commands/graph'
import { registerInitCommand } from './commands/init'
import { registerQueryCommands } from './commands/query'
import { registerShellCommand } from './commands/shell'

/**
 * Build the hotgraph command tree
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('hotgraph')
    .description('Hot graph cache for hardware/software component relationships')
    .version(pkg.version)
    .option('-C, --root <dir>', 'Project root containing .hotgraph/', process.cwd())
    .option('--verbose', 'Show debug logging')
    .hook('preAction', (command) => {
      if (command.opts<{ verbose?: boolean }>().verbose)
        setLogLevel(LogLevels.debug)
    })

  registerInitCommand(program)
  registerGraphCommands(program)
  registerQueryCommands(program)
  registerEditCommands(program)
  registerShellCommand(program)

  return program
}
