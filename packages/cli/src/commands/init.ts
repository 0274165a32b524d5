import type { HotGraphConfig } from '@hotgraph/cache'
import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { CONFIG_DIR, CONFIG_FILE, DEFAULT_MAX_HOPS, DEFAULT_ZONES, parseConfig } from '@hotgraph/cache'
import { createLogger } from '@hotgraph/utils/logger'
import { runAction } from '../output'
import { importGraphFile } from './graph'

const log = createLogger('init')

const DEFAULT_CONFIG: HotGraphConfig = {
  store: { path: path.join(CONFIG_DIR, 'store') },
  defaultMaxHops: DEFAULT_MAX_HOPS,
  zones: DEFAULT_ZONES,
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize hotgraph in a project')
    .argument('[path]', 'Project path', '.')
    .option('--import <file>', 'Seed the store with a graph JSON file')
    .option('--no-zones', 'Write the config without the default zones')
    .action(async (projectPath: string, options: { import?: string, zones: boolean }) => {
      await runAction(async () => {
        const absPath = path.resolve(projectPath)

        // 1. Create .hotgraph/config.json
        const configDir = path.join(absPath, CONFIG_DIR)
        const configFile = path.join(configDir, CONFIG_FILE)
        if (existsSync(configFile)) {
          log.warn(`${CONFIG_DIR}/${CONFIG_FILE} already exists, skipping config creation`)
        }
        else {
          await mkdir(configDir, { recursive: true })
          const configToWrite = parseConfig({ ...DEFAULT_CONFIG, zones: options.zones ? DEFAULT_CONFIG.zones : {} })
          await writeFile(configFile, JSON.stringify(configToWrite, null, 2))
          log.success(`Created ${CONFIG_DIR}/${CONFIG_FILE}`)
        }

        // 2. Create .hotgraph/local/ for session state
        await mkdir(path.join(configDir, 'local'), { recursive: true })
        log.success(`Created ${CONFIG_DIR}/local/ directory`)

        // 3. Keep session state out of version control
        await ignoreLocalState(absPath, [`${CONFIG_DIR}/local/`])

        // 4. Seed the store if requested
        if (options.import) {
          const revision = await importGraphFile(absPath, path.resolve(options.import))
          log.success(`Imported ${options.import} at revision ${revision}`)
        }

        log.success('hotgraph initialized')
      })
    })
}

const GITIGNORE_HEADER = '# hotgraph session state'

/**
 * Add the missing `patterns` under the hotgraph header of a .gitignore,
 * creating the section at the end when absent. Returns null when nothing is
 * missing.
 */
export function addGitignoreEntries(content: string, patterns: readonly string[]): string | null {
  const listed = new Set(content.split('\n').map(line => line.trim()))
  const missing = patterns.filter(pattern => !listed.has(pattern))
  if (missing.length === 0)
    return null

  const lines = content.length > 0 ? content.replace(/\n$/, '').split('\n') : []
  const header = lines.findIndex(line => line.trim() === GITIGNORE_HEADER)
  if (header === -1) {
    if (lines.length > 0)
      lines.push('')
    lines.push(GITIGNORE_HEADER, ...missing)
  }
  else {
    lines.splice(header + 1, 0, ...missing)
  }
  return `${lines.join('\n')}\n`
}

async function ignoreLocalState(projectPath: string, patterns: readonly string[]): Promise<void> {
  const gitignorePath = path.join(projectPath, '.gitignore')
  const content = existsSync(gitignorePath) ? await readFile(gitignorePath, 'utf-8') : ''
  const updated = addGitignoreEntries(content, patterns)
  if (updated === null) {
    log.debug('.gitignore already lists the hotgraph local state')
    return
  }
  await writeFile(gitignorePath, updated)
  log.success(`Added ${patterns.join(', ')} to .gitignore`)
}
