import type { Command } from 'commander'
import { readFile, writeFile } from 'node:fs/promises'
import { GraphIndex, loadConfig, resolveStorePath } from '@hotgraph/cache'
import { graphToSerialized, parseGraph, serializedToGraph } from '@hotgraph/graph'
import { LocalGraphStore } from '@hotgraph/store/local'
import { MalformedGraphError } from '@hotgraph/utils/errors'
import { createLogger } from '@hotgraph/utils/logger'
import { runAction } from '../output'

const log = createLogger('graph')

/**
 * Replace the store's graph with the contents of a JSON file; returns the new revision
 */
export async function importGraphFile(root: string, file: string): Promise<number> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(file, 'utf-8'))
  }
  catch (error) {
    if (error instanceof SyntaxError)
      throw new MalformedGraphError(`${file} is not valid JSON: ${error.message}`)
    throw error
  }
  const graph = parseGraph(raw)
  // Reject dangling edges and duplicate ids before anything is written
  GraphIndex.build(graph, 0)

  const store = await openStore(root)
  try {
    return await store.import(graphToSerialized(graph))
  }
  finally {
    await store.close()
  }
}

export async function exportGraph(root: string): Promise<string> {
  const store = await openStore(root)
  try {
    const { graph } = await store.load()
    return JSON.stringify(serializedToGraph(graph), null, 2)
  }
  finally {
    await store.close()
  }
}

async function openStore(root: string): Promise<LocalGraphStore> {
  const store = new LocalGraphStore()
  await store.open({ path: resolveStorePath(loadConfig(root), root) })
  return store
}

export function registerGraphCommands(program: Command): void {
  const root = (): string => program.opts<{ root: string }>().root

  program
    .command('import')
    .description('Replace the stored graph with a graph JSON file ({ nodes, edges })')
    .argument('<file>', 'Graph JSON file')
    .action(async (file: string) => {
      await runAction(async () => {
        const revision = await importGraphFile(root(), file)
        log.success(`Imported ${file} at revision ${revision}`)
      })
    })

  program
    .command('export')
    .description('Write the stored graph as JSON')
    .argument('[file]', 'Output file (default: stdout)')
    .action(async (file: string | undefined) => {
      await runAction(async () => {
        const json = await exportGraph(root())
        if (file) {
          await writeFile(file, json)
          log.success(`Exported graph to ${file}`)
        }
        else {
          console.log(json)
        }
      })
    })
}
