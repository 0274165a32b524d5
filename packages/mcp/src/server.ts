import type { CommandResult } from '@hotgraph/cache'
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { HotGraphCache, loadConfig, resolveStorePath } from '@hotgraph/cache'
import { LocalGraphStore } from '@hotgraph/store/local'
import { createStderrLogger, parseLogLevel, setLogLevel, useStderr } from '@hotgraph/utils/logger'
import {
  DirtyInputSchema,
  executeDirty,
  executeFocus,
  executeNeighbors,
  executePath,
  executeRelated,
  executeStats,
  executeSync,
  executeZone,
  FocusInputSchema,
  HOTGRAPH_TOOLS,
  NodeInputSchema,
  PathInputSchema,
  StatsInputSchema,
  SyncInputSchema,
  ZoneInputSchema,
} from './tools'

const log = createStderrLogger('MCP')

type ToolResponse = {
  content: Array<{ type: 'text', text: string }>
  isError?: true
}

/**
 * Create and configure the MCP server over an open cache
 */
export function createMcpServer(cache: HotGraphCache): McpServer {
  const server = new McpServer({
    name: 'hotgraph-mcp-server',
    version: '0.1.0',
  })

  server.tool(
    HOTGRAPH_TOOLS.hotgraph_focus.name,
    HOTGRAPH_TOOLS.hotgraph_focus.description,
    FocusInputSchema.shape,
    async args => toResponse(await executeFocus(cache, FocusInputSchema.parse(args))),
  )

  server.tool(
    HOTGRAPH_TOOLS.hotgraph_neighbors.name,
    HOTGRAPH_TOOLS.hotgraph_neighbors.description,
    NodeInputSchema.shape,
    async args => toResponse(await executeNeighbors(cache, NodeInputSchema.parse(args))),
  )

  server.tool(
    HOTGRAPH_TOOLS.hotgraph_path.name,
    HOTGRAPH_TOOLS.hotgraph_path.description,
    PathInputSchema.shape,
    async args => toResponse(await executePath(cache, PathInputSchema.parse(args))),
  )

  server.tool(
    HOTGRAPH_TOOLS.hotgraph_zone.name,
    HOTGRAPH_TOOLS.hotgraph_zone.description,
    ZoneInputSchema.shape,
    async args => toResponse(await executeZone(cache, ZoneInputSchema.parse(args))),
  )

  server.tool(
    HOTGRAPH_TOOLS.hotgraph_related.name,
    HOTGRAPH_TOOLS.hotgraph_related.description,
    NodeInputSchema.shape,
    async args => toResponse(await executeRelated(cache, NodeInputSchema.parse(args))),
  )

  server.tool(
    HOTGRAPH_TOOLS.hotgraph_dirty.name,
    HOTGRAPH_TOOLS.hotgraph_dirty.description,
    DirtyInputSchema.shape,
    async args => toResponse(await executeDirty(cache, DirtyInputSchema.parse(args))),
  )

  server.tool(
    HOTGRAPH_TOOLS.hotgraph_sync.name,
    HOTGRAPH_TOOLS.hotgraph_sync.description,
    SyncInputSchema.shape,
    async args => toResponse(await executeSync(cache, SyncInputSchema.parse(args))),
  )

  server.tool(
    HOTGRAPH_TOOLS.hotgraph_stats.name,
    HOTGRAPH_TOOLS.hotgraph_stats.description,
    StatsInputSchema.shape,
    async args => toResponse(await executeStats(cache, StatsInputSchema.parse(args))),
  )

  return server
}

/**
 * Format a command result as an MCP tool response
 */
export function toResponse(result: CommandResult): ToolResponse {
  if (result.ok) {
    return { content: [{ type: 'text', text: JSON.stringify(result.value, null, 2) }] }
  }
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: result.error.code, message: result.error.message }) }],
    isError: true,
  }
}

/**
 * Main entry point for the MCP server.
 *
 * Usage: hotgraph-mcp [--root-path <dir>]
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  useStderr()

  const rootPathIdx = argv.indexOf('--root-path')
  const rootPath = rootPathIdx !== -1 ? argv[rootPathIdx + 1] ?? process.cwd() : process.cwd()

  const config = loadConfig(rootPath)
  const level = config.logLevel ? parseLogLevel(config.logLevel) : undefined
  if (level !== undefined)
    setLogLevel(level)

  const store = new LocalGraphStore()
  await store.open({ path: resolveStorePath(config, rootPath) })
  const cache = await HotGraphCache.open(store, {
    zones: config.zones,
    focusRadius: config.focusRadius,
    defaultMaxHops: config.defaultMaxHops,
  })
  log.info(`Graph loaded at revision ${cache.revision} (${cache.stats().nodeCount} nodes)`)

  const server = createMcpServer(cache)
  const transport = new StdioServerTransport()
  transport.onclose = () => {
    store.close().catch(error => log.error('Failed to close store:', error))
  }

  await server.connect(transport)
  log.ready('hotgraph MCP server started')
}
