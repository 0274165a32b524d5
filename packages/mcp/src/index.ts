// MCP Server
export { createMcpServer, main, toResponse } from './server'

// MCP Tools
export {
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

export type { DirtyInput, FocusInput, NodeInput, PathInput, StatsInput, SyncInput, ZoneInput } from './tools'
