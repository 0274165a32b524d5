export { AccessStats } from './access-stats'
export type { AccessCount } from './access-stats'

export { CommandSchema, executeCommand } from './commands'
export type { Command, CommandName, CommandResult, CommandValue } from './commands'

export {
  CONFIG_DIR,
  CONFIG_FILE,
  configPath,
  DEFAULT_MAX_HOPS,
  DEFAULT_ZONES,
  HotGraphConfigSchema,
  loadConfig,
  parseConfig,
  resolveStorePath,
  ZoneRuleSchema,
} from './config'
export type { HotGraphConfig } from './config'

export { buildDelta } from './delta'

export { DirtyTracker } from './dirty-tracker'
export type { DirtyBatch, StagedChange } from './dirty-tracker'

export { FocusSet } from './focus-set'
export type { FocusRadius } from './focus-set'

export { GraphIndex } from './graph-index'

export { HotGraphCache } from './hot-cache'
export type { CacheStats, EdgeInput, FocusOptions, HotGraphCacheOptions, NodePatch } from './hot-cache'

export { PathCache } from './path-cache'
export type { PathCacheEntry } from './path-cache'

export { assertHopBound, findPath } from './path-search'

export { buildSnapshot } from './snapshot'
export type { CacheSnapshot } from './snapshot'

export { SyncManager, SyncState } from './sync-manager'
export type { SnapshotHolder } from './sync-manager'

export { ZoneIndex } from './zone-index'
export type { ZoneMatch, ZoneRule, ZoneRules } from './zone-index'
