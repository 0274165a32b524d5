import { existsSync, readFileSync } from 'node:fs'
import { isAbsolute, join, resolve } from 'node:path'
import { formatIssues } from '@hotgraph/graph'
import { InvalidInputError } from '@hotgraph/utils/errors'
import { z } from 'zod/v4'

export const CONFIG_DIR = '.hotgraph'
export const CONFIG_FILE = 'config.json'
export const DEFAULT_MAX_HOPS = 5

export const ZoneRuleSchema = z.union([
  z.object({ members: z.array(z.string()) }).strict(),
  z.object({
    match: z.object({
      kind: z.enum(['hardware', 'software']).optional(),
      category: z.string().optional(),
      attrs: z.record(z.string(), z.unknown()).optional(),
    }),
  }).strict(),
])

export const HotGraphConfigSchema = z.object({
  store: z.object({
    /** Directory of graph.json, relative to the project root, or 'memory' */
    path: z.string().min(1).default(join(CONFIG_DIR, 'store')),
  }).default({ path: join(CONFIG_DIR, 'store') }),
  /** Hops kept around the focus; unset keeps everything reachable */
  focusRadius: z.number().int().nonnegative().optional(),
  defaultMaxHops: z.number().int().nonnegative().default(DEFAULT_MAX_HOPS),
  logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
  zones: z.record(z.string(), ZoneRuleSchema).default({}),
})

export type HotGraphConfig = z.infer<typeof HotGraphConfigSchema>

/**
 * Default zones for a mixed hardware/software design
 */
export const DEFAULT_ZONES: HotGraphConfig['zones'] = {
  power_analog: { match: { attrs: { rail: 'analog' } } },
  power_digital: { match: { attrs: { rail: 'digital' } } },
  thermal_hot: { match: { attrs: { thermal: 'hot' } } },
  i2c_bus1: { match: { attrs: { bus: 'i2c1' } } },
  i2c_bus2: { match: { attrs: { bus: 'i2c2' } } },
  signal_critical: { match: { attrs: { critical: true } } },
}

export function configPath(rootDir: string): string {
  return join(rootDir, CONFIG_DIR, CONFIG_FILE)
}

/**
 * Parse a configuration document, applying defaults
 */
export function parseConfig(input: unknown): HotGraphConfig {
  const result = HotGraphConfigSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidInputError(`config: ${formatIssues(result.error.issues)}`)
  }
  return result.data
}

/**
 * Load `.hotgraph/config.json` under `rootDir` (defaults when absent), then
 * apply HOTGRAPH_* environment overrides.
 */
export function loadConfig(rootDir: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): HotGraphConfig {
  const file = configPath(rootDir)
  let raw: unknown = {}
  if (existsSync(file)) {
    try {
      raw = JSON.parse(readFileSync(file, 'utf8'))
    }
    catch (err) {
      throw new InvalidInputError(`config: ${file}: ${err instanceof Error ? err.message : String(err)}`)
    }
  }
  return parseConfig(applyEnv(raw, env))
}

function applyEnv(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw))
    return raw

  const merged: Record<string, unknown> = { ...raw }
  if (env.HOTGRAPH_STORE_PATH)
    merged.store = { path: env.HOTGRAPH_STORE_PATH }
  if (env.HOTGRAPH_FOCUS_RADIUS)
    merged.focusRadius = Number(env.HOTGRAPH_FOCUS_RADIUS)
  if (env.HOTGRAPH_MAX_HOPS)
    merged.defaultMaxHops = Number(env.HOTGRAPH_MAX_HOPS)
  if (env.HOTGRAPH_LOG_LEVEL)
    merged.logLevel = env.HOTGRAPH_LOG_LEVEL.trim().toLowerCase()
  return merged
}

/**
 * Absolute store directory, or 'memory'
 */
export function resolveStorePath(config: HotGraphConfig, rootDir: string): string {
  const path = config.store.path
  if (path === 'memory' || isAbsolute(path))
    return path
  return resolve(rootDir, path)
}
