import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

// .withTag() copies the options, so children are tracked to follow setLogLevel
const children: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  children.push(child)
  return child
}

// Stderr-only logger for the MCP server (stdout reserved for JSON-RPC).
const stderrRoots: ConsolaInstance[] = []

export function createStderrLogger(tag: string): ConsolaInstance {
  const root = createConsola({
    level: logger.level,
    stdout: process.stderr,
    stderr: process.stderr,
  }).withTag(tag)
  stderrRoots.push(root)
  return root
}

// Route createLogger output to stderr as well, for processes whose stdout carries a protocol
export function useStderr(): void {
  for (const instance of [logger, ...children]) {
    instance.options.stdout = process.stderr
  }
}

// Set global log level (affects all loggers: createLogger children + createStderrLogger instances)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of children) {
    child.level = level
  }
  for (const root of stderrRoots) {
    root.level = level
  }
}

export type LogLevelName = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

const LEVEL_BY_NAME: Record<LogLevelName, number> = {
  silent: LogLevels.silent,
  error: LogLevels.error,
  warn: LogLevels.warn,
  info: LogLevels.info,
  debug: LogLevels.debug,
  trace: LogLevels.trace,
}

/**
 * Resolve a level name (as found in config files and env vars) to a consola level.
 * Returns undefined for unknown names.
 */
export function parseLogLevel(name: string): number | undefined {
  const key = name.trim().toLowerCase()
  return key in LEVEL_BY_NAME ? LEVEL_BY_NAME[key as LogLevelName] : undefined
}

export { LogLevels } from 'consola'
