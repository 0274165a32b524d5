import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { CONFIG_DIR, loadConfig, parseConfig, resolveStorePath } from '@hotgraph/cache/config'
import { InvalidInputError } from '@hotgraph/utils/errors'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

describe('config', () => {
  let root: string

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'hotgraph-config-'))
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  function writeConfig(content: string): void {
    mkdirSync(join(root, CONFIG_DIR), { recursive: true })
    writeFileSync(join(root, CONFIG_DIR, 'config.json'), content)
  }

  it('applies defaults when no file exists', () => {
    expect(loadConfig(root, {})).toEqual({
      store: { path: join('.hotgraph', 'store') },
      defaultMaxHops: 5,
      zones: {},
    })
  })

  it('reads the config file', () => {
    writeConfig(JSON.stringify({
      focusRadius: 1,
      zones: { power_analog: { members: ['dac1', 'amp1'] }, hot: { match: { attrs: { thermal: 'hot' } } } },
    }))
    const config = loadConfig(root, {})
    expect(config.focusRadius).toBe(1)
    expect(config.zones.power_analog).toEqual({ members: ['dac1', 'amp1'] })
    expect(config.zones.hot).toEqual({ match: { attrs: { thermal: 'hot' } } })
  })

  it('lets environment variables override the file', () => {
    writeConfig(JSON.stringify({ defaultMaxHops: 3 }))
    const config = loadConfig(root, {
      HOTGRAPH_STORE_PATH: 'memory',
      HOTGRAPH_FOCUS_RADIUS: '0',
      HOTGRAPH_MAX_HOPS: '8',
      HOTGRAPH_LOG_LEVEL: ' DEBUG ',
    })
    expect(config).toMatchObject({ store: { path: 'memory' }, focusRadius: 0, defaultMaxHops: 8, logLevel: 'debug' })
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig(root, { HOTGRAPH_MAX_HOPS: 'many' })).toThrow(InvalidInputError)
    expect(() => parseConfig({ zones: { bad: { members: 'dac1' } } })).toThrow(InvalidInputError)
    writeConfig('{ not json')
    expect(() => loadConfig(root, {})).toThrow(/^Invalid input: config: /)
  })

  it('resolves the store path against the root', () => {
    expect(resolveStorePath(parseConfig({}), '/work')).toBe(join('/work', '.hotgraph', 'store'))
    expect(resolveStorePath(parseConfig({ store: { path: 'memory' } }), '/work')).toBe('memory')
    expect(resolveStorePath(parseConfig({ store: { path: '/data/graph' } }), '/work')).toBe('/data/graph')
  })
})
