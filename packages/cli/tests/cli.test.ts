import type { MockInstance } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { createProgram } from '@hotgraph/cli/program'
import { readSessionState } from '@hotgraph/cli/session'
import { LogLevels, setLogLevel } from '@hotgraph/utils/logger'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const GRAPH = {
  nodes: [
    { id: 'dac1', kind: 'hardware', category: 'ic', attrs: { rail: 'analog' } },
    { id: 'amp1', kind: 'hardware', category: 'ic', attrs: { rail: 'analog' } },
    { id: 'teensy', kind: 'hardware', category: 'module', attrs: {} },
    { id: 'usb', kind: 'hardware', category: 'connector', attrs: {} },
    { id: 'audio_driver', kind: 'software', category: 'driver', attrs: {} },
  ],
  edges: [
    { source: 'dac1', target: 'amp1', kind: 'electrical' },
    { source: 'teensy', target: 'dac1', kind: 'data' },
    { source: 'usb', target: 'teensy', kind: 'data' },
    { source: 'audio_driver', target: 'dac1', kind: 'logical' },
  ],
}

describe('hotgraph CLI', () => {
  let root: string
  let out: MockInstance<typeof console.log>

  async function hotgraph(...args: string[]): Promise<void> {
    await createProgram().parseAsync(['node', 'hotgraph', '--root', root, ...args])
  }

  function lastLine(): unknown {
    return out.mock.calls.at(-1)?.[0]
  }

  beforeEach(async () => {
    setLogLevel(LogLevels.silent)
    root = mkdtempSync(path.join(tmpdir(), 'hotgraph-cli-'))
    const graphFile = path.join(root, 'graph.json')
    writeFileSync(graphFile, JSON.stringify(GRAPH))
    out = vi.spyOn(console, 'log').mockImplementation(() => {})
    await hotgraph('init', root, '--import', graphFile)
  })

  afterEach(() => {
    out.mockRestore()
    process.exitCode = undefined
    setLogLevel(LogLevels.info)
    rmSync(root, { recursive: true, force: true })
  })

  // ==================== init ====================

  it('init writes the config, the local directory and the gitignore entry', () => {
    const config = JSON.parse(readFileSync(path.join(root, '.hotgraph', 'config.json'), 'utf-8'))
    expect(config.focusRadius).toBeUndefined()
    expect(config.defaultMaxHops).toBe(5)
    expect(config.zones.power_analog).toEqual({ match: { attrs: { rail: 'analog' } } })
    expect(existsSync(path.join(root, '.hotgraph', 'local'))).toBe(true)
    expect(readFileSync(path.join(root, '.gitignore'), 'utf-8')).toBe('# hotgraph session state\n.hotgraph/local/\n')
    expect(existsSync(path.join(root, '.hotgraph', 'store', 'graph.json'))).toBe(true)
  })

  it('init keeps an existing config', async () => {
    const configFile = path.join(root, '.hotgraph', 'config.json')
    writeFileSync(configFile, '{"focusRadius":1}')
    await hotgraph('init', root)
    expect(readFileSync(configFile, 'utf-8')).toBe('{"focusRadius":1}')
  })

  // ==================== Queries ====================

  it('prints the shortest path', async () => {
    await hotgraph('path', 'usb', 'amp1')
    expect(lastLine()).toBe('usb -> teensy -> dac1 -> amp1')
  })

  it('lists zones, neighbors and related nodes', async () => {
    await hotgraph('zones')
    expect(lastLine()).toBe('power_analog\npower_digital\nthermal_hot\ni2c_bus1\ni2c_bus2\nsignal_critical')
    await hotgraph('zone', 'power_analog')
    expect(lastLine()).toBe('dac1\namp1')
    await hotgraph('neighbors', 'dac1')
    expect(lastLine()).toBe('amp1\nteensy\naudio_driver')
    await hotgraph('related', 'dac1')
    expect(lastLine()).toBe('audio_driver')
    await hotgraph('zone', 'thermal_hot')
    expect(lastLine()).toBe('(none)')
  })

  it('keeps the focus between invocations', async () => {
    await hotgraph('focus', 'usb', '--radius', '1')
    expect(lastLine()).toBe('Focused on 1 node(s)')
    await hotgraph('neighbors', 'teensy')
    expect(lastLine()).toBe('usb')
    await hotgraph('focus')
    expect(lastLine()).toBe('Focus cleared')
  })

  it('reports unknown nodes with a non-zero exit code', async () => {
    await hotgraph('neighbors', 'nonexistent')
    expect(process.exitCode).toBe(1)
    expect(out).not.toHaveBeenCalled()
  })

  it('rejects a malformed hop bound', async () => {
    await hotgraph('path', 'usb', 'amp1', '--max-hops', 'lots')
    expect(process.exitCode).toBe(1)
  })

  // ==================== Edits and sync ====================

  it('keeps dirty marks in the session until sync', async () => {
    await hotgraph('dirty', 'amp1')
    expect(lastLine()).toBe('1 dirty node(s)')
    expect((await readSessionState(root))?.dirty).toEqual(['amp1'])

    await hotgraph('sync', '1')
    expect(lastLine()).toBe('Synced at revision 2')
    expect((await readSessionState(root))?.dirty).toEqual([])
  })

  it('recomputes zones after a removal is synced', async () => {
    await hotgraph('remove', 'dac1')
    await hotgraph('sync')
    expect(lastLine()).toBe('Synced at revision 2')
    await hotgraph('zone', 'power_analog')
    expect(lastLine()).toBe('amp1')
  })

  it('carries staged updates across invocations', async () => {
    await hotgraph('update', 'amp1', '--attr', 'gain=2', 'label=main')
    await hotgraph('stats')
    expect(lastLine()).toContain('  Dirty: 1 node(s), 1 staged change(s)')

    await hotgraph('sync')
    const file = path.join(root, 'export.json')
    await hotgraph('export', file)
    const exported = JSON.parse(readFileSync(file, 'utf-8'))
    expect(exported.nodes[1]).toEqual({
      id: 'amp1',
      kind: 'hardware',
      category: 'ic',
      attrs: { rail: 'analog', gain: 2, label: 'main' },
    })
  })

  it('connects nodes', async () => {
    await hotgraph('connect', 'usb', 'amp1', '--kind', 'data')
    await hotgraph('sync')
    await hotgraph('path', 'usb', 'amp1')
    expect(lastLine()).toBe('usb -> amp1')
  })

  it('rejects unknown edge kinds', async () => {
    await hotgraph('connect', 'usb', 'amp1', '--kind', 'optical')
    expect(process.exitCode).toBe(1)
    expect((await readSessionState(root))).toBeNull()
  })

  it('exports the stored graph unchanged', async () => {
    await hotgraph('export')
    expect(JSON.parse(String(lastLine()))).toEqual(GRAPH)
  })
})
