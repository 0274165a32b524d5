import { PathCache } from '@hotgraph/cache/path-cache'
import { beforeEach, describe, expect, it } from 'vitest'

describe('PathCache', () => {
  let cache: PathCache

  beforeEach(() => {
    cache = new PathCache()
    cache.set('usb', 'amp1', 5, ['usb', 'teensy', 'dac1', 'amp1'], 1)
    cache.set('usb', 'teensy', 5, ['usb', 'teensy'], 1)
  })

  it('returns fresh entries and counts hits and misses', () => {
    expect(cache.get('usb', 'amp1', 5, 1)).toEqual(['usb', 'teensy', 'dac1', 'amp1'])
    expect(cache.get('usb', 'amp1', 4, 1)).toBeUndefined()
    expect(cache.hits).toBe(1)
    expect(cache.misses).toBe(1)
  })

  it('evicts an entry from another revision instead of returning it', () => {
    expect(cache.get('usb', 'amp1', 5, 2)).toBeUndefined()
    expect(cache.has('usb', 'amp1', 5)).toBe(false)
    expect(cache.size).toBe(1)
  })

  it('evicts only the entries whose path visits a node', () => {
    expect(cache.invalidateNode('dac1')).toBe(1)
    expect(cache.has('usb', 'amp1', 5)).toBe(false)
    expect(cache.has('usb', 'teensy', 5)).toBe(true)

    expect(cache.invalidateNode('teensy')).toBe(1)
    expect(cache.size).toBe(0)
    expect(cache.invalidateNode('teensy')).toBe(0)
  })

  it('replaces the entry for an existing key', () => {
    cache.set('usb', 'amp1', 5, ['usb', 'amp1'], 2)
    expect(cache.size).toBe(2)
    // the old path through dac1 no longer belongs to the key
    expect(cache.invalidateNode('dac1')).toBe(0)
    expect(cache.get('usb', 'amp1', 5, 2)).toEqual(['usb', 'amp1'])
  })

  it('keeps only entries of the given revision', () => {
    cache.set('amp1', 'dac1', 5, ['amp1', 'dac1'], 2)
    expect(cache.retainRevision(2)).toBe(2)
    expect(cache.size).toBe(1)
    expect(cache.has('amp1', 'dac1', 5)).toBe(true)
  })

  it('resets counters without dropping entries', () => {
    cache.get('usb', 'amp1', 5, 1)
    cache.resetCounters()
    expect(cache.hits).toBe(0)
    expect(cache.size).toBe(2)
  })
})
