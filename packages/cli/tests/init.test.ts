import { addGitignoreEntries } from '@hotgraph/cli/commands/init'
import { describe, expect, it } from 'vitest'

describe('addGitignoreEntries', () => {
  it('creates the section in an empty file', () => {
    expect(addGitignoreEntries('', ['.hotgraph/local/']))
      .toBe('# hotgraph session state\n.hotgraph/local/\n')
  })

  it('appends the section after existing entries', () => {
    expect(addGitignoreEntries('node_modules\ndist', ['.hotgraph/local/']))
      .toBe('node_modules\ndist\n\n# hotgraph session state\n.hotgraph/local/\n')
  })

  it('returns null when every pattern is listed', () => {
    expect(addGitignoreEntries('node_modules\n  .hotgraph/local/  \n', ['.hotgraph/local/'])).toBeNull()
  })

  it('adds missing patterns under the existing header', () => {
    const content = 'node_modules\n\n# hotgraph session state\n.hotgraph/local/\n\ncoverage\n'
    expect(addGitignoreEntries(content, ['.hotgraph/local/', '.hotgraph/tmp/']))
      .toBe('node_modules\n\n# hotgraph session state\n.hotgraph/tmp/\n.hotgraph/local/\n\ncoverage\n')
  })
})
