import { createStderrLogger } from '@hotgraph/utils/logger'
import { main } from './server'

const log = createStderrLogger('MCP')

main().catch((error) => {
  log.fatal('Fatal error:', error)
  process.exit(1)
})
