import { defineConfig } from 'tsdown'

export default defineConfig([
  // CLI binary: dist/cli.mjs (bundles the @hotgraph/* workspace packages inline)
  {
    entry: { cli: './packages/cli/src/cli.ts' },
    format: 'esm',
    platform: 'node',
    dts: false,
    clean: true,
    outDir: 'dist',
    noExternal: [/^@hotgraph\//],
  },
  // MCP server binary: dist/mcp.mjs (stdout is reserved for JSON-RPC)
  {
    entry: { mcp: './packages/mcp/src/bin.ts' },
    format: 'esm',
    platform: 'node',
    dts: false,
    outDir: 'dist',
    noExternal: [/^@hotgraph\//],
    banner: { js: '#!/usr/bin/env node' },
  },
])
