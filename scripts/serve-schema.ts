#!/usr/bin/env npx tsx
/**
 * Serve the schema API on Node.js.
 *
 * Usage:
 *   npx tsx scripts/serve-schema.ts
 *   npx tsx scripts/serve-schema.ts --port=8787
 */

import { serve } from '@hono/node-server'
import { LoadLogger } from '../integrity/logger'
import app from '../worker/schema-api'

function parsePort(argv: readonly string[]): number {
  const arg = argv.find(a => a.startsWith('--port='))
  const port = Number(arg ? arg.slice('--port='.length) : process.env.PORT ?? '8787')
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port: ${arg ?? process.env.PORT}`)
  }
  return port
}

const logger = new LoadLogger(false, 'SCHEMA')
const port = parsePort(process.argv.slice(2))

serve({ fetch: app.fetch, port }, info => {
  logger.info(`Listening on http://localhost:${info.port}`)
})
