#!/usr/bin/env npx tsx
/**
 * TPC-H Loader
 *
 * Validates a directory of TPC-H CSV exports (`region.csv` ... `lineitem.csv`)
 * through the referential graph, then copies the accepted dataset into PGlite.
 *
 * Usage:
 *   npx tsx scripts/load-tpch.ts --data=./data/tpch-sf0.01
 *   npx tsx scripts/load-tpch.ts --data=./data/tpch-sf0.01 --validate-only
 *   npx tsx scripts/load-tpch.ts --data=./data/tpch-sf0.01 --strict --report
 *   npx tsx scripts/load-tpch.ts --data=./data/tpch-sf0.01 --pglite-dir=./pgdata
 *
 * Environment variables:
 *   TPCH_CHUNK_SIZE, TPCH_MAX_VIOLATIONS, TPCH_STRICT_DATES,
 *   TPCH_STRICT_TOTALPRICE, TPCH_TOTALPRICE_TOLERANCE, TPCH_SCALE_FACTOR,
 *   TPCH_VERBOSE, TPCH_PGLITE_DIR
 */

import { resolve } from 'node:path'
import { pathToFileURL } from 'node:url'
import { tpchDataset, getRowCounts, isEntityName } from '../datasets'
import { applySchema, createPostgresStore, loadIntoPostgres } from '../databases/postgres'
import { loadConfigFromEnv, resolveConfig, type LoadConfig } from '../integrity/config'
import { isIntegrityError, isRowViolation } from '../integrity/errors'
import { ReferentialGraph } from '../integrity/graph'
import { LoadLogger } from '../integrity/logger'
import { loadDataset, type LoadResult } from '../integrity/pipeline'
import { csvProducer } from './convert/csv'

// ============================================================================
// Arguments
// ============================================================================

export interface LoadArgs {
  data?: string
  validateOnly: boolean
  strict: boolean
  report: boolean
  verbose: boolean
  pgliteDir?: string
}

export function parseArgs(argv: readonly string[]): LoadArgs {
  const args: LoadArgs = { validateOnly: false, strict: false, report: false, verbose: false }

  for (const arg of argv) {
    if (arg.startsWith('--data=')) {
      args.data = arg.slice('--data='.length)
    } else if (arg.startsWith('--pglite-dir=')) {
      args.pgliteDir = arg.slice('--pglite-dir='.length)
    } else if (arg === '--validate-only') {
      args.validateOnly = true
    } else if (arg === '--strict') {
      args.strict = true
    } else if (arg === '--report') {
      args.report = true
    } else if (arg === '--verbose' || arg === '-v') {
      args.verbose = true
    } else {
      throw new Error(`Unknown argument: ${arg}`)
    }
  }

  return args
}

/**
 * Environment settings with command-line flags on top.
 */
export function configFromArgs(args: LoadArgs, env: Record<string, string | undefined> = process.env): LoadConfig {
  const base = loadConfigFromEnv(env)
  return resolveConfig(
    {
      verbose: args.verbose || base.verbose,
      pgliteDataDir: args.pgliteDir ?? base.pgliteDataDir,
      strict: args.strict ? { shipDateOrder: true, totalPrice: true } : base.strict,
    },
    base
  )
}

// ============================================================================
// Run
// ============================================================================

async function reportViolations(graph: ReferentialGraph, result: LoadResult, dir: string, logger: LoadLogger): Promise<void> {
  // Sequencing failures (out of order, duplicate) have no rows to report
  const error = result.stages.find(stage => stage.status === 'rejected')?.error
  if (!isRowViolation(error)) return
  const entity = error.entity
  if (!isEntityName(entity)) return

  // Report mode needs the failed entity's dependencies, which did load
  if (graph.dependenciesOf(entity).some(dep => !graph.isRegistered(dep))) return

  const rows = await csvProducer(dir)(entity)
  const violations = graph.validateBatch(entity, rows)
  logger.error(`${entity}: ${violations.length} violation(s) (limit ${graph.config.maxViolations})`)
  for (const violation of violations) {
    logger.info(`  ${violation.code} ${violation.message}`)
  }
}

export async function run(args: LoadArgs, config: LoadConfig, logger: LoadLogger): Promise<number> {
  if (!args.data) {
    logger.error('Missing --data=<dir>')
    return 2
  }

  const dir = resolve(args.data)
  const graph = new ReferentialGraph({ config, logger: logger.child('GRAPH') })

  const expected = getRowCounts(tpchDataset, config.scaleFactor)
  logger.info(`Loading TPC-H from ${dir} (SF=${config.scaleFactor})`)
  if (expected) {
    logger.debug(`Expected row counts: ${JSON.stringify(expected)}`)
  }

  const result = await loadDataset(graph, csvProducer(dir), { logger })
  if (!result.ok) {
    const error = result.error
    const code = isIntegrityError(error) ? `[${error.code}] ` : ''
    logger.error(`Load rejected: ${code}${error?.message ?? 'unknown error'}`)
    if (args.report) await reportViolations(graph, result, dir, logger)
    return 1
  }
  logger.info(`Validated ${graph.registeredEntities().length} entities in ${result.durationMs}ms`)

  if (args.validateOnly) return 0

  const store = await createPostgresStore({ dataDir: config.pgliteDataDir })
  try {
    await applySchema(store)
    const tables = await loadIntoPostgres(store, graph, { logger: logger.child('PG') })
    const total = tables.reduce((sum, table) => sum + table.rowCount, 0)
    logger.info(`Loaded ${total.toLocaleString()} rows into PGlite${config.pgliteDataDir ? ` at ${config.pgliteDataDir}` : ''}`)
  } finally {
    await store.close()
  }

  return 0
}

async function main(): Promise<void> {
  let args: LoadArgs
  let config: LoadConfig
  try {
    args = parseArgs(process.argv.slice(2))
    config = configFromArgs(args)
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error))
    process.exitCode = 2
    return
  }

  const logger = new LoadLogger(config.verbose)
  process.exitCode = await run(args, config, logger)
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
}
