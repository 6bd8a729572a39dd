/**
 * PostgreSQL Store
 *
 * In-process PostgreSQL on PGlite (WASM), used as the physical target of a
 * validated TPC-H load. Pass `dataDir` to persist to disk; without it the
 * database lives in memory and disappears on close.
 *
 * The bulk load mirrors what a COPY-based loader does against a server:
 * drop foreign keys and secondary indexes, truncate children first, insert
 * parents first, then recreate indexes and foreign keys and ANALYZE.
 */

import { PGlite, type Results, type Transaction } from '@electric-sql/pglite'
import {
  tpchDataset,
  generateForeignKeyDDL,
  generateIndexDDL,
  generateSchemaDDL,
  type EntityName,
} from '../datasets'
import { tableFor, type Candidate } from '../integrity/catalog'
import { Decimal } from '../integrity/decimal'
import type { ReferentialGraph } from '../integrity/graph'
import { silentLogger, type LoadLogger } from '../integrity/logger'

// ============================================================================
// Types
// ============================================================================

export interface QueryResult<T = unknown> {
  rows: T[]
  rowCount: number
  fields: { name: string; dataTypeID: number }[]
}

export type SqlParam = string | null

export interface PostgresStore {
  // SQL query execution
  query<T = unknown>(sql: string, params?: SqlParam[]): Promise<QueryResult<T>>

  // Transaction support
  transaction<T>(fn: (tx: PostgresStore) => Promise<T>): Promise<T>

  // Lifecycle
  close(): Promise<void>
}

export interface PostgresStoreOptions {
  /**
   * Directory for a persistent database (default: in memory)
   */
  dataDir?: string
}

export interface PostgresLoadOptions {
  schema?: string
  // Rows per INSERT statement
  batchSize?: number
  logger?: LoadLogger
}

export interface TableLoadReport {
  entity: EntityName
  rowCount: number
  durationMs: number
}

export const DEFAULT_SCHEMA = 'tpch'

// Stays well under the 65535 bind parameters PostgreSQL allows per statement
const DEFAULT_BATCH_SIZE = 500

// ============================================================================
// Store
// ============================================================================

function wrapResults<T>(result: Results<T>): QueryResult<T> {
  return {
    rows: result.rows,
    rowCount: result.rows.length,
    fields: result.fields,
  }
}

function transactionStore(tx: Transaction): PostgresStore {
  return {
    async query<T = unknown>(sql: string, params?: SqlParam[]): Promise<QueryResult<T>> {
      return wrapResults(await tx.query<T>(sql, params))
    },
    transaction: () => {
      throw new Error('Nested transactions not supported')
    },
    close: async () => {},
  }
}

function createStoreFromInstance(db: PGlite): PostgresStore {
  return {
    async query<T = unknown>(sql: string, params?: SqlParam[]): Promise<QueryResult<T>> {
      return wrapResults(await db.query<T>(sql, params))
    },

    async transaction<T>(fn: (tx: PostgresStore) => Promise<T>): Promise<T> {
      return db.transaction(tx => fn(transactionStore(tx)))
    },

    async close(): Promise<void> {
      await db.close()
    },
  }
}

/**
 * Create a new Postgres store. Every call starts its own PGlite instance.
 */
export async function createPostgresStore(options: PostgresStoreOptions = {}): Promise<PostgresStore> {
  try {
    const db = await PGlite.create({ dataDir: options.dataDir })
    return createStoreFromInstance(db)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to create PGlite: ${message}`)
  }
}

// ============================================================================
// Schema
// ============================================================================

async function schemaExists(store: PostgresStore, schema: string): Promise<boolean> {
  const result = await store.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count FROM information_schema.tables WHERE table_schema = $1`,
    [schema]
  )
  return (result.rows[0]?.count ?? 0) >= tpchDataset.tables.length
}

/**
 * Create the schema, its eight tables (with keys) and the declared indexes.
 * A database that already holds the tables is left as it is.
 */
export async function applySchema(store: PostgresStore, schema: string = DEFAULT_SCHEMA): Promise<boolean> {
  if (await schemaExists(store, schema)) return false
  for (const statement of generateSchemaDDL(tpchDataset, 'postgres', { schema })) {
    await store.query(statement)
  }
  return true
}

async function dropConstraints(store: PostgresStore, schema: string): Promise<void> {
  // Constraint names are generated by the server, so look them up
  const fks = await store.query<{ conname: string; relname: string }>(
    `SELECT c.conname, r.relname
       FROM pg_constraint c
       JOIN pg_class r ON c.conrelid = r.oid
       JOIN pg_namespace n ON c.connamespace = n.oid
      WHERE n.nspname = $1 AND c.contype = 'f'`,
    [schema]
  )
  for (const { conname, relname } of fks.rows) {
    await store.query(`ALTER TABLE ${schema}.${relname} DROP CONSTRAINT IF EXISTS ${conname}`)
  }

  const indexes = await store.query<{ indexname: string }>(
    `SELECT indexname FROM pg_indexes WHERE schemaname = $1 AND indexname NOT LIKE '%_pkey'`,
    [schema]
  )
  for (const { indexname } of indexes.rows) {
    await store.query(`DROP INDEX IF EXISTS ${schema}.${indexname}`)
  }
}

async function recreateConstraints(store: PostgresStore, schema: string): Promise<void> {
  for (const table of tpchDataset.tables) {
    for (const statement of generateIndexDDL(table, 'postgres', { schema })) {
      await store.query(statement)
    }
  }
  for (const statement of generateForeignKeyDDL(tpchDataset, 'postgres', schema)) {
    await store.query(statement)
  }
}

// ============================================================================
// Load
// ============================================================================

/**
 * Text form of a record value. Every parameter goes over as text and the
 * server casts it to the column type, so decimals and BIGINT keys keep their
 * exact value.
 */
export function toSqlParam(value: unknown): SqlParam {
  if (value === null || value === undefined) return null
  if (value instanceof Decimal) return value.toString()
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'bigint') return value.toString()
  throw new Error(`Cannot bind value of type ${typeof value}`)
}

async function insertRows(
  store: PostgresStore,
  entity: EntityName,
  rows: readonly Candidate[],
  schema: string,
  batchSize: number
): Promise<void> {
  const columns = tableFor(entity).columns.map(col => col.name)
  const head = `INSERT INTO ${schema}.${entity} (${columns.join(', ')}) VALUES `

  for (let start = 0; start < rows.length; start += batchSize) {
    const batch = rows.slice(start, start + batchSize)
    const params: SqlParam[] = []
    const tuples = batch.map(row => {
      const placeholders = columns.map(name => {
        params.push(toSqlParam(row[name]))
        return `$${params.length}`
      })
      return `(${placeholders.join(', ')})`
    })
    await store.query(head + tuples.join(', '), params)
  }
}

/**
 * Copy every entity registered in `graph` into PostgreSQL. The graph has
 * already enforced keys and references, so the foreign keys recreated at the
 * end succeed. Runs in one transaction: a failure leaves the tables as they
 * were.
 */
export async function loadIntoPostgres(
  store: PostgresStore,
  graph: ReferentialGraph,
  options: PostgresLoadOptions = {}
): Promise<TableLoadReport[]> {
  const schema = options.schema ?? DEFAULT_SCHEMA
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
  const logger = options.logger ?? silentLogger
  const order = graph.loadOrder()
  const entities = order.filter(entity => graph.isRegistered(entity))

  return store.transaction(async tx => {
    logger.info('Dropping indexes and foreign keys...')
    await dropConstraints(tx, schema)

    for (const entity of [...order].reverse()) {
      await tx.query(`TRUNCATE ${schema}.${entity} CASCADE`)
    }

    const reports: TableLoadReport[] = []
    for (const entity of entities) {
      const started = Date.now()
      await insertRows(tx, entity, graph.rowsOf(entity), schema, batchSize)

      const counted = await tx.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM ${schema}.${entity}`)
      const rowCount = counted.rows[0]?.count ?? 0
      const durationMs = Date.now() - started
      logger.info(`  ${entity}: ${rowCount.toLocaleString()} rows (${durationMs}ms)`)
      reports.push({ entity, rowCount, durationMs })
    }

    logger.info('Recreating indexes and foreign keys...')
    await recreateConstraints(tx, schema)

    logger.debug('Running ANALYZE...')
    for (const entity of order) {
      await tx.query(`ANALYZE ${schema}.${entity}`)
    }

    return reports
  })
}
