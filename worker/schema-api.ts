/**
 * Schema API
 *
 * HTTP surface over the TPC-H catalog: table definitions, load order, DDL per
 * dialect, declared indexes, and attribute validation of a single record.
 * Nothing here holds loaded data.
 *
 * Endpoints:
 *   GET  /health
 *   GET  /schema
 *   GET  /schema/ddl?dialect=postgres|mysql|sqlite&schema=tpch
 *   GET  /schema/indexes/:entity
 *   POST /validate/:entity
 */

import { Hono } from 'hono'
import {
  tpchDataset,
  generateForeignKeyDDL,
  generateSchemaDDL,
  isEntityName,
  type SqlDialect,
} from '../datasets'
import { indexSpec } from '../integrity/access'
import { tableFor, validate } from '../integrity/catalog'
import { Decimal } from '../integrity/decimal'
import { dependenciesOf, loadOrder } from '../integrity/graph'

const DIALECTS: readonly SqlDialect[] = ['postgres', 'mysql', 'sqlite']

function parseDialect(value: string | undefined): SqlDialect | undefined {
  return DIALECTS.find(dialect => dialect === (value ?? 'postgres'))
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * JSON form of a decoded record. BIGINT keys go out as strings so no digit
 * is lost; decimals keep their two fractional digits.
 */
export function recordToJson(record: Readonly<Record<string, unknown>>): Record<string, string | number | null> {
  const out: Record<string, string | number | null> = {}
  for (const [name, value] of Object.entries(record)) {
    if (value instanceof Decimal || typeof value === 'bigint') {
      out[name] = value.toString()
    } else if (typeof value === 'string' || typeof value === 'number') {
      out[name] = value
    } else {
      out[name] = null
    }
  }
  return out
}

const app = new Hono()

app.get('/health', (c) => {
  return c.json({ status: 'ok', service: 'tpch-schema', timestamp: new Date().toISOString() })
})

app.get('/schema', (c) => {
  return c.json({
    name: tpchDataset.name,
    version: tpchDataset.version,
    loadOrder: loadOrder(),
    tables: tpchDataset.tables.map(table => ({
      name: table.name,
      primaryKey: table.primaryKey,
      dependsOn: isEntityName(table.name) ? dependenciesOf(table.name) : [],
      columns: table.columns,
    })),
    relationships: tpchDataset.relationships,
  })
})

app.get('/schema/ddl', (c) => {
  const dialect = parseDialect(c.req.query('dialect'))
  if (!dialect) {
    return c.json({ error: `Invalid dialect. Valid options: ${DIALECTS.join(', ')}` }, 400)
  }
  const schema = c.req.query('schema')

  return c.json({
    dialect,
    statements: generateSchemaDDL(tpchDataset, dialect, { schema }),
    foreignKeys: generateForeignKeyDDL(tpchDataset, dialect, schema),
  })
})

app.get('/schema/indexes/:entity', (c) => {
  const entity = c.req.param('entity')
  if (!isEntityName(entity)) {
    return c.json({ error: `Unknown entity: ${entity}` }, 404)
  }
  return c.json({ entity, indexes: indexSpec(entity) })
})

app.post('/validate/:entity', async (c) => {
  const entity = c.req.param('entity')
  if (!isEntityName(entity)) {
    return c.json({ error: `Unknown entity: ${entity}` }, 404)
  }

  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Request body must be JSON' }, 400)
  }
  if (!isPlainObject(body)) {
    return c.json({ error: 'Request body must be a JSON object' }, 400)
  }

  const result = validate(entity, body)
  if (!result.ok) {
    return c.json({ valid: false, violation: result.violation.toJSON() }, 422)
  }

  const primaryKey = tableFor(entity).primaryKey
  return c.json({ valid: true, primaryKey, record: recordToJson(result.record) })
})

export { app }
export default app
