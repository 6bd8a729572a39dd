/**
 * Dataset Registry and Types
 *
 * Type definitions and a registry for relational benchmark datasets.
 * Each dataset defines its tables, the foreign-key relationships between them,
 * secondary indexes, and the row counts of its size tiers.
 */

import { tpchDataset } from './tpch'

// Column data types understood by the DDL generator and the entity catalog
export type ColumnType =
  | 'integer'
  | 'bigint'
  | 'decimal'
  | 'string'
  | 'date'

// Column definition
export interface ColumnConfig {
  name: string
  type: ColumnType
  nullable?: boolean
  // For string types
  maxLength?: number
  // For decimal types
  precision?: number
  scale?: number
  // Closed set of allowed values
  enum?: readonly string[]
  // Rejects values below zero
  nonNegative?: boolean
}

// Index definition
export interface IndexConfig {
  name: string
  columns: string[]
  unique?: boolean
}

// Table definition
export interface TableConfig {
  name: string
  columns: ColumnConfig[]
  // One column, or several for a composite key
  primaryKey: string[]
  indexes?: IndexConfig[]
}

// Foreign-key relationship. `from.columns` and `to.columns` pair up by position,
// so a composite reference is a single relationship with two columns on each side.
export interface RelationshipConfig {
  name: string
  from: {
    table: string
    columns: string[]
  }
  to: {
    table: string
    columns: string[]
  }
}

// Size tier configuration
export interface SizeTierConfig {
  scaleFactor: number
  rowCounts: Record<string, number>
  // Estimated storage size in bytes
  estimatedBytes: number
}

// Main dataset configuration
export interface DatasetConfig {
  name: string
  description: string
  version: string
  // Listed so that every table follows the tables it references
  tables: TableConfig[]
  relationships: RelationshipConfig[]
  sizeTiers: SizeTierConfig[]
  metadata?: Record<string, unknown>
}

export type SqlDialect = 'postgres' | 'mysql' | 'sqlite'

export interface DDLOptions {
  // Qualifies every table name, e.g. `tpch.region`
  schema?: string
  // Foreign keys declared inline with the table
  relationships?: RelationshipConfig[]
}

// Dataset registry
const datasets: Map<string, DatasetConfig> = new Map()

/**
 * Register a dataset configuration
 */
export function registerDataset(config: DatasetConfig): void {
  datasets.set(config.name, config)
}

/**
 * Get a dataset by name
 */
export function getDataset(name: string): DatasetConfig | undefined {
  return datasets.get(name)
}

/**
 * Get all registered datasets
 */
export function getAllDatasets(): DatasetConfig[] {
  return Array.from(datasets.values())
}

/**
 * Get dataset names
 */
export function getDatasetNames(): string[] {
  return Array.from(datasets.keys())
}

/**
 * Look up a table of a dataset by name
 */
export function getTable(dataset: DatasetConfig, name: string): TableConfig | undefined {
  return dataset.tables.find(t => t.name === name)
}

/**
 * Row counts for a scale factor. Tiers whose counts do not scale linearly
 * (region, nation) keep their fixed sizes.
 */
export function getRowCounts(dataset: DatasetConfig, scaleFactor: number): Record<string, number> | undefined {
  const tier = dataset.sizeTiers.find(t => t.scaleFactor === scaleFactor)
  return tier?.rowCounts
}

const typeMap: Record<ColumnType, Record<SqlDialect, string>> = {
  integer: { postgres: 'INTEGER', mysql: 'INT', sqlite: 'INTEGER' },
  bigint: { postgres: 'BIGINT', mysql: 'BIGINT', sqlite: 'INTEGER' },
  // SQLite has no exact decimal storage; TEXT keeps the digits as written
  decimal: { postgres: 'DECIMAL', mysql: 'DECIMAL', sqlite: 'TEXT' },
  string: { postgres: 'VARCHAR', mysql: 'VARCHAR', sqlite: 'TEXT' },
  date: { postgres: 'DATE', mysql: 'DATE', sqlite: 'TEXT' },
}

function qualify(name: string, schema?: string): string {
  return schema ? `${schema}.${name}` : name
}

function columnType(col: ColumnConfig, dialect: SqlDialect): string {
  let typeDef = typeMap[col.type][dialect]

  if (dialect === 'sqlite') return typeDef

  if (col.type === 'string' && col.maxLength) {
    typeDef = `${typeDef}(${col.maxLength})`
  }

  if (col.type === 'decimal' && col.precision && col.scale !== undefined) {
    typeDef = `${typeDef}(${col.precision}, ${col.scale})`
  }

  return typeDef
}

/**
 * Generate SQL DDL for a table
 */
export function generateTableDDL(table: TableConfig, dialect: SqlDialect, options: DDLOptions = {}): string {
  const { schema, relationships = [] } = options
  const singlePk = table.primaryKey.length === 1 ? table.primaryKey[0] : undefined
  const outgoing = relationships.filter(r => r.from.table === table.name)
  // MySQL parses a column-level REFERENCES and then ignores it
  const inlineReferences = dialect !== 'mysql'

  const columnDefs = table.columns.map(col => {
    const parts = [col.name, columnType(col, dialect)]

    if (!col.nullable) parts.push('NOT NULL')
    if (col.name === singlePk) parts.push('PRIMARY KEY')

    const ref = outgoing.find(r => r.from.columns.length === 1 && r.from.columns[0] === col.name)
    if (ref && inlineReferences) {
      parts.push(`REFERENCES ${qualify(ref.to.table, schema)}(${ref.to.columns[0]})`)
    }

    return parts.join(' ')
  })

  if (!singlePk) {
    columnDefs.push(`PRIMARY KEY (${table.primaryKey.join(', ')})`)
  }

  for (const rel of outgoing) {
    if (rel.from.columns.length > 1 || !inlineReferences) {
      columnDefs.push(
        `FOREIGN KEY (${rel.from.columns.join(', ')}) REFERENCES ${qualify(rel.to.table, schema)}(${rel.to.columns.join(', ')})`
      )
    }
  }

  return `CREATE TABLE ${qualify(table.name, schema)} (\n  ${columnDefs.join(',\n  ')}\n)`
}

/**
 * Generate SQL DDL for indexes
 */
export function generateIndexDDL(table: TableConfig, dialect: SqlDialect, options: DDLOptions = {}): string[] {
  if (!table.indexes) return []

  // Postgres and SQLite scope index names to the schema; MySQL scopes them to the table
  const ifNotExists = dialect === 'mysql' ? '' : 'IF NOT EXISTS '

  return table.indexes.map(idx => {
    const unique = idx.unique ? 'UNIQUE ' : ''
    const columns = idx.columns.join(', ')
    return `CREATE ${unique}INDEX ${ifNotExists}${idx.name} ON ${qualify(table.name, options.schema)}(${columns})`
  })
}

/**
 * `ALTER TABLE ... ADD FOREIGN KEY` statements for every relationship.
 * SQLite cannot add constraints to an existing table, so it gets none.
 */
export function generateForeignKeyDDL(dataset: DatasetConfig, dialect: SqlDialect, schema?: string): string[] {
  if (dialect === 'sqlite') return []

  return dataset.relationships.map(rel =>
    `ALTER TABLE ${qualify(rel.from.table, schema)} ADD FOREIGN KEY (${rel.from.columns.join(', ')}) ` +
    `REFERENCES ${qualify(rel.to.table, schema)}(${rel.to.columns.join(', ')})`
  )
}

export interface SchemaDDLOptions {
  schema?: string
  foreignKeys?: boolean
  indexes?: boolean
}

/**
 * Full schema DDL: tables in dataset order with their foreign keys, then indexes.
 */
export function generateSchemaDDL(dataset: DatasetConfig, dialect: SqlDialect, options: SchemaDDLOptions = {}): string[] {
  const { schema, foreignKeys = true, indexes = true } = options
  const relationships = foreignKeys ? dataset.relationships : []

  const statements: string[] = []
  if (schema && dialect === 'postgres') {
    statements.push(`CREATE SCHEMA IF NOT EXISTS ${schema}`)
  }

  for (const table of dataset.tables) {
    statements.push(generateTableDDL(table, dialect, { schema, relationships }))
  }

  if (indexes) {
    for (const table of dataset.tables) {
      statements.push(...generateIndexDDL(table, dialect, { schema }))
    }
  }

  return statements
}

// Re-export datasets
export * from './tpch'

registerDataset(tpchDataset)
