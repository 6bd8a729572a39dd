/**
 * TPC-H Dataset
 *
 * The decision-support benchmark schema: a wholesale supply chain of regions,
 * nations, parts, suppliers, part-supply relationships, customers, orders and
 * order line items. Column names match dbgen output (lowercase, prefixed).
 *
 * Workload characteristics:
 * - Bulk loaded once per benchmark run, read-only afterwards
 * - Star-like joins from lineitem out to orders, partsupp and the dimensions
 * - Range scans on order and ship dates
 */

import type { Decimal } from '../integrity/decimal'
import type { KeyTuple } from '../integrity/keys'
import type {
  DatasetConfig,
  TableConfig,
  RelationshipConfig,
  SizeTierConfig,
} from './index'

// ============================================================================
// Record Types
// ============================================================================

// ISO calendar date, `YYYY-MM-DD`
export type CalendarDate = string

export const ORDER_STATUSES = ['F', 'O', 'P'] as const
export type OrderStatus = (typeof ORDER_STATUSES)[number]

export const RETURN_FLAGS = ['A', 'N', 'R'] as const
export type ReturnFlag = (typeof RETURN_FLAGS)[number]

export const LINE_STATUSES = ['F', 'O'] as const
export type LineStatus = (typeof LINE_STATUSES)[number]

// Records are object type aliases rather than interfaces so that each one is
// also readable as a plain column map (Record<string, unknown>).

export type Region = {
  r_regionkey: number
  r_name: string
  r_comment: string | null
}

export type Nation = {
  n_nationkey: number
  n_name: string
  n_regionkey: number
  n_comment: string | null
}

export type Part = {
  p_partkey: bigint
  p_name: string
  p_mfgr: string
  p_brand: string
  p_type: string
  p_size: number
  p_container: string
  p_retailprice: Decimal
  p_comment: string | null
}

export type Supplier = {
  s_suppkey: bigint
  s_name: string
  s_address: string
  s_nationkey: number
  s_phone: string
  s_acctbal: Decimal
  s_comment: string | null
}

export type PartSupp = {
  ps_partkey: bigint
  ps_suppkey: bigint
  ps_availqty: bigint
  ps_supplycost: Decimal
  ps_comment: string | null
}

export type Customer = {
  c_custkey: bigint
  c_name: string
  c_address: string
  c_nationkey: number
  c_phone: string
  c_acctbal: Decimal
  c_mktsegment: string
  c_comment: string | null
}

export type Orders = {
  o_orderkey: bigint
  o_custkey: bigint
  o_orderstatus: OrderStatus
  o_totalprice: Decimal
  o_orderdate: CalendarDate
  o_orderpriority: string
  o_clerk: string
  o_shippriority: number
  o_comment: string | null
}

export type LineItem = {
  l_orderkey: bigint
  l_partkey: bigint
  l_suppkey: bigint
  l_linenumber: bigint
  l_quantity: Decimal
  l_extendedprice: Decimal
  l_discount: Decimal
  l_tax: Decimal
  l_returnflag: ReturnFlag
  l_linestatus: LineStatus
  l_shipdate: CalendarDate
  l_commitdate: CalendarDate
  l_receiptdate: CalendarDate
  l_shipinstruct: string
  l_shipmode: string
  l_comment: string | null
}

export interface TpchRecords {
  region: Region
  nation: Nation
  part: Part
  supplier: Supplier
  partsupp: PartSupp
  customer: Customer
  orders: Orders
  lineitem: LineItem
}

export type EntityName = keyof TpchRecords

// FK-safe load order: parents before children
export const ENTITY_NAMES: readonly EntityName[] = [
  'region',
  'nation',
  'part',
  'supplier',
  'partsupp',
  'customer',
  'orders',
  'lineitem',
]

export function isEntityName(name: string): name is EntityName {
  return ENTITY_NAMES.some(entity => entity === name)
}

// A part/supplier stocking pair. Line items reference it as one unit.
export type PartSuppKey = readonly [partkey: bigint, suppkey: bigint]

export type LineItemKey = readonly [orderkey: bigint, linenumber: bigint]

export function partSuppKey(row: PartSupp): PartSuppKey {
  return [row.ps_partkey, row.ps_suppkey]
}

export function lineItemKey(row: LineItem): LineItemKey {
  return [row.l_orderkey, row.l_linenumber]
}

/**
 * Primary key of each entity's record, as the tuple its table declares.
 */
export const primaryKeys: { [E in EntityName]: (row: TpchRecords[E]) => KeyTuple } = {
  region: row => [row.r_regionkey],
  nation: row => [row.n_nationkey],
  part: row => [row.p_partkey],
  supplier: row => [row.s_suppkey],
  partsupp: partSuppKey,
  customer: row => [row.c_custkey],
  orders: row => [row.o_orderkey],
  lineitem: lineItemKey,
}

// ============================================================================
// Tables
// ============================================================================

const money = { type: 'decimal', precision: 15, scale: 2 } as const

const regionTable: TableConfig = {
  name: 'region',
  primaryKey: ['r_regionkey'],
  columns: [
    { name: 'r_regionkey', type: 'integer' },
    { name: 'r_name', type: 'string', maxLength: 25 },
    { name: 'r_comment', type: 'string', maxLength: 152, nullable: true },
  ],
}

const nationTable: TableConfig = {
  name: 'nation',
  primaryKey: ['n_nationkey'],
  columns: [
    { name: 'n_nationkey', type: 'integer' },
    { name: 'n_name', type: 'string', maxLength: 25 },
    { name: 'n_regionkey', type: 'integer' },
    { name: 'n_comment', type: 'string', maxLength: 152, nullable: true },
  ],
  indexes: [
    { name: 'idx_nation_regionkey', columns: ['n_regionkey'] },
  ],
}

const partTable: TableConfig = {
  name: 'part',
  primaryKey: ['p_partkey'],
  columns: [
    { name: 'p_partkey', type: 'bigint' },
    { name: 'p_name', type: 'string', maxLength: 55 },
    { name: 'p_mfgr', type: 'string', maxLength: 25 },
    { name: 'p_brand', type: 'string', maxLength: 10 },
    { name: 'p_type', type: 'string', maxLength: 25 },
    { name: 'p_size', type: 'integer', nonNegative: true },
    { name: 'p_container', type: 'string', maxLength: 10 },
    { name: 'p_retailprice', ...money, nonNegative: true },
    { name: 'p_comment', type: 'string', maxLength: 23, nullable: true },
  ],
}

const supplierTable: TableConfig = {
  name: 'supplier',
  primaryKey: ['s_suppkey'],
  columns: [
    { name: 's_suppkey', type: 'bigint' },
    { name: 's_name', type: 'string', maxLength: 25 },
    { name: 's_address', type: 'string', maxLength: 40 },
    { name: 's_nationkey', type: 'integer' },
    { name: 's_phone', type: 'string', maxLength: 15 },
    { name: 's_acctbal', ...money },
    { name: 's_comment', type: 'string', maxLength: 101, nullable: true },
  ],
  indexes: [
    { name: 'idx_supplier_nationkey', columns: ['s_nationkey'] },
  ],
}

const partsuppTable: TableConfig = {
  name: 'partsupp',
  primaryKey: ['ps_partkey', 'ps_suppkey'],
  columns: [
    { name: 'ps_partkey', type: 'bigint' },
    { name: 'ps_suppkey', type: 'bigint' },
    { name: 'ps_availqty', type: 'bigint', nonNegative: true },
    { name: 'ps_supplycost', ...money, nonNegative: true },
    { name: 'ps_comment', type: 'string', maxLength: 199, nullable: true },
  ],
  indexes: [
    { name: 'idx_partsupp_suppkey', columns: ['ps_suppkey'] },
  ],
}

const customerTable: TableConfig = {
  name: 'customer',
  primaryKey: ['c_custkey'],
  columns: [
    { name: 'c_custkey', type: 'bigint' },
    { name: 'c_name', type: 'string', maxLength: 25 },
    { name: 'c_address', type: 'string', maxLength: 40 },
    { name: 'c_nationkey', type: 'integer' },
    { name: 'c_phone', type: 'string', maxLength: 15 },
    { name: 'c_acctbal', ...money },
    { name: 'c_mktsegment', type: 'string', maxLength: 10 },
    { name: 'c_comment', type: 'string', maxLength: 117, nullable: true },
  ],
  indexes: [
    { name: 'idx_customer_nationkey', columns: ['c_nationkey'] },
  ],
}

const ordersTable: TableConfig = {
  name: 'orders',
  primaryKey: ['o_orderkey'],
  columns: [
    { name: 'o_orderkey', type: 'bigint' },
    { name: 'o_custkey', type: 'bigint' },
    { name: 'o_orderstatus', type: 'string', maxLength: 1, enum: ORDER_STATUSES },
    { name: 'o_totalprice', ...money, nonNegative: true },
    { name: 'o_orderdate', type: 'date' },
    { name: 'o_orderpriority', type: 'string', maxLength: 15 },
    { name: 'o_clerk', type: 'string', maxLength: 15 },
    { name: 'o_shippriority', type: 'integer' },
    { name: 'o_comment', type: 'string', maxLength: 79, nullable: true },
  ],
  indexes: [
    { name: 'idx_orders_custkey', columns: ['o_custkey'] },
    { name: 'idx_orders_orderdate', columns: ['o_orderdate'] },
  ],
}

const lineitemTable: TableConfig = {
  name: 'lineitem',
  primaryKey: ['l_orderkey', 'l_linenumber'],
  columns: [
    { name: 'l_orderkey', type: 'bigint' },
    { name: 'l_partkey', type: 'bigint' },
    { name: 'l_suppkey', type: 'bigint' },
    { name: 'l_linenumber', type: 'bigint' },
    { name: 'l_quantity', ...money, nonNegative: true },
    { name: 'l_extendedprice', ...money, nonNegative: true },
    { name: 'l_discount', ...money, nonNegative: true },
    { name: 'l_tax', ...money, nonNegative: true },
    { name: 'l_returnflag', type: 'string', maxLength: 1, enum: RETURN_FLAGS },
    { name: 'l_linestatus', type: 'string', maxLength: 1, enum: LINE_STATUSES },
    { name: 'l_shipdate', type: 'date' },
    { name: 'l_commitdate', type: 'date' },
    { name: 'l_receiptdate', type: 'date' },
    { name: 'l_shipinstruct', type: 'string', maxLength: 25 },
    { name: 'l_shipmode', type: 'string', maxLength: 10 },
    { name: 'l_comment', type: 'string', maxLength: 44, nullable: true },
  ],
  indexes: [
    { name: 'idx_lineitem_orderkey', columns: ['l_orderkey'] },
    { name: 'idx_lineitem_partkey', columns: ['l_partkey'] },
    { name: 'idx_lineitem_suppkey', columns: ['l_suppkey'] },
    { name: 'idx_lineitem_shipdate', columns: ['l_shipdate'] },
  ],
}

// ============================================================================
// Relationships
// ============================================================================

const relationships: RelationshipConfig[] = [
  {
    name: 'nation_region',
    from: { table: 'nation', columns: ['n_regionkey'] },
    to: { table: 'region', columns: ['r_regionkey'] },
  },
  {
    name: 'supplier_nation',
    from: { table: 'supplier', columns: ['s_nationkey'] },
    to: { table: 'nation', columns: ['n_nationkey'] },
  },
  {
    name: 'partsupp_part',
    from: { table: 'partsupp', columns: ['ps_partkey'] },
    to: { table: 'part', columns: ['p_partkey'] },
  },
  {
    name: 'partsupp_supplier',
    from: { table: 'partsupp', columns: ['ps_suppkey'] },
    to: { table: 'supplier', columns: ['s_suppkey'] },
  },
  {
    name: 'customer_nation',
    from: { table: 'customer', columns: ['c_nationkey'] },
    to: { table: 'nation', columns: ['n_nationkey'] },
  },
  {
    name: 'orders_customer',
    from: { table: 'orders', columns: ['o_custkey'] },
    to: { table: 'customer', columns: ['c_custkey'] },
  },
  {
    name: 'lineitem_orders',
    from: { table: 'lineitem', columns: ['l_orderkey'] },
    to: { table: 'orders', columns: ['o_orderkey'] },
  },
  {
    name: 'lineitem_partsupp',
    from: { table: 'lineitem', columns: ['l_partkey', 'l_suppkey'] },
    to: { table: 'partsupp', columns: ['ps_partkey', 'ps_suppkey'] },
  },
]

// ============================================================================
// Size Tiers
// ============================================================================

// region and nation are fixed; the rest scale with the scale factor
function tier(scaleFactor: number, lineitem: number): SizeTierConfig {
  return {
    scaleFactor,
    rowCounts: {
      region: 5,
      nation: 25,
      part: Math.round(200_000 * scaleFactor),
      supplier: Math.round(10_000 * scaleFactor),
      partsupp: Math.round(800_000 * scaleFactor),
      customer: Math.round(150_000 * scaleFactor),
      orders: Math.round(1_500_000 * scaleFactor),
      lineitem,
    },
    estimatedBytes: Math.round(1_000_000_000 * scaleFactor),
  }
}

const sizeTiers: SizeTierConfig[] = [
  tier(0.01, 60_175),
  tier(0.1, 600_572),
  tier(1, 6_001_215),
  tier(10, 59_986_052),
]

// ============================================================================
// Dataset
// ============================================================================

export const tpchDataset: DatasetConfig = {
  name: 'tpch',
  description: 'TPC-H decision-support benchmark: wholesale supply chain with orders and line items',
  version: '3.0.1',
  tables: [
    regionTable,
    nationTable,
    partTable,
    supplierTable,
    partsuppTable,
    customerTable,
    ordersTable,
    lineitemTable,
  ],
  relationships,
  sizeTiers,
  metadata: {
    schema: 'tpch',
    generator: 'dbgen',
  },
}
