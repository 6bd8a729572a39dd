/**
 * Small, self-consistent TPC-H dataset for tests.
 *
 * Values are strings the way a CSV export delivers them; `null` is an absent
 * comment. Every call returns fresh rows, so tests may mutate them.
 *
 * Shape: 5 regions, 25 nations, 4 parts, 2 suppliers, 7 partsupp rows (every
 * part stocked by every supplier except part 4 / supplier 2), 3 customers,
 * 3 orders, 4 line items. Order totals equal the sum of their line charges.
 */

import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { EntityName } from '../datasets'
import type { BatchProducer } from '../integrity/pipeline'

export type FixtureRow = Record<string, string | null>
export type FixtureRows = { [E in EntityName]: FixtureRow[] }

const REGION_NAMES = ['AFRICA', 'AMERICA', 'ASIA', 'EUROPE', 'MIDDLE EAST']

export function tpchFixture(): FixtureRows {
  const region = REGION_NAMES.map((name, i) => ({
    r_regionkey: String(i),
    r_name: name,
    r_comment: i === 0 ? null : `region ${i}`,
  }))

  const nation = Array.from({ length: 25 }, (_, i) => ({
    n_nationkey: String(i),
    n_name: `NATION ${i}`,
    n_regionkey: String(i % 5),
    n_comment: null,
  }))

  const part = [1, 2, 3, 4].map(key => ({
    p_partkey: String(key),
    p_name: `part ${key}`,
    p_mfgr: 'Manufacturer#1',
    p_brand: 'Brand#13',
    p_type: 'PROMO BURNISHED COPPER',
    p_size: String(key * 7),
    p_container: 'JUMBO PKG',
    p_retailprice: `${900 + key}.00`,
    p_comment: null,
  }))

  const supplier = [1, 2].map(key => ({
    s_suppkey: String(key),
    s_name: `Supplier#00000000${key}`,
    s_address: `${key} Dock Road`,
    s_nationkey: String(key + 5),
    s_phone: `27-918-335-179${key}`,
    s_acctbal: '5755.94',
    s_comment: `supplier ${key}`,
  }))

  const partsupp: FixtureRow[] = []
  for (const p of [1, 2, 3, 4]) {
    for (const s of [1, 2]) {
      if (p === 4 && s === 2) continue
      partsupp.push({
        ps_partkey: String(p),
        ps_suppkey: String(s),
        ps_availqty: String(p * 100 + s),
        ps_supplycost: '771.64',
        ps_comment: null,
      })
    }
  }

  const customer = [1, 2, 3].map(key => ({
    c_custkey: String(key),
    c_name: `Customer#00000000${key}`,
    c_address: `${key} Market Street`,
    c_nationkey: String(key),
    c_phone: `25-989-741-298${key}`,
    c_acctbal: key === 3 ? '-120.50' : '711.56',
    c_mktsegment: 'BUILDING',
    c_comment: key === 2 ? '' : null,
  }))

  const orders = [
    order('1', '1', 'O', '200.00', '1996-01-02'),
    order('2', '2', 'F', '236.25', '1996-12-01'),
    order('3', '1', 'P', '10.00', '1993-10-14'),
  ]

  const lineitem = [
    line('1', '1', '1', '1', '100.00', '0.00', '0.00', '1996-01-10'),
    line('1', '2', '2', '2', '100.00', '0.00', '0.00', '1996-02-10'),
    line('2', '1', '3', '1', '250.00', '0.10', '0.05', '1996-12-05'),
    line('3', '1', '4', '1', '10.00', '0.00', '0.00', '1993-10-12'),
  ]

  return { region, nation, part, supplier, partsupp, customer, orders, lineitem }
}

function order(key: string, custkey: string, status: string, total: string, date: string): FixtureRow {
  return {
    o_orderkey: key,
    o_custkey: custkey,
    o_orderstatus: status,
    o_totalprice: total,
    o_orderdate: date,
    o_orderpriority: '5-LOW',
    o_clerk: 'Clerk#000000951',
    o_shippriority: '0',
    o_comment: null,
  }
}

function line(
  orderkey: string,
  linenumber: string,
  partkey: string,
  suppkey: string,
  extendedprice: string,
  discount: string,
  tax: string,
  shipdate: string
): FixtureRow {
  // Commit and receipt follow shipping by 10 and 15 days within the month
  const [year, month, day] = shipdate.split('-')
  const later = (days: number) => `${year}-${month}-${String(Number(day) + days).padStart(2, '0')}`
  return {
    l_orderkey: orderkey,
    l_partkey: partkey,
    l_suppkey: suppkey,
    l_linenumber: linenumber,
    l_quantity: '17.00',
    l_extendedprice: extendedprice,
    l_discount: discount,
    l_tax: tax,
    l_returnflag: 'N',
    l_linestatus: 'O',
    l_shipdate: shipdate,
    l_commitdate: later(10),
    l_receiptdate: later(15),
    l_shipinstruct: 'DELIVER IN PERSON',
    l_shipmode: 'TRUCK',
    l_comment: null,
  }
}

export function fixtureProducer(rows: FixtureRows): BatchProducer {
  return async (entity: EntityName) => rows[entity]
}

/**
 * CSV text of fixture rows: NULL as an empty field, the empty string quoted.
 */
export function toCsv(rows: readonly FixtureRow[]): string {
  const header = Object.keys(rows[0])
  const quote = (value: string | null) => {
    if (value === null) return ''
    if (value === '' || /[",\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`
    return value
  }
  return [header.join(','), ...rows.map(row => header.map(name => quote(row[name])).join(','))].join('\n') + '\n'
}

/**
 * Write one `<entity>.csv` per entity into `dir`.
 */
export async function writeFixtureCsv(dir: string, rows: FixtureRows): Promise<void> {
  for (const [entity, entityRows] of Object.entries(rows)) {
    await writeFile(join(dir, `${entity}.csv`), toCsv(entityRows))
  }
}
