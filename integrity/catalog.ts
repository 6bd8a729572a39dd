/**
 * Entity Catalog
 *
 * Attribute-level validation for the eight TPC-H record shapes. Column widths,
 * nullability, precision and enumerations come from the table definitions in
 * `datasets/tpch.ts`; the decoders below map each validated candidate to its
 * typed record. Validation is pure: nothing is registered or retained.
 */

import {
  tpchDataset,
  ORDER_STATUSES,
  RETURN_FLAGS,
  LINE_STATUSES,
  type CalendarDate,
  type ColumnConfig,
  type ColumnType,
  type EntityName,
  type TableConfig,
  type TpchRecords,
} from '../datasets'
import { Decimal, DecimalParseError } from './decimal'
import { AttributeViolation, type AttributeRule } from './errors'
import { formatKey, type KeyTuple, type KeyValue } from './keys'

export type Candidate = Readonly<Record<string, unknown>>

export type ValidationResult<T> =
  | { ok: true; record: T }
  | { ok: false; violation: AttributeViolation }

const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const INTEGER_TEXT = /^[+-]?\d+$/
const DATE_TEXT = /^(\d{4})-(\d{2})-(\d{2})$/

// ============================================================================
// Field Reader
// ============================================================================

/**
 * Reads one candidate column by column, enforcing the declared domain of each.
 * Every accessor throws AttributeViolation on the first broken rule.
 */
class FieldReader {
  constructor(
    private table: TableConfig,
    private candidate: Candidate
  ) {}

  private column(name: string, type: ColumnType): ColumnConfig {
    const col = this.table.columns.find(c => c.name === name)
    if (!col || col.type !== type) {
      // Decoder and table definition disagree: a bug, not bad data
      throw new Error(`${this.table.name}.${name} is not declared as ${type}`)
    }
    return col
  }

  private violation(col: ColumnConfig, rule: AttributeRule, value: unknown, detail: string): AttributeViolation {
    return new AttributeViolation(this.table.name, col.name, rule, value, detail)
  }

  private present(col: ColumnConfig): unknown {
    const value = this.candidate[col.name]
    if (value === undefined || value === null) {
      throw this.violation(col, 'required', value, 'value is required')
    }
    return value
  }

  integer(name: string): number {
    const col = this.column(name, 'integer')
    const value = this.present(col)

    let parsed: number
    if (typeof value === 'number' && Number.isInteger(value)) {
      parsed = value
    } else if (typeof value === 'bigint') {
      parsed = Number(value)
    } else if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
      parsed = Number(value.trim())
    } else {
      throw this.violation(col, 'type', value, 'expected an integer')
    }

    if (parsed < INT32_MIN || parsed > INT32_MAX) {
      throw this.violation(col, 'width', value, 'outside the 32-bit integer range')
    }
    if (col.nonNegative && parsed < 0) {
      throw this.violation(col, 'non-negative', value, 'must not be negative')
    }
    return parsed
  }

  bigint(name: string): bigint {
    const col = this.column(name, 'bigint')
    const value = this.present(col)

    let parsed: bigint
    if (typeof value === 'bigint') {
      parsed = value
    } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
      parsed = BigInt(value)
    } else if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
      parsed = BigInt(value.trim())
    } else {
      throw this.violation(col, 'type', value, 'expected a 64-bit integer')
    }

    if (parsed < INT64_MIN || parsed > INT64_MAX) {
      throw this.violation(col, 'width', value, 'outside the 64-bit integer range')
    }
    if (col.nonNegative && parsed < 0n) {
      throw this.violation(col, 'non-negative', value, 'must not be negative')
    }
    return parsed
  }

  decimal(name: string): Decimal {
    const col = this.column(name, 'decimal')
    const value = this.present(col)

    if (
      !(value instanceof Decimal) &&
      typeof value !== 'string' &&
      typeof value !== 'number' &&
      typeof value !== 'bigint'
    ) {
      throw this.violation(col, 'type', value, 'expected a fixed-point decimal')
    }

    let parsed: Decimal
    try {
      parsed = Decimal.from(value)
    } catch (error) {
      if (!(error instanceof DecimalParseError)) throw error
      if (error.reason === 'format') {
        throw this.violation(col, 'type', value, 'expected a fixed-point decimal')
      }
      throw this.violation(
        col,
        'precision',
        value,
        error.reason === 'scale'
          ? `more than ${col.scale ?? 2} fractional digits`
          : `more than ${col.precision ?? 15} significant digits`
      )
    }

    if (col.nonNegative && parsed.isNegative()) {
      throw this.violation(col, 'non-negative', value, 'must not be negative')
    }
    return parsed
  }

  private text(col: ColumnConfig, value: unknown): string {
    if (typeof value !== 'string') {
      throw this.violation(col, 'type', value, 'expected a string')
    }
    // VARCHAR widths count characters, not UTF-16 code units
    if (col.maxLength !== undefined && Array.from(value).length > col.maxLength) {
      throw this.violation(col, 'width', value, `longer than ${col.maxLength} characters`)
    }
    return value
  }

  string(name: string): string {
    const col = this.column(name, 'string')
    return this.text(col, this.present(col))
  }

  /**
   * Nullable string. Absent (null/undefined) becomes null; '' stays ''.
   */
  optionalString(name: string): string | null {
    const col = this.column(name, 'string')
    const value = this.candidate[col.name]
    if (value === undefined || value === null) {
      if (!col.nullable) throw this.violation(col, 'required', value, 'value is required')
      return null
    }
    return this.text(col, value)
  }

  /**
   * Checks against the column's declared enumeration; `values` narrows the
   * result to its literal type and must list the same codes.
   */
  oneOf<T extends string>(name: string, values: readonly T[]): T {
    const col = this.column(name, 'string')
    const declared = col.enum
    if (!declared || declared.length !== values.length || !values.every(v => declared.includes(v))) {
      throw new Error(`${this.table.name}.${name} does not declare the enumeration ${values.join(', ')}`)
    }

    const value = this.text(col, this.present(col))
    const match = values.find(allowed => allowed === value)
    if (match === undefined) {
      throw this.violation(col, 'enum', value, `expected one of ${declared.join(', ')}`)
    }
    return match
  }

  date(name: string): CalendarDate {
    const col = this.column(name, 'date')
    const value = this.present(col)

    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw this.violation(col, 'date', value, 'invalid date')
      }
      if (value.getTime() % 86_400_000 !== 0) {
        throw this.violation(col, 'date', value, 'has a time-of-day component')
      }
      return value.toISOString().slice(0, 10)
    }

    if (typeof value !== 'string') {
      throw this.violation(col, 'type', value, 'expected a calendar date')
    }

    const match = DATE_TEXT.exec(value)
    if (!match) {
      throw this.violation(col, 'date', value, 'expected YYYY-MM-DD')
    }
    const [, year, month, day] = match
    // setUTCFullYear, unlike Date.UTC, leaves years 0-99 alone
    const parsed = new Date(0)
    parsed.setUTCFullYear(Number(year), Number(month) - 1, Number(day))
    if (Number(year) < 1 || parsed.toISOString().slice(0, 10) !== value) {
      throw this.violation(col, 'date', value, 'not a calendar date')
    }
    return value
  }
}

// ============================================================================
// Decoders
// ============================================================================

type Decoder<E extends EntityName> = (r: FieldReader) => TpchRecords[E]

const decoders: { [E in EntityName]: Decoder<E> } = {
  region: r => ({
    r_regionkey: r.integer('r_regionkey'),
    r_name: r.string('r_name'),
    r_comment: r.optionalString('r_comment'),
  }),
  nation: r => ({
    n_nationkey: r.integer('n_nationkey'),
    n_name: r.string('n_name'),
    n_regionkey: r.integer('n_regionkey'),
    n_comment: r.optionalString('n_comment'),
  }),
  part: r => ({
    p_partkey: r.bigint('p_partkey'),
    p_name: r.string('p_name'),
    p_mfgr: r.string('p_mfgr'),
    p_brand: r.string('p_brand'),
    p_type: r.string('p_type'),
    p_size: r.integer('p_size'),
    p_container: r.string('p_container'),
    p_retailprice: r.decimal('p_retailprice'),
    p_comment: r.optionalString('p_comment'),
  }),
  supplier: r => ({
    s_suppkey: r.bigint('s_suppkey'),
    s_name: r.string('s_name'),
    s_address: r.string('s_address'),
    s_nationkey: r.integer('s_nationkey'),
    s_phone: r.string('s_phone'),
    s_acctbal: r.decimal('s_acctbal'),
    s_comment: r.optionalString('s_comment'),
  }),
  partsupp: r => ({
    ps_partkey: r.bigint('ps_partkey'),
    ps_suppkey: r.bigint('ps_suppkey'),
    ps_availqty: r.bigint('ps_availqty'),
    ps_supplycost: r.decimal('ps_supplycost'),
    ps_comment: r.optionalString('ps_comment'),
  }),
  customer: r => ({
    c_custkey: r.bigint('c_custkey'),
    c_name: r.string('c_name'),
    c_address: r.string('c_address'),
    c_nationkey: r.integer('c_nationkey'),
    c_phone: r.string('c_phone'),
    c_acctbal: r.decimal('c_acctbal'),
    c_mktsegment: r.string('c_mktsegment'),
    c_comment: r.optionalString('c_comment'),
  }),
  orders: r => ({
    o_orderkey: r.bigint('o_orderkey'),
    o_custkey: r.bigint('o_custkey'),
    o_orderstatus: r.oneOf('o_orderstatus', ORDER_STATUSES),
    o_totalprice: r.decimal('o_totalprice'),
    o_orderdate: r.date('o_orderdate'),
    o_orderpriority: r.string('o_orderpriority'),
    o_clerk: r.string('o_clerk'),
    o_shippriority: r.integer('o_shippriority'),
    o_comment: r.optionalString('o_comment'),
  }),
  lineitem: r => ({
    l_orderkey: r.bigint('l_orderkey'),
    l_partkey: r.bigint('l_partkey'),
    l_suppkey: r.bigint('l_suppkey'),
    l_linenumber: r.bigint('l_linenumber'),
    l_quantity: r.decimal('l_quantity'),
    l_extendedprice: r.decimal('l_extendedprice'),
    l_discount: r.decimal('l_discount'),
    l_tax: r.decimal('l_tax'),
    l_returnflag: r.oneOf('l_returnflag', RETURN_FLAGS),
    l_linestatus: r.oneOf('l_linestatus', LINE_STATUSES),
    l_shipdate: r.date('l_shipdate'),
    l_commitdate: r.date('l_commitdate'),
    l_receiptdate: r.date('l_receiptdate'),
    l_shipinstruct: r.string('l_shipinstruct'),
    l_shipmode: r.string('l_shipmode'),
    l_comment: r.optionalString('l_comment'),
  }),
}

// ============================================================================
// Public API
// ============================================================================

export function tableFor(entity: EntityName): TableConfig {
  const table = tpchDataset.tables.find(t => t.name === entity)
  if (!table) throw new Error(`No table definition for ${entity}`)
  return table
}

/**
 * Validate one candidate record against its entity's attribute domains.
 *
 * @example
 * ```ts
 * const result = validate('region', { r_regionkey: '0', r_name: 'AFRICA', r_comment: null })
 * if (result.ok) result.record.r_regionkey // 0
 * ```
 */
export function validate<E extends EntityName>(entity: E, candidate: Candidate): ValidationResult<TpchRecords[E]> {
  const table = tableFor(entity)

  for (const attribute of Object.keys(candidate)) {
    if (!table.columns.some(c => c.name === attribute)) {
      return {
        ok: false,
        violation: new AttributeViolation(entity, attribute, 'unknown-attribute', candidate[attribute], 'not a column of this entity'),
      }
    }
  }

  const decode: Decoder<E> = decoders[entity]
  try {
    return { ok: true, record: decode(new FieldReader(table, candidate)) }
  } catch (error) {
    if (error instanceof AttributeViolation) return { ok: false, violation: error }
    throw error
  }
}

/**
 * Read key columns off a record (or a raw candidate) as a tuple.
 */
export function keyTuple(row: Candidate, columns: readonly string[]): KeyTuple {
  return columns.map((column): KeyValue => {
    const value = row[column]
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'string') {
      return value
    }
    throw new Error(`Key column ${column} holds no key value`)
  })
}

export function primaryKeyOf(entity: EntityName, row: Candidate): KeyTuple {
  return keyTuple(row, tableFor(entity).primaryKey)
}

/**
 * Best-effort row label for error messages, read from the raw candidate so it
 * works even when the row failed to decode.
 */
export function describeCandidateKey(entity: EntityName, candidate: Candidate): string | undefined {
  const columns = tableFor(entity).primaryKey
  const values = columns.map(column => candidate[column])
  if (values.some(value => typeof value !== 'number' && typeof value !== 'bigint' && typeof value !== 'string')) {
    return undefined
  }
  return formatKey(keyTuple(candidate, columns))
}
