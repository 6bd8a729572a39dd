/**
 * Optional strict rules that conforming TPC-H data is expected to satisfy but
 * the DDL does not encode. Each check is enabled through LoadConfig.strict.
 */

import { lineItemKey, type EntityName, type LineItem, type Orders, type TpchRecords } from '../datasets'
import type { LoadConfig } from './config'
import { Decimal } from './decimal'
import { BusinessRuleViolation } from './errors'
import { encodeKey, formatKey } from './keys'

export interface Indexed<T> {
  index: number
  record: T
}

export interface RuleContext {
  config: LoadConfig
  // Rows of an already-loaded entity
  ordersRows: () => readonly Orders[]
  // Encoded keys of orders whose lines are not all in the batch
  incompleteOrders: ReadonlySet<string>
}

export type RuleCheck<E extends EntityName> = (
  rows: readonly Indexed<TpchRecords[E]>[],
  context: RuleContext
) => BusinessRuleViolation[]

export function checkShipDateOrder(rows: readonly Indexed<LineItem>[]): BusinessRuleViolation[] {
  const violations: BusinessRuleViolation[] = []

  for (const { index, record } of rows) {
    const { l_shipdate, l_commitdate, l_receiptdate } = record
    // ISO dates order lexically
    if (l_shipdate > l_commitdate || l_commitdate > l_receiptdate) {
      violations.push(
        new BusinessRuleViolation(
          'lineitem',
          'ship-date-order',
          `expected ship ${l_shipdate} <= commit ${l_commitdate} <= receipt ${l_receiptdate}`,
          { rowIndex: index, rowKey: formatKey(lineItemKey(record)) }
        )
      )
    }
  }

  return violations
}

/**
 * Charge of one line, in hundredths, rounded half away from zero:
 * extendedprice * (1 + tax) * (1 - discount). Left as raw units: a charge can
 * exceed the DECIMAL(15, 2) range its factors fit in.
 */
export function lineCharge(line: LineItem): bigint {
  // Three scale-2 factors give scale 6
  const scaled = line.l_extendedprice.units * (100n + line.l_tax.units) * (100n - line.l_discount.units)
  const half = scaled < 0n ? -5_000n : 5_000n
  return (scaled + half) / 10_000n
}

/**
 * Compare each order's o_totalprice with the sum of its lines' charges.
 * Orders without lines in this batch, or listed in `skip`, are not checked.
 */
export function checkTotalPrices(
  lines: readonly Indexed<LineItem>[],
  orders: readonly Orders[],
  tolerance: Decimal,
  skip: ReadonlySet<string> = new Set()
): BusinessRuleViolation[] {
  const totals = new Map<string, { units: bigint; firstIndex: number }>()

  for (const { index, record } of lines) {
    const key = encodeKey([record.l_orderkey])
    const entry = totals.get(key)
    const charge = lineCharge(record)
    if (entry) {
      entry.units += charge
    } else {
      totals.set(key, { units: charge, firstIndex: index })
    }
  }

  const violations: BusinessRuleViolation[] = []

  for (const order of orders) {
    const key = encodeKey([order.o_orderkey])
    const entry = totals.get(key)
    if (!entry || skip.has(key)) continue

    const diff = order.o_totalprice.units - entry.units
    const distance = diff < 0n ? -diff : diff
    if (distance > tolerance.units) {
      violations.push(
        new BusinessRuleViolation(
          'lineitem',
          'total-price',
          `order ${order.o_orderkey} totals ${order.o_totalprice} but its lines sum to ${Decimal.formatUnits(entry.units)}`,
          { rowIndex: entry.firstIndex }
        )
      )
    }
  }

  return violations
}

export type RuleSet = { [E in EntityName]: RuleCheck<E> }

const none = (): BusinessRuleViolation[] => []

/**
 * Cross-row checks to run when an entity's batch is committed.
 */
export function rulesFor(config: LoadConfig): RuleSet {
  const { shipDateOrder, totalPrice } = config.strict

  return {
    region: none,
    nation: none,
    part: none,
    supplier: none,
    partsupp: none,
    customer: none,
    orders: none,
    lineitem: (rows, context) => [
      ...(shipDateOrder ? checkShipDateOrder(rows) : []),
      ...(totalPrice ? checkTotalPrices(rows, context.ordersRows(), context.config.totalPriceTolerance, context.incompleteOrders) : []),
    ],
  }
}
