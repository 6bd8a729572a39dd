/**
 * Referential Graph Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import type { EntityName } from '../datasets'
import { Decimal } from '../integrity/decimal'
import {
  AttributeViolation,
  BusinessRuleViolation,
  DanglingReference,
  DuplicateLoad,
  OutOfOrderLoad,
  UniquenessViolation,
  isIntegrityError,
  isRowViolation,
} from '../integrity/errors'
import { FOREIGN_KEY_EDGES, ReferentialGraph, dependenciesOf, loadOrder } from '../integrity/graph'
import { tpchFixture, type FixtureRows } from './fixtures'

function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('expected an error')
}

function loadThrough(graph: ReferentialGraph, rows: FixtureRows, last: EntityName): void {
  for (const entity of loadOrder()) {
    graph.registerEntity(entity, rows[entity])
    if (entity === last) return
  }
}

describe('Referential Graph', () => {
  describe('edges and ordering', () => {
    it('should declare eight foreign keys', () => {
      expect(FOREIGN_KEY_EDGES.map(edge => edge.name)).toEqual([
        'nation_region',
        'supplier_nation',
        'partsupp_part',
        'partsupp_supplier',
        'customer_nation',
        'orders_customer',
        'lineitem_orders',
        'lineitem_partsupp',
      ])
    })

    it('should model lineitem to partsupp as one two-column edge', () => {
      const edge = FOREIGN_KEY_EDGES.find(e => e.name === 'lineitem_partsupp')
      expect(edge).toEqual({
        name: 'lineitem_partsupp',
        from: 'lineitem',
        to: 'partsupp',
        columns: ['l_partkey', 'l_suppkey'],
        targetColumns: ['ps_partkey', 'ps_suppkey'],
      })
    })

    it('should report direct dependencies', () => {
      expect(dependenciesOf('region')).toEqual([])
      expect(dependenciesOf('partsupp')).toEqual(['part', 'supplier'])
      expect(dependenciesOf('lineitem')).toEqual(['orders', 'partsupp'])
    })

    it('should produce the canonical load order', () => {
      expect(loadOrder()).toEqual([
        'region',
        'nation',
        'part',
        'supplier',
        'partsupp',
        'customer',
        'orders',
        'lineitem',
      ])
    })

    it('should order every entity after the entities it references', () => {
      const order = loadOrder()
      for (const edge of FOREIGN_KEY_EDGES) {
        expect(order.indexOf(edge.to)).toBeLessThan(order.indexOf(edge.from))
      }
    })
  })

  describe('registerEntity', () => {
    let graph: ReferentialGraph
    let rows: FixtureRows

    beforeEach(() => {
      graph = new ReferentialGraph()
      rows = tpchFixture()
    })

    it('should load the whole fixture in order', () => {
      loadThrough(graph, rows, 'lineitem')
      expect(graph.registeredEntities()).toEqual(loadOrder())
      expect(graph.rowsOf('nation')).toHaveLength(25)
      expect(graph.rowsOf('partsupp')).toHaveLength(7)
      expect(graph.rowsOf('lineitem')).toHaveLength(4)
    })

    it('should report the registered row count', () => {
      expect(graph.registerEntity('region', rows.region)).toEqual({ entity: 'region', rowCount: 5 })
    })

    it('should reject a duplicate primary key', () => {
      rows.region.push({ r_regionkey: '1', r_name: 'AGAIN', r_comment: null })
      const error = catchError(() => graph.registerEntity('region', rows.region))

      expect(error).toBeInstanceOf(UniquenessViolation)
      if (!(error instanceof UniquenessViolation)) return
      expect(error.entity).toBe('region')
      expect(error.key).toBe('1')
      expect(error.rowIndex).toBe(5)
      expect(error.firstRowIndex).toBe(1)
    })

    it('should reject a duplicate composite key only on the full tuple', () => {
      loadThrough(graph, rows, 'supplier')
      // (4, 2) is not stocked yet, so it is a new tuple
      rows.partsupp.push({ ...rows.partsupp[0], ps_suppkey: '2', ps_partkey: '4' })
      expect(graph.registerEntity('partsupp', rows.partsupp).rowCount).toBe(8)

      graph.reset()
      rows = tpchFixture()
      loadThrough(graph, rows, 'supplier')
      rows.partsupp.push({ ...rows.partsupp[0] })
      const error = catchError(() => graph.registerEntity('partsupp', rows.partsupp))
      expect(error).toBeInstanceOf(UniquenessViolation)
      if (error instanceof UniquenessViolation) expect(error.key).toBe('(1, 1)')
    })

    it('should reject a supplier whose nation does not exist', () => {
      loadThrough(graph, rows, 'part')
      rows.supplier[1].s_nationkey = '999'
      const error = catchError(() => graph.registerEntity('supplier', rows.supplier))

      expect(error).toBeInstanceOf(DanglingReference)
      if (!(error instanceof DanglingReference)) return
      expect(error.entity).toBe('supplier')
      expect(error.key).toBe('999')
      expect(error.targetEntity).toBe('nation')
      expect(error.targetKey).toBe('n_nationkey')
      expect(error.location).toEqual({ rowIndex: 1, rowKey: '2' })
      expect(graph.isRegistered('supplier')).toBe(false)
    })

    it('should reject a line item whose part and supplier were never stocked together', () => {
      // Part 4 and supplier 2 each exist, but partsupp has no (4, 2)
      loadThrough(graph, rows, 'orders')
      rows.lineitem[3].l_suppkey = '2'
      const error = catchError(() => graph.registerEntity('lineitem', rows.lineitem))

      expect(error).toBeInstanceOf(DanglingReference)
      if (!(error instanceof DanglingReference)) return
      expect(error.entity).toBe('lineitem')
      expect(error.key).toBe('(4, 2)')
      expect(error.targetEntity).toBe('partsupp')
      expect(error.targetKey).toBe('(ps_partkey, ps_suppkey)')
      expect(error.columns).toEqual(['l_partkey', 'l_suppkey'])
    })

    it('should tell row violations from sequencing errors', () => {
      rows.supplier[0].s_nationkey = '99'
      loadThrough(graph, rows, 'part')
      const error = catchError(() => graph.registerEntity('supplier', rows.supplier))

      expect(isRowViolation(error)).toBe(true)
      expect(isRowViolation(new OutOfOrderLoad('lineitem', 'orders'))).toBe(false)
      expect(isRowViolation(new DuplicateLoad('region'))).toBe(false)
      expect(isIntegrityError(new DuplicateLoad('region'))).toBe(true)
      expect(isIntegrityError(new Error('disk full'))).toBe(false)
    })

    it('should reject a load before its dependencies', () => {
      loadThrough(graph, rows, 'customer')
      const error = catchError(() => graph.registerEntity('lineitem', rows.lineitem))

      expect(error).toBeInstanceOf(OutOfOrderLoad)
      if (!(error instanceof OutOfOrderLoad)) return
      expect(error.entity).toBe('lineitem')
      expect(error.missingDependency).toBe('orders')
    })

    it('should reject loading the same entity twice', () => {
      graph.registerEntity('region', rows.region)
      const error = catchError(() => graph.registerEntity('region', rows.region))
      expect(error).toBeInstanceOf(DuplicateLoad)
    })

    it('should retain nothing of a rejected batch', () => {
      graph.registerEntity('region', rows.region)
      rows.nation[24].n_regionkey = '7'

      expect(() => graph.registerEntity('nation', rows.nation)).toThrow(DanglingReference)
      expect(graph.isRegistered('nation')).toBe(false)
      expect(graph.rowsOf('nation')).toEqual([])
      expect(graph.keysOf('nation')).toBeUndefined()

      // The same entity can be retried once fixed
      rows.nation[24].n_regionkey = '4'
      expect(graph.registerEntity('nation', rows.nation).rowCount).toBe(25)
    })

    it('should report the lowest-numbered violating row', () => {
      graph.registerEntity('region', rows.region)
      rows.nation[20].n_regionkey = '9'
      rows.nation[3].n_name = null
      const error = catchError(() => graph.registerEntity('nation', rows.nation))

      expect(error).toBeInstanceOf(AttributeViolation)
      if (error instanceof AttributeViolation) expect(error.location.rowIndex).toBe(3)
    })

    it('should freeze the published records', () => {
      loadThrough(graph, rows, 'part')
      const part = graph.rowsOf('part')[0]

      expect(() => {
        part.p_partkey = 99n
      }).toThrow(TypeError)
      expect(graph.rowsOf('part')[0].p_partkey).toBe(1n)
    })

    it('should forget everything on reset', () => {
      loadThrough(graph, rows, 'nation')
      graph.reset()
      expect(graph.registeredEntities()).toEqual([])
      expect(graph.registerEntity('region', rows.region).rowCount).toBe(5)
    })
  })

  describe('validateReferences', () => {
    it('should accept a row whose references all resolve', () => {
      const graph = new ReferentialGraph()
      const rows = tpchFixture()
      loadThrough(graph, rows, 'region')
      expect(() => graph.validateReferences('nation', { n_regionkey: 2 })).not.toThrow()
    })

    it('should fail before its target is loaded', () => {
      const graph = new ReferentialGraph()
      expect(() => graph.validateReferences('nation', { n_regionkey: 2 })).toThrow(OutOfOrderLoad)
    })
  })

  describe('validateBatch', () => {
    it('should collect every violation without registering', () => {
      const graph = new ReferentialGraph()
      const rows = tpchFixture()
      graph.registerEntity('region', rows.region)
      rows.nation[2].n_regionkey = '42'
      rows.nation[5].n_name = 'N'.repeat(26)
      rows.nation[9].n_nationkey = '0'

      const violations = graph.validateBatch('nation', rows.nation)
      expect(violations.map(v => v.constructor.name)).toEqual([
        'DanglingReference',
        'AttributeViolation',
        'UniquenessViolation',
      ])
      expect(graph.isRegistered('nation')).toBe(false)
    })

    it('should not total an order whose other lines were rejected', () => {
      const graph = new ReferentialGraph({ config: { strict: { shipDateOrder: false, totalPrice: true } } })
      const rows = tpchFixture()
      loadThrough(graph, rows, 'orders')
      rows.lineitem[1].l_partkey = '4'

      const violations = graph.validateBatch('lineitem', rows.lineitem)
      expect(violations.map(v => v.constructor.name)).toEqual(['DanglingReference'])
    })

    it('should stop at maxViolations', () => {
      const graph = new ReferentialGraph({ config: { maxViolations: 2 } })
      const rows = tpchFixture()
      graph.registerEntity('region', rows.region)
      for (const nation of rows.nation) nation.n_regionkey = '42'

      expect(graph.validateBatch('nation', rows.nation)).toHaveLength(2)
    })
  })

  describe('strict rules', () => {
    it('should be off by default', () => {
      const graph = new ReferentialGraph()
      const rows = tpchFixture()
      rows.lineitem[0].l_commitdate = '1995-01-01'
      rows.orders[0].o_totalprice = '999.00'
      expect(() => loadThrough(graph, rows, 'lineitem')).not.toThrow()
    })

    it('should reject a line item committed before it shipped', () => {
      const graph = new ReferentialGraph({ config: { strict: { shipDateOrder: true, totalPrice: false } } })
      const rows = tpchFixture()
      rows.lineitem[2].l_commitdate = '1996-12-01'
      const error = catchError(() => loadThrough(graph, rows, 'lineitem'))

      expect(error).toBeInstanceOf(BusinessRuleViolation)
      if (!(error instanceof BusinessRuleViolation)) return
      expect(error.rule).toBe('ship-date-order')
      expect(error.location).toEqual({ rowIndex: 2, rowKey: '(2, 1)' })
      expect(graph.isRegistered('lineitem')).toBe(false)
    })

    it('should accept order totals equal to their line charges', () => {
      const graph = new ReferentialGraph({ config: { strict: { shipDateOrder: true, totalPrice: true } } })
      expect(() => loadThrough(graph, tpchFixture(), 'lineitem')).not.toThrow()
    })

    it('should reject an order total outside the tolerance', () => {
      const graph = new ReferentialGraph({
        config: { strict: { shipDateOrder: false, totalPrice: true }, totalPriceTolerance: Decimal.parse('0.50') },
      })
      const rows = tpchFixture()
      rows.orders[1].o_totalprice = '237.00'
      const error = catchError(() => loadThrough(graph, rows, 'lineitem'))

      expect(error).toBeInstanceOf(BusinessRuleViolation)
      if (!(error instanceof BusinessRuleViolation)) return
      expect(error.rule).toBe('total-price')
      expect(error.detail).toBe('order 2 totals 237.00 but its lines sum to 236.25')
      expect(error.location).toEqual({ rowIndex: 2 })
    })

    it('should compare line sums past the DECIMAL(15, 2) range', () => {
      const graph = new ReferentialGraph({ config: { strict: { shipDateOrder: false, totalPrice: true } } })
      const rows = tpchFixture()
      rows.lineitem[0].l_extendedprice = '9999999999999.99'
      rows.lineitem[0].l_tax = '0.50'
      const error = catchError(() => loadThrough(graph, rows, 'lineitem'))

      expect(error).toBeInstanceOf(BusinessRuleViolation)
      if (!(error instanceof BusinessRuleViolation)) return
      expect(error.detail).toBe('order 1 totals 200.00 but its lines sum to 15000000000099.99')
      expect(error.location).toEqual({ rowIndex: 0 })
    })

    it('should accept a total within the tolerance', () => {
      const graph = new ReferentialGraph({
        config: { strict: { shipDateOrder: false, totalPrice: true }, totalPriceTolerance: Decimal.parse('0.75') },
      })
      const rows = tpchFixture()
      rows.orders[1].o_totalprice = '237.00'
      expect(() => loadThrough(graph, rows, 'lineitem')).not.toThrow()
    })
  })
})
