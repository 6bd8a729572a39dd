/**
 * Access Structure Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { allIndexSpecs, buildIndex, buildIndexes, indexSpec } from '../integrity/access'
import { IndexBuildError } from '../integrity/errors'
import { ReferentialGraph, loadOrder } from '../integrity/graph'
import { tpchFixture } from './fixtures'

describe('Access Structures', () => {
  describe('indexSpec', () => {
    it('should declare the ten secondary indexes in order', () => {
      expect(allIndexSpecs().map(idx => idx.name)).toEqual([
        'idx_nation_regionkey',
        'idx_supplier_nationkey',
        'idx_partsupp_suppkey',
        'idx_customer_nationkey',
        'idx_orders_custkey',
        'idx_orders_orderdate',
        'idx_lineitem_orderkey',
        'idx_lineitem_partkey',
        'idx_lineitem_suppkey',
        'idx_lineitem_shipdate',
      ])
    })

    it('should describe each index of an entity', () => {
      expect(indexSpec('orders')).toEqual([
        { name: 'idx_orders_custkey', entity: 'orders', columns: ['o_custkey'], unique: false },
        { name: 'idx_orders_orderdate', entity: 'orders', columns: ['o_orderdate'], unique: false },
      ])
    })

    it('should give entities without secondary indexes an empty list', () => {
      expect(indexSpec('region')).toEqual([])
      expect(indexSpec('part')).toEqual([])
    })
  })

  describe('buildIndexes', () => {
    let graph: ReferentialGraph

    beforeEach(() => {
      graph = new ReferentialGraph()
      const rows = tpchFixture()
      for (const entity of loadOrder()) graph.registerEntity(entity, rows[entity])
    })

    it('should build every declared index over a loaded graph', () => {
      const indexes = buildIndexes(graph)
      expect(indexes.size).toBe(10)
      expect(indexes.get('idx_nation_regionkey')?.cardinality).toBe(5)
    })

    it('should return the same rows as a full scan', () => {
      const index = buildIndex(graph, 'lineitem', 'idx_lineitem_orderkey')
      for (const orderkey of [1n, 2n, 3n, 4n]) {
        const scanned = graph.rowsOf('lineitem').filter(row => row.l_orderkey === orderkey)
        expect(index.lookup(orderkey)).toEqual(scanned)
      }
      expect(index.lookup(1n)).toHaveLength(2)
      expect(index.lookup(4n)).toEqual([])
    })

    it('should look up dates by their ISO text', () => {
      const index = buildIndex(graph, 'orders', 'idx_orders_orderdate')
      expect(index.lookup('1996-12-01').map(row => row.o_orderkey)).toEqual([2n])
    })

    it('should look up INTEGER columns by number', () => {
      const index = buildIndex(graph, 'nation', 'idx_nation_regionkey')
      expect(index.positions(0)).toEqual([0, 5, 10, 15, 20])
    })

    it('should require one value per indexed column', () => {
      const index = buildIndex(graph, 'nation', 'idx_nation_regionkey')
      expect(() => index.positions(0, 1)).toThrow('idx_nation_regionkey takes 1 key value(s), got 2')
    })
  })

  describe('IndexBuildError', () => {
    it('should be raised for an entity that is not loaded', () => {
      const graph = new ReferentialGraph()
      expect(() => buildIndex(graph, 'orders', 'idx_orders_custkey')).toThrow(IndexBuildError)
      expect(() => buildIndexes(graph)).toThrow(IndexBuildError)
    })

    it('should be raised for an index the entity does not declare', () => {
      const graph = new ReferentialGraph()
      try {
        buildIndex(graph, 'region', 'idx_orders_custkey')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(IndexBuildError)
        if (error instanceof IndexBuildError) {
          expect(error.index).toBe('idx_orders_custkey')
          expect(error.message).toBe('Cannot build idx_orders_custkey on region: no such index on this entity')
        }
      }
    })
  })
})
